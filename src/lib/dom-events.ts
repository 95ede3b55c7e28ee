// ABOUTME: Turns DOM keyboard, pointer and wheel events into viewer input events
// ABOUTME: Everything outside the viewer's closed event set is dropped here

import type { InputEvent, MouseButton } from "./input-events";

// Pixel-mode wheel deltas per line; roughly one notch of a mouse wheel
export const PIXELS_PER_LINE = 100;
export const LINES_PER_PAGE = 20;

// WheelEvent.deltaMode values
const DOM_DELTA_LINE = 1;
const DOM_DELTA_PAGE = 2;

const MOUSE_BUTTONS: readonly MouseButton[] = ["left", "middle", "right"];

const toMouseButton = (button: number): MouseButton => MOUSE_BUTTONS[button] ?? "other";

/**
 * Converts a WheelEvent's vertical delta to lines, positive meaning the wheel
 * moved away from the user (scroll up). DOM deltas are positive downwards.
 */
export function wheelLines(event: WheelEvent): number {
  switch (event.deltaMode) {
    case DOM_DELTA_LINE:
      return -event.deltaY;
    case DOM_DELTA_PAGE:
      return -event.deltaY * LINES_PER_PAGE;
    default:
      return -event.deltaY / PIXELS_PER_LINE;
  }
}

/**
 * Stateful translator from DOM events to InputEvents. It remembers the last
 * Control state it saw so that a `modifiers` event is emitted only when that
 * state changes, ahead of the event that carried the change.
 */
export class DomInputTranslator {
  private readonly canvas: HTMLCanvasElement;
  private ctrl = false;

  constructor(canvas: HTMLCanvasElement) {
    this.canvas = canvas;
  }

  translate(event: Event): InputEvent[] {
    const events: InputEvent[] = [];

    if (event instanceof KeyboardEvent || event instanceof MouseEvent) {
      if (event.ctrlKey !== this.ctrl) {
        this.ctrl = event.ctrlKey;
        events.push({ kind: "modifiers", ctrl: this.ctrl });
      }
    }

    if (event instanceof KeyboardEvent) {
      if (event.type === "keydown" || event.type === "keyup") {
        events.push({
          kind: "key",
          code: event.code,
          state: event.type === "keydown" ? "pressed" : "released",
          repeat: event.repeat,
        });
      }
    } else if (event instanceof WheelEvent) {
      events.push({ kind: "scroll", deltaY: wheelLines(event) });
    } else if (event instanceof MouseEvent) {
      switch (event.type) {
        case "pointermove":
        case "mousemove":
          events.push({ kind: "cursor-move", position: this.devicePosition(event) });
          break;
        case "pointerdown":
        case "mousedown":
          events.push({ kind: "mouse-button", button: toMouseButton(event.button), state: "pressed" });
          break;
        case "pointerup":
        case "mouseup":
          events.push({ kind: "mouse-button", button: toMouseButton(event.button), state: "released" });
          break;
      }
    }

    return events;
  }

  // cursor position relative to the canvas, in the same device pixels as canvas.width
  private devicePosition(event: MouseEvent) {
    const rect = this.canvas.getBoundingClientRect();
    const dpr = this.canvas.ownerDocument.defaultView?.devicePixelRatio || 1;
    return {
      x: (event.clientX - rect.left) * dpr,
      y: (event.clientY - rect.top) * dpr,
    };
  }
}
