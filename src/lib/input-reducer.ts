import type { ViewStore } from "@/hooks/use-store";

import type { Size } from "./coordinates";
import { DIRECTION_KEYS, KEY_BINDINGS, type InputEvent } from "./input-events";

/**
 * What the reducer may ask of the world outside the view state.
 */
export interface InputEffects {
  /** Current window size in pixels, used to normalize cursor positions */
  windowSize: () => Size;
  /** Switches the window in or out of fullscreen */
  setFullscreen: (fullscreen: boolean) => void;
  /** Pushes the view to the evaluator now instead of waiting for the next frame */
  synchronize: () => void;
}

/**
 * Applies a single input event to the view state.
 *
 * Direction keys change the pan velocity rather than the offset; the frame
 * synchronizer integrates that velocity once per frame. Every other event
 * mutates the view directly.
 *
 * @throws Error when handed an event outside the closed InputEvent set. That
 * is a bug in whatever dispatches events, not a recoverable condition.
 */
export function reduceInput(store: ViewStore, event: InputEvent, effects: InputEffects): void {
  switch (event.kind) {
    case "key":
      handleKey(store, event, effects);
      return;

    case "cursor-move": {
      const view = store.getState();
      const before = view.mouseCoords();
      view.moveMouse(event.position, effects.windowSize());
      const after = view.mouseCoords();

      // dragging keeps the grabbed point under the cursor
      if (store.getState().mouseClicked) {
        view.translate({ x: before.x - after.x, y: before.y - after.y });
      }
      return;
    }

    case "scroll": {
      // scrolling up (positive delta) zooms in, i.e. lowers the zoom level
      const view = store.getState();
      if (view.ctrlPressed) {
        view.zoom(-event.deltaY);
      } else {
        view.mouseZoom(-event.deltaY);
      }
      return;
    }

    case "mouse-button":
      if (event.button === "left") {
        store.getState().setMouseClicked(event.state === "pressed");
      }
      return;

    case "modifiers":
      store.getState().setCtrlPressed(event.ctrl);
      return;

    default:
      return unexpectedEvent(event);
  }
}

function handleKey(store: ViewStore, event: Extract<InputEvent, { kind: "key" }>, effects: InputEffects): void {
  if (event.repeat) return;

  const view = store.getState();

  const direction = DIRECTION_KEYS.get(event.code);
  if (direction) {
    // press adds velocity, release takes the same amount away again
    const amount = (event.state === "pressed" ? 1 : -1) * view.movementStep();
    view.adjustMovement({ x: direction.x * amount, y: direction.y * amount });
    return;
  }

  if (event.state !== "pressed") return;

  switch (KEY_BINDINGS.get(event.code)) {
    case "toggleMandelbrot":
      view.toggleMandelbrot();
      break;
    case "toggleRotateColors":
      view.toggleRotateColors();
      break;
    case "decreaseIterations":
      if (view.decreaseIterations()) effects.synchronize();
      break;
    case "increaseIterations":
      if (view.increaseIterations()) effects.synchronize();
      break;
    case "reset":
      view.reset();
      break;
    case "fullscreen": {
      const fullscreen = !view.fullscreen;
      view.setFullscreen(fullscreen);
      effects.setFullscreen(fullscreen);
      break;
    }
    case "exit":
      // the viewer exits before the event reaches us
      break;
    case undefined:
      break;
  }
}

function unexpectedEvent(event: never): never {
  throw new Error(`Unexpected input event reached the reducer: ${JSON.stringify(event)}`);
}
