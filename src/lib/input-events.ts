import type { Size, Vec2 } from "./coordinates";

export type ButtonState = "pressed" | "released";

export type MouseButton = "left" | "middle" | "right" | "other";

/**
 * The closed set of input events the viewer core understands. Whatever feeds
 * the reducer must filter everything else out beforehand.
 */
export type InputEvent =
  | { kind: "key"; code: string; state: ButtonState; repeat: boolean }
  | { kind: "cursor-move"; position: Vec2 }
  | { kind: "scroll"; deltaY: number }
  | { kind: "mouse-button"; button: MouseButton; state: ButtonState }
  | { kind: "modifiers"; ctrl: boolean };

/** Events from the window itself, handled by the viewer before the reducer. */
export type WindowEvent =
  | InputEvent
  | { kind: "resized"; size: Size }
  | { kind: "close-requested" }
  | { kind: "redraw-requested" };

/** Unit direction of each pan key; y points up the imaginary axis. */
export const DIRECTION_KEYS: ReadonlyMap<string, Vec2> = new Map([
  ["KeyA", { x: -1, y: 0 }],
  ["KeyD", { x: 1, y: 0 }],
  ["KeyW", { x: 0, y: 1 }],
  ["KeyS", { x: 0, y: -1 }],
]);

export type KeyAction =
  | "toggleMandelbrot"
  | "toggleRotateColors"
  | "decreaseIterations"
  | "increaseIterations"
  | "reset"
  | "fullscreen"
  | "exit";

// Keys that act once per press. Codes follow KeyboardEvent.code.
export const KEY_BINDINGS: ReadonlyMap<string, KeyAction> = new Map<string, KeyAction>([
  ["Space", "toggleMandelbrot"],
  ["KeyQ", "toggleRotateColors"],
  ["Comma", "decreaseIterations"],
  ["Period", "increaseIterations"],
  ["KeyR", "reset"],
  ["F11", "fullscreen"],
  ["Escape", "exit"],
]);
