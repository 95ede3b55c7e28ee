import { useStore } from "zustand";
import { createStore, type StoreApi } from "zustand/vanilla";

import { computeZoomFactor, normalizedToComplex, screenToNormalized, type Size, type Vec2 } from "@/lib/coordinates";

// Past these bounds f64 precision visibly distorts the image
export const MIN_ZOOM_LEVEL = -314.0;
export const MAX_ZOOM_LEVEL = 42.0;

// Keyboard pan speed as a fraction of the zoom factor
export const MOVEMENT_STEP = 0.005;

export const ITERATION_STEP = 100;
export const MIN_ITERATIONS = 100;
export const MAX_ITERATIONS = Math.floor(0xffffffff / 10);

export type ViewState = {
  /** Log-domain zoom accumulator. Lower is deeper. */
  zoomLevel: number;
  /** Centre of the view on the complex plane */
  offset: Vec2;
  /** Last cursor position in normalized window space */
  mousePosition: Vec2;
  /** Pan velocity from held direction keys, folded into offset every frame */
  movementDelta: Vec2;
  ctrlPressed: boolean;
  mouseClicked: boolean;
  fullscreen: boolean;
  /** Mandelbrot when true, Julia when false */
  isMandelbrot: boolean;
  rotateColors: boolean;
  maxIterations: number;
  /** Clock reading (ms) taken when the store was created; survives reset */
  sessionStart: number;
};

type Actions = {
  translate: (delta: Vec2) => void;
  zoom: (delta: number) => void;
  mouseZoom: (delta: number) => void;
  moveMouse: (pixel: Vec2, windowSize: Size) => void;
  mouseCoords: () => Vec2;
  zoomFactor: () => number;
  movementStep: () => number;
  elapsedSeconds: () => number;
  adjustMovement: (delta: Vec2) => void;
  toggleMandelbrot: () => void;
  toggleRotateColors: () => void;
  increaseIterations: () => boolean;
  decreaseIterations: () => boolean;
  setMouseClicked: (mouseClicked: boolean) => void;
  setCtrlPressed: (ctrlPressed: boolean) => void;
  setFullscreen: (fullscreen: boolean) => void;
  reset: () => void;
};

export type ViewStoreState = ViewState & Actions;
export type ViewStore = StoreApi<ViewStoreState>;

export const initialViewState: Omit<ViewState, "sessionStart"> = {
  zoomLevel: 8.0,
  // centre of the Mandelbrot set's real extent [-2, 0.25]
  offset: { x: (0.25 - 2.0) / 2.0, y: 0.0 },
  mousePosition: { x: 0.0, y: 0.0 },
  movementDelta: { x: 0.0, y: 0.0 },
  ctrlPressed: false,
  mouseClicked: false,
  fullscreen: false,
  isMandelbrot: true,
  rotateColors: true,
  maxIterations: 1500,
};

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

/**
 * Distance one frame of held-key panning covers at the given zoom level. The
 * epsilon floor keeps panning possible at the deepest zoom.
 */
export const movementStepAt = (zoomLevel: number): number =>
  Math.max(MOVEMENT_STEP * computeZoomFactor(zoomLevel), Number.EPSILON);

const rescale = (component: number, step: number) => (component !== 0 ? Math.sign(component) * step : component);

export type ViewStoreOptions = {
  /** Monotonic clock in milliseconds. Defaults to performance.now. */
  now?: () => number;
};

/**
 * Creates the view state for one viewer session. Each viewer owns its own
 * store; nothing here is module-global.
 */
export function createViewStore({ now = () => performance.now() }: ViewStoreOptions = {}): ViewStore {
  return createStore<ViewStoreState>()((set, get) => ({
    ...initialViewState,
    sessionStart: now(),

    translate: (delta) =>
      set((state) => ({
        offset: { x: state.offset.x + delta.x, y: state.offset.y + delta.y },
      })),

    zoom: (delta) =>
      set((state) => {
        const zoomLevel = clamp(state.zoomLevel + delta, MIN_ZOOM_LEVEL, MAX_ZOOM_LEVEL);
        const step = movementStepAt(zoomLevel);
        return {
          zoomLevel,
          movementDelta: {
            x: rescale(state.movementDelta.x, step),
            y: rescale(state.movementDelta.y, step),
          },
        };
      }),

    mouseZoom: (delta) => {
      const before = get().mouseCoords();
      get().zoom(delta);
      const after = get().mouseCoords();
      get().translate({ x: before.x - after.x, y: before.y - after.y });
    },

    moveMouse: (pixel, windowSize) => set({ mousePosition: screenToNormalized(pixel, windowSize) }),

    mouseCoords: () => {
      const { mousePosition, offset, zoomLevel } = get();
      return normalizedToComplex(mousePosition, offset, computeZoomFactor(zoomLevel));
    },

    zoomFactor: () => computeZoomFactor(get().zoomLevel),

    movementStep: () => movementStepAt(get().zoomLevel),

    elapsedSeconds: () => (now() - get().sessionStart) / 1000,

    adjustMovement: (delta) =>
      set((state) => ({
        movementDelta: { x: state.movementDelta.x + delta.x, y: state.movementDelta.y + delta.y },
      })),

    toggleMandelbrot: () => set((state) => ({ isMandelbrot: !state.isMandelbrot })),

    toggleRotateColors: () => set((state) => ({ rotateColors: !state.rotateColors })),

    increaseIterations: () => {
      const next = get().maxIterations + ITERATION_STEP;
      if (next > MAX_ITERATIONS) return false;
      set({ maxIterations: next });
      return true;
    },

    decreaseIterations: () => {
      const next = get().maxIterations - ITERATION_STEP;
      if (next < MIN_ITERATIONS) return false;
      set({ maxIterations: next });
      return true;
    },

    setMouseClicked: (mouseClicked) => set({ mouseClicked }),
    setCtrlPressed: (ctrlPressed) => set({ ctrlPressed }),
    setFullscreen: (fullscreen) => set({ fullscreen }),

    // Only the view goes back to defaults. Movement and the button, modifier and
    // fullscreen flags mirror input that is still physically held or active.
    reset: () =>
      set((state) => {
        const { zoomLevel, offset, mousePosition, isMandelbrot, rotateColors, maxIterations } = initialViewState;
        const step = movementStepAt(zoomLevel);
        return {
          zoomLevel,
          offset,
          mousePosition,
          isMandelbrot,
          rotateColors,
          maxIterations,
          movementDelta: {
            x: rescale(state.movementDelta.x, step),
            y: rescale(state.movementDelta.y, step),
          },
        };
      }),
  }));
}

/** Subscribes a component to a slice of a viewer's state. */
export function useViewStore<T>(store: ViewStore, selector: (state: ViewStoreState) => T): T {
  return useStore(store, selector);
}
