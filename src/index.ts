export { StatusBar } from "./components/StatusBar";
export { useFractalViewer } from "./hooks/use-fractal-viewer";
export {
  createViewStore,
  initialViewState,
  ITERATION_STEP,
  MAX_ITERATIONS,
  MAX_ZOOM_LEVEL,
  MIN_ITERATIONS,
  MIN_ZOOM_LEVEL,
  MOVEMENT_STEP,
  movementStepAt,
  useViewStore,
} from "./hooks/use-store";
export type { ViewState, ViewStore, ViewStoreOptions, ViewStoreState } from "./hooks/use-store";
export { BrowserWindow } from "./lib/browser-window";
export { computeZoomFactor, normalizedToComplex, screenToNormalized, ZOOM_DIVISOR } from "./lib/coordinates";
export type { Size, Vec2 } from "./lib/coordinates";
export { DomInputTranslator, wheelLines } from "./lib/dom-events";
export { FractalViewer } from "./lib/fractal-viewer";
export { synchronizeFrame } from "./lib/frame-synchronizer";
export type { SynchronizedFrame } from "./lib/frame-synchronizer";
export { DIRECTION_KEYS, KEY_BINDINGS } from "./lib/input-events";
export type { InputEvent, KeyAction, WindowEvent } from "./lib/input-events";
export { reduceInput } from "./lib/input-reducer";
export type { InputEffects } from "./lib/input-reducer";
export {
  createParameterBlock,
  PARAMETER_BLOCK_LAYOUT,
  PARAMETER_BLOCK_SIZE,
  serializeParameterBlock,
} from "./lib/parameter-block";
export type { ParameterBlock, ViewParameters } from "./lib/parameter-block";
export { SurfaceError } from "./lib/render-backend";
export type { FrameRenderer, SurfaceErrorKind, WindowBoundary } from "./lib/render-backend";
export { describeView, formatComplex, formatFixed, formatStatusLine } from "./lib/status-text";
export type { StatusFields } from "./lib/status-text";
