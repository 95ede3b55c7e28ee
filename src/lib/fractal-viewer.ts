import { createViewStore, type ViewStore } from "@/hooks/use-store";

import type { Size } from "./coordinates";
import { synchronizeFrame, type SynchronizedFrame } from "./frame-synchronizer";
import { KEY_BINDINGS, type InputEvent, type WindowEvent } from "./input-events";
import { reduceInput, type InputEffects } from "./input-reducer";
import { PARAMETER_BLOCK_SIZE } from "./parameter-block";
import { SurfaceError, type FrameRenderer, type WindowBoundary } from "./render-backend";

/**
 * FractalViewer is one viewing session: it owns the view state and routes
 * window events to the input reducer and the frame synchronizer.
 *
 * Usage:
 * ```typescript
 * const viewer = new FractalViewer(browserWindow, gpuRenderer);
 * viewer.start();
 * // from the window's event loop:
 * viewer.dispatch({ kind: "scroll", deltaY: 1 });
 * viewer.dispatch({ kind: "redraw-requested" });
 * ```
 */
export class FractalViewer {
  readonly store: ViewStore;
  private readonly windowBoundary: WindowBoundary;
  private readonly renderer: FrameRenderer;
  private readonly effects: InputEffects;
  private readonly blockBuffer = new ArrayBuffer(PARAMETER_BLOCK_SIZE);
  private running = false;

  constructor(windowBoundary: WindowBoundary, renderer: FrameRenderer, store: ViewStore = createViewStore()) {
    this.windowBoundary = windowBoundary;
    this.renderer = renderer;
    this.store = store;
    this.effects = {
      windowSize: () => this.windowBoundary.innerSize(),
      setFullscreen: (fullscreen) => this.windowBoundary.setFullscreen(fullscreen),
      synchronize: () => {
        this.synchronize();
      },
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Configures the surface for the current window size, primes the evaluator
   * with the initial view and schedules the first frame.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    const size = this.windowBoundary.innerSize();
    console.log(`FractalViewer: starting at ${size.width}x${size.height}`);
    this.resize(size);
    this.synchronize();
    this.windowBoundary.requestRedraw();
  }

  dispatch(event: WindowEvent): void {
    if (!this.running) return;

    switch (event.kind) {
      case "resized":
        this.resize(event.size);
        return;
      case "close-requested":
        this.exit();
        return;
      case "redraw-requested":
        this.redraw();
        return;
      default:
        this.handleInput(event);
    }
  }

  synchronize(): SynchronizedFrame {
    return synchronizeFrame(this.store, this.windowBoundary, this.renderer, this.blockBuffer);
  }

  private handleInput(event: InputEvent): void {
    if (event.kind === "key" && event.state === "pressed" && KEY_BINDINGS.get(event.code) === "exit") {
      this.exit();
      return;
    }
    reduceInput(this.store, event, this.effects);
  }

  private resize(size: Size): void {
    if (size.width > 0 && size.height > 0) {
      this.renderer.configure(size);
    } else {
      console.warn(`FractalViewer: ignoring resize to ${size.width}x${size.height}`);
    }
  }

  private redraw(): void {
    this.synchronize();

    try {
      this.renderer.render();
    } catch (error) {
      if (error instanceof SurfaceError && error.isStale) {
        // the surface no longer matches the window; rebuild it and try again next frame
        console.log(`FractalViewer: surface ${error.kind}, reconfiguring`);
        this.resize(this.windowBoundary.innerSize());
      } else {
        console.error("FractalViewer: frame skipped:", error);
      }
    }

    this.windowBoundary.requestRedraw();
  }

  private exit(): void {
    this.running = false;
    console.log("FractalViewer: exiting");
    this.windowBoundary.exit();
  }
}
