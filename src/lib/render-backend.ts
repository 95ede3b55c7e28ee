// ABOUTME: Boundary between the viewer core and the window and GPU it drives
// ABOUTME: Implementations live outside the core; the browser one is in browser-window.ts

import type { Size } from "./coordinates";

export type SurfaceErrorKind = "outdated" | "lost" | "timeout" | "out-of-memory" | "other";

/**
 * Thrown by FrameRenderer.render when the presentation surface can't take a
 * frame. Outdated and lost surfaces recover by reconfiguring; anything else
 * costs one frame.
 */
export class SurfaceError extends Error {
  readonly kind: SurfaceErrorKind;

  constructor(kind: SurfaceErrorKind, message = `Surface is ${kind}`) {
    super(message);
    this.name = "SurfaceError";
    this.kind = kind;
  }

  get isStale(): boolean {
    return this.kind === "outdated" || this.kind === "lost";
  }
}

/**
 * The GPU side: a surface plus a pipeline running the per-pixel evaluator
 * over the parameter block.
 */
export interface FrameRenderer {
  /** (Re)configures the surface for the given size in pixels */
  configure(size: Size): void;
  /** Copies a serialized parameter block into the evaluator's uniform buffer */
  upload(block: ArrayBuffer): void;
  /**
   * Draws and presents one frame.
   * @throws SurfaceError when the surface is outdated, lost or otherwise unusable
   */
  render(): void;
}

/** The window the viewer draws into. */
export interface WindowBoundary {
  innerSize(): Size;
  setTitle(title: string): void;
  setFullscreen(fullscreen: boolean): void;
  /** Schedules a redraw-requested event for the next frame */
  requestRedraw(): void;
  /** Ends the event loop; nothing is drained */
  exit(): void;
}
