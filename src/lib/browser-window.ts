import type { Size } from "./coordinates";
import type { WindowEvent } from "./input-events";
import type { WindowBoundary } from "./render-backend";

/**
 * WindowBoundary over a canvas element and the document that contains it.
 * Redraws are driven by requestAnimationFrame; at most one is pending at a
 * time.
 */
export class BrowserWindow implements WindowBoundary {
  private readonly canvas: HTMLCanvasElement;
  private readonly onEvent: (event: WindowEvent) => void;
  private readonly onExit: () => void;
  private frameId: number | null = null;
  private closed = false;

  constructor(canvas: HTMLCanvasElement, onEvent: (event: WindowEvent) => void, onExit: () => void = () => {}) {
    this.canvas = canvas;
    this.onEvent = onEvent;
    this.onExit = onExit;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  innerSize(): Size {
    return { width: this.canvas.width, height: this.canvas.height };
  }

  setTitle(title: string): void {
    this.canvas.ownerDocument.title = title;
  }

  setFullscreen(fullscreen: boolean): void {
    const doc = this.canvas.ownerDocument;

    if (fullscreen) {
      if (typeof this.canvas.requestFullscreen !== "function") {
        console.warn("BrowserWindow: Fullscreen API not available");
        return;
      }
      this.canvas.requestFullscreen().catch((error: unknown) => {
        console.warn("BrowserWindow: could not enter fullscreen:", error);
      });
    } else if (doc.fullscreenElement && typeof doc.exitFullscreen === "function") {
      doc.exitFullscreen().catch((error: unknown) => {
        console.warn("BrowserWindow: could not leave fullscreen:", error);
      });
    }
  }

  requestRedraw(): void {
    if (this.closed || this.frameId !== null) return;

    const view = this.canvas.ownerDocument.defaultView;
    if (!view) return;

    this.frameId = view.requestAnimationFrame(() => {
      this.frameId = null;
      this.onEvent({ kind: "redraw-requested" });
    });
  }

  exit(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.frameId !== null) {
      this.canvas.ownerDocument.defaultView?.cancelAnimationFrame(this.frameId);
      this.frameId = null;
    }
    this.onExit();
  }
}
