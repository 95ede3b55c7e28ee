import type { Size } from "./coordinates";

/**
 * Size of the drawing surface in device pixels. Uses the viewport rather than
 * the canvas's bounding box so the canvas follows dev tools opening and
 * closing.
 */
function canvasSize(canvas: HTMLCanvasElement | null): Size {
  if (canvas) {
    const view = canvas.ownerDocument.defaultView;
    if (view) {
      const dpr = view.devicePixelRatio || 1;
      return {
        width: Math.floor(view.innerWidth * dpr),
        height: Math.floor(view.innerHeight * dpr),
      };
    }
  }
  return { width: 0, height: 0 };
}

export default canvasSize;
