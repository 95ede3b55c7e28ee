import { type RefObject, useEffect, useState } from "react";

import { BrowserWindow } from "@/lib/browser-window";
import canvasSize from "@/lib/canvas-size";
import { DomInputTranslator } from "@/lib/dom-events";
import { FractalViewer } from "@/lib/fractal-viewer";
import { DIRECTION_KEYS, KEY_BINDINGS } from "@/lib/input-events";
import type { FrameRenderer } from "@/lib/render-backend";

import { createViewStore, type ViewStore, type ViewStoreOptions } from "./use-store";

// keys whose browser default (page scroll, browser fullscreen) would fight the viewer
const isViewerKey = (code: string) => DIRECTION_KEYS.has(code) || KEY_BINDINGS.has(code);

/**
 * Runs a fractal viewer on the given canvas for as long as the component is
 * mounted. The view state outlives renderer changes: swapping the renderer
 * starts a new viewer session on the same store.
 *
 * @returns The store holding the view, for status displays
 */
export function useFractalViewer(
  canvasRef: RefObject<HTMLCanvasElement | null>,
  renderer: FrameRenderer | null,
  options: ViewStoreOptions = {}
): ViewStore {
  const [store] = useState(() => createViewStore(options));

  useEffect(() => {
    const canvas = canvasRef.current;
    const win = canvas?.ownerDocument.defaultView;
    if (!canvas || !win || !renderer) return;

    const applyCanvasSize = () => {
      const size = canvasSize(canvas);
      if (canvas.width !== size.width || canvas.height !== size.height) {
        canvas.width = size.width;
        canvas.height = size.height;
      }
      return size;
    };
    applyCanvasSize();

    const translator = new DomInputTranslator(canvas);
    let viewer: FractalViewer | null = null;

    const handleInput = (event: Event) => {
      if (event instanceof WheelEvent || (event instanceof KeyboardEvent && isViewerKey(event.code))) {
        event.preventDefault();
      }
      for (const input of translator.translate(event)) {
        viewer?.dispatch(input);
      }
    };

    const handleResize = () => {
      viewer?.dispatch({ kind: "resized", size: applyCanvasSize() });
    };

    const detach = () => {
      canvas.removeEventListener("pointerdown", handleInput);
      canvas.removeEventListener("wheel", handleInput);
      win.removeEventListener("pointermove", handleInput);
      win.removeEventListener("pointerup", handleInput);
      win.removeEventListener("keydown", handleInput);
      win.removeEventListener("keyup", handleInput);
      win.removeEventListener("resize", handleResize);
    };

    const browserWindow = new BrowserWindow(canvas, (event) => viewer?.dispatch(event), detach);
    viewer = new FractalViewer(browserWindow, renderer, store);

    canvas.addEventListener("pointerdown", handleInput);
    canvas.addEventListener("wheel", handleInput, { passive: false });
    win.addEventListener("pointermove", handleInput);
    win.addEventListener("pointerup", handleInput);
    win.addEventListener("keydown", handleInput);
    win.addEventListener("keyup", handleInput);
    win.addEventListener("resize", handleResize);

    viewer.start();

    return () => {
      browserWindow.exit();
    };
  }, [canvasRef, renderer, store]);

  return store;
}
