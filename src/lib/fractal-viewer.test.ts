import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createViewStore } from "@/hooks/use-store";

import { FractalViewer } from "./fractal-viewer";
import type { InputEvent } from "./input-events";
import { SurfaceError, type FrameRenderer, type WindowBoundary } from "./render-backend";

const press = (code: string): InputEvent => ({ kind: "key", code, state: "pressed", repeat: false });

describe("FractalViewer", () => {
  let size: { width: number; height: number };
  let windowBoundary: WindowBoundary;
  let renderer: FrameRenderer;
  let viewer: FractalViewer;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    size = { width: 800, height: 600 };
    windowBoundary = {
      innerSize: () => size,
      setTitle: vi.fn(),
      setFullscreen: vi.fn(),
      requestRedraw: vi.fn(),
      exit: vi.fn(),
    };
    renderer = {
      configure: vi.fn(),
      upload: vi.fn(),
      render: vi.fn(),
    };
    viewer = new FractalViewer(windowBoundary, renderer, createViewStore({ now: () => 0 }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("start", () => {
    it("should configure the surface, upload the first frame and ask for a redraw", () => {
      viewer.start();

      expect(viewer.isRunning).toBe(true);
      expect(renderer.configure).toHaveBeenCalledWith({ width: 800, height: 600 });
      expect(renderer.upload).toHaveBeenCalledTimes(1);
      expect(windowBoundary.setTitle).toHaveBeenCalledTimes(1);
      expect(windowBoundary.requestRedraw).toHaveBeenCalledTimes(1);
      expect(renderer.render).not.toHaveBeenCalled();
    });

    it("should only start once", () => {
      viewer.start();
      viewer.start();

      expect(renderer.configure).toHaveBeenCalledTimes(1);
    });
  });

  it("should ignore events before start", () => {
    viewer.dispatch(press("Space"));
    viewer.dispatch({ kind: "redraw-requested" });

    expect(viewer.store.getState().isMandelbrot).toBe(true);
    expect(renderer.render).not.toHaveBeenCalled();
  });

  describe("redraw", () => {
    beforeEach(() => {
      viewer.start();
      vi.mocked(windowBoundary.requestRedraw).mockClear();
      vi.mocked(renderer.upload).mockClear();
    });

    it("should synchronize, render and schedule the next frame", () => {
      viewer.dispatch({ kind: "redraw-requested" });

      expect(renderer.upload).toHaveBeenCalledTimes(1);
      expect(renderer.render).toHaveBeenCalledTimes(1);
      expect(windowBoundary.requestRedraw).toHaveBeenCalledTimes(1);
    });

    it("should upload the same buffer every frame", () => {
      viewer.dispatch({ kind: "redraw-requested" });
      viewer.dispatch({ kind: "redraw-requested" });

      const [[first], [second]] = vi.mocked(renderer.upload).mock.calls;
      expect(second).toBe(first);
    });

    it("should move the view while a direction key is held", () => {
      viewer.dispatch(press("KeyD"));
      viewer.dispatch({ kind: "redraw-requested" });
      viewer.dispatch({ kind: "redraw-requested" });

      const step = viewer.store.getState().movementStep();
      expect(viewer.store.getState().offset.x).toBe(-0.875 + step + step);
    });

    it("should reconfigure when the surface is outdated", () => {
      vi.mocked(renderer.render).mockImplementationOnce(() => {
        throw new SurfaceError("outdated");
      });
      size = { width: 1024, height: 768 };

      viewer.dispatch({ kind: "redraw-requested" });

      expect(renderer.configure).toHaveBeenLastCalledWith({ width: 1024, height: 768 });
      expect(windowBoundary.requestRedraw).toHaveBeenCalledTimes(1);
      expect(console.error).not.toHaveBeenCalled();
    });

    it("should skip the frame on any other render failure", () => {
      const failure = new SurfaceError("timeout");
      vi.mocked(renderer.render).mockImplementationOnce(() => {
        throw failure;
      });

      viewer.dispatch({ kind: "redraw-requested" });
      viewer.dispatch({ kind: "redraw-requested" });

      expect(renderer.configure).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledWith("FractalViewer: frame skipped:", failure);
      expect(renderer.render).toHaveBeenCalledTimes(2);
      expect(windowBoundary.requestRedraw).toHaveBeenCalledTimes(2);
    });
  });

  describe("window events", () => {
    beforeEach(() => {
      viewer.start();
    });

    it("should reconfigure on resize", () => {
      viewer.dispatch({ kind: "resized", size: { width: 640, height: 480 } });

      expect(renderer.configure).toHaveBeenLastCalledWith({ width: 640, height: 480 });
    });

    it("should not configure a zero-sized surface", () => {
      viewer.dispatch({ kind: "resized", size: { width: 0, height: 480 } });

      expect(renderer.configure).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith("FractalViewer: ignoring resize to 0x480");
    });

    it("should exit on close", () => {
      viewer.dispatch({ kind: "close-requested" });

      expect(viewer.isRunning).toBe(false);
      expect(windowBoundary.exit).toHaveBeenCalledTimes(1);
    });

    it("should exit on Escape and drop everything after it", () => {
      viewer.dispatch(press("Escape"));
      viewer.dispatch(press("Space"));

      expect(windowBoundary.exit).toHaveBeenCalledTimes(1);
      expect(viewer.store.getState().isMandelbrot).toBe(true);
    });

    it("should pass input through to the view", () => {
      viewer.dispatch(press("Space"));
      viewer.dispatch({ kind: "scroll", deltaY: 2 });

      expect(viewer.store.getState().isMandelbrot).toBe(false);
      expect(viewer.store.getState().zoomLevel).toBe(6);
    });

    it("should push iteration changes to the evaluator right away", () => {
      vi.mocked(renderer.upload).mockClear();

      viewer.dispatch(press("Period"));

      expect(renderer.upload).toHaveBeenCalledTimes(1);
      const bytes = vi.mocked(renderer.upload).mock.calls[0][0];
      expect(new DataView(bytes).getUint32(72, true)).toBe(1600);
    });

    it("should forward fullscreen toggles to the window", () => {
      viewer.dispatch(press("F11"));

      expect(windowBoundary.setFullscreen).toHaveBeenCalledWith(true);
    });
  });
});
