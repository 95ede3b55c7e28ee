import { fireEvent, render } from "@testing-library/react";
import { useRef } from "react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { FrameRenderer } from "@/lib/render-backend";

import { useFractalViewer } from "./use-fractal-viewer";
import type { ViewStore } from "./use-store";

let captured: ViewStore | null = null;

const currentStore = (): ViewStore => {
  if (!captured) throw new Error("viewer was never mounted");
  return captured;
};

function Viewer({ renderer }: { renderer: FrameRenderer | null }) {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  captured = useFractalViewer(canvasRef, renderer, { now: () => 0 });
  return <canvas ref={canvasRef} data-testid="canvas" />;
}

describe("useFractalViewer", () => {
  let renderer: FrameRenderer;

  beforeEach(() => {
    captured = null;
    renderer = {
      configure: vi.fn(),
      upload: vi.fn(),
      render: vi.fn(),
    };
    // frames are never run; redraws are covered by the viewer's own tests
    vi.spyOn(window, "requestAnimationFrame").mockImplementation(() => 1);
    vi.spyOn(window, "cancelAnimationFrame").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should size the canvas to the viewport and start the viewer", () => {
    const { getByTestId } = render(<Viewer renderer={renderer} />);
    const canvas = getByTestId("canvas");

    expect(canvas).toHaveAttribute("width", "1024");
    expect(canvas).toHaveAttribute("height", "768");
    expect(renderer.configure).toHaveBeenCalledWith({ width: 1024, height: 768 });
    expect(renderer.upload).toHaveBeenCalledTimes(1);
    expect(document.title.startsWith("Mandelbrot | Zoom = x")).toBe(true);
    expect(window.requestAnimationFrame).toHaveBeenCalledTimes(1);
  });

  it("should wait for a renderer", () => {
    render(<Viewer renderer={null} />);

    expect(currentStore().getState().zoomLevel).toBe(8);
    expect(window.requestAnimationFrame).not.toHaveBeenCalled();
  });

  it("should apply keyboard input and keep viewer keys from the page", () => {
    render(<Viewer renderer={renderer} />);

    expect(fireEvent.keyDown(window, { code: "Space" })).toBe(false);
    expect(currentStore().getState().isMandelbrot).toBe(false);

    expect(fireEvent.keyDown(window, { code: "KeyZ" })).toBe(true);
  });

  it("should zoom with the wheel over the canvas", () => {
    const { getByTestId } = render(<Viewer renderer={renderer} />);

    expect(fireEvent.wheel(getByTestId("canvas"), { deltaY: -100 })).toBe(false);

    expect(currentStore().getState().zoomLevel).toBe(7);
  });

  it("should pan while dragging", () => {
    const { getByTestId } = render(<Viewer renderer={renderer} />);

    fireEvent(window, new MouseEvent("pointermove", { clientX: 512, clientY: 384 }));
    fireEvent(getByTestId("canvas"), new MouseEvent("pointerdown", { button: 0, bubbles: true }));
    fireEvent(window, new MouseEvent("pointermove", { clientX: 612, clientY: 384 }));
    fireEvent(window, new MouseEvent("pointerup", { button: 0 }));

    const { offset, mouseClicked } = currentStore().getState();
    expect(mouseClicked).toBe(false);
    expect(offset.x).toBeCloseTo(-0.875 - 0.1953125 * Math.exp(0.8), 12);
    expect(offset.y).toBeCloseTo(0, 12);
  });

  it("should reconfigure when the window is resized", () => {
    render(<Viewer renderer={renderer} />);

    Object.defineProperty(window, "innerWidth", { value: 800, configurable: true, writable: true });
    try {
      fireEvent(window, new Event("resize"));
    } finally {
      Object.defineProperty(window, "innerWidth", { value: 1024, configurable: true, writable: true });
    }

    expect(renderer.configure).toHaveBeenLastCalledWith({ width: 800, height: 768 });
  });

  it("should stop listening after Escape", () => {
    render(<Viewer renderer={renderer} />);

    fireEvent.keyDown(window, { code: "Escape" });
    expect(fireEvent.keyDown(window, { code: "Space" })).toBe(true);

    expect(currentStore().getState().isMandelbrot).toBe(true);
  });

  it("should stop listening when unmounted", () => {
    const { unmount } = render(<Viewer renderer={renderer} />);
    const store = currentStore();

    unmount();
    fireEvent.keyDown(window, { code: "Space" });

    expect(store.getState().isMandelbrot).toBe(true);
  });
});
