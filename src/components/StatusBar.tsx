import { useViewStore, type ViewStore } from "@/hooks/use-store";
import { computeZoomFactor, normalizedToComplex } from "@/lib/coordinates";
import { describeView } from "@/lib/status-text";

/**
 * Overlay showing where the viewer is looking, the same information the
 * window title carries.
 */
export const StatusBar = ({ store }: { store: ViewStore }) => {
  const isMandelbrot = useViewStore(store, (state) => state.isMandelbrot);
  const zoomLevel = useViewStore(store, (state) => state.zoomLevel);
  const maxIterations = useViewStore(store, (state) => state.maxIterations);
  const offset = useViewStore(store, (state) => state.offset);
  const mousePosition = useViewStore(store, (state) => state.mousePosition);

  const zoomFactor = computeZoomFactor(zoomLevel);
  const status = describeView({
    isMandelbrot,
    maxIterations,
    offset,
    zoomFactor: () => zoomFactor,
    mouseCoords: () => normalizedToComplex(mousePosition, offset, zoomFactor),
  });

  return (
    <div className="fixed inset-x-0 bottom-0 bg-black/50 px-4 py-3 text-center text-sm text-white">
      <p data-testid="status-view">
        {`${status.fractal} | Zoom: x${status.zoom} | Max. iterations: ${status.maxIterations}`}
      </p>
      <p data-testid="status-coordinates">
        {`Center: ${status.center.re}${status.center.im} | Mouse: ${status.mouse.re}${status.mouse.im}`}
      </p>
    </div>
  );
};
