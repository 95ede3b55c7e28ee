export type Vec2 = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

// The zoom level is log-domain: every ZOOM_DIVISOR steps scale the view by e
export const ZOOM_DIVISOR = 10;

/**
 * Converts a log-domain zoom level into the linear zoom factor, i.e. how many
 * complex-plane units one normalized screen unit spans.
 */
export const computeZoomFactor = (zoomLevel: number): number => Math.exp(zoomLevel / ZOOM_DIVISOR);

/**
 * Maps a pixel position in the window to normalized window space. x runs from
 * -1 (left edge) to 1 (right edge); y is scaled by the aspect ratio so that one
 * normalized unit has the same length on both axes.
 */
export const screenToNormalized = (pixel: Vec2, windowSize: Size): Vec2 => {
  const { width, height } = windowSize;
  const aspect = width / height;

  return {
    x: (pixel.x / width) * 2 - 1,
    y: ((pixel.y / height) * 2 - 1) / aspect,
  };
};

/**
 * Maps a normalized window position onto the complex plane. Screen y grows
 * downwards while the imaginary axis grows upwards, hence the negation.
 */
export const normalizedToComplex = (normalized: Vec2, offset: Vec2, zoomFactor: number): Vec2 => ({
  x: normalized.x * zoomFactor + offset.x,
  y: -normalized.y * zoomFactor + offset.y,
});
