// ABOUTME: Fixed-layout parameter block handed to the GPU evaluator once per frame
// ABOUTME: The byte layout must match the evaluator's uniform struct field for field

import type { Size, Vec2 } from "./coordinates";

type SixteenByteMultiple = 16 | 32 | 48 | 64 | 80 | 96 | 112 | 128;

/** Total size in bytes; uniform buffers must be a multiple of 16. */
export const PARAMETER_BLOCK_SIZE = 80 satisfies SixteenByteMultiple;

/**
 * Byte offsets of each field. f64 fields come first so every one of them
 * stays 8-byte aligned; the trailing u32 pads the block to 80 bytes.
 */
export const PARAMETER_BLOCK_LAYOUT = {
  resolution: 0,
  elapsedSeconds: 16,
  zoomLevel: 24,
  offset: 32,
  mousePosition: 48,
  isMandelbrot: 64,
  rotateColors: 68,
  maxIterations: 72,
  padding: 76,
} as const;

/**
 * Snapshot of everything the evaluator needs to draw one frame. The mode
 * toggles are numeric (1.0 / 0.0) because the uniform struct has no booleans.
 */
export interface ParameterBlock {
  /** Surface width and height in pixels */
  resolution: Size;
  /** Seconds since the viewer session started */
  elapsedSeconds: number;
  zoomLevel: number;
  /** Centre of the view on the complex plane */
  offset: Vec2;
  /** Cursor position in normalized window space */
  mousePosition: Vec2;
  isMandelbrot: number;
  rotateColors: number;
  maxIterations: number;
}

/** The view fields that feed a parameter block. */
export interface ViewParameters {
  zoomLevel: number;
  offset: Vec2;
  mousePosition: Vec2;
  isMandelbrot: boolean;
  rotateColors: boolean;
  maxIterations: number;
}

const toFlag = (value: boolean): number => (value ? 1.0 : 0.0);

export function createParameterBlock(view: ViewParameters, resolution: Size, elapsedSeconds: number): ParameterBlock {
  return {
    resolution: { ...resolution },
    elapsedSeconds,
    zoomLevel: view.zoomLevel,
    offset: { ...view.offset },
    mousePosition: { ...view.mousePosition },
    isMandelbrot: toFlag(view.isMandelbrot),
    rotateColors: toFlag(view.rotateColors),
    maxIterations: view.maxIterations,
  };
}

/**
 * Writes the block into `target` (allocating one when omitted) using the
 * little-endian layout WebGPU uses on every platform it ships on.
 *
 * @returns The buffer that was written, exactly PARAMETER_BLOCK_SIZE bytes long
 */
export function serializeParameterBlock(
  block: ParameterBlock,
  target: ArrayBuffer = new ArrayBuffer(PARAMETER_BLOCK_SIZE)
): ArrayBuffer {
  if (target.byteLength !== PARAMETER_BLOCK_SIZE) {
    throw new RangeError(
      `Parameter block buffer must be ${PARAMETER_BLOCK_SIZE} bytes, got ${target.byteLength}`
    );
  }

  const view = new DataView(target);
  const layout = PARAMETER_BLOCK_LAYOUT;

  view.setFloat64(layout.resolution, block.resolution.width, true);
  view.setFloat64(layout.resolution + 8, block.resolution.height, true);
  view.setFloat64(layout.elapsedSeconds, block.elapsedSeconds, true);
  view.setFloat64(layout.zoomLevel, block.zoomLevel, true);
  view.setFloat64(layout.offset, block.offset.x, true);
  view.setFloat64(layout.offset + 8, block.offset.y, true);
  view.setFloat64(layout.mousePosition, block.mousePosition.x, true);
  view.setFloat64(layout.mousePosition + 8, block.mousePosition.y, true);
  view.setFloat32(layout.isMandelbrot, block.isMandelbrot, true);
  view.setFloat32(layout.rotateColors, block.rotateColors, true);
  view.setUint32(layout.maxIterations, block.maxIterations, true);
  view.setUint32(layout.padding, 0, true);

  return target;
}
