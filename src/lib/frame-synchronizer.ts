import type { ViewStore } from "@/hooks/use-store";

import { createParameterBlock, serializeParameterBlock, type ParameterBlock } from "./parameter-block";
import type { FrameRenderer, WindowBoundary } from "./render-backend";
import { describeView, formatStatusLine } from "./status-text";

export interface SynchronizedFrame {
  block: ParameterBlock;
  bytes: ArrayBuffer;
  title: string;
}

/**
 * Brings the evaluator up to date with the view. Runs once per frame, before
 * the draw call, and again whenever a key change must show up immediately.
 *
 * 1. stamp elapsed time and resolution
 * 2. integrate held-key velocity into the offset
 * 3. serialize and upload the parameter block
 * 4. publish the status line as the window title
 *
 * Pass `target` to serialize into the same buffer every frame.
 */
export function synchronizeFrame(
  store: ViewStore,
  windowBoundary: WindowBoundary,
  renderer: FrameRenderer,
  target?: ArrayBuffer
): SynchronizedFrame {
  const elapsedSeconds = store.getState().elapsedSeconds();
  const resolution = windowBoundary.innerSize();

  const { translate, movementDelta } = store.getState();
  translate(movementDelta);

  const view = store.getState();
  const block = createParameterBlock(view, resolution, elapsedSeconds);
  const bytes = serializeParameterBlock(block, target);
  renderer.upload(bytes);

  const title = formatStatusLine(describeView(view));
  windowBoundary.setTitle(title);

  return { block, bytes, title };
}
