// Sub-rectangle extraction from decoded frames

import type { Rect } from '../types';
import { RGB24_BYTES_PER_PIXEL, frameByteLength, type VideoFrame } from './videoIO';

/**
 * Whether a whole-pixel rectangle lies inside a frame of the given size.
 */
export function fitsInFrame(rect: Rect, width: number, height: number): boolean {
  return (
    Number.isInteger(rect.x) &&
    Number.isInteger(rect.y) &&
    Number.isInteger(rect.width) &&
    Number.isInteger(rect.height) &&
    rect.x >= 0 &&
    rect.y >= 0 &&
    rect.width > 0 &&
    rect.height > 0 &&
    rect.x + rect.width <= width &&
    rect.y + rect.height <= height
  );
}

/**
 * Copies the pixels under `rect` into a new frame of exactly rect.width × rect.height.
 *
 * @throws RangeError if the rectangle is not whole pixels inside the frame,
 *         or the frame buffer is shorter than its declared size
 */
export function extractRegion(frame: VideoFrame, rect: Rect): VideoFrame {
  if (!fitsInFrame(rect, frame.width, frame.height)) {
    throw new RangeError(
      `Crop (${rect.x}, ${rect.y}, ${rect.width}, ${rect.height}) does not fit a ${frame.width}x${frame.height} frame`
    );
  }
  if (frame.data.length < frameByteLength(frame.width, frame.height)) {
    throw new RangeError(
      `Frame buffer holds ${frame.data.length} bytes, expected ${frameByteLength(frame.width, frame.height)}`
    );
  }

  const srcStride = frame.width * RGB24_BYTES_PER_PIXEL;
  const rowBytes = rect.width * RGB24_BYTES_PER_PIXEL;
  const data = new Uint8Array(rowBytes * rect.height);

  for (let row = 0; row < rect.height; row++) {
    const start = (rect.y + row) * srcStride + rect.x * RGB24_BYTES_PER_PIXEL;
    data.set(frame.data.subarray(start, start + rowBytes), row * rowBytes);
  }

  return { width: rect.width, height: rect.height, data };
}
