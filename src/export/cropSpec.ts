// Construction of the immutable hand-off from a committed selection to the pipeline

import { roundRect } from '../geometry/rect';
import type { CropSpec, Rectangle } from '../types';
import { InvalidSelectionError } from './errors';

/**
 * Freezes a committed source-space rectangle together with its paths.
 * Edges are snapped to whole pixels first.
 *
 * @throws InvalidSelectionError if the rectangle has no area
 */
export function createCropSpec(
  rect: Rectangle<'source'>,
  sourcePath: string,
  outputPath: string
): CropSpec {
  const snapped = roundRect(rect);
  if (!(snapped.width > 0 && snapped.height > 0)) {
    throw new InvalidSelectionError('empty');
  }

  return Object.freeze({
    rect: Object.freeze({ ...snapped }),
    sourcePath,
    outputPath,
  });
}
