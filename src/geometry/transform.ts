// Mapping between the scaled, letterboxed preview and native video pixels.
// Pure functions, no shared state.

import type { Rect, Rectangle, Size } from '../types';
import { intersectRect } from './rect';

// ============================================================================
// Types
// ============================================================================

/**
 * Immutable display↔source mapping.
 *
 * display = source * scale + offset
 *
 * Never mutated; build a new one whenever the display or source size changes.
 */
export interface CoordinateTransform {
  /** Display pixels per source pixel, horizontally */
  readonly scaleX: number;
  /** Display pixels per source pixel, vertically */
  readonly scaleY: number;
  /** Left letterbox bar width in display pixels */
  readonly offsetX: number;
  /** Top letterbox bar height in display pixels */
  readonly offsetY: number;
  readonly sourceSize: Readonly<Size>;
  readonly displaySize: Readonly<Size>;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Fits the source inside the display without distortion and centres it,
 * leaving bars on the two sides that do not fill.
 *
 * @returns Where the frame lands, in display pixels
 */
export function fitLetterbox(sourceSize: Size, displaySize: Size): Rect {
  const sourceAspect = sourceSize.width / sourceSize.height;
  const displayAspect = displaySize.width / displaySize.height;

  let width: number;
  let height: number;

  if (sourceAspect > displayAspect) {
    // Source is wider than the display: fit to width, bars top/bottom
    width = displaySize.width;
    height = Math.round(displaySize.width / sourceAspect);
  } else {
    // Source is taller than the display: fit to height, bars left/right
    height = displaySize.height;
    width = Math.round(displaySize.height * sourceAspect);
  }

  return {
    x: Math.round((displaySize.width - width) / 2),
    y: Math.round((displaySize.height - height) / 2),
    width,
    height,
  };
}

/**
 * Builds a transform that places the source frame at `contentRect` on the display.
 *
 * @throws Error if either size or the content rect has no area
 */
export function createTransform(
  sourceSize: Size,
  displaySize: Size,
  contentRect: Rect = { x: 0, y: 0, width: displaySize.width, height: displaySize.height }
): CoordinateTransform {
  if (!(sourceSize.width > 0 && sourceSize.height > 0)) {
    throw new Error(`Invalid source size ${sourceSize.width}x${sourceSize.height}`);
  }
  if (!(contentRect.width > 0 && contentRect.height > 0)) {
    throw new Error(`Invalid display area ${contentRect.width}x${contentRect.height}`);
  }

  return Object.freeze({
    scaleX: contentRect.width / sourceSize.width,
    scaleY: contentRect.height / sourceSize.height,
    offsetX: contentRect.x,
    offsetY: contentRect.y,
    sourceSize: Object.freeze({ width: sourceSize.width, height: sourceSize.height }),
    displaySize: Object.freeze({ width: displaySize.width, height: displaySize.height }),
  });
}

/**
 * Transform for a source shown letterboxed inside a display of the given size.
 */
export function createLetterboxTransform(
  sourceSize: Size,
  displaySize: Size
): CoordinateTransform {
  return createTransform(sourceSize, displaySize, fitLetterbox(sourceSize, displaySize));
}

/** Identity mapping, for when the frame is shown at native size */
export function createIdentityTransform(sourceSize: Size): CoordinateTransform {
  return createTransform(sourceSize, sourceSize);
}

// ============================================================================
// Mapping
// ============================================================================

/**
 * Area of the display covered by the video frame (the display minus letterbox bars).
 */
export function contentBounds(transform: CoordinateTransform): Rect {
  return {
    x: transform.offsetX,
    y: transform.offsetY,
    width: transform.sourceSize.width * transform.scaleX,
    height: transform.sourceSize.height * transform.scaleY,
  };
}

/**
 * Maps a display-space rectangle to source pixels.
 * The result is clipped to [0, sourceWidth] × [0, sourceHeight].
 */
export function toSource(
  transform: CoordinateTransform,
  rect: Rectangle<'display'>
): Rectangle<'source'> {
  const mapped: Rectangle<'source'> = {
    x: (rect.x - transform.offsetX) / transform.scaleX,
    y: (rect.y - transform.offsetY) / transform.scaleY,
    width: rect.width / transform.scaleX,
    height: rect.height / transform.scaleY,
    space: 'source',
  };

  return intersectRect(mapped, {
    x: 0,
    y: 0,
    width: transform.sourceSize.width,
    height: transform.sourceSize.height,
  });
}

/**
 * Maps a source-space rectangle onto the display. Used for rendering only.
 */
export function toDisplay(
  transform: CoordinateTransform,
  rect: Rectangle<'source'>
): Rectangle<'display'> {
  return {
    x: rect.x * transform.scaleX + transform.offsetX,
    y: rect.y * transform.scaleY + transform.offsetY,
    width: rect.width * transform.scaleX,
    height: rect.height * transform.scaleY,
    space: 'display',
  };
}
