// Rectangle math for the selection: building, clamping and square locking.
// Pure functions, no shared state.

import type { CoordinateSpace, Corner, Point, Rect, Rectangle } from '../types';

// ============================================================================
// Construction
// ============================================================================

/**
 * Builds a rectangle spanning two points in any order.
 * The result always has non-negative width and height.
 */
export function rectFromPoints<S extends CoordinateSpace>(
  a: Point,
  b: Point,
  space: S
): Rectangle<S> {
  return {
    x: Math.min(a.x, b.x),
    y: Math.min(a.y, b.y),
    width: Math.abs(b.x - a.x),
    height: Math.abs(b.y - a.y),
    space,
  };
}

/**
 * Flips negative width/height so the rectangle has its origin at the top-left.
 */
export function normalizeRect<S extends CoordinateSpace>(rect: Rectangle<S>): Rectangle<S> {
  if (rect.width >= 0 && rect.height >= 0) {
    return rect;
  }
  return rectFromPoints(
    { x: rect.x, y: rect.y },
    { x: rect.x + rect.width, y: rect.y + rect.height },
    rect.space
  );
}

/** Zero-area rectangle at a point, the "no selection" value */
export function emptyRect<S extends CoordinateSpace>(at: Point, space: S): Rectangle<S> {
  return { x: at.x, y: at.y, width: 0, height: 0, space };
}

/** True when the rectangle encloses no area */
export function isEmptyRect(rect: Rect): boolean {
  return !(rect.width > 0 && rect.height > 0);
}

/**
 * Snaps edges to whole pixels. Edges are rounded, not the size, so a
 * rectangle touching the right border keeps touching it.
 */
export function roundRect<S extends CoordinateSpace>(rect: Rectangle<S>): Rectangle<S> {
  const left = Math.round(rect.x);
  const top = Math.round(rect.y);
  return {
    x: left,
    y: top,
    width: Math.round(rect.x + rect.width) - left,
    height: Math.round(rect.y + rect.height) - top,
    space: rect.space,
  };
}

// ============================================================================
// Corners
// ============================================================================

/** Position of a named corner of the rectangle */
export function cornerPoint(rect: Rect, corner: Corner): Point {
  return {
    x: corner.endsWith('left') ? rect.x : rect.x + rect.width,
    y: corner.startsWith('top') ? rect.y : rect.y + rect.height,
  };
}

const OPPOSITE_CORNERS: Record<Corner, Corner> = {
  'top-left': 'bottom-right',
  'top-right': 'bottom-left',
  'bottom-left': 'top-right',
  'bottom-right': 'top-left',
};

export function oppositeCorner(corner: Corner): Corner {
  return OPPOSITE_CORNERS[corner];
}

/**
 * Names the corner that `anchor` occupies in the rectangle spanned by
 * `anchor` and `pointer`. Ties (zero extent) count as top/left.
 */
export function cornerAt(anchor: Point, pointer: Point): Corner {
  const vertical = pointer.y >= anchor.y ? 'top' : 'bottom';
  const horizontal = pointer.x >= anchor.x ? 'left' : 'right';
  return `${vertical}-${horizontal}`;
}

// ============================================================================
// Containment
// ============================================================================

/**
 * Clamps a value to the specified range.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Moves a point onto the nearest position inside bounds */
export function clampPoint(point: Point, bounds: Rect): Point {
  return {
    x: clamp(point.x, bounds.x, bounds.x + bounds.width),
    y: clamp(point.y, bounds.y, bounds.y + bounds.height),
  };
}

/** Inclusive containment test */
export function containsPoint(bounds: Rect, point: Point): boolean {
  return (
    point.x >= bounds.x &&
    point.x <= bounds.x + bounds.width &&
    point.y >= bounds.y &&
    point.y <= bounds.y + bounds.height
  );
}

/**
 * Translates, and shrinks where needed, a rectangle so it lies fully inside bounds.
 *
 * A dimension larger than the bounds becomes exactly the bounds' size;
 * otherwise the size is kept and the rectangle is pushed back inside.
 * Idempotent: clamping an already clamped rectangle returns it unchanged.
 */
export function clampToBounds<S extends CoordinateSpace>(
  rect: Rectangle<S>,
  bounds: Rect
): Rectangle<S> {
  const normalized = normalizeRect(rect);
  const width = Math.min(normalized.width, bounds.width);
  const height = Math.min(normalized.height, bounds.height);

  return {
    x: clamp(normalized.x, bounds.x, bounds.x + bounds.width - width),
    y: clamp(normalized.y, bounds.y, bounds.y + bounds.height - height),
    width,
    height,
    space: normalized.space,
  };
}

/**
 * Clips a rectangle to the part that overlaps bounds. Unlike clampToBounds
 * this never moves an edge that is already inside.
 */
export function intersectRect<S extends CoordinateSpace>(
  rect: Rectangle<S>,
  bounds: Rect
): Rectangle<S> {
  const normalized = normalizeRect(rect);
  const right = bounds.x + bounds.width;
  const bottom = bounds.y + bounds.height;
  const left = clamp(normalized.x, bounds.x, right);
  const top = clamp(normalized.y, bounds.y, bottom);

  return {
    x: left,
    y: top,
    width: clamp(normalized.x + normalized.width, bounds.x, right) - left,
    height: clamp(normalized.y + normalized.height, bounds.y, bottom) - top,
    space: normalized.space,
  };
}

// ============================================================================
// Square Lock
// ============================================================================

/**
 * Direction the rectangle extends from an anchor corner: +1 right/down, -1 left/up.
 */
function extentDirection(anchorCorner: Corner): Point {
  return {
    x: anchorCorner.endsWith('left') ? 1 : -1,
    y: anchorCorner.startsWith('top') ? 1 : -1,
  };
}

/**
 * Forces width = height = max(width, height), keeping `anchorCorner` where it is.
 *
 * The anchor is the corner opposite the one being dragged, so the square
 * grows into the quadrant the drag points at.
 */
export function applySquareLock<S extends CoordinateSpace>(
  rect: Rectangle<S>,
  anchorCorner: Corner
): Rectangle<S> {
  const normalized = normalizeRect(rect);
  const anchor = cornerPoint(normalized, anchorCorner);
  const direction = extentDirection(anchorCorner);
  const side = Math.max(normalized.width, normalized.height);

  return rectFromPoints(
    anchor,
    { x: anchor.x + direction.x * side, y: anchor.y + direction.y * side },
    normalized.space
  );
}

/**
 * Shrinks a square anchored at `anchorCorner` until it fits inside bounds.
 * Width and height stay equal and the anchor stays fixed, which plain
 * clampToBounds would not guarantee.
 */
export function clampSquareToBounds<S extends CoordinateSpace>(
  square: Rectangle<S>,
  anchorCorner: Corner,
  bounds: Rect
): Rectangle<S> {
  const anchor = cornerPoint(square, anchorCorner);
  const direction = extentDirection(anchorCorner);

  const availableX =
    direction.x > 0 ? bounds.x + bounds.width - anchor.x : anchor.x - bounds.x;
  const availableY =
    direction.y > 0 ? bounds.y + bounds.height - anchor.y : anchor.y - bounds.y;
  const side = Math.max(0, Math.min(square.width, availableX, availableY));

  return rectFromPoints(
    anchor,
    { x: anchor.x + direction.x * side, y: anchor.y + direction.y * side },
    square.space
  );
}
