// Geometry engine module exports

export {
  rectFromPoints,
  normalizeRect,
  emptyRect,
  isEmptyRect,
  roundRect,
  cornerPoint,
  oppositeCorner,
  cornerAt,
  clamp,
  clampPoint,
  containsPoint,
  clampToBounds,
  intersectRect,
  applySquareLock,
  clampSquareToBounds,
} from './rect';

export {
  type CoordinateTransform,
  fitLetterbox,
  createTransform,
  createLetterboxTransform,
  createIdentityTransform,
  contentBounds,
  toSource,
  toDisplay,
} from './transform';

export {
  CORNERS,
  EDGES,
  isCorner,
  isEdge,
  edgeMidpoint,
  handlePoints,
  hitTestHandle,
} from './hitTest';
