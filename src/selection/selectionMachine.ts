// Selection state machine for the crop window.
// Turns pointer and key events into selection changes. The session is an
// immutable value: every event produces a new session rather than mutating one.

import { DEFAULT_HANDLE_RADIUS, DEFAULT_MIN_SELECTION_SIZE } from '../config';
import { InvalidSelectionError } from '../export/errors';
import { hitTestHandle } from '../geometry/hitTest';
import {
  applySquareLock,
  clampPoint,
  clampSquareToBounds,
  clampToBounds,
  containsPoint,
  cornerAt,
  cornerPoint,
  emptyRect,
  isEmptyRect,
  oppositeCorner,
  rectFromPoints,
  roundRect,
} from '../geometry/rect';
import {
  contentBounds,
  createLetterboxTransform,
  toDisplay,
  toSource,
  type CoordinateTransform,
} from '../geometry/transform';
import type { DragHandle, Point, Rect, Rectangle, Size } from '../types';
import { resolveKeyAction } from './keymap';

// ============================================================================
// Types
// ============================================================================

/**
 * Interaction mode of the session.
 * committed and cancelled are terminal.
 */
export type SelectionState =
  | { kind: 'idle' }
  | {
      kind: 'dragging';
      handle: DragHandle;
      /** Pointer-down position */
      origin: Point;
      /** Selection when the drag began */
      startRect: Rectangle<'display'>;
    }
  | { kind: 'committed'; cropRect: Rectangle<'source'> }
  | { kind: 'cancelled' };

export interface SelectionOptions {
  /** Grab distance for handles in display pixels */
  handleRadius: number;
  /** Smallest committable width/height in source pixels */
  minSelectionSize: number;
}

export interface SelectionSession {
  readonly state: SelectionState;
  /** Current selection in display space; zero area when nothing is selected */
  readonly rect: Rectangle<'display'>;
  /** Persistent square-mode toggle; OR'ed with the held modifier at each event */
  readonly squareLocked: boolean;
  readonly transform: CoordinateTransform;
  readonly options: Readonly<SelectionOptions>;
}

/** Modifier keys held during an event */
export interface Modifiers {
  shiftKey?: boolean;
}

/** Input events the machine understands */
export type SelectionEvent =
  | ({ type: 'pointerdown'; point: Point } & Modifiers)
  | ({ type: 'pointermove'; point: Point } & Modifiers)
  | ({ type: 'pointerup'; point: Point } & Modifiers)
  | ({ type: 'key'; key: string } & Modifiers)
  | { type: 'toggleSquareLock' }
  | { type: 'resize'; displaySize: Size; sourceSize?: Size }
  | { type: 'close' };

export interface TransitionResult {
  session: SelectionSession;
  /** Set on the event that moved the session to committed */
  committed?: Rectangle<'source'>;
  /** Set when a commit was refused; the session is unchanged */
  rejected?: InvalidSelectionError;
}

// ============================================================================
// Session Construction
// ============================================================================

/**
 * Starts a fresh session for a source shown letterboxed in a display area.
 */
export function createSession(
  sourceSize: Size,
  displaySize: Size,
  options: Partial<SelectionOptions> = {},
  squareLocked = false
): SelectionSession {
  const transform = createLetterboxTransform(sourceSize, displaySize);
  return createSessionWithTransform(transform, options, squareLocked);
}

/**
 * Starts a fresh session over an existing transform.
 */
export function createSessionWithTransform(
  transform: CoordinateTransform,
  options: Partial<SelectionOptions> = {},
  squareLocked = false
): SelectionSession {
  const bounds = contentBounds(transform);
  return {
    state: { kind: 'idle' },
    rect: emptyRect({ x: bounds.x, y: bounds.y }, 'display'),
    squareLocked,
    transform,
    options: {
      handleRadius: options.handleRadius ?? DEFAULT_HANDLE_RADIUS,
      minSelectionSize: options.minSelectionSize ?? DEFAULT_MIN_SELECTION_SIZE,
    },
  };
}

// ============================================================================
// Queries
// ============================================================================

/** Area of the display the selection may occupy */
export function selectionBounds(session: SelectionSession): Rect {
  return contentBounds(session.transform);
}

/**
 * Whether square lock applies to this event: the held modifier or the
 * persistent toggle, whichever is on.
 */
export function isSquareLockActive(session: SelectionSession, modifiers: Modifiers): boolean {
  return session.squareLocked || modifiers.shiftKey === true;
}

/** Current selection mapped to whole source pixels */
export function selectionInSource(session: SelectionSession): Rectangle<'source'> {
  return roundRect(toSource(session.transform, session.rect));
}

export function isTerminal(session: SelectionSession): boolean {
  return session.state.kind === 'committed' || session.state.kind === 'cancelled';
}

// ============================================================================
// Drag Geometry
// ============================================================================

/**
 * Rectangle spanned from a fixed anchor to the pointer, squared when locked,
 * and kept inside bounds.
 */
function spanFromAnchor(
  anchor: Point,
  pointer: Point,
  locked: boolean,
  bounds: Rect
): Rectangle<'display'> {
  const rect = rectFromPoints(anchor, pointer, 'display');
  if (!locked) {
    return clampToBounds(rect, bounds);
  }
  const anchorCorner = cornerAt(anchor, pointer);
  return clampSquareToBounds(applySquareLock(rect, anchorCorner), anchorCorner, bounds);
}

/**
 * Recomputes the selection for a pointer position during a resize or create drag.
 *
 * Corners and fresh drags pivot on a fixed anchor corner. Edge handles move
 * one side; under square lock the other dimension follows the dragged one.
 */
function resizeSelection(
  handle: Exclude<DragHandle, 'move'>,
  startRect: Rectangle<'display'>,
  origin: Point,
  pointer: Point,
  locked: boolean,
  bounds: Rect
): Rectangle<'display'> {
  const { x, y, width, height } = startRect;

  switch (handle) {
    case 'create':
      return spanFromAnchor(origin, pointer, locked, bounds);
    case 'top-left':
    case 'top-right':
    case 'bottom-left':
    case 'bottom-right':
      return spanFromAnchor(cornerPoint(startRect, oppositeCorner(handle)), pointer, locked, bounds);
    case 'left':
    case 'right': {
      const anchorX = handle === 'left' ? x + width : x;
      const span = Math.abs(pointer.x - anchorX);
      return spanFromAnchor(
        { x: anchorX, y },
        { x: pointer.x, y: y + (locked ? span : height) },
        locked,
        bounds
      );
    }
    case 'top':
    case 'bottom': {
      const anchorY = handle === 'top' ? y + height : y;
      const span = Math.abs(pointer.y - anchorY);
      return spanFromAnchor(
        { x, y: anchorY },
        { x: x + (locked ? span : width), y: pointer.y },
        locked,
        bounds
      );
    }
  }
}

/**
 * Translates the drag's starting rectangle by the pointer delta, hard-stopping
 * at the bounds. Size never changes.
 */
function moveSelection(
  startRect: Rectangle<'display'>,
  origin: Point,
  pointer: Point,
  bounds: Rect
): Rectangle<'display'> {
  return clampToBounds(
    {
      ...startRect,
      x: startRect.x + (pointer.x - origin.x),
      y: startRect.y + (pointer.y - origin.y),
    },
    bounds
  );
}

// ============================================================================
// Transitions
// ============================================================================

function unchanged(session: SelectionSession): TransitionResult {
  return { session };
}

function onPointerDown(session: SelectionSession, point: Point): TransitionResult {
  if (session.state.kind !== 'idle') {
    return unchanged(session);
  }

  const handle = hitTestHandle(session.rect, point, session.options.handleRadius);
  if (handle !== null) {
    return {
      session: {
        ...session,
        state: { kind: 'dragging', handle, origin: point, startRect: session.rect },
      },
    };
  }

  const bounds = selectionBounds(session);
  if (!containsPoint(bounds, point)) {
    return unchanged(session);
  }

  const start = emptyRect(point, 'display');
  return {
    session: {
      ...session,
      rect: start,
      state: { kind: 'dragging', handle: 'create', origin: point, startRect: start },
    },
  };
}

function onPointerMove(
  session: SelectionSession,
  point: Point,
  modifiers: Modifiers
): TransitionResult {
  const { state } = session;
  if (state.kind !== 'dragging') {
    return unchanged(session);
  }

  const bounds = selectionBounds(session);
  const rect =
    state.handle === 'move'
      ? moveSelection(state.startRect, state.origin, point, bounds)
      : resizeSelection(
          state.handle,
          state.startRect,
          state.origin,
          clampPoint(point, bounds),
          isSquareLockActive(session, modifiers),
          bounds
        );

  return { session: { ...session, rect } };
}

function onPointerUp(session: SelectionSession): TransitionResult {
  if (session.state.kind !== 'dragging') {
    return unchanged(session);
  }
  return { session: { ...session, state: { kind: 'idle' } } };
}

function commit(session: SelectionSession): TransitionResult {
  if (session.state.kind !== 'idle') {
    return unchanged(session);
  }

  const cropRect = selectionInSource(session);
  if (isEmptyRect(session.rect) || isEmptyRect(cropRect)) {
    return { session, rejected: new InvalidSelectionError('empty') };
  }

  const { minSelectionSize } = session.options;
  if (cropRect.width < minSelectionSize || cropRect.height < minSelectionSize) {
    return { session, rejected: new InvalidSelectionError('too-small') };
  }

  return {
    session: { ...session, state: { kind: 'committed', cropRect } },
    committed: cropRect,
  };
}

function reset(session: SelectionSession): TransitionResult {
  const bounds = selectionBounds(session);
  return {
    session: {
      ...session,
      rect: emptyRect({ x: bounds.x, y: bounds.y }, 'display'),
      state: { kind: 'idle' },
    },
  };
}

function cancel(session: SelectionSession): TransitionResult {
  return { session: { ...session, state: { kind: 'cancelled' } } };
}

/**
 * Rebuilds the transform for a new display size and carries the selection
 * across in source space. An in-progress drag is dropped back to idle.
 * A different source resolution means a different video, so the selection
 * is cleared.
 */
function onResize(session: SelectionSession, displaySize: Size, sourceSize?: Size): TransitionResult {
  const previous = session.transform.sourceSize;
  const source = sourceSize ?? previous;
  const sameSource = source.width === previous.width && source.height === previous.height;
  const transform = createLetterboxTransform(source, displaySize);
  const rect = !sameSource || isEmptyRect(session.rect)
    ? emptyRect({ x: transform.offsetX, y: transform.offsetY }, 'display')
    : toDisplay(transform, toSource(session.transform, session.rect));

  return {
    session: { ...session, transform, rect, state: { kind: 'idle' } },
  };
}

/**
 * Applies one event to the session.
 *
 * Events that make no sense in the current state (a move while not dragging,
 * anything after commit or cancel) are ignored and return the session as is.
 */
export function transition(session: SelectionSession, event: SelectionEvent): TransitionResult {
  if (isTerminal(session)) {
    return unchanged(session);
  }

  switch (event.type) {
    case 'pointerdown':
      return onPointerDown(session, event.point);
    case 'pointermove':
      return onPointerMove(session, event.point, event);
    case 'pointerup':
      return onPointerUp(session);
    case 'toggleSquareLock':
      return { session: { ...session, squareLocked: !session.squareLocked } };
    case 'resize':
      return onResize(session, event.displaySize, event.sourceSize);
    case 'close':
      return cancel(session);
    case 'key': {
      switch (resolveKeyAction(event.key)) {
        case 'commit':
          return commit(session);
        case 'reset':
          return reset(session);
        case 'cancel':
          return cancel(session);
        case null:
          return unchanged(session);
      }
    }
  }
}

/**
 * Applies events in order. Events after a terminal state are ignored by
 * `transition`, so the committed rectangle survives to the end.
 *
 * @returns The final session, the committed rectangle if any event committed,
 *          and the rejection from the last event if it was a refused commit
 */
export function runEvents(
  session: SelectionSession,
  events: readonly SelectionEvent[]
): TransitionResult {
  let result: TransitionResult = { session };
  for (const event of events) {
    const next = transition(result.session, event);
    result = {
      session: next.session,
      committed: next.committed ?? result.committed,
      rejected: next.rejected,
    };
  }
  return result;
}
