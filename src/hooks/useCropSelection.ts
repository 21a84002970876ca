// Hook that owns one selection session and feeds it DOM events in order.
// The reducer is the selection machine itself, so React serializes every event.

import { useCallback, useEffect, useReducer, useRef } from 'react';
import type { InvalidSelectionError } from '../export/errors';
import {
  createSession,
  transition,
  type SelectionEvent,
  type SelectionOptions,
  type SelectionSession,
  type TransitionResult,
} from '../selection/selectionMachine';
import type { Rectangle, Size } from '../types';

export interface UseCropSelectionOptions extends Partial<SelectionOptions> {
  /** Native resolution of the video */
  sourceSize: Size;
  /** Size of the preview area the frame is letterboxed into */
  displaySize: Size;
  /** Initial state of the persistent square toggle */
  squareLocked?: boolean;
  /** Called once with the source-space rectangle when the user commits */
  onCommit?: (rect: Rectangle<'source'>) => void;
  /** Called once when the user cancels or closes */
  onCancel?: () => void;
  /** Called for each refused commit (empty or too small selection) */
  onReject?: (error: InvalidSelectionError) => void;
}

interface UseCropSelectionResult {
  session: SelectionSession;
  dispatch: (event: SelectionEvent) => void;
  toggleSquareLock: () => void;
}

function reducer(state: TransitionResult, event: SelectionEvent): TransitionResult {
  return transition(state.session, event);
}

export function useCropSelection({
  sourceSize,
  displaySize,
  squareLocked = false,
  handleRadius,
  minSelectionSize,
  onCommit,
  onCancel,
  onReject,
}: UseCropSelectionOptions): UseCropSelectionResult {
  const [state, dispatch] = useReducer(reducer, undefined, () => ({
    session: createSession(sourceSize, displaySize, { handleRadius, minSelectionSize }, squareLocked),
  }));

  // Keep the latest callbacks without re-running effects when they change identity
  const callbacks = useRef({ onCommit, onCancel, onReject });
  callbacks.current = { onCommit, onCancel, onReject };

  useEffect(() => {
    if (state.committed) {
      callbacks.current.onCommit?.(state.committed);
    }
    if (state.rejected) {
      callbacks.current.onReject?.(state.rejected);
    }
  }, [state]);

  const kind = state.session.state.kind;
  useEffect(() => {
    if (kind === 'cancelled') {
      callbacks.current.onCancel?.();
    }
  }, [kind]);

  // Rebuild the transform when the preview is resized or the video changes
  const { width, height } = displaySize;
  const { width: sourceWidth, height: sourceHeight } = sourceSize;
  const lastSizes = useRef({ width, height, sourceWidth, sourceHeight });
  useEffect(() => {
    const last = lastSizes.current;
    if (
      last.width === width &&
      last.height === height &&
      last.sourceWidth === sourceWidth &&
      last.sourceHeight === sourceHeight
    ) {
      return;
    }
    lastSizes.current = { width, height, sourceWidth, sourceHeight };
    dispatch({
      type: 'resize',
      displaySize: { width, height },
      sourceSize: { width: sourceWidth, height: sourceHeight },
    });
  }, [width, height, sourceWidth, sourceHeight]);

  const toggleSquareLock = useCallback(() => dispatch({ type: 'toggleSquareLock' }), []);

  return { session: state.session, dispatch, toggleSquareLock };
}
