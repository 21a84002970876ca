// Layout of the selection overlay drawn over the preview frame

import { DEFAULT_HANDLE_SIZE } from '../config';
import { handlePoints, isCorner } from '../geometry/hitTest';
import { isEmptyRect } from '../geometry/rect';
import type { Corner, DragHandle, Edge, Rect } from '../types';

// ============================================================================
// Types
// ============================================================================

/** One drawn handle square */
export interface HandleBox {
  id: Corner | Edge;
  kind: 'corner' | 'edge';
  rect: Rect;
}

/**
 * Everything the renderer draws, in display pixels.
 */
export interface OverlayLayout {
  /** Area covered by the video frame */
  content: Rect;
  /** Selection outline, null when nothing is selected */
  selection: Rect | null;
  /** Dimmed regions of the frame outside the selection: top, bottom, left, right */
  shade: Rect[];
  /** Handle squares, corners first; empty when nothing is selected */
  handles: HandleBox[];
}

// ============================================================================
// Layout
// ============================================================================

/**
 * Computes the overlay for a selection inside the frame's content area.
 *
 * With no selection the whole frame is left undimmed. Otherwise the frame
 * outside the selection is split into four non-overlapping bands.
 */
export function getOverlayLayout(
  selection: Rect,
  content: Rect,
  handleSize: number = DEFAULT_HANDLE_SIZE
): OverlayLayout {
  if (isEmptyRect(selection)) {
    return { content, selection: null, shade: [], handles: [] };
  }

  const right = selection.x + selection.width;
  const bottom = selection.y + selection.height;
  const contentRight = content.x + content.width;
  const contentBottom = content.y + content.height;

  const shade: Rect[] = [
    { x: content.x, y: content.y, width: content.width, height: selection.y - content.y },
    { x: content.x, y: bottom, width: content.width, height: contentBottom - bottom },
    { x: content.x, y: selection.y, width: selection.x - content.x, height: selection.height },
    { x: right, y: selection.y, width: contentRight - right, height: selection.height },
  ].filter((band) => band.width > 0 && band.height > 0);

  const half = handleSize / 2;
  const handles = handlePoints(selection).map(({ id, point }) => ({
    id,
    kind: isCorner(id) ? ('corner' as const) : ('edge' as const),
    rect: { x: point.x - half, y: point.y - half, width: handleSize, height: handleSize },
  }));

  return { content, selection: { ...selection }, shade, handles };
}

// ============================================================================
// Cursors
// ============================================================================

const HANDLE_CURSORS: Record<DragHandle, string> = {
  'top-left': 'nwse-resize',
  'bottom-right': 'nwse-resize',
  'top-right': 'nesw-resize',
  'bottom-left': 'nesw-resize',
  top: 'ns-resize',
  bottom: 'ns-resize',
  left: 'ew-resize',
  right: 'ew-resize',
  move: 'move',
  create: 'crosshair',
};

/**
 * CSS cursor for what the pointer is over (or dragging); crosshair over empty frame.
 */
export function cursorFor(handle: DragHandle | null): string {
  return handle === null ? HANDLE_CURSORS.create : HANDLE_CURSORS[handle];
}
