// CropOverlay component: the crop window's preview with the selection drawn on top.
// Draws the frame, dims everything outside the selection and shows 8 resize handles.

import { useRef, useState } from 'react';
import { DEFAULT_HANDLE_SIZE } from '../config';
import type { InvalidSelectionError } from '../export/errors';
import { hitTestHandle } from '../geometry/hitTest';
import { useCropSelection } from '../hooks/useCropSelection';
import { cursorFor, getOverlayLayout } from '../rendering/overlay';
import { selectionBounds, selectionInSource } from '../selection/selectionMachine';
import type { DragHandle, Point, Rect, Rectangle, Size } from '../types';

/**
 * Props for the CropOverlay component.
 */
interface CropOverlayProps {
  /** Native resolution of the video */
  sourceSize: Size;
  /** Size of the preview area in CSS pixels */
  displaySize: Size;
  /** URL of the sampled frame image; omitted shows a black frame */
  frameSrc?: string;
  /** Called with the source-space rectangle on commit */
  onCommit: (rect: Rectangle<'source'>) => void;
  /** Called when the user presses Escape */
  onCancel?: () => void;
  /** Called when a commit is refused */
  onReject?: (error: InvalidSelectionError) => void;
  /** Starting state of the square mode checkbox */
  initialSquareLocked?: boolean;
  handleRadius?: number;
  handleSize?: number;
  minSelectionSize?: number;
}

function boxStyle(rect: Rect): React.CSSProperties {
  return {
    position: 'absolute',
    left: `${rect.x}px`,
    top: `${rect.y}px`,
    width: `${rect.width}px`,
    height: `${rect.height}px`,
  };
}

/**
 * Interactive crop preview.
 *
 * Drag on the frame to draw a selection, drag inside it to move it, drag a
 * handle to resize it. Shift or the square mode checkbox keeps it 1:1.
 * Keys: c or Enter commits, r resets, Escape cancels.
 */
export function CropOverlay({
  sourceSize,
  displaySize,
  frameSrc,
  onCommit,
  onCancel,
  onReject,
  initialSquareLocked = false,
  handleRadius,
  handleSize = DEFAULT_HANDLE_SIZE,
  minSelectionSize,
}: CropOverlayProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const [hoverHandle, setHoverHandle] = useState<DragHandle | null>(null);
  const { session, dispatch, toggleSquareLock } = useCropSelection({
    sourceSize,
    displaySize,
    squareLocked: initialSquareLocked,
    handleRadius,
    minSelectionSize,
    onCommit,
    onCancel,
    onReject,
  });

  const content = selectionBounds(session);
  const layout = getOverlayLayout(session.rect, content, handleSize);
  const { state } = session;
  const activeHandle = state.kind === 'dragging' ? state.handle : hoverHandle;
  const sourceRect = selectionInSource(session);

  /**
   * Pointer position relative to the preview's top-left corner.
   */
  const toLocalPoint = (e: React.MouseEvent): Point => {
    const bounds = containerRef.current?.getBoundingClientRect();
    return {
      x: e.clientX - (bounds?.left ?? 0),
      y: e.clientY - (bounds?.top ?? 0),
    };
  };

  const handleMouseDown = (e: React.MouseEvent) => {
    e.preventDefault();
    containerRef.current?.focus();
    dispatch({ type: 'pointerdown', point: toLocalPoint(e), shiftKey: e.shiftKey });
  };

  const handleMouseMove = (e: React.MouseEvent) => {
    const point = toLocalPoint(e);
    if (state.kind === 'dragging') {
      dispatch({ type: 'pointermove', point, shiftKey: e.shiftKey });
    } else {
      setHoverHandle(hitTestHandle(session.rect, point, session.options.handleRadius));
    }
  };

  const handleMouseUp = (e: React.MouseEvent) => {
    dispatch({ type: 'pointerup', point: toLocalPoint(e), shiftKey: e.shiftKey });
  };

  const handleKeyDown = (e: React.KeyboardEvent) => {
    dispatch({ type: 'key', key: e.key, shiftKey: e.shiftKey });
  };

  return (
    <div className="crop-window">
      <div
        ref={containerRef}
        className="crop-overlay"
        data-state={state.kind}
        tabIndex={0}
        role="application"
        aria-label="Crop selection"
        style={{
          position: 'relative',
          width: `${displaySize.width}px`,
          height: `${displaySize.height}px`,
          background: '#000000',
          cursor: cursorFor(activeHandle),
          userSelect: 'none',
          outline: 'none',
        }}
        onMouseDown={handleMouseDown}
        onMouseMove={handleMouseMove}
        onMouseUp={handleMouseUp}
        onMouseLeave={handleMouseUp}
        onKeyDown={handleKeyDown}
      >
        {frameSrc && (
          <img
            className="crop-frame"
            src={frameSrc}
            alt=""
            draggable={false}
            style={{ ...boxStyle(content), pointerEvents: 'none' }}
          />
        )}

        {layout.shade.map((band, i) => (
          <div
            key={i}
            className="crop-shade"
            style={{ ...boxStyle(band), background: 'rgba(0, 0, 0, 0.5)', pointerEvents: 'none' }}
          />
        ))}

        {layout.selection && (
          <div
            className="crop-selection"
            style={{
              ...boxStyle(layout.selection),
              boxSizing: 'border-box',
              border: '1px solid #ffffff',
              pointerEvents: 'none',
            }}
          />
        )}

        {layout.handles.map((handle) => (
          <div
            key={handle.id}
            className={`crop-handle crop-handle-${handle.id}`}
            data-kind={handle.kind}
            style={{
              ...boxStyle(handle.rect),
              background: handle.kind === 'corner' ? '#282828' : '#3c3c3c',
              pointerEvents: 'none',
            }}
          />
        ))}
      </div>

      <div className="crop-status">
        <label className="crop-square-toggle">
          <input type="checkbox" checked={session.squareLocked} onChange={toggleSquareLock} />
          Square mode
        </label>
        <span className="crop-roi">
          {layout.selection
            ? `ROI: (${sourceRect.x}, ${sourceRect.y}, ${sourceRect.width}, ${sourceRect.height})`
            : 'ROI: not selected'}
        </span>
      </div>
    </div>
  );
}
