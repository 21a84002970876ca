// CropOverlay component tests
// A 640x480 source in a 640x480 preview, so client coordinates equal source pixels.

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { render, fireEvent } from '@testing-library/react';
import { CropOverlay } from './CropOverlay';

describe('CropOverlay', () => {
  const defaultProps = {
    sourceSize: { width: 640, height: 480 },
    displaySize: { width: 640, height: 480 },
    onCommit: vi.fn(),
    onCancel: vi.fn(),
    onReject: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  function setup(props: Partial<typeof defaultProps> & { initialSquareLocked?: boolean } = {}) {
    const utils = render(<CropOverlay {...defaultProps} {...props} />);
    const overlay = utils.container.querySelector('.crop-overlay');
    if (!(overlay instanceof HTMLElement)) {
      throw new Error('overlay not rendered');
    }
    return { ...utils, overlay };
  }

  function dragOn(overlay: HTMLElement, from: [number, number], to: [number, number]) {
    fireEvent.mouseDown(overlay, { clientX: from[0], clientY: from[1] });
    fireEvent.mouseMove(overlay, { clientX: to[0], clientY: to[1] });
    fireEvent.mouseUp(overlay, { clientX: to[0], clientY: to[1] });
  }

  it('shows no selection initially', () => {
    const { container } = setup();
    expect(container.querySelector('.crop-selection')).toBeNull();
    expect(container.querySelectorAll('.crop-handle')).toHaveLength(0);
    expect(container.querySelector('.crop-roi')?.textContent).toBe('ROI: not selected');
  });

  it('draws the dragged selection with eight handles', () => {
    const { container, overlay } = setup();
    dragOn(overlay, [100, 100], [300, 250]);

    const selection = container.querySelector('.crop-selection');
    expect(selection?.getAttribute('style')).toContain('left: 100px');
    expect(selection?.getAttribute('style')).toContain('width: 200px');
    expect(container.querySelectorAll('.crop-handle')).toHaveLength(8);
    expect(container.querySelectorAll('.crop-handle[data-kind="corner"]')).toHaveLength(4);
    expect(container.querySelectorAll('.crop-shade')).toHaveLength(4);
    expect(container.querySelector('.crop-roi')?.textContent).toBe('ROI: (100, 100, 200, 150)');
  });

  it('commits the source rectangle on c', () => {
    const { overlay } = setup();
    dragOn(overlay, [100, 100], [300, 250]);
    fireEvent.keyDown(overlay, { key: 'c' });

    expect(defaultProps.onCommit).toHaveBeenCalledTimes(1);
    expect(defaultProps.onCommit).toHaveBeenCalledWith({
      x: 100,
      y: 100,
      width: 200,
      height: 150,
      space: 'source',
    });
    expect(overlay.getAttribute('data-state')).toBe('committed');
  });

  it('refuses to commit without a selection', () => {
    const { overlay } = setup();
    fireEvent.keyDown(overlay, { key: 'c' });

    expect(defaultProps.onCommit).not.toHaveBeenCalled();
    expect(defaultProps.onReject).toHaveBeenCalledTimes(1);
    expect(overlay.getAttribute('data-state')).toBe('idle');
  });

  it('cancels on Escape', () => {
    const { overlay } = setup();
    fireEvent.keyDown(overlay, { key: 'Escape' });

    expect(defaultProps.onCancel).toHaveBeenCalledTimes(1);
    expect(overlay.getAttribute('data-state')).toBe('cancelled');
  });

  it('keeps the selection square when the checkbox is ticked', () => {
    const { container, overlay, getByRole } = setup();
    const checkbox = getByRole('checkbox');
    expect(checkbox).toHaveProperty('checked', false);

    fireEvent.click(checkbox);
    expect(checkbox).toHaveProperty('checked', true);

    dragOn(overlay, [10, 10], [110, 60]);
    const style = container.querySelector('.crop-selection')?.getAttribute('style');
    expect(style).toContain('width: 100px');
    expect(style).toContain('height: 100px');
  });

  it('squares the selection while shift is held', () => {
    const { container, overlay } = setup();
    fireEvent.mouseDown(overlay, { clientX: 10, clientY: 10 });
    fireEvent.mouseMove(overlay, { clientX: 110, clientY: 60, shiftKey: true });
    fireEvent.mouseUp(overlay, { clientX: 110, clientY: 60 });

    expect(container.querySelector('.crop-roi')?.textContent).toBe('ROI: (10, 10, 100, 100)');
  });

  it('shows a move cursor over the selection body', () => {
    const { overlay } = setup();
    dragOn(overlay, [100, 100], [300, 250]);
    fireEvent.mouseMove(overlay, { clientX: 200, clientY: 175 });

    expect(overlay.style.cursor).toBe('move');
  });
});
