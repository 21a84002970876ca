// Unit tests for display/source coordinate mapping

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  fitLetterbox,
  createTransform,
  createLetterboxTransform,
  createIdentityTransform,
  contentBounds,
  toSource,
  toDisplay,
} from './transform';
import type { Rectangle } from '../types';

// 1920x1080 in a 960x640 area: fit to width, 50px bars top and bottom, scale 0.5
const HALF = createLetterboxTransform({ width: 1920, height: 1080 }, { width: 960, height: 640 });

function display(x: number, y: number, width: number, height: number): Rectangle<'display'> {
  return { x, y, width, height, space: 'display' };
}

function source(x: number, y: number, width: number, height: number): Rectangle<'source'> {
  return { x, y, width, height, space: 'source' };
}

describe('fitLetterbox', () => {
  it('bars top and bottom for a wide source', () => {
    expect(fitLetterbox({ width: 1920, height: 1080 }, { width: 800, height: 600 })).toEqual({
      x: 0,
      y: 75,
      width: 800,
      height: 450,
    });
  });

  it('bars left and right for a tall source', () => {
    expect(fitLetterbox({ width: 1080, height: 1920 }, { width: 800, height: 600 })).toEqual({
      x: 231,
      y: 0,
      width: 338,
      height: 600,
    });
  });

  it('fills the display when aspect ratios match', () => {
    expect(fitLetterbox({ width: 1280, height: 720 }, { width: 640, height: 360 })).toEqual({
      x: 0,
      y: 0,
      width: 640,
      height: 360,
    });
  });
});

describe('createTransform', () => {
  it('derives scale and offset from the content area', () => {
    expect(HALF.scaleX).toBe(0.5);
    expect(HALF.scaleY).toBe(0.5);
    expect(HALF.offsetX).toBe(0);
    expect(HALF.offsetY).toBe(50);
    expect(contentBounds(HALF)).toEqual({ x: 0, y: 50, width: 960, height: 540 });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(HALF)).toBe(true);
    expect(Object.isFrozen(HALF.sourceSize)).toBe(true);
  });

  it('rejects sizes without area', () => {
    expect(() => createTransform({ width: 0, height: 1080 }, { width: 960, height: 540 })).toThrow(
      'Invalid source size 0x1080'
    );
    expect(() => createTransform({ width: 1920, height: 1080 }, { width: 960, height: 0 })).toThrow(
      'Invalid display area 960x0'
    );
  });

  it('maps one to one when shown at native size', () => {
    const identity = createIdentityTransform({ width: 640, height: 480 });
    expect(toSource(identity, display(10, 20, 30, 40))).toEqual(source(10, 20, 30, 40));
  });
});

describe('toSource', () => {
  it('removes the letterbox offset and scales up', () => {
    expect(toSource(HALF, display(100, 150, 200, 100))).toEqual(source(200, 200, 400, 200));
  });

  it('clips to the source frame', () => {
    expect(toSource(HALF, display(-10, 40, 100, 100))).toEqual(source(0, 0, 180, 180));
  });
});

describe('toDisplay', () => {
  it('is the inverse of toSource inside the frame', () => {
    expect(toDisplay(HALF, source(200, 200, 400, 200))).toEqual(display(100, 150, 200, 100));
  });
});

// ============================================================================
// Property-Based Tests
// ============================================================================

const sizes = fc.record({
  sourceWidth: fc.integer({ min: 16, max: 7680 }),
  sourceHeight: fc.integer({ min: 16, max: 4320 }),
  displayWidth: fc.integer({ min: 640, max: 2560 }),
  displayHeight: fc.integer({ min: 360, max: 1440 }),
});

const unit = fc.double({ min: 0, max: 1, noNaN: true });

describe('Property: source round trip', () => {
  it('maps a source rectangle to the display and back', () => {
    fc.assert(
      fc.property(sizes, unit, unit, unit, unit, (s, fx, fy, fw, fh) => {
        const transform = createLetterboxTransform(
          { width: s.sourceWidth, height: s.sourceHeight },
          { width: s.displayWidth, height: s.displayHeight }
        );
        const x = fx * s.sourceWidth;
        const y = fy * s.sourceHeight;
        const rect = source(x, y, fw * (s.sourceWidth - x), fh * (s.sourceHeight - y));

        const back = toSource(transform, toDisplay(transform, rect));
        expect(back.x).toBeCloseTo(rect.x, 6);
        expect(back.y).toBeCloseTo(rect.y, 6);
        expect(back.width).toBeCloseTo(rect.width, 6);
        expect(back.height).toBeCloseTo(rect.height, 6);
      })
    );
  });

  it('never leaves the source frame', () => {
    fc.assert(
      fc.property(
        sizes,
        fc.integer({ min: -5000, max: 5000 }),
        fc.integer({ min: -5000, max: 5000 }),
        fc.integer({ min: 0, max: 10000 }),
        fc.integer({ min: 0, max: 10000 }),
        (s, x, y, width, height) => {
          const transform = createLetterboxTransform(
            { width: s.sourceWidth, height: s.sourceHeight },
            { width: s.displayWidth, height: s.displayHeight }
          );
          const mapped = toSource(transform, display(x, y, width, height));
          expect(mapped.x).toBeGreaterThanOrEqual(0);
          expect(mapped.y).toBeGreaterThanOrEqual(0);
          expect(mapped.width).toBeGreaterThanOrEqual(0);
          expect(mapped.height).toBeGreaterThanOrEqual(0);
          expect(mapped.x + mapped.width).toBeLessThanOrEqual(s.sourceWidth + 1e-9);
          expect(mapped.y + mapped.height).toBeLessThanOrEqual(s.sourceHeight + 1e-9);
        }
      )
    );
  });
});
