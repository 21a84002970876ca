import { describe, it, expect } from 'vitest';
import { cropProgress } from './progress';

describe('cropProgress', () => {
  it('reports the share of frames written', () => {
    expect(cropProgress(30, 120)).toEqual({ framesWritten: 30, totalFrames: 120, fraction: 0.25 });
  });

  it('stops at 1 when the source undercounted its frames', () => {
    expect(cropProgress(95, 90).fraction).toBe(1);
  });

  it('reports zero for an unknown total', () => {
    expect(cropProgress(5, 0)).toEqual({ framesWritten: 5, totalFrames: 0, fraction: 0 });
  });
});
