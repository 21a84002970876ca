// Frame-count progress for the crop pipeline

export interface CropProgress {
  framesWritten: number;
  /** Frames the source reported; 0 when it reported none */
  totalFrames: number;
  /** Share of the source written, 0..1 */
  fraction: number;
}

/**
 * Progress after `framesWritten` output frames. Container frame counts can
 * run short of the real stream, so the fraction never passes 1.
 */
export function cropProgress(framesWritten: number, totalFrames: number): CropProgress {
  const total = Math.max(0, totalFrames);
  return {
    framesWritten,
    totalFrames: total,
    fraction: total > 0 ? Math.min(1, framesWritten / total) : 0,
  };
}
