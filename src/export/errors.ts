// Error taxonomy for selection commits and the crop pipeline

/**
 * Stage at which an operation failed. Shown to the user so they know
 * whether the source, the crop or the write went wrong.
 */
export type CropStage = 'selection' | 'format' | 'source' | 'crop' | 'write';

/**
 * Base class for every error the crop workflow surfaces.
 */
export class CropError extends Error {
  readonly stage: CropStage;

  constructor(stage: CropStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CropError';
    this.stage = stage;
  }
}

/** Why a selection could not be committed */
export type InvalidSelectionReason = 'empty' | 'too-small' | 'out-of-bounds';

const INVALID_SELECTION_MESSAGES: Record<InvalidSelectionReason, string> = {
  empty: 'select a crop region first',
  'too-small': 'selection too small, select a larger region',
  'out-of-bounds': 'selection lies outside the video frame',
};

/**
 * Commit attempted with a zero-area or undersized rectangle.
 * The selection machine reports this as a no-op rather than throwing it.
 */
export class InvalidSelectionError extends CropError {
  readonly reason: InvalidSelectionReason;

  constructor(reason: InvalidSelectionReason, message?: string) {
    super(
      'selection',
      message ?? INVALID_SELECTION_MESSAGES[reason]
    );
    this.name = 'InvalidSelectionError';
    this.reason = reason;
  }
}

/** Input or output container is not one the tool handles */
export class UnsupportedFormatError extends CropError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('format', message);
    this.name = 'UnsupportedFormatError';
    this.path = path;
  }
}

/** Source could not be opened, had no frames, or failed mid-read */
export class SourceUnreadableError extends CropError {
  readonly path: string;

  constructor(
    path: string,
    message: string,
    options?: { cause?: unknown; stage?: 'source' | 'crop' }
  ) {
    super(options?.stage ?? 'source', message, { cause: options?.cause });
    this.name = 'SourceUnreadableError';
    this.path = path;
  }
}

/** Output could not be created, or a frame write failed partway */
export class OutputWriteError extends CropError {
  readonly path: string;
  /** Frames written before the failure */
  readonly framesWritten: number;

  constructor(
    path: string,
    message: string,
    options?: { cause?: unknown; framesWritten?: number }
  ) {
    super('write', message, { cause: options?.cause });
    this.name = 'OutputWriteError';
    this.path = path;
    this.framesWritten = options?.framesWritten ?? 0;
  }
}

/** Crop stopped between frames because its AbortSignal fired */
export class CropCancelledError extends CropError {
  readonly framesWritten: number;

  constructor(framesWritten: number) {
    super('crop', `crop cancelled after ${framesWritten} frames`);
    this.name = 'CropCancelledError';
    this.framesWritten = framesWritten;
  }
}

/**
 * Extracts a message from an unknown caught value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const STAGE_LABELS: Record<CropStage, string> = {
  selection: 'selection',
  format: 'format check',
  source: 'source open',
  crop: 'crop',
  write: 'write',
};

/**
 * One-line, user-facing description naming the stage that failed.
 */
export function describeCropError(err: unknown): string {
  if (err instanceof CropError) {
    return `error during ${STAGE_LABELS[err.stage]}: ${err.message}`;
  }
  return `error: ${errorMessage(err)}`;
}
