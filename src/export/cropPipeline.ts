// Crop pipeline: reads every source frame in order, cuts out the committed
// rectangle and writes it as the next output frame.

import { rm } from 'node:fs/promises';
import path from 'node:path';
import type { CropSpec, OperationRecord } from '../types';
import { logger } from '../utils/logger';
import { writeOperationLog, type OperationLogWriter } from '../log/operationLog';
import { extractRegion, fitsInFrame } from './cropFrame';
import {
  CropCancelledError,
  InvalidSelectionError,
  OutputWriteError,
  SourceUnreadableError,
  errorMessage,
} from './errors';
import { assertSupportedFormats } from './formats';
import { cropProgress, type CropProgress } from './progress';
import type {
  VideoBackend,
  VideoFrame,
  VideoSink,
  VideoSinkOptions,
  VideoSource,
} from './videoIO';

export interface RunCropOptions {
  /** Decoder/encoder collaborator */
  backend: VideoBackend;
  /** Persists the record after a successful crop (default: sidecar text file) */
  writeLog?: OperationLogWriter;
  /** Checked between frames; aborting deletes the partial output */
  signal?: AbortSignal;
  /** Called after each written frame */
  onProgress?: (progress: CropProgress) => void;
  /**
   * Source already opened on `spec.sourcePath`, e.g. by a caller that read
   * its size first. The pipeline takes ownership and closes it.
   */
  source?: VideoSource;
  /** Clock for the record timestamp and the timing log line */
  now?: () => Date;
}

// ============================================================================
// Stage helpers
// ============================================================================

async function openSource(backend: VideoBackend, sourcePath: string): Promise<VideoSource> {
  try {
    return await backend.openSource(sourcePath);
  } catch (err) {
    throw new SourceUnreadableError(sourcePath, `could not open source: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

async function readNextFrame(
  source: VideoSource,
  sourcePath: string,
  index: number
): Promise<VideoFrame | null> {
  try {
    return await source.readFrame();
  } catch (err) {
    throw new SourceUnreadableError(
      sourcePath,
      `reading frame ${index} failed: ${errorMessage(err)}`,
      { cause: err, stage: 'crop' }
    );
  }
}

async function openSink(
  backend: VideoBackend,
  outputPath: string,
  options: VideoSinkOptions
): Promise<VideoSink> {
  try {
    return await backend.openSink(outputPath, options);
  } catch (err) {
    throw new OutputWriteError(outputPath, `could not create output: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

function cropFrame(frame: VideoFrame, spec: CropSpec, index: number): VideoFrame {
  try {
    return extractRegion(frame, spec.rect);
  } catch (err) {
    throw new SourceUnreadableError(
      spec.sourcePath,
      `frame ${index} could not be cropped: ${errorMessage(err)}`,
      { cause: err, stage: 'crop' }
    );
  }
}

/**
 * Removes whatever the failed run left at the output path. Cleanup failures
 * are logged; the caller still throws the error that caused the cleanup.
 */
async function discardOutput(
  outputPath: string,
  source: VideoSource,
  sink: VideoSink | null
): Promise<void> {
  const steps: Array<[string, () => Promise<void>]> = [];
  if (sink) {
    const openSink = sink;
    steps.push(['abort sink', () => openSink.abort()]);
  }
  steps.push(['close source', () => source.close()]);
  steps.push(['delete partial output', () => rm(outputPath, { force: true })]);

  for (const [label, step] of steps) {
    try {
      await step();
    } catch (err) {
      logger.warn(`[CropPipeline] Failed to ${label}:`, errorMessage(err));
    }
  }
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Crops every frame of `spec.sourcePath` to `spec.rect` and writes `spec.outputPath`.
 *
 * Frames are processed strictly in order: output frame N is source frame N.
 * On any failure after the output was opened, the partial file is deleted
 * and the error is re-thrown; nothing is retried and no log is written.
 * Failures before that leave an existing file at the output path alone.
 *
 * @throws UnsupportedFormatError before anything is opened
 * @throws InvalidSelectionError if the rectangle is empty or outside the source frame
 * @throws SourceUnreadableError if the source cannot be opened, is empty, or fails mid-read
 * @throws OutputWriteError if the output cannot be created, written or finalized
 * @throws CropCancelledError if `signal` aborts between frames
 */
export async function runCrop(spec: CropSpec, options: RunCropOptions): Promise<OperationRecord> {
  const { backend, signal, onProgress } = options;
  const writeLog = options.writeLog ?? writeOperationLog;
  const now = options.now ?? (() => new Date());
  const { rect, sourcePath, outputPath } = spec;

  try {
    assertSupportedFormats(sourcePath, outputPath);
    if (!(rect.width > 0 && rect.height > 0)) {
      throw new InvalidSelectionError('empty');
    }
  } catch (err) {
    await options.source?.close();
    throw err;
  }

  const source = options.source ?? (await openSource(backend, sourcePath));
  const { info } = source;

  if (info.frameCount <= 0) {
    await source.close();
    throw new SourceUnreadableError(sourcePath, 'source has no frames');
  }
  if (!fitsInFrame(rect, info.width, info.height)) {
    await source.close();
    throw new InvalidSelectionError(
      'out-of-bounds',
      `crop (${rect.x}, ${rect.y}, ${rect.width}, ${rect.height}) lies outside the ${info.width}x${info.height} source`
    );
  }

  logger.info('[CropPipeline] Starting crop:', {
    input: path.basename(sourcePath),
    output: path.basename(outputPath),
    source: `${info.width}x${info.height}@${info.fps}`,
    crop: `${rect.width}x${rect.height}+${rect.x}+${rect.y}`,
    frames: info.frameCount,
  });

  // Nothing at the output path is touched until the sink exists
  const output = await openSink(backend, outputPath, {
    width: rect.width,
    height: rect.height,
    fps: info.fps,
  }).catch(async (err: unknown) => {
    await source.close();
    throw err;
  });

  let sink: VideoSink | null = output;
  let framesWritten = 0;
  const startedAt = now().getTime();

  try {
    for (;;) {
      if (signal?.aborted) {
        throw new CropCancelledError(framesWritten);
      }

      const frame = await readNextFrame(source, sourcePath, framesWritten);
      if (frame === null) {
        break;
      }

      const cropped = cropFrame(frame, spec, framesWritten);
      try {
        await output.writeFrame(cropped);
      } catch (err) {
        throw new OutputWriteError(
          outputPath,
          `writing frame ${framesWritten} failed: ${errorMessage(err)}`,
          { cause: err, framesWritten }
        );
      }

      framesWritten++;
      onProgress?.(cropProgress(framesWritten, info.frameCount));
    }

    if (framesWritten === 0) {
      throw new SourceUnreadableError(sourcePath, 'source has no frames');
    }

    try {
      await source.close();
    } catch (err) {
      throw new SourceUnreadableError(sourcePath, `closing source failed: ${errorMessage(err)}`, {
        cause: err,
        stage: 'crop',
      });
    }
    sink = null;
    try {
      await output.close();
    } catch (err) {
      throw new OutputWriteError(outputPath, `finalizing output failed: ${errorMessage(err)}`, {
        cause: err,
        framesWritten,
      });
    }

    const record: OperationRecord = Object.freeze({
      timestamp: now().toISOString(),
      sourcePath,
      outputPath,
      rect,
      sourceSize: Object.freeze({ width: info.width, height: info.height }),
      outputSize: Object.freeze({ width: rect.width, height: rect.height }),
      fps: info.fps,
      frameCount: framesWritten,
    });

    try {
      await writeLog(record);
    } catch (err) {
      throw new OutputWriteError(outputPath, `writing operation log failed: ${errorMessage(err)}`, {
        cause: err,
        framesWritten,
      });
    }

    logger.info(
      `[CropPipeline] Cropped ${framesWritten} frames to ${path.basename(outputPath)} in ${now().getTime() - startedAt}ms`
    );
    return record;
  } catch (err) {
    logger.error(`[CropPipeline] Crop failed after ${framesWritten} frames:`, errorMessage(err));
    await discardOutput(outputPath, source, sink);
    throw err;
  }
}
