// Human-readable sidecar log written next to each cropped video

import { writeFile } from 'node:fs/promises';
import { LOG_FILE_SUFFIX } from '../config';
import type { OperationRecord } from '../types';

/**
 * Sidecar path for an output file: the output path with its extension
 * replaced by `_crop.txt`.
 */
export function logPathFor(outputPath: string): string {
  const dot = outputPath.lastIndexOf('.');
  const slash = Math.max(outputPath.lastIndexOf('/'), outputPath.lastIndexOf('\\'));
  const base = dot > slash + 1 ? outputPath.slice(0, dot) : outputPath;
  return `${base}${LOG_FILE_SUFFIX}`;
}

function formatAspectRatio(width: number, height: number): string {
  return height === 0 ? 'N/A' : (width / height).toFixed(3);
}

/**
 * Renders a record as the log's text. Every field of the record appears once.
 */
export function formatOperationLog(record: OperationRecord): string {
  const { rect, sourceSize, outputSize } = record;
  return [
    'framecrop :: operation log',
    `timestamp :: ${record.timestamp}`,
    'status :: cropped successfully',
    '',
    `crop rect (source px): (${rect.x}, ${rect.y}, ${rect.width}, ${rect.height})`,
    '--------------------------',
    `position: (${rect.x}, ${rect.y})`,
    `dimensions: ${rect.width} × ${rect.height} px`,
    `aspect ratio: ${formatAspectRatio(rect.width, rect.height)}`,
    '',
    `source: ${record.sourcePath}`,
    `source resolution: ${sourceSize.width} × ${sourceSize.height}`,
    `output: ${record.outputPath}`,
    `output resolution: ${outputSize.width} × ${outputSize.height}`,
    `fps: ${record.fps}`,
    `frames: ${record.frameCount}`,
    '',
  ].join('\n');
}

/** Persists one record; resolves to the path written */
export type OperationLogWriter = (record: OperationRecord) => Promise<string>;

/**
 * Writes the sidecar log for a record, replacing any previous one.
 */
export const writeOperationLog: OperationLogWriter = async (record) => {
  const logPath = logPathFor(record.outputPath);
  await writeFile(logPath, formatOperationLog(record), 'utf8');
  return logPath;
};
