// Container checks and default output naming

import path from 'node:path';
import { DEFAULT_OUTPUT_SUFFIX, OUTPUT_EXTENSION, SUPPORTED_INPUT_EXTENSIONS } from '../config';
import { UnsupportedFormatError } from './errors';

/** Lower-cased extension including the dot, '' when there is none */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function isSupportedInput(filePath: string): boolean {
  const ext = fileExtension(filePath);
  return SUPPORTED_INPUT_EXTENSIONS.some((supported) => supported === ext);
}

export function isSupportedOutput(filePath: string): boolean {
  return fileExtension(filePath) === OUTPUT_EXTENSION;
}

/**
 * Output path used when the user gives none: `<dir>/<name>_cropped.mp4`.
 */
export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}${DEFAULT_OUTPUT_SUFFIX}${OUTPUT_EXTENSION}`);
}

/**
 * Rejects containers the tool does not read or write, before anything is opened.
 *
 * @throws UnsupportedFormatError
 */
export function assertSupportedFormats(sourcePath: string, outputPath: string): void {
  if (!isSupportedInput(sourcePath)) {
    throw new UnsupportedFormatError(
      sourcePath,
      `unsupported input format "${fileExtension(sourcePath) || '(none)'}", expected one of ${SUPPORTED_INPUT_EXTENSIONS.join(' ')}`
    );
  }
  if (!isSupportedOutput(outputPath)) {
    throw new UnsupportedFormatError(
      outputPath,
      `unsupported output format "${fileExtension(outputPath) || '(none)'}", expected ${OUTPUT_EXTENSION}`
    );
  }
  if (path.resolve(sourcePath) === path.resolve(outputPath)) {
    throw new UnsupportedFormatError(outputPath, 'output path must differ from the source path');
  }
}
