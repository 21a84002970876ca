/**
 * FFmpeg/FFprobe binary resolver.
 *
 * Prefers an explicit path from the environment, then the static binaries
 * shipped by @ffmpeg-installer/ffmpeg and @ffprobe-installer/ffprobe.
 */

import fs from 'node:fs';
import { createRequire } from 'node:module';
import { FFMPEG_PATH_ENV, FFPROBE_PATH_ENV } from '../config';
import { logger } from '../utils/logger';

const requireInstaller = createRequire(import.meta.url);

function hasStringPath(value: unknown): value is { path: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'path' in value &&
    typeof value.path === 'string'
  );
}

function resolveBinary(envName: string, packageName: string, label: string): string {
  const fromEnv = process.env[envName];
  if (fromEnv) {
    return fromEnv;
  }

  let installer: unknown;
  try {
    installer = requireInstaller(packageName);
  } catch (err) {
    throw new Error(
      `${label} not found. Install ${packageName} or set ${envName}.`,
      { cause: err }
    );
  }

  if (hasStringPath(installer) && fs.existsSync(installer.path)) {
    logger.debug(`[FFmpeg Resolver] Using ${packageName} binary: ${installer.path}`);
    return installer.path;
  }

  throw new Error(`${label} binary from ${packageName} is missing for ${process.platform}-${process.arch}. Set ${envName}.`);
}

/**
 * Resolves the FFmpeg binary path for the current platform.
 */
export function resolveFfmpegPath(): string {
  return resolveBinary(FFMPEG_PATH_ENV, '@ffmpeg-installer/ffmpeg', 'FFmpeg');
}

/**
 * Resolves the FFprobe binary path for the current platform.
 */
export function resolveFfprobePath(): string {
  return resolveBinary(FFPROBE_PATH_ENV, '@ffprobe-installer/ffprobe', 'FFprobe');
}
