// FFmpeg backend against the bundled ffmpeg/ffprobe binaries.
// Clips are generated with lavfi into a temp directory; skipped when no binary resolves.

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { execFile } from 'node:child_process';
import { access, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { promisify } from 'node:util';
import type { CropSpec } from '../types';
import { runCrop } from './cropPipeline';
import { CropCancelledError, OutputWriteError } from './errors';
import { createFfmpegBackend } from './ffmpegBackend';
import { resolveFfmpegPath, resolveFfprobePath } from './ffmpegResolver';
import { frameByteLength, type VideoBackend, type VideoFrame } from './videoIO';

const execFileAsync = promisify(execFile);

const TIMEOUT_MS = 30_000;

function findBinaries(): { ffmpegPath: string; ffprobePath: string } | null {
  try {
    return { ffmpegPath: resolveFfmpegPath(), ffprobePath: resolveFfprobePath() };
  } catch {
    return null;
  }
}

const binaries = findBinaries();

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the crop to fail');
}

/** Wraps a backend so the sink refuses the write after `frames` successful ones */
function failingWritesAfter(backend: VideoBackend, frames: number): VideoBackend {
  return {
    openSource: (sourcePath) => backend.openSource(sourcePath),
    openSink: async (outputPath, options) => {
      const sink = await backend.openSink(outputPath, options);
      let written = 0;
      return {
        writeFrame: (frame: VideoFrame) => {
          if (written === frames) {
            return Promise.reject(new Error('no space left on device'));
          }
          written++;
          return sink.writeFrame(frame);
        },
        close: () => sink.close(),
        abort: () => sink.abort(),
      };
    },
  };
}

describe.skipIf(binaries === null)('ffmpeg backend', () => {
  const backend = createFfmpegBackend(binaries ?? {});
  const ffmpeg = binaries?.ffmpegPath ?? 'ffmpeg';

  let dir = '';
  let clip = '';
  let rotated = '';

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'framecrop-ffmpeg-'));
    clip = path.join(dir, 'clip.mp4');
    rotated = path.join(dir, 'rotated.mp4');

    await execFileAsync(ffmpeg, [
      '-v', 'error',
      '-f', 'lavfi',
      '-i', 'testsrc=size=320x240:rate=30',
      '-frames:v', '60',
      '-c:v', 'libx264',
      '-pix_fmt', 'yuv420p',
      clip,
    ]);
    // Same bitstream, tagged for display at 90 degrees
    await execFileAsync(ffmpeg, [
      '-v', 'error',
      '-i', clip,
      '-c', 'copy',
      '-metadata:s:v:0', 'rotate=90',
      rotated,
    ]);
  }, TIMEOUT_MS);

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(path.join(dir, 'out.mp4'), { force: true });
    await rm(path.join(dir, 'out_crop.txt'), { force: true });
  });

  function job(rect: { x: number; y: number; width: number; height: number }): CropSpec {
    return {
      rect: { ...rect, space: 'source' },
      sourcePath: clip,
      outputPath: path.join(dir, 'out.mp4'),
    };
  }

  it('reads size, rate and frame count', async () => {
    const source = await backend.openSource(clip);
    await source.close();

    expect(source.info).toEqual({ width: 320, height: 240, fps: 30, frameCount: 60 });
  }, TIMEOUT_MS);

  it('closes a source partway through the stream', async () => {
    const source = await backend.openSource(clip);
    for (let i = 0; i < 5; i++) {
      const frame = await source.readFrame();
      expect(frame?.data.length).toBe(frameByteLength(320, 240));
    }

    await source.close();
  }, TIMEOUT_MS);

  it('decodes rotated input at its coded size, pixels unrotated', async () => {
    const plain = await backend.openSource(clip);
    const tagged = await backend.openSource(rotated);
    const expected = await plain.readFrame();
    const actual = await tagged.readFrame();
    await plain.close();
    await tagged.close();

    expect(tagged.info).toEqual({ width: 320, height: 240, fps: 30, frameCount: 60 });
    expect(actual?.width).toBe(320);
    expect(actual?.height).toBe(240);
    expect(actual?.data).toEqual(expected?.data);
  }, TIMEOUT_MS);

  it('writes every frame at the size of the rectangle', async () => {
    const crop = job({ x: 40, y: 20, width: 200, height: 100 });

    const record = await runCrop(crop, { backend });
    const output = await backend.openSource(crop.outputPath);
    await output.close();

    expect(record.frameCount).toBe(60);
    expect(output.info).toEqual({ width: 200, height: 100, fps: 30, frameCount: 60 });
  }, TIMEOUT_MS);

  it('keeps an odd-sized rectangle exactly', async () => {
    const crop = job({ x: 1, y: 1, width: 101, height: 51 });

    await runCrop(crop, { backend });
    const output = await backend.openSource(crop.outputPath);
    await output.close();

    expect(output.info.width).toBe(101);
    expect(output.info.height).toBe(51);
  }, TIMEOUT_MS);

  it('leaves no output when a write fails mid-stream', async () => {
    const crop = job({ x: 0, y: 0, width: 160, height: 120 });

    const err = await failure(runCrop(crop, { backend: failingWritesAfter(backend, 40) }));

    expect(err).toBeInstanceOf(OutputWriteError);
    expect(err).toMatchObject({ framesWritten: 40 });
    expect(await exists(crop.outputPath)).toBe(false);
  }, TIMEOUT_MS);

  it('leaves no output when cancelled mid-stream', async () => {
    const crop = job({ x: 0, y: 0, width: 160, height: 120 });
    const controller = new AbortController();

    const err = await failure(
      runCrop(crop, {
        backend,
        signal: controller.signal,
        onProgress: (p) => {
          if (p.framesWritten === 10) controller.abort();
        },
      })
    );

    expect(err).toBeInstanceOf(CropCancelledError);
    expect(await exists(crop.outputPath)).toBe(false);
  }, TIMEOUT_MS);
});
