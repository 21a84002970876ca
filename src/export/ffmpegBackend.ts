/**
 * FFmpeg video backend
 *
 * Decodes sources to raw RGB24 over ffmpeg's stdout and encodes raw RGB24
 * from stdin into H.264 MP4. Stream properties come from ffprobe's JSON output.
 */

import { execFile, spawn, type ChildProcess } from 'node:child_process';
import type { Readable } from 'node:stream';
import { promisify } from 'node:util';
import { errorMessage } from './errors';
import { resolveFfmpegPath, resolveFfprobePath } from './ffmpegResolver';
import {
  frameByteLength,
  type VideoBackend,
  type VideoFrame,
  type VideoInfo,
  type VideoSink,
  type VideoSinkOptions,
  type VideoSource,
} from './videoIO';

const execFileAsync = promisify(execFile);

/** Keep only the tail of stderr; ffmpeg's last lines carry the failure */
const STDERR_TAIL_CHARS = 4000;

export interface FfmpegBackendOptions {
  /** Explicit ffmpeg binary; resolved lazily when omitted */
  ffmpegPath?: string;
  /** Explicit ffprobe binary; resolved lazily when omitted */
  ffprobePath?: string;
}

// ============================================================================
// Argument builders
// ============================================================================

export function buildProbeArgs(inputPath: string): string[] {
  return [
    '-v', 'error',
    '-select_streams', 'v:0',
    '-count_packets',
    '-show_entries', 'stream=width,height,r_frame_rate,avg_frame_rate,nb_frames,nb_read_packets',
    '-of', 'json',
    inputPath,
  ];
}

/**
 * Decoder arguments. Rotation metadata is ignored so decoded frames keep the
 * coded size ffprobe reports.
 */
export function buildDecodeArgs(inputPath: string): string[] {
  return [
    '-hide_banner',
    '-v', 'error',
    '-noautorotate',
    '-i', inputPath,
    '-map', '0:v:0',
    '-f', 'rawvideo',
    '-pix_fmt', 'rgb24',
    '-',
  ];
}

/**
 * Encoder arguments. 4:2:0 chroma needs even dimensions, so odd-sized crops
 * are encoded 4:4:4 to keep the output exactly the requested size.
 */
export function buildEncodeArgs(outputPath: string, options: VideoSinkOptions): string[] {
  const evenSize = options.width % 2 === 0 && options.height % 2 === 0;
  return [
    '-hide_banner',
    '-v', 'error',
    '-y', // Overwrite output
    '-f', 'rawvideo',
    '-pix_fmt', 'rgb24',
    '-s', `${options.width}x${options.height}`,
    '-r', String(options.fps),
    '-i', '-',
    '-an',
    '-c:v', 'libx264',
    '-preset', 'veryfast',
    '-crf', '18',
    '-pix_fmt', evenSize ? 'yuv420p' : 'yuv444p',
    '-movflags', '+faststart',
    outputPath,
  ];
}

// ============================================================================
// Probe parsing
// ============================================================================

/**
 * Parses an ffprobe rational such as "30000/1001". Returns NaN for "0/0" or junk.
 */
export function parseFrameRate(value: string): number {
  const [num, den = '1'] = value.split('/');
  const numerator = Number(num);
  const denominator = Number(den);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return Number.NaN;
  }
  return numerator / denominator;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readCount(stream: Record<string, unknown>, key: string): number | null {
  const raw = stream[key];
  const count = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : Number.NaN;
  return Number.isInteger(count) && count >= 0 ? count : null;
}

/**
 * Extracts stream properties from `ffprobe -of json` output.
 *
 * @throws Error if there is no video stream or a required field is missing
 */
export function parseProbeOutput(json: string): VideoInfo {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`ffprobe returned invalid JSON: ${errorMessage(err)}`);
  }

  const streams = isRecord(parsed) ? parsed.streams : undefined;
  const stream = Array.isArray(streams) ? streams.find(isRecord) : undefined;
  if (!stream) {
    throw new Error('no video stream found');
  }

  const width = readCount(stream, 'width');
  const height = readCount(stream, 'height');
  if (!width || !height) {
    throw new Error('video stream has no dimensions');
  }

  const rates = [stream.r_frame_rate, stream.avg_frame_rate]
    .filter((rate): rate is string => typeof rate === 'string')
    .map(parseFrameRate)
    .filter((rate) => Number.isFinite(rate) && rate > 0);
  if (rates.length === 0) {
    throw new Error('video stream has no frame rate');
  }

  // Counted packets are exact; nb_frames is container metadata and may be absent
  const frameCount = readCount(stream, 'nb_read_packets') ?? readCount(stream, 'nb_frames') ?? 0;

  return { width, height, fps: rates[0], frameCount };
}

// ============================================================================
// Raw frame streaming
// ============================================================================

/**
 * Splits a raw video byte stream into whole frames.
 *
 * @throws Error if the stream ends partway through a frame
 */
export async function* readRawFrames(stream: Readable, frameBytes: number): AsyncGenerator<Buffer> {
  let chunks: Buffer[] = [];
  let buffered = 0;

  for await (const chunk of stream) {
    if (!Buffer.isBuffer(chunk)) {
      throw new Error('decoder produced non-binary output');
    }
    chunks.push(chunk);
    buffered += chunk.length;
    if (buffered < frameBytes) {
      continue;
    }

    let pending = Buffer.concat(chunks, buffered);
    while (pending.length >= frameBytes) {
      yield pending.subarray(0, frameBytes);
      pending = pending.subarray(frameBytes);
    }
    chunks = pending.length > 0 ? [pending] : [];
    buffered = pending.length;
  }

  if (buffered > 0) {
    throw new Error(`stream ended mid-frame (${buffered} of ${frameBytes} bytes)`);
  }
}

interface ProcessExit {
  code: number | null;
  error?: Error;
}

/**
 * Resolves once the child exits or fails to spawn. Never rejects.
 */
function waitForExit(proc: ChildProcess): Promise<ProcessExit> {
  return new Promise((resolve) => {
    proc.once('close', (code) => resolve({ code }));
    proc.once('error', (error) => resolve({ code: null, error }));
  });
}

function collectStderr(stderr: Readable): () => string {
  let text = '';
  stderr.setEncoding('utf8');
  stderr.on('data', (data: string) => {
    text = (text + data).slice(-STDERR_TAIL_CHARS);
  });
  return () => text.trim();
}

function describeExit(exit: ProcessExit, stderr: string): string {
  if (exit.error) {
    return exit.error.message;
  }
  return stderr || `ffmpeg exited with code ${exit.code}`;
}

// ============================================================================
// Source and sink
// ============================================================================

async function probe(ffprobePath: string, inputPath: string): Promise<VideoInfo> {
  const { stdout } = await execFileAsync(ffprobePath, buildProbeArgs(inputPath), {
    maxBuffer: 1024 * 1024,
  });
  return parseProbeOutput(stdout);
}

async function openFfmpegSource(
  ffmpegPath: string,
  ffprobePath: string,
  inputPath: string
): Promise<VideoSource> {
  const info = await probe(ffprobePath, inputPath);

  const proc = spawn(ffmpegPath, buildDecodeArgs(inputPath), {
    stdio: ['ignore', 'pipe', 'pipe'],
  });
  const exited = waitForExit(proc);
  const stderr = collectStderr(proc.stderr);
  const frames = readRawFrames(proc.stdout, frameByteLength(info.width, info.height));
  let closed = false;

  return {
    info,

    async readFrame(): Promise<VideoFrame | null> {
      const next = await frames.next();
      if (!next.done) {
        return { width: info.width, height: info.height, data: next.value };
      }
      const exit = await exited;
      if (exit.code !== 0 && !closed) {
        throw new Error(describeExit(exit, stderr()));
      }
      return null;
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      // The child's 'close' waits on stdout, which a suspended reader keeps open
      proc.stdout.destroy();
      if (proc.exitCode === null) {
        proc.kill('SIGTERM');
      }
      await frames.return(undefined);
      await exited;
    },
  };
}

async function openFfmpegSink(
  ffmpegPath: string,
  outputPath: string,
  options: VideoSinkOptions
): Promise<VideoSink> {
  const proc = spawn(ffmpegPath, buildEncodeArgs(outputPath, options), {
    stdio: ['pipe', 'ignore', 'pipe'],
  });
  const exited = waitForExit(proc);
  const stderr = collectStderr(proc.stderr);
  const expectedBytes = frameByteLength(options.width, options.height);
  let writeError: Error | null = null;

  // EPIPE surfaces here when the encoder dies; writeFrame reports it
  proc.stdin.on('error', (err) => {
    writeError = err;
  });

  return {
    writeFrame(frame: VideoFrame): Promise<void> {
      if (frame.data.length !== expectedBytes) {
        return Promise.reject(
          new Error(`frame is ${frame.data.length} bytes, encoder expects ${expectedBytes}`)
        );
      }
      if (writeError) {
        return Promise.reject(writeError);
      }
      return new Promise((resolve, reject) => {
        proc.stdin.write(frame.data, (err) => (err ? reject(err) : resolve()));
      });
    },

    async close(): Promise<void> {
      proc.stdin.end();
      const exit = await exited;
      if (exit.code !== 0) {
        throw new Error(describeExit(exit, stderr()));
      }
    },

    async abort(): Promise<void> {
      proc.stdin.destroy();
      if (proc.exitCode === null) {
        proc.kill('SIGKILL');
      }
      await exited;
    },
  };
}

/**
 * Video backend that shells out to ffmpeg and ffprobe. Binaries are
 * resolved on first use, so building the backend never touches the disk.
 */
export function createFfmpegBackend(options: FfmpegBackendOptions = {}): VideoBackend {
  return {
    openSource: async (inputPath) =>
      openFfmpegSource(
        options.ffmpegPath ?? resolveFfmpegPath(),
        options.ffprobePath ?? resolveFfprobePath(),
        inputPath
      ),
    openSink: async (outputPath, sinkOptions) =>
      openFfmpegSink(options.ffmpegPath ?? resolveFfmpegPath(), outputPath, sinkOptions),
  };
}
