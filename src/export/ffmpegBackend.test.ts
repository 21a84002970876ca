// Tests for the ffmpeg backend's argument building, probe parsing and frame splitting.
// No ffmpeg process is started here.

import { describe, it, expect, afterEach, vi } from 'vitest';
import { Readable } from 'node:stream';
import {
  buildDecodeArgs,
  buildEncodeArgs,
  parseFrameRate,
  parseProbeOutput,
  readRawFrames,
} from './ffmpegBackend';
import { resolveFfmpegPath, resolveFfprobePath } from './ffmpegResolver';

function probeJson(stream: Record<string, unknown>): string {
  return JSON.stringify({ programs: [], streams: [stream] });
}

async function collect(stream: Readable, frameBytes: number): Promise<number[][]> {
  const frames: number[][] = [];
  for await (const frame of readRawFrames(stream, frameBytes)) {
    frames.push(Array.from(frame));
  }
  return frames;
}

/** Value following the last occurrence of a flag */
function lastFlag(args: string[], flag: string): string | undefined {
  return args[args.lastIndexOf(flag) + 1];
}

describe('parseFrameRate', () => {
  it('parses ffprobe rationals', () => {
    expect(parseFrameRate('30/1')).toBe(30);
    expect(parseFrameRate('30000/1001')).toBe(30000 / 1001);
    expect(parseFrameRate('25')).toBe(25);
  });

  it('returns NaN for undefined rates', () => {
    expect(parseFrameRate('0/0')).toBeNaN();
    expect(parseFrameRate('n/a')).toBeNaN();
  });
});

describe('parseProbeOutput', () => {
  it('reads size, rate and counted frames', () => {
    const info = parseProbeOutput(
      probeJson({
        width: 1920,
        height: 1080,
        r_frame_rate: '30/1',
        avg_frame_rate: '30/1',
        nb_frames: '89',
        nb_read_packets: '90',
      })
    );
    expect(info).toEqual({ width: 1920, height: 1080, fps: 30, frameCount: 90 });
  });

  it('falls back to the average rate and container frame count', () => {
    const info = parseProbeOutput(
      probeJson({
        width: 640,
        height: 480,
        r_frame_rate: '0/0',
        avg_frame_rate: '25/1',
        nb_frames: '120',
      })
    );
    expect(info).toEqual({ width: 640, height: 480, fps: 25, frameCount: 120 });
  });

  it('reports zero frames when no count is available', () => {
    const info = parseProbeOutput(probeJson({ width: 2, height: 2, r_frame_rate: '24/1' }));
    expect(info.frameCount).toBe(0);
  });

  it('rejects output without a usable video stream', () => {
    expect(() => parseProbeOutput('{"streams": []}')).toThrow('no video stream found');
    expect(() => parseProbeOutput(probeJson({ r_frame_rate: '30/1' }))).toThrow(
      'video stream has no dimensions'
    );
    expect(() => parseProbeOutput(probeJson({ width: 2, height: 2 }))).toThrow(
      'video stream has no frame rate'
    );
    expect(() => parseProbeOutput('not json')).toThrow('ffprobe returned invalid JSON');
  });
});

describe('argument builders', () => {
  it('decodes the first video stream to raw RGB24 on stdout', () => {
    const args = buildDecodeArgs('/videos/clip.mov');
    expect(lastFlag(args, '-i')).toBe('/videos/clip.mov');
    expect(lastFlag(args, '-f')).toBe('rawvideo');
    expect(lastFlag(args, '-pix_fmt')).toBe('rgb24');
    expect(args[args.length - 1]).toBe('-');
  });

  it('ignores rotation metadata so frames keep the probed size', () => {
    const args = buildDecodeArgs('/videos/portrait.mov');
    expect(args.indexOf('-noautorotate')).toBeGreaterThanOrEqual(0);
    expect(args.indexOf('-noautorotate')).toBeLessThan(args.indexOf('-i'));
  });

  it('encodes even sizes as 4:2:0', () => {
    const args = buildEncodeArgs('/out/clip_cropped.mp4', { width: 400, height: 300, fps: 30 });
    expect(lastFlag(args, '-s')).toBe('400x300');
    expect(lastFlag(args, '-r')).toBe('30');
    expect(lastFlag(args, '-c:v')).toBe('libx264');
    expect(lastFlag(args, '-pix_fmt')).toBe('yuv420p');
    expect(args[args.length - 1]).toBe('/out/clip_cropped.mp4');
  });

  it('encodes odd sizes as 4:4:4 so the size is kept', () => {
    const args = buildEncodeArgs('out.mp4', { width: 301, height: 300, fps: 25 });
    expect(lastFlag(args, '-pix_fmt')).toBe('yuv444p');
  });
});

describe('readRawFrames', () => {
  it('regroups arbitrary chunks into whole frames', async () => {
    const stream = Readable.from([Buffer.from([1, 2, 3, 4]), Buffer.from([5, 6]), Buffer.from([7, 8, 9])]);
    expect(await collect(stream, 3)).toEqual([
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
    ]);
  });

  it('fails when the stream stops inside a frame', async () => {
    const stream = Readable.from([Buffer.from([1, 2, 3, 4])]);
    await expect(collect(stream, 3)).rejects.toThrow('stream ended mid-frame (1 of 3 bytes)');
  });

  it('fails on text output', async () => {
    const stream = Readable.from(['abc']);
    await expect(collect(stream, 3)).rejects.toThrow('decoder produced non-binary output');
  });
});

describe('binary resolution', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prefers paths from the environment', () => {
    vi.stubEnv('FFMPEG_PATH', '/opt/ffmpeg/bin/ffmpeg');
    vi.stubEnv('FFPROBE_PATH', '/opt/ffmpeg/bin/ffprobe');
    expect(resolveFfmpegPath()).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(resolveFfprobePath()).toBe('/opt/ffmpeg/bin/ffprobe');
  });
});
