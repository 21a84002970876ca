// Command-line entry point: picks the input and output, runs the selection
// through the crop window's state machine and crops the video.

import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { CLI_MIN_SELECTION_SIZE } from './config';
import { runCrop } from './export/cropPipeline';
import { createCropSpec } from './export/cropSpec';
import { SourceUnreadableError, describeCropError, errorMessage } from './export/errors';
import { createFfmpegBackend } from './export/ffmpegBackend';
import { assertSupportedFormats, defaultOutputPath } from './export/formats';
import type { VideoBackend, VideoInfo, VideoSource } from './export/videoIO';
import { createIdentityTransform } from './geometry';
import { logPathFor } from './log/operationLog';
import {
  createSessionWithTransform,
  runEvents,
  type TransitionResult,
} from './selection/selectionMachine';
import type { CropSpec, Rect, Rectangle } from './types';
import { logger } from './utils/logger';

export const USAGE =
  'usage: framecrop <input.mp4|.avi|.mov> --rect x,y,width,height [--output out.mp4] [--square] [--min-size px]';

export interface CliDeps {
  backend: VideoBackend;
  out: (line: string) => void;
  err: (line: string) => void;
  signal?: AbortSignal;
}

/**
 * Parses "x,y,width,height" in source pixels.
 *
 * @throws Error if there are not four non-negative numbers
 */
export function parseRect(value: string): Rect {
  const parts = value.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 4 || parts.some((n) => !Number.isFinite(n) || n < 0)) {
    throw new Error(`invalid --rect "${value}", expected x,y,width,height`);
  }
  const [x, y, width, height] = parts;
  return { x, y, width, height };
}

/**
 * Drives the same selection machine the crop window uses: a drag from one
 * corner of `rect` to the other, then the commit key. Square mode behaves
 * as if the toggle were on, so the rectangle is squared from its top-left.
 */
export function selectRegion(
  info: VideoInfo,
  rect: Rect,
  options: { square: boolean; minSelectionSize: number }
): TransitionResult {
  const session = createSessionWithTransform(
    createIdentityTransform({ width: info.width, height: info.height }),
    { minSelectionSize: options.minSelectionSize },
    options.square
  );
  const end = { x: rect.x + rect.width, y: rect.y + rect.height };

  return runEvents(session, [
    { type: 'pointerdown', point: { x: rect.x, y: rect.y } },
    { type: 'pointermove', point: end },
    { type: 'pointerup', point: end },
    { type: 'key', key: 'c' },
  ]);
}

async function openInput(backend: VideoBackend, inputPath: string): Promise<VideoSource> {
  return backend.openSource(inputPath).catch((err: unknown) => {
    throw new SourceUnreadableError(inputPath, `could not open source: ${errorMessage(err)}`, {
      cause: err,
    });
  });
}

function formatRect(rect: Rectangle<'source'>): string {
  return `(${rect.x}, ${rect.y}, ${rect.width}, ${rect.height})`;
}

/**
 * Runs the CLI and resolves to the process exit code.
 * 0 success, 1 operation failed, 2 bad usage.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        output: { type: 'string', short: 'o' },
        rect: { type: 'string', short: 'r' },
        square: { type: 'boolean', short: 's', default: false },
        'min-size': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err) {
    deps.err(errorMessage(err));
    deps.err(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    deps.out(USAGE);
    return 0;
  }

  const inputPath = positionals[0];
  if (!inputPath || !values.rect) {
    deps.err(USAGE);
    return 2;
  }

  let rect: Rect;
  let minSelectionSize = CLI_MIN_SELECTION_SIZE;
  try {
    rect = parseRect(values.rect);
    if (values['min-size'] !== undefined) {
      minSelectionSize = Number(values['min-size']);
      if (!Number.isFinite(minSelectionSize) || minSelectionSize < 1) {
        throw new Error(`invalid --min-size "${values['min-size']}"`);
      }
    }
  } catch (err) {
    deps.err(errorMessage(err));
    deps.err(USAGE);
    return 2;
  }

  const outputPath = values.output ?? defaultOutputPath(inputPath);

  try {
    assertSupportedFormats(inputPath, outputPath);
    // Opened once: the selection reads its size, then the pipeline decodes it
    const source = await openInput(deps.backend, inputPath);

    let spec: CropSpec;
    try {
      const selection = selectRegion(source.info, rect, {
        square: values.square === true,
        minSelectionSize,
      });
      if (!selection.committed) {
        throw selection.rejected ?? new Error('selection was not committed');
      }
      spec = createCropSpec(selection.committed, inputPath, outputPath);
    } catch (err) {
      await source.close();
      throw err;
    }

    let lastDecile = -1;
    const record = await runCrop(spec, {
      backend: deps.backend,
      source,
      signal: deps.signal,
      onProgress: (progress) => {
        const decile = Math.floor(progress.fraction * 10);
        if (decile !== lastDecile) {
          lastDecile = decile;
          logger.debug(`[CLI] ${progress.framesWritten}/${progress.totalFrames} frames`);
        }
      },
    });

    deps.out(`cropped ${formatRect(record.rect)} → ${record.outputPath}`);
    deps.out(
      `${record.outputSize.width}x${record.outputSize.height} @ ${record.fps} fps, ${record.frameCount} frames`
    );
    deps.out(`log: ${logPathFor(record.outputPath)}`);
    return 0;
  } catch (err) {
    deps.err(describeCropError(err));
    return 1;
  }
}

const isMain =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMain) {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  runCli(process.argv.slice(2), {
    backend: createFfmpegBackend(),
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    signal: controller.signal,
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error('[CLI] Unexpected failure:', errorMessage(err));
      process.exitCode = 1;
    });
}
