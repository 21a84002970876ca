// Defaults for selection, pipeline and log naming. Options objects override these per call.

// ============================================================================
// Selection
// ============================================================================

/** Distance in display pixels within which a pointer grabs a handle */
export const DEFAULT_HANDLE_RADIUS = 10;

/** Side length of the drawn handle squares in display pixels */
export const DEFAULT_HANDLE_SIZE = 6;

/**
 * Smallest committable selection, per dimension, in source pixels.
 * 1 means any non-zero area.
 */
export const DEFAULT_MIN_SELECTION_SIZE = 1;

/** Minimum size the CLI accepts, per dimension in source pixels */
export const CLI_MIN_SELECTION_SIZE = 10;

// ============================================================================
// Files
// ============================================================================

/** Containers the source video may use */
export const SUPPORTED_INPUT_EXTENSIONS = ['.mp4', '.avi', '.mov'] as const;

/** Container written for the cropped output */
export const OUTPUT_EXTENSION = '.mp4';

/** Appended to the input name when no output path is given */
export const DEFAULT_OUTPUT_SUFFIX = '_cropped';

/** Appended to the output name (minus extension) for the sidecar log */
export const LOG_FILE_SUFFIX = '_crop.txt';

// ============================================================================
// Video backend
// ============================================================================

/** Environment variables that override the bundled ffmpeg/ffprobe binaries */
export const FFMPEG_PATH_ENV = 'FFMPEG_PATH';
export const FFPROBE_PATH_ENV = 'FFPROBE_PATH';

// ============================================================================
// Logging
// ============================================================================

/** Environment variable naming the minimum log level (debug, info, warn, error) */
export const LOG_LEVEL_ENV = 'FRAMECROP_LOG_LEVEL';
