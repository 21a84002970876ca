// Narrow contract between the crop pipeline and whatever decodes and encodes video

/** Bytes per pixel of the packed RGB24 frames passed across the contract */
export const RGB24_BYTES_PER_PIXEL = 3;

/**
 * One decoded frame: packed RGB24, row-major, no row padding.
 * data.length === width * height * 3
 */
export interface VideoFrame {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Stream properties reported by a source */
export interface VideoInfo {
  width: number;
  height: number;
  /** Frames per second; may be fractional (29.97) */
  fps: number;
  /** Frames in the stream, 0 for an empty stream */
  frameCount: number;
}

/** Sequential frame reader */
export interface VideoSource {
  readonly info: VideoInfo;
  /** Next frame in stream order, or null after the last one */
  readFrame(): Promise<VideoFrame | null>;
  /** Releases the decoder; safe to call more than once */
  close(): Promise<void>;
}

export interface VideoSinkOptions {
  width: number;
  height: number;
  fps: number;
}

/** Sequential frame writer */
export interface VideoSink {
  /** Appends a frame; frames must arrive in output order */
  writeFrame(frame: VideoFrame): Promise<void>;
  /** Flushes and finalizes the file */
  close(): Promise<void>;
  /** Stops without finalizing; the caller removes whatever was written */
  abort(): Promise<void>;
}

/**
 * Opens sources and sinks by path. Format negotiation lives behind this interface.
 */
export interface VideoBackend {
  openSource(path: string): Promise<VideoSource>;
  openSink(path: string, options: VideoSinkOptions): Promise<VideoSink>;
}

/** Byte length of an RGB24 frame of the given size */
export function frameByteLength(width: number, height: number): number {
  return width * height * RGB24_BYTES_PER_PIXEL;
}
