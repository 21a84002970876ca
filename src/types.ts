// Type definitions shared by the geometry engine, selection machine and crop pipeline.
// No any, no type casting with as.

// ============================================================================
// Coordinate Types
// ============================================================================

/**
 * Which pixel grid a rectangle is measured in.
 * - display: the rendered preview, possibly scaled and letterboxed
 * - source: native pixels of the video frames
 */
export type CoordinateSpace = 'display' | 'source';

/** Point in pixels */
export interface Point {
    x: number;
    y: number;
}

/** Size in pixels */
export interface Size {
    width: number;
    height: number;
}

/** Untagged axis-aligned rectangle, used for bounds */
export interface Rect {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * Rectangle tagged with the space it is measured in.
 * width and height are never negative; a zero-area rectangle means "no selection".
 */
export interface Rectangle<S extends CoordinateSpace = CoordinateSpace> extends Rect {
    space: S;
}

// ============================================================================
// Handles
// ============================================================================

export type Corner = 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right';

export type Edge = 'top' | 'bottom' | 'left' | 'right';

/** Result of a hit test against the current selection */
export type HandleId = Corner | Edge | 'move';

/** What a drag is doing: one of the hit-test results, or drawing a fresh rectangle */
export type DragHandle = HandleId | 'create';

// ============================================================================
// Crop Types
// ============================================================================

/** Finalized crop request handed to the pipeline. Frozen once built. */
export interface CropSpec {
    readonly rect: Readonly<Rectangle<'source'>>;
    readonly sourcePath: string;
    readonly outputPath: string;
}

/** Record of one completed crop, written to the sidecar log */
export interface OperationRecord {
    /** ISO-8601 time the crop finished */
    readonly timestamp: string;
    readonly sourcePath: string;
    readonly outputPath: string;
    readonly rect: Readonly<Rectangle<'source'>>;
    readonly sourceSize: Readonly<Size>;
    readonly outputSize: Readonly<Size>;
    readonly fps: number;
    readonly frameCount: number;
}
