/**
 * Image and geometry types for template matching
 */

export interface Size {
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * 8-bit RGBA raster, row-major, 4 bytes per pixel
 */
export interface Image extends Size {
  data: Uint8Array;
}

/**
 * Single-channel intensity raster
 */
export interface GrayImage extends Size {
  data: Float64Array;
}

/**
 * Result of searching a template inside a capture
 */
export interface MatchResult {
  /** True when confidence reached the threshold */
  found: boolean;
  /** Top-left corner of the best window, capture pixels */
  offset: Point;
  /** Center of the best window, capture pixels */
  center: Point;
  /** Normalized cross-correlation score of the best window */
  confidence: number;
}
