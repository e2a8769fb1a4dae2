/**
 * Geometry types
 */

/** Triangulated polygon in screen pixels */
export interface Triangulation {
  /** Interleaved vertex data [x, y, x, y, ...] */
  vertices: Float32Array;
  /** Triangle indices into `vertices` (three per triangle) */
  indices: Uint16Array | Uint32Array;
}
