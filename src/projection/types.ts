/**
 * Projection Types
 *
 * Coordinate systems shared by the projection, viewport and tile modules.
 */

/** WGS84 longitude/latitude in degrees */
export interface LonLat {
  readonly lon: number;
  readonly lat: number;
}

/** Normalized Web Mercator world coordinate (0-1 range) */
export interface WorldCoord {
  x: number;
  y: number;
}

/** World pixel coordinate at some zoom: (0, 0) is the top-left of the world */
export interface PixelCoord {
  x: number;
  y: number;
}

/** Tile address in the XYZ scheme */
export interface TileAddress {
  readonly z: number;
  readonly x: number;
  readonly y: number;
}

/** Bounding box in world pixels */
export interface PixelBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}
