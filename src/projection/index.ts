/**
 * Projection Module
 *
 * Coordinate conversion utilities for Web Mercator projection
 * and tile addressing.
 */

export type {
  LonLat,
  WorldCoord,
  PixelCoord,
  TileAddress,
  PixelBounds,
} from "./types";

export {
  lonLatToWorld,
  worldToLonLat,
  geoToWorldPixel,
  worldPixelToGeo,
  worldSize,
  clampLatitude,
  wrapLongitude,
  MAX_LATITUDE,
  DEFAULT_TILE_SIZE,
} from "./mercator";

export {
  tileContaining,
  tileCount,
  wrapTileX,
  isValidTile,
  getTileBounds,
  tilesEqual,
  tileToString,
  stringToTile,
} from "./tileCoord";
