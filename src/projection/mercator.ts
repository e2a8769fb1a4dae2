/**
 * Web Mercator Projection
 *
 * Conversions between WGS84 (lon/lat), normalized Web Mercator world
 * coordinates (0-1 range) and world pixels at a given zoom. Everything that
 * needs projection math goes through this module.
 */

import type { LonLat, PixelCoord, WorldCoord } from "./types";

/** Degrees to radians conversion factor */
const DEG_TO_RAD = Math.PI / 180;

/** Radians to degrees conversion factor */
const RAD_TO_DEG = 180 / Math.PI;

/** Maximum latitude for Web Mercator projection (~85.05 degrees) */
export const MAX_LATITUDE = 85.051128779806604;

/** Default raster tile edge in pixels */
export const DEFAULT_TILE_SIZE = 256;

/**
 * Clamp latitude to the valid Web Mercator range.
 *
 * @param lat - Latitude in degrees
 * @returns Clamped latitude between -MAX_LATITUDE and MAX_LATITUDE
 */
export function clampLatitude(lat: number): number {
  return Math.max(-MAX_LATITUDE, Math.min(MAX_LATITUDE, lat));
}

/**
 * Wrap a longitude into [-180, 180).
 *
 * Longitudes that are already in range (including 180 itself) come back
 * unchanged, so round-trips through the projection stay exact.
 */
export function wrapLongitude(lon: number): number {
  if (lon >= -180 && lon <= 180) return lon;
  return ((((lon + 180) % 360) + 360) % 360) - 180;
}

/**
 * Convert WGS84 coordinates to normalized Web Mercator (0-1 world space).
 *
 * - x=0 is 180°W, x=1 is 180°E, x=0.5 is the prime meridian
 * - y=0 is ~85°N, y=1 is ~85°S, y=0.5 is the equator
 *
 * Latitude is clamped first, so the poles map to the top and bottom edge
 * instead of infinity.
 */
export function lonLatToWorld(lon: number, lat: number): WorldCoord {
  const x = (lon + 180) / 360;
  const latRad = clampLatitude(lat) * DEG_TO_RAD;
  const y =
    (1 - Math.log(Math.tan(latRad) + 1 / Math.cos(latRad)) / Math.PI) / 2;
  return { x, y };
}

/**
 * Convert normalized Web Mercator coordinates back to WGS84.
 *
 * @param x - World X coordinate (0-1)
 * @param y - World Y coordinate (0-1)
 */
export function worldToLonLat(x: number, y: number): LonLat {
  const lon = x * 360 - 180;
  const n = Math.PI - 2 * Math.PI * y;
  const lat = RAD_TO_DEG * Math.atan(Math.sinh(n));
  return { lon, lat: clampLatitude(lat) };
}

/**
 * Size of the whole world in pixels at a (possibly fractional) zoom.
 */
export function worldSize(zoom: number, tileSize: number = DEFAULT_TILE_SIZE): number {
  return tileSize * Math.pow(2, zoom);
}

/**
 * Forward projection to world pixels, scaled by `tileSize * 2^zoom`.
 *
 * @param lonLat - Geographic position; latitude outside the Mercator limit is clamped
 * @param zoom - Zoom level, fractional allowed
 * @param tileSize - Tile edge in pixels
 */
export function geoToWorldPixel(
  lonLat: LonLat,
  zoom: number,
  tileSize: number = DEFAULT_TILE_SIZE
): PixelCoord {
  const size = worldSize(zoom, tileSize);
  const world = lonLatToWorld(lonLat.lon, lonLat.lat);
  return { x: world.x * size, y: world.y * size };
}

/**
 * Inverse of {@link geoToWorldPixel}.
 */
export function worldPixelToGeo(
  x: number,
  y: number,
  zoom: number,
  tileSize: number = DEFAULT_TILE_SIZE
): LonLat {
  const size = worldSize(zoom, tileSize);
  return worldToLonLat(x / size, y / size);
}
