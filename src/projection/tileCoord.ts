/**
 * Tile Coordinate Utilities
 *
 * Conversions between world pixels and tile addresses, plus the string keys
 * used by the cache and the fetch queue.
 */

import type { PixelBounds, TileAddress } from "./types";
import { DEFAULT_TILE_SIZE } from "./mercator";

/** Number of tiles along one axis at an integer zoom */
export function tileCount(zoom: number): number {
  return Math.pow(2, zoom);
}

/**
 * Wrap a tile column into [0, 2^zoom). Columns repeat around the
 * antimeridian; rows do not.
 */
export function wrapTileX(x: number, zoom: number): number {
  const n = tileCount(zoom);
  return ((x % n) + n) % n;
}

/**
 * Get the tile containing a world pixel at an integer zoom.
 *
 * x wraps modulo 2^zoom (antimeridian wraparound); y is clamped to the
 * first and last row.
 */
export function tileContaining(
  x: number,
  y: number,
  zoom: number,
  tileSize: number = DEFAULT_TILE_SIZE
): TileAddress {
  const n = tileCount(zoom);
  const tileX = Math.floor(x / tileSize);
  const tileY = Math.floor(y / tileSize);
  return {
    z: zoom,
    x: wrapTileX(tileX, zoom),
    y: Math.max(0, Math.min(n - 1, tileY)),
  };
}

/**
 * Whether an address lies inside the tile pyramid.
 */
export function isValidTile(tile: TileAddress): boolean {
  if (!Number.isInteger(tile.z) || !Number.isInteger(tile.x) || !Number.isInteger(tile.y)) {
    return false;
  }
  if (tile.z < 0) return false;
  const n = tileCount(tile.z);
  return tile.x >= 0 && tile.x < n && tile.y >= 0 && tile.y < n;
}

/**
 * Get tile bounds in world pixels.
 */
export function getTileBounds(
  tile: TileAddress,
  tileSize: number = DEFAULT_TILE_SIZE
): PixelBounds {
  return {
    minX: tile.x * tileSize,
    minY: tile.y * tileSize,
    maxX: (tile.x + 1) * tileSize,
    maxY: (tile.y + 1) * tileSize,
  };
}

/**
 * Check if two tile addresses are equal.
 */
export function tilesEqual(a: TileAddress, b: TileAddress): boolean {
  return a.z === b.z && a.x === b.x && a.y === b.y;
}

/**
 * Get a string key for a tile, useful for Map/Set operations.
 *
 * @returns String representation "z/x/y"
 */
export function tileToString(tile: TileAddress): string {
  return `${tile.z}/${tile.x}/${tile.y}`;
}

/**
 * Parse a tile string key back to a TileAddress.
 *
 * @param str - String in format "z/x/y"
 * @returns The address, or null when the string is not a key
 */
export function stringToTile(str: string): TileAddress | null {
  const match = /^(\d+)\/(\d+)\/(\d+)$/.exec(str);
  if (!match) return null;
  return { z: Number(match[1]), x: Number(match[2]), y: Number(match[3]) };
}
