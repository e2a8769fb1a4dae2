/**
 * Tile types shared by the cache, the fetch queue and the loader.
 */

import type { TileAddress } from "../projection/types";

/** Raster encodings the decoder recognises */
export type TileImageFormat = "png" | "jpeg" | "gif" | "webp";

/** A decoded tile, ready for the renderer to blit */
export interface TileImage {
  format: TileImageFormat;
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
  /** Encoded bytes as fetched */
  data: Uint8Array;
  /** Bytes held in memory for this image */
  byteSize: number;
}

/**
 * A tile source: resolves (z, x, y) to raw bytes. Everything above the
 * fetch queue is agnostic of which variant it talks to.
 */
export interface TileSource {
  /** Stable identity; namespaces the cache */
  readonly id: string;
  /** Tile edge in pixels */
  readonly tileSize: number;
  readonly minZoom: number;
  readonly maxZoom: number;
  /** Extension used for files in the disk tier */
  readonly fileExtension: string;
  /**
   * Fetch one tile. Exactly one outbound request (or file read) per call.
   * Rejects with NotFoundError or FetchError.
   */
  fetchTile(address: TileAddress): Promise<Uint8Array>;
}

/** Turns fetched bytes into an image; throws on corrupt input */
export type TileDecoder = (data: Uint8Array) => TileImage;

/** Result of a tile lookup through the loader */
export type TileLookup =
  | { status: "ready"; image: TileImage }
  | { status: "pending" }
  | { status: "failed"; error: Error };

/** Outcome delivered to fetch-queue callbacks */
export type TileResult =
  | { ok: true; image: TileImage }
  | { ok: false; error: Error };

export type TileCallback = (
  result: TileResult,
  address: TileAddress,
  source: TileSource
) => void;
