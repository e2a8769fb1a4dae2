/**
 * Tile pipeline: sources, two-tier cache, fetch queue and loader.
 */

export type {
  TileImage,
  TileImageFormat,
  TileSource,
  TileDecoder,
  TileLookup,
  TileResult,
  TileCallback,
} from "./types";

export { TileError, DecodeError, FetchError, NotFoundError, CacheFullError, isRetryable } from "./errors";
export { decodeTileImage, sniffFormat } from "./decode";
export {
  RemoteTileSource,
  LocalTileSource,
  OSM_TILE_URL,
  expandTemplate,
  sourceIdFor,
  extensionFor,
  type TileSourceOptions,
  type RemoteTileSourceOptions,
} from "./sources";
export { DiskTileStore, isSafePathSegment, type DiskTileStoreOptions } from "./DiskTileStore";
export {
  TileCache,
  cacheKey,
  type TileCacheOptions,
  type TileCacheStats,
  type PutOptions,
  type PutOutcome,
} from "./TileCache";
export {
  FetchQueue,
  backoffDelay,
  type FetchQueueOptions,
  type FetchTicket,
  type RequestOptions,
} from "./FetchQueue";
export { TileLoader, type TileLoaderOptions, type ScheduleOptions } from "./TileLoader";
