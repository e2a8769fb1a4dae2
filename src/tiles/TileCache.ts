/**
 * Two-tier tile cache.
 *
 * The memory tier is a byte-bounded LRU of decoded tiles, mutated only from
 * the caller's context. The optional disk tier (DiskTileStore) keeps the
 * encoded bytes across restarts. Entries in the pinned set (the tiles
 * currently on screen) are never evicted from memory.
 */

import type { TileAddress } from "../projection/types";
import { tileToString } from "../projection/tileCoord";
import { defaultLogger, type Logger } from "../log";
import { decodeTileImage } from "./decode";
import type { DiskTileStore } from "./DiskTileStore";
import { CacheFullError } from "./errors";
import type { TileDecoder, TileImage, TileSource } from "./types";

export interface TileCacheOptions {
  memoryBudgetBytes: number;
  disk?: DiskTileStore | null;
  decode?: TileDecoder;
  logger?: Logger;
  now?: () => number;
}

export interface PutOptions {
  /** Also write to the disk tier (default true) */
  persist?: boolean;
}

/** Where a `put` left the image */
export type PutOutcome = "memory" | "disk-only";

export interface TileCacheStats {
  entries: number;
  memoryBytes: number;
  memoryBudgetBytes: number;
  pinned: number;
  pendingWrites: number;
}

interface CacheEntry {
  address: TileAddress;
  sourceId: string;
  image: TileImage;
  lastAccess: number;
  byteSize: number;
}

/** Cache key: source identity plus "z/x/y" */
export function cacheKey(sourceId: string, address: TileAddress): string {
  return `${sourceId}:${tileToString(address)}`;
}

export class TileCache {
  readonly memoryBudgetBytes: number;
  readonly disk: DiskTileStore | null;

  /** Map order is recency order: first entry is least recently used */
  private entries = new Map<string, CacheEntry>();
  private pinned = new Set<string>();
  private bytes = 0;
  private pendingWrites = new Set<Promise<void>>();

  private decode: TileDecoder;
  private logger: Logger;
  private now: () => number;

  constructor(options: TileCacheOptions) {
    this.memoryBudgetBytes = options.memoryBudgetBytes;
    this.disk = options.disk ?? null;
    this.decode = options.decode ?? decodeTileImage;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  /** Bytes currently held by the memory tier */
  get memoryBytes(): number {
    return this.bytes;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Memory-tier lookup. A hit refreshes the entry's recency.
   */
  get(address: TileAddress, source: TileSource): TileImage | undefined {
    const key = cacheKey(source.id, address);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.touch(key, entry);
    return entry.image;
  }

  /** Whether the memory tier holds the tile (does not refresh recency) */
  has(address: TileAddress, source: TileSource): boolean {
    return this.entries.has(cacheKey(source.id, address));
  }

  /**
   * Two-tier lookup: memory first, then disk. A disk hit is decoded and
   * promoted into memory. Corrupt disk files are deleted and reported as
   * misses.
   */
  async load(address: TileAddress, source: TileSource): Promise<TileImage | undefined> {
    const hit = this.get(address, source);
    if (hit) return hit;

    const data = await this.readPersisted(address, source);
    if (!data) return undefined;

    let image: TileImage;
    try {
      image = this.decode(data);
    } catch (error) {
      this.logger.warn(`[TileCache] Dropping corrupt disk tile ${cacheKey(source.id, address)}:`, error);
      await this.disk?.delete(source.id, address, source.fileExtension);
      return undefined;
    }
    this.put(address, source, image, { persist: false });
    return image;
  }

  /**
   * Read the encoded bytes from the disk tier without touching memory
   * state. Safe to call from a fetch job.
   */
  async readPersisted(address: TileAddress, source: TileSource): Promise<Uint8Array | undefined> {
    if (!this.disk) return undefined;
    return this.disk.read(source.id, address, source.fileExtension);
  }

  /**
   * Insert into memory (evicting unpinned LRU entries to stay within the
   * budget) and, unless `persist` is false, write to disk in the background.
   *
   * An image larger than the whole budget is kept on disk only. One that
   * cannot fit because the rest of memory is pinned is kept on disk only
   * unless it is pinned itself.
   */
  put(address: TileAddress, source: TileSource, image: TileImage, options: PutOptions = {}): PutOutcome {
    const key = cacheKey(source.id, address);
    if (options.persist ?? true) {
      this.persist(address, source, image);
    }

    this.remove(key);

    if (image.byteSize > this.memoryBudgetBytes) {
      this.logger.debug(
        `[TileCache] ${key} kept on disk only: ${image.byteSize} bytes exceeds the ${this.memoryBudgetBytes} byte budget`
      );
      return "disk-only";
    }

    try {
      this.makeRoom(image.byteSize);
    } catch (error) {
      if (!(error instanceof CacheFullError)) throw error;
      if (!this.pinned.has(key)) {
        this.logger.debug(`[TileCache] ${key} kept on disk only: ${error.message}`);
        return "disk-only";
      }
      // A pinned tile goes in over budget; everything unpinned goes out first
      this.evictUnpinned();
    }

    this.entries.set(key, {
      address,
      sourceId: source.id,
      image,
      lastAccess: this.now(),
      byteSize: image.byteSize,
    });
    this.bytes += image.byteSize;
    return "memory";
  }

  /** Remove one tile from both tiers */
  async delete(address: TileAddress, source: TileSource): Promise<void> {
    this.remove(cacheKey(source.id, address));
    await this.disk?.delete(source.id, address, source.fileExtension);
  }

  /**
   * Replace the pinned set. Pins are advisory: they are recomputed from the
   * visible tiles on every viewport change.
   */
  setPinned(keys: Iterable<string>): void {
    this.pinned = new Set(keys);
  }

  /** Pin exactly the given addresses of one source */
  pin(source: TileSource, addresses: Iterable<TileAddress>): void {
    const keys: string[] = [];
    for (const address of addresses) keys.push(cacheKey(source.id, address));
    this.setPinned(keys);
  }

  isPinned(address: TileAddress, source: TileSource): boolean {
    return this.pinned.has(cacheKey(source.id, address));
  }

  /** Wait for background disk writes started so far */
  async flush(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all(this.pendingWrites);
    }
  }

  /** Empty the memory tier (the disk tier is left alone) */
  clear(): void {
    this.entries.clear();
    this.bytes = 0;
  }

  stats(): TileCacheStats {
    return {
      entries: this.entries.size,
      memoryBytes: this.bytes,
      memoryBudgetBytes: this.memoryBudgetBytes,
      pinned: this.pinned.size,
      pendingWrites: this.pendingWrites.size,
    };
  }

  private touch(key: string, entry: CacheEntry): void {
    entry.lastAccess = this.now();
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private remove(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    this.entries.delete(key);
    this.bytes -= entry.byteSize;
  }

  /**
   * Evict unpinned entries, least recently used first, until `needed` more
   * bytes fit. Nothing is evicted when that is impossible.
   */
  private makeRoom(needed: number): void {
    if (this.bytes + needed <= this.memoryBudgetBytes) return;

    let evictable = 0;
    for (const [key, entry] of this.entries) {
      if (!this.pinned.has(key)) evictable += entry.byteSize;
    }
    if (this.bytes - evictable + needed > this.memoryBudgetBytes) {
      throw new CacheFullError(needed, this.memoryBudgetBytes);
    }

    for (const [key, entry] of this.entries) {
      if (this.bytes + needed <= this.memoryBudgetBytes) break;
      if (this.pinned.has(key)) continue;
      this.entries.delete(key);
      this.bytes -= entry.byteSize;
    }
  }

  private evictUnpinned(): void {
    for (const [key, entry] of this.entries) {
      if (this.pinned.has(key)) continue;
      this.entries.delete(key);
      this.bytes -= entry.byteSize;
    }
  }

  private persist(address: TileAddress, source: TileSource, image: TileImage): void {
    if (!this.disk) return;
    const write = this.disk
      .write(source.id, address, source.fileExtension, image.data)
      .catch((error: unknown) => {
        this.logger.error(`[TileCache] Failed to save tile ${cacheKey(source.id, address)}:`, error);
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }
}
