/**
 * Disk tier of the tile cache.
 *
 * One immutable file per (source, z, x, y) at
 * `<directory>/<sourceId>/<z>/<x>/<y>.<ext>`, so a new process picks up a
 * warm cache. File mtime records the last access. The byte and age budgets
 * are enforced lazily after each write, oldest access first.
 */

import { mkdir, readdir, readFile, rename, rm, stat, utimes, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { TileAddress } from "../projection/types";
import { defaultLogger, type Logger } from "../log";

export interface DiskTileStoreOptions {
  directory: string;
  budgetBytes: number;
  maxAgeMs: number;
  logger?: Logger;
  /** Clock, for tests */
  now?: () => number;
}

interface DiskEntry {
  size: number;
  lastAccess: number;
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

async function* walk(dir: string): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
    if (errnoCode(error) === "ENOENT") return [];
    throw error;
  });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(path);
    } else if (entry.isFile()) {
      yield path;
    }
  }
}

/**
 * Whether a source id or extension can be used as one path segment under
 * the cache root.
 */
export function isSafePathSegment(segment: string): boolean {
  return segment !== "" && segment !== "." && segment !== ".." && !/[\\/\0]/.test(segment);
}

export class DiskTileStore {
  readonly directory: string;
  readonly budgetBytes: number;
  readonly maxAgeMs: number;

  private logger: Logger;
  private now: () => number;

  /** Absolute path -> entry; built from the directory on first use */
  private index: Map<string, DiskEntry> | null = null;
  private indexPromise: Promise<Map<string, DiskEntry>> | null = null;
  private totalBytes = 0;
  private evictChain: Promise<void> = Promise.resolve();
  private tmpCounter = 0;

  constructor(options: DiskTileStoreOptions) {
    this.directory = options.directory;
    this.budgetBytes = options.budgetBytes;
    this.maxAgeMs = options.maxAgeMs;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Deterministic location of a tile file
   *
   * @throws RangeError when the source id or extension would leave its directory
   */
  pathFor(sourceId: string, address: TileAddress, extension: string): string {
    if (!isSafePathSegment(sourceId) || !isSafePathSegment(extension)) {
      throw new RangeError(`Unsafe tile path segment: source "${sourceId}", extension "${extension}"`);
    }
    return join(
      this.directory,
      sourceId,
      String(address.z),
      String(address.x),
      `${address.y}.${extension}`
    );
  }

  /**
   * Read a tile. Missing and expired files are misses; a hit refreshes the
   * file's access time.
   */
  async read(sourceId: string, address: TileAddress, extension: string): Promise<Uint8Array | undefined> {
    const path = this.pathFor(sourceId, address, extension);

    let mtimeMs: number;
    try {
      mtimeMs = (await stat(path)).mtimeMs;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return undefined;
      throw error;
    }

    const now = this.now();
    if (now - mtimeMs > this.maxAgeMs) {
      await this.remove(path);
      return undefined;
    }

    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return undefined;
      throw error;
    }

    const touched = new Date(now);
    await utimes(path, touched, touched);
    const entry = this.index?.get(path);
    if (entry) entry.lastAccess = now;

    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }

  /**
   * Write a tile, then enforce the budgets. Writes go through a temporary
   * file so readers never see a partial tile.
   */
  async write(sourceId: string, address: TileAddress, extension: string, data: Uint8Array): Promise<void> {
    const index = await this.loadIndex();
    const path = this.pathFor(sourceId, address, extension);
    const tmpPath = `${path}.${process.pid}.${this.tmpCounter++}.tmp`;
    const now = this.now();

    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, data);
    await rename(tmpPath, path);
    const touched = new Date(now);
    await utimes(path, touched, touched);

    const previous = index.get(path);
    if (previous) this.totalBytes -= previous.size;
    index.set(path, { size: data.byteLength, lastAccess: now });
    this.totalBytes += data.byteLength;

    await this.evict();
  }

  /** Remove one tile */
  async delete(sourceId: string, address: TileAddress, extension: string): Promise<void> {
    await this.loadIndex();
    await this.remove(this.pathFor(sourceId, address, extension));
  }

  /** Whether a (non-expired) tile file exists */
  async has(sourceId: string, address: TileAddress, extension: string): Promise<boolean> {
    try {
      const { mtimeMs } = await stat(this.pathFor(sourceId, address, extension));
      return this.now() - mtimeMs <= this.maxAgeMs;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return false;
      throw error;
    }
  }

  /** Total bytes on disk */
  async size(): Promise<number> {
    await this.loadIndex();
    return this.totalBytes;
  }

  /** Number of tile files on disk */
  async count(): Promise<number> {
    return (await this.loadIndex()).size;
  }

  /** Delete every tile of every source */
  async clear(): Promise<void> {
    await rm(this.directory, { recursive: true, force: true });
    this.index = new Map();
    this.indexPromise = Promise.resolve(this.index);
    this.totalBytes = 0;
  }

  /**
   * Drop expired files, then the least recently accessed ones until the
   * byte budget holds. Runs are serialized.
   */
  evict(): Promise<void> {
    const run = this.evictChain.then(() => this.evictNow());
    this.evictChain = run.catch((error: unknown) => {
      this.logger.error("[DiskTileStore] Eviction failed:", error);
    });
    return run;
  }

  private async evictNow(): Promise<void> {
    const index = await this.loadIndex();
    const now = this.now();

    const expired = [...index].filter(([, entry]) => now - entry.lastAccess > this.maxAgeMs);
    for (const [path] of expired) {
      await this.remove(path);
    }
    if (this.totalBytes <= this.budgetBytes) return;

    const byAge = [...index].sort((a, b) => a[1].lastAccess - b[1].lastAccess);
    let removed = 0;
    for (const [path] of byAge) {
      if (this.totalBytes <= this.budgetBytes) break;
      await this.remove(path);
      removed++;
    }
    this.logger.debug(`[DiskTileStore] Evicted ${expired.length + removed} tiles`);
  }

  private async remove(path: string): Promise<void> {
    await rm(path, { force: true });
    const entry = this.index?.get(path);
    if (entry && this.index) {
      this.index.delete(path);
      this.totalBytes -= entry.size;
    }
  }

  private loadIndex(): Promise<Map<string, DiskEntry>> {
    if (this.index) return Promise.resolve(this.index);
    if (!this.indexPromise) {
      this.indexPromise = this.buildIndex().catch((error: unknown) => {
        this.indexPromise = null; // Allow retry on failure
        throw error;
      });
    }
    return this.indexPromise;
  }

  private async buildIndex(): Promise<Map<string, DiskEntry>> {
    const index = new Map<string, DiskEntry>();
    let total = 0;
    for await (const path of walk(this.directory)) {
      if (path.endsWith(".tmp")) {
        await rm(path, { force: true });
        continue;
      }
      try {
        const info = await stat(path);
        index.set(path, { size: info.size, lastAccess: info.mtimeMs });
        total += info.size;
      } catch (error) {
        if (errnoCode(error) !== "ENOENT") throw error;
      }
    }
    this.index = index;
    this.totalBytes = total;
    this.logger.debug(`[DiskTileStore] Indexed ${index.size} tiles (${total} bytes) in ${this.directory}`);
    return index;
  }
}
