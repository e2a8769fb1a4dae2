/**
 * Tile loading for the map widget.
 *
 * Owns one TileCache and one FetchQueue. The caller (the widget's event
 * loop) asks for tiles every frame with `getOrSchedule`, which never blocks,
 * and periodically calls `drainCompleted` to apply finished fetches.
 */

import type { TileAddress } from "../projection/types";
import { isValidTile, tileToString } from "../projection/tileCoord";
import { resolveConfig, type MapConfig, type MapConfigInput } from "../config";
import { defaultLogger, type Logger } from "../log";
import { DiskTileStore } from "./DiskTileStore";
import { NotFoundError } from "./errors";
import { FetchQueue, type FetchTicket } from "./FetchQueue";
import { RemoteTileSource, OSM_TILE_URL, type RemoteTileSourceOptions } from "./sources";
import { TileCache, cacheKey } from "./TileCache";
import type { TileCallback, TileDecoder, TileLookup, TileResult, TileSource } from "./types";

export interface TileLoaderOptions extends MapConfigInput {
  logger?: Logger;
  decode?: TileDecoder;
  /** Clock for the failure cooldown and the caches */
  now?: () => number;
  /** Backoff timer passed to the fetch queue */
  sleep?: (ms: number) => Promise<void>;
  /** Called in the caller's context when a requested tile lands in the cache */
  onTileLoaded?: (address: TileAddress, source: TileSource) => void;
  /** Called in the caller's context when a requested tile fails for good */
  onTileFailed?: (address: TileAddress, source: TileSource, error: Error) => void;
}

export interface ScheduleOptions {
  /** The tile lies in the prefetch margin */
  prefetch?: boolean;
  /** Extra completion callback for this caller */
  onComplete?: TileCallback;
}

interface FailedEntry {
  sourceId: string;
  error: Error;
  retryAfter: number;
}

interface HeldTickets {
  sourceId: string;
  tickets: FetchTicket[];
}

export class TileLoader {
  readonly config: MapConfig;
  readonly cache: TileCache;
  readonly queue: FetchQueue;

  onTileLoaded?: (address: TileAddress, source: TileSource) => void;
  onTileFailed?: (address: TileAddress, source: TileSource, error: Error) => void;

  private logger: Logger;
  private now: () => number;

  /** Callbacks this loader holds on live tasks, by cache key */
  private tickets = new Map<string, HeldTickets>();

  /** Visible cache keys, per source id */
  private visible = new Map<string, Set<string>>();

  /** Failed tiles, held for the cooldown or while they stay visible */
  private failed = new Map<string, FailedEntry>();

  private drainTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: TileLoaderOptions = {}) {
    this.config = resolveConfig(options);
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
    this.onTileLoaded = options.onTileLoaded;
    this.onTileFailed = options.onTileFailed;

    const disk = this.config.disk
      ? new DiskTileStore({ ...this.config.disk, logger: this.logger, now: this.now })
      : null;
    this.cache = new TileCache({
      memoryBudgetBytes: this.config.memoryBudgetBytes,
      disk,
      decode: options.decode,
      logger: this.logger,
      now: this.now,
    });
    this.queue = new FetchQueue({
      cache: this.cache,
      maxConcurrentFetches: this.config.maxConcurrentFetches,
      retry: this.config.retry,
      prefetchPriority: this.config.prefetchPriority,
      decode: options.decode,
      logger: this.logger,
      sleep: options.sleep,
    });
  }

  /**
   * Non-blocking lookup. Returns the cached image, or schedules a fetch and
   * reports `pending`. An address outside the grid, or outside the zoom
   * range both the source and the configuration allow, fails with
   * NotFoundError without any fetch.
   */
  getOrSchedule(address: TileAddress, source: TileSource, options: ScheduleOptions = {}): TileLookup {
    const minZoom = Math.max(source.minZoom, this.config.minZoom);
    const maxZoom = Math.min(source.maxZoom, this.config.maxZoom);
    if (!isValidTile(address) || address.z < minZoom || address.z > maxZoom) {
      return {
        status: "failed",
        error: new NotFoundError(
          `Tile ${tileToString(address)} is outside ${source.id} (zoom ${minZoom}-${maxZoom})`,
          address,
          source.id
        ),
      };
    }

    const image = this.cache.get(address, source);
    if (image) return { status: "ready", image };

    const key = cacheKey(source.id, address);
    const failure = this.failedRecently(key);
    if (failure) return { status: "failed", error: failure };

    const prefetch = options.prefetch ?? false;
    const held = this.tickets.get(key);
    const tickets = held?.tickets ?? [];
    if (!held) {
      tickets.push(
        this.queue.request(address, source, (result) => this.handleResult(key, result, address, source), {
          prefetch,
        })
      );
      this.tickets.set(key, { sourceId: source.id, tickets });
    }
    if (options.onComplete) {
      tickets.push(this.queue.request(address, source, options.onComplete, { prefetch }));
    }
    return { status: "pending" };
  }

  /**
   * Apply up to `maxItems` finished fetches: populate the cache and run
   * callbacks. Must be called from the caller's context.
   *
   * @returns Number of fetches applied
   */
  drainCompleted(maxItems: number = Infinity): number {
    return this.queue.drain(maxItems);
  }

  /**
   * Tell the loader which tiles of a source are on screen, replacing that
   * source's previous set. Visible tiles of every source are pinned in
   * memory. For tiles of this source that left the set, callbacks are
   * cancelled (their fetches still complete and populate the cache) and
   * held failures are forgotten, so they are fetched again when they
   * come back.
   */
  updateVisible(source: TileSource, addresses: Iterable<TileAddress>): void {
    const keys = new Set<string>();
    for (const address of addresses) keys.add(cacheKey(source.id, address));
    if (keys.size > 0) {
      this.visible.set(source.id, keys);
    } else {
      this.visible.delete(source.id);
    }
    this.cache.setPinned(this.pinnedKeys());

    for (const [key, held] of this.tickets) {
      if (held.sourceId !== source.id || keys.has(key)) continue;
      for (const ticket of held.tickets) ticket.cancel();
      this.tickets.delete(key);
    }
    for (const [key, entry] of this.failed) {
      if (entry.sourceId === source.id && !keys.has(key)) this.failed.delete(key);
    }
  }

  /**
   * A remote source carrying this loader's `userAgent` and `fetchTimeoutMs`
   * unless `options` overrides them.
   */
  remoteSource(template: string = OSM_TILE_URL, options: RemoteTileSourceOptions = {}): RemoteTileSource {
    return new RemoteTileSource(template, {
      userAgent: this.config.userAgent,
      timeoutMs: this.config.fetchTimeoutMs,
      ...options,
    });
  }

  /** Drain the completion channel every `intervalMs` until stopped */
  startProcessing(intervalMs: number = this.config.drainIntervalMs, maxItemsPerDrain: number = Infinity): void {
    this.stopProcessing();
    this.drainTimer = setInterval(() => {
      this.drainCompleted(maxItemsPerDrain);
    }, intervalMs);
  }

  stopProcessing(): void {
    if (this.drainTimer !== null) {
      clearInterval(this.drainTimer);
      this.drainTimer = null;
    }
  }

  get isProcessing(): boolean {
    return this.drainTimer !== null;
  }

  /** Stop draining, drop queued work and wait for disk writes to finish */
  async shutdown(): Promise<void> {
    this.stopProcessing();
    this.queue.shutdown();
    for (const held of this.tickets.values()) {
      for (const ticket of held.tickets) ticket.cancel();
    }
    this.tickets.clear();
    await this.queue.whenIdle();
    await this.cache.flush();
  }

  private pinnedKeys(): Set<string> {
    const keys = new Set<string>();
    for (const sourceKeys of this.visible.values()) {
      for (const key of sourceKeys) keys.add(key);
    }
    return keys;
  }

  private failedRecently(key: string): Error | undefined {
    const entry = this.failed.get(key);
    if (!entry) return undefined;
    if (this.now() < entry.retryAfter) return entry.error;
    // Clean up expired failure entry
    this.failed.delete(key);
    return undefined;
  }

  private handleResult(key: string, result: TileResult, address: TileAddress, source: TileSource): void {
    this.tickets.delete(key);
    if (result.ok) {
      this.failed.delete(key);
      this.onTileLoaded?.(address, source);
      return;
    }

    // Without a cooldown a failure is held only while the tile stays visible
    const cooldown = this.config.failureCooldownMs;
    if (cooldown > 0) {
      this.failed.set(key, { sourceId: source.id, error: result.error, retryAfter: this.now() + cooldown });
    } else if (this.visible.get(source.id)?.has(key)) {
      this.failed.set(key, { sourceId: source.id, error: result.error, retryAfter: Infinity });
    }
    this.logger.debug(`[TileLoader] Tile ${key} failed: ${result.error.message}`);
    this.onTileFailed?.(address, source, result.error);
  }
}
