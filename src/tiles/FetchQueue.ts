/**
 * Fetch Queue
 *
 * Turns cache misses into tile fetches without blocking the caller:
 * - one live task per (source, address); later requests attach to it
 * - at most `maxConcurrentFetches` jobs in flight, the rest wait in FIFO order
 * - transient failures retry with capped exponential backoff
 * - jobs never touch cache state; finished results wait in a hand-off
 *   channel until `drain` moves them into the caller's context, where the
 *   cache is populated and callbacks run in attachment order
 */

import { setTimeout as delay } from "node:timers/promises";
import type { TileAddress } from "../projection/types";
import { tileToString } from "../projection/tileCoord";
import { DEFAULT_RETRY, type PrefetchPriority, type RetryConfig } from "../config";
import { defaultLogger, type Logger } from "../log";
import { decodeTileImage } from "./decode";
import { DecodeError, FetchError, TileError, isRetryable } from "./errors";
import { cacheKey, type TileCache } from "./TileCache";
import type { TileCallback, TileDecoder, TileImage, TileResult, TileSource } from "./types";

export interface FetchQueueOptions {
  cache: TileCache;
  maxConcurrentFetches?: number;
  retry?: Partial<RetryConfig>;
  prefetchPriority?: PrefetchPriority;
  decode?: TileDecoder;
  logger?: Logger;
  /** Backoff timer, for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface RequestOptions {
  /** The tile lies in the prefetch margin rather than the viewport */
  prefetch?: boolean;
}

/** Handle for one attached callback */
export interface FetchTicket {
  readonly key: string;
  readonly cancelled: boolean;
  /** Turn the callback into a no-op. The fetch itself keeps running. */
  cancel(): void;
}

interface Subscriber {
  callback: TileCallback;
  active: boolean;
}

interface FetchTask {
  key: string;
  address: TileAddress;
  source: TileSource;
  subscribers: Subscriber[];
  prefetch: boolean;
  state: "waiting" | "running" | "done";
}

type JobResult =
  | { ok: true; image: TileImage; fromDisk: boolean }
  | { ok: false; error: Error };

interface CompletedFetch {
  task: FetchTask;
  result: JobResult;
}

/**
 * Delay before the attempt that follows `attempt` (1-based):
 * `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`.
 */
export function backoffDelay(attempt: number, retry: RetryConfig): number {
  return Math.min(retry.maxDelayMs, retry.baseDelayMs * Math.pow(2, attempt - 1));
}

export class FetchQueue {
  readonly maxConcurrentFetches: number;
  readonly retry: RetryConfig;
  readonly prefetchPriority: PrefetchPriority;

  private cache: TileCache;
  private decode: TileDecoder;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;

  /** Live tasks by key; a task leaves this map in the drain that resolves it */
  private tasks = new Map<string, FetchTask>();
  private waiting: FetchTask[] = [];
  /** Prefetch tasks, only used when prefetchPriority is "low" */
  private waitingPrefetch: FetchTask[] = [];
  private running = new Set<Promise<void>>();
  private completed: CompletedFetch[] = [];
  private closed = false;

  constructor(options: FetchQueueOptions) {
    this.cache = options.cache;
    this.maxConcurrentFetches = options.maxConcurrentFetches ?? 4;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.prefetchPriority = options.prefetchPriority ?? "equal";
    this.decode = options.decode ?? decodeTileImage;
    this.logger = options.logger ?? defaultLogger;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /** Live tasks (waiting, running, or finished but not yet drained) */
  get pendingCount(): number {
    return this.tasks.size;
  }

  /** Jobs in flight */
  get activeCount(): number {
    return this.running.size;
  }

  /** Tasks not yet started */
  get waitingCount(): number {
    return this.waiting.length + this.waitingPrefetch.length;
  }

  /** Finished results waiting for a drain */
  get completedCount(): number {
    return this.completed.length;
  }

  /** Whether a live task exists for the tile */
  isPending(address: TileAddress, source: TileSource): boolean {
    return this.tasks.has(cacheKey(source.id, address));
  }

  /**
   * Ask for a tile. Attaches to the live task for the key when there is one,
   * otherwise creates and enqueues a task. Returns immediately.
   */
  request(
    address: TileAddress,
    source: TileSource,
    onComplete: TileCallback,
    options: RequestOptions = {}
  ): FetchTicket {
    const key = cacheKey(source.id, address);
    const subscriber: Subscriber = { callback: onComplete, active: !this.closed };
    const ticket: FetchTicket = {
      key,
      get cancelled() {
        return !subscriber.active;
      },
      cancel() {
        subscriber.active = false;
      },
    };
    if (this.closed) return ticket;

    const prefetch = options.prefetch ?? false;
    const existing = this.tasks.get(key);
    if (existing) {
      existing.subscribers.push(subscriber);
      if (!prefetch && existing.prefetch) this.promote(existing);
      return ticket;
    }

    const task: FetchTask = {
      key,
      address,
      source,
      subscribers: [subscriber],
      prefetch,
      state: "waiting",
    };
    this.tasks.set(key, task);
    if (prefetch && this.prefetchPriority === "low") {
      this.waitingPrefetch.push(task);
    } else {
      this.waiting.push(task);
    }
    this.pump();
    return ticket;
  }

  /**
   * Move up to `maxItems` finished results into the caller's context:
   * populate the cache, then run every live callback of the task once, in
   * attachment order.
   *
   * @returns Number of tasks resolved
   */
  drain(maxItems: number = Infinity): number {
    let handled = 0;
    while (handled < maxItems) {
      const next = this.completed.shift();
      if (!next) break;
      handled++;
      this.resolve(next);
    }
    return handled;
  }

  /** Resolves once no job is in flight */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }

  /**
   * Stop accepting work: waiting tasks are dropped, callbacks are silenced
   * and results of jobs still in flight are discarded.
   */
  shutdown(): void {
    this.closed = true;
    for (const task of this.tasks.values()) {
      for (const subscriber of task.subscribers) subscriber.active = false;
    }
    this.tasks.clear();
    this.waiting = [];
    this.waitingPrefetch = [];
    this.completed = [];
  }

  private promote(task: FetchTask): void {
    task.prefetch = false;
    const index = this.waitingPrefetch.indexOf(task);
    if (index === -1) return;
    this.waitingPrefetch.splice(index, 1);
    this.waiting.push(task);
    this.pump();
  }

  /** Start waiting tasks while there are free slots */
  private pump(): void {
    while (!this.closed && this.running.size < this.maxConcurrentFetches) {
      const task = this.waiting.shift() ?? this.waitingPrefetch.shift();
      if (!task) return;
      this.start(task);
    }
  }

  private start(task: FetchTask): void {
    task.state = "running";
    const job: Promise<void> = this.execute(task)
      .catch((error: unknown): JobResult => {
        this.logger.error(`[FetchQueue] Job for ${task.key} failed unexpectedly:`, error);
        return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
      })
      .then((result) => {
        if (!this.closed) this.completed.push({ task, result });
      })
      .finally(() => {
        this.running.delete(job);
        this.pump();
      });
    this.running.add(job);
  }

  /** One task: disk tier, then the source with retries */
  private async execute(task: FetchTask): Promise<JobResult> {
    const { address, source } = task;
    const label = `${source.id}:${tileToString(address)}`;

    const persisted = await this.cache.readPersisted(address, source).catch((error: unknown) => {
      this.logger.warn(`[FetchQueue] Disk read failed for ${label}:`, error);
      return undefined;
    });
    if (persisted) {
      try {
        return { ok: true, image: this.decode(persisted), fromDisk: true };
      } catch (error) {
        this.logger.warn(`[FetchQueue] Corrupt disk tile ${label}, fetching again:`, error);
      }
    }

    for (let attempt = 1; ; attempt++) {
      let data: Uint8Array;
      try {
        data = await source.fetchTile(address);
      } catch (error) {
        const failure = this.classify(error, task);
        if (!isRetryable(failure) || attempt >= this.retry.maxAttempts) {
          if (failure instanceof FetchError) failure.attempts = attempt;
          this.logger.warn(`[FetchQueue] Error loading tile ${label} after ${attempt} attempt(s): ${failure.message}`);
          return { ok: false, error: failure };
        }
        const wait = backoffDelay(attempt, this.retry);
        this.logger.warn(`[FetchQueue] Retrying tile ${label} in ${wait}ms: ${failure.message}`);
        await this.sleep(wait);
        continue;
      }

      try {
        return { ok: true, image: this.decode(data), fromDisk: false };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`[FetchQueue] Could not decode tile ${label}: ${message}`);
        return {
          ok: false,
          error: new DecodeError(`Could not decode tile ${label}: ${message}`, address, source.id, { cause: error }),
        };
      }
    }
  }

  /** Errors from custom sources that are not TileErrors count as transient */
  private classify(error: unknown, task: FetchTask): TileError {
    if (error instanceof TileError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new FetchError(message, task.address, task.source.id, { retryable: true, cause: error });
  }

  private resolve({ task, result }: CompletedFetch): void {
    this.tasks.delete(task.key);
    task.state = "done";

    let outcome: TileResult;
    if (result.ok) {
      this.cache.put(task.address, task.source, result.image, { persist: !result.fromDisk });
      outcome = { ok: true, image: result.image };
    } else {
      outcome = { ok: false, error: result.error };
    }

    for (const subscriber of task.subscribers) {
      if (!subscriber.active) continue;
      subscriber.active = false;
      try {
        subscriber.callback(outcome, task.address, task.source);
      } catch (error) {
        this.logger.error(`[FetchQueue] Tile callback for ${task.key} threw:`, error);
      }
    }
  }
}
