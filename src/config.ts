/**
 * Map core configuration: defaults and validation.
 */

export interface RetryConfig {
  /** Total attempts per task, including the first (>= 1) */
  maxAttempts: number;
  /** Delay before the second attempt; doubles each retry */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay */
  maxDelayMs: number;
}

export interface DiskCacheConfig {
  /** Root directory of the on-disk tile store */
  directory: string;
  /** Byte budget of the disk tier */
  budgetBytes: number;
  /** Files not accessed for this long are treated as misses and evicted */
  maxAgeMs: number;
}

/** Scheduling of prefetch-margin tiles relative to tiles inside the viewport */
export type PrefetchPriority = "equal" | "low";

export interface MapConfig {
  memoryBudgetBytes: number;
  /** On-disk tier; null keeps tiles in memory only */
  disk: DiskCacheConfig | null;
  maxConcurrentFetches: number;
  retry: RetryConfig;
  drainIntervalMs: number;
  minZoom: number;
  maxZoom: number;
  /** Extra ring of tiles fetched around the viewport */
  prefetchMargin: number;
  prefetchPriority: PrefetchPriority;
  /**
   * How long a failed address reports `failed` before it is requested again.
   * 0 holds the failure while the tile stays visible.
   */
  failureCooldownMs: number;
  fetchTimeoutMs: number;
  userAgent: string;
}

export type MapConfigInput = Partial<Omit<MapConfig, "retry" | "disk">> & {
  retry?: Partial<RetryConfig>;
  disk?: (Partial<DiskCacheConfig> & { directory: string }) | null;
};

const MiB = 1024 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 4000,
};

export const DEFAULT_DISK_BUDGET_BYTES = 512 * MiB;
export const DEFAULT_DISK_MAX_AGE_MS = 30 * DAY_MS;

export const DEFAULT_CONFIG: MapConfig = {
  memoryBudgetBytes: 64 * MiB,
  disk: null,
  maxConcurrentFetches: 4,
  retry: DEFAULT_RETRY,
  drainIntervalMs: 100,
  minZoom: 0,
  maxZoom: 19,
  prefetchMargin: 1,
  prefetchPriority: "equal",
  failureCooldownMs: 0,
  fetchTimeoutMs: 10_000,
  userAgent: "tilemap-core/0.1",
};

function requirePositive(name: string, value: number): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new RangeError(`${name} must be a positive number, got ${value}`);
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!(value >= 0) || !Number.isFinite(value)) {
    throw new RangeError(`${name} must be zero or positive, got ${value}`);
  }
}

/**
 * Merge a partial configuration over the defaults and validate it.
 *
 * @throws RangeError when a value is out of range
 */
export function resolveConfig(input: MapConfigInput = {}): MapConfig {
  const retry: RetryConfig = { ...DEFAULT_RETRY, ...input.retry };
  const disk: DiskCacheConfig | null = input.disk
    ? {
        budgetBytes: DEFAULT_DISK_BUDGET_BYTES,
        maxAgeMs: DEFAULT_DISK_MAX_AGE_MS,
        ...input.disk,
      }
    : null;

  const config: MapConfig = { ...DEFAULT_CONFIG, ...input, retry, disk };

  requirePositive("memoryBudgetBytes", config.memoryBudgetBytes);
  requirePositive("maxConcurrentFetches", config.maxConcurrentFetches);
  requirePositive("drainIntervalMs", config.drainIntervalMs);
  requirePositive("fetchTimeoutMs", config.fetchTimeoutMs);
  requireNonNegative("prefetchMargin", config.prefetchMargin);
  requireNonNegative("failureCooldownMs", config.failureCooldownMs);
  requireNonNegative("minZoom", config.minZoom);
  requireNonNegative("retry.baseDelayMs", retry.baseDelayMs);
  requireNonNegative("retry.maxDelayMs", retry.maxDelayMs);

  if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
    throw new RangeError(`retry.maxAttempts must be an integer >= 1, got ${retry.maxAttempts}`);
  }
  if (config.minZoom > config.maxZoom) {
    throw new RangeError(`minZoom (${config.minZoom}) is greater than maxZoom (${config.maxZoom})`);
  }
  if (disk) {
    requirePositive("disk.budgetBytes", disk.budgetBytes);
    requirePositive("disk.maxAgeMs", disk.maxAgeMs);
    if (disk.directory.trim() === "") {
      throw new RangeError("disk.directory must not be empty");
    }
  }

  return config;
}
