/**
 * Tile fetch-path errors.
 *
 * These never cross into the caller's context except as a failed tile:
 * they are delivered through completion callbacks and `failed` lookups.
 */

import type { TileAddress } from "../projection/types";
import { tileToString } from "../projection/tileCoord";

export class TileError extends Error {
  readonly address: TileAddress;
  readonly sourceId: string;

  constructor(message: string, address: TileAddress, sourceId: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TileError";
    this.address = address;
    this.sourceId = sourceId;
  }

  get tileKey(): string {
    return tileToString(this.address);
  }
}

/** Tile bytes could not be decoded. Never retried. */
export class DecodeError extends TileError {
  constructor(message: string, address: TileAddress, sourceId: string, options?: ErrorOptions) {
    super(message, address, sourceId, options);
    this.name = "DecodeError";
  }
}

/** Network, timeout or server failure. */
export class FetchError extends TileError {
  /** Whether another attempt could succeed */
  readonly retryable: boolean;
  /** HTTP status, when there was a response */
  readonly status?: number;
  /** Attempts made before giving up (set when the queue gives up) */
  attempts = 1;

  constructor(
    message: string,
    address: TileAddress,
    sourceId: string,
    details: { retryable: boolean; status?: number; cause?: unknown }
  ) {
    super(message, address, sourceId, { cause: details.cause });
    this.name = "FetchError";
    this.retryable = details.retryable;
    this.status = details.status;
  }
}

/** The tile does not exist (404, missing file, invalid address). Never retried. */
export class NotFoundError extends TileError {
  constructor(message: string, address: TileAddress, sourceId: string, options?: ErrorOptions) {
    super(message, address, sourceId, options);
    this.name = "NotFoundError";
  }
}

/**
 * Raised inside the cache when an entry cannot fit the memory budget even
 * after eviction. Resolved internally; `put` reports it as "disk-only".
 */
export class CacheFullError extends Error {
  readonly requiredBytes: number;
  readonly budgetBytes: number;

  constructor(requiredBytes: number, budgetBytes: number) {
    super(`Entry of ${requiredBytes} bytes does not fit a ${budgetBytes} byte budget`);
    this.name = "CacheFullError";
    this.requiredBytes = requiredBytes;
    this.budgetBytes = budgetBytes;
  }
}

/** Whether an error may be retried by the fetch queue. */
export function isRetryable(error: unknown): boolean {
  return error instanceof FetchError && error.retryable;
}
