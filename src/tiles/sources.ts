/**
 * Tile sources: remote HTTP templates and local file-path templates.
 */

import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import type { TileAddress } from "../projection/types";
import { DEFAULT_TILE_SIZE } from "../projection/mercator";
import { DEFAULT_CONFIG } from "../config";
import { isSafePathSegment } from "./DiskTileStore";
import { FetchError, NotFoundError } from "./errors";
import type { TileSource } from "./types";

export const OSM_TILE_URL = "https://tile.openstreetmap.org/{z}/{x}/{y}.png";

const PLACEHOLDERS = ["{z}", "{x}", "{y}"] as const;

export interface TileSourceOptions {
  tileSize?: number;
  minZoom?: number;
  maxZoom?: number;
  /** Overrides the identity derived from the template */
  id?: string;
}

export interface RemoteTileSourceOptions extends TileSourceOptions {
  userAgent?: string;
  timeoutMs?: number;
}

/** Substitute an address into a template */
export function expandTemplate(template: string, address: TileAddress): string {
  return template
    .replaceAll("{z}", String(address.z))
    .replaceAll("{x}", String(address.x))
    .replaceAll("{y}", String(address.y));
}

function assertTemplate(template: string): void {
  const missing = PLACEHOLDERS.filter((p) => !template.includes(p));
  if (missing.length > 0) {
    throw new RangeError(`Tile template "${template}" is missing ${missing.join(", ")}`);
  }
}

function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9.-]+/g, "-")
    .replace(/^[-.]+|[-.]+$/g, "");
  return slug === "" ? "source" : slug.slice(0, 48);
}

/**
 * Derive a stable, collision-free identity for a template: a readable slug
 * (host name, or the first directory of a path) plus a digest of the full
 * template.
 */
export function sourceIdFor(template: string): string {
  let label: string;
  try {
    label = new URL(template).hostname || "local";
  } catch {
    label = template.split(/[\\/]/).find((part) => part !== "" && !part.includes("{")) ?? "local";
  }
  const digest = createHash("sha1").update(template).digest("hex").slice(0, 10);
  return `${slugify(label)}-${digest}`;
}

/** File extension of the tile path, or "tile" when the template has none */
export function extensionFor(template: string): string {
  const path = template.split("?")[0] ?? template;
  const match = /\{y\}\.([a-z0-9]{1,5})$/i.exec(path);
  return match?.[1]?.toLowerCase() ?? "tile";
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

abstract class TemplateTileSource implements TileSource {
  readonly id: string;
  readonly tileSize: number;
  readonly minZoom: number;
  readonly maxZoom: number;
  readonly fileExtension: string;
  readonly template: string;

  constructor(template: string, options: TileSourceOptions) {
    assertTemplate(template);
    this.template = template;
    if (options.id !== undefined && !isSafePathSegment(options.id)) {
      throw new RangeError(`Tile source id "${options.id}" must not be empty or contain path separators`);
    }
    this.id = options.id ?? sourceIdFor(template);
    this.tileSize = options.tileSize ?? DEFAULT_TILE_SIZE;
    this.minZoom = options.minZoom ?? 0;
    this.maxZoom = options.maxZoom ?? 19;
    this.fileExtension = extensionFor(template);
  }

  abstract fetchTile(address: TileAddress): Promise<Uint8Array>;
}

/**
 * Fetches tiles over HTTP with the runtime's `fetch`.
 */
export class RemoteTileSource extends TemplateTileSource {
  readonly userAgent: string;
  readonly timeoutMs: number;

  constructor(template: string = OSM_TILE_URL, options: RemoteTileSourceOptions = {}) {
    super(template, options);
    this.userAgent = options.userAgent ?? DEFAULT_CONFIG.userAgent;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.fetchTimeoutMs;
  }

  /** Resolve the URL for an address; a template that yields no valid URL is a missing tile */
  tileUrl(address: TileAddress): URL {
    const url = expandTemplate(this.template, address);
    try {
      return new URL(url);
    } catch (error) {
      throw new NotFoundError(`Malformed tile URL ${url}`, address, this.id, { cause: error });
    }
  }

  async fetchTile(address: TileAddress): Promise<Uint8Array> {
    const url = this.tileUrl(address);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "User-Agent": this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new FetchError(`Request for ${url.href} failed: ${describe(error)}`, address, this.id, {
        retryable: true,
        cause: error,
      });
    }

    if (response.status === 404 || response.status === 410) {
      throw new NotFoundError(`Tile not found: ${url.href} (${response.status})`, address, this.id);
    }
    if (!response.ok) {
      const retryable = response.status >= 500 || response.status === 429;
      throw new FetchError(`Tile request ${url.href} returned ${response.status}`, address, this.id, {
        retryable,
        status: response.status,
      });
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new FetchError(`Reading ${url.href} failed: ${describe(error)}`, address, this.id, {
        retryable: true,
        cause: error,
      });
    }
  }
}

/**
 * Reads tiles from a local directory tree, e.g. `/data/tiles/{z}/{x}/{y}.png`.
 */
export class LocalTileSource extends TemplateTileSource {
  constructor(template: string, options: TileSourceOptions = {}) {
    super(template, options);
  }

  tilePath(address: TileAddress): string {
    return expandTemplate(this.template, address);
  }

  async fetchTile(address: TileAddress): Promise<Uint8Array> {
    const path = this.tilePath(address);
    try {
      return new Uint8Array(await readFile(path));
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT" || code === "ENOTDIR") {
        throw new NotFoundError(`Tile file not found: ${path}`, address, this.id, { cause: error });
      }
      const retryable = code !== "EACCES" && code !== "EPERM" && code !== "EISDIR";
      throw new FetchError(`Reading ${path} failed: ${describe(error)}`, address, this.id, {
        retryable,
        cause: error,
      });
    }
  }
}
