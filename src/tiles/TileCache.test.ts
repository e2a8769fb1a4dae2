import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { TileAddress } from "../projection/types";
import { decodeTileImage } from "./decode";
import { DiskTileStore } from "./DiskTileStore";
import { TileCache, cacheKey } from "./TileCache";
import { FakeTileSource, makePng } from "./testing";
import type { TileImage } from "./types";

const silentLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

function image(byteSize: number): TileImage {
  return { format: "png", width: 256, height: 256, data: new Uint8Array(byteSize), byteSize };
}

const A: TileAddress = { z: 2, x: 0, y: 0 };
const B: TileAddress = { z: 2, x: 1, y: 0 };
const C: TileAddress = { z: 2, x: 2, y: 0 };
const D: TileAddress = { z: 2, x: 3, y: 0 };

describe("cacheKey", () => {
  it("namespaces the address by source", () => {
    expect(cacheKey("osm", { z: 3, x: 1, y: 2 })).toBe("osm:3/1/2");
  });
});

describe("TileCache (memory tier)", () => {
  const source = new FakeTileSource();

  function createCache(budget = 300): TileCache {
    return new TileCache({ memoryBudgetBytes: budget, logger: silentLogger });
  }

  it("returns what was put", () => {
    const cache = createCache();
    const img = image(100);

    expect(cache.put(A, source, img)).toBe("memory");
    expect(cache.get(A, source)).toBe(img);
    expect(cache.get(A, source)).toBe(img);
    expect(cache.stats()).toEqual({
      entries: 1,
      memoryBytes: 100,
      memoryBudgetBytes: 300,
      pinned: 0,
      pendingWrites: 0,
    });
  });

  it("keeps sources apart", () => {
    const cache = createCache();
    cache.put(A, source, image(100));
    expect(cache.get(A, new FakeTileSource({ id: "other" }))).toBeUndefined();
  });

  it("evicts the least recently used entry", () => {
    const cache = createCache();
    cache.put(A, source, image(100));
    cache.put(B, source, image(100));
    cache.put(C, source, image(100));
    cache.get(A, source);

    cache.put(D, source, image(100));

    expect(cache.has(A, source)).toBe(true);
    expect(cache.has(B, source)).toBe(false);
    expect(cache.has(C, source)).toBe(true);
    expect(cache.memoryBytes).toBe(300);
  });

  it("never evicts pinned entries", () => {
    const cache = createCache();
    cache.put(A, source, image(100));
    cache.put(B, source, image(100));
    cache.put(C, source, image(100));
    cache.pin(source, [A, B]);

    cache.put(D, source, image(100));

    expect(cache.has(A, source)).toBe(true);
    expect(cache.has(B, source)).toBe(true);
    expect(cache.has(C, source)).toBe(false);
    expect(cache.has(D, source)).toBe(true);
  });

  it("keeps an entry out of memory when everything resident is pinned", () => {
    const cache = createCache();
    cache.put(A, source, image(100));
    cache.put(B, source, image(100));
    cache.put(C, source, image(100));
    cache.pin(source, [A, B, C]);

    expect(cache.put(D, source, image(100))).toBe("disk-only");
    expect(cache.has(D, source)).toBe(false);
    expect(cache.memoryBytes).toBe(300);
  });

  it("admits a pinned entry over budget", () => {
    const cache = createCache();
    cache.put(A, source, image(100));
    cache.put(B, source, image(100));
    cache.put(C, source, image(100));
    cache.pin(source, [A, B, C, D]);

    expect(cache.put(D, source, image(100))).toBe("memory");
    expect(cache.memoryBytes).toBe(400);
  });

  it("evicts every unpinned entry before admitting a pinned one over budget", () => {
    const cache = createCache();
    cache.put(A, source, image(200));
    cache.put(B, source, image(100));
    cache.pin(source, [A, C]);

    expect(cache.put(C, source, image(150))).toBe("memory");
    expect(cache.has(B, source)).toBe(false);
    expect(cache.has(A, source)).toBe(true);
    expect(cache.memoryBytes).toBe(350);
  });

  it("keeps an entry larger than the budget on disk only", () => {
    const cache = createCache();
    cache.put(A, source, image(100));
    cache.pin(source, [B]);

    expect(cache.put(B, source, image(301))).toBe("disk-only");
    expect(cache.has(A, source)).toBe(true);
    expect(cache.memoryBytes).toBe(100);
  });

  it("stays within budget over any sequence of puts", () => {
    const cache = createCache(1000);
    for (let i = 0; i < 50; i++) {
      cache.put({ z: 6, x: i, y: i % 7 }, source, image(37 + ((i * 53) % 200)));
      expect(cache.memoryBytes).toBeLessThanOrEqual(1000);
    }
  });

  it("replaces an entry without double counting", () => {
    const cache = createCache();
    cache.put(A, source, image(100));
    cache.put(A, source, image(60));
    expect(cache.size).toBe(1);
    expect(cache.memoryBytes).toBe(60);
  });

  it("deletes and clears", async () => {
    const cache = createCache();
    cache.put(A, source, image(100));
    cache.put(B, source, image(100));

    await cache.delete(A, source);
    expect(cache.has(A, source)).toBe(false);
    expect(cache.memoryBytes).toBe(100);

    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.memoryBytes).toBe(0);
  });
});

describe("TileCache (disk tier)", () => {
  const source = new FakeTileSource({ id: "disk-src" });
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tiles-cache-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createCache(): TileCache {
    const disk = new DiskTileStore({
      directory: dir,
      budgetBytes: 1024 * 1024,
      maxAgeMs: 60_000,
      logger: silentLogger,
    });
    return new TileCache({ memoryBudgetBytes: 1024, disk, logger: silentLogger });
  }

  it("persists across instances and promotes on load", async () => {
    const first = createCache();
    first.put(A, source, decodeTileImage(makePng(256, 128)));
    await first.flush();

    const second = createCache();
    expect(second.get(A, source)).toBeUndefined();

    const loaded = await second.load(A, source);
    expect(loaded?.width).toBe(256);
    expect(loaded?.height).toBe(128);
    expect(second.get(A, source)).toBe(loaded);
  });

  it("writes an oversized entry to disk only", async () => {
    const cache = createCache();
    const big = decodeTileImage(makePng(256, 256, 2000));

    expect(cache.put(A, source, big)).toBe("disk-only");
    await cache.flush();

    expect(cache.has(A, source)).toBe(false);
    expect(await cache.disk?.has(source.id, A, "png")).toBe(true);
  });

  it("skips the disk when persist is false", async () => {
    const cache = createCache();
    cache.put(A, source, decodeTileImage(makePng(1, 1)), { persist: false });
    await cache.flush();

    expect(await cache.disk?.count()).toBe(0);
  });

  it("drops corrupt disk files", async () => {
    const cache = createCache();
    await cache.disk?.write(source.id, A, "png", new Uint8Array([1, 2, 3]));

    expect(await cache.load(A, source)).toBeUndefined();
    expect(await cache.disk?.has(source.id, A, "png")).toBe(false);
  });
});
