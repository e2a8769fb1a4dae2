import { describe, it, expect, vi } from "vitest";
import { NotFoundError } from "../tiles/errors";
import { FakeTileSource, makePng } from "../tiles/testing";
import { TileLoader } from "../tiles/TileLoader";
import { Viewport } from "../Viewport";
import { TileLayer } from "./TileLayer";

function setup(options: { prefetchMargin?: number; failing?: string } = {}) {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const loader = new TileLoader({ logger });
  const source = new FakeTileSource({
    respond: (address) => {
      if (`${address.z}/${address.x}/${address.y}` === options.failing) {
        throw new NotFoundError("missing", address, "fake");
      }
      return makePng(256, 256);
    },
  });
  const viewport = new Viewport({
    width: 512,
    height: 512,
    center: { lon: 0, lat: 0 },
    zoom: 2,
    prefetchMargin: options.prefetchMargin ?? 0,
  });
  return { loader, source, viewport, layer: new TileLayer(loader, source) };
}

async function settle(loader: TileLoader): Promise<void> {
  await loader.queue.whenIdle();
  loader.drainCompleted();
}

describe("TileLayer", () => {
  it("schedules missing tiles and draws them once loaded", async () => {
    const { loader, source, viewport, layer } = setup();

    expect(layer.render(viewport)).toEqual([]);
    await settle(loader);
    expect(source.calls).toEqual(["2/1/1", "2/2/1", "2/1/2", "2/2/2"]);

    const items = layer.render(viewport);
    expect(items.map((item) => (item.kind === "tile" ? item.rect : null))).toEqual([
      { x: 0, y: 0, width: 256, height: 256 },
      { x: 256, y: 0, width: 256, height: 256 },
      { x: 0, y: 256, width: 256, height: 256 },
      { x: 256, y: 256, width: 256, height: 256 },
    ]);
    expect(items.every((item) => item.layer === "BaseMap")).toBe(true);
    expect(source.calls).toHaveLength(4);
  });

  it("fetches the margin but draws only the viewport", async () => {
    const { loader, source, viewport, layer } = setup({ prefetchMargin: 1 });

    layer.render(viewport);
    await settle(loader);

    expect(source.calls).toHaveLength(16);
    expect(layer.render(viewport)).toHaveLength(4);
  });

  it("pins what it shows", async () => {
    const { loader, source, viewport, layer } = setup();
    layer.render(viewport);

    expect(loader.cache.isPinned({ z: 2, x: 1, y: 1 }, source)).toBe(true);
    expect(loader.cache.isPinned({ z: 2, x: 0, y: 0 }, source)).toBe(false);
    await settle(loader);
  });

  it("draws a placeholder for a failed tile", async () => {
    const { loader, source, viewport, layer } = setup({ failing: "2/2/1" });

    layer.render(viewport);
    await settle(loader);
    const items = layer.render(viewport);

    expect(items.map((item) => item.kind)).toEqual(["tile", "placeholder", "tile", "tile"]);
    const placeholder = items[1];
    expect(placeholder?.kind === "placeholder" && placeholder.error).toBeInstanceOf(NotFoundError);

    layer.render(viewport);
    await settle(loader);
    expect(source.callsFor({ z: 2, x: 2, y: 1 })).toBe(1);
  });

  it("shares a loader with another tile layer", async () => {
    const onTileLoaded = vi.fn();
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const loader = new TileLoader({ logger, onTileLoaded });
    const base = new TileLayer(loader, new FakeTileSource({ id: "base" }));
    const overlay = new TileLayer(loader, new FakeTileSource({ id: "overlay" }), "Overlay");
    const viewport = new Viewport({ width: 512, height: 512, zoom: 2, prefetchMargin: 0 });

    base.render(viewport);
    overlay.render(viewport);
    await settle(loader);

    expect(onTileLoaded).toHaveBeenCalledTimes(8);
    expect(loader.cache.isPinned({ z: 2, x: 1, y: 1 }, base.source)).toBe(true);
    expect(loader.cache.isPinned({ z: 2, x: 1, y: 1 }, overlay.source)).toBe(true);
    expect(base.render(viewport)).toHaveLength(4);
    expect(overlay.render(viewport)).toHaveLength(4);
  });

  it("draws nothing when hidden", () => {
    const { source, viewport, layer } = setup();
    layer.hide();
    expect(layer.render(viewport)).toEqual([]);
    expect(source.calls).toEqual([]);
  });
});
