import { describe, it, expect, vi } from "vitest";
import { resolveConfig } from "./config";
import { Viewport } from "./Viewport";
import { MAX_LATITUDE } from "./projection";

describe("Viewport", () => {
  describe("construction", () => {
    it("clamps zoom into the source's range", () => {
      const source = { minZoom: 2, maxZoom: 10, tileSize: 512 };
      const v = new Viewport({ width: 800, height: 600, zoom: 14, source });
      expect(v.zoom).toBe(10);
      expect(v.tileSize).toBe(512);
      expect(new Viewport({ width: 800, height: 600, source }).zoom).toBe(2);
    });

    it("takes zoom range and margin from a configuration", () => {
      const config = resolveConfig({ minZoom: 1, maxZoom: 5, prefetchMargin: 0 });
      const source = { minZoom: 0, maxZoom: 10, tileSize: 256 };

      expect(new Viewport({ width: 512, height: 512, zoom: 14, config, source }).zoom).toBe(5);
      expect(new Viewport({ width: 512, height: 512, config, source }).zoom).toBe(1);
      expect(new Viewport({ width: 512, height: 512, zoom: 2, config }).visibleTiles()).toHaveLength(4);
    });

    it("normalizes the center", () => {
      const v = new Viewport({ width: 100, height: 100, center: { lon: 190, lat: 89 } });
      expect(v.center.lon).toBeCloseTo(-170, 9);
      expect(v.center.lat).toBe(MAX_LATITUDE);
    });
  });

  describe("tileZoom", () => {
    it("rounds to the nearest level", () => {
      expect(new Viewport({ width: 1, height: 1, zoom: 5.4 }).tileZoom()).toBe(5);
      expect(new Viewport({ width: 1, height: 1, zoom: 5.5 }).tileZoom()).toBe(6);
    });
  });

  describe("visibleTiles", () => {
    it("covers a 512x512 view at zoom 2 with a 2x2 grid", () => {
      const v = new Viewport({ width: 512, height: 512, center: { lon: 0, lat: 0 }, zoom: 2, prefetchMargin: 0 });

      expect(v.visibleTiles()).toEqual([
        { address: { z: 2, x: 1, y: 1 }, rect: { x: 0, y: 0, width: 256, height: 256 }, prefetch: false },
        { address: { z: 2, x: 2, y: 1 }, rect: { x: 256, y: 0, width: 256, height: 256 }, prefetch: false },
        { address: { z: 2, x: 1, y: 2 }, rect: { x: 0, y: 256, width: 256, height: 256 }, prefetch: false },
        { address: { z: 2, x: 2, y: 2 }, rect: { x: 256, y: 256, width: 256, height: 256 }, prefetch: false },
      ]);
    });

    it("adds a prefetch ring", () => {
      const v = new Viewport({ width: 512, height: 512, center: { lon: 0, lat: 0 }, zoom: 2 });
      const tiles = v.visibleTiles();

      expect(tiles).toHaveLength(16);
      expect(tiles.filter((t) => !t.prefetch).map((t) => `${t.address.x}/${t.address.y}`)).toEqual([
        "1/1",
        "2/1",
        "1/2",
        "2/2",
      ]);
      expect(tiles[0]).toEqual({
        address: { z: 2, x: 0, y: 0 },
        rect: { x: -256, y: -256, width: 256, height: 256 },
        prefetch: true,
      });
    });

    it("tiles the viewport without gaps at fractional zoom", () => {
      const v = new Viewport({
        width: 800,
        height: 600,
        center: { lon: 13.4, lat: 52.5 },
        zoom: 9.3,
        prefetchMargin: 0,
      });
      const tiles = v.visibleTiles();
      expect(tiles.every((t) => t.address.z === 9)).toBe(true);

      const rows = new Map<number, typeof tiles>();
      for (const t of tiles) rows.set(t.rect.y, [...(rows.get(t.rect.y) ?? []), t]);

      const ys = [...rows.keys()].sort((a, b) => a - b);
      expect(ys[0]).toBeLessThanOrEqual(0);
      for (const [i, y] of ys.entries()) {
        const row = rows.get(y) ?? [];
        const height = row[0]?.rect.height ?? 0;
        const next = ys[i + 1];
        if (next !== undefined) expect(y + height).toBe(next);
        else expect(y + height).toBeGreaterThanOrEqual(600);

        const xs = row.map((t) => t.rect).sort((a, b) => a.x - b.x);
        expect(xs[0]?.x).toBeLessThanOrEqual(0);
        for (let j = 1; j < xs.length; j++) {
          const prev = xs[j - 1];
          expect(prev && prev.x + prev.width).toBe(xs[j]?.x);
        }
        const last = xs[xs.length - 1];
        expect(last && last.x + last.width).toBeGreaterThanOrEqual(800);
      }
    });

    it("is deterministic", () => {
      const options = { width: 640, height: 480, center: { lon: -73.98, lat: 40.75 }, zoom: 11.7 };
      expect(new Viewport(options).visibleTiles()).toEqual(new Viewport(options).visibleTiles());
    });

    it("wraps columns across the antimeridian", () => {
      const v = new Viewport({ width: 512, height: 256, center: { lon: 180, lat: 0 }, zoom: 1, prefetchMargin: 0 });
      expect(v.visibleTiles().map((t) => t.address.x)).toEqual([1, 0, 1, 0]);
    });

    it("skips rows outside the world", () => {
      const v = new Viewport({ width: 256, height: 1024, center: { lon: 0, lat: 0 }, zoom: 0, prefetchMargin: 0 });
      expect(v.visibleTiles()).toEqual([
        { address: { z: 0, x: 0, y: 0 }, rect: { x: 0, y: 384, width: 256, height: 256 }, prefetch: false },
      ]);
    });
  });

  describe("pan", () => {
    it("moves the center against the drag", () => {
      const v = new Viewport({ width: 512, height: 512, center: { lon: 0, lat: 0 }, zoom: 1 });
      v.pan(128, 0);
      expect(v.center).toEqual({ lon: -90, lat: 0 });
    });

    it("wraps longitude", () => {
      const v = new Viewport({ width: 256, height: 256, center: { lon: 170, lat: 0 }, zoom: 0 });
      v.pan((-256 * 20) / 360, 0);
      expect(v.center.lon).toBeCloseTo(-170, 6);
    });

    it("clamps latitude", () => {
      const v = new Viewport({ width: 256, height: 256, center: { lon: 0, lat: 80 }, zoom: 0 });
      v.pan(0, 1000);
      expect(v.center.lat).toBe(MAX_LATITUDE);
    });
  });

  describe("zoomTo", () => {
    it("keeps the point under the anchor in place", () => {
      const v = new Viewport({ width: 800, height: 600, center: { lon: 10, lat: 20 }, zoom: 3 });
      const anchor = { x: 100, y: 450 };
      const before = v.screenToLonLat(anchor);

      v.zoomTo(5.5, anchor);

      const after = v.screenToLonLat(anchor);
      expect(v.zoom).toBe(5.5);
      expect(after.lon).toBeCloseTo(before.lon, 6);
      expect(after.lat).toBeCloseTo(before.lat, 6);
    });

    it("keeps the anchor when zooming out", () => {
      const v = new Viewport({ width: 800, height: 600, center: { lon: -3.7, lat: 40.4 }, zoom: 12 });
      const anchor = { x: 700, y: 20 };
      const before = v.screenToLonLat(anchor);

      v.zoomOut(anchor);

      const after = v.screenToLonLat(anchor);
      expect(after.lon).toBeCloseTo(before.lon, 6);
      expect(after.lat).toBeCloseTo(before.lat, 6);
    });

    it("zooms around the center by default", () => {
      const v = new Viewport({ width: 800, height: 600, center: { lon: 2.35, lat: 48.85 }, zoom: 4 });
      v.zoomIn();
      expect(v.zoom).toBe(5);
      expect(v.center.lon).toBeCloseTo(2.35, 9);
      expect(v.center.lat).toBeCloseTo(48.85, 9);
    });

    it("clamps to the zoom range", () => {
      const v = new Viewport({ width: 800, height: 600, zoom: 3, maxZoom: 18 });
      v.zoomTo(25);
      expect(v.zoom).toBe(18);
      v.zoomBy(-40);
      expect(v.zoom).toBe(0);
    });
  });

  describe("inertial zoom", () => {
    it("applies velocity per frame and stops on request", () => {
      const v = new Viewport({ width: 800, height: 600, zoom: 3 });
      v.addZoomVelocity(0.1);
      expect(v.isZoomAnimating()).toBe(true);

      expect(v.updateZoom(1 / 60)).toBe(true);
      expect(v.zoom).toBeCloseTo(3.1, 9);

      v.stopZoomAnimation();
      expect(v.isZoomAnimating()).toBe(false);
      expect(v.updateZoom(1 / 60)).toBe(false);
    });
  });

  describe("screen conversions", () => {
    it("maps the center to the middle of the screen", () => {
      const v = new Viewport({ width: 800, height: 600, center: { lon: 151.2, lat: -33.87 }, zoom: 10 });
      const p = v.lonLatToScreen(v.center);
      expect(p.x).toBeCloseTo(400, 6);
      expect(p.y).toBeCloseTo(300, 6);
    });

    it("reports the visible bounds", () => {
      const v = new Viewport({ width: 256, height: 256, center: { lon: 0, lat: 0 }, zoom: 0 });
      const bounds = v.visibleBounds();
      expect(bounds.topLeft.lon).toBe(-180);
      expect(bounds.bottomRight.lon).toBe(180);
      expect(bounds.topLeft.lat).toBeCloseTo(MAX_LATITUDE, 9);
      expect(bounds.bottomRight.lat).toBeCloseTo(-MAX_LATITUDE, 9);
      expect(bounds.zoom).toBe(0);
    });
  });

  describe("events", () => {
    it("notifies after every change", () => {
      const onChange = vi.fn();
      const v = new Viewport({ width: 512, height: 512, center: { lon: 0, lat: 0 }, zoom: 1, onChange });

      v.pan(128, 0);
      v.zoomTo(1);
      v.resize(640, 480);

      expect(onChange).toHaveBeenCalledTimes(2);
      expect(onChange).toHaveBeenLastCalledWith({
        center: { lon: -90, lat: 0 },
        zoom: 1,
        size: { width: 640, height: 480 },
      });
    });

    it("builds mouse events", () => {
      const v = new Viewport({ width: 512, height: 512, center: { lon: 0, lat: 0 }, zoom: 1 });
      expect(v.mouseMoved({ x: 128, y: 256 })).toEqual({ screen: { x: 128, y: 256 }, lonlat: { lon: -90, lat: 0 } });
    });
  });
});
