/**
 * Viewport with pan and zoom
 *
 * Holds the geographic center, a continuous zoom and the output size, and
 * answers what must be drawn where. All projection math goes through
 * ./projection; nothing here throws, out-of-range input is clamped.
 */

import { DEFAULT_CONFIG, type MapConfig } from "./config";
import type { Dimensions, MouseMovedEvent, ScreenPoint, ViewportChangeEvent } from "./events";
import {
  DEFAULT_TILE_SIZE,
  clampLatitude,
  geoToWorldPixel,
  tileCount,
  worldPixelToGeo,
  wrapLongitude,
  wrapTileX,
  type LonLat,
  type PixelCoord,
  type TileAddress,
} from "./projection";

/** Pixel rectangle on screen */
export interface ScreenRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** A tile to draw and where to draw it */
export interface VisibleTile {
  address: TileAddress;
  rect: ScreenRect;
  /** Lies only in the prefetch margin, outside the viewport */
  prefetch: boolean;
}

/** Geographic corners of the viewport. Longitudes are not wrapped. */
export interface VisibleBounds {
  topLeft: LonLat;
  bottomRight: LonLat;
  zoom: number;
}

export interface ViewportOptions {
  width: number;
  height: number;
  center?: LonLat;
  zoom?: number;
  /** Zoom range and prefetch margin, e.g. a TileLoader's `config` */
  config?: Partial<Pick<MapConfig, "minZoom" | "maxZoom" | "prefetchMargin">>;
  /** Narrows the configured zoom range; also supplies the tile size */
  source?: { minZoom: number; maxZoom: number; tileSize: number };
  minZoom?: number;
  maxZoom?: number;
  tileSize?: number;
  /** Extra ring of tiles around the viewport returned by visibleTiles */
  prefetchMargin?: number;
  onChange?: (event: ViewportChangeEvent) => void;
}

export class Viewport {
  readonly minZoom: number;
  readonly maxZoom: number;
  readonly tileSize: number;
  prefetchMargin: number;

  /** Called with a snapshot after every change */
  onChange?: (event: ViewportChangeEvent) => void;

  private _center: LonLat;
  private _zoom: number;
  private _width: number;
  private _height: number;

  // Inertial zoom animation state
  private static readonly ZOOM_DECAY = 0.00001; // Exponential decay rate (lower = faster stop)
  private static readonly ZOOM_VELOCITY_THRESHOLD = 0.0001; // Stop threshold

  private zoomVelocity = 0;
  private zoomAnchor: ScreenPoint | undefined;

  constructor(options: ViewportOptions) {
    const config = { ...DEFAULT_CONFIG, ...options.config };
    const { source } = options;
    this.minZoom = options.minZoom ?? Math.max(config.minZoom, source?.minZoom ?? config.minZoom);
    this.maxZoom = Math.max(
      this.minZoom,
      options.maxZoom ?? Math.min(config.maxZoom, source?.maxZoom ?? config.maxZoom)
    );
    this.tileSize = options.tileSize ?? source?.tileSize ?? DEFAULT_TILE_SIZE;
    this.prefetchMargin = Math.max(0, Math.floor(options.prefetchMargin ?? config.prefetchMargin));
    this.onChange = options.onChange;

    this._width = Math.max(0, options.width);
    this._height = Math.max(0, options.height);
    this._center = normalize(options.center ?? { lon: 0, lat: 0 });
    this._zoom = this.clampZoom(options.zoom ?? this.minZoom);
  }

  get center(): LonLat {
    return this._center;
  }

  /** Current zoom, possibly fractional */
  get zoom(): number {
    return this._zoom;
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get size(): Dimensions {
    return { width: this._width, height: this._height };
  }

  /** Integer zoom level tiles are selected at */
  tileZoom(): number {
    return Math.round(this._zoom);
  }

  /**
   * Pan by screen pixels. The map follows the pointer: dragging right by
   * `dx` moves the center `dx` pixels west.
   */
  pan(dx: number, dy: number): void {
    const c = this.centerPixel();
    this._center = this.geoAt(c.x - dx, c.y - dy);
    this.changed();
  }

  setCenter(center: LonLat): void {
    this._center = normalize(center);
    this.changed();
  }

  resize(width: number, height: number): void {
    this._width = Math.max(0, width);
    this._height = Math.max(0, height);
    this.changed();
  }

  /**
   * Zoom so that the geographic point under `anchor` stays under it.
   *
   * @param anchor - Screen point, defaults to the viewport center
   */
  zoomTo(newZoom: number, anchor?: ScreenPoint): void {
    if (!Number.isFinite(newZoom)) return;
    const oldZoom = this._zoom;
    const zoom = this.clampZoom(newZoom);
    if (zoom === oldZoom) return;

    const ax = anchor?.x ?? this._width / 2;
    const ay = anchor?.y ?? this._height / 2;

    // World pixel under the anchor, old zoom
    const c = this.centerPixel();
    const worldX = c.x + ax - this._width / 2;
    const worldY = c.y + ay - this._height / 2;

    // Same point at the new zoom, then back off to the new center
    const factor = Math.pow(2, zoom - oldZoom);
    const centerX = worldX * factor - (ax - this._width / 2);
    const centerY = worldY * factor - (ay - this._height / 2);

    this._zoom = zoom;
    this._center = this.geoAt(centerX, centerY);
    this.changed();
  }

  zoomBy(delta: number, anchor?: ScreenPoint): void {
    this.zoomTo(this._zoom + delta, anchor);
  }

  zoomIn(anchor?: ScreenPoint): void {
    this.zoomBy(1, anchor);
  }

  zoomOut(anchor?: ScreenPoint): void {
    this.zoomBy(-1, anchor);
  }

  /**
   * Add velocity from scroll input for inertial zoom.
   * Velocity accumulates, allowing rapid scrolling to build up momentum.
   */
  addZoomVelocity(delta: number, anchor?: ScreenPoint): void {
    this.zoomVelocity += delta;
    this.zoomAnchor = anchor;
  }

  /**
   * Update zoom animation. Call this every frame with delta time in seconds.
   * Returns true if still animating (caller should request another frame).
   */
  updateZoom(dt: number): boolean {
    if (Math.abs(this.zoomVelocity) < Viewport.ZOOM_VELOCITY_THRESHOLD) {
      this.zoomVelocity = 0;
      return false;
    }

    // Scale by 60 to normalize for ~60fps
    this.zoomBy(this.zoomVelocity * dt * 60, this.zoomAnchor);
    this.zoomVelocity *= Math.pow(Viewport.ZOOM_DECAY, dt);

    return true;
  }

  stopZoomAnimation(): void {
    this.zoomVelocity = 0;
  }

  isZoomAnimating(): boolean {
    return Math.abs(this.zoomVelocity) >= Viewport.ZOOM_VELOCITY_THRESHOLD;
  }

  /** Geographic position under a screen point (longitude wrapped) */
  screenToLonLat(point: ScreenPoint): LonLat {
    const c = this.centerPixel();
    return this.geoAt(c.x + point.x - this._width / 2, c.y + point.y - this._height / 2);
  }

  /** Screen position of a geographic point */
  lonLatToScreen(lonLat: LonLat): ScreenPoint {
    const c = this.centerPixel();
    const p = geoToWorldPixel(lonLat, this._zoom, this.tileSize);
    return { x: p.x - c.x + this._width / 2, y: p.y - c.y + this._height / 2 };
  }

  visibleBounds(): VisibleBounds {
    const c = this.centerPixel();
    const left = c.x - this._width / 2;
    const top = c.y - this._height / 2;
    return {
      topLeft: worldPixelToGeo(left, top, this._zoom, this.tileSize),
      bottomRight: worldPixelToGeo(left + this._width, top + this._height, this._zoom, this.tileSize),
      zoom: this._zoom,
    };
  }

  /**
   * Tiles covering the viewport plus the prefetch margin, in row-major
   * order, with their screen rectangles.
   *
   * Tiles come from zoom `round(zoom)` and are scaled by
   * `2^(zoom - round(zoom))`. Rectangle edges are rounded from shared
   * values, so neighbours meet exactly. Columns wrap around the
   * antimeridian (a viewport wider than the world repeats addresses);
   * rows outside the world are skipped.
   */
  visibleTiles(): VisibleTile[] {
    const z = this.tileZoom();
    const n = tileCount(z);
    const ts = this.tileSize;
    const scale = Math.pow(2, this._zoom - z);

    // Viewport in world pixels at the tile zoom
    const c = geoToWorldPixel(this._center, z, ts);
    const halfWidth = this._width / 2 / scale;
    const halfHeight = this._height / 2 / scale;
    const left = c.x - halfWidth;
    const top = c.y - halfHeight;

    const minX = Math.floor(left / ts);
    const maxX = Math.ceil((c.x + halfWidth) / ts) - 1;
    const minY = Math.floor(top / ts);
    const maxY = Math.ceil((c.y + halfHeight) / ts) - 1;
    const m = this.prefetchMargin;

    const edgeX = (tx: number): number => Math.round((tx * ts - left) * scale);
    const edgeY = (ty: number): number => Math.round((ty * ts - top) * scale);

    const tiles: VisibleTile[] = [];
    for (let ty = minY - m; ty <= maxY + m; ty++) {
      // No vertical wrapping
      if (ty < 0 || ty >= n) continue;
      const y0 = edgeY(ty);
      const y1 = edgeY(ty + 1);
      for (let tx = minX - m; tx <= maxX + m; tx++) {
        const x0 = edgeX(tx);
        const x1 = edgeX(tx + 1);
        tiles.push({
          address: { z, x: wrapTileX(tx, z), y: ty },
          rect: { x: x0, y: y0, width: x1 - x0, height: y1 - y0 },
          prefetch: tx < minX || tx > maxX || ty < minY || ty > maxY,
        });
      }
    }
    return tiles;
  }

  snapshot(): ViewportChangeEvent {
    return { center: this._center, zoom: this._zoom, size: this.size };
  }

  mouseMoved(point: ScreenPoint): MouseMovedEvent {
    return { screen: { x: point.x, y: point.y }, lonlat: this.screenToLonLat(point) };
  }

  private clampZoom(zoom: number): number {
    return Math.max(this.minZoom, Math.min(this.maxZoom, zoom));
  }

  private centerPixel(): PixelCoord {
    return geoToWorldPixel(this._center, this._zoom, this.tileSize);
  }

  /** Inverse projection at the current zoom, longitude wrapped */
  private geoAt(x: number, y: number): LonLat {
    return normalize(worldPixelToGeo(x, y, this._zoom, this.tileSize));
  }

  private changed(): void {
    this.onChange?.(this.snapshot());
  }
}

function normalize(lonLat: LonLat): LonLat {
  return { lon: wrapLongitude(lonLat.lon), lat: clampLatitude(lonLat.lat) };
}
