/**
 * GeoJSON overlay layer.
 *
 * Projects features to screen space with the viewport, culls shapes that
 * have no point near the screen, and triangulates polygons (holes
 * included) for the renderer.
 */

import type { Feature, FeatureCollection, Geometry, Position } from "geojson";
import * as topojson from "topojson-client";
import type { Topology } from "topojson-specification";
import type { ScreenPoint } from "../events";
import { triangulate } from "../geometry/tessellate";
import type { Viewport } from "../Viewport";
import { Layer } from "./Layer";
import type { DrawItem, FeatureStyle, ResolvedStyle } from "./types";

export type OverlayFeature = Feature<Geometry | null>;
export type OverlayData = FeatureCollection<Geometry | null>;

export type StyleFunction = (feature: OverlayFeature) => FeatureStyle;

export interface GeoJSONLayerOptions {
  visible?: boolean;
  style?: StyleFunction;
}

/** Shapes with no point this close to the screen are skipped */
export const CULL_BUFFER_PX = 20;

export const POINT_STYLE: ResolvedStyle = { radius: 5, fill: "blue", outline: "black", width: 1 };
export const LINE_STYLE: ResolvedStyle = { radius: 5, fill: "black", outline: "black", width: 2 };
export const POLYGON_STYLE: ResolvedStyle = { radius: 5, fill: "#3388ff", outline: "black", width: 2 };

interface RenderContext {
  viewport: Viewport;
  style: FeatureStyle;
  items: DrawItem[];
}

export class GeoJSONLayer extends Layer {
  data: OverlayData;
  style: StyleFunction;

  constructor(name: string, data: OverlayData, options: GeoJSONLayerOptions = {}) {
    super(name, options.visible ?? true);
    this.data = data;
    this.style = options.style ?? (() => ({}));
  }

  /**
   * Build a layer from one object of a TopoJSON topology.
   *
   * @throws RangeError when the topology has no object of that name
   */
  static fromTopoJSON(
    name: string,
    topology: Topology,
    objectName: string,
    options: GeoJSONLayerOptions = {}
  ): GeoJSONLayer {
    const object = topology.objects[objectName];
    if (!object) {
      throw new RangeError(
        `TopoJSON has no object "${objectName}" (available: ${Object.keys(topology.objects).join(", ")})`
      );
    }
    const converted = topojson.feature(topology, object);
    const data: OverlayData =
      converted.type === "FeatureCollection"
        ? converted
        : { type: "FeatureCollection", features: [converted] };
    return new GeoJSONLayer(name, data, options);
  }

  render(viewport: Viewport): DrawItem[] {
    if (!this.visible) return [];
    const items: DrawItem[] = [];
    for (const feature of this.data.features) {
      if (!feature.geometry) continue;
      this.renderGeometry(feature.geometry, { viewport, style: this.style(feature), items });
    }
    return items;
  }

  private renderGeometry(geometry: Geometry, ctx: RenderContext): void {
    switch (geometry.type) {
      case "Point":
        this.renderPoint(geometry.coordinates, ctx);
        break;
      case "MultiPoint":
        for (const point of geometry.coordinates) this.renderPoint(point, ctx);
        break;
      case "LineString":
        this.renderLine(geometry.coordinates, ctx);
        break;
      case "MultiLineString":
        for (const line of geometry.coordinates) this.renderLine(line, ctx);
        break;
      case "Polygon":
        this.renderPolygon(geometry.coordinates, ctx);
        break;
      case "MultiPolygon":
        for (const polygon of geometry.coordinates) this.renderPolygon(polygon, ctx);
        break;
      case "GeometryCollection":
        for (const child of geometry.geometries) this.renderGeometry(child, ctx);
        break;
    }
  }

  private renderPoint(position: Position, ctx: RenderContext): void {
    const center = toScreen(position, ctx.viewport);
    if (!inView(center, ctx.viewport)) return;
    ctx.items.push({
      kind: "circle",
      layer: this.name,
      center,
      style: { ...POINT_STYLE, ...ctx.style },
    });
  }

  private renderLine(positions: Position[], ctx: RenderContext): void {
    const points = positions.map((p) => toScreen(p, ctx.viewport));
    if (!points.some((p) => inView(p, ctx.viewport))) return;
    ctx.items.push({
      kind: "line",
      layer: this.name,
      points,
      style: { ...LINE_STYLE, ...ctx.style },
    });
  }

  private renderPolygon(rings: Position[][], ctx: RenderContext): void {
    const screenRings = rings.map((ring) => ring.map((p) => toScreen(p, ctx.viewport)));
    const exterior = screenRings[0];
    if (!exterior || !exterior.some((p) => inView(p, ctx.viewport))) return;
    ctx.items.push({
      kind: "polygon",
      layer: this.name,
      rings: screenRings,
      triangles: triangulate(screenRings),
      style: { ...POLYGON_STYLE, ...ctx.style },
    });
  }
}

function toScreen(position: Position, viewport: Viewport): ScreenPoint {
  const [lon = 0, lat = 0] = position;
  return viewport.lonLatToScreen({ lon, lat });
}

function inView(p: ScreenPoint, viewport: Viewport): boolean {
  return (
    p.x >= -CULL_BUFFER_PX &&
    p.x <= viewport.width + CULL_BUFFER_PX &&
    p.y >= -CULL_BUFFER_PX &&
    p.y <= viewport.height + CULL_BUFFER_PX
  );
}
