/**
 * Layers
 */

export * from "./types";
export { Layer, GroupLayer } from "./Layer";
export { TileLayer } from "./TileLayer";
export {
  GeoJSONLayer,
  CULL_BUFFER_PX,
  POINT_STYLE,
  LINE_STYLE,
  POLYGON_STYLE,
  type GeoJSONLayerOptions,
  type OverlayData,
  type OverlayFeature,
  type StyleFunction,
} from "./GeoJSONLayer";
