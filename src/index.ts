/**
 * tilemap-core - the non-visual core of a slippy-map widget
 */

export const VERSION = "0.1.0";

export * from "./projection";
export * from "./tiles";
export * from "./layers";
export { triangulate, type Triangulation } from "./geometry";
export {
  Viewport,
  type ViewportOptions,
  type VisibleTile,
  type VisibleBounds,
  type ScreenRect,
} from "./Viewport";
export type { ScreenPoint, Dimensions, MouseMovedEvent, ViewportChangeEvent } from "./events";
export {
  resolveConfig,
  DEFAULT_CONFIG,
  DEFAULT_RETRY,
  type MapConfig,
  type MapConfigInput,
  type RetryConfig,
  type DiskCacheConfig,
  type PrefetchPriority,
} from "./config";
export { defaultLogger, type Logger } from "./log";
