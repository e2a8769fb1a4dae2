/**
 * Event values handed to the host's listener registry.
 */

import type { LonLat } from "./projection/types";

/** A point on the widget in pixels, (0, 0) at the top-left */
export interface ScreenPoint {
  readonly x: number;
  readonly y: number;
}

export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

export interface MouseMovedEvent {
  readonly screen: ScreenPoint;
  readonly lonlat: LonLat;
}

export interface ViewportChangeEvent {
  readonly center: LonLat;
  readonly zoom: number;
  readonly size: Dimensions;
}
