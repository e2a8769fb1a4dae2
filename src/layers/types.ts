/**
 * Draw list produced by layers for the host renderer.
 */

import type { ScreenPoint } from "../events";
import type { Triangulation } from "../geometry/types";
import type { TileAddress } from "../projection/types";
import type { TileImage } from "../tiles/types";
import type { ScreenRect } from "../Viewport";

/** Per-feature style; missing fields take the layer defaults */
export interface FeatureStyle {
  /** Point radius in pixels */
  radius?: number;
  fill?: string;
  outline?: string;
  /** Stroke width in pixels */
  width?: number;
}

export type ResolvedStyle = Required<FeatureStyle>;

export interface TileDraw {
  kind: "tile";
  layer: string;
  address: TileAddress;
  rect: ScreenRect;
  image: TileImage;
}

/** A visible tile that failed to load */
export interface PlaceholderDraw {
  kind: "placeholder";
  layer: string;
  address: TileAddress;
  rect: ScreenRect;
  error: Error;
}

export interface CircleDraw {
  kind: "circle";
  layer: string;
  center: ScreenPoint;
  style: ResolvedStyle;
}

export interface LineDraw {
  kind: "line";
  layer: string;
  points: ScreenPoint[];
  style: ResolvedStyle;
}

export interface PolygonDraw {
  kind: "polygon";
  layer: string;
  /** Exterior ring followed by holes */
  rings: ScreenPoint[][];
  triangles: Triangulation;
  style: ResolvedStyle;
}

export type DrawItem = TileDraw | PlaceholderDraw | CircleDraw | LineDraw | PolygonDraw;
