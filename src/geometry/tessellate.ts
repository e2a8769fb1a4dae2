/**
 * Polygon tessellation using earcut
 */

import earcut from "earcut";
import type { ScreenPoint } from "../events";
import type { Triangulation } from "./types";

function samePoint(a: ScreenPoint | undefined, b: ScreenPoint | undefined): boolean {
  return a !== undefined && b !== undefined && a.x === b.x && a.y === b.y;
}

/**
 * Triangulate a polygon given as rings of screen points.
 *
 * The first ring is the exterior, the rest are holes. A closing point equal
 * to the ring's first point (as GeoJSON writes them) is dropped.
 */
export function triangulate(rings: readonly (readonly ScreenPoint[])[]): Triangulation {
  const coords: number[] = [];
  const holeIndices: number[] = [];

  rings.forEach((ring, i) => {
    const open = ring.length > 1 && samePoint(ring[0], ring[ring.length - 1]) ? ring.slice(0, -1) : ring;
    if (i > 0) holeIndices.push(coords.length / 2);
    for (const { x, y } of open) {
      coords.push(x, y);
    }
  });

  const indices = earcut(coords, holeIndices.length > 0 ? holeIndices : undefined, 2);

  const vertices = new Float32Array(coords);
  const indexArray =
    coords.length / 2 > 65535
      ? new Uint32Array(indices)
      : new Uint16Array(indices);

  return { vertices, indices: indexArray };
}
