/**
 * Raster tile layer.
 */

import type { TileLoader } from "../tiles/TileLoader";
import type { TileSource } from "../tiles/types";
import type { Viewport } from "../Viewport";
import { Layer } from "./Layer";
import type { DrawItem } from "./types";

export class TileLayer extends Layer {
  readonly loader: TileLoader;
  readonly source: TileSource;

  constructor(loader: TileLoader, source: TileSource, name: string = "BaseMap", visible: boolean = true) {
    super(name, visible);
    this.loader = loader;
    this.source = source;
  }

  /**
   * Pin the visible tiles, schedule every missing one (margin included) and
   * return the ready tiles plus placeholders for failed ones. Pending tiles
   * are left out; the loader's onTileLoaded tells the host to render again.
   */
  render(viewport: Viewport): DrawItem[] {
    if (!this.visible) return [];

    const tiles = viewport.visibleTiles();
    this.loader.updateVisible(
      this.source,
      tiles.map((tile) => tile.address)
    );

    const items: DrawItem[] = [];
    for (const { address, rect, prefetch } of tiles) {
      const lookup = this.loader.getOrSchedule(address, this.source, { prefetch });
      if (prefetch) continue;
      if (lookup.status === "ready") {
        items.push({ kind: "tile", layer: this.name, address, rect, image: lookup.image });
      } else if (lookup.status === "failed") {
        items.push({ kind: "placeholder", layer: this.name, address, rect, error: lookup.error });
      }
    }
    return items;
  }
}
