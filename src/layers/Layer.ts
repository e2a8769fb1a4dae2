/**
 * Layer base classes.
 */

import type { Viewport } from "../Viewport";
import type { DrawItem } from "./types";

export abstract class Layer {
  name: string;
  visible: boolean;

  constructor(name: string, visible: boolean = true) {
    this.name = name;
    this.visible = visible;
  }

  show(): void {
    this.visible = true;
  }

  hide(): void {
    this.visible = false;
  }

  /** Draw items for the current viewport; empty when hidden */
  abstract render(viewport: Viewport): DrawItem[];
}

/**
 * Named children rendered in insertion order, shown and hidden together.
 */
export class GroupLayer extends Layer {
  private children: Layer[] = [];

  constructor(name: string = "Group", visible: boolean = true) {
    super(name, visible);
  }

  get layers(): readonly Layer[] {
    return this.children;
  }

  /** Add a child; one with the same name is replaced in place */
  addLayer(layer: Layer): void {
    const index = this.children.findIndex((child) => child.name === layer.name);
    if (index === -1) {
      this.children.push(layer);
    } else {
      this.children[index] = layer;
    }
  }

  removeLayer(name: string): Layer | undefined {
    const index = this.children.findIndex((child) => child.name === name);
    if (index === -1) return undefined;
    return this.children.splice(index, 1)[0];
  }

  getLayer(name: string): Layer | undefined {
    return this.children.find((child) => child.name === name);
  }

  showLayer(name: string): void {
    this.getLayer(name)?.show();
  }

  hideLayer(name: string): void {
    this.getLayer(name)?.hide();
  }

  render(viewport: Viewport): DrawItem[] {
    if (!this.visible) return [];
    return this.children.flatMap((child) => child.render(viewport));
  }
}
