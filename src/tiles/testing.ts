/**
 * Test helpers: minimal well-formed tile images and an in-process tile source.
 */

import type { TileAddress } from "../projection/types";
import { tileToString } from "../projection/tileCoord";
import type { TileSource } from "./types";

function uint32BE(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

function chars(text: string): number[] {
  return Array.from(text, (c) => c.charCodeAt(0));
}

/**
 * Smallest byte stream the decoder accepts as a PNG: signature, IHDR, an
 * optional payload chunk (to vary the size) and IEND. CRCs are zero.
 */
export function makePng(width: number, height: number, payloadBytes = 0): Uint8Array {
  const bytes = [
    0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
    ...uint32BE(13), ...chars("IHDR"), ...uint32BE(width), ...uint32BE(height),
    8, 6, 0, 0, 0,
    0, 0, 0, 0,
  ];
  if (payloadBytes > 0) {
    bytes.push(...uint32BE(payloadBytes), ...chars("IDAT"));
    for (let i = 0; i < payloadBytes; i++) bytes.push(i & 0xff);
    bytes.push(0, 0, 0, 0);
  }
  bytes.push(...uint32BE(0), ...chars("IEND"), 0, 0, 0, 0);
  return new Uint8Array(bytes);
}

/** Baseline JPEG skeleton: SOI, APP0, SOF0, EOI */
export function makeJpeg(width: number, height: number): Uint8Array {
  return new Uint8Array([
    0xff, 0xd8,
    0xff, 0xe0, 0x00, 0x04, 0x00, 0x00,
    0xff, 0xc0, 0x00, 0x0b, 0x08,
    (height >> 8) & 0xff, height & 0xff,
    (width >> 8) & 0xff, width & 0xff,
    0x01, 0x01, 0x11, 0x00,
    0xff, 0xd9,
  ]);
}

export interface FakeSourceOptions {
  id?: string;
  tileSize?: number;
  minZoom?: number;
  maxZoom?: number;
  /** Per-call behaviour; defaults to a 256x256 PNG */
  respond?: (address: TileAddress, attempt: number) => Promise<Uint8Array> | Uint8Array;
}

/**
 * In-process tile source that records every fetch.
 */
export class FakeTileSource implements TileSource {
  readonly id: string;
  readonly tileSize: number;
  readonly minZoom: number;
  readonly maxZoom: number;
  readonly fileExtension = "png";

  /** Every fetched key, in call order */
  readonly calls: string[] = [];

  private respond: NonNullable<FakeSourceOptions["respond"]>;

  constructor(options: FakeSourceOptions = {}) {
    this.id = options.id ?? "fake";
    this.tileSize = options.tileSize ?? 256;
    this.minZoom = options.minZoom ?? 0;
    this.maxZoom = options.maxZoom ?? 19;
    this.respond = options.respond ?? (() => makePng(256, 256));
  }

  async fetchTile(address: TileAddress): Promise<Uint8Array> {
    const key = tileToString(address);
    this.calls.push(key);
    const attempt = this.calls.filter((k) => k === key).length;
    return this.respond(address, attempt);
  }

  callsFor(address: TileAddress): number {
    const key = tileToString(address);
    return this.calls.filter((k) => k === key).length;
  }
}
