/**
 * Raster tile decoding.
 *
 * Reads the container header of PNG, JPEG, GIF and WebP tiles to recover
 * the pixel size, and checks that the byte stream is complete. A truncated
 * or unrecognised tile throws, which the fetch queue reports as a
 * DecodeError. Pixel decoding is left to the renderer, which blits the
 * encoded bytes.
 */

import type { TileImage, TileImageFormat } from "./types";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** JPEG start-of-frame markers (excluding DHT 0xC4, JPG 0xC8, DAC 0xCC) */
const JPEG_SOF_MARKERS = new Set([
  0xc0, 0xc1, 0xc2, 0xc3, 0xc5, 0xc6, 0xc7, 0xc9, 0xca, 0xcb, 0xcd, 0xce, 0xcf,
]);

function ascii(data: Uint8Array, offset: number, length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += String.fromCharCode(data[offset + i] ?? 0);
  }
  return out;
}

function startsWith(data: Uint8Array, bytes: number[]): boolean {
  if (data.length < bytes.length) return false;
  return bytes.every((b, i) => data[i] === b);
}

/**
 * Detect the container format from the magic bytes.
 */
export function sniffFormat(data: Uint8Array): TileImageFormat | null {
  if (startsWith(data, PNG_SIGNATURE)) return "png";
  if (startsWith(data, [0xff, 0xd8, 0xff])) return "jpeg";
  if (ascii(data, 0, 6) === "GIF87a" || ascii(data, 0, 6) === "GIF89a") return "gif";
  if (data.length >= 12 && ascii(data, 0, 4) === "RIFF" && ascii(data, 8, 4) === "WEBP") {
    return "webp";
  }
  return null;
}

interface Size {
  width: number;
  height: number;
}

function readPngSize(data: Uint8Array, view: DataView): Size {
  // signature (8) + IHDR chunk (4 length + 4 type + 13 data + 4 crc) + IEND (12)
  if (data.length < 8 + 25 + 12) {
    throw new Error(`PNG too short (${data.length} bytes)`);
  }
  if (ascii(data, 12, 4) !== "IHDR") {
    throw new Error("PNG does not start with an IHDR chunk");
  }
  if (ascii(data, data.length - 8, 4) !== "IEND") {
    throw new Error("PNG is truncated (no IEND chunk)");
  }
  return { width: view.getUint32(16), height: view.getUint32(20) };
}

function readJpegSize(data: Uint8Array, view: DataView): Size {
  if (data[data.length - 2] !== 0xff || data[data.length - 1] !== 0xd9) {
    throw new Error("JPEG is truncated (no EOI marker)");
  }

  let offset = 2;
  while (offset + 4 <= data.length) {
    if (data[offset] !== 0xff) {
      throw new Error(`Invalid JPEG marker at offset ${offset}`);
    }
    const marker = data[offset + 1] ?? 0;
    // Fill bytes
    if (marker === 0xff) {
      offset++;
      continue;
    }
    // Standalone markers carry no length
    if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      offset += 2;
      continue;
    }
    const segmentLength = view.getUint16(offset + 2);
    if (JPEG_SOF_MARKERS.has(marker)) {
      if (offset + 9 > data.length) break;
      return { height: view.getUint16(offset + 5), width: view.getUint16(offset + 7) };
    }
    if (segmentLength < 2) {
      throw new Error(`Invalid JPEG segment length at offset ${offset}`);
    }
    offset += 2 + segmentLength;
  }
  throw new Error("JPEG has no frame header");
}

function readGifSize(data: Uint8Array, view: DataView): Size {
  if (data.length < 14) {
    throw new Error(`GIF too short (${data.length} bytes)`);
  }
  if (data[data.length - 1] !== 0x3b) {
    throw new Error("GIF is truncated (no trailer)");
  }
  return { width: view.getUint16(6, true), height: view.getUint16(8, true) };
}

function readWebpSize(data: Uint8Array, view: DataView): Size {
  if (data.length < 30) {
    throw new Error(`WebP too short (${data.length} bytes)`);
  }
  const riffSize = view.getUint32(4, true);
  if (riffSize + 8 > data.length) {
    throw new Error("WebP is truncated");
  }

  const chunk = ascii(data, 12, 4);
  switch (chunk) {
    case "VP8 ":
      return {
        width: view.getUint16(26, true) & 0x3fff,
        height: view.getUint16(28, true) & 0x3fff,
      };
    case "VP8L": {
      if (data[20] !== 0x2f) {
        throw new Error("Invalid VP8L signature");
      }
      const bits = view.getUint32(21, true);
      return {
        width: (bits & 0x3fff) + 1,
        height: ((bits >>> 14) & 0x3fff) + 1,
      };
    }
    case "VP8X": {
      const width = data[24]! | (data[25]! << 8) | (data[26]! << 16);
      const height = data[27]! | (data[28]! << 8) | (data[29]! << 16);
      return { width: width + 1, height: height + 1 };
    }
    default:
      throw new Error(`Unknown WebP chunk "${chunk}"`);
  }
}

/**
 * Decode a raster tile.
 *
 * @param data - Bytes exactly as fetched
 * @throws Error when the bytes are not a complete PNG, JPEG, GIF or WebP image
 */
export function decodeTileImage(data: Uint8Array): TileImage {
  const format = sniffFormat(data);
  if (!format) {
    throw new Error(`Unrecognised tile format (${data.length} bytes)`);
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  let size: Size;
  switch (format) {
    case "png":
      size = readPngSize(data, view);
      break;
    case "jpeg":
      size = readJpegSize(data, view);
      break;
    case "gif":
      size = readGifSize(data, view);
      break;
    case "webp":
      size = readWebpSize(data, view);
      break;
  }

  if (size.width === 0 || size.height === 0) {
    throw new Error(`${format} tile has zero size (${size.width}x${size.height})`);
  }

  return {
    format,
    width: size.width,
    height: size.height,
    data,
    byteSize: data.byteLength,
  };
}
