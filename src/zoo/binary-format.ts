import { BINARY_DIMENSION_BYTES, BINARY_HEADER_BYTES } from "../constants";
import type { Grid } from "../simulation/grid";
import { GridFormatError } from "../simulation/errors";
import { Cell } from "../types/grid-types";
import type { ReadonlyGrid } from "../types/grid-types";
import { gridForHeader } from "./header";

function payloadBytes(width: number, height: number): number {
  return Math.ceil((width * height) / 8);
}

/**
 * Binary grid format (.bgol):
 *
 *   int32 LE width, int32 LE height, then width·height bits in row-major
 *   order, least-significant bit first within each byte. The last byte is
 *   zero-padded.
 */
export function encodeBinary(grid: ReadonlyGrid): Buffer {
  const { width, height } = grid;
  const buffer = Buffer.alloc(BINARY_HEADER_BYTES + payloadBytes(width, height));
  buffer.writeInt32LE(width, 0);
  buffer.writeInt32LE(height, BINARY_DIMENSION_BYTES);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (grid.get(x, y) !== Cell.ALIVE) continue;
      const bit = x + width * y;
      buffer[BINARY_HEADER_BYTES + (bit >> 3)] |= 1 << (bit & 7);
    }
  }
  return buffer;
}

export function decodeBinary(data: Uint8Array): Grid {
  if (data.length < BINARY_HEADER_BYTES) {
    throw new GridFormatError(`Binary grid needs a ${BINARY_HEADER_BYTES}-byte header, got ${data.length} bytes`);
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const width = view.getInt32(0, true);
  const height = view.getInt32(BINARY_DIMENSION_BYTES, true);
  if (width < 0 || height < 0) {
    throw new GridFormatError(`Negative dimensions in binary header: ${width}x${height}`);
  }

  const grid = gridForHeader(width, height);
  const expected = BINARY_HEADER_BYTES + payloadBytes(width, height);
  if (data.length < expected) {
    throw new GridFormatError(`File ends unexpectedly: expected ${expected} bytes, got ${data.length}`);
  }

  for (let bit = 0; bit < width * height; bit++) {
    if ((data[BINARY_HEADER_BYTES + (bit >> 3)] >> (bit & 7)) & 1) {
      grid.set(bit % width, Math.floor(bit / width), Cell.ALIVE);
    }
  }
  return grid;
}
