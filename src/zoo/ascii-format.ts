import { ALIVE_CHAR, DEAD_CHAR } from "../constants";
import type { Grid } from "../simulation/grid";
import { GridFormatError } from "../simulation/errors";
import { Cell } from "../types/grid-types";
import type { ReadonlyGrid } from "../types/grid-types";
import { gridForHeader } from "./header";

const HEADER_PATTERN = /^(\d+) (\d+)$/;

/**
 * ASCII grid format (.gol):
 *
 *   <width> <height>\n
 *   followed by <height> lines of <width> characters, each ending in \n,
 *   with '#' for alive and ' ' for dead. No border.
 */
export function encodeAscii(grid: ReadonlyGrid): string {
  let out = `${grid.width} ${grid.height}\n`;
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      out += grid.get(x, y) === Cell.ALIVE ? ALIVE_CHAR : DEAD_CHAR;
    }
    out += "\n";
  }
  return out;
}

/**
 * Parse the ASCII format. Rows shorter than the width are padded with dead
 * cells; anything else that does not match the header is an error.
 */
export function decodeAscii(text: string): Grid {
  const lines = text.split("\n").map(line => line.replace(/\r$/, ""));
  // The final newline leaves one empty element behind
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();

  const match = HEADER_PATTERN.exec(lines[0]);
  if (!match) {
    throw new GridFormatError(`Invalid header line: "${lines[0]}"`);
  }
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (width <= 0 || height <= 0) {
    throw new GridFormatError(`Width and height must be positive, got ${width}x${height}`);
  }

  const rows = lines.slice(1);
  if (rows.length < height) {
    throw new GridFormatError(`File ends unexpectedly: expected ${height} rows, got ${rows.length}`);
  }
  if (rows.slice(height).some(row => row.length > 0)) {
    throw new GridFormatError(`More than ${height} rows of cells`);
  }

  const grid = gridForHeader(width, height);
  for (let y = 0; y < height; y++) {
    const row = rows[y];
    if (row.length > width) {
      throw new GridFormatError(`Row ${y} is longer than ${width} characters`);
    }
    for (let x = 0; x < row.length; x++) {
      const ch = row[x];
      if (ch === ALIVE_CHAR) grid.set(x, y, Cell.ALIVE);
      else if (ch !== DEAD_CHAR) {
        throw new GridFormatError(`Invalid cell character "${ch}" at (${x}, ${y})`);
      }
    }
  }
  return grid;
}
