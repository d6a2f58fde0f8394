import { BIRTH_COUNTS, SURVIVE_COUNTS } from "../constants";
import { Cell } from "../types/grid-types";
import type { ReadonlyGrid } from "../types/grid-types";
import { wrap } from "../utils/grid-utils";

const OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1],
];

/**
 * Count live cells among the 8 neighbors of (x, y).
 *
 * Bounded: neighbors off the edge do not exist.
 * Toroidal: neighbor coordinates wrap modulo width/height, so on a 1-wide or
 * 1-tall grid a cell can see itself (a live 1x1 cell counts itself 8 times).
 */
export function countNeighbors(grid: ReadonlyGrid, x: number, y: number, toroidal: boolean): number {
  const { width, height } = grid;
  let count = 0;
  for (const [dx, dy] of OFFSETS) {
    let nx = x + dx;
    let ny = y + dy;
    if (toroidal) {
      nx = wrap(nx, width);
      ny = wrap(ny, height);
    } else if (!grid.isValidCoordinate(nx, ny)) {
      continue;
    }
    if (grid.get(nx, ny) === Cell.ALIVE) count++;
  }
  return count;
}

/** Conway's rule: B3/S23. */
export function nextCellState(current: Cell, liveNeighbors: number): Cell {
  const counts = current === Cell.ALIVE ? SURVIVE_COUNTS : BIRTH_COUNTS;
  return counts.includes(liveNeighbors) ? Cell.ALIVE : Cell.DEAD;
}
