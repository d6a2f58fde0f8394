import { Grid } from "../simulation/grid";
import { Cell } from "../types/grid-types";

type Pattern = {
  width: number;
  height: number;
  alive: ReadonlyArray<readonly [number, number]>;
};

/**
 * Each pattern sits in a grid the size of its bounding box.
 *
 *   glider     r-pentomino   lightweight spaceship
 *   +---+      +---+         +-----+
 *   | # |      | ##|         | #  #|
 *   |  #|      |## |         |#    |
 *   |###|      | # |         |#   #|
 *   +---+      +---+         |#### |
 *                            +-----+
 */
const GLIDER: Pattern = {
  width: 3,
  height: 3,
  alive: [[1, 0], [2, 1], [0, 2], [1, 2], [2, 2]],
};

const R_PENTOMINO: Pattern = {
  width: 3,
  height: 3,
  alive: [[1, 0], [2, 0], [0, 1], [1, 1], [1, 2]],
};

const LIGHT_WEIGHT_SPACESHIP: Pattern = {
  width: 5,
  height: 4,
  alive: [[1, 0], [4, 0], [0, 1], [0, 2], [4, 2], [0, 3], [1, 3], [2, 3], [3, 3]],
};

function build(pattern: Pattern): Grid {
  const grid = new Grid(pattern.width, pattern.height);
  for (const [x, y] of pattern.alive) {
    grid.set(x, y, Cell.ALIVE);
  }
  return grid;
}

export function glider(): Grid {
  return build(GLIDER);
}

export function rPentomino(): Grid {
  return build(R_PENTOMINO);
}

export function lightWeightSpaceship(): Grid {
  return build(LIGHT_WEIGHT_SPACESHIP);
}
