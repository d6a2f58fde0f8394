import { countNeighbors, nextCellState } from "./neighbors";
import { Grid } from "./grid";
import { Cell } from "../types/grid-types";

function filled(width: number, height: number): Grid {
  const grid = new Grid(width, height);
  grid.forEachCell((x, y) => grid.set(x, y, Cell.ALIVE));
  return grid;
}

describe("countNeighbors", () => {
  it("counts all 8 neighbors of an interior cell", () => {
    expect(countNeighbors(filled(3, 3), 1, 1, false)).toBe(8);
  });

  it("ignores off-grid neighbors when bounded", () => {
    const grid = filled(3, 3);
    expect(countNeighbors(grid, 0, 0, false)).toBe(3);
    expect(countNeighbors(grid, 1, 0, false)).toBe(5);
  });

  it("wraps neighbors around the edges when toroidal", () => {
    expect(countNeighbors(filled(3, 3), 0, 0, true)).toBe(8);

    const grid = new Grid(4, 4);
    grid.set(3, 3, Cell.ALIVE);
    expect(countNeighbors(grid, 0, 0, true)).toBe(1);
    expect(countNeighbors(grid, 0, 0, false)).toBe(0);
  });

  it("does not count the cell itself", () => {
    const grid = new Grid(3, 3);
    grid.set(1, 1, Cell.ALIVE);
    expect(countNeighbors(grid, 1, 1, false)).toBe(0);
    expect(countNeighbors(grid, 1, 1, true)).toBe(0);
  });

  it("lets a live 1x1 toroidal cell see itself 8 times", () => {
    const grid = filled(1, 1);
    expect(countNeighbors(grid, 0, 0, true)).toBe(8);
    expect(countNeighbors(grid, 0, 0, false)).toBe(0);
  });

  it("wraps a 1-wide grid horizontally onto the same column", () => {
    // Only (0, 0) alive: from (0, 1) the row above is seen through dx = -1, 0, 1
    const grid = new Grid(1, 3);
    grid.set(0, 0, Cell.ALIVE);
    expect(countNeighbors(grid, 0, 1, true)).toBe(3);
    expect(countNeighbors(grid, 0, 1, false)).toBe(1);
  });
});

describe("nextCellState", () => {
  it("keeps live cells with 2 or 3 neighbors", () => {
    expect(nextCellState(Cell.ALIVE, 2)).toBe(Cell.ALIVE);
    expect(nextCellState(Cell.ALIVE, 3)).toBe(Cell.ALIVE);
  });

  it("kills live cells from under- or over-population", () => {
    for (const n of [0, 1, 4, 5, 6, 7, 8]) {
      expect(nextCellState(Cell.ALIVE, n)).toBe(Cell.DEAD);
    }
  });

  it("births dead cells with exactly 3 neighbors", () => {
    expect(nextCellState(Cell.DEAD, 3)).toBe(Cell.ALIVE);
    for (const n of [0, 1, 2, 4, 5, 6, 7, 8]) {
      expect(nextCellState(Cell.DEAD, n)).toBe(Cell.DEAD);
    }
  });
});
