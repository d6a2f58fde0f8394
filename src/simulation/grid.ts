import {
  ALIVE_CHAR, DEAD_CHAR, BORDER_CORNER, BORDER_HORIZONTAL, BORDER_VERTICAL, MAX_GRID_CELLS,
} from "../constants";
import { Cell } from "../types/grid-types";
import type { CellHandle, ReadonlyGrid } from "../types/grid-types";
import { gridIndex, isCell, isNonNegativeInteger, normalizeQuarterTurns } from "../utils/grid-utils";
import { CellCorruptionError, ConstructionError, InvalidArgumentError, OutOfRangeError } from "./errors";

/**
 * Source-coordinate coefficients for each clockwise quarter turn.
 * For destination (x, y) in the rotated grid the source cell is
 *   sx = ax·x + bx·y + cx·(W-1)
 *   sy = ay·x + by·y + cy·(H-1)
 * where W, H are the source dimensions.
 */
const ROTATION_COEFFICIENTS: ReadonlyArray<readonly [number, number, number, number, number, number]> = [
  // ax, bx, cx, ay, by, cy
  [1, 0, 0, 0, 1, 0],    // 0:   (x, y)
  [0, 1, 0, -1, 0, 1],   // 90:  (y, H-1-x)
  [-1, 0, 1, 0, -1, 1],  // 180: (W-1-x, H-1-y)
  [0, -1, 1, 1, 0, 0],   // 270: (W-1-y, x)
];

function checkDimensions(width: number, height: number): void {
  if (!isNonNegativeInteger(width)) {
    throw new ConstructionError(`Grid width must be a non-negative integer, got ${width}`);
  }
  if (!isNonNegativeInteger(height)) {
    throw new ConstructionError(`Grid height must be a non-negative integer, got ${height}`);
  }
  if (width * height > MAX_GRID_CELLS) {
    throw new ConstructionError(`Grid of ${width}x${height} exceeds the ${MAX_GRID_CELLS}-cell limit`);
  }
}

/**
 * A dense rectangular grid of cells, stored row-major: (x, y) lives at x + width·y.
 *
 * x grows to the right and y grows downward. Every coordinate access is
 * bounds-checked; out-of-range access throws rather than clamping or wrapping.
 */
export class Grid implements ReadonlyGrid {
  private cells: Uint8Array;
  private _width: number;
  private _height: number;

  constructor();
  constructor(squareSize: number);
  constructor(width: number, height: number);
  constructor(width = 0, height = width) {
    checkDimensions(width, height);
    this._width = width;
    this._height = height;
    // Uint8Array is zero-filled, and zero is DEAD
    this.cells = new Uint8Array(width * height);
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get totalCells(): number {
    return this._width * this._height;
  }

  get aliveCells(): number {
    return this.countCells(Cell.ALIVE);
  }

  get deadCells(): number {
    return this.countCells(Cell.DEAD);
  }

  isValidCoordinate(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && y >= 0 && x < this._width && y < this._height;
  }

  get(x: number, y: number): Cell {
    return this.readIndex(this.checkedIndex(x, y));
  }

  set(x: number, y: number, value: Cell): void {
    const i = this.checkedIndex(x, y);
    this.writeIndex(i, value);
  }

  /**
   * Resolve (x, y) once and return a handle for repeated reads and writes.
   * A resize invalidates the handle; using it afterwards throws.
   */
  cellAt(x: number, y: number): CellHandle {
    const i = this.checkedIndex(x, y);
    const buffer = this.cells;
    const live = (): void => {
      if (this.cells !== buffer) {
        throw new OutOfRangeError(`Handle for (${x}, ${y}) was invalidated by a resize`);
      }
    };
    return {
      x,
      y,
      get: () => {
        live();
        return this.readIndex(i);
      },
      set: (value: Cell) => {
        live();
        this.writeIndex(i, value);
      },
    };
  }

  resize(squareSize: number): void;
  resize(newWidth: number, newHeight: number): void;
  resize(newWidth: number, newHeight = newWidth): void {
    checkDimensions(newWidth, newHeight);

    const resized = new Uint8Array(newWidth * newHeight);
    const keepW = Math.min(this._width, newWidth);
    const keepH = Math.min(this._height, newHeight);
    for (let y = 0; y < keepH; y++) {
      const from = gridIndex(0, y, this._width);
      resized.set(this.cells.subarray(from, from + keepW), gridIndex(0, y, newWidth));
    }

    this.cells = resized;
    this._width = newWidth;
    this._height = newHeight;
  }

  /** Copy of the half-open window [x0, x1) × [y0, y1). */
  crop(x0: number, y0: number, x1: number, y1: number): Grid {
    const inBounds = [x0, y0, x1, y1].every(Number.isInteger) &&
      x0 >= 0 && y0 >= 0 && x1 <= this._width && y1 <= this._height;
    if (!inBounds || x1 < x0 || y1 < y0) {
      throw new OutOfRangeError(
        `Crop window [${x0}, ${x1}) × [${y0}, ${y1}) does not fit a ${this._width}x${this._height} grid`,
      );
    }

    const cropped = new Grid(x1 - x0, y1 - y0);
    for (let y = y0; y < y1; y++) {
      const from = gridIndex(x0, y, this._width);
      cropped.cells.set(this.cells.subarray(from, from + (x1 - x0)), gridIndex(0, y - y0, cropped._width));
    }
    return cropped;
  }

  /**
   * Overlay `other` with its top-left corner at (x0, y0).
   * With `aliveOnly`, dead cells in `other` leave the receiver untouched.
   */
  merge(other: ReadonlyGrid, x0: number, y0: number, aliveOnly = false): void {
    const fits = Number.isInteger(x0) && Number.isInteger(y0) &&
      x0 >= 0 && y0 >= 0 &&
      x0 + other.width <= this._width && y0 + other.height <= this._height;
    if (!fits) {
      throw new OutOfRangeError(
        `Cannot place a ${other.width}x${other.height} grid at (${x0}, ${y0}) in a ${this._width}x${this._height} grid`,
      );
    }

    for (let y = 0; y < other.height; y++) {
      for (let x = 0; x < other.width; x++) {
        const value = other.get(x, y);
        if (aliveOnly && value !== Cell.ALIVE) continue;
        this.writeIndex(gridIndex(x0 + x, y0 + y, this._width), value);
      }
    }
  }

  /**
   * Copy rotated clockwise by `quarterTurns` × 90°. Negative turns rotate
   * counter-clockwise. Odd turn counts swap width and height.
   *
   * Every turn count runs the same per-cell loop through the coefficient table.
   */
  rotate(quarterTurns: number): Grid {
    if (!Number.isInteger(quarterTurns)) {
      throw new InvalidArgumentError(`Rotation must be a whole number of quarter turns, got ${quarterTurns}`);
    }
    const turns = normalizeQuarterTurns(quarterTurns);
    const swap = turns % 2;
    const rotated = new Grid(
      swap ? this._height : this._width,
      swap ? this._width : this._height,
    );

    const [ax, bx, cx, ay, by, cy] = ROTATION_COEFFICIENTS[turns];
    const maxX = this._width - 1;
    const maxY = this._height - 1;
    for (let y = 0; y < rotated._height; y++) {
      for (let x = 0; x < rotated._width; x++) {
        const sx = ax * x + bx * y + cx * maxX;
        const sy = ay * x + by * y + cy * maxY;
        rotated.cells[gridIndex(x, y, rotated._width)] = this.cells[gridIndex(sx, sy, this._width)];
      }
    }
    return rotated;
  }

  clone(): Grid {
    const copy = new Grid(this._width, this._height);
    copy.cells.set(this.cells);
    return copy;
  }

  equals(other: ReadonlyGrid): boolean {
    if (other.width !== this._width || other.height !== this._height) return false;
    for (let y = 0; y < this._height; y++) {
      for (let x = 0; x < this._width; x++) {
        if (other.get(x, y) !== this.readIndex(gridIndex(x, y, this._width))) return false;
      }
    }
    return true;
  }

  /** Visits every cell row by row. */
  forEachCell(fn: (x: number, y: number, value: Cell) => void): void {
    for (let y = 0; y < this._height; y++) {
      for (let x = 0; x < this._width; x++) {
        fn(x, y, this.readIndex(gridIndex(x, y, this._width)));
      }
    }
  }

  /**
   * Bordered text rendering:
   *
   *     +---+
   *     |   |
   *     | # |
   *     |   |
   *     +---+
   */
  render(): string {
    const edge = BORDER_CORNER + BORDER_HORIZONTAL.repeat(this._width) + BORDER_CORNER + "\n";
    let out = edge;
    for (let y = 0; y < this._height; y++) {
      out += BORDER_VERTICAL;
      for (let x = 0; x < this._width; x++) {
        out += this.readIndex(gridIndex(x, y, this._width)) === Cell.ALIVE ? ALIVE_CHAR : DEAD_CHAR;
      }
      out += BORDER_VERTICAL + "\n";
    }
    return out + edge;
  }

  toString(): string {
    return this.render();
  }

  private checkedIndex(x: number, y: number): number {
    if (!this.isValidCoordinate(x, y)) {
      throw new OutOfRangeError(`Coordinate (${x}, ${y}) is outside a ${this._width}x${this._height} grid`);
    }
    return gridIndex(x, y, this._width);
  }

  private readIndex(i: number): Cell {
    const value = this.cells[i];
    if (!isCell(value)) {
      throw new CellCorruptionError(`Corrupt cell value ${value} at index ${i}`);
    }
    return value;
  }

  private writeIndex(i: number, value: Cell): void {
    if (!isCell(value)) {
      throw new CellCorruptionError(`Invalid cell value ${String(value)}`);
    }
    this.cells[i] = value;
  }

  private countCells(state: Cell): number {
    let count = 0;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.readIndex(i) === state) count++;
    }
    return count;
  }
}
