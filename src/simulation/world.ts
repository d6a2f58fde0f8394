import { Grid } from "./grid";
import { countNeighbors, nextCellState } from "./neighbors";
import { InvalidArgumentError, InvalidDimensionsError } from "./errors";
import type { ReadonlyGrid } from "../types/grid-types";
import { silentLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

/**
 * Double-buffered Game of Life.
 *
 * `current` is only ever read during a step and `next` only ever written;
 * once `next` is complete the two swap roles, so the old current becomes
 * scratch space for the following step.
 */
export class World {
  protected current: Grid;
  protected next: Grid;

  /** Completed steps since construction. */
  generation = 0;

  /** Receives debug diagnostics. Silent unless replaced. */
  logger: Logger = silentLogger;

  constructor();
  constructor(squareSize: number);
  constructor(width: number, height: number);
  constructor(seed: Grid);
  constructor(widthOrSeed: number | Grid = 0, height?: number) {
    if (widthOrSeed instanceof Grid) {
      this.current = widthOrSeed.clone();
    } else {
      this.current = new Grid(widthOrSeed, height ?? widthOrSeed);
    }
    this.next = new Grid(this.current.width, this.current.height);
  }

  get width(): number {
    return this.current.width;
  }

  get height(): number {
    return this.current.height;
  }

  get totalCells(): number {
    return this.current.totalCells;
  }

  get aliveCells(): number {
    return this.current.aliveCells;
  }

  get deadCells(): number {
    return this.current.deadCells;
  }

  /**
   * Read-only view of the current generation. Do not hold on to it across
   * step(): its storage is reused for the generation after next.
   */
  getState(): ReadonlyGrid {
    return this.current;
  }

  resize(squareSize: number): void;
  resize(newWidth: number, newHeight: number): void;
  resize(newWidth: number, newHeight = newWidth): void {
    // Resize a copy first so a rejected size leaves both buffers untouched
    const resized = this.current.clone();
    resized.resize(newWidth, newHeight);
    this.current = resized;
    this.next.resize(newWidth, newHeight);
    this.logger.debug(`World resized to ${newWidth}x${newHeight}`);
  }

  /**
   * Advance one generation.
   *
   * 1. Count live neighbors of every cell in `current` (wrapping if toroidal)
   * 2. Write the B3/S23 outcome for each cell into `next`
   * 3. Swap the buffers
   */
  step(toroidal = false): void {
    const { current, next } = this;
    if (current.width !== next.width || current.height !== next.height) {
      throw new InvalidDimensionsError(
        `World buffers differ: ${current.width}x${current.height} vs ${next.width}x${next.height}`,
      );
    }

    for (let y = 0; y < current.height; y++) {
      for (let x = 0; x < current.width; x++) {
        const neighbors = countNeighbors(current, x, y, toroidal);
        next.set(x, y, nextCellState(current.get(x, y), neighbors));
      }
    }

    this.current = next;
    this.next = current;
    this.generation++;
  }

  /** Run `steps` generations in sequence. Zero is a no-op. */
  advance(steps: number, toroidal = false): void {
    if (!Number.isInteger(steps) || steps < 0) {
      throw new InvalidArgumentError(`Step count must be a non-negative integer, got ${steps}`);
    }
    for (let i = 0; i < steps; i++) {
      this.step(toroidal);
    }
    this.logger.debug(`Advanced ${steps} step(s) to generation ${this.generation}`);
  }
}
