import { ALIVE_BYTE, DEAD_BYTE } from "../constants";

/**
 * A cell is either dead or alive. Values match the byte stored per cell.
 */
export const Cell = {
  DEAD: DEAD_BYTE,
  ALIVE: ALIVE_BYTE,
} as const;

export type Cell = (typeof Cell)[keyof typeof Cell];

/**
 * Read-only interface for a grid of cells.
 * Handed out by World so callers can inspect state without modifying it.
 */
export interface ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  readonly totalCells: number;
  readonly aliveCells: number;
  readonly deadCells: number;
  get(x: number, y: number): Cell;
  isValidCoordinate(x: number, y: number): boolean;
  render(): string;
}

/** Mutable access to a single cell whose index has already been resolved. */
export interface CellHandle {
  readonly x: number;
  readonly y: number;
  get(): Cell;
  set(value: Cell): void;
}
