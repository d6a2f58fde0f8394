import { ALIVE_BYTE, DEAD_BYTE } from "../constants";
import { Cell } from "../types/grid-types";

/** Flat index of (x, y) in a row-major buffer of the given width. */
export function gridIndex(x: number, y: number, width: number): number {
  return x + width * y;
}

/** Wraps a coordinate into [0, size). Works for negative values. */
export function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}

/** Normalizes any integer number of quarter turns into 0..3. */
export function normalizeQuarterTurns(quarterTurns: number): number {
  return wrap(quarterTurns, 4);
}

/** True if the value is a legal cell byte. */
export function isCell(value: number): value is Cell {
  return value === DEAD_BYTE || value === ALIVE_BYTE;
}

/** True for integers >= 0. */
export function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
