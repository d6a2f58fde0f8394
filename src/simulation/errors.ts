/** Base class for every error thrown by grids, worlds and the zoo. */
export class GameOfLifeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A grid was constructed or resized with a negative or non-integer dimension. */
export class ConstructionError extends GameOfLifeError {}

/** A coordinate, crop window or merge placement lies outside the grid. */
export class OutOfRangeError extends GameOfLifeError {}

/** The two World buffers disagree on their dimensions. */
export class InvalidDimensionsError extends GameOfLifeError {}

/** An argument has an unsupported value, e.g. a negative step count. */
export class InvalidArgumentError extends GameOfLifeError {}

/** A cell value other than ALIVE or DEAD was read or supplied. */
export class CellCorruptionError extends GameOfLifeError {}

/** Encoded grid data (ASCII or binary) is malformed. */
export class GridFormatError extends GameOfLifeError {}

/** Reading or writing a grid file failed. */
export class GridFileError extends GameOfLifeError {
  readonly path: string;

  constructor(message: string, path: string, cause: unknown) {
    super(`${message}: ${path}`, { cause });
    this.path = path;
  }
}
