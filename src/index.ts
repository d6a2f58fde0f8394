export { Grid } from "./simulation/grid";
export { World } from "./simulation/world";
export { countNeighbors, nextCellState } from "./simulation/neighbors";
export {
  GameOfLifeError, ConstructionError, OutOfRangeError, InvalidDimensionsError,
  InvalidArgumentError, CellCorruptionError, GridFormatError, GridFileError,
} from "./simulation/errors";
export { Cell } from "./types/grid-types";
export type { ReadonlyGrid, CellHandle } from "./types/grid-types";
export { silentLogger, consoleLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
export * as Zoo from "./zoo";
