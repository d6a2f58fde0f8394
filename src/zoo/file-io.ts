import { readFileSync, writeFileSync } from "fs";
import { GridFileError } from "../simulation/errors";
import type { Grid } from "../simulation/grid";
import type { ReadonlyGrid } from "../types/grid-types";
import { silentLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";
import { decodeAscii, encodeAscii } from "./ascii-format";
import { decodeBinary, encodeBinary } from "./binary-format";

function read<T>(path: string, parse: (data: Buffer) => T): T {
  let data: Buffer;
  try {
    data = readFileSync(path);
  } catch (err) {
    throw new GridFileError("Cannot read grid file", path, err);
  }
  return parse(data);
}

function write(path: string, data: string | Uint8Array): void {
  try {
    writeFileSync(path, data);
  } catch (err) {
    throw new GridFileError("Cannot write grid file", path, err);
  }
}

export function loadAscii(path: string, logger: Logger = silentLogger): Grid {
  const grid = read(path, data => decodeAscii(data.toString("utf8")));
  logger.info(`Loaded ${grid.width}x${grid.height} ASCII grid from ${path}`);
  return grid;
}

export function saveAscii(path: string, grid: ReadonlyGrid, logger: Logger = silentLogger): void {
  write(path, encodeAscii(grid));
  logger.info(`Saved ${grid.width}x${grid.height} ASCII grid to ${path}`);
}

export function loadBinary(path: string, logger: Logger = silentLogger): Grid {
  const grid = read(path, decodeBinary);
  logger.info(`Loaded ${grid.width}x${grid.height} binary grid from ${path}`);
  return grid;
}

export function saveBinary(path: string, grid: ReadonlyGrid, logger: Logger = silentLogger): void {
  write(path, encodeBinary(grid));
  logger.info(`Saved ${grid.width}x${grid.height} binary grid to ${path}`);
}
