import { Grid } from "../simulation/grid";
import { ConstructionError, GridFormatError } from "../simulation/errors";

/** Allocate the grid a file header describes, reporting impossible sizes as format errors. */
export function gridForHeader(width: number, height: number): Grid {
  try {
    return new Grid(width, height);
  } catch (err) {
    if (err instanceof ConstructionError) {
      throw new GridFormatError(`Header dimensions ${width}x${height} cannot be allocated`, { cause: err });
    }
    throw err;
  }
}
