import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadAscii, loadBinary, saveAscii, saveBinary } from "./file-io";
import { glider, lightWeightSpaceship } from "./creatures";
import { GridFileError, GridFormatError } from "../simulation/errors";
import type { Logger } from "../utils/logger";

describe("grid files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gol-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("saves and loads ASCII files", () => {
    const path = join(dir, "glider.gol");
    saveAscii(path, glider());
    expect(readFileSync(path, "utf8")).toBe("3 3\n # \n  #\n###\n");
    expect(loadAscii(path).equals(glider())).toBe(true);
  });

  it("saves and loads binary files", () => {
    const path = join(dir, "lwss.bgol");
    saveBinary(path, lightWeightSpaceship());
    expect(readFileSync(path).length).toBe(8 + 3);
    expect(loadBinary(path).equals(lightWeightSpaceship())).toBe(true);
  });

  it("wraps missing files in GridFileError", () => {
    const path = join(dir, "missing.gol");
    expect(() => loadAscii(path)).toThrow(GridFileError);
    expect(() => loadBinary(path)).toThrow(`Cannot read grid file: ${path}`);
  });

  it("fails to save into a directory that does not exist", () => {
    const path = join(dir, "does-not-exist", "glider.gol");
    expect(() => saveAscii(path, glider())).toThrow(GridFileError);
    expect(() => saveBinary(path, glider())).toThrow(GridFileError);
    expect(existsSync(path)).toBe(false);
  });

  it("passes format errors through unchanged", () => {
    const path = join(dir, "bad.gol");
    saveBinary(path, glider());
    expect(() => loadAscii(path)).toThrow(GridFormatError);
  });

  it("reports to an injected logger", () => {
    const logger: Logger = { debug: jest.fn(), info: jest.fn() };
    const path = join(dir, "glider.gol");
    saveAscii(path, glider(), logger);
    loadAscii(path, logger);
    expect(logger.info).toHaveBeenCalledWith(`Saved 3x3 ASCII grid to ${path}`);
    expect(logger.info).toHaveBeenCalledWith(`Loaded 3x3 ASCII grid from ${path}`);
    expect(logger.debug).not.toHaveBeenCalled();
  });
});
