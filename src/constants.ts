// ── Cells ──

/** Stored byte for a dead cell. */
export const DEAD_BYTE = 0;

/** Stored byte for a live cell. */
export const ALIVE_BYTE = 1;

// ── Rendering ──

/** Glyph for a live cell in rendered and ASCII output. */
export const ALIVE_CHAR = "#";

/** Glyph for a dead cell in rendered and ASCII output. */
export const DEAD_CHAR = " ";

/** Border corner glyph. */
export const BORDER_CORNER = "+";

/** Glyph for the top and bottom border rows. */
export const BORDER_HORIZONTAL = "-";

/** Glyph for the left and right border columns. */
export const BORDER_VERTICAL = "|";

// ── Rules ──

/** Live-neighbor counts that keep a live cell alive. */
export const SURVIVE_COUNTS: readonly number[] = [2, 3];

/** Live-neighbor counts that bring a dead cell to life. */
export const BIRTH_COUNTS: readonly number[] = [3];

// ── File formats ──

/** Size in bytes of each dimension field in the binary header. */
export const BINARY_DIMENSION_BYTES = 4;

/** Total binary header size: width then height. */
export const BINARY_HEADER_BYTES = 2 * BINARY_DIMENSION_BYTES;

// ── Limits ──

/** Largest cell count a grid may hold (one byte per cell). */
export const MAX_GRID_CELLS = 2 ** 30;
