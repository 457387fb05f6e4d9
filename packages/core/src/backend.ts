/**
 * Terminal backend contract.
 *
 * The backend owns the physical cell grid. The root driver receives it as an
 * explicit handle; nothing in core imports a process-wide terminal.
 */

/**
 * Opaque color token. The core never interprets colors beyond comparing them
 * with DEFAULT_COLOR; the backend decides how a token is encoded.
 */
export type Color = number;

/** The terminal's own default foreground/background. */
export const DEFAULT_COLOR: Color = 0;

/** One character cell. Mutable: surfaces overwrite cells in place. */
export type Cell = {
  ch: string;
  fg: Color;
  bg: Color;
};

/**
 * Row-major grid of `cols * rows` cells.
 * Cell (x, y) lives at `cells[y * cols + x]`.
 */
export type CellBuffer = Readonly<{
  cols: number;
  rows: number;
  cells: Cell[];
}>;

export type TerminalSize = Readonly<{ cols: number; rows: number }>;

export type KeyEvent = Readonly<{
  kind: "key";
  /** Printable character, or a name such as "enter", "escape", "up". */
  key: string;
  ctrl: boolean;
  alt: boolean;
}>;

export type ResizeEvent = Readonly<{ kind: "resize"; cols: number; rows: number }>;

export type TerminalEvent = KeyEvent | ResizeEvent;

/**
 * Backend interface for the root driver.
 *
 * Rules:
 * - `size()` MUST match the dimensions of the buffer returned by `cellBuffer()`.
 * - `clear()` resets every cell to a blank in the given colors.
 * - `flush()` presents the current buffer. Called exactly once per draw pass.
 * - `pollEvent()` is for the application's event loop; the core never calls it.
 */
export interface TerminalBackend {
  size(): TerminalSize;
  clear(fg: Color, bg: Color): void;
  flush(): void;
  cellBuffer(): CellBuffer;
  pollEvent(): Promise<TerminalEvent>;
}

export function blankCell(fg: Color, bg: Color): Cell {
  return { ch: " ", fg, bg };
}
