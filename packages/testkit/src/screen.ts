import xtermHeadless, { type IBufferCell } from "@xterm/headless";

export type ScreenSnapshot = Readonly<{
  cols: number;
  rows: number;
  /** Every row padded to `cols`. */
  lines: readonly string[];
}>;

export type Screen = Readonly<{
  write: (data: string) => Promise<void>;
  flush: () => Promise<void>;
  resize: (cols: number, rows: number) => Promise<void>;
  snapshot: () => ScreenSnapshot;
  /** Foreground palette index of a cell, -1 for the default color. */
  fgColorAt: (x: number, y: number) => number;
  /** Background palette index of a cell, -1 for the default color. */
  bgColorAt: (x: number, y: number) => number;
}>;

/**
 * In-process terminal emulator for asserting on what a backend wrote.
 */
export function createScreen(opts: Readonly<{ cols: number; rows: number }>): Screen {
  const Terminal = xtermHeadless.Terminal;
  if (typeof Terminal !== "function") {
    throw new Error("Unexpected @xterm/headless shape: missing Terminal export");
  }
  let cols = opts.cols;
  let rows = opts.rows;

  const term = new Terminal({
    cols,
    rows,
    allowProposedApi: true,
    convertEol: false,
    scrollback: 0,
  });

  let pending = Promise.resolve();
  const write = async (data: string): Promise<void> => {
    pending = pending.then(
      () =>
        new Promise<void>((resolve) => {
          term.write(data, resolve);
        }),
    );
    await pending;
  };

  const flush = async (): Promise<void> => {
    await pending;
  };

  const resize = async (nextCols: number, nextRows: number): Promise<void> => {
    cols = nextCols;
    rows = nextRows;
    pending = pending.then(() => {
      term.resize(nextCols, nextRows);
    });
    await pending;
  };

  const snapshot = (): ScreenSnapshot => {
    const lines: string[] = [];
    for (let r = 0; r < rows; r++) {
      const line = term.buffer.active.getLine(r);
      const text = line?.translateToString(false) ?? "";
      lines.push(text.padEnd(cols, " ").slice(0, cols));
    }
    return { cols, rows, lines };
  };

  const cellAt = (x: number, y: number): IBufferCell | undefined =>
    term.buffer.active.getLine(y)?.getCell(x);

  return {
    write,
    flush,
    resize,
    snapshot,
    fgColorAt: (x, y) => {
      const cell = cellAt(x, y);
      if (!cell || cell.isFgDefault()) return -1;
      return cell.getFgColor();
    },
    bgColorAt: (x, y) => {
      const cell = cellAt(x, y);
      if (!cell || cell.isBgDefault()) return -1;
      return cell.getBgColor();
    },
  };
}
