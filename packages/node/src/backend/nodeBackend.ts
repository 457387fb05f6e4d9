/**
 * Node TerminalBackend implementation.
 *
 * Owns an in-memory cell buffer sized to the output stream and presents it
 * as a full ANSI frame on every flush(). Input is read in raw mode and
 * decoded into key events; stream resizes become resize events.
 */

import {
  type Cell,
  type CellBuffer,
  CellgridError,
  type Color,
  DEFAULT_COLOR,
  type TerminalBackend,
  type TerminalEvent,
  type TerminalSize,
  blankCell,
  emitFrameAudit,
} from "@cellgrid/core";
import terminalSize from "terminal-size";
import {
  ANSI_ENTER_ALT_SCREEN,
  ANSI_HIDE_CURSOR,
  ANSI_LEAVE_ALT_SCREEN,
  ANSI_SHOW_CURSOR,
  encodeFrame,
} from "./ansi.js";
import { decodeKeys } from "./keys.js";

/** Subset of a TTY write stream the backend uses. */
export interface TerminalOutput {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
}

/** Subset of a TTY read stream the backend uses. */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: "data", listener: (chunk: string | Buffer) => void): unknown;
  off(event: "data", listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export type NodeBackendConfig = Readonly<{
  stdout?: TerminalOutput;
  stdin?: TerminalInput;
  /** Switch to the alternate screen while started. Default true. */
  altScreen?: boolean;
  /** Hide the cursor while started. Default true. */
  hideCursor?: boolean;
  /** Size used when neither the stream nor the OS reports one. Default 80x24. */
  fallbackSize?: TerminalSize;
  /** Overrides CELLGRID_FRAME_AUDIT for flush records. */
  frameAudit?: boolean;
}>;

type ResolvedNodeBackendConfig = Readonly<{
  stdout: TerminalOutput;
  stdin: TerminalInput;
  altScreen: boolean;
  hideCursor: boolean;
  fallbackSize: TerminalSize;
  frameAudit: boolean | undefined;
}>;

export interface NodeBackend extends TerminalBackend {
  /** Enter raw mode (and the alternate screen) and start delivering events. */
  start(): void;
  /** Restore the terminal. Pending and later pollEvent() calls reject. */
  stop(): void;
}

const DEFAULT_FALLBACK_SIZE: TerminalSize = Object.freeze({ cols: 80, rows: 24 });

function invalidProps(detail: string): never {
  throw new CellgridError("CG_INVALID_PROPS", detail);
}

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveNodeBackendConfig(
  config: NodeBackendConfig | undefined,
): ResolvedNodeBackendConfig {
  const fallbackSize = config?.fallbackSize ?? DEFAULT_FALLBACK_SIZE;
  if (toPositiveIntOr(fallbackSize.cols, 0) === 0 || toPositiveIntOr(fallbackSize.rows, 0) === 0) {
    invalidProps("fallbackSize cols and rows must be positive integers");
  }
  return Object.freeze({
    stdout: config?.stdout ?? process.stdout,
    stdin: config?.stdin ?? process.stdin,
    altScreen: config?.altScreen !== false,
    hideCursor: config?.hideCursor !== false,
    fallbackSize,
    frameAudit: config?.frameAudit,
  });
}

/**
 * Stream dimensions first, then the OS (terminal-size), then the configured
 * fallback.
 */
export function readTerminalSize(stdout: TerminalOutput, fallback: TerminalSize): TerminalSize {
  const cols = toPositiveIntOr(stdout.columns, 0);
  const rows = toPositiveIntOr(stdout.rows, 0);
  if (cols > 0 && rows > 0) return { cols, rows };
  try {
    const size = terminalSize();
    return {
      cols: cols > 0 ? cols : toPositiveIntOr(size.columns, fallback.cols),
      rows: rows > 0 ? rows : toPositiveIntOr(size.rows, fallback.rows),
    };
  } catch {
    return {
      cols: cols > 0 ? cols : fallback.cols,
      rows: rows > 0 ? rows : fallback.rows,
    };
  }
}

function makeBuffer(size: TerminalSize): CellBuffer {
  const cells: Cell[] = [];
  for (let i = 0; i < size.cols * size.rows; i++) cells.push(blankCell(DEFAULT_COLOR, DEFAULT_COLOR));
  return { cols: size.cols, rows: size.rows, cells };
}

type PendingPoll = Readonly<{
  resolve: (event: TerminalEvent) => void;
  reject: (err: Error) => void;
}>;

export function createNodeBackend(config?: NodeBackendConfig): NodeBackend {
  const cfg = resolveNodeBackendConfig(config);
  const { stdout, stdin } = cfg;

  let buffer = makeBuffer(readTerminalSize(stdout, cfg.fallbackSize));
  let started = false;
  let stopped = false;
  let wasRaw = false;
  const queued: TerminalEvent[] = [];
  let pending: PendingPoll | null = null;

  const deliver = (event: TerminalEvent): void => {
    if (pending !== null) {
      const { resolve } = pending;
      pending = null;
      resolve(event);
      return;
    }
    queued.push(event);
  };

  const onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    for (const event of decodeKeys(text)) deliver(event);
  };

  const onResize = (): void => {
    const size = readTerminalSize(stdout, cfg.fallbackSize);
    if (size.cols === buffer.cols && size.rows === buffer.rows) return;
    buffer = makeBuffer(size);
    deliver(Object.freeze({ kind: "resize", cols: size.cols, rows: size.rows }));
  };

  const assertUsable = (op: string): void => {
    if (stopped) throw new CellgridError("CG_INVALID_STATE", `${op}() called after stop()`);
  };

  return {
    start(): void {
      assertUsable("start");
      if (started) return;
      started = true;
      if (stdin.isTTY === true && typeof stdin.setRawMode === "function") {
        wasRaw = true;
        stdin.setRawMode(true);
      }
      stdin.on("data", onData);
      stdin.resume();
      stdout.on("resize", onResize);
      let prologue = "";
      if (cfg.altScreen) prologue += ANSI_ENTER_ALT_SCREEN;
      if (cfg.hideCursor) prologue += ANSI_HIDE_CURSOR;
      if (prologue.length > 0) stdout.write(prologue);
    },

    stop(): void {
      if (stopped) return;
      stopped = true;
      if (started) {
        stdout.off("resize", onResize);
        stdin.off("data", onData);
        stdin.pause();
        if (wasRaw && typeof stdin.setRawMode === "function") stdin.setRawMode(false);
        let epilogue = "";
        if (cfg.hideCursor) epilogue += ANSI_SHOW_CURSOR;
        if (cfg.altScreen) epilogue += ANSI_LEAVE_ALT_SCREEN;
        if (epilogue.length > 0) stdout.write(epilogue);
      }
      if (pending !== null) {
        const { reject } = pending;
        pending = null;
        reject(new CellgridError("CG_INVALID_STATE", "backend stopped while polling"));
      }
    },

    size(): TerminalSize {
      return { cols: buffer.cols, rows: buffer.rows };
    },

    clear(fg: Color, bg: Color): void {
      for (const cell of buffer.cells) {
        cell.ch = " ";
        cell.fg = fg;
        cell.bg = bg;
      }
    },

    flush(): void {
      assertUsable("flush");
      const frame = encodeFrame(buffer);
      stdout.write(frame);
      emitFrameAudit(
        "node",
        "backend",
        "backend.flush",
        { cols: buffer.cols, rows: buffer.rows, chars: frame.length },
        cfg.frameAudit,
      );
    },

    cellBuffer(): CellBuffer {
      return buffer;
    },

    pollEvent(): Promise<TerminalEvent> {
      if (stopped) {
        return Promise.reject(new CellgridError("CG_INVALID_STATE", "pollEvent() called after stop()"));
      }
      if (pending !== null) {
        return Promise.reject(
          new CellgridError("CG_INVALID_STATE", "pollEvent() called while a poll is pending"),
        );
      }
      const next = queued.shift();
      if (next !== undefined) return Promise.resolve(next);
      return new Promise<TerminalEvent>((resolve, reject) => {
        pending = { resolve, reject };
      });
    },
  };
}
