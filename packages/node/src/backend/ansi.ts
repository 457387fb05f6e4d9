/**
 * packages/node/src/backend/ansi.ts — Cell buffer to ANSI encoding.
 *
 * Color tokens:
 *   0        terminal default
 *   1..8     black, red, green, yellow, blue, magenta, cyan, white
 *   9..16    bright variants of 1..8
 *   17..272  xterm 256-color palette entries 0..255
 * Any other token renders as the terminal default.
 */

import type { CellBuffer, Color } from "@cellgrid/core";

const ESC = "\x1b[";

export const ansiColor = Object.freeze({
  default: 0,
  black: 1,
  red: 2,
  green: 3,
  yellow: 4,
  blue: 5,
  magenta: 6,
  cyan: 7,
  white: 8,
  /** Bright variant of a basic color (1..8). */
  bright(color: Color): Color {
    return color >= 1 && color <= 8 ? color + 8 : color;
  },
  /** xterm 256-color palette entry. */
  palette(index: number): Color {
    return 17 + Math.max(0, Math.min(255, Math.trunc(index)));
  },
});

function sgrColor(color: Color, layer: "fg" | "bg"): string {
  const base = layer === "fg" ? 30 : 40;
  if (!Number.isInteger(color) || color <= 0 || color > 272) return String(base + 9);
  if (color <= 8) return String(base + color - 1);
  if (color <= 16) return String(base + 60 + color - 9);
  return `${String(base + 8)};5;${String(color - 17)}`;
}

export function sgr(fg: Color, bg: Color): string {
  return `${ESC}0;${sgrColor(fg, "fg")};${sgrColor(bg, "bg")}m`;
}

/**
 * Full-frame encoding: every row is positioned explicitly so writing the
 * bottom-right cell never scrolls the screen.
 */
export function encodeFrame(buffer: CellBuffer): string {
  let out = "";
  for (let y = 0; y < buffer.rows; y++) {
    out += `${ESC}${String(y + 1)};1H`;
    let fg: Color | null = null;
    let bg: Color | null = null;
    for (let x = 0; x < buffer.cols; x++) {
      const cell = buffer.cells[y * buffer.cols + x];
      if (cell === undefined) continue;
      if (cell.fg !== fg || cell.bg !== bg) {
        fg = cell.fg;
        bg = cell.bg;
        out += sgr(fg, bg);
      }
      out += cell.ch;
    }
  }
  return `${out}${ESC}0m`;
}

export const ANSI_ENTER_ALT_SCREEN = `${ESC}?1049h`;
export const ANSI_LEAVE_ALT_SCREEN = `${ESC}?1049l`;
export const ANSI_HIDE_CURSOR = `${ESC}?25l`;
export const ANSI_SHOW_CURSOR = `${ESC}?25h`;
