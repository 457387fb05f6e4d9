/**
 * packages/core/src/renderer/surface.ts — Clipped drawing surface.
 *
 * A Surface is a rectangular view onto the backend's cell buffer with its own
 * paint cursor and colors. Containers restrict children exclusively through
 * `clip()`: a widget only ever receives a derived surface, so it cannot write
 * outside the rectangle it was given.
 *
 * The absent surface is `null`. `clip()` returns null for any rectangle that
 * is not fully contained in its parent, and every operation on an absent
 * surface is a no-op (`surface?.print(...)`, `surfaceWidth(null) === 0`).
 */

import type { CellBuffer, Color } from "../backend.js";
import type { Rect } from "../layout/types.js";

export type SurfaceCursor = Readonly<{ dx: number; dy: number }>;

/** Shared by a root surface and everything clipped from it. */
type PassStats = { cells: number };

export class Surface {
  private dx = 0;
  private dy = 0;

  private constructor(
    private readonly buffer: CellBuffer,
    private readonly stats: PassStats,
    private readonly x: number,
    private readonly y: number,
    readonly width: number,
    readonly height: number,
    private fg: Color,
    private bg: Color,
  ) {}

  /** Full-screen surface over `buffer`. */
  static root(buffer: CellBuffer, fg: Color, bg: Color): Surface {
    return new Surface(buffer, { cells: 0 }, 0, 0, buffer.cols, buffer.rows, fg, bg);
  }

  /**
   * Derive a sub-rectangle relative to this surface's origin.
   * Returns null when the rectangle has a negative offset or extent, or
   * crosses the right or bottom edge.
   */
  clip(x: number, y: number, w: number, h: number): Surface | null {
    if (x < 0 || y < 0 || w < 0 || h < 0) return null;
    if (x + w > this.width || y + h > this.height) return null;
    return new Surface(this.buffer, this.stats, this.x + x, this.y + y, w, h, this.fg, this.bg);
  }

  /** Absolute rectangle within the backend grid. */
  rect(): Rect {
    return { x: this.x, y: this.y, w: this.width, h: this.height };
  }

  cursor(): SurfaceCursor {
    return { dx: this.dx, dy: this.dy };
  }

  foreground(): Color {
    return this.fg;
  }

  background(): Color {
    return this.bg;
  }

  /** Cells written by this surface's root and every surface clipped from it. */
  cellsPainted(): number {
    return this.stats.cells;
  }

  setForeground(color: Color): void {
    this.fg = color;
  }

  setBackground(color: Color): void {
    this.bg = color;
  }

  /** Fill the rectangle with blanks in the current colors and home the cursor. */
  clear(): void {
    for (let row = 0; row < this.height; row++) {
      for (let col = 0; col < this.width; col++) {
        this.put(col, row, " ");
      }
    }
    this.dx = 0;
    this.dy = 0;
  }

  /**
   * Paint `text` from the cursor, wrapping at the right edge. Characters past
   * the last row are dropped.
   */
  print(text: string): void {
    if (this.width === 0) return;
    for (const ch of text) {
      if (this.dx >= this.width) {
        this.dx = 0;
        this.dy++;
      }
      if (this.dy >= this.height) return;
      this.put(this.dx, this.dy, ch);
      this.dx++;
    }
  }

  println(text: string): void {
    this.print(text);
    this.dx = 0;
    this.dy++;
  }

  private put(col: number, row: number, ch: string): void {
    const cell = this.buffer.cells[(this.y + row) * this.buffer.cols + this.x + col];
    if (cell === undefined) return;
    cell.ch = ch;
    cell.fg = this.fg;
    cell.bg = this.bg;
    this.stats.cells++;
  }
}

export function surfaceWidth(surface: Surface | null): number {
  return surface?.width ?? 0;
}

export function surfaceHeight(surface: Surface | null): number {
  return surface?.height ?? 0;
}
