/**
 * packages/core/src/renderer/paint.ts — Recursive widget painting.
 *
 * Each container measures its children, splits its own surface and hands
 * every child a clipped sub-surface. A child whose slice does not fit gets
 * null and paints nothing.
 */

import { DEFAULT_COLOR } from "../backend.js";
import { GRID_COLUMN_GAP, gridTracks } from "../layout/kinds/grid.js";
import { sliceStack } from "../layout/kinds/stack.js";
import { measure } from "../layout/measure.js";
import type { GridWidget, Widget } from "../widgets/types.js";
import { type Surface, surfaceHeight, surfaceWidth } from "./surface.js";

/** Counts visited widgets for frame metrics. */
export type PaintTally = { widgets: number };

export function paintWidget(widget: Widget, surface: Surface | null, tally?: PaintTally): void {
  if (tally) tally.widgets++;
  switch (widget.kind) {
    case "label":
      surface?.print(widget.text);
      return;
    case "blank":
      return;
    case "canvas":
      if (surface) widget.draw(surface);
      return;
    case "tint":
      if (widget.fg !== DEFAULT_COLOR) surface?.setForeground(widget.fg);
      if (widget.bg !== DEFAULT_COLOR) surface?.setBackground(widget.bg);
      paintWidget(widget.child, surface, tally);
      return;
    case "row": {
      const h = surfaceHeight(surface);
      const slices = sliceStack(widget.children, "width", surfaceWidth(surface), measure);
      for (let i = 0; i < widget.children.length; i++) {
        const child = widget.children[i];
        const slice = slices[i];
        if (child === undefined || slice === undefined) continue;
        paintWidget(child, surface?.clip(slice.offset, 0, slice.size, h) ?? null, tally);
      }
      return;
    }
    case "column": {
      const w = surfaceWidth(surface);
      const slices = sliceStack(widget.children, "height", surfaceHeight(surface), measure);
      for (let i = 0; i < widget.children.length; i++) {
        const child = widget.children[i];
        const slice = slices[i];
        if (child === undefined || slice === undefined) continue;
        paintWidget(child, surface?.clip(0, slice.offset, w, slice.size) ?? null, tally);
      }
      return;
    }
    case "grid":
      paintGrid(widget, surface, tally);
      return;
  }
}

/** Grids place every cell themselves; the rows' own split is never used. */
function paintGrid(grid: GridWidget, surface: Surface | null, tally?: PaintTally): void {
  const tracks = gridTracks(grid, measure);
  let y = 0;
  for (let i = 0; i < grid.rows.length; i++) {
    const row = grid.rows[i];
    const h = tracks.rows[i] ?? 0;
    if (row === undefined) continue;
    let x = 0;
    for (let j = 0; j < row.children.length; j++) {
      const cell = row.children[j];
      const w = tracks.columns[j] ?? 0;
      if (cell !== undefined) paintWidget(cell, surface?.clip(x, y, w, h) ?? null, tally);
      x += w + GRID_COLUMN_GAP;
    }
    y += h;
  }
}
