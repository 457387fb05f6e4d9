import type { GridWidget, Widget } from "../../widgets/types.js";
import type { Axis, SizeRequirement } from "../types.js";
import { measureStack } from "./stack.js";

type MeasureFn = (widget: Widget, axis: Axis) => SizeRequirement;

/** Gap between adjacent grid columns, in cells. */
export const GRID_COLUMN_GAP = 1;

/**
 * Width: the widest row requirement plus one padding cell per row.
 * Height: the rows' height requirements summed.
 *
 * The padding scales with the number of rows, not with the number of column
 * gaps. Callers that size a grid from its requirement get one cell per row.
 */
export function measureGrid(grid: GridWidget, axis: Axis, measure: MeasureFn): SizeRequirement {
  let min = 0;
  let max = 0;
  for (const row of grid.rows) {
    const req = measureStack(row.children, "width", axis, measure);
    if (axis === "height") {
      min += req.min;
      max += req.max;
      continue;
    }
    if (req.min > min) min = req.min;
    if (req.max > max) max = req.max;
  }
  if (axis === "width") {
    min += grid.rows.length;
    max += grid.rows.length;
  }
  return { min, max };
}

export type GridTracks = Readonly<{
  /** Width of each column: the largest minimum width among its cells. */
  columns: readonly number[];
  /** Height of each row: the largest minimum height among its cells. */
  rows: readonly number[];
}>;

/**
 * Column widths and row heights for a grid. Rows shorter than a column index
 * contribute nothing to that column.
 */
export function gridTracks(grid: GridWidget, measure: MeasureFn): GridTracks {
  let cols = 0;
  for (const row of grid.rows) {
    if (row.children.length > cols) cols = row.children.length;
  }

  const columns = new Array<number>(cols).fill(0);
  const rows = new Array<number>(grid.rows.length).fill(0);
  for (let i = 0; i < grid.rows.length; i++) {
    const cells = grid.rows[i]?.children ?? [];
    for (let j = 0; j < cells.length; j++) {
      const cell = cells[j];
      if (cell === undefined) continue;
      const w = measure(cell, "width").min;
      if (w > (columns[j] ?? 0)) columns[j] = w;
      const h = measure(cell, "height").min;
      if (h > (rows[i] ?? 0)) rows[i] = h;
    }
  }
  return { columns, rows };
}
