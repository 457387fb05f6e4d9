/**
 * packages/core/src/widgets/types.ts — Widget tree definitions.
 *
 * A widget tree is an immutable, acyclic value built by the caller (usually
 * through the `ui` factories). The engine reads it during a draw pass and never
 * mutates or retains it.
 */

import type { Color } from "../backend.js";
import type { SizeRequirement } from "../layout/types.js";
import type { Surface } from "../renderer/surface.js";

/** Constant one-line text. Width is the code point count of `text`. */
export type LabelWidget = Readonly<{ kind: "label"; text: string }>;

/** Empty spacer with explicit requirements on both axes. */
export type BlankWidget = Readonly<{
  kind: "blank";
  width: SizeRequirement;
  height: SizeRequirement;
}>;

/**
 * Paints its child with the given colors. DEFAULT_COLOR leaves the inherited
 * color in place.
 */
export type TintWidget = Readonly<{ kind: "tint"; fg: Color; bg: Color; child: Widget }>;

/** Children laid out left to right. */
export type RowWidget = Readonly<{ kind: "row"; children: readonly Widget[] }>;

/** Children laid out top to bottom. */
export type ColumnWidget = Readonly<{ kind: "column"; children: readonly Widget[] }>;

/**
 * Rows aligned into a table: column j shares one width across all rows and
 * row i one height across its cells. A one-cell gap separates columns.
 */
export type GridWidget = Readonly<{ kind: "grid"; rows: readonly RowWidget[] }>;

export type CanvasDrawFn = (surface: Surface) => void;

/** Caller-painted leaf. `draw` receives the clipped surface. */
export type CanvasWidget = Readonly<{
  kind: "canvas";
  width: SizeRequirement;
  height: SizeRequirement;
  draw: CanvasDrawFn;
}>;

export type Widget =
  | LabelWidget
  | BlankWidget
  | TintWidget
  | RowWidget
  | ColumnWidget
  | GridWidget
  | CanvasWidget;

export type WidgetKind = Widget["kind"];
