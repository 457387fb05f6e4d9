/**
 * packages/core/src/widgets/ui.ts — Widget factories.
 *
 * Usage:
 *   ui.grid([
 *     ui.row([ui.label("name:"), ui.label("ada")]),
 *     ui.row([ui.label("role:"), ui.tint(ansiColor.yellow, 0, ui.label("admin"))]),
 *   ])
 *
 * Factories validate their scalar arguments and freeze the result. They do
 * not check that min <= max.
 */

import { type Color, DEFAULT_COLOR } from "../backend.js";
import { invalidProps } from "../errors.js";
import { type SizeRequirement, UNBOUNDED } from "../layout/types.js";
import type {
  BlankWidget,
  CanvasDrawFn,
  CanvasWidget,
  ColumnWidget,
  GridWidget,
  LabelWidget,
  RowWidget,
  TintWidget,
  Widget,
} from "./types.js";

/** Child entries: falsy values are dropped and nested arrays flattened. */
export type UiChild = Widget | readonly UiChild[] | null | undefined | false;

export type SizeRequirementInput = Readonly<{ min: number; max?: number }>;

export type CanvasProps = Readonly<{
  width: SizeRequirementInput;
  height: SizeRequirementInput;
  draw: CanvasDrawFn;
}>;

function isUiChildren(value: UiChild): value is readonly UiChild[] {
  return Array.isArray(value);
}

function filterChildren(children: readonly UiChild[]): readonly Widget[] {
  const out: Widget[] = [];
  for (const child of children) {
    if (child === false || child === null || child === undefined) continue;
    if (isUiChildren(child)) {
      out.push(...filterChildren(child));
      continue;
    }
    out.push(child);
  }
  return Object.freeze(out);
}

function requireSize(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}

function requireMaxSize(name: string, v: number): number {
  if (v === UNBOUNDED) return v;
  return requireSize(name, v);
}

function requireColor(name: string, v: Color): Color {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer color`);
  return v;
}

function sizeRequirement(name: string, input: SizeRequirementInput): SizeRequirement {
  const min = requireSize(`${name}.min`, input.min);
  const max = input.max === undefined ? min : requireMaxSize(`${name}.max`, input.max);
  return Object.freeze({ min, max });
}

function label(text: string): LabelWidget {
  if (typeof text !== "string") invalidProps("label text must be a string");
  return Object.freeze({ kind: "label", text });
}

function blank(minWidth: number, maxWidth: number, minHeight: number, maxHeight: number): BlankWidget {
  return Object.freeze({
    kind: "blank",
    width: sizeRequirement("blank.width", { min: minWidth, max: maxWidth }),
    height: sizeRequirement("blank.height", { min: minHeight, max: maxHeight }),
  });
}

/** Blank that absorbs any leftover space on both axes. */
function spacer(): BlankWidget {
  return blank(0, UNBOUNDED, 0, UNBOUNDED);
}

/** Fixed-width gap for rows; its height grows freely. */
function hspace(cells: number): BlankWidget {
  return blank(cells, cells, 0, UNBOUNDED);
}

/** Fixed-height gap for columns; its width grows freely. */
function vspace(cells: number): BlankWidget {
  return blank(0, UNBOUNDED, cells, cells);
}

function tint(fg: Color, bg: Color, child: Widget): TintWidget {
  return Object.freeze({
    kind: "tint",
    fg: requireColor("tint.fg", fg),
    bg: requireColor("tint.bg", bg),
    child,
  });
}

/** Foreground-only tint. */
function fg(color: Color, child: Widget): TintWidget {
  return tint(color, DEFAULT_COLOR, child);
}

function row(children: readonly UiChild[] = []): RowWidget {
  return Object.freeze({ kind: "row", children: filterChildren(children) });
}

function column(children: readonly UiChild[] = []): ColumnWidget {
  return Object.freeze({ kind: "column", children: filterChildren(children) });
}

/** Accepts RowWidgets or plain child lists, which become rows. */
function grid(rows: readonly (RowWidget | readonly UiChild[])[] = []): GridWidget {
  const out: RowWidget[] = [];
  for (const entry of rows) {
    out.push(isUiChildren(entry) ? row(entry) : entry);
  }
  return Object.freeze({ kind: "grid", rows: Object.freeze(out) });
}

function canvas(props: CanvasProps): CanvasWidget {
  if (typeof props.draw !== "function") invalidProps("canvas.draw must be a function");
  return Object.freeze({
    kind: "canvas",
    width: sizeRequirement("canvas.width", props.width),
    height: sizeRequirement("canvas.height", props.height),
    draw: props.draw,
  });
}

export const ui = Object.freeze({
  label,
  blank,
  spacer,
  hspace,
  vspace,
  tint,
  fg,
  row,
  column,
  grid,
  canvas,
});
