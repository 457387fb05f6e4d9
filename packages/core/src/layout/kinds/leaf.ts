import type { BlankWidget, CanvasWidget, LabelWidget } from "../../widgets/types.js";
import { type Axis, type SizeRequirement, requirement } from "../types.js";

/** Number of cells a label occupies: one per code point. */
export function textLength(text: string): number {
  return [...text].length;
}

export function measureLabel(widget: LabelWidget, axis: Axis): SizeRequirement {
  if (axis === "height") return requirement(1, 1);
  const n = textLength(widget.text);
  return requirement(n, n);
}

/** Blank and canvas widgets report their declared pairs verbatim. */
export function measureDeclared(widget: BlankWidget | CanvasWidget, axis: Axis): SizeRequirement {
  return axis === "width" ? widget.width : widget.height;
}
