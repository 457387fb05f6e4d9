/**
 * packages/core/src/layout/measure.ts — Size requirements for any widget.
 */

import type { Widget } from "../widgets/types.js";
import { measureGrid } from "./kinds/grid.js";
import { measureDeclared, measureLabel } from "./kinds/leaf.js";
import { measureStack } from "./kinds/stack.js";
import type { Axis, SizeRequirement } from "./types.js";

export function measure(widget: Widget, axis: Axis): SizeRequirement {
  switch (widget.kind) {
    case "label":
      return measureLabel(widget, axis);
    case "blank":
    case "canvas":
      return measureDeclared(widget, axis);
    case "tint":
      return measure(widget.child, axis);
    case "row":
      return measureStack(widget.children, "width", axis, measure);
    case "column":
      return measureStack(widget.children, "height", axis, measure);
    case "grid":
      return measureGrid(widget, axis, measure);
  }
}

export function requiredWidth(widget: Widget): SizeRequirement {
  return measure(widget, "width");
}

export function requiredHeight(widget: Widget): SizeRequirement {
  return measure(widget, "height");
}
