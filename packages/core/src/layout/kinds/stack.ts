import type { Widget } from "../../widgets/types.js";
import { distribute } from "../engine/distribute.js";
import type { Axis, SizeRequirement } from "../types.js";

type MeasureFn = (widget: Widget, axis: Axis) => SizeRequirement;

/**
 * Requirement of a row (main axis "width") or column (main axis "height").
 *
 * Along the main axis children add up; across it the stack is only as large
 * as its largest child.
 */
export function measureStack(
  children: readonly Widget[],
  mainAxis: Axis,
  axis: Axis,
  measure: MeasureFn,
): SizeRequirement {
  let min = 0;
  let max = 0;
  for (const child of children) {
    const req = measure(child, axis);
    if (axis === mainAxis) {
      min += req.min;
      max += req.max;
      continue;
    }
    if (req.min > min) min = req.min;
    if (req.max > max) max = req.max;
  }
  return { min, max };
}

/** One child's placement along the main axis. */
export type StackSlice = Readonly<{ offset: number; size: number }>;

/**
 * Split `extent` among `children` along `mainAxis`. Slices are contiguous,
 * starting at offset 0, with no gaps.
 */
export function sliceStack(
  children: readonly Widget[],
  mainAxis: Axis,
  extent: number,
  measure: MeasureFn,
): StackSlice[] {
  const sizes = distribute(
    extent,
    children.map((child) => measure(child, mainAxis)),
  );
  const out: StackSlice[] = [];
  let offset = 0;
  for (const size of sizes) {
    out.push({ offset, size });
    offset += size;
  }
  return out;
}
