/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * All coordinates are in terminal cell units.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Layout axis: width or height. */
export type Axis = "width" | "height";

/**
 * Size requirement along one axis.
 *
 * `min <= max` is assumed but not enforced; contradictory pairs produce a
 * best-effort allocation rather than an error.
 */
export type SizeRequirement = Readonly<{ min: number; max: number }>;

/** Maximum for participants that grow without bound. */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

export const ZERO_REQUIREMENT: SizeRequirement = Object.freeze({ min: 0, max: 0 });

export function requirement(min: number, max: number): SizeRequirement {
  return Object.freeze({ min, max });
}
