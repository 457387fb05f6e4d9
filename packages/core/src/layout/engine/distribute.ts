import type { SizeRequirement } from "../types.js";

/**
 * Split an integer budget among participants with (min, max) requirements.
 *
 * - Every participant starts at its minimum; minimums are never shrunk, so
 *   the result may sum to more than `total`.
 * - The remainder is handed out one unit at a time, round-robin in slot
 *   order, to participants still below their maximum.
 * - Stops when the budget runs out or every participant is at its maximum;
 *   any budget left over stays unallocated.
 *
 * Negative or non-finite totals are treated as 0.
 */
export function distribute(total: number, requirements: readonly SizeRequirement[]): number[] {
  const slotCount = requirements.length;
  const out = new Array<number>(slotCount).fill(0);
  if (slotCount === 0) return out;

  let remaining = Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
  for (let i = 0; i < slotCount; i++) {
    const min = requirements[i]?.min ?? 0;
    out[i] = min;
    remaining -= min;
  }

  // Whole round-robin passes are applied in bulk: `step` passes in which no
  // participant reaches its maximum give each growable slot `step` units.
  const growable: number[] = [];
  while (remaining > 0) {
    growable.length = 0;
    let step = Number.POSITIVE_INFINITY;
    for (let i = 0; i < slotCount; i++) {
      const headroom = (requirements[i]?.max ?? 0) - (out[i] ?? 0);
      if (!(headroom > 0)) continue;
      growable.push(i);
      if (headroom < step) step = headroom;
    }
    if (growable.length === 0) break;

    step = Math.min(Math.floor(step), Math.floor(remaining / growable.length));
    if (step < 1) {
      // Final partial pass: earlier slots win the leftover units.
      for (let k = 0; k < growable.length && remaining > 0; k++) {
        const slot = growable[k] ?? 0;
        out[slot] = (out[slot] ?? 0) + 1;
        remaining--;
      }
      continue;
    }

    for (const slot of growable) {
      out[slot] = (out[slot] ?? 0) + step;
    }
    remaining -= step * growable.length;
  }

  return out;
}
