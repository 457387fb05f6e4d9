import { type Color, DEFAULT_COLOR } from "../backend.js";
import { invalidProps } from "../errors.js";
import { FRAME_AUDIT_ENABLED } from "../perf/frameAudit.js";

/** Metrics reported once per draw pass. */
export type FrameMetrics = Readonly<{
  cols: number;
  rows: number;
  /** Widgets visited, including those whose surface was absent. */
  widgets: number;
  cellsPainted: number;
  durationMs: number;
}>;

export type RendererConfig = Readonly<{
  /** Foreground used to clear the backend before painting. */
  clearFg?: Color;
  /** Background used to clear the backend before painting. */
  clearBg?: Color;
  /** Overrides CELLGRID_FRAME_AUDIT for this renderer. */
  frameAudit?: boolean;
  internal_onFrame?: (metrics: FrameMetrics) => void;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedRendererConfig = Readonly<{
  clearFg: Color;
  clearBg: Color;
  frameAudit: boolean;
  internal_onFrame?: ((metrics: FrameMetrics) => void) | undefined;
}>;

/** Default configuration values. */
const DEFAULT_CONFIG: ResolvedRendererConfig = Object.freeze({
  clearFg: DEFAULT_COLOR,
  clearBg: DEFAULT_COLOR,
  frameAudit: FRAME_AUDIT_ENABLED,
  internal_onFrame: undefined,
});

function requireColor(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer color`);
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveRendererConfig(config: RendererConfig | undefined): ResolvedRendererConfig {
  if (!config) return DEFAULT_CONFIG;
  const clearFg =
    config.clearFg === undefined ? DEFAULT_CONFIG.clearFg : requireColor("clearFg", config.clearFg);
  const clearBg =
    config.clearBg === undefined ? DEFAULT_CONFIG.clearBg : requireColor("clearBg", config.clearBg);
  const frameAudit =
    config.frameAudit === undefined ? DEFAULT_CONFIG.frameAudit : config.frameAudit === true;
  const internal_onFrame =
    typeof config.internal_onFrame === "function" ? config.internal_onFrame : undefined;

  return Object.freeze({ clearFg, clearBg, frameAudit, internal_onFrame });
}
