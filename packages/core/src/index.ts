/**
 * @cellgrid/core
 *
 * Runtime-agnostic layout and paint engine for character-grid UIs.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { CellgridError, type CellgridErrorCode } from "./errors.js";

// =============================================================================
// Backend contract
// =============================================================================

export {
  DEFAULT_COLOR,
  blankCell,
  type Cell,
  type CellBuffer,
  type Color,
  type KeyEvent,
  type ResizeEvent,
  type TerminalBackend,
  type TerminalEvent,
  type TerminalSize,
} from "./backend.js";

// =============================================================================
// Layout
// =============================================================================

export {
  UNBOUNDED,
  ZERO_REQUIREMENT,
  requirement,
  type Axis,
  type Rect,
  type SizeRequirement,
} from "./layout/types.js";
export { distribute } from "./layout/engine/distribute.js";
export { measure, requiredHeight, requiredWidth } from "./layout/measure.js";
export { textLength } from "./layout/kinds/leaf.js";
export { GRID_COLUMN_GAP, gridTracks, type GridTracks } from "./layout/kinds/grid.js";

// =============================================================================
// Widgets
// =============================================================================

export { ui, type CanvasProps, type SizeRequirementInput, type UiChild } from "./widgets/ui.js";
export type {
  BlankWidget,
  CanvasDrawFn,
  CanvasWidget,
  ColumnWidget,
  GridWidget,
  LabelWidget,
  RowWidget,
  TintWidget,
  Widget,
  WidgetKind,
} from "./widgets/types.js";

// =============================================================================
// Rendering
// =============================================================================

export { Surface, surfaceHeight, surfaceWidth, type SurfaceCursor } from "./renderer/surface.js";
export { paintWidget } from "./renderer/paint.js";
export { draw, type DrawOptions } from "./renderer/draw.js";
export {
  resolveRendererConfig,
  type FrameMetrics,
  type RendererConfig,
  type ResolvedRendererConfig,
} from "./renderer/config.js";

// =============================================================================
// Diagnostics
// =============================================================================

export {
  FRAME_AUDIT_ENABLED,
  emitFrameAudit,
  formatAuditLine,
  isAuditFlagSet,
} from "./perf/frameAudit.js";
