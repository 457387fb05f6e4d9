/**
 * packages/core/src/renderer/draw.ts — Root draw driver.
 *
 * One call is one full, synchronous repaint:
 *   clear backend -> full-screen surface -> paint root -> flush backend
 *
 * There is no diffing; every pass repaints every cell the tree covers.
 */

import type { CellBuffer, TerminalBackend, TerminalSize } from "../backend.js";
import { CellgridError } from "../errors.js";
import { emitFrameAudit, nowMs } from "../perf/frameAudit.js";
import type { Widget } from "../widgets/types.js";
import { type FrameMetrics, type RendererConfig, resolveRendererConfig } from "./config.js";
import { type PaintTally, paintWidget } from "./paint.js";
import { Surface } from "./surface.js";

export type DrawOptions = Readonly<{ config?: RendererConfig }>;

const drawing = new WeakSet<TerminalBackend>();

function backendError(detail: string): never {
  throw new CellgridError("CG_BACKEND_ERROR", detail);
}

function checkedSize(backend: TerminalBackend): TerminalSize {
  const size = backend.size();
  if (!Number.isInteger(size.cols) || size.cols < 0) {
    backendError(`backend size cols must be a non-negative integer, got ${String(size.cols)}`);
  }
  if (!Number.isInteger(size.rows) || size.rows < 0) {
    backendError(`backend size rows must be a non-negative integer, got ${String(size.rows)}`);
  }
  return size;
}

function checkedBuffer(backend: TerminalBackend, size: TerminalSize): CellBuffer {
  const buffer = backend.cellBuffer();
  if (buffer.cols !== size.cols || buffer.rows !== size.rows) {
    backendError(
      `backend cell buffer is ${String(buffer.cols)}x${String(buffer.rows)} but size() reported ${String(size.cols)}x${String(size.rows)}`,
    );
  }
  if (buffer.cells.length !== size.cols * size.rows) {
    backendError(
      `backend cell buffer holds ${String(buffer.cells.length)} cells, expected ${String(size.cols * size.rows)}`,
    );
  }
  return buffer;
}

/**
 * Paint `root` onto the whole backend grid and flush it.
 * A null root clears and flushes without painting.
 */
export function draw(
  backend: TerminalBackend,
  root: Widget | null,
  opts: DrawOptions = {},
): FrameMetrics {
  if (drawing.has(backend)) {
    throw new CellgridError("CG_REENTRANT_DRAW", "draw() called while a draw on this backend is in progress");
  }
  const config = resolveRendererConfig(opts.config);
  const started = nowMs();

  drawing.add(backend);
  try {
    const size = checkedSize(backend);
    emitFrameAudit("core", "draw", "draw.begin", { cols: size.cols, rows: size.rows }, config.frameAudit);

    backend.clear(config.clearFg, config.clearBg);
    const tally: PaintTally = { widgets: 0 };
    let cellsPainted = 0;
    try {
      if (root !== null) {
        const surface = Surface.root(checkedBuffer(backend, size), config.clearFg, config.clearBg);
        paintWidget(root, surface, tally);
        cellsPainted = surface.cellsPainted();
      }
    } finally {
      backend.flush();
    }

    const metrics: FrameMetrics = Object.freeze({
      cols: size.cols,
      rows: size.rows,
      widgets: tally.widgets,
      cellsPainted,
      durationMs: nowMs() - started,
    });
    emitFrameAudit("core", "draw", "draw.end", metrics, config.frameAudit);
    config.internal_onFrame?.(metrics);
    return metrics;
  } finally {
    drawing.delete(backend);
  }
}
