import { assert, describe, test } from "@cellgrid/testkit";
import type { CellBuffer, TerminalBackend } from "../../backend.js";
import { CellgridError } from "../../errors.js";
import { createMemoryBackend } from "../../testing/memoryBackend.js";
import { ui } from "../../widgets/ui.js";
import type { FrameMetrics } from "../config.js";
import { resolveRendererConfig } from "../config.js";
import { draw } from "../draw.js";

function isCode(code: CellgridError["code"]) {
  return (err: unknown): boolean => err instanceof CellgridError && err.code === code;
}

describe("draw", () => {
  test("clears, paints the root over the full grid and flushes once", () => {
    const backend = createMemoryBackend({ cols: 6, rows: 2 });
    draw(backend, ui.column([ui.label("top"), ui.spacer(), ui.label("end")]));
    assert.deepEqual(backend.lines(), ["top   ", "end   "]);
    assert.equal(backend.clearCount, 1);
    assert.equal(backend.flushCount, 1);
  });

  test("every pass repaints from a cleared grid", () => {
    const backend = createMemoryBackend({ cols: 6, rows: 1 });
    draw(backend, ui.label("longer"));
    draw(backend, ui.label("ab"));
    assert.deepEqual(backend.lines(), ["ab    "]);
    assert.equal(backend.flushCount, 2);
  });

  test("a null root draws nothing but still clears and flushes", () => {
    const backend = createMemoryBackend({ cols: 3, rows: 1 });
    backend.cellBuffer().cells.forEach((cell) => {
      cell.ch = "#";
    });
    const metrics = draw(backend, null);
    assert.deepEqual(backend.lines(), ["   "]);
    assert.equal(backend.flushCount, 1);
    assert.equal(metrics.widgets, 0);
    assert.equal(metrics.cellsPainted, 0);
  });

  test("clear colors come from config and are inherited by the root surface", () => {
    const backend = createMemoryBackend({ cols: 2, rows: 1 });
    draw(backend, ui.label("a"), { config: { clearFg: 7, clearBg: 1 } });
    assert.deepEqual(backend.cellAt(0, 0), { ch: "a", fg: 7, bg: 1 });
    assert.deepEqual(backend.cellAt(1, 0), { ch: " ", fg: 7, bg: 1 });
  });

  test("reports frame metrics to the caller and the onFrame hook", () => {
    const backend = createMemoryBackend({ cols: 5, rows: 1 });
    const seen: FrameMetrics[] = [];
    const metrics = draw(backend, ui.row([ui.label("ab"), ui.label("c")]), {
      config: { internal_onFrame: (m) => seen.push(m) },
    });
    assert.equal(metrics.cols, 5);
    assert.equal(metrics.rows, 1);
    assert.equal(metrics.widgets, 3);
    assert.equal(metrics.cellsPainted, 3);
    assert.ok(metrics.durationMs >= 0);
    assert.deepEqual(seen, [metrics]);
  });

  test("a draw from inside a canvas on the same backend is rejected", () => {
    const backend = createMemoryBackend({ cols: 4, rows: 1 });
    let inner: unknown = null;
    const canvas = ui.canvas({
      width: { min: 1 },
      height: { min: 1 },
      draw: () => {
        try {
          draw(backend, ui.label("x"));
        } catch (err) {
          inner = err;
        }
      },
    });
    draw(backend, canvas);
    assert.ok(isCode("CG_REENTRANT_DRAW")(inner));
    // The guard is released once the outer pass finishes.
    draw(backend, ui.label("ok"));
    assert.equal(backend.textAt(0, 0, 2), "ok");
  });

  test("flushes even when a canvas throws, and rethrows", () => {
    const backend = createMemoryBackend({ cols: 4, rows: 1 });
    const canvas = ui.canvas({
      width: { min: 1 },
      height: { min: 1 },
      draw: () => {
        throw new Error("boom");
      },
    });
    assert.throws(() => draw(backend, canvas), /boom/);
    assert.equal(backend.flushCount, 1);
  });

  test("rejects a backend reporting an invalid size", () => {
    const inner = createMemoryBackend({ cols: 2, rows: 1 });
    const backend: TerminalBackend = {
      size: () => ({ cols: -1, rows: 1 }),
      clear: (fg, bg) => inner.clear(fg, bg),
      flush: () => inner.flush(),
      cellBuffer: () => inner.cellBuffer(),
      pollEvent: () => inner.pollEvent(),
    };
    assert.throws(() => draw(backend, ui.label("a")), isCode("CG_BACKEND_ERROR"));
  });

  test("rejects a cell buffer that does not match the reported size", () => {
    const inner = createMemoryBackend({ cols: 2, rows: 1 });
    const short: CellBuffer = { cols: 2, rows: 1, cells: [] };
    const backend: TerminalBackend = {
      size: () => inner.size(),
      clear: (fg, bg) => inner.clear(fg, bg),
      flush: () => inner.flush(),
      cellBuffer: () => short,
      pollEvent: () => inner.pollEvent(),
    };
    assert.throws(() => draw(backend, ui.label("a")), isCode("CG_BACKEND_ERROR"));
    assert.equal(inner.flushCount, 1);
  });

  test("a zero-sized grid is valid and paints nothing", () => {
    const backend = createMemoryBackend({ cols: 0, rows: 0 });
    const metrics = draw(backend, ui.label("hidden"));
    assert.equal(metrics.cellsPainted, 0);
  });
});

describe("resolveRendererConfig", () => {
  test("fills defaults", () => {
    const cfg = resolveRendererConfig(undefined);
    assert.equal(cfg.clearFg, 0);
    assert.equal(cfg.clearBg, 0);
    assert.equal(cfg.internal_onFrame, undefined);
  });

  test("frameAudit override wins over the environment", () => {
    assert.equal(resolveRendererConfig({ frameAudit: true }).frameAudit, true);
    assert.equal(resolveRendererConfig({ frameAudit: false }).frameAudit, false);
  });

  test("rejects invalid colors", () => {
    assert.throws(() => resolveRendererConfig({ clearFg: -1 }), isCode("CG_INVALID_PROPS"));
    assert.throws(() => resolveRendererConfig({ clearBg: 1.5 }), isCode("CG_INVALID_PROPS"));
  });
});
