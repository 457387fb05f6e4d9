import { assert, describe, test } from "@cellgrid/testkit";
import { CellgridError } from "../../errors.js";
import { UNBOUNDED } from "../../layout/types.js";
import { ui } from "../ui.js";

const invalidProps = (err: unknown): boolean =>
  err instanceof CellgridError && err.code === "CG_INVALID_PROPS";

describe("ui factories", () => {
  test("label", () => {
    assert.deepEqual(ui.label("hi"), { kind: "label", text: "hi" });
  });

  test("blank keeps its pairs, even contradictory ones", () => {
    assert.deepEqual(ui.blank(5, 2, 0, UNBOUNDED), {
      kind: "blank",
      width: { min: 5, max: 2 },
      height: { min: 0, max: UNBOUNDED },
    });
  });

  test("spacer and fixed gaps", () => {
    assert.deepEqual(ui.spacer().width, { min: 0, max: UNBOUNDED });
    assert.deepEqual(ui.hspace(2).width, { min: 2, max: 2 });
    assert.deepEqual(ui.hspace(2).height, { min: 0, max: UNBOUNDED });
    assert.deepEqual(ui.vspace(3).height, { min: 3, max: 3 });
  });

  test("tint and its foreground-only shorthand", () => {
    const child = ui.label("x");
    assert.deepEqual(ui.tint(1, 2, child), { kind: "tint", fg: 1, bg: 2, child });
    assert.deepEqual(ui.fg(4, child), { kind: "tint", fg: 4, bg: 0, child });
  });

  test("row and column drop falsy children and flatten arrays", () => {
    const a = ui.label("a");
    const b = ui.label("b");
    const c = ui.label("c");
    const showB = false;
    assert.deepEqual(ui.row([a, showB && b, null, undefined, [b, [c]]]).children, [a, b, c]);
    assert.deepEqual(ui.column([null, a]).children, [a]);
  });

  test("grid accepts rows or plain child lists", () => {
    const a = ui.label("a");
    const row = ui.row([a]);
    const grid = ui.grid([row, [a, null, a]]);
    assert.equal(grid.rows.length, 2);
    assert.equal(grid.rows[0], row);
    assert.deepEqual(grid.rows[1], { kind: "row", children: [a, a] });
  });

  test("canvas max defaults to its min", () => {
    const draw = (): void => {};
    const canvas = ui.canvas({ width: { min: 2 }, height: { min: 1, max: UNBOUNDED }, draw });
    assert.deepEqual(canvas.width, { min: 2, max: 2 });
    assert.deepEqual(canvas.height, { min: 1, max: UNBOUNDED });
    assert.equal(canvas.draw, draw);
  });

  test("results are frozen", () => {
    const row = ui.row([ui.label("a")]);
    assert.ok(Object.isFrozen(row));
    assert.ok(Object.isFrozen(row.children));
  });

  test("rejects negative, fractional and non-finite sizes", () => {
    assert.throws(() => ui.blank(-1, 0, 0, 0), invalidProps);
    assert.throws(() => ui.blank(0, 1.5, 0, 0), invalidProps);
    assert.throws(() => ui.blank(0, 0, Number.NaN, 0), invalidProps);
    assert.throws(() => ui.hspace(UNBOUNDED), invalidProps);
    assert.throws(
      () => ui.canvas({ width: { min: 0, max: -2 }, height: { min: 0 }, draw: () => {} }),
      invalidProps,
    );
  });

  test("rejects invalid colors", () => {
    assert.throws(() => ui.tint(-1, 0, ui.label("x")), invalidProps);
    assert.throws(() => ui.tint(0, 0.5, ui.label("x")), invalidProps);
  });
});
