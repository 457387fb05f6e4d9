import { assert, describe, test } from "@cellgrid/testkit";
import { ui } from "../../widgets/ui.js";
import { gridTracks } from "../kinds/grid.js";
import { textLength } from "../kinds/leaf.js";
import { measure, requiredHeight, requiredWidth } from "../measure.js";
import { UNBOUNDED } from "../types.js";

describe("measure - leaves", () => {
  test("label width is its character count, height is one line", () => {
    const label = ui.label("hello");
    assert.deepEqual(requiredWidth(label), { min: 5, max: 5 });
    assert.deepEqual(requiredHeight(label), { min: 1, max: 1 });
  });

  test("label width counts code points, not UTF-16 units", () => {
    assert.equal(textLength("añb"), 3);
    assert.equal(textLength("😀x"), 2);
    assert.deepEqual(requiredWidth(ui.label("日本")), { min: 2, max: 2 });
  });

  test("blank reports its configured pairs verbatim", () => {
    const blank = ui.blank(1, 4, 2, UNBOUNDED);
    assert.deepEqual(requiredWidth(blank), { min: 1, max: 4 });
    assert.deepEqual(requiredHeight(blank), { min: 2, max: UNBOUNDED });
  });

  test("tint passes its child's requirements through", () => {
    const tint = ui.tint(2, 3, ui.blank(1, 4, 2, 6));
    assert.deepEqual(requiredWidth(tint), { min: 1, max: 4 });
    assert.deepEqual(requiredHeight(tint), { min: 2, max: 6 });
  });

  test("canvas reports its declared requirements", () => {
    const canvas = ui.canvas({ width: { min: 3 }, height: { min: 1, max: 2 }, draw: () => {} });
    assert.deepEqual(measure(canvas, "width"), { min: 3, max: 3 });
    assert.deepEqual(measure(canvas, "height"), { min: 1, max: 2 });
  });
});

describe("measure - stacks", () => {
  test("row sums widths and takes the largest heights", () => {
    const row = ui.row([ui.label("ab"), ui.blank(1, 3, 2, 2), ui.blank(0, 0, 1, 5)]);
    assert.deepEqual(requiredWidth(row), { min: 3, max: 5 });
    assert.deepEqual(requiredHeight(row), { min: 2, max: 5 });
  });

  test("column sums heights and takes the largest widths", () => {
    const column = ui.column([ui.label("abc"), ui.blank(1, 7, 2, 4)]);
    assert.deepEqual(requiredWidth(column), { min: 3, max: 7 });
    assert.deepEqual(requiredHeight(column), { min: 3, max: 5 });
  });

  test("unbounded children make the stack unbounded", () => {
    const row = ui.row([ui.label("a"), ui.spacer()]);
    assert.deepEqual(requiredWidth(row), { min: 1, max: UNBOUNDED });
  });

  test("empty stacks require nothing", () => {
    assert.deepEqual(requiredWidth(ui.row()), { min: 0, max: 0 });
    assert.deepEqual(requiredHeight(ui.column()), { min: 0, max: 0 });
  });
});

describe("measure - grid", () => {
  test("width takes the widest row plus one padding cell per row", () => {
    // Widest row: 2 + 3 = 5. Three rows add 3 padding cells (not 1 per column gap).
    const grid = ui.grid([
      [ui.label("ab"), ui.label("cde")],
      [ui.label("f")],
      [ui.label("g"), ui.label("h")],
    ]);
    assert.deepEqual(requiredWidth(grid), { min: 8, max: 8 });
  });

  test("height sums the rows", () => {
    const grid = ui.grid([
      [ui.label("a"), ui.blank(0, 0, 2, 3)],
      [ui.label("b")],
    ]);
    assert.deepEqual(requiredHeight(grid), { min: 3, max: 4 });
  });

  test("tracks use minimum sizes and skip missing cells", () => {
    const grid = ui.grid([
      [ui.label("a"), ui.label("bbb"), ui.label("c")],
      [ui.label("dddd")],
      [ui.blank(0, UNBOUNDED, 2, 2), ui.label("ee")],
    ]);
    const tracks = gridTracks(grid, measure);
    assert.deepEqual(tracks.columns, [4, 3, 1]);
    assert.deepEqual(tracks.rows, [1, 1, 2]);
  });

  test("empty grid has no tracks", () => {
    const tracks = gridTracks(ui.grid(), measure);
    assert.deepEqual(tracks, { columns: [], rows: [] });
    assert.deepEqual(requiredWidth(ui.grid()), { min: 0, max: 0 });
  });
});
