import { type Widget, draw, ui } from "@cellgrid/core";
import { ansiColor, createNodeBackend } from "@cellgrid/node";

const comment = (text: string): Widget => ui.fg(ansiColor.yellow, ui.label(text));

const report = ui.column([
  ui.tint(ansiColor.black, ansiColor.cyan, ui.row([ui.label(" field report "), ui.spacer()])),
  ui.vspace(1),
  ui.grid([
    [ui.label("station:"), ui.label("north ridge")],
    [
      ui.label("wind:"),
      ui.label("40 km/h"),
      ui.column([comment("// gusting"), comment("// from the west")]),
    ],
    [
      ui.label("visibility:"),
      ui.fg(ansiColor.red, ui.label("poor")),
      comment("// postpone the climb"),
    ],
  ]),
  ui.spacer(),
  ui.fg(ansiColor.bright(ansiColor.black), ui.label("press any key to exit")),
]);

const backend = createNodeBackend();
backend.start();
try {
  for (;;) {
    draw(backend, report);
    const event = await backend.pollEvent();
    if (event.kind === "key") break;
  }
} finally {
  backend.stop();
}
