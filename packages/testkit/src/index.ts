export { assert, describe, test } from "./nodeTest.js";
export { createScreen, type Screen, type ScreenSnapshot } from "./screen.js";
