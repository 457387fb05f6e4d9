/**
 * @cellgrid/node
 *
 * Node terminal backend for @cellgrid/core.
 */

export {
  createNodeBackend,
  readTerminalSize,
  resolveNodeBackendConfig,
  type NodeBackend,
  type NodeBackendConfig,
  type TerminalInput,
  type TerminalOutput,
} from "./backend/nodeBackend.js";
export { ansiColor, encodeFrame, sgr } from "./backend/ansi.js";
export { decodeKeys } from "./backend/keys.js";
