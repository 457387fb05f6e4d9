/**
 * Error type for programmer errors surfaced by cellgrid.
 *
 * Layout and paint never throw: out-of-bounds clips, overflowing text and
 * contradictory size requirements all degrade to no-ops. CellgridError is
 * reserved for invalid constructor arguments, invalid config, misbehaving
 * backends and misuse of the draw entry point.
 */

/**
 * Deterministic error codes.
 */
export type CellgridErrorCode =
  | "CG_INVALID_PROPS"
  | "CG_INVALID_STATE"
  | "CG_BACKEND_ERROR"
  | "CG_REENTRANT_DRAW";

export class CellgridError extends Error {
  override readonly name = "CellgridError";
  readonly code: CellgridErrorCode;

  constructor(code: CellgridErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CellgridError);
    }
  }
}

export function invalidProps(detail: string): never {
  throw new CellgridError("CG_INVALID_PROPS", detail);
}
