/**
 * packages/core/src/perf/frameAudit.ts — Optional draw-pass audit logging.
 *
 * Emits one NDJSON record per stage only when explicitly enabled:
 *   CELLGRID_FRAME_AUDIT=1
 *
 * Records go to `globalThis.__cellgridFrameAuditSink` when installed,
 * otherwise to stderr. Core stays free of node:* imports, so the process
 * handle is reached through globalThis.
 */

type AuditGlobals = {
  __cellgridFrameAuditSink?: (line: string) => void;
  process?: {
    pid?: number;
    env?: { CELLGRID_FRAME_AUDIT?: string };
    stderr?: { write?: (text: string) => void };
  };
  console?: { error?: (msg?: unknown) => void };
  performance?: { now?: () => number };
};

function auditGlobals(): AuditGlobals {
  return globalThis as AuditGlobals;
}

export function isAuditFlagSet(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  const value = raw.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes" || value === "on";
}

function envFlag(): boolean {
  try {
    return isAuditFlagSet(auditGlobals().process?.env?.CELLGRID_FRAME_AUDIT);
  } catch {
    return false;
  }
}

export const FRAME_AUDIT_ENABLED = envFlag();

export function nowMs(): number {
  const g = auditGlobals();
  const fn = g.performance?.now;
  if (typeof fn === "function") return fn.call(g.performance);
  return Date.now();
}

type AuditFields = Readonly<Record<string, unknown>>;

/** Serialize an audit record. Exposed for tests. */
export function formatAuditLine(
  layer: string,
  scope: string,
  stage: string,
  fields: AuditFields,
): string {
  const pid = auditGlobals().process?.pid;
  return JSON.stringify({
    ts: new Date().toISOString(),
    tMs: nowMs(),
    pid: typeof pid === "number" && Number.isInteger(pid) ? pid : undefined,
    layer,
    scope,
    stage,
    ...fields,
  });
}

export function emitFrameAudit(
  layer: string,
  scope: string,
  stage: string,
  fields: AuditFields,
  enabled: boolean = FRAME_AUDIT_ENABLED,
): void {
  if (!enabled) return;
  try {
    const g = auditGlobals();
    const line = formatAuditLine(layer, scope, stage, fields);
    if (typeof g.__cellgridFrameAuditSink === "function") {
      g.__cellgridFrameAuditSink(line);
      return;
    }
    if (typeof g.process?.stderr?.write === "function") {
      g.process.stderr.write(`${line}\n`);
      return;
    }
    g.console?.error?.(line);
  } catch {
    // Audit failures are ignored.
  }
}
