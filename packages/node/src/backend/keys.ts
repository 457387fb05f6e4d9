/**
 * packages/node/src/backend/keys.ts — Raw-mode input decoding.
 *
 * Decodes the byte sequences a terminal sends in raw mode into key events.
 * Unknown escape sequences are reported as a single "escape" key followed by
 * their remaining characters.
 */

import type { KeyEvent } from "@cellgrid/core";

const CSI_KEYS: Readonly<Record<string, string>> = Object.freeze({
  A: "up",
  B: "down",
  C: "right",
  D: "left",
  H: "home",
  F: "end",
  Z: "backtab",
});

const TILDE_KEYS: Readonly<Record<string, string>> = Object.freeze({
  "2": "insert",
  "3": "delete",
  "5": "pageup",
  "6": "pagedown",
});

function key(name: string, ctrl = false, alt = false): KeyEvent {
  return Object.freeze({ kind: "key", key: name, ctrl, alt });
}

function controlKey(code: number): KeyEvent | null {
  switch (code) {
    case 0x0d:
    case 0x0a:
      return key("enter");
    case 0x09:
      return key("tab");
    case 0x7f:
    case 0x08:
      return key("backspace");
    case 0x00:
      return key("space", true);
  }
  if (code >= 0x01 && code <= 0x1a) return key(String.fromCharCode(code + 0x60), true);
  return null;
}

export function decodeKeys(input: string): KeyEvent[] {
  const out: KeyEvent[] = [];
  const chars = [...input];
  let i = 0;
  while (i < chars.length) {
    const ch = chars[i] ?? "";
    const code = ch.codePointAt(0) ?? 0;

    if (ch !== "\x1b") {
      out.push(controlKey(code) ?? key(ch));
      i++;
      continue;
    }

    const next = chars[i + 1];
    if (next === "[" || next === "O") {
      // CSI / SS3: parameters then a final byte.
      let j = i + 2;
      let params = "";
      while (j < chars.length && /[0-9;]/.test(chars[j] ?? "")) {
        params += chars[j] ?? "";
        j++;
      }
      const final = chars[j];
      if (final !== undefined) {
        const name = final === "~" ? TILDE_KEYS[params.split(";")[0] ?? ""] : CSI_KEYS[final];
        if (name !== undefined) {
          out.push(key(name));
          i = j + 1;
          continue;
        }
      }
      out.push(key("escape"));
      i++;
      continue;
    }

    if (next !== undefined && next !== "\x1b") {
      const inner = controlKey(next.codePointAt(0) ?? 0);
      out.push(inner ? key(inner.key, inner.ctrl, true) : key(next, false, true));
      i += 2;
      continue;
    }

    out.push(key("escape"));
    i++;
  }
  return out;
}
