/**
 * Key classification for raw-mode terminal input.
 *
 * A single stdin chunk may carry several keys (fast typing, pastes), so the
 * parser walks the chunk and emits one logical key per recognised sequence.
 * Enter, Escape and Ctrl+C come out as Submit, Cancel and Interrupt.
 */

import { type Key, type KeyModifierSet, KeyModifiers, keys } from "../ui/key.js";

// --- Byte constants --------------------------------------------------------

const BYTE_CTRL_C = 0x03;
const BYTE_BACKSPACE_CTRL_H = 0x08;
const BYTE_TAB = 0x09;
const BYTE_NEWLINE = 0x0a;
const BYTE_CARRIAGE_RETURN = 0x0d;
const BYTE_ESCAPE = 0x1b;
const BYTE_DELETE = 0x7f;
const BYTE_CTRL_FIRST = 0x01;
const BYTE_CTRL_LAST = 0x1a;
const LETTER_OFFSET = 0x60;

// --- Modifier decoding -------------------------------------------------------

/** xterm encodes modifiers as 1 + bits(shift=1, alt=2, ctrl=4). */
function decodeModifiers(param: string | undefined): KeyModifierSet {
  const value = param ? Number.parseInt(param, 10) - 1 : 0;
  if (!Number.isFinite(value) || value <= 0) return KeyModifiers.NONE;

  let mods: KeyModifierSet = KeyModifiers.NONE;
  if (value & 1) mods |= KeyModifiers.SHIFT;
  if (value & 2) mods |= KeyModifiers.ALT;
  if (value & 4) mods |= KeyModifiers.CONTROL;
  return mods;
}

// --- Escape sequences --------------------------------------------------------

function letterKey(final: string, mods: KeyModifierSet): Key | null {
  switch (final) {
    case "A":
      return keys.up(mods);
    case "B":
      return keys.down(mods);
    case "C":
      return keys.right(mods);
    case "D":
      return keys.left(mods);
    case "H":
      return keys.home();
    case "F":
      return keys.end();
    default:
      return null;
  }
}

function tildeKey(code: string, mods: KeyModifierSet): Key | null {
  switch (code) {
    case "1":
    case "7":
      return keys.home();
    case "4":
    case "8":
      return keys.end();
    case "3":
      return keys.delete(mods);
    case "5":
      return keys.pageUp(mods);
    case "6":
      return keys.pageDown(mods);
    default:
      return null;
  }
}

interface Parsed {
  key: Key;
  length: number;
}

/** Parses a CSI (ESC [) or SS3 (ESC O) sequence at `start`. */
function parseEscapeSequence(text: string, start: number): Parsed | null {
  const introducer = text[start + 1];

  if (introducer === "O") {
    const final = text[start + 2];
    if (final === undefined) return null;
    const key = letterKey(final, KeyModifiers.NONE);
    return { key: key ?? keys.any(), length: 3 };
  }

  if (introducer !== "[") return null;

  let end = start + 2;
  while (end < text.length && /[0-9;]/.test(text[end])) end++;
  const final = text[end];
  if (final === undefined) return { key: keys.any(), length: text.length - start };

  const params = text.slice(start + 2, end).split(";");
  const length = end - start + 1;

  if (final === "~") {
    const key = tildeKey(params[0], decodeModifiers(params[1]));
    return { key: key ?? keys.any(), length };
  }

  if (final === "u") {
    // kitty protocol: CSI 13 ; mods u is Enter with modifiers
    return { key: params[0] === "13" ? keys.submit() : keys.any(), length };
  }

  const key = letterKey(final, decodeModifiers(params[1]));
  return { key: key ?? keys.any(), length };
}

// --- Single bytes ---------------------------------------------------------------

function controlKey(code: number): Key | null {
  switch (code) {
    case BYTE_CTRL_C:
      return keys.interrupt();
    case BYTE_TAB:
      return keys.tab();
    case BYTE_NEWLINE:
    case BYTE_CARRIAGE_RETURN:
      return keys.submit();
    case BYTE_DELETE:
      return keys.backspace();
    case BYTE_BACKSPACE_CTRL_H:
      return keys.char("h", KeyModifiers.CONTROL);
    default:
      if (code >= BYTE_CTRL_FIRST && code <= BYTE_CTRL_LAST) {
        return keys.char(String.fromCharCode(code + LETTER_OFFSET), KeyModifiers.CONTROL);
      }
      return null;
  }
}

// --- Parser ----------------------------------------------------------------------

/** Splits one chunk of raw terminal input into logical keys. */
export function parseKeys(data: Buffer | string): Key[] {
  const text = typeof data === "string" ? data : data.toString("utf-8");
  const result: Key[] = [];

  let i = 0;
  while (i < text.length) {
    const code = text.charCodeAt(i);

    if (code === BYTE_ESCAPE) {
      if (i + 1 >= text.length) {
        result.push(keys.cancel());
        i++;
        continue;
      }

      const sequence = parseEscapeSequence(text, i);
      if (sequence) {
        result.push(sequence.key);
        i += sequence.length;
        continue;
      }

      const next = text.charCodeAt(i + 1);
      if (next === BYTE_CARRIAGE_RETURN || next === BYTE_NEWLINE) {
        // Alt+Enter submits like Enter
        result.push(keys.submit());
        i += 2;
        continue;
      }
      if (next === BYTE_ESCAPE) {
        result.push(keys.cancel());
        i++;
        continue;
      }

      const codePoint = text.codePointAt(i + 1) ?? next;
      const char = String.fromCodePoint(codePoint);
      result.push(keys.char(char, KeyModifiers.ALT));
      i += 1 + char.length;
      continue;
    }

    const control = controlKey(code);
    if (control) {
      result.push(control);
      // CR LF from a paste is a single Enter
      if (code === BYTE_CARRIAGE_RETURN && text.charCodeAt(i + 1) === BYTE_NEWLINE) i++;
      i++;
      continue;
    }

    const codePoint = text.codePointAt(i) ?? code;
    const char = String.fromCodePoint(codePoint);
    result.push(keys.char(char));
    i += char.length;
  }

  return result;
}
