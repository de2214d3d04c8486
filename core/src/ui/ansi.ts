/**
 * Splits text into ANSI escape sequences and grapheme clusters.
 *
 * Escape sequences occupy no terminal columns but still change how a row
 * looks, so the frame renderer folds them into row hashes while skipping
 * them for width accounting.
 *
 * Implemented without a regex literal to avoid Biome's noControlCharactersInRegex
 * restriction (ESC is a control character that triggers the rule).
 */

import { graphemes } from "../utils/graphemes.js";

/** The ESC byte value used to start ANSI escape sequences. */
const BYTE_ESC = 0x1b;
const BYTE_OPEN_BRACKET = 0x5b;

export type AnsiPiece = { kind: "escape"; text: string } | { kind: "grapheme"; text: string };

function isFinalByte(code: number): boolean {
  const isUpperAlpha = code >= 0x41 && code <= 0x5a;
  const isLowerAlpha = code >= 0x61 && code <= 0x7a;
  return isUpperAlpha || isLowerAlpha || code === 0x7e;
}

/** Length of the escape sequence starting at `start`, or 0 when there is none. */
function escapeLength(text: string, start: number): number {
  if (text.charCodeAt(start) !== BYTE_ESC) return 0;
  if (start + 1 >= text.length) return 0;

  if (text.charCodeAt(start + 1) !== BYTE_OPEN_BRACKET) {
    // two-byte escape such as ESC 7
    return 2;
  }

  for (let i = start + 2; i < text.length; i++) {
    if (isFinalByte(text.charCodeAt(i))) return i - start + 1;
  }
  return 0;
}

export function ansiPieces(text: string): AnsiPiece[] {
  const pieces: AnsiPiece[] = [];
  let plainStart = 0;

  const flushPlain = (end: number) => {
    if (end > plainStart) {
      for (const g of graphemes(text.slice(plainStart, end))) {
        pieces.push({ kind: "grapheme", text: g });
      }
    }
  };

  let i = 0;
  while (i < text.length) {
    const length = escapeLength(text, i);
    if (length === 0) {
      i++;
      continue;
    }
    flushPlain(i);
    pieces.push({ kind: "escape", text: text.slice(i, i + length) });
    i += length;
    plainStart = i;
  }
  flushPlain(text.length);

  return pieces;
}
