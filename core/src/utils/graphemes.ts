/**
 * Grapheme segmentation and display width.
 *
 * All cursor arithmetic in the prompts is in grapheme clusters, so a
 * composed emoji or a letter followed by a variation selector counts as one
 * user-visible character.
 */

import stringWidth from "string-width";

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** Splits text into grapheme clusters. */
export function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (s) => s.segment);
}

export function graphemeCount(text: string): number {
  let count = 0;
  for (const _ of segmenter.segment(text)) {
    count++;
  }
  return count;
}

/** Terminal columns occupied by the text, ignoring ANSI escape sequences. */
export function displayWidth(text: string): number {
  return stringWidth(text);
}

const WORD_PATTERN = /[\p{Alphabetic}\p{N}]/u;

/** A grapheme belongs to a word when any of its code points is a letter or digit. */
export function isWordGrapheme(grapheme: string): boolean {
  return WORD_PATTERN.test(grapheme);
}
