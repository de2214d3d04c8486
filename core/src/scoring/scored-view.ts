/**
 * Filtered, score-ordered view over a list of options plus the cursor
 * that walks it.
 *
 * The view holds original option indices. Rescoring keeps the cursor
 * untouched when the resulting order is identical; otherwise the cursor is
 * reset to the top or clamped into the new view.
 */

import type { Scorer } from "./scorer.js";

// --- Cursor motion ------------------------------------------------------------

/** Cursor after moving up `qty` rows; wraps past the top when `wrap` is set. */
export function cursorUp(cursor: number, length: number, qty: number, wrap: boolean): number {
  if (cursor >= qty) return cursor - qty;
  if (!wrap) return 0;
  return Math.max(0, length - (qty - cursor));
}

/** Cursor after moving down `qty` rows; wraps past the bottom when `wrap` is set. */
export function cursorDown(cursor: number, length: number, qty: number, wrap: boolean): number {
  const target = cursor + qty;
  if (target < length) return target;
  if (length === 0) return 0;
  return wrap ? target % length : length - 1;
}

// --- Scored view ---------------------------------------------------------------

export class ScoredView<T> {
  private indices: number[];
  private cursorIndex: number;

  constructor(
    private readonly options: readonly T[],
    private readonly stringValues: readonly string[],
    private readonly scorer: Scorer<T>,
    private readonly resetCursor: boolean,
    startingCursor = 0,
  ) {
    this.indices = options.map((_, index) => index);
    this.cursorIndex = startingCursor;
  }

  /** Original option indices in display order. */
  get view(): readonly number[] {
    return this.indices;
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  get length(): number {
    return this.indices.length;
  }

  /** Original index of the option under the cursor, or null when the view is empty. */
  current(): number | null {
    return this.indices[this.cursorIndex] ?? null;
  }

  /** Recomputes the view for a filter. Returns true when the view changed. */
  rescore(filter: string): boolean {
    const scored: { index: number; score: number }[] = [];
    this.options.forEach((option, index) => {
      const score = this.scorer(filter, option, this.stringValues[index], index);
      if (score !== null) scored.push({ index, score });
    });
    // Array.prototype.sort is stable, so ties keep their original order
    scored.sort((a, b) => b.score - a.score);
    const next = scored.map((entry) => entry.index);

    if (sameOrder(next, this.indices)) return false;

    this.indices = next;
    if (this.resetCursor) {
      this.cursorIndex = 0;
    } else {
      this.cursorIndex = Math.max(0, Math.min(this.cursorIndex, next.length - 1));
    }
    return true;
  }

  moveUp(qty: number, wrap: boolean): boolean {
    return this.moveTo(cursorUp(this.cursorIndex, this.indices.length, qty, wrap));
  }

  moveDown(qty: number, wrap: boolean): boolean {
    return this.moveTo(cursorDown(this.cursorIndex, this.indices.length, qty, wrap));
  }

  /** Places the cursor at a view position. Returns true when it moved. */
  moveTo(next: number): boolean {
    if (next === this.cursorIndex) return false;
    this.cursorIndex = next;
    return true;
  }
}

function sameOrder(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
