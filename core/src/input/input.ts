/**
 * Single-line text buffer with a grapheme-indexed cursor.
 *
 * Every edit and motion reports whether the content changed, only the
 * cursor moved, or nothing happened, so prompts can skip redraws and
 * refresh derived state (suggestions, filtered views) only on content edits.
 */

import { graphemeCount, graphemes, isWordGrapheme } from "../utils/graphemes.js";
import type { InputAction, InputActionResult, Magnitude } from "./action.js";

export class Input {
  private content = "";
  private cursorIndex = 0;
  private length = 0;
  private placeholderText: string | null = null;

  constructor(content = "") {
    this.content = content;
    this.length = graphemeCount(content);
    this.cursorIndex = this.length;
  }

  withPlaceholder(placeholder: string | null): this {
    this.placeholderText = placeholder;
    return this;
  }

  /** Places the cursor at a grapheme index. Out-of-range indices are a programming error. */
  withCursor(index: number): this {
    if (!Number.isInteger(index) || index < 0 || index > this.length) {
      throw new RangeError(
        `Cursor index ${index} is out of range for an input of length ${this.length}`,
      );
    }
    this.cursorIndex = index;
    return this;
  }

  get value(): string {
    return this.content;
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  get graphemeLength(): number {
    return this.length;
  }

  get placeholder(): string | null {
    return this.placeholderText;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  clear(): void {
    this.content = "";
    this.cursorIndex = 0;
    this.length = 0;
  }

  /** The text before the cursor, used to place the terminal cursor. */
  preCursor(): string {
    if (this.cursorIndex === this.length) return this.content;
    return graphemes(this.content).slice(0, this.cursorIndex).join("");
  }

  handle(action: InputAction): InputActionResult {
    switch (action.kind) {
      case "moveCursor":
        return action.direction === "left"
          ? this.moveLeft(action.magnitude)
          : this.moveRight(action.magnitude);
      case "delete":
        return action.direction === "left"
          ? this.backwardsDelete(action.magnitude)
          : this.forwardsDelete(action.magnitude);
      case "write":
        return this.insert(action.char);
    }
  }

  // --- Motion ----------------------------------------------------------------

  private moveLeft(magnitude: Magnitude): InputActionResult {
    if (this.cursorIndex === 0) return "clean";

    this.cursorIndex = this.leftTarget(magnitude);
    return "positionChanged";
  }

  private moveRight(magnitude: Magnitude): InputActionResult {
    if (this.cursorIndex >= this.length) {
      this.cursorIndex = this.length;
      return "clean";
    }

    this.cursorIndex = this.rightTarget(magnitude);
    return "positionChanged";
  }

  private leftTarget(magnitude: Magnitude): number {
    switch (magnitude) {
      case "char":
        return Math.max(0, this.cursorIndex - 1);
      case "word":
        return this.prevWordIndex();
      case "line":
        return 0;
    }
  }

  private rightTarget(magnitude: Magnitude): number {
    switch (magnitude) {
      case "char":
        return Math.min(this.length, this.cursorIndex + 1);
      case "word":
        return this.nextWordIndex();
      case "line":
        return this.length;
    }
  }

  /** Index just past the first non-word gap that follows a word, scanning right. */
  private nextWordIndex(): number {
    const parts = graphemes(this.content);
    let seenWord = false;

    for (let i = this.cursorIndex; i < parts.length; i++) {
      if (isWordGrapheme(parts[i])) {
        seenWord = true;
      } else if (seenWord) {
        return i;
      }
    }

    return this.length;
  }

  /** Index of the first grapheme of the previous word, scanning left. */
  private prevWordIndex(): number {
    const parts = graphemes(this.content);
    let seenWord = false;

    for (let i = this.cursorIndex - 1; i >= 0; i--) {
      if (isWordGrapheme(parts[i])) {
        seenWord = true;
      } else if (seenWord) {
        return i + 1;
      }
    }

    return 0;
  }

  // --- Edits -----------------------------------------------------------------

  private insert(char: string): InputActionResult {
    const parts = graphemes(this.content);
    const at = Math.min(this.cursorIndex, parts.length);
    parts.splice(at, 0, char);
    this.content = parts.join("");

    // a combining mark merges into the previous grapheme and leaves the count unchanged
    const previousLength = this.length;
    this.length = graphemeCount(this.content);
    if (this.length > previousLength) {
      this.cursorIndex++;
    }

    return "contentChanged";
  }

  private backwardsDelete(magnitude: Magnitude): InputActionResult {
    if (this.cursorIndex === 0) return "clean";

    const end = this.cursorIndex;
    const start = this.leftTarget(magnitude);
    if (start === end) return "clean";

    this.cursorIndex = start;
    return this.removeRange(start, end);
  }

  private forwardsDelete(magnitude: Magnitude): InputActionResult {
    return this.removeRange(this.cursorIndex, this.forwardEnd(magnitude));
  }

  private forwardEnd(magnitude: Magnitude): number {
    switch (magnitude) {
      case "char":
        return this.cursorIndex + 1;
      case "word":
        return this.nextWordIndex();
      case "line":
        return this.length;
    }
  }

  private removeRange(start: number, end: number): InputActionResult {
    const parts = graphemes(this.content);
    const kept = parts.filter((_, index) => index < start || index >= end);
    if (kept.length === parts.length) return "clean";

    this.content = kept.join("");
    this.length = graphemeCount(this.content);
    this.cursorIndex = Math.min(this.cursorIndex, this.length);
    return "contentChanged";
  }
}
