/**
 * In-memory answer history for the text prompt.
 *
 * Entries are kept newest first. Browsing starts before the newest entry;
 * "earlier" walks toward the oldest and sticks there, "later" walks back
 * and returns null once it steps past the newest.
 */

import type { Replacement } from "./autocompletion.js";

export interface History {
  earlierElement(): Replacement;
  laterElement(): Replacement;
  /** Records an accepted answer and resets browsing. Empty answers are skipped. */
  prependElement(entry: string): void;
}

export class SimpleHistory implements History {
  private readonly entries: string[];
  // -1 while not browsing
  private index = -1;

  constructor(entries: readonly string[] = []) {
    this.entries = [...entries];
  }

  earlierElement(): Replacement {
    const last = this.entries.length - 1;
    if (this.index < last) {
      this.index++;
      return this.entries[this.index];
    }
    return last >= 0 ? this.entries[last] : null;
  }

  laterElement(): Replacement {
    if (this.index >= 1) {
      this.index--;
      return this.entries[this.index];
    }
    this.index = -1;
    return null;
  }

  prependElement(entry: string): void {
    if (entry === "") return;
    this.entries.unshift(entry);
    this.index = -1;
  }
}
