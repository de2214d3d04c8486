/**
 * Cursor motion shared by the list prompts (select, multi-select, reorder).
 */

import { hasModifier, isChar, type Key, KeyModifiers } from "../ui/key.js";
import { cursorDown, cursorUp } from "../scoring/scored-view.js";

export type ListMotionKind =
  | "moveUp"
  | "moveDown"
  | "pageUp"
  | "pageDown"
  | "moveToStart"
  | "moveToEnd";

export interface ListMotion {
  kind: ListMotionKind;
}

const motion = (kind: ListMotionKind): ListMotion => ({ kind });

/** Arrows (no modifier), Ctrl+P/N, PageUp/PageDown, Home/End, plus k/j in vim mode. */
export function listMotionFromKey(key: Key, vimMode: boolean): ListMotion | null {
  if (vimMode) {
    if (isChar(key, "k")) return motion("moveUp");
    if (isChar(key, "j")) return motion("moveDown");
  }

  switch (key.kind) {
    case "up":
      return key.modifiers === KeyModifiers.NONE ? motion("moveUp") : null;
    case "down":
      return key.modifiers === KeyModifiers.NONE ? motion("moveDown") : null;
    case "pageUp":
      return motion("pageUp");
    case "pageDown":
      return motion("pageDown");
    case "home":
      return motion("moveToStart");
    case "end":
      return motion("moveToEnd");
    case "char":
      if (hasModifier(key.modifiers, KeyModifiers.CONTROL)) {
        if (key.char === "p") return motion("moveUp");
        if (key.char === "n") return motion("moveDown");
      }
      return null;
    default:
      return null;
  }
}

const FAR = Number.MAX_SAFE_INTEGER;

/**
 * Cursor after a motion over a list of `length` rows. Single steps wrap,
 * page and start/end jumps saturate.
 */
export function applyListMotion(
  motion: ListMotion,
  cursor: number,
  length: number,
  pageSize: number,
): number {
  switch (motion.kind) {
    case "moveUp":
      return cursorUp(cursor, length, 1, true);
    case "moveDown":
      return cursorDown(cursor, length, 1, true);
    case "pageUp":
      return cursorUp(cursor, length, pageSize, false);
    case "pageDown":
      return cursorDown(cursor, length, pageSize, false);
    case "moveToStart":
      return cursorUp(cursor, length, FAR, false);
    case "moveToEnd":
      return cursorDown(cursor, length, FAR, false);
  }
}
