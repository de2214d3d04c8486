import { type InputAction, inputActionFromKey } from "../../input/action.js";
import { isChar, type Key, KeyModifiers } from "../../ui/key.js";
import { type ListMotion, listMotionFromKey } from "../list-action.js";

/** Step of Shift+Right and Shift+Left. */
export const MULTI_COUNT_STEP = 10;

export type MultiCountAction =
  | ListMotion
  | { kind: "changeCount"; diff: number }
  | { kind: "clearCounts" }
  | { kind: "filterInput"; action: InputAction };

const change = (diff: number): MultiCountAction => ({ kind: "changeCount", diff });

export function multiCountActionFromKey(key: Key, vimMode: boolean): MultiCountAction | null {
  const motion = listMotionFromKey(key, vimMode);
  if (motion) return motion;

  if (vimMode) {
    if (isChar(key, "+")) return change(1);
    if (isChar(key, "-")) return change(-1);
  }

  if (key.kind === "right") {
    if (key.modifiers === KeyModifiers.NONE) return change(1);
    if (key.modifiers === KeyModifiers.SHIFT) return change(MULTI_COUNT_STEP);
  }
  if (key.kind === "left") {
    if (key.modifiers === KeyModifiers.NONE) return change(-1);
    if (key.modifiers === KeyModifiers.SHIFT) return change(-MULTI_COUNT_STEP);
  }
  if (isChar(key, "x", KeyModifiers.CONTROL)) return { kind: "clearCounts" };

  const input = inputActionFromKey(key);
  return input ? { kind: "filterInput", action: input } : null;
}
