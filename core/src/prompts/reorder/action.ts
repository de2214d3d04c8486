import { type InputAction, inputActionFromKey } from "../../input/action.js";
import { hasModifier, type Key, KeyModifiers } from "../../ui/key.js";
import { type ListMotion, listMotionFromKey } from "../list-action.js";

export type ReorderAction =
  | ListMotion
  | { kind: "moveItemUp" }
  | { kind: "moveItemDown" }
  | { kind: "filterInput"; action: InputAction };

function isVimItemKey(key: Key, char: "K" | "J"): boolean {
  return (
    key.kind === "char" &&
    key.char === char &&
    (key.modifiers === KeyModifiers.NONE || key.modifiers === KeyModifiers.SHIFT)
  );
}

export function reorderActionFromKey(key: Key, vimMode: boolean): ReorderAction | null {
  if (vimMode) {
    if (isVimItemKey(key, "K")) return { kind: "moveItemUp" };
    if (isVimItemKey(key, "J")) return { kind: "moveItemDown" };
  }

  if (key.kind === "up" && hasModifier(key.modifiers, KeyModifiers.CONTROL)) {
    return { kind: "moveItemUp" };
  }
  if (key.kind === "down" && hasModifier(key.modifiers, KeyModifiers.CONTROL)) {
    return { kind: "moveItemDown" };
  }

  const motion = listMotionFromKey(key, vimMode);
  if (motion) return motion;

  const input = inputActionFromKey(key);
  return input ? { kind: "filterInput", action: input } : null;
}
