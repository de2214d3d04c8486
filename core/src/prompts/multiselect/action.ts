import { type InputAction, inputActionFromKey } from "../../input/action.js";
import { isChar, type Key, KeyModifiers } from "../../ui/key.js";
import { type ListMotion, listMotionFromKey } from "../list-action.js";

export type MultiSelectAction =
  | ListMotion
  | { kind: "toggleCurrent" }
  | { kind: "selectAll" }
  | { kind: "clearSelections" }
  | { kind: "filterInput"; action: InputAction };

export function multiSelectActionFromKey(key: Key, vimMode: boolean): MultiSelectAction | null {
  const motion = listMotionFromKey(key, vimMode);
  if (motion) return motion;

  if (vimMode) {
    if (isChar(key, "h")) return { kind: "clearSelections" };
    if (isChar(key, "l")) return { kind: "selectAll" };
  }

  if (isChar(key, " ")) return { kind: "toggleCurrent" };
  if (key.kind === "right" && key.modifiers === KeyModifiers.NONE) return { kind: "selectAll" };
  if (key.kind === "left" && key.modifiers === KeyModifiers.NONE) {
    return { kind: "clearSelections" };
  }

  const input = inputActionFromKey(key);
  return input ? { kind: "filterInput", action: input } : null;
}
