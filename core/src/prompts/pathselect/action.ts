import { type InputAction, inputActionFromKey } from "../../input/action.js";
import { isChar, type Key, KeyModifiers } from "../../ui/key.js";
import { type ListMotion, listMotionFromKey } from "../list-action.js";

export type PathSelectAction =
  | ListMotion
  | { kind: "toggleCurrent" }
  | { kind: "selectAll" }
  | { kind: "clearSelections" }
  | { kind: "enterDirectory" }
  | { kind: "leaveDirectory" }
  | { kind: "filterInput"; action: InputAction };

export function pathSelectActionFromKey(key: Key, vimMode: boolean): PathSelectAction | null {
  const motion = listMotionFromKey(key, vimMode);
  if (motion) return motion;

  if (isChar(key, " ")) return { kind: "toggleCurrent" };
  if (key.kind === "right") {
    if (key.modifiers === KeyModifiers.NONE) return { kind: "enterDirectory" };
    if (key.modifiers === KeyModifiers.SHIFT) return { kind: "selectAll" };
  }
  if (key.kind === "left") {
    if (key.modifiers === KeyModifiers.NONE) return { kind: "leaveDirectory" };
    if (key.modifiers === KeyModifiers.SHIFT) return { kind: "clearSelections" };
  }

  const input = inputActionFromKey(key);
  return input ? { kind: "filterInput", action: input } : null;
}
