import { type InputAction, inputActionFromKey } from "../../input/action.js";
import type { Key } from "../../ui/key.js";
import { type ListMotion, listMotionFromKey } from "../list-action.js";

export type SelectAction = ListMotion | { kind: "filterInput"; action: InputAction };

export function selectActionFromKey(key: Key, vimMode: boolean): SelectAction | null {
  const motion = listMotionFromKey(key, vimMode);
  if (motion) return motion;

  const input = inputActionFromKey(key);
  return input ? { kind: "filterInput", action: input } : null;
}
