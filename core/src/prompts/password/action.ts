import { type InputAction, inputActionFromKey } from "../../input/action.js";
import { hasModifier, type Key, KeyModifiers } from "../../ui/key.js";

export type PasswordAction =
  | { kind: "valueInput"; action: InputAction }
  | { kind: "toggleDisplayMode" };

export function passwordActionFromKey(
  key: Key,
  enableDisplayToggle: boolean,
): PasswordAction | null {
  if (
    enableDisplayToggle &&
    key.kind === "char" &&
    (key.char === "r" || key.char === "R") &&
    hasModifier(key.modifiers, KeyModifiers.CONTROL)
  ) {
    return { kind: "toggleDisplayMode" };
  }

  const input = inputActionFromKey(key);
  return input ? { kind: "valueInput", action: input } : null;
}
