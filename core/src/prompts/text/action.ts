import { type InputAction, inputActionFromKey } from "../../input/action.js";
import { type Key, KeyModifiers } from "../../ui/key.js";

export type TextAction =
  | { kind: "valueInput"; action: InputAction }
  | { kind: "suggestionUp" }
  | { kind: "suggestionDown" }
  | { kind: "suggestionPageUp" }
  | { kind: "suggestionPageDown" }
  | { kind: "useCurrentSuggestion" };

export function textActionFromKey(key: Key): TextAction | null {
  switch (key.kind) {
    case "up":
      if (key.modifiers === KeyModifiers.NONE) return { kind: "suggestionUp" };
      break;
    case "down":
      if (key.modifiers === KeyModifiers.NONE) return { kind: "suggestionDown" };
      break;
    case "pageUp":
      return { kind: "suggestionPageUp" };
    case "pageDown":
      return { kind: "suggestionPageDown" };
    case "tab":
      return { kind: "useCurrentSuggestion" };
  }

  const input = inputActionFromKey(key);
  return input ? { kind: "valueInput", action: input } : null;
}
