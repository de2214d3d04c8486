import { hasModifier, type Key, KeyModifiers } from "../ui/key.js";

export type Magnitude = "char" | "word" | "line";
export type LineDirection = "left" | "right";

export type InputAction =
  | { kind: "write"; char: string }
  | { kind: "delete"; magnitude: Magnitude; direction: LineDirection }
  | { kind: "moveCursor"; magnitude: Magnitude; direction: LineDirection };

export type InputActionResult = "contentChanged" | "positionChanged" | "clean";

const moveCursor = (magnitude: Magnitude, direction: LineDirection): InputAction => ({
  kind: "moveCursor",
  magnitude,
  direction,
});

const remove = (magnitude: Magnitude, direction: LineDirection): InputAction => ({
  kind: "delete",
  magnitude,
  direction,
});

/** Maps a key to a text-editing action, or null when the buffer does not handle it. */
export function inputActionFromKey(key: Key): InputAction | null {
  switch (key.kind) {
    case "backspace":
      return remove("char", "left");
    case "delete":
      return hasModifier(key.modifiers, KeyModifiers.CONTROL)
        ? remove("word", "right")
        : remove("char", "right");
    case "home":
      return moveCursor("line", "left");
    case "end":
      return moveCursor("line", "right");
    case "left":
      return hasModifier(key.modifiers, KeyModifiers.CONTROL)
        ? moveCursor("word", "left")
        : moveCursor("char", "left");
    case "right":
      return hasModifier(key.modifiers, KeyModifiers.CONTROL)
        ? moveCursor("word", "right")
        : moveCursor("char", "right");
    case "char":
      // Ctrl+H is what many terminals send for Ctrl+Backspace: neither delete nor type "h"
      if (key.char === "h" && hasModifier(key.modifiers, KeyModifiers.CONTROL)) {
        return null;
      }
      // single-line buffer
      if (key.char === "\n" || key.char === "\r") return null;
      return { kind: "write", char: key.char };
    default:
      return null;
  }
}
