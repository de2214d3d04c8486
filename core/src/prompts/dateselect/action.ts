import { hasModifier, isChar, type Key, KeyModifiers } from "../../ui/key.js";

/** Calendar moves; a year is twelve months. */
export type DateSelectAction =
  | { kind: "shiftDays"; days: number }
  | { kind: "shiftMonths"; months: number };

const days = (n: number): DateSelectAction => ({ kind: "shiftDays", days: n });
const months = (n: number): DateSelectAction => ({ kind: "shiftMonths", months: n });

export function dateSelectActionFromKey(key: Key, vimMode: boolean): DateSelectAction | null {
  if (vimMode) {
    if (isChar(key, "k")) return days(-7);
    if (isChar(key, "j")) return days(7);
    if (isChar(key, "h")) return days(-1);
    if (isChar(key, "l")) return days(1);
  }

  switch (key.kind) {
    case "left":
      return hasModifier(key.modifiers, KeyModifiers.CONTROL) ? months(-1) : days(-1);
    case "right":
      return hasModifier(key.modifiers, KeyModifiers.CONTROL) ? months(1) : days(1);
    case "up":
      return hasModifier(key.modifiers, KeyModifiers.CONTROL) ? months(-12) : days(-7);
    case "down":
      return hasModifier(key.modifiers, KeyModifiers.CONTROL) ? months(12) : days(7);
    case "tab":
      return days(7);
    default:
      return null;
  }
}
