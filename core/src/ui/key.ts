/**
 * Logical key events delivered by the terminal backend.
 *
 * Submit, Cancel and Interrupt are synthesised by the key parser from the
 * platform keys (Enter, Escape, Ctrl+C); prompts never see raw bytes.
 */

// --- Modifiers ---------------------------------------------------------------

/** Bit flags; combine with `|`. */
export const KeyModifiers = {
  NONE: 0,
  SHIFT: 1,
  CONTROL: 2,
  ALT: 4,
} as const;

export type KeyModifierSet = number;

export function hasModifier(set: KeyModifierSet, flag: KeyModifierSet): boolean {
  return (set & flag) === flag;
}

// --- Key union ---------------------------------------------------------------

type Plain<K extends string> = { kind: K };
type WithModifiers<K extends string> = { kind: K; modifiers: KeyModifierSet };

export type Key =
  | Plain<"enter">
  | Plain<"tab">
  | Plain<"backspace">
  | WithModifiers<"delete">
  | Plain<"home">
  | Plain<"end">
  | WithModifiers<"pageUp">
  | WithModifiers<"pageDown">
  | WithModifiers<"up">
  | WithModifiers<"down">
  | WithModifiers<"left">
  | WithModifiers<"right">
  | { kind: "char"; char: string; modifiers: KeyModifierSet }
  | Plain<"escape">
  | Plain<"interrupt">
  | Plain<"submit">
  | Plain<"cancel">
  | Plain<"any">;

// --- Constructors ------------------------------------------------------------

const NONE = KeyModifiers.NONE;

export const keys = {
  enter: (): Key => ({ kind: "enter" }),
  tab: (): Key => ({ kind: "tab" }),
  backspace: (): Key => ({ kind: "backspace" }),
  delete: (modifiers: KeyModifierSet = NONE): Key => ({ kind: "delete", modifiers }),
  home: (): Key => ({ kind: "home" }),
  end: (): Key => ({ kind: "end" }),
  pageUp: (modifiers: KeyModifierSet = NONE): Key => ({ kind: "pageUp", modifiers }),
  pageDown: (modifiers: KeyModifierSet = NONE): Key => ({ kind: "pageDown", modifiers }),
  up: (modifiers: KeyModifierSet = NONE): Key => ({ kind: "up", modifiers }),
  down: (modifiers: KeyModifierSet = NONE): Key => ({ kind: "down", modifiers }),
  left: (modifiers: KeyModifierSet = NONE): Key => ({ kind: "left", modifiers }),
  right: (modifiers: KeyModifierSet = NONE): Key => ({ kind: "right", modifiers }),
  char: (char: string, modifiers: KeyModifierSet = NONE): Key => ({
    kind: "char",
    char,
    modifiers,
  }),
  escape: (): Key => ({ kind: "escape" }),
  interrupt: (): Key => ({ kind: "interrupt" }),
  submit: (): Key => ({ kind: "submit" }),
  cancel: (): Key => ({ kind: "cancel" }),
  any: (): Key => ({ kind: "any" }),
};

/** Expands a string into one `char` key per code point, for scripting input. */
export function typed(text: string): Key[] {
  return Array.from(text, (c) => keys.char(c));
}

/** True for a `char` key carrying exactly the given character and modifiers. */
export function isChar(key: Key, char: string, modifiers: KeyModifierSet = NONE): boolean {
  return key.kind === "char" && key.char === char && key.modifiers === modifiers;
}
