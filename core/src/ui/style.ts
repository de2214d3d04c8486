/**
 * Colours, text attributes and style sheets applied to rendered text.
 */

// --- Colours -----------------------------------------------------------------

export type NamedColor =
  | "black"
  | "lightRed"
  | "darkRed"
  | "lightGreen"
  | "darkGreen"
  | "lightYellow"
  | "darkYellow"
  | "lightBlue"
  | "darkBlue"
  | "lightMagenta"
  | "darkMagenta"
  | "lightCyan"
  | "darkCyan"
  | "white"
  | "grey"
  | "darkGrey";

export type Color = NamedColor | { rgb: [number, number, number] } | { ansiValue: number };

// --- Attributes --------------------------------------------------------------

/** Bit flags; combine with `|`. */
export const Attributes = {
  NONE: 0,
  BOLD: 1,
  ITALIC: 2,
} as const;

// --- Style sheets ------------------------------------------------------------

export interface StyleSheet {
  readonly fg: Color | null;
  readonly bg: Color | null;
  readonly att: number;
}

export const EMPTY_STYLE: StyleSheet = { fg: null, bg: null, att: Attributes.NONE };

export function styleSheet(overrides: Partial<StyleSheet> = {}): StyleSheet {
  return { ...EMPTY_STYLE, ...overrides };
}

function colorKey(color: Color | null): string {
  if (color === null) return "-";
  if (typeof color === "string") return color;
  if ("rgb" in color) return `rgb(${color.rgb.join(",")})`;
  return `ansi(${color.ansiValue})`;
}

/** Stable textual form of a style sheet, folded into row hashes. */
export function styleKey(style: StyleSheet): string {
  return `${colorKey(style.fg)}|${colorKey(style.bg)}|${style.att}`;
}

// --- Styled text -------------------------------------------------------------

export interface Styled {
  readonly content: string;
  readonly style: StyleSheet;
}

export function styled(content: string, style: StyleSheet = EMPTY_STYLE): Styled {
  return { content, style };
}

export function withStyle(value: Styled, style: StyleSheet): Styled {
  return { content: value.content, style };
}
