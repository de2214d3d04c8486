/**
 * Terminal backed by a writable stream, speaking ANSI escape sequences.
 *
 * Writes are buffered and only reach the stream on `flush`, so a whole frame
 * diff goes out in a single write.
 */

import type { Writable } from "node:stream";
import { TerminalIOError } from "../errors.js";
import { Attributes, type Color, type NamedColor, type Styled } from "../ui/style.js";
import type { Terminal, TerminalSize } from "./terminal.js";

// --- ANSI escape constants --------------------------------------------------

const CSI = "\x1b[";
const ANSI_CLEAR_LINE = `${CSI}2K`;
const ANSI_CLEAR_UNTIL_NEW_LINE = `${CSI}K`;
const ANSI_HIDE_CURSOR = `${CSI}?25l`;
const ANSI_SHOW_CURSOR = `${CSI}?25h`;
const ANSI_RESET = `${CSI}0m`;
const ANSI_DEFAULT_FG = `${CSI}39m`;
const ANSI_DEFAULT_BG = `${CSI}49m`;

const FG_CODES: Record<NamedColor, number> = {
  black: 30,
  darkRed: 31,
  darkGreen: 32,
  darkYellow: 33,
  darkBlue: 34,
  darkMagenta: 35,
  darkCyan: 36,
  grey: 37,
  darkGrey: 90,
  lightRed: 91,
  lightGreen: 92,
  lightYellow: 93,
  lightBlue: 94,
  lightMagenta: 95,
  lightCyan: 96,
  white: 97,
};

const BACKGROUND_OFFSET = 10;

/** SGR parameters selecting a colour, as foreground or background. */
export function colorParams(color: Color, background: boolean): string {
  if (typeof color === "string") {
    return String(FG_CODES[color] + (background ? BACKGROUND_OFFSET : 0));
  }
  const base = background ? 48 : 38;
  if ("rgb" in color) {
    const [r, g, b] = color.rgb;
    return `${base};2;${r};${g};${b}`;
  }
  return `${base};5;${color.ansiValue}`;
}

/** The escape-wrapped form of a styled value. */
export function styledToAnsi(value: Styled): string {
  const { fg, bg, att } = value.style;
  let prefix = "";
  let suffix = "";

  if (fg !== null) {
    prefix += `${CSI}${colorParams(fg, false)}m`;
    suffix += ANSI_DEFAULT_FG;
  }
  if (bg !== null) {
    prefix += `${CSI}${colorParams(bg, true)}m`;
    suffix += ANSI_DEFAULT_BG;
  }
  if ((att & Attributes.BOLD) !== 0) prefix += `${CSI}1m`;
  if ((att & Attributes.ITALIC) !== 0) prefix += `${CSI}3m`;
  if (att !== Attributes.NONE) suffix += ANSI_RESET;

  return `${prefix}${value.content}${suffix}`;
}

// --- Terminal ----------------------------------------------------------------

type SizedWritable = Writable & { columns?: number; rows?: number };

export class AnsiTerminal implements Terminal {
  private buffer = "";

  constructor(private readonly output: SizedWritable = process.stderr) {}

  getSize(): TerminalSize {
    const { columns, rows } = this.output;
    if (!columns || !rows) {
      throw new TerminalIOError("Terminal size is not available on this output stream");
    }
    return { width: columns, height: rows };
  }

  cursorUp(n: number): void {
    if (n > 0) this.buffer += `${CSI}${n}A`;
  }

  cursorDown(n: number): void {
    if (n > 0) this.buffer += `${CSI}${n}B`;
  }

  cursorRight(n: number): void {
    if (n > 0) this.buffer += `${CSI}${n}C`;
  }

  cursorLeft(n: number): void {
    if (n > 0) this.buffer += `${CSI}${n}D`;
  }

  /** 0-indexed column; ANSI columns are 1-indexed. */
  cursorMoveToColumn(column: number): void {
    this.buffer += `${CSI}${column + 1}G`;
  }

  cursorHide(): void {
    this.buffer += ANSI_HIDE_CURSOR;
  }

  cursorShow(): void {
    this.buffer += ANSI_SHOW_CURSOR;
  }

  write(text: string): void {
    this.buffer += text;
  }

  writeStyled(value: Styled): void {
    this.buffer += styledToAnsi(value);
  }

  clearLine(): void {
    this.buffer += ANSI_CLEAR_LINE;
  }

  clearUntilNewLine(): void {
    this.buffer += ANSI_CLEAR_UNTIL_NEW_LINE;
  }

  flush(): void {
    if (this.buffer === "") return;
    const chunk = this.buffer;
    this.buffer = "";
    try {
      this.output.write(chunk);
    } catch (err) {
      throw new TerminalIOError("Failed to write to the terminal", err);
    }
  }
}
