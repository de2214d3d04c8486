/**
 * Contracts between the prompt core and the terminal it draws on.
 */

import type { Key } from "../ui/key.js";
import type { Styled } from "../ui/style.js";

export interface TerminalSize {
  width: number;
  height: number;
}

/** Output side of a terminal. Writes may be buffered until `flush`. */
export interface Terminal {
  /** Throws when the size cannot be determined. */
  getSize(): TerminalSize;

  cursorUp(n: number): void;
  cursorDown(n: number): void;
  cursorLeft(n: number): void;
  cursorRight(n: number): void;
  cursorMoveToColumn(column: number): void;
  cursorHide(): void;
  cursorShow(): void;

  write(text: string): void;
  writeStyled(value: Styled): void;

  clearLine(): void;
  clearUntilNewLine(): void;

  flush(): void;
}

/** Input side of a terminal: one logical key per call. */
export interface InputReader {
  readKey(): Promise<Key>;
  /** Stop consuming input while another program owns the terminal. */
  pause?(): void;
  resume?(): void;
}

/** Everything a prompt needs to run; `close` restores the terminal. */
export interface PromptIO {
  terminal: Terminal;
  reader: InputReader;
  close?: () => void;
}
