/**
 * Opens the process terminal for a prompt: raw mode on the input stream,
 * ANSI output on stderr, and a `close` that undoes both.
 */

import type { Readable, Writable } from "node:stream";
import { NotTTYError } from "../errors.js";
import { AnsiTerminal } from "./ansi-terminal.js";
import { StreamKeyReader } from "./stream-key-reader.js";
import type { PromptIO } from "./terminal.js";

export type TTYInput = Readable & { isTTY?: boolean; setRawMode?: (mode: boolean) => void };

export interface TerminalSessionOptions {
  /** Readable stream to read from (defaults to process.stdin). */
  input?: TTYInput;
  /** Writable stream to write to (defaults to process.stderr). */
  output?: Writable & { columns?: number; rows?: number };
}

export function openTerminalSession(options: TerminalSessionOptions = {}): Required<PromptIO> {
  const { input = process.stdin, output = process.stderr } = options;

  if (!input.isTTY || !input.setRawMode) {
    throw new NotTTYError();
  }

  const setRawMode = input.setRawMode.bind(input);
  setRawMode(true);
  input.resume();

  const reader = new StreamKeyReader(input);
  let closed = false;

  return {
    terminal: new AnsiTerminal(output),
    reader,
    close: () => {
      if (closed) return;
      closed = true;
      reader.dispose();
      setRawMode(false);
      input.pause();
    },
  };
}
