/**
 * How the CLI reports a failed prompt: the message's first line in red,
 * follow-up lines (hints) in green, and an exit code per error kind.
 */

import { OperationCanceledError, OperationInterruptedError } from "../errors.js";
import { GREEN, RED, RESET } from "./ansi.js";

const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export function formatError(err: unknown): string {
  const msg = err instanceof Error ? err.message : String(err);
  const lines = msg.split("\n");
  const errorLine = `${RED}${lines[0]}${RESET}`;
  const instructionLines = lines.slice(1).map((l) => `${GREEN}${l}${RESET}`);
  return [errorLine, ...instructionLines].join("\n");
}

/** Ctrl+C exits like a shell would; everything else is a plain failure. */
export function exitCodeFor(err: unknown): number {
  return err instanceof OperationInterruptedError ? EXIT_INTERRUPTED : EXIT_FAILURE;
}

/** Cancel and interrupt already show on the prompt line, so only other errors get a message. */
export function shouldReport(err: unknown): boolean {
  return !(err instanceof OperationCanceledError || err instanceof OperationInterruptedError);
}
