/**
 * Shared error types used across layers.
 *
 * Prompts surface every exit path other than an answer as one of these
 * classes, so callers can tell a user cancelling apart from a broken
 * terminal using instanceof checks.
 */

/**
 * Thrown before any terminal state is touched when a prompt was built with
 * options that can never produce an answer (empty option list, cursor or
 * defaults out of range, starting date outside its bounds).
 */
export class InvalidConfigurationError extends Error {
  readonly detail: string;

  constructor(detail: string) {
    super(`The prompt configuration is invalid: ${detail}`);
    this.name = "InvalidConfigurationError";
    this.detail = detail;
  }
}

/** Thrown when the user cancels the prompt (Escape). */
export class OperationCanceledError extends Error {
  constructor(message = "Operation was canceled by the user") {
    super(message);
    this.name = "OperationCanceledError";
  }
}

/** Thrown when the user interrupts the prompt (Ctrl+C). Never swallowed by skippable prompts. */
export class OperationInterruptedError extends Error {
  constructor(message = "Operation was interrupted by the user") {
    super(message);
    this.name = "OperationInterruptedError";
  }
}

/** Wraps an error thrown from caller-provided code, such as a validator. */
export class CustomUserError extends Error {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`User-provided error: ${detail}`, { cause });
    this.name = "CustomUserError";
  }
}

/** Failure reading from or writing to the terminal, or handing off to the editor. */
export class TerminalIOError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TerminalIOError";
  }
}

/** Thrown when the prompt is asked to run on an input stream that is not a terminal. */
export class NotTTYError extends Error {
  constructor(message = "The input device is not a TTY") {
    super(message);
    this.name = "NotTTYError";
  }
}
