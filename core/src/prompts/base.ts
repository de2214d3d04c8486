/**
 * Public surface shared by every prompt: `prompt()` and `promptSkippable()`.
 *
 * Subclasses validate their options in `createRunner()`, so a prompt built
 * with an impossible configuration fails before the terminal is touched.
 */

import { getGlobalRenderConfig } from "../config/global.js";
import { InvalidConfigurationError, OperationCanceledError } from "../errors.js";
import { openTerminalSession } from "../terminal/session.js";
import type { PromptIO } from "../terminal/terminal.js";
import type { RenderConfig } from "../ui/render-config.js";

export const DEFAULT_PAGE_SIZE = 7;
export const DEFAULT_VIM_MODE = false;

export interface CommonPromptOptions {
  /** Shown below the prompt. Null hides the prompt's default help line. */
  helpMessage?: string | null;
  /** Defaults to the process-wide render config at construction time. */
  renderConfig?: RenderConfig;
}

export interface ListPromptOptions extends CommonPromptOptions {
  pageSize?: number;
  vimMode?: boolean;
}

/** Explicit null wins over the default; undefined falls back to it. */
export function helpOrDefault(
  helpMessage: string | null | undefined,
  fallback: string | null,
): string | null {
  return helpMessage === undefined ? fallback : helpMessage;
}

// --- Configuration checks ---------------------------------------------------

export function checkPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new InvalidConfigurationError(`Page size must be a positive integer, got ${pageSize}`);
  }
}

export function checkOptions(options: readonly unknown[]): void {
  if (options.length === 0) {
    throw new InvalidConfigurationError("Available options can not be empty");
  }
}

export function checkIndex(index: number, length: number, what: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new InvalidConfigurationError(
      `${what} ${index} is out-of-bounds for length ${length} of options`,
    );
  }
}

// --- Base class -------------------------------------------------------------

export abstract class PromptBase<Output> {
  protected readonly renderConfig: RenderConfig;

  constructor(
    readonly message: string,
    options: CommonPromptOptions = {},
  ) {
    this.renderConfig = options.renderConfig ?? getGlobalRenderConfig();
  }

  /** Validates the configuration and returns the function that runs the prompt. */
  protected abstract createRunner(): (io: PromptIO) => Promise<Output>;

  /** Runs the prompt on `io`, or on the process terminal when none is given. */
  async prompt(io?: PromptIO): Promise<Output> {
    const run = this.createRunner();
    return run(io ?? openTerminalSession());
  }

  /** Like `prompt`, but a cancel (Escape) resolves to null. Interrupts still throw. */
  async promptSkippable(io?: PromptIO): Promise<Output | null> {
    try {
      return await this.prompt(io);
    } catch (err) {
      if (err instanceof OperationCanceledError) return null;
      throw err;
    }
  }
}
