import { type Formatter, multiOptionFormatter } from "../../formatter.js";
import type { ListOption } from "../../list-option.js";
import { defaultScorer, type Scorer } from "../../scoring/scorer.js";
import { openTerminalSession } from "../../terminal/session.js";
import type { PromptIO } from "../../terminal/terminal.js";
import {
  checkOptions,
  checkPageSize,
  DEFAULT_PAGE_SIZE,
  DEFAULT_VIM_MODE,
  helpOrDefault,
  type ListPromptOptions,
  PromptBase,
} from "../base.js";
import { runPrompt } from "../prompt.js";
import { ReorderPrompt } from "./prompt.js";

export const REORDER_HELP_MESSAGE = "↑↓ to move cursor, Ctrl+↑↓ to move item, type to filter";

export interface ReorderOptions<T> extends ListPromptOptions {
  resetCursor?: boolean;
  filterInputEnabled?: boolean;
  /** Decides which rows the filter shows; the score itself is not used. */
  scorer?: Scorer<T>;
  formatter?: Formatter<readonly ListOption<T>[]>;
  display?: (value: T) => string;
}

/** Put a list of options into the order the user wants. */
export class Reorder<T> extends PromptBase<T[]> {
  constructor(
    message: string,
    private readonly options: readonly T[],
    private readonly config: ReorderOptions<T> = {},
  ) {
    super(message, config);
  }

  /** Like `prompt`, but each item also carries its index in the original list. */
  async rawPrompt(io?: PromptIO): Promise<ListOption<T>[]> {
    const run = this.createRawRunner();
    return run(io ?? openTerminalSession());
  }

  protected createRunner(): (io: PromptIO) => Promise<T[]> {
    const run = this.createRawRunner();
    return async (io) => (await run(io)).map((option) => option.value);
  }

  private createRawRunner(): (io: PromptIO) => Promise<ListOption<T>[]> {
    const { config, options } = this;
    const pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;

    checkOptions(options);
    checkPageSize(pageSize);

    const display = config.display ?? String;
    const stringValues = options.map((option) => display(option));

    return (io) =>
      runPrompt(
        new ReorderPrompt({
          message: this.message,
          options,
          stringValues,
          helpMessage: helpOrDefault(config.helpMessage, REORDER_HELP_MESSAGE),
          scorer: config.scorer ?? defaultScorer(),
          formatter: config.formatter ?? multiOptionFormatter(display),
          config: {
            pageSize,
            vimMode: config.vimMode ?? DEFAULT_VIM_MODE,
            resetCursor: config.resetCursor ?? true,
            filterInputEnabled: config.filterInputEnabled ?? true,
          },
        }),
        io,
        this.renderConfig,
      );
  }
}
