import { type Formatter, optionFormatter } from "../../formatter.js";
import type { ListOption } from "../../list-option.js";
import { defaultScorer, type Scorer } from "../../scoring/scorer.js";
import { openTerminalSession } from "../../terminal/session.js";
import type { PromptIO } from "../../terminal/terminal.js";
import {
  checkIndex,
  checkOptions,
  checkPageSize,
  DEFAULT_PAGE_SIZE,
  DEFAULT_VIM_MODE,
  helpOrDefault,
  type ListPromptOptions,
  PromptBase,
} from "../base.js";
import { runPrompt } from "../prompt.js";
import { SelectPrompt } from "./prompt.js";

export const SELECT_HELP_MESSAGE = "↑↓ to move, enter to select, type to filter";

export interface SelectOptions<T> extends ListPromptOptions {
  /** Index into the options of the row highlighted first. */
  startingCursor?: number;
  startingFilterInput?: string;
  /** Move the cursor back to the top whenever the filter changes the view. */
  resetCursor?: boolean;
  filterInputEnabled?: boolean;
  scorer?: Scorer<T>;
  formatter?: Formatter<ListOption<T>>;
  /** String form used for display and filtering; defaults to String(value). */
  display?: (value: T) => string;
}

/**
 * Pick one option from a list, with type-to-filter.
 *
 * ```ts
 * const fruit = await new Select("Fruit?", ["Banana", "Apple"]).prompt();
 * ```
 */
export class Select<T> extends PromptBase<T> {
  constructor(
    message: string,
    private readonly options: readonly T[],
    private readonly config: SelectOptions<T> = {},
  ) {
    super(message, config);
  }

  /** Like `prompt`, but also returns the chosen option's index. */
  async rawPrompt(io?: PromptIO): Promise<ListOption<T>> {
    const run = this.createRawRunner();
    return run(io ?? openTerminalSession());
  }

  protected createRunner(): (io: PromptIO) => Promise<T> {
    const run = this.createRawRunner();
    return async (io) => (await run(io)).value;
  }

  private createRawRunner(): (io: PromptIO) => Promise<ListOption<T>> {
    const { config, options } = this;
    const pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    const startingCursor = config.startingCursor ?? 0;

    checkOptions(options);
    checkPageSize(pageSize);
    checkIndex(startingCursor, options.length, "Starting cursor index");

    const display = config.display ?? String;
    const stringValues = options.map((option) => display(option));

    return (io) =>
      runPrompt(
        new SelectPrompt({
          message: this.message,
          options,
          stringValues,
          startingCursor,
          startingFilterInput: config.startingFilterInput ?? null,
          helpMessage: helpOrDefault(config.helpMessage, SELECT_HELP_MESSAGE),
          scorer: config.scorer ?? defaultScorer(),
          formatter: config.formatter ?? optionFormatter(display),
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
