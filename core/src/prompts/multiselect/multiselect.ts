import { type Formatter, multiOptionFormatter } from "../../formatter.js";
import type { ListOption } from "../../list-option.js";
import { defaultScorer, type Scorer } from "../../scoring/scorer.js";
import { openTerminalSession } from "../../terminal/session.js";
import type { PromptIO } from "../../terminal/terminal.js";
import type { Validator } from "../../validator.js";
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
import { MultiSelectPrompt } from "./prompt.js";

export const MULTI_SELECT_HELP_MESSAGE =
  "↑↓ to move, space to select one, → to all, ← to none, type to filter";

export interface MultiSelectOptions<T> extends ListPromptOptions {
  /** Original indices checked when the prompt opens. */
  defaults?: readonly number[];
  allSelectedByDefault?: boolean;
  startingCursor?: number;
  startingFilterInput?: string;
  resetCursor?: boolean;
  filterInputEnabled?: boolean;
  keepFilter?: boolean;
  scorer?: Scorer<T>;
  validators?: readonly Validator<ListOption<T>[]>[];
  formatter?: Formatter<readonly ListOption<T>[]>;
  display?: (value: T) => string;
}

/** Check any number of options; the answer keeps the options' original order. */
export class MultiSelect<T> extends PromptBase<T[]> {
  constructor(
    message: string,
    private readonly options: readonly T[],
    private readonly config: MultiSelectOptions<T> = {},
  ) {
    super(message, config);
  }

  /** Like `prompt`, but also returns each chosen option's index. */
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
    const startingCursor = config.startingCursor ?? 0;

    checkOptions(options);
    checkPageSize(pageSize);
    checkIndex(startingCursor, options.length, "Starting cursor index");

    const defaults = config.allSelectedByDefault
      ? options.map((_, index) => index)
      : (config.defaults ?? []);
    for (const index of defaults) {
      checkIndex(index, options.length, "Index");
    }

    const display = config.display ?? String;
    const stringValues = options.map((option) => display(option));

    return (io) =>
      runPrompt(
        new MultiSelectPrompt({
          message: this.message,
          options,
          stringValues,
          checked: defaults,
          startingCursor,
          startingFilterInput: config.startingFilterInput ?? null,
          helpMessage: helpOrDefault(config.helpMessage, MULTI_SELECT_HELP_MESSAGE),
          scorer: config.scorer ?? defaultScorer(),
          validators: config.validators ?? [],
          formatter: config.formatter ?? multiOptionFormatter(display),
          config: {
            pageSize,
            vimMode: config.vimMode ?? DEFAULT_VIM_MODE,
            resetCursor: config.resetCursor ?? true,
            filterInputEnabled: config.filterInputEnabled ?? true,
            keepFilter: config.keepFilter ?? true,
          },
        }),
        io,
        this.renderConfig,
      );
  }
}
