import { InvalidConfigurationError } from "../../errors.js";
import { countedOptionFormatter, type Formatter } from "../../formatter.js";
import type { CountedListOption, ListOption } from "../../list-option.js";
import { defaultScorer, type Scorer } from "../../scoring/scorer.js";
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
import { MultiCountPrompt } from "./prompt.js";

export const MULTI_COUNT_HELP_MESSAGE =
  "↑↓ to move, → to add one, ← to remove one, shift for ten, type to filter";

export interface MultiCountOptions<T> extends ListPromptOptions {
  /** Starting counts by original index. */
  defaults?: readonly { index: number; count: number }[];
  startingCursor?: number;
  startingFilterInput?: string;
  resetCursor?: boolean;
  filterInputEnabled?: boolean;
  keepFilter?: boolean;
  scorer?: Scorer<T>;
  validators?: readonly Validator<ListOption<T>[]>[];
  formatter?: Formatter<readonly CountedListOption<T>[]>;
  display?: (value: T) => string;
}

/** Pick how many of each option; the answer lists the options with a positive count. */
export class MultiCount<T> extends PromptBase<CountedListOption<T>[]> {
  constructor(
    message: string,
    private readonly options: readonly T[],
    private readonly config: MultiCountOptions<T> = {},
  ) {
    super(message, config);
  }

  protected createRunner(): (io: PromptIO) => Promise<CountedListOption<T>[]> {
    const { config, options } = this;
    const pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    const startingCursor = config.startingCursor ?? 0;

    checkOptions(options);
    checkPageSize(pageSize);
    checkIndex(startingCursor, options.length, "Starting cursor index");

    const defaults = config.defaults ?? [];
    for (const { index, count } of defaults) {
      checkIndex(index, options.length, "Index");
      if (!Number.isInteger(count) || count < 0) {
        throw new InvalidConfigurationError(
          `Count for index ${index} must be a non-negative integer, got ${count}`,
        );
      }
    }

    const display = config.display ?? String;
    const stringValues = options.map((option) => display(option));

    return (io) =>
      runPrompt(
        new MultiCountPrompt({
          message: this.message,
          options,
          stringValues,
          counts: defaults.map(({ index, count }) => [index, count] as const),
          startingCursor,
          startingFilterInput: config.startingFilterInput ?? null,
          helpMessage: helpOrDefault(config.helpMessage, MULTI_COUNT_HELP_MESSAGE),
          scorer: config.scorer ?? defaultScorer(),
          validators: config.validators ?? [],
          formatter: config.formatter ?? countedOptionFormatter(display),
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
