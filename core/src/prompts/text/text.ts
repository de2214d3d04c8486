import type { Autocomplete } from "../../autocompletion.js";
import { defaultStringFormatter, type Formatter } from "../../formatter.js";
import type { History } from "../../history.js";
import type { PromptIO } from "../../terminal/terminal.js";
import type { Validator } from "../../validator.js";
import {
  checkPageSize,
  type CommonPromptOptions,
  DEFAULT_PAGE_SIZE,
  helpOrDefault,
  PromptBase,
} from "../base.js";
import { runPrompt } from "../prompt.js";
import { TextPrompt } from "./prompt.js";

export const TEXT_AUTOCOMPLETE_HELP_MESSAGE = "↑↓ to move, tab to autocomplete, enter to submit";

export interface TextOptions extends CommonPromptOptions {
  initialValue?: string;
  placeholder?: string;
  /** Answer used when the input is submitted empty; shown after the prompt. */
  default?: string;
  autocompleter?: Autocomplete;
  /** Earlier answers, browsed with Up and Down while no suggestion is listed. */
  history?: History;
  validators?: readonly Validator<string>[];
  formatter?: Formatter<string>;
  /** Rows of suggestions shown at once. */
  pageSize?: number;
}

/** Free text on a single line, with optional suggestions. */
export class Text extends PromptBase<string> {
  constructor(
    message: string,
    private readonly config: TextOptions = {},
  ) {
    super(message, config);
  }

  protected createRunner(): (io: PromptIO) => Promise<string> {
    const { config } = this;
    const pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    checkPageSize(pageSize);

    const autocompleter = config.autocompleter ?? null;
    const helpMessage = helpOrDefault(
      config.helpMessage,
      autocompleter ? TEXT_AUTOCOMPLETE_HELP_MESSAGE : null,
    );

    return (io) =>
      runPrompt(
        new TextPrompt({
          message: this.message,
          initialValue: config.initialValue ?? "",
          placeholder: config.placeholder ?? null,
          defaultValue: config.default ?? null,
          helpMessage,
          pageSize,
          autocompleter,
          history: config.history ?? null,
          validators: config.validators ?? [],
          formatter: config.formatter ?? defaultStringFormatter,
        }),
        io,
        this.renderConfig,
      );
  }
}
