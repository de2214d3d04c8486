import { defaultBoolFormatter, type Formatter } from "../../formatter.js";
import { boolParser, type Parser } from "../../parser.js";
import type { PromptIO } from "../../terminal/terminal.js";
import { type CommonPromptOptions, PromptBase } from "../base.js";
import { CustomTypePrompt } from "../customtype/prompt.js";
import { runPrompt } from "../prompt.js";

export const DEFAULT_CONFIRM_ERROR_MESSAGE = "Invalid answer, try typing 'y' for yes or 'n' for no";

/** Y/n for a true default, y/N for false. */
export const defaultConfirmHintFormatter: Formatter<boolean> = (value) => (value ? "Y/n" : "y/N");

export interface ConfirmOptions extends CommonPromptOptions {
  /** Submitted when the input is left empty. */
  default?: boolean;
  placeholder?: string | null;
  initialValue?: string;
  errorMessage?: string;
  parser?: Parser<boolean>;
  formatter?: Formatter<boolean>;
  defaultValueFormatter?: Formatter<boolean>;
}

/** Yes/no question answered with y, yes, n or no. */
export class Confirm extends PromptBase<boolean> {
  constructor(
    message: string,
    private readonly config: ConfirmOptions = {},
  ) {
    super(message, config);
  }

  protected createRunner(): (io: PromptIO) => Promise<boolean> {
    const { config } = this;
    const defaultValueFormatter = config.defaultValueFormatter ?? defaultConfirmHintFormatter;

    return (io) =>
      runPrompt(
        new CustomTypePrompt({
          message: this.message,
          initialValue: config.initialValue ?? "",
          placeholder: config.placeholder ?? null,
          default:
            config.default === undefined
              ? null
              : { value: config.default, text: defaultValueFormatter(config.default) },
          parser: config.parser ?? boolParser,
          errorMessage: config.errorMessage ?? DEFAULT_CONFIRM_ERROR_MESSAGE,
          helpMessage: config.helpMessage ?? null,
          validators: [],
          formatter: config.formatter ?? defaultBoolFormatter,
        }),
        io,
        this.renderConfig,
      );
  }
}
