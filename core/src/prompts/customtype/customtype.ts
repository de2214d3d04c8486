import type { Formatter } from "../../formatter.js";
import type { Parser } from "../../parser.js";
import type { PromptIO } from "../../terminal/terminal.js";
import type { Validator } from "../../validator.js";
import { type CommonPromptOptions, PromptBase } from "../base.js";
import { runPrompt } from "../prompt.js";
import { CustomTypePrompt } from "./prompt.js";

export const DEFAULT_CUSTOM_TYPE_ERROR_MESSAGE = "Invalid input";

export interface CustomTypeOptions<T> extends CommonPromptOptions {
  parser: Parser<T>;
  /** Submitted when the input is left empty. */
  default?: T;
  initialValue?: string;
  placeholder?: string | null;
  /** Shown when the parser rejects the input. */
  errorMessage?: string;
  validators?: readonly Validator<T>[];
  /** Defaults to String(value). */
  formatter?: Formatter<T>;
  /** How the default is shown after the message; defaults to the formatter. */
  defaultValueFormatter?: Formatter<T>;
}

/**
 * Free text parsed into any type.
 *
 * ```ts
 * const port = await new CustomType("Port?", { parser: integerParser, default: 8080 }).prompt();
 * ```
 */
export class CustomType<T> extends PromptBase<T> {
  constructor(
    message: string,
    private readonly config: CustomTypeOptions<T>,
  ) {
    super(message, config);
  }

  protected createRunner(): (io: PromptIO) => Promise<T> {
    const { config } = this;
    const formatter = config.formatter ?? String;
    const defaultValueFormatter = config.defaultValueFormatter ?? formatter;

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
          parser: config.parser,
          errorMessage: config.errorMessage ?? DEFAULT_CUSTOM_TYPE_ERROR_MESSAGE,
          helpMessage: config.helpMessage ?? null,
          validators: config.validators ?? [],
          formatter,
        }),
        io,
        this.renderConfig,
      );
  }
}
