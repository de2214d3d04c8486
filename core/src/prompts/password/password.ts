import { defaultPasswordFormatter, type Formatter } from "../../formatter.js";
import type { PromptIO } from "../../terminal/terminal.js";
import type { Validator } from "../../validator.js";
import { type CommonPromptOptions, helpOrDefault, PromptBase } from "../base.js";
import { runPrompt } from "../prompt.js";
import { type PasswordDisplayMode, PasswordPrompt } from "./prompt.js";

export const DEFAULT_CONFIRMATION_MESSAGE = "Confirmation:";
export const DEFAULT_CONFIRMATION_ERROR_MESSAGE = "The answers don't match.";
export const PASSWORD_TOGGLE_HELP_MESSAGE = "Ctrl+R to reveal/hide";

export interface PasswordOptions extends CommonPromptOptions {
  /** Defaults to "hidden": nothing is echoed. */
  displayMode?: PasswordDisplayMode;
  /** Ctrl+R switches between the display mode and full text. */
  enableDisplayToggle?: boolean;
  enableConfirmation?: boolean;
  confirmationMessage?: string;
  confirmationErrorMessage?: string;
  validators?: readonly Validator<string>[];
  formatter?: Formatter<string>;
}

/** Secret input, asked twice unless confirmation is disabled. */
export class Password extends PromptBase<string> {
  constructor(
    message: string,
    private readonly config: PasswordOptions = {},
  ) {
    super(message, config);
  }

  protected createRunner(): (io: PromptIO) => Promise<string> {
    const { config } = this;
    const enableDisplayToggle = config.enableDisplayToggle ?? false;
    const enableConfirmation = config.enableConfirmation ?? true;

    return (io) =>
      runPrompt(
        new PasswordPrompt({
          message: this.message,
          displayMode: config.displayMode ?? "hidden",
          enableDisplayToggle,
          confirmation: enableConfirmation
            ? {
                message: config.confirmationMessage ?? DEFAULT_CONFIRMATION_MESSAGE,
                errorMessage: config.confirmationErrorMessage ?? DEFAULT_CONFIRMATION_ERROR_MESSAGE,
              }
            : null,
          helpMessage: helpOrDefault(
            config.helpMessage,
            enableDisplayToggle ? PASSWORD_TOGGLE_HELP_MESSAGE : null,
          ),
          validators: config.validators ?? [],
          formatter: config.formatter ?? defaultPasswordFormatter,
        }),
        io,
        this.renderConfig,
      );
  }
}
