/**
 * Single-line input parsed into a typed value on submit.
 *
 * Shared by CustomType and Confirm: a parse failure shows the configured
 * error message, a parsed value still has to pass the validators.
 */

import type { Formatter } from "../../formatter.js";
import { type InputAction, inputActionFromKey } from "../../input/action.js";
import { Input } from "../../input/input.js";
import type { Parser } from "../../parser.js";
import type { Backend } from "../../ui/backend.js";
import type { Key } from "../../ui/key.js";
import { type InvalidResult, invalid, runValidators, type Validator } from "../../validator.js";
import { type ActionResult, fromInputResult, type PromptCore, type Submission } from "../prompt.js";

export interface CustomTypePromptInit<T> {
  message: string;
  initialValue: string;
  placeholder: string | null;
  /** Submitted when the input is empty; `text` is shown after the message. */
  default: { value: T; text: string } | null;
  parser: Parser<T>;
  errorMessage: string;
  helpMessage: string | null;
  validators: readonly Validator<T>[];
  formatter: Formatter<T>;
}

export class CustomTypePrompt<T> implements PromptCore<InputAction, T> {
  readonly message: string;
  private readonly input: Input;
  private error: InvalidResult | null = null;

  constructor(private readonly init: CustomTypePromptInit<T>) {
    this.message = init.message;
    this.input = new Input(init.initialValue).withPlaceholder(init.placeholder);
  }

  mapKey(key: Key): InputAction | null {
    return inputActionFromKey(key);
  }

  handle(action: InputAction): ActionResult {
    return fromInputResult(this.input.handle(action));
  }

  async submit(): Promise<Submission<T>> {
    const parsed = this.parseAnswer();
    if (!parsed) {
      this.error = invalid(this.init.errorMessage);
      return null;
    }

    const validation = await runValidators(this.init.validators, parsed.value);
    if (validation.kind === "invalid") {
      this.error = validation;
      return null;
    }
    return { answer: parsed.value };
  }

  formatAnswer(answer: T): string {
    return this.init.formatter(answer);
  }

  render(backend: Backend): void {
    if (this.error) {
      backend.renderErrorMessage(this.error.message);
    }

    backend.renderPromptWithInput(this.message, this.init.default?.text ?? null, this.input);

    if (this.init.helpMessage) {
      backend.renderHelpMessage(this.init.helpMessage);
    }
  }

  private parseAnswer(): { value: T } | null {
    if (this.input.isEmpty() && this.init.default) {
      return { value: this.init.default.value };
    }
    const parsed = this.init.parser(this.input.value);
    return parsed.ok ? { value: parsed.value } : null;
  }
}
