/**
 * Password prompt state machine.
 *
 * With confirmation enabled the prompt runs in two stages: the primary
 * entry, then a confirmation entry that must match it. Escape during the
 * confirmation goes back to the primary entry instead of cancelling.
 */

import type { Formatter } from "../../formatter.js";
import { Input } from "../../input/input.js";
import type { Backend } from "../../ui/backend.js";
import type { Key } from "../../ui/key.js";
import { type InvalidResult, invalid, runValidators, type Validator } from "../../validator.js";
import { type ActionResult, fromInputResult, type PromptCore, type Submission } from "../prompt.js";
import { type PasswordAction, passwordActionFromKey } from "./action.js";

export type PasswordDisplayMode = "hidden" | "masked" | "full";

export interface PasswordConfirmation {
  message: string;
  errorMessage: string;
}

export interface PasswordPromptInit {
  message: string;
  displayMode: PasswordDisplayMode;
  enableDisplayToggle: boolean;
  /** Null disables the confirmation stage. */
  confirmation: PasswordConfirmation | null;
  helpMessage: string | null;
  validators: readonly Validator<string>[];
  formatter: Formatter<string>;
}

export class PasswordPrompt implements PromptCore<PasswordAction, string> {
  readonly message: string;
  private readonly standardMode: PasswordDisplayMode;
  private readonly enableDisplayToggle: boolean;
  private readonly confirmation: PasswordConfirmation | null;
  private readonly helpMessage: string | null;
  private readonly validators: readonly Validator<string>[];
  private readonly formatter: Formatter<string>;
  private readonly input = new Input();
  private readonly confirmationInput = new Input();
  private currentMode: PasswordDisplayMode;
  private confirmationStage = false;
  private error: InvalidResult | null = null;

  constructor(init: PasswordPromptInit) {
    this.message = init.message;
    this.standardMode = init.displayMode;
    this.currentMode = init.displayMode;
    this.enableDisplayToggle = init.enableDisplayToggle;
    this.confirmation = init.confirmation;
    this.helpMessage = init.helpMessage;
    this.validators = init.validators;
    this.formatter = init.formatter;
  }

  mapKey(key: Key): PasswordAction | null {
    return passwordActionFromKey(key, this.enableDisplayToggle);
  }

  handle(action: PasswordAction): ActionResult {
    switch (action.kind) {
      case "valueInput":
        return fromInputResult(this.activeInput().handle(action.action));
      case "toggleDisplayMode":
        return this.toggleDisplayMode();
    }
  }

  preCancel(): boolean {
    if (!this.confirmationStage) return true;

    if (this.currentMode === "hidden") this.input.clear();
    this.confirmationInput.clear();
    this.error = null;
    this.confirmationStage = false;
    return false;
  }

  async submit(): Promise<Submission<string>> {
    if (!this.confirmation) {
      return (await this.validatePrimary()) ? { answer: this.input.value } : null;
    }

    if (!this.confirmationStage) {
      if (!(await this.validatePrimary())) return null;
      this.confirmationInput.clear();
      this.error = null;
      this.confirmationStage = true;
      return null;
    }

    if (this.input.value === this.confirmationInput.value) {
      return { answer: this.confirmationInput.value };
    }

    this.confirmationInput.clear();
    this.error = invalid(this.confirmation.errorMessage);
    this.confirmationStage = false;
    return null;
  }

  formatAnswer(answer: string): string {
    return this.formatter(answer);
  }

  render(backend: Backend): void {
    if (this.error) {
      backend.renderErrorMessage(this.error.message);
    }

    this.renderEntry(backend, this.message, this.input);
    if (this.confirmation && this.confirmationStage) {
      this.renderEntry(backend, this.confirmation.message, this.confirmationInput);
    }

    if (this.helpMessage) {
      backend.renderHelpMessage(this.helpMessage);
    }
  }

  private renderEntry(backend: Backend, message: string, input: Input): void {
    switch (this.currentMode) {
      case "hidden":
        backend.renderPrompt(message);
        break;
      case "masked":
        backend.renderPromptWithMaskedInput(message, input);
        break;
      case "full":
        backend.renderPromptWithInput(message, null, input);
        break;
    }
  }

  private activeInput(): Input {
    return this.confirmationStage ? this.confirmationInput : this.input;
  }

  private toggleDisplayMode(): ActionResult {
    const next = this.currentMode === "full" ? this.standardMode : "full";
    if (next === this.currentMode) return "clean";
    this.currentMode = next;
    return "needsRedraw";
  }

  private async validatePrimary(): Promise<boolean> {
    const validation = await runValidators(this.validators, this.input.value);
    if (validation.kind === "invalid") {
      this.error = validation;
      return false;
    }
    return true;
  }
}
