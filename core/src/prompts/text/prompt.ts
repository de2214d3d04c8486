/**
 * Text prompt state machine: an input buffer plus the autocompleter's
 * suggestions. A null suggestion cursor means the typed text itself is
 * highlighted. With no suggestions listed, Up and Down browse the history.
 */

import { type Autocomplete, completionFor, suggestionsFor } from "../../autocompletion.js";
import type { Formatter } from "../../formatter.js";
import type { History } from "../../history.js";
import { Input } from "../../input/input.js";
import type { Backend } from "../../ui/backend.js";
import type { Key } from "../../ui/key.js";
import { paginate } from "../../utils/paginate.js";
import { type InvalidResult, runValidators, type Validator } from "../../validator.js";
import { type ActionResult, fromInputResult, type PromptCore, type Submission } from "../prompt.js";
import { type TextAction, textActionFromKey } from "./action.js";

export interface TextPromptInit {
  message: string;
  initialValue: string;
  placeholder: string | null;
  defaultValue: string | null;
  helpMessage: string | null;
  pageSize: number;
  autocompleter: Autocomplete | null;
  history: History | null;
  validators: readonly Validator<string>[];
  formatter: Formatter<string>;
}

export class TextPrompt implements PromptCore<TextAction, string> {
  readonly message: string;
  private readonly placeholder: string | null;
  private readonly defaultValue: string | null;
  private readonly helpMessage: string | null;
  private readonly pageSize: number;
  private readonly autocompleter: Autocomplete | null;
  private readonly history: History | null;
  private readonly validators: readonly Validator<string>[];
  private readonly formatter: Formatter<string>;
  private input: Input;
  private suggestions: string[] = [];
  private suggestionCursor: number | null = null;
  // text typed before browsing the history, restored when browsing ends
  private draft: string | null = null;
  private error: InvalidResult | null = null;

  constructor(init: TextPromptInit) {
    this.message = init.message;
    this.placeholder = init.placeholder;
    this.defaultValue = init.defaultValue;
    this.helpMessage = init.helpMessage;
    this.pageSize = init.pageSize;
    this.autocompleter = init.autocompleter;
    this.history = init.history;
    this.validators = init.validators;
    this.formatter = init.formatter;
    this.input = new Input(init.initialValue).withPlaceholder(init.placeholder);
  }

  mapKey(key: Key): TextAction | null {
    return textActionFromKey(key);
  }

  async setup(): Promise<void> {
    await this.updateSuggestions();
  }

  async handle(action: TextAction): Promise<ActionResult> {
    switch (action.kind) {
      case "valueInput": {
        const result = this.input.handle(action.action);
        if (result === "contentChanged") {
          await this.updateSuggestions();
        }
        return fromInputResult(result);
      }
      case "suggestionUp":
        if (this.browsingHistory()) return this.showEarlierEntry();
        return this.moveCursorUp(1);
      case "suggestionDown":
        if (this.browsingHistory()) return this.showLaterEntry();
        return this.moveCursorDown(1);
      case "suggestionPageUp":
        return this.moveCursorUp(this.pageSize);
      case "suggestionPageDown":
        return this.moveCursorDown(this.pageSize);
      case "useCurrentSuggestion":
        return this.useCurrentSuggestion();
    }
  }

  async submit(): Promise<Submission<string>> {
    const answer = this.currentAnswer();
    const validation = await runValidators(this.validators, answer);
    if (validation.kind === "invalid") {
      this.error = validation;
      return null;
    }
    this.history?.prependElement(answer);
    return { answer };
  }

  formatAnswer(answer: string): string {
    return this.formatter(answer);
  }

  render(backend: Backend): void {
    if (this.error) {
      backend.renderErrorMessage(this.error.message);
    }

    backend.renderPromptWithInput(this.message, this.defaultValue, this.input);
    backend.renderSuggestions(paginate(this.pageSize, this.suggestions, this.suggestionCursor));

    if (this.helpMessage) {
      backend.renderHelpMessage(this.helpMessage);
    }
  }

  // --- Internals ---

  private highlightedSuggestion(): string | null {
    if (this.suggestionCursor === null) return null;
    return this.suggestions[this.suggestionCursor] ?? null;
  }

  /** Highlighted suggestion, else the default for an empty input, else the input. */
  private currentAnswer(): string {
    const highlighted = this.highlightedSuggestion();
    if (highlighted !== null) return highlighted;
    if (this.input.isEmpty() && this.defaultValue !== null) return this.defaultValue;
    return this.input.value;
  }

  private browsingHistory(): boolean {
    return this.history !== null && this.suggestions.length === 0;
  }

  private showEarlierEntry(): ActionResult {
    const entry = this.history?.earlierElement() ?? null;
    if (entry === null) return "clean";
    if (this.draft === null) this.draft = this.input.value;
    return this.replaceInput(entry);
  }

  private showLaterEntry(): ActionResult {
    const entry = this.history?.laterElement() ?? null;
    if (entry !== null) return this.replaceInput(entry);
    if (this.draft === null) return "clean";

    const draft = this.draft;
    this.draft = null;
    return this.replaceInput(draft);
  }

  private replaceInput(value: string): ActionResult {
    if (value === this.input.value) return "clean";
    this.input = new Input(value).withPlaceholder(this.placeholder);
    return "needsRedraw";
  }

  private async updateSuggestions(): Promise<void> {
    if (!this.autocompleter) return;
    this.suggestions = await suggestionsFor(this.autocompleter, this.input.value);
    this.suggestionCursor = null;
  }

  private moveCursorUp(qty: number): ActionResult {
    const cursor = this.suggestionCursor;
    return this.setSuggestionCursor(cursor === null || cursor < qty ? null : cursor - qty);
  }

  private moveCursorDown(qty: number): ActionResult {
    const last = this.suggestions.length - 1;
    if (last < 0) return this.setSuggestionCursor(null);

    const cursor = this.suggestionCursor;
    return this.setSuggestionCursor(
      cursor === null ? Math.min(qty - 1, last) : Math.min(cursor + qty, last),
    );
  }

  private setSuggestionCursor(next: number | null): ActionResult {
    if (next === this.suggestionCursor) return "clean";
    this.suggestionCursor = next;
    return "needsRedraw";
  }

  private async useCurrentSuggestion(): Promise<ActionResult> {
    if (!this.autocompleter) return "clean";

    const replacement = await completionFor(
      this.autocompleter,
      this.input.value,
      this.highlightedSuggestion(),
    );
    if (replacement === null) return "clean";

    this.input = new Input(replacement).withPlaceholder(this.placeholder);
    await this.updateSuggestions();
    return "needsRedraw";
  }
}
