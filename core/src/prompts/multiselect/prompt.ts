/**
 * Multi-select state machine. Checked options are tracked by original
 * index, so they stay checked while the filter hides them.
 */

import type { Formatter } from "../../formatter.js";
import { Input } from "../../input/input.js";
import { type ListOption, listOption } from "../../list-option.js";
import type { Scorer } from "../../scoring/scorer.js";
import { ScoredView } from "../../scoring/scored-view.js";
import type { Backend, OptionRow } from "../../ui/backend.js";
import type { Key } from "../../ui/key.js";
import { paginate } from "../../utils/paginate.js";
import { type InvalidResult, runValidators, type Validator } from "../../validator.js";
import { applyListMotion } from "../list-action.js";
import {
  type ActionResult,
  fromInputResult,
  type PromptCore,
  redrawIf,
  type Submission,
} from "../prompt.js";
import { type MultiSelectAction, multiSelectActionFromKey } from "./action.js";

export interface MultiSelectConfig {
  pageSize: number;
  vimMode: boolean;
  resetCursor: boolean;
  filterInputEnabled: boolean;
  /** When false, every change to the selection clears the filter. */
  keepFilter: boolean;
}

export interface MultiSelectPromptInit<T> {
  message: string;
  options: readonly T[];
  stringValues: readonly string[];
  checked: Iterable<number>;
  startingCursor: number;
  startingFilterInput: string | null;
  helpMessage: string | null;
  scorer: Scorer<T>;
  validators: readonly Validator<ListOption<T>[]>[];
  formatter: Formatter<readonly ListOption<T>[]>;
  config: MultiSelectConfig;
}

export class MultiSelectPrompt<T> implements PromptCore<MultiSelectAction, ListOption<T>[]> {
  readonly message: string;
  private readonly options: readonly T[];
  private readonly stringValues: readonly string[];
  private readonly helpMessage: string | null;
  private readonly validators: readonly Validator<ListOption<T>[]>[];
  private readonly formatter: Formatter<readonly ListOption<T>[]>;
  private readonly config: MultiSelectConfig;
  private readonly input: Input;
  private readonly view: ScoredView<T>;
  private readonly checked: Set<number>;
  private error: InvalidResult | null = null;

  constructor(init: MultiSelectPromptInit<T>) {
    this.message = init.message;
    this.options = init.options;
    this.stringValues = init.stringValues;
    this.helpMessage = init.helpMessage;
    this.validators = init.validators;
    this.formatter = init.formatter;
    this.config = init.config;
    this.checked = new Set(init.checked);
    this.input = new Input(init.startingFilterInput ?? "");
    this.view = new ScoredView(
      init.options,
      init.stringValues,
      init.scorer,
      init.config.resetCursor,
      init.startingCursor,
    );
  }

  /** Original indices of the checked options, ascending. */
  get selection(): number[] {
    return [...this.checked].sort((a, b) => a - b);
  }

  mapKey(key: Key): MultiSelectAction | null {
    return multiSelectActionFromKey(key, this.config.vimMode);
  }

  setup(): void {
    this.view.rescore(this.input.value);
  }

  handle(action: MultiSelectAction): ActionResult {
    switch (action.kind) {
      case "toggleCurrent": {
        const index = this.view.current();
        if (index === null) return "clean";
        if (this.checked.has(index)) {
          this.checked.delete(index);
        } else {
          this.checked.add(index);
        }
        this.afterSelectionChange();
        return "needsRedraw";
      }
      case "selectAll":
        for (const index of this.view.view) this.checked.add(index);
        this.afterSelectionChange();
        return "needsRedraw";
      case "clearSelections":
        this.checked.clear();
        this.afterSelectionChange();
        return "needsRedraw";
      case "filterInput": {
        if (!this.config.filterInputEnabled) return "clean";
        const result = this.input.handle(action.action);
        if (result === "contentChanged") {
          this.view.rescore(this.input.value);
        }
        return fromInputResult(result);
      }
      default: {
        const next = applyListMotion(
          action,
          this.view.cursor,
          this.view.length,
          this.config.pageSize,
        );
        return redrawIf(this.view.moveTo(next));
      }
    }
  }

  async submit(): Promise<Submission<ListOption<T>[]>> {
    const answer = this.selection.map((index) => listOption(index, this.options[index]));

    const validation = await runValidators(this.validators, answer);
    if (validation.kind === "invalid") {
      this.error = validation;
      return null;
    }
    return { answer };
  }

  formatAnswer(answer: ListOption<T>[]): string {
    return this.formatter(answer);
  }

  render(backend: Backend): void {
    if (this.error) {
      backend.renderErrorMessage(this.error.message);
    }

    backend.renderPromptWithFilter(this.message, this.config.filterInputEnabled ? this.input : null);

    const rows: OptionRow[] = this.view.view.map((index) => ({
      index,
      label: this.stringValues[index],
    }));
    backend.renderMultiOptions(
      paginate(this.config.pageSize, rows, this.view.cursor),
      this.checked,
      this.stringValues.length,
    );

    if (this.helpMessage) {
      backend.renderHelpMessage(this.helpMessage);
    }
  }

  private afterSelectionChange(): void {
    if (this.config.keepFilter || this.input.isEmpty()) return;
    this.input.clear();
    this.view.rescore(this.input.value);
  }
}
