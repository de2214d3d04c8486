/**
 * Multi-count state machine. Counts are keyed by original index and never
 * drop below zero; options with a zero count are left out of the answer.
 */

import type { Formatter } from "../../formatter.js";
import { Input } from "../../input/input.js";
import { type CountedListOption, type ListOption, listOption } from "../../list-option.js";
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
import { type MultiCountAction, multiCountActionFromKey } from "./action.js";

export interface MultiCountConfig {
  pageSize: number;
  vimMode: boolean;
  resetCursor: boolean;
  filterInputEnabled: boolean;
  /** When false, every count change clears the filter. */
  keepFilter: boolean;
}

export interface MultiCountPromptInit<T> {
  message: string;
  options: readonly T[];
  stringValues: readonly string[];
  counts: Iterable<readonly [number, number]>;
  startingCursor: number;
  startingFilterInput: string | null;
  helpMessage: string | null;
  scorer: Scorer<T>;
  /** Validators see the options with a positive count. */
  validators: readonly Validator<ListOption<T>[]>[];
  formatter: Formatter<readonly CountedListOption<T>[]>;
  config: MultiCountConfig;
}

export class MultiCountPrompt<T> implements PromptCore<MultiCountAction, CountedListOption<T>[]> {
  readonly message: string;
  private readonly options: readonly T[];
  private readonly stringValues: readonly string[];
  private readonly helpMessage: string | null;
  private readonly validators: readonly Validator<ListOption<T>[]>[];
  private readonly formatter: Formatter<readonly CountedListOption<T>[]>;
  private readonly config: MultiCountConfig;
  private readonly input: Input;
  private readonly view: ScoredView<T>;
  private readonly counts = new Map<number, number>();
  private error: InvalidResult | null = null;

  constructor(init: MultiCountPromptInit<T>) {
    this.message = init.message;
    this.options = init.options;
    this.stringValues = init.stringValues;
    this.helpMessage = init.helpMessage;
    this.validators = init.validators;
    this.formatter = init.formatter;
    this.config = init.config;
    for (const [index, count] of init.counts) {
      if (count > 0) this.counts.set(index, count);
    }
    this.input = new Input(init.startingFilterInput ?? "");
    this.view = new ScoredView(
      init.options,
      init.stringValues,
      init.scorer,
      init.config.resetCursor,
      init.startingCursor,
    );
  }

  mapKey(key: Key): MultiCountAction | null {
    return multiCountActionFromKey(key, this.config.vimMode);
  }

  setup(): void {
    this.view.rescore(this.input.value);
  }

  handle(action: MultiCountAction): ActionResult {
    switch (action.kind) {
      case "changeCount": {
        const index = this.view.current();
        if (index === null) return "clean";
        const changed = this.changeCount(index, action.diff);
        if (changed) this.afterCountChange();
        return redrawIf(changed);
      }
      case "clearCounts":
        this.counts.clear();
        this.afterCountChange();
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

  async submit(): Promise<Submission<CountedListOption<T>[]>> {
    const answer = this.countedOptions();

    const validation = await runValidators(
      this.validators,
      answer.map((counted) => counted.option),
    );
    if (validation.kind === "invalid") {
      this.error = validation;
      return null;
    }
    return { answer };
  }

  formatAnswer(answer: CountedListOption<T>[]): string {
    return this.formatter(answer);
  }

  render(backend: Backend): void {
    if (this.error) {
      backend.renderErrorMessage(this.error.message);
    }

    const filter = this.config.filterInputEnabled ? this.input : null;
    backend.renderPromptWithFilter(this.message, filter);

    const rows: OptionRow[] = this.view.view.map((index) => ({
      index,
      label: this.stringValues[index],
    }));
    backend.renderCountedOptions(
      paginate(this.config.pageSize, rows, this.view.cursor),
      this.counts,
      this.stringValues.length,
    );

    if (this.helpMessage) {
      backend.renderHelpMessage(this.helpMessage);
    }
  }

  // --- Internals ---

  /** Positive counts in original option order. */
  private countedOptions(): CountedListOption<T>[] {
    return [...this.counts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, count]) => ({ count, option: listOption(index, this.options[index]) }));
  }

  /** Returns true when the count changed. */
  private changeCount(index: number, diff: number): boolean {
    const current = this.counts.get(index) ?? 0;
    const next = Math.max(0, current + diff);
    if (next === current) return false;

    if (next === 0) {
      this.counts.delete(index);
    } else {
      this.counts.set(index, next);
    }
    return true;
  }

  private afterCountChange(): void {
    if (this.config.keepFilter || this.input.isEmpty()) return;
    this.input.clear();
    this.view.rescore(this.input.value);
  }
}
