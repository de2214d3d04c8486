/**
 * Single-select state machine: a filter input over a scored view of the
 * options, and one cursor into that view.
 */

import type { Formatter } from "../../formatter.js";
import { Input } from "../../input/input.js";
import { type ListOption, listOption } from "../../list-option.js";
import type { Scorer } from "../../scoring/scorer.js";
import { ScoredView } from "../../scoring/scored-view.js";
import type { Backend, OptionRow } from "../../ui/backend.js";
import type { Key } from "../../ui/key.js";
import { paginate } from "../../utils/paginate.js";
import { applyListMotion } from "../list-action.js";
import {
  type ActionResult,
  fromInputResult,
  type PromptCore,
  redrawIf,
  type Submission,
} from "../prompt.js";
import { type SelectAction, selectActionFromKey } from "./action.js";

export interface SelectConfig {
  pageSize: number;
  vimMode: boolean;
  resetCursor: boolean;
  filterInputEnabled: boolean;
}

export interface SelectPromptInit<T> {
  message: string;
  options: readonly T[];
  stringValues: readonly string[];
  startingCursor: number;
  startingFilterInput: string | null;
  helpMessage: string | null;
  scorer: Scorer<T>;
  formatter: Formatter<ListOption<T>>;
  config: SelectConfig;
}

export class SelectPrompt<T> implements PromptCore<SelectAction, ListOption<T>> {
  readonly message: string;
  private readonly options: readonly T[];
  private readonly stringValues: readonly string[];
  private readonly helpMessage: string | null;
  private readonly formatter: Formatter<ListOption<T>>;
  private readonly config: SelectConfig;
  private readonly input: Input;
  private readonly view: ScoredView<T>;

  constructor(init: SelectPromptInit<T>) {
    this.message = init.message;
    this.options = init.options;
    this.stringValues = init.stringValues;
    this.helpMessage = init.helpMessage;
    this.formatter = init.formatter;
    this.config = init.config;
    this.input = new Input(init.startingFilterInput ?? "");
    this.view = new ScoredView(
      init.options,
      init.stringValues,
      init.scorer,
      init.config.resetCursor,
      init.startingCursor,
    );
  }

  mapKey(key: Key): SelectAction | null {
    return selectActionFromKey(key, this.config.vimMode);
  }

  setup(): void {
    this.view.rescore(this.input.value);
  }

  handle(action: SelectAction): ActionResult {
    if (action.kind === "filterInput") {
      if (!this.config.filterInputEnabled) return "clean";

      const result = this.input.handle(action.action);
      if (result === "contentChanged") {
        this.view.rescore(this.input.value);
      }
      return fromInputResult(result);
    }

    const next = applyListMotion(action, this.view.cursor, this.view.length, this.config.pageSize);
    return redrawIf(this.view.moveTo(next));
  }

  submit(): Submission<ListOption<T>> {
    const index = this.view.current();
    if (index === null) return null;
    return { answer: listOption(index, this.options[index]) };
  }

  formatAnswer(answer: ListOption<T>): string {
    return this.formatter(answer);
  }

  render(backend: Backend): void {
    backend.renderPromptWithFilter(this.message, this.config.filterInputEnabled ? this.input : null);

    const rows: OptionRow[] = this.view.view.map((index) => ({
      index,
      label: this.stringValues[index],
    }));
    backend.renderOptions(
      paginate(this.config.pageSize, rows, this.view.cursor),
      this.stringValues.length,
    );

    if (this.helpMessage) {
      backend.renderHelpMessage(this.helpMessage);
    }
  }
}
