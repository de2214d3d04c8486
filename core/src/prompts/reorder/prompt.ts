/**
 * Reorder state machine.
 *
 * `order` maps display positions to original indices and is always a
 * permutation of the options. The filter only decides which positions are
 * visible; moving an item swaps it with its nearest visible neighbour, so
 * hidden rows keep their positions.
 */

import type { Formatter } from "../../formatter.js";
import { Input } from "../../input/input.js";
import { type ListOption, listOption } from "../../list-option.js";
import type { Scorer } from "../../scoring/scorer.js";
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
import { type ReorderAction, reorderActionFromKey } from "./action.js";

export interface ReorderConfig {
  pageSize: number;
  vimMode: boolean;
  resetCursor: boolean;
  filterInputEnabled: boolean;
}

export interface ReorderPromptInit<T> {
  message: string;
  options: readonly T[];
  stringValues: readonly string[];
  helpMessage: string | null;
  scorer: Scorer<T>;
  formatter: Formatter<readonly ListOption<T>[]>;
  config: ReorderConfig;
}

export class ReorderPrompt<T> implements PromptCore<ReorderAction, ListOption<T>[]> {
  readonly message: string;
  private readonly options: readonly T[];
  private readonly stringValues: readonly string[];
  private readonly helpMessage: string | null;
  private readonly scorer: Scorer<T>;
  private readonly formatter: Formatter<readonly ListOption<T>[]>;
  private readonly config: ReorderConfig;
  private readonly input = new Input();
  private readonly order: number[];
  /** Display positions that pass the filter, ascending. */
  private visible: number[];
  private cursor = 0;

  constructor(init: ReorderPromptInit<T>) {
    this.message = init.message;
    this.options = init.options;
    this.stringValues = init.stringValues;
    this.helpMessage = init.helpMessage;
    this.scorer = init.scorer;
    this.formatter = init.formatter;
    this.config = init.config;
    this.order = init.options.map((_, index) => index);
    this.visible = [...this.order];
  }

  mapKey(key: Key): ReorderAction | null {
    return reorderActionFromKey(key, this.config.vimMode);
  }

  handle(action: ReorderAction): ActionResult {
    switch (action.kind) {
      case "moveItemUp":
        return this.swapWithVisible(this.cursor - 1);
      case "moveItemDown":
        return this.swapWithVisible(this.cursor + 1);
      case "filterInput": {
        if (!this.config.filterInputEnabled) return "clean";
        const result = this.input.handle(action.action);
        if (result === "contentChanged") this.refilter();
        return fromInputResult(result);
      }
      default: {
        const next = applyListMotion(action, this.cursor, this.visible.length, this.config.pageSize);
        const changed = next !== this.cursor;
        this.cursor = next;
        return redrawIf(changed);
      }
    }
  }

  submit(): Submission<ListOption<T>[]> {
    return { answer: this.order.map((index) => listOption(index, this.options[index])) };
  }

  formatAnswer(answer: ListOption<T>[]): string {
    return this.formatter(answer);
  }

  render(backend: Backend): void {
    backend.renderPromptWithFilter(this.message, this.config.filterInputEnabled ? this.input : null);

    const rows: OptionRow[] = this.visible.map((position) => ({
      index: position,
      label: this.stringValues[this.order[position]],
    }));
    backend.renderOptions(
      paginate(this.config.pageSize, rows, this.cursor),
      this.stringValues.length,
    );

    if (this.helpMessage) {
      backend.renderHelpMessage(this.helpMessage);
    }
  }

  /** Swaps the item under the cursor with the visible row at `target`, following it. */
  private swapWithVisible(target: number): ActionResult {
    if (target < 0 || target >= this.visible.length) return "clean";

    const from = this.visible[this.cursor];
    const to = this.visible[target];
    [this.order[from], this.order[to]] = [this.order[to], this.order[from]];
    this.cursor = target;
    return "needsRedraw";
  }

  private refilter(): void {
    const filter = this.input.value;
    const next: number[] = [];
    this.order.forEach((index, position) => {
      if (this.scorer(filter, this.options[index], this.stringValues[index], index) !== null) {
        next.push(position);
      }
    });

    if (next.length === this.visible.length && next.every((p, i) => p === this.visible[i])) {
      return;
    }

    this.visible = next;
    this.cursor = this.config.resetCursor ? 0 : Math.max(0, Math.min(this.cursor, next.length - 1));
  }
}
