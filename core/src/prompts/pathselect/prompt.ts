/**
 * Path-select state machine: a filtered listing of the current directory
 * plus the set of checked paths. Checked paths survive navigation; those
 * outside the current directory are listed after its own entries.
 */

import { dirname } from "node:path";
import type { Formatter } from "../../formatter.js";
import { Input } from "../../input/input.js";
import { substringScorer } from "../../scoring/scorer.js";
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
import { type PathSelectAction, pathSelectActionFromKey } from "./action.js";
import {
  entryLabel,
  entryName,
  isSelectable,
  type ListingOptions,
  listDirectory,
  type PathEntry,
} from "./path-entry.js";

export interface PathSelectConfig {
  pageSize: number;
  vimMode: boolean;
  selectMultiple: boolean;
  /** When false, every change to the selection clears the filter. */
  keepFilter: boolean;
  listing: ListingOptions;
}

export interface PathSelectPromptInit {
  message: string;
  startDir: string;
  selected: readonly PathEntry[];
  helpMessage: string | null;
  validators: readonly Validator<PathEntry[]>[];
  formatter: Formatter<readonly PathEntry[]>;
  config: PathSelectConfig;
}

export class PathSelectPrompt implements PromptCore<PathSelectAction, PathEntry[]> {
  readonly message: string;
  private readonly helpMessage: string | null;
  private readonly validators: readonly Validator<PathEntry[]>[];
  private readonly formatter: Formatter<readonly PathEntry[]>;
  private readonly config: PathSelectConfig;
  private readonly selected = new Map<string, PathEntry>();
  private readonly input = new Input();
  private currentDir: string;
  private entries: PathEntry[] = [];
  private view: ScoredView<PathEntry>;
  private error: InvalidResult | null = null;
  private readError: string | null = null;

  /** Throws when the start directory cannot be read. */
  constructor(init: PathSelectPromptInit) {
    this.message = init.message;
    this.helpMessage = init.helpMessage;
    this.validators = init.validators;
    this.formatter = init.formatter;
    this.config = init.config;
    for (const entry of init.selected) {
      this.select(entry);
    }
    this.currentDir = init.startDir;
    const listing = listDirectory(init.startDir, init.config.listing);
    this.view = this.showDirectory(init.startDir, listing);
  }

  mapKey(key: Key): PathSelectAction | null {
    return pathSelectActionFromKey(key, this.config.vimMode);
  }

  handle(action: PathSelectAction): ActionResult {
    switch (action.kind) {
      case "toggleCurrent":
        return this.toggleCurrent();
      case "selectAll":
        return this.selectAll();
      case "clearSelections":
        this.selected.clear();
        this.afterSelectionChange();
        return "needsRedraw";
      case "enterDirectory": {
        const entry = this.currentEntry();
        if (entry === null || entry.kind !== "directory") return "clean";
        return this.navigateTo(entry.path);
      }
      case "leaveDirectory": {
        const parent = dirname(this.currentDir);
        if (parent === this.currentDir) return "clean";
        return this.navigateTo(parent);
      }
      case "filterInput": {
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

  async submit(): Promise<Submission<PathEntry[]>> {
    const answer = [...this.selected.values()].sort((a, b) =>
      a.path < b.path ? -1 : a.path > b.path ? 1 : 0,
    );

    const validation = await runValidators(this.validators, answer);
    if (validation.kind === "invalid") {
      this.error = validation;
      return null;
    }
    return { answer };
  }

  formatAnswer(answer: PathEntry[]): string {
    return this.formatter(answer);
  }

  render(backend: Backend): void {
    if (this.error) {
      backend.renderErrorMessage(this.error.message);
    } else if (this.readError !== null) {
      backend.renderErrorMessage(this.readError);
    }

    backend.renderPromptWithInput(this.message, this.currentDir, this.input);

    const rows: OptionRow[] = this.view.view.map((index) => ({
      index,
      label: entryLabel(this.entries[index]),
    }));
    const checked = new Set<number>();
    this.entries.forEach((entry, index) => {
      if (this.selected.has(entry.path)) checked.add(index);
    });
    backend.renderMultiOptions(
      paginate(this.config.pageSize, rows, this.view.cursor),
      checked,
      this.entries.length,
    );

    if (this.helpMessage) {
      backend.renderHelpMessage(this.helpMessage);
    }
  }

  // --- Selection ---

  private currentEntry(): PathEntry | null {
    const index = this.view.current();
    return index === null ? null : this.entries[index];
  }

  private selectable(entry: PathEntry): boolean {
    const { selectionMode, filter } = this.config.listing;
    return isSelectable(entry, selectionMode, filter);
  }

  private select(entry: PathEntry): void {
    if (!this.config.selectMultiple) this.selected.clear();
    this.selected.set(entry.path, entry);
  }

  private toggleCurrent(): ActionResult {
    const entry = this.currentEntry();
    if (entry === null || !this.selectable(entry)) return "clean";

    if (this.selected.has(entry.path)) {
      this.selected.delete(entry.path);
    } else {
      this.select(entry);
    }
    this.afterSelectionChange();
    return "needsRedraw";
  }

  /** Checks every listed selectable entry; single-selection mode checks the current one. */
  private selectAll(): ActionResult {
    const candidates = this.config.selectMultiple
      ? this.view.view.map((index) => this.entries[index])
      : [this.currentEntry()];
    for (const entry of candidates) {
      if (entry !== null && this.selectable(entry)) this.select(entry);
    }
    this.afterSelectionChange();
    return "needsRedraw";
  }

  private afterSelectionChange(): void {
    if (this.config.keepFilter || this.input.isEmpty()) return;
    this.input.clear();
    this.view.rescore(this.input.value);
  }

  // --- Navigation ---

  /** An unreadable directory is reported on the error line and the listing stays put. */
  private navigateTo(dir: string): ActionResult {
    let listing: PathEntry[];
    try {
      listing = listDirectory(dir, this.config.listing);
    } catch (err) {
      this.readError = `Cannot read ${dir}: ${err instanceof Error ? err.message : String(err)}`;
      return "needsRedraw";
    }

    this.input.clear();
    this.view = this.showDirectory(dir, listing);
    return "needsRedraw";
  }

  private showDirectory(dir: string, listing: PathEntry[]): ScoredView<PathEntry> {
    const listed = new Set(listing.map((entry) => entry.path));
    const elsewhere = [...this.selected.values()].filter((entry) => !listed.has(entry.path));

    this.currentDir = dir;
    this.readError = null;
    this.entries = [...listing, ...elsewhere];
    return new ScoredView(this.entries, this.entries.map(entryName), substringScorer, true);
  }
}
