import { existsSync, statSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { InvalidConfigurationError } from "../../errors.js";
import type { Formatter } from "../../formatter.js";
import { openTerminalSession } from "../../terminal/session.js";
import type { PromptIO } from "../../terminal/terminal.js";
import type { Validator } from "../../validator.js";
import {
  checkPageSize,
  DEFAULT_PAGE_SIZE,
  DEFAULT_VIM_MODE,
  helpOrDefault,
  type ListPromptOptions,
  PromptBase,
} from "../base.js";
import { runPrompt } from "../prompt.js";
import {
  acceptAll,
  type PathEntry,
  pathEntry,
  type PathFilter,
  type PathSelectionMode,
  type PathSortMode,
} from "./path-entry.js";
import { PathSelectPrompt } from "./prompt.js";

export const PATH_SELECT_HELP_MESSAGE =
  "↑↓ to move, space to select one, → to open, ← to go up, " +
  "shift+→ to all, shift+← to none, type to filter";

export const defaultPathFormatter: Formatter<readonly PathEntry[]> = (entries) =>
  entries.map((entry) => entry.path).join(", ");

export interface PathSelectOptions extends ListPromptOptions {
  /** Directory listed first, or a file whose directory is. Defaults to the working directory. */
  startPath?: string;
  /** Paths checked when the prompt opens; each must exist. */
  defaults?: readonly string[];
  selectionMode?: PathSelectionMode;
  /** Narrows which files (and, in directory modes, directories) can be checked. */
  filter?: PathFilter;
  /** Entries whose name starts with a dot. */
  showHidden?: boolean;
  showSymlinks?: boolean;
  sortBy?: PathSortMode;
  /** When false, checking an entry unchecks the others. */
  selectMultiple?: boolean;
  keepFilter?: boolean;
  validators?: readonly Validator<PathEntry[]>[];
  formatter?: Formatter<readonly PathEntry[]>;
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/** Browse the file system and check files or directories. */
export class PathSelect extends PromptBase<string[]> {
  constructor(
    message: string,
    private readonly config: PathSelectOptions = {},
  ) {
    super(message, config);
  }

  /** Like `prompt`, but returns the checked entries with their kind and link. */
  async rawPrompt(io?: PromptIO): Promise<PathEntry[]> {
    const run = this.createRawRunner();
    return run(io ?? openTerminalSession());
  }

  protected createRunner(): (io: PromptIO) => Promise<string[]> {
    const run = this.createRawRunner();
    return async (io) => (await run(io)).map((entry) => entry.path);
  }

  private createRawRunner(): (io: PromptIO) => Promise<PathEntry[]> {
    const { config } = this;
    const pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    checkPageSize(pageSize);

    const start = resolve(config.startPath ?? process.cwd());
    const startDir = isDirectory(start) ? start : dirname(start);

    const selected = (config.defaults ?? []).map((path) => {
      if (!existsSync(path)) {
        throw new InvalidConfigurationError(`Specified default path ${path} does not exist`);
      }
      return pathEntry(resolve(path));
    });

    return (io) =>
      runPrompt(
        new PathSelectPrompt({
          message: this.message,
          startDir,
          selected,
          helpMessage: helpOrDefault(config.helpMessage, PATH_SELECT_HELP_MESSAGE),
          validators: config.validators ?? [],
          formatter: config.formatter ?? defaultPathFormatter,
          config: {
            pageSize,
            vimMode: config.vimMode ?? DEFAULT_VIM_MODE,
            selectMultiple: config.selectMultiple ?? true,
            keepFilter: config.keepFilter ?? true,
            listing: {
              selectionMode: config.selectionMode ?? "file",
              filter: config.filter ?? acceptAll,
              showHidden: config.showHidden ?? false,
              showSymlinks: config.showSymlinks ?? false,
              sortBy: config.sortBy ?? "path",
            },
          },
        }),
        io,
        this.renderConfig,
      );
  }
}
