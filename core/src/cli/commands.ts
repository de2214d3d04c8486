/**
 * Demo subcommands: one per prompt type.
 *
 * Each command runs its prompt on the I/O returned by `openIO` and prints the
 * answer with `print`, one value per line for list answers. File and
 * environment configuration supply page size, vim mode, editor and week start.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { wordListAutocomplete } from "../autocompletion.js";
import type { PromptDefaults } from "../config/loader.js";
import { SimpleHistory } from "../history.js";
import { integerParser, numberParser } from "../parser.js";
import type { PromptBase } from "../prompts/base.js";
import { Confirm } from "../prompts/confirm/confirm.js";
import { CustomType } from "../prompts/customtype/customtype.js";
import { DateSelect } from "../prompts/dateselect/dateselect.js";
import { Editor } from "../prompts/editor/editor.js";
import { MultiCount } from "../prompts/multicount/multicount.js";
import { MultiSelect } from "../prompts/multiselect/multiselect.js";
import { Password } from "../prompts/password/password.js";
import type { PasswordDisplayMode } from "../prompts/password/prompt.js";
import { acceptAll, acceptExtensions } from "../prompts/pathselect/path-entry.js";
import { PathSelect } from "../prompts/pathselect/pathselect.js";
import { Reorder } from "../prompts/reorder/reorder.js";
import { Select } from "../prompts/select/select.js";
import { Text } from "../prompts/text/text.js";
import type { PromptIO } from "../terminal/terminal.js";
import { type CalendarDate, parseIsoDate, toIsoString } from "../utils/date-utils.js";
import { minLength, required, type Validator } from "../validator.js";

export interface CliContext {
  config: PromptDefaults;
  /** Called once per prompt; undefined runs on the process terminal. */
  openIO: () => PromptIO | undefined;
  print: (line: string) => void;
}

// --- Argument parsers ---

function parseDate(value: string): CalendarDate {
  const date = parseIsoDate(value);
  if (!date) throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
  return date;
}

function parseCount(value: string): number {
  const parsed = integerParser(value);
  if (!parsed.ok || parsed.value < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed.value;
}

function parseNumber(value: string): number {
  const parsed = numberParser(value);
  if (!parsed.ok) throw new InvalidArgumentError("Expected a number.");
  return parsed.value;
}

const PASSWORD_MODES: readonly PasswordDisplayMode[] = ["hidden", "masked", "full"];

// --- Commands ---

interface TextFlags {
  default?: string;
  placeholder?: string;
  suggest?: string[];
  history?: string[];
  required?: boolean;
}

interface ListFlags {
  start?: number;
  min?: number;
}

interface PathFlags {
  start?: string;
  dirs?: boolean;
  ext?: string[];
  hidden?: boolean;
}

interface PasswordFlags {
  mode: PasswordDisplayMode;
  confirm: boolean;
  toggle?: boolean;
}

interface DateFlags {
  start?: CalendarDate;
  min?: CalendarDate;
  max?: CalendarDate;
}

interface ConfirmFlags {
  defaultYes?: boolean;
  defaultNo?: boolean;
}

interface NumberFlags {
  default?: number;
  integer?: boolean;
}

interface EditorFlags {
  ext?: string;
  text?: string;
}

export function registerPromptCommands(program: Command, ctx: CliContext): void {
  const { config, print } = ctx;
  const ask = <T>(prompt: PromptBase<T>): Promise<T> => prompt.prompt(ctx.openIO());
  const list = { pageSize: config.pageSize, vimMode: config.vimMode };

  program
    .command("text")
    .description("Ask for a line of text")
    .argument("<message>", "Question to show")
    .option("--default <value>", "answer used when the input is left empty")
    .option("--placeholder <value>", "hint shown while the input is empty")
    .option("--suggest <words...>", "words offered as autocompletion")
    .option("--history <entries...>", "earlier answers, newest first, recalled with ↑↓")
    .option("--required", "reject an empty answer")
    .action(async (message: string, flags: TextFlags) => {
      const validators: Validator<string>[] = flags.required ? [required()] : [];
      const answer = await ask(
        new Text(message, {
          default: flags.default,
          placeholder: flags.placeholder,
          autocompleter: flags.suggest ? wordListAutocomplete(flags.suggest) : undefined,
          history: flags.history ? new SimpleHistory(flags.history) : undefined,
          pageSize: config.pageSize,
          validators,
        }),
      );
      print(answer);
    });

  program
    .command("select")
    .description("Pick one option")
    .argument("<message>", "Question to show")
    .argument("<options...>", "Options to choose from")
    .option("--start <index>", "index of the option highlighted first", parseCount)
    .action(async (message: string, options: string[], flags: ListFlags) => {
      print(await ask(new Select(message, options, { ...list, startingCursor: flags.start })));
    });

  program
    .command("multiselect")
    .description("Pick any number of options")
    .argument("<message>", "Question to show")
    .argument("<options...>", "Options to choose from")
    .option("--min <count>", "minimum number of options to pick", parseCount)
    .action(async (message: string, options: string[], flags: ListFlags) => {
      const validators = flags.min === undefined ? [] : [minLength(flags.min)];
      const answer = await ask(new MultiSelect(message, options, { ...list, validators }));
      for (const item of answer) print(item);
    });

  program
    .command("multicount")
    .description("Pick how many of each option")
    .argument("<message>", "Question to show")
    .argument("<options...>", "Options to count")
    .action(async (message: string, options: string[]) => {
      const answer = await ask(new MultiCount(message, options, list));
      for (const { count, option } of answer) print(`${count} ${option.value}`);
    });

  program
    .command("paths")
    .description("Pick files or directories")
    .argument("<message>", "Question to show")
    .option("--start <path>", "directory listed first")
    .option("--dirs", "pick directories instead of files")
    .option("--ext <extensions...>", "only offer files with these extensions")
    .option("--hidden", "list dot files")
    .action(async (message: string, flags: PathFlags) => {
      const answer = await ask(
        new PathSelect(message, {
          ...list,
          startPath: flags.start,
          selectionMode: flags.dirs ? "directory" : "file",
          filter: flags.ext ? acceptExtensions(...flags.ext) : acceptAll,
          showHidden: flags.hidden ?? false,
        }),
      );
      for (const path of answer) print(path);
    });

  program
    .command("reorder")
    .description("Put items in order")
    .argument("<message>", "Question to show")
    .argument("<items...>", "Items to order")
    .action(async (message: string, items: string[]) => {
      const answer = await ask(new Reorder(message, items, list));
      for (const item of answer) print(item);
    });

  program
    .command("password")
    .description("Ask for a secret")
    .argument("<message>", "Question to show")
    .addOption(
      new Option("--mode <mode>", "how the input is echoed")
        .choices(PASSWORD_MODES)
        .default("hidden"),
    )
    .option("--no-confirm", "skip the confirmation entry")
    .option("--toggle", "allow Ctrl+R to reveal the input")
    .action(async (message: string, flags: PasswordFlags) => {
      const answer = await ask(
        new Password(message, {
          displayMode: flags.mode,
          enableConfirmation: flags.confirm,
          enableDisplayToggle: flags.toggle ?? false,
        }),
      );
      print(answer);
    });

  program
    .command("date")
    .description("Pick a date from a calendar")
    .argument("<message>", "Question to show")
    .option("--start <date>", "date selected first (YYYY-MM-DD)", parseDate)
    .option("--min <date>", "earliest selectable date (YYYY-MM-DD)", parseDate)
    .option("--max <date>", "latest selectable date (YYYY-MM-DD)", parseDate)
    .action(async (message: string, flags: DateFlags) => {
      const answer = await ask(
        new DateSelect(message, {
          startingDate: flags.start,
          minDate: flags.min,
          maxDate: flags.max,
          weekStart: config.weekStart,
          vimMode: config.vimMode,
        }),
      );
      print(toIsoString(answer));
    });

  program
    .command("confirm")
    .description("Ask a yes/no question")
    .argument("<message>", "Question to show")
    .option("--default-yes", "answer yes when the input is left empty")
    .option("--default-no", "answer no when the input is left empty")
    .action(async (message: string, flags: ConfirmFlags) => {
      const defaultAnswer = flags.defaultYes ? true : flags.defaultNo ? false : undefined;
      const answer = await ask(new Confirm(message, { default: defaultAnswer }));
      print(answer ? "yes" : "no");
    });

  program
    .command("number")
    .description("Ask for a number")
    .argument("<message>", "Question to show")
    .option("--default <value>", "answer used when the input is left empty", parseNumber)
    .option("--integer", "accept whole numbers only")
    .action(async (message: string, flags: NumberFlags) => {
      const answer = await ask(
        new CustomType<number>(message, {
          parser: flags.integer ? integerParser : numberParser,
          default: flags.default,
          errorMessage: flags.integer ? "Please type a whole number" : "Please type a number",
        }),
      );
      print(String(answer));
    });

  program
    .command("editor")
    .description("Write a longer answer in an external editor")
    .argument("<message>", "Question to show")
    .option("--ext <extension>", "extension of the temporary file", ".txt")
    .option("--text <content>", "text the file starts with")
    .action(async (message: string, flags: EditorFlags) => {
      const answer = await ask(
        new Editor(message, {
          editorCommand: config.editor ?? undefined,
          fileExtension: flags.ext,
          predefinedText: flags.text,
        }),
      );
      print(answer);
    });
}

export function createProgram(ctx: CliContext, version: string): Command {
  const program = new Command();
  program
    .name("keyprompt")
    .description("Interactive terminal prompts from the command line")
    .version(version);
  registerPromptCommands(program, ctx);
  return program;
}
