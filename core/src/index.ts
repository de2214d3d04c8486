export type { Autocomplete, Replacement } from "./autocompletion.js";
export { wordListAutocomplete } from "./autocompletion.js";
export {
  getGlobalRenderConfig,
  renderConfigFromEnv,
  setGlobalRenderConfig,
} from "./config/global.js";
export {
  CustomUserError,
  InvalidConfigurationError,
  NotTTYError,
  OperationCanceledError,
  OperationInterruptedError,
  TerminalIOError,
} from "./errors.js";
export type { Formatter } from "./formatter.js";
export {
  countedOptionFormatter,
  defaultBoolFormatter,
  defaultDateFormatter,
  defaultPasswordFormatter,
  defaultStringFormatter,
  multiOptionFormatter,
  optionFormatter,
} from "./formatter.js";
export { Input } from "./input/input.js";
export type { History } from "./history.js";
export { SimpleHistory } from "./history.js";
export type { CountedListOption, ListOption } from "./list-option.js";
export type { ParseResult, Parser } from "./parser.js";
export { boolParser, integerParser, numberParser } from "./parser.js";
export type { CommonPromptOptions, ListPromptOptions } from "./prompts/base.js";
export { PromptBase } from "./prompts/base.js";
export type { ConfirmOptions } from "./prompts/confirm/confirm.js";
export { Confirm } from "./prompts/confirm/confirm.js";
export type { CustomTypeOptions } from "./prompts/customtype/customtype.js";
export { CustomType } from "./prompts/customtype/customtype.js";
export type { DateSelectOptions } from "./prompts/dateselect/dateselect.js";
export { DateSelect } from "./prompts/dateselect/dateselect.js";
export type { EditorOptions } from "./prompts/editor/editor.js";
export { Editor } from "./prompts/editor/editor.js";
export { defaultEditorCommand } from "./prompts/editor/launcher.js";
export type { MultiCountOptions } from "./prompts/multicount/multicount.js";
export { MultiCount } from "./prompts/multicount/multicount.js";
export type { MultiSelectOptions } from "./prompts/multiselect/multiselect.js";
export { MultiSelect } from "./prompts/multiselect/multiselect.js";
export type { PasswordOptions } from "./prompts/password/password.js";
export { Password } from "./prompts/password/password.js";
export type { PasswordDisplayMode } from "./prompts/password/prompt.js";
export type { ActionResult, PromptCore, Submission } from "./prompts/prompt.js";
export { runPrompt } from "./prompts/prompt.js";
export type {
  PathEntry,
  PathFilter,
  PathKind,
  PathSelectionMode,
  PathSortMode,
} from "./prompts/pathselect/path-entry.js";
export {
  acceptAll,
  acceptExtensions,
  denyExtensions,
} from "./prompts/pathselect/path-entry.js";
export type { PathSelectOptions } from "./prompts/pathselect/pathselect.js";
export { defaultPathFormatter, PathSelect } from "./prompts/pathselect/pathselect.js";
export type { ReorderOptions } from "./prompts/reorder/reorder.js";
export { Reorder } from "./prompts/reorder/reorder.js";
export type { SelectOptions } from "./prompts/select/select.js";
export { Select } from "./prompts/select/select.js";
export type { TextOptions } from "./prompts/text/text.js";
export { Text } from "./prompts/text/text.js";
export type { Scorer } from "./scoring/scorer.js";
export { fuzzyScorer, substringScorer } from "./scoring/scorer.js";
export { AnsiTerminal } from "./terminal/ansi-terminal.js";
export { openTerminalSession } from "./terminal/session.js";
export type { InputReader, PromptIO, Terminal, TerminalSize } from "./terminal/terminal.js";
export type { Backend, CalendarView, OptionRow } from "./ui/backend.js";
export type { Key, KeyModifierSet } from "./ui/key.js";
export { KeyModifiers, keys } from "./ui/key.js";
export type { IndexPrefix, RenderConfig } from "./ui/render-config.js";
export { defaultColoredRenderConfig, emptyRenderConfig } from "./ui/render-config.js";
export type { Color, StyleSheet, Styled } from "./ui/style.js";
export { Attributes, styled, styleSheet } from "./ui/style.js";
export type { CalendarDate, Weekday } from "./utils/date-utils.js";
export { calendarDate, parseIsoDate, toIsoString, today } from "./utils/date-utils.js";
export type { InvalidResult, Validation, Validator } from "./validator.js";
export {
  exactLength,
  invalid,
  maxLength,
  minLength,
  required,
  valid,
} from "./validator.js";
