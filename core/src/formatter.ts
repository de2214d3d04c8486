/**
 * Formatters turn a submitted answer into the text shown on the answered line.
 */

import type { CountedListOption, ListOption } from "./list-option.js";
import { type CalendarDate, monthName } from "./utils/date-utils.js";

export type Formatter<T> = (value: T) => string;

export const defaultStringFormatter: Formatter<string> = (value) => value;

export const defaultBoolFormatter: Formatter<boolean> = (value) => (value ? "Yes" : "No");

/** e.g. "July 25, 2021". */
export const defaultDateFormatter: Formatter<CalendarDate> = (date) =>
  `${monthName(date.month)} ${date.day}, ${date.year}`;

export const defaultPasswordFormatter: Formatter<string> = () => "********";

export function optionFormatter<T>(toString: (value: T) => string): Formatter<ListOption<T>> {
  return (option) => toString(option.value);
}

export function multiOptionFormatter<T>(
  toString: (value: T) => string,
): Formatter<readonly ListOption<T>[]> {
  return (options) => options.map((option) => toString(option.value)).join(", ");
}

/** e.g. "apple (2), cherry (10)". */
export function countedOptionFormatter<T>(
  toString: (value: T) => string,
): Formatter<readonly CountedListOption<T>[]> {
  return (counted) =>
    counted.map(({ count, option }) => `${toString(option.value)} (${count})`).join(", ");
}
