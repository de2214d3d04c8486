/**
 * Option scorers for filterable list prompts.
 *
 * A scorer returns null to drop an option from the filtered view, or a
 * score where higher ranks first.
 */

import { Fzf } from "fzf";

export type Scorer<T> = (
  filter: string,
  option: T,
  stringValue: string,
  index: number,
) => number | null;

/** Case-insensitive fuzzy match; every option scores 0 for an empty filter. */
export function fuzzyScorer<T>(filter: string, _option: T, stringValue: string): number | null {
  if (filter === "") return 0;

  const [match] = new Fzf([stringValue], { casing: "case-insensitive" }).find(filter);
  return match ? match.score : null;
}

/** Case-insensitive substring containment with a constant score. */
export function substringScorer<T>(filter: string, _option: T, stringValue: string): number | null {
  return stringValue.toLowerCase().includes(filter.toLowerCase()) ? 0 : null;
}

export function defaultScorer<T>(): Scorer<T> {
  return fuzzyScorer;
}
