/**
 * Autocompletion for the text prompt.
 *
 * Suggestions are refreshed after every content edit; Tab asks for a
 * completion, which may replace the whole input. Either call may be async.
 */

import { CustomUserError } from "./errors.js";

/** New input text, or null to leave the input as it is. */
export type Replacement = string | null;

export interface Autocomplete {
  getSuggestions(input: string): string[] | Promise<string[]>;
  getCompletion(
    input: string,
    highlightedSuggestion: string | null,
  ): Replacement | Promise<Replacement>;
}

/** Calls into the autocompleter, wrapping anything it throws. */
export async function suggestionsFor(autocomplete: Autocomplete, input: string): Promise<string[]> {
  try {
    return await autocomplete.getSuggestions(input);
  } catch (err) {
    throw new CustomUserError(err);
  }
}

export async function completionFor(
  autocomplete: Autocomplete,
  input: string,
  highlighted: string | null,
): Promise<Replacement> {
  try {
    return await autocomplete.getCompletion(input, highlighted);
  } catch (err) {
    throw new CustomUserError(err);
  }
}

// --- Word list ------------------------------------------------------------------

function commonPrefix(words: readonly string[]): string {
  if (words.length === 0) return "";
  let prefix = words[0];
  for (const word of words.slice(1)) {
    let i = 0;
    while (i < prefix.length && i < word.length && prefix[i] === word[i]) i++;
    prefix = prefix.slice(0, i);
  }
  return prefix;
}

/**
 * Suggests the words that start with the input (case-insensitive). Tab takes
 * the highlighted suggestion, or extends the input to the suggestions'
 * longest common prefix.
 */
export function wordListAutocomplete(words: readonly string[]): Autocomplete {
  const matching = (input: string) => {
    const lower = input.toLowerCase();
    return words.filter((word) => word.toLowerCase().startsWith(lower));
  };

  return {
    getSuggestions: (input) => (input === "" ? [] : matching(input)),
    getCompletion: (input, highlighted) => {
      if (highlighted !== null) return highlighted;

      const prefix = commonPrefix(matching(input));
      return prefix.length > input.length ? prefix : null;
    },
  };
}
