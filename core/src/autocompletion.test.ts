import { describe, expect, it } from "vitest";
import {
  type Autocomplete,
  completionFor,
  suggestionsFor,
  wordListAutocomplete,
} from "./autocompletion.js";
import { CustomUserError } from "./errors.js";

const fruits = wordListAutocomplete(["apple", "apricot", "banana"]);

describe("wordListAutocomplete", () => {
  it("suggests nothing for empty input", () => {
    expect(fruits.getSuggestions("")).toEqual([]);
  });

  it("matches prefixes regardless of case", () => {
    expect(fruits.getSuggestions("AP")).toEqual(["apple", "apricot"]);
  });

  it("completes to the common prefix of the matches", () => {
    expect(fruits.getCompletion("a", null)).toBe("ap");
    expect(fruits.getCompletion("ap", null)).toBeNull();
  });

  it("prefers the highlighted suggestion", () => {
    expect(fruits.getCompletion("ap", "apricot")).toBe("apricot");
  });
});

describe("autocompleter calls", () => {
  const failing: Autocomplete = {
    getSuggestions: () => {
      throw new Error("lookup failed");
    },
    getCompletion: async () => {
      throw new Error("lookup failed");
    },
  };

  it("resolves sync and async answers alike", async () => {
    const asyncList: Autocomplete = {
      getSuggestions: async (input) => [input.toUpperCase()],
      getCompletion: () => "done",
    };
    expect(await suggestionsFor(asyncList, "x")).toEqual(["X"]);
    expect(await completionFor(asyncList, "x", null)).toBe("done");
  });

  it("wraps errors thrown by the autocompleter", async () => {
    await expect(suggestionsFor(failing, "a")).rejects.toThrow(CustomUserError);
    await expect(completionFor(failing, "a", null)).rejects.toThrow(CustomUserError);
  });
});
