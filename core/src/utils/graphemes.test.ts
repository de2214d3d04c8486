import { describe, expect, it } from "vitest";
import { displayWidth, graphemeCount, graphemes, isWordGrapheme } from "./graphemes.js";

const FAMILY = "\u{1F468}\u200D\u{1F469}\u200D\u{1F467}";

describe("graphemes", () => {
  it("keeps combining marks with their base letter", () => {
    expect(graphemes("e\u0301a")).toEqual(["e\u0301", "a"]);
  });

  it("treats a joined emoji sequence as one grapheme", () => {
    expect(graphemes(`a${FAMILY}b`)).toEqual(["a", FAMILY, "b"]);
    expect(graphemeCount(FAMILY)).toBe(1);
  });

  it("counts nothing in an empty string", () => {
    expect(graphemeCount("")).toBe(0);
  });
});

describe("displayWidth", () => {
  it("counts wide characters as two columns", () => {
    expect(displayWidth("日本")).toBe(4);
  });

  it("ignores escape sequences", () => {
    expect(displayWidth("\x1b[31mab\x1b[0m")).toBe(2);
  });
});

describe("isWordGrapheme", () => {
  it.each([
    ["a", true],
    ["é", true],
    ["7", true],
    ["-", false],
    [" ", false],
  ])("%s -> %s", (grapheme, expected) => {
    expect(isWordGrapheme(grapheme)).toBe(expected);
  });
});
