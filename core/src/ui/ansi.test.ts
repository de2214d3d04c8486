import { describe, expect, it } from "vitest";
import { ansiPieces } from "./ansi.js";

describe("ansiPieces", () => {
  it("separates CSI sequences from graphemes", () => {
    expect(ansiPieces("a\x1b[31mb\x1b[0m")).toEqual([
      { kind: "grapheme", text: "a" },
      { kind: "escape", text: "\x1b[31m" },
      { kind: "grapheme", text: "b" },
      { kind: "escape", text: "\x1b[0m" },
    ]);
  });

  it("treats a non-bracket escape as two bytes", () => {
    expect(ansiPieces("\x1b7x")).toEqual([
      { kind: "escape", text: "\x1b7" },
      { kind: "grapheme", text: "x" },
    ]);
  });

  it("keeps an unterminated sequence as plain text", () => {
    expect(ansiPieces("\x1b[12").map((piece) => piece.kind)).toEqual([
      "grapheme",
      "grapheme",
      "grapheme",
      "grapheme",
    ]);
  });

  it("returns nothing for empty text", () => {
    expect(ansiPieces("")).toEqual([]);
  });
});
