import { describe, expect, it } from "vitest";
import { cursorDown, cursorUp, ScoredView } from "./scored-view.js";
import { type Scorer, substringScorer } from "./scorer.js";

const FRUITS = ["apple", "banana", "cherry"];

function view(resetCursor = true, startingCursor = 0, scorer: Scorer<string> = substringScorer) {
  return new ScoredView(FRUITS, FRUITS, scorer, resetCursor, startingCursor);
}

describe("cursor motion", () => {
  it("moves up and wraps past the top", () => {
    expect(cursorUp(2, 3, 1, true)).toBe(1);
    expect(cursorUp(0, 3, 1, true)).toBe(2);
    expect(cursorUp(1, 10, 5, true)).toBe(6);
  });

  it("stops at the top without wrapping", () => {
    expect(cursorUp(1, 10, 5, false)).toBe(0);
  });

  it("moves down and wraps past the bottom", () => {
    expect(cursorDown(0, 3, 1, true)).toBe(1);
    expect(cursorDown(2, 3, 1, true)).toBe(0);
    expect(cursorDown(8, 10, 5, true)).toBe(3);
  });

  it("stops at the bottom without wrapping", () => {
    expect(cursorDown(8, 10, 5, false)).toBe(9);
  });

  it("stays at zero in an empty list", () => {
    expect(cursorDown(0, 0, 1, true)).toBe(0);
    expect(cursorUp(0, 0, 1, true)).toBe(0);
  });
});

describe("ScoredView", () => {
  it("starts with every option in order", () => {
    const v = view();
    expect(v.view).toEqual([0, 1, 2]);
    expect(v.current()).toBe(0);
  });

  it("filters with the scorer", () => {
    const v = view();
    expect(v.rescore("an")).toBe(true);
    expect(v.view).toEqual([1]);
    expect(v.current()).toBe(1);
  });

  it("reports no change for the same result", () => {
    const v = view();
    expect(v.rescore("")).toBe(false);
    v.rescore("an");
    expect(v.rescore("ana")).toBe(false);
  });

  it("resets the cursor when the view changes", () => {
    const v = view(true, 2);
    v.rescore("e");
    expect(v.view).toEqual([0, 2]);
    expect(v.cursor).toBe(0);
  });

  it("clamps the cursor when resetting is off", () => {
    const v = view(false, 2);
    v.rescore("e");
    expect(v.cursor).toBe(1);
    expect(v.current()).toBe(2);
  });

  it("keeps the cursor when the order is unchanged", () => {
    const v = view(true, 2);
    expect(v.rescore("")).toBe(false);
    expect(v.cursor).toBe(2);
  });

  it("orders by descending score with ties kept in place", () => {
    const byLength: Scorer<string> = (_filter, _option, value) => value.length;
    const v = view(true, 0, byLength);
    v.rescore("x");
    expect(v.view).toEqual([1, 2, 0]);
  });

  it("has no current option when nothing matches", () => {
    const v = view();
    v.rescore("zzz");
    expect(v.length).toBe(0);
    expect(v.cursor).toBe(0);
    expect(v.current()).toBeNull();
  });

  it("passes the option and its index to the scorer", () => {
    const seen: [string, number][] = [];
    const v = view(true, 0, (_filter, option, _value, index) => {
      seen.push([option, index]);
      return 0;
    });
    v.rescore("a");
    expect(seen).toEqual([
      ["apple", 0],
      ["banana", 1],
      ["cherry", 2],
    ]);
  });

  it("moves the cursor and reports whether it moved", () => {
    const v = view();
    expect(v.moveDown(1, false)).toBe(true);
    expect(v.moveDown(5, false)).toBe(true);
    expect(v.cursor).toBe(2);
    expect(v.moveDown(1, false)).toBe(false);
    expect(v.moveDown(1, true)).toBe(true);
    expect(v.cursor).toBe(0);
    expect(v.moveUp(1, true)).toBe(true);
    expect(v.cursor).toBe(2);
  });

  it("moves straight to a position", () => {
    const v = view();
    expect(v.moveTo(2)).toBe(true);
    expect(v.moveTo(2)).toBe(false);
    expect(v.current()).toBe(2);
  });
});
