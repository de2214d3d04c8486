import { describe, expect, it } from "vitest";
import { paginate } from "./paginate.js";

const TEN = Array.from({ length: 10 }, (_, i) => i);

describe("paginate", () => {
  it("returns the whole list when it fits", () => {
    expect(paginate(5, ["a", "b", "c"], 1)).toEqual({
      first: true,
      last: true,
      content: ["a", "b", "c"],
      cursor: 1,
      total: 3,
    });
  });

  it("anchors to the start while the cursor is in the first half page", () => {
    const page = paginate(4, TEN, 1);
    expect(page.content).toEqual([0, 1, 2, 3]);
    expect(page.cursor).toBe(1);
    expect(page.first).toBe(true);
    expect(page.last).toBe(false);
  });

  it("centres the cursor in the middle of the list", () => {
    const page = paginate(4, TEN, 5);
    expect(page.content).toEqual([3, 4, 5, 6]);
    expect(page.cursor).toBe(2);
    expect(page.first).toBe(false);
    expect(page.last).toBe(false);
  });

  it("anchors to the end while the cursor is in the last half page", () => {
    const page = paginate(4, TEN, 8);
    expect(page.content).toEqual([6, 7, 8, 9]);
    expect(page.cursor).toBe(2);
    expect(page.last).toBe(true);
  });

  it("shows the last item at the bottom when it is selected", () => {
    const page = paginate(3, TEN, 9);
    expect(page.content).toEqual([7, 8, 9]);
    expect(page.cursor).toBe(2);
  });

  it("keeps the first page without a cursor", () => {
    const page = paginate(3, TEN, null);
    expect(page.content).toEqual([0, 1, 2]);
    expect(page.cursor).toBeNull();
  });

  it("handles an empty list", () => {
    expect(paginate(3, [], null)).toEqual({
      first: true,
      last: true,
      content: [],
      cursor: null,
      total: 0,
    });
  });
});
