import { describe, expect, it } from "vitest";
import { InvalidConfigurationError, TerminalIOError } from "../../errors.js";
import { substringScorer } from "../../scoring/scorer.js";
import { scriptedIO } from "../../testing/scripted-key-reader.js";
import { KeyModifiers, keys, typed } from "../../ui/key.js";
import { emptyRenderConfig } from "../../ui/render-config.js";
import { Reorder, type ReorderOptions } from "./reorder.js";

const renderConfig = emptyRenderConfig();
const ctrl = KeyModifiers.CONTROL;

function reorder(options: string[], config: ReorderOptions<string> = {}) {
  return new Reorder("Order?", options, { renderConfig, helpMessage: null, ...config });
}

describe("Reorder", () => {
  it("moves the first item to the bottom", async () => {
    const io = scriptedIO([keys.down(ctrl), keys.down(ctrl), keys.submit()]);
    await expect(reorder(["x", "y", "z"]).prompt(io)).resolves.toEqual(["y", "z", "x"]);
    expect(io.terminal.screen()).toEqual(["? Order? y, z, x"]);
  });

  it("draws the current order with the cursor following the moved item", async () => {
    const io = scriptedIO([keys.down(ctrl)]);
    await expect(reorder(["x", "y", "z"], { helpMessage: undefined }).prompt(io)).rejects.toThrow(
      TerminalIOError,
    );
    expect(io.terminal.screen()).toEqual([
      "? Order?",
      "  y",
      "> x",
      "  z",
      "[↑↓ to move cursor, Ctrl+↑↓ to move item, type to filter]",
    ]);
  });

  it("treats moving past either end as a no-op", async () => {
    const io = scriptedIO([keys.up(ctrl), keys.end(), keys.down(ctrl), keys.submit()]);
    await expect(reorder(["x", "y", "z"]).prompt(io)).resolves.toEqual(["x", "y", "z"]);
  });

  it("moves items with K and J in vim mode", async () => {
    const io = scriptedIO([...typed("jK"), ...typed("jjJ"), keys.submit()]);
    // jK: y to the top; jj then J on the last row does nothing
    await expect(reorder(["x", "y", "z"], { vimMode: true }).prompt(io)).resolves.toEqual([
      "y",
      "x",
      "z",
    ]);
  });

  it("wraps the cursor but not the items", async () => {
    const io = scriptedIO([keys.up(), keys.up(ctrl), keys.submit()]);
    await expect(reorder(["x", "y", "z"]).prompt(io)).resolves.toEqual(["x", "z", "y"]);
  });

  it("swaps with the visible neighbour while filtering", async () => {
    const io = scriptedIO([...typed("a"), keys.down(), keys.up(ctrl), keys.submit()]);
    // "a" hides "bb"; "ab" jumps over it and lands in "aa"'s position
    const prompt = reorder(["aa", "bb", "ab"], { scorer: substringScorer });
    await expect(prompt.prompt(io)).resolves.toEqual(["ab", "bb", "aa"]);
  });

  it("only shows the rows that match the filter", async () => {
    const io = scriptedIO([...typed("a")]);
    const prompt = reorder(["aa", "bb", "ab"], { scorer: substringScorer });
    await expect(prompt.prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual(["? Order? a", "> aa", "  ab"]);
  });

  it("returns original indices from rawPrompt", async () => {
    const io = scriptedIO([keys.down(ctrl), keys.submit()]);
    await expect(reorder(["x", "y"]).rawPrompt(io)).resolves.toEqual([
      { index: 1, value: "y" },
      { index: 0, value: "x" },
    ]);
  });

  it("rejects an empty list", async () => {
    await expect(reorder([]).prompt(scriptedIO([]))).rejects.toThrow(InvalidConfigurationError);
  });
});
