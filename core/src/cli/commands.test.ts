import { mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CommanderError } from "commander";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { _resetGlobalRenderConfigForTesting, setGlobalRenderConfig } from "../config/global.js";
import type { PromptDefaults } from "../config/loader.js";
import { TerminalIOError } from "../errors.js";
import { scriptedIO } from "../testing/scripted-key-reader.js";
import { type Key, KeyModifiers, keys, typed } from "../ui/key.js";
import { emptyRenderConfig } from "../ui/render-config.js";
import { createProgram } from "./commands.js";

const DEFAULTS: PromptDefaults = {
  pageSize: 7,
  vimMode: false,
  color: false,
  editor: null,
  weekStart: "sun",
};

async function run(args: string[], script: Key[], config: PromptDefaults = DEFAULTS) {
  const io = scriptedIO(script);
  const printed: string[] = [];
  const program = createProgram(
    { config, openIO: () => io, print: (line) => printed.push(line) },
    "1.2.3",
  );
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  }

  await program.parseAsync(["node", "keyprompt", ...args]);
  return { printed, io };
}

beforeEach(() => {
  setGlobalRenderConfig(emptyRenderConfig());
});

afterEach(() => {
  _resetGlobalRenderConfigForTesting();
});

describe("select", () => {
  it("prints the chosen option", async () => {
    const { printed } = await run(
      ["select", "Fruit?", "apple", "banana", "cherry"],
      [keys.down(), keys.submit()],
    );
    expect(printed).toEqual(["banana"]);
  });

  it("starts at --start", async () => {
    const { printed } = await run(
      ["select", "Fruit?", "a", "b", "c", "--start", "2"],
      [keys.submit()],
    );
    expect(printed).toEqual(["c"]);
  });

  it("uses the configured page size", async () => {
    const io = scriptedIO([]);
    const program = createProgram(
      { config: { ...DEFAULTS, pageSize: 2 }, openIO: () => io, print: () => {} },
      "1.2.3",
    );

    const parsed = program.parseAsync(["node", "keyprompt", "select", "Pick", "a", "b", "c"]);

    await expect(parsed).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual([
      "? Pick",
      "> a",
      "v b",
      "[↑↓ to move, enter to select, type to filter]",
    ]);
  });

  it("uses the configured vim mode", async () => {
    const { printed } = await run(
      ["select", "Pick", "a", "b", "c"],
      [keys.char("j"), keys.submit()],
      { ...DEFAULTS, vimMode: true },
    );
    expect(printed).toEqual(["b"]);
  });
});

describe("multiselect", () => {
  it("prints each chosen option on its own line", async () => {
    const { printed } = await run(
      ["multiselect", "Fruits?", "apple", "banana", "cherry"],
      [keys.char(" "), keys.down(), keys.down(), keys.char(" "), keys.submit()],
    );
    expect(printed).toEqual(["apple", "cherry"]);
  });

  it("enforces --min", async () => {
    await expect(
      run(["multiselect", "Fruits?", "a", "b", "--min", "2"], [keys.char(" "), keys.submit()]),
    ).rejects.toThrow(TerminalIOError);
  });
});

describe("multicount", () => {
  it("prints each counted option after its count", async () => {
    const { printed } = await run(
      ["multicount", "Items?", "pen", "cup"],
      [keys.right(KeyModifiers.SHIFT), keys.down(), keys.right(), keys.submit()],
    );
    expect(printed).toEqual(["10 pen", "1 cup"]);
  });
});

describe("paths", () => {
  let dir = "";

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), "paths-command-")));
    writeFileSync(join(dir, "a.txt"), "");
    writeFileSync(join(dir, "b.md"), "");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints each checked path with --ext narrowing the files", async () => {
    const { printed } = await run(
      ["paths", "Files?", "--start", dir, "--ext", "md"],
      [keys.right(KeyModifiers.SHIFT), keys.submit()],
    );
    expect(printed).toEqual([join(dir, "b.md")]);
  });
});

describe("reorder", () => {
  it("prints the items in their new order", async () => {
    const { printed } = await run(
      ["reorder", "Order?", "a", "b", "c"],
      [keys.down(KeyModifiers.CONTROL), keys.submit()],
    );
    expect(printed).toEqual(["b", "a", "c"]);
  });
});

describe("text", () => {
  it("prints the default for an empty answer", async () => {
    const { printed } = await run(["text", "Name?", "--default", "anon"], [keys.submit()]);
    expect(printed).toEqual(["anon"]);
  });

  it("autocompletes from --suggest", async () => {
    const { printed } = await run(
      ["text", "Fruit?", "--suggest", "apple", "apricot", "banana"],
      [...typed("ban"), keys.tab(), keys.submit()],
    );
    expect(printed).toEqual(["banana"]);
  });

  it("recalls --history entries with Up", async () => {
    const { printed } = await run(
      ["text", "Name?", "--history", "bob", "alice"],
      [keys.up(), keys.up(), keys.submit()],
    );
    expect(printed).toEqual(["alice"]);
  });
});

describe("password", () => {
  it("prints the secret without confirmation", async () => {
    const { printed } = await run(
      ["password", "Password:", "--no-confirm"],
      [...typed("pw"), keys.submit()],
    );
    expect(printed).toEqual(["pw"]);
  });

  it("rejects an unknown display mode", async () => {
    await expect(run(["password", "Password:", "--mode", "loud"], [])).rejects.toBeInstanceOf(
      CommanderError,
    );
  });
});

describe("date", () => {
  it("prints the date as YYYY-MM-DD", async () => {
    const { printed } = await run(
      ["date", "When?", "--start", "2024-03-10"],
      [keys.right(), keys.submit()],
    );
    expect(printed).toEqual(["2024-03-11"]);
  });

  it("rejects a malformed date", async () => {
    await expect(run(["date", "When?", "--min", "2024-13-01"], [])).rejects.toThrow(
      "Expected a date as YYYY-MM-DD.",
    );
  });
});

describe("confirm", () => {
  it("prints yes for the default", async () => {
    const { printed } = await run(["confirm", "Sure?", "--default-yes"], [keys.submit()]);
    expect(printed).toEqual(["yes"]);
  });

  it("prints no", async () => {
    const { printed } = await run(["confirm", "Sure?"], [...typed("n"), keys.submit()]);
    expect(printed).toEqual(["no"]);
  });
});

describe("number", () => {
  it("accepts whole numbers only with --integer", async () => {
    const { printed, io } = await run(
      ["number", "Count?", "--integer"],
      [...typed("4.5"), keys.submit(), keys.backspace(), keys.backspace(), keys.submit()],
    );
    expect(printed).toEqual(["4"]);
    expect(io.reader.remaining).toBe(0);
  });

  it("prints the default", async () => {
    const { printed } = await run(["number", "Ratio?", "--default", "2.5"], [keys.submit()]);
    expect(printed).toEqual(["2.5"]);
  });
});

describe("editor", () => {
  it("prints the predefined text when submitted unchanged", async () => {
    const { printed } = await run(["editor", "Notes?", "--text", "hello"], [keys.submit()]);
    expect(printed).toEqual(["hello"]);
  });
});
