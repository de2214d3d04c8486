import { ChildProcess, spawn } from "node:child_process";
import { existsSync, writeFileSync } from "node:fs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { OperationCanceledError, TerminalIOError } from "../../errors.js";
import { type ScriptedIO, scriptedIO } from "../../testing/scripted-key-reader.js";
import { type Key, keys } from "../../ui/key.js";
import { emptyRenderConfig } from "../../ui/render-config.js";
import { required } from "../../validator.js";
import { Editor, type EditorOptions } from "./editor.js";

vi.mock("node:child_process", async (importOriginal) => ({
  ...(await importOriginal<typeof import("node:child_process")>()),
  spawn: vi.fn(),
}));

const mockedSpawn = vi.mocked(spawn);
const renderConfig = emptyRenderConfig();

/** Files the fake editor was opened on, in order. */
let opened: string[] = [];

function editorWrites(content: string): void {
  mockedSpawn.mockImplementation((_command, args) => {
    const file = args.at(-1) ?? "";
    opened.push(file);
    writeFileSync(file, content);
    const child = new ChildProcess();
    setImmediate(() => child.emit("close", 0));
    return child;
  });
}

function notes(config: EditorOptions = {}) {
  return new Editor("Notes:", { renderConfig, editorCommand: "/usr/bin/vim", ...config });
}

beforeEach(() => {
  opened = [];
  mockedSpawn.mockReset();
});

describe("Editor", () => {
  it("returns what was written in the editor", async () => {
    editorWrites("hello\n");
    const io = scriptedIO([keys.char("e"), keys.submit()]);

    await expect(notes({ editorArgs: ["-n"] }).prompt(io)).resolves.toBe("hello");
    expect(io.terminal.screen()).toEqual(["? Notes: <received>"]);
    expect(mockedSpawn).toHaveBeenCalledWith("/usr/bin/vim", ["-n", opened[0]], {
      stdio: "inherit",
    });
  });

  it("names the temporary file with the extension", async () => {
    editorWrites("# title");
    const io = scriptedIO([keys.char("e"), keys.submit()]);

    await notes({ fileExtension: ".md" }).prompt(io);
    expect(opened[0]).toMatch(/tmp-[0-9a-f]{10}\.md$/);
  });

  it("removes the temporary file afterwards", async () => {
    editorWrites("hello");
    const io = scriptedIO([keys.char("e"), keys.submit()]);

    await notes().prompt(io);
    expect(opened).toHaveLength(1);
    expect(existsSync(opened[0] ?? "")).toBe(false);
  });

  it("removes the temporary file on cancel", async () => {
    editorWrites("hello");
    const io = scriptedIO([keys.char("e"), keys.escape()]);

    await expect(notes().prompt(io)).rejects.toBeInstanceOf(OperationCanceledError);
    expect(existsSync(opened[0] ?? "")).toBe(false);
  });

  it("submits the predefined text minus one line break", async () => {
    const io = scriptedIO([keys.submit()]);

    await expect(notes({ predefinedText: "draft\n\n" }).prompt(io)).resolves.toBe("draft\n");
    expect(mockedSpawn).not.toHaveBeenCalled();
  });

  it("strips a trailing CRLF", async () => {
    editorWrites("line\r\n");
    const io = scriptedIO([keys.char("e"), keys.submit()]);

    await expect(notes().prompt(io)).resolves.toBe("line");
  });

  it("opens the file with the predefined text", async () => {
    mockedSpawn.mockImplementation(() => {
      const child = new ChildProcess();
      setImmediate(() => child.emit("close", 0));
      return child;
    });
    const io = scriptedIO([keys.char("e"), keys.submit()]);

    await expect(notes({ predefinedText: "keep me" }).prompt(io)).resolves.toBe("keep me");
  });

  it("shows the editor name from the command", async () => {
    const io = scriptedIO([]);

    await expect(notes({ helpMessage: "Write freely" }).prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual([
      "? Notes: [(e) to open vim, (enter) to submit]",
      "[Write freely]",
    ]);
  });

  it("keeps the prompt open while the validators fail", async () => {
    editorWrites("filled in");
    const io = scriptedIO([keys.submit(), keys.char("e"), keys.submit()]);

    await expect(notes({ validators: [required()] }).prompt(io)).resolves.toBe("filled in");
  });

  it("shows the validator message", async () => {
    const io = scriptedIO([keys.submit()]);

    await expect(notes({ validators: [required()] }).prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual([
      "# A response is required.",
      "? Notes: [(e) to open vim, (enter) to submit]",
    ]);
  });

  it("uses the formatter", async () => {
    const io = scriptedIO([keys.submit()]);
    const prompt = notes({ predefinedText: "abc", formatter: (text) => `${text.length} chars` });

    await prompt.prompt(io);
    expect(io.terminal.screen()).toEqual(["? Notes: 3 chars"]);
  });

  it("pauses the key reader while the editor runs", async () => {
    editorWrites("hello");
    const scripted: ScriptedIO = scriptedIO([keys.char("e"), keys.submit()]);
    const pause = vi.fn();
    const resume = vi.fn();
    const io = {
      ...scripted,
      reader: { readKey: (): Promise<Key> => scripted.reader.readKey(), pause, resume },
    };

    await new Editor("Notes:", { renderConfig, editorCommand: "vim" }).prompt(io);
    expect(pause).toHaveBeenCalledTimes(1);
    expect(resume).toHaveBeenCalledTimes(1);
  });

  it("fails when the editor can not be started", async () => {
    mockedSpawn.mockImplementation(() => {
      const child = new ChildProcess();
      setImmediate(() => child.emit("error", new Error("spawn vim ENOENT")));
      return child;
    });
    const io = scriptedIO([keys.char("e"), keys.submit()]);

    await expect(notes().prompt(io)).rejects.toThrow(
      "Failed to open editor /usr/bin/vim: spawn vim ENOENT",
    );
    expect(io.closed()).toBe(true);
  });

  it("ignores other keys", async () => {
    const io = scriptedIO([keys.char("x"), keys.char("E"), keys.submit()]);

    await expect(notes({ predefinedText: "ok" }).prompt(io)).resolves.toBe("ok");
    expect(mockedSpawn).not.toHaveBeenCalled();
  });
});
