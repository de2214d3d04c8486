import { describe, expect, it } from "vitest";
import { OperationCanceledError, TerminalIOError } from "../../errors.js";
import { scriptedIO } from "../../testing/scripted-key-reader.js";
import { KeyModifiers, keys, typed } from "../../ui/key.js";
import { emptyRenderConfig } from "../../ui/render-config.js";
import { minLength } from "../../validator.js";
import { Password, type PasswordOptions } from "./password.js";

const renderConfig = emptyRenderConfig();
const ctrlR = () => keys.char("r", KeyModifiers.CONTROL);

function password(config: PasswordOptions = {}) {
  return new Password("Password:", { renderConfig, ...config });
}

describe("Password", () => {
  it("accepts a matching confirmation", async () => {
    const io = scriptedIO([...typed("ab"), keys.submit(), ...typed("ab"), keys.submit()]);

    await expect(password().prompt(io)).resolves.toBe("ab");
    expect(io.terminal.screen()).toEqual(["? Password: ********"]);
  });

  it("returns to the first entry when the confirmation differs", async () => {
    const io = scriptedIO([...typed("ab"), keys.submit(), ...typed("ac"), keys.submit()]);

    await expect(password().prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual(["# The answers don't match.", "? Password:"]);
  });

  it("keeps the first entry after a mismatch", async () => {
    const io = scriptedIO([
      ...typed("ab"),
      keys.submit(),
      ...typed("ac"),
      keys.submit(),
      keys.submit(),
      ...typed("ab"),
      keys.submit(),
    ]);
    await expect(password().prompt(io)).resolves.toBe("ab");
  });

  it("uses the configured confirmation texts", async () => {
    const io = scriptedIO([...typed("ab"), keys.submit(), ...typed("x"), keys.submit()]);
    const prompt = password({
      confirmationMessage: "Again:",
      confirmationErrorMessage: "Nope",
    });

    await expect(prompt.prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual(["# Nope", "? Password:"]);
  });

  it("shows both entry lines during confirmation", async () => {
    const io = scriptedIO([...typed("ab"), keys.submit()]);

    await expect(password().prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual(["? Password:", "? Confirmation:"]);
  });

  it("submits directly without confirmation", async () => {
    const io = scriptedIO([...typed("secret"), keys.submit()]);
    await expect(password({ enableConfirmation: false }).prompt(io)).resolves.toBe("secret");
  });

  it("runs the validators before asking for confirmation", async () => {
    const io = scriptedIO([...typed("ab"), keys.submit()]);
    const prompt = password({ validators: [minLength(3)] });

    await expect(prompt.prompt(io)).rejects.toThrow(TerminalIOError);
    expect(io.terminal.screen()).toEqual([
      "# The length of the response should be at least 3",
      "? Password:",
    ]);
  });

  it("formats the answer with the custom formatter", async () => {
    const io = scriptedIO([...typed("ab"), keys.submit()]);
    const prompt = password({
      enableConfirmation: false,
      formatter: (value) => `${value.length} chars`,
    });

    await expect(prompt.prompt(io)).resolves.toBe("ab");
    expect(io.terminal.screen()).toEqual(["? Password: 2 chars"]);
  });

  describe("display modes", () => {
    it("masks each grapheme", async () => {
      const io = scriptedIO([...typed("héllo")]);
      const prompt = password({ displayMode: "masked", enableConfirmation: false });

      await expect(prompt.prompt(io)).rejects.toThrow(TerminalIOError);
      expect(io.terminal.screen()).toEqual(["? Password: *****"]);
    });

    it("shows the text in full mode", async () => {
      const io = scriptedIO([...typed("ab"), keys.submit(), ...typed("a")]);

      await expect(password({ displayMode: "full" }).prompt(io)).rejects.toThrow(TerminalIOError);
      expect(io.terminal.screen()).toEqual(["? Password: ab", "? Confirmation: a"]);
    });

    it("toggles between the configured mode and full text with Ctrl+R", async () => {
      const io = scriptedIO([...typed("ab"), ctrlR()]);
      const prompt = password({
        displayMode: "masked",
        enableDisplayToggle: true,
        enableConfirmation: false,
      });

      await expect(prompt.prompt(io)).rejects.toThrow(TerminalIOError);
      expect(io.terminal.screen()).toEqual(["? Password: ab", "[Ctrl+R to reveal/hide]"]);
    });

    it("toggles back to the configured mode", async () => {
      const io = scriptedIO([...typed("ab"), ctrlR(), ctrlR()]);
      const prompt = password({
        displayMode: "masked",
        enableDisplayToggle: true,
        enableConfirmation: false,
      });

      await expect(prompt.prompt(io)).rejects.toThrow(TerminalIOError);
      expect(io.terminal.screen()).toEqual(["? Password: **", "[Ctrl+R to reveal/hide]"]);
    });

    it("treats Ctrl+R as input when the toggle is disabled", async () => {
      const io = scriptedIO([...typed("ab"), ctrlR(), keys.submit()]);
      const prompt = password({ displayMode: "full", enableConfirmation: false });

      await expect(prompt.prompt(io)).resolves.toBe("abr");
    });

    it("hides the toggle help when help is disabled", async () => {
      const io = scriptedIO([]);
      const prompt = password({ enableDisplayToggle: true, helpMessage: null });

      await expect(prompt.prompt(io)).rejects.toThrow(TerminalIOError);
      expect(io.terminal.screen()).toEqual(["? Password:"]);
    });
  });

  describe("cancel", () => {
    it("cancels from the first entry", async () => {
      const io = scriptedIO([...typed("ab"), keys.escape()]);

      await expect(password().prompt(io)).rejects.toBeInstanceOf(OperationCanceledError);
      expect(io.terminal.screen()).toEqual(["? Password: <canceled>"]);
    });

    it("goes back to the first entry from the confirmation", async () => {
      const io = scriptedIO([
        ...typed("ab"),
        keys.submit(),
        ...typed("x"),
        keys.escape(),
        ...typed("cd"),
        keys.submit(),
        ...typed("cd"),
        keys.submit(),
      ]);

      await expect(password().prompt(io)).resolves.toBe("cd");
    });

    it("keeps the first entry in visible modes", async () => {
      const io = scriptedIO([...typed("ab"), keys.submit(), keys.escape()]);

      await expect(password({ displayMode: "full" }).prompt(io)).rejects.toThrow(TerminalIOError);
      expect(io.terminal.screen()).toEqual(["? Password: ab"]);
    });

    it("resolves to null when skipped", async () => {
      const io = scriptedIO([keys.escape()]);
      await expect(password().promptSkippable(io)).resolves.toBeNull();
    });
  });
});
