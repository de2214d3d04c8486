/**
 * Hands the terminal to an external editor and waits for it to exit.
 */

import { spawn } from "node:child_process";
import { basename, extname } from "node:path";
import { TerminalIOError } from "../../errors.js";

/** EDITOR, then VISUAL, then the platform's stock editor. */
export function defaultEditorCommand(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  if (env.EDITOR) return env.EDITOR;
  if (env.VISUAL) return env.VISUAL;
  return platform === "win32" ? "notepad" : "nano";
}

/** File stem of the command, e.g. "vim" for "/usr/bin/vim". */
export function editorName(command: string): string {
  return basename(command, extname(command)) || "editor";
}

/** The exit status is ignored: the file content is the answer. */
export function launchEditor(command: string, args: readonly string[], file: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, [...args, file], { stdio: "inherit" });

    proc.once("error", (err) => {
      reject(new TerminalIOError(`Failed to open editor ${command}: ${err.message}`, err));
    });
    proc.once("close", () => resolve());
  });
}
