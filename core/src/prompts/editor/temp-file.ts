import { randomBytes } from "node:crypto";
import { readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TerminalIOError } from "../../errors.js";

const RANDOM_BYTES = 5;

/** Creates `tmp-<random><extension>` in the OS temp directory. */
export function createTempFile(extension: string, content: string): string {
  const file = join(tmpdir(), `tmp-${randomBytes(RANDOM_BYTES).toString("hex")}${extension}`);
  try {
    writeFileSync(file, content, { encoding: "utf-8", flag: "wx" });
  } catch (err) {
    throw new TerminalIOError(`Failed to create temporary file ${file}`, err);
  }
  return file;
}

/** File content without one trailing line break. */
export function readSubmission(file: string): string {
  let content: string;
  try {
    content = readFileSync(file, "utf-8");
  } catch (err) {
    throw new TerminalIOError(`Failed to read temporary file ${file}`, err);
  }
  return content.replace(/\r?\n$/, "");
}

export function removeTempFile(file: string): void {
  rmSync(file, { force: true });
}
