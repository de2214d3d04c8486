import { describe, expect, it } from "vitest";
import {
  InvalidConfigurationError,
  OperationCanceledError,
  OperationInterruptedError,
} from "../errors.js";
import { exitCodeFor, formatError, shouldReport } from "./errors.js";

describe("formatError", () => {
  it("colours the first line red and the rest green", () => {
    expect(formatError(new Error("Bad config\nSee the template"))).toBe(
      "\x1b[31mBad config\x1b[0m\n\x1b[32mSee the template\x1b[0m",
    );
  });

  it("formats non-Error values", () => {
    expect(formatError("boom")).toBe("\x1b[31mboom\x1b[0m");
  });
});

describe("exitCodeFor", () => {
  it("uses 130 for an interrupt", () => {
    expect(exitCodeFor(new OperationInterruptedError())).toBe(130);
  });

  it("uses 1 for everything else", () => {
    expect(exitCodeFor(new OperationCanceledError())).toBe(1);
    expect(exitCodeFor(new InvalidConfigurationError("x"))).toBe(1);
  });
});

describe("shouldReport", () => {
  it("skips errors already shown on the prompt line", () => {
    expect(shouldReport(new OperationCanceledError())).toBe(false);
    expect(shouldReport(new OperationInterruptedError())).toBe(false);
  });

  it("reports other failures", () => {
    expect(shouldReport(new InvalidConfigurationError("x"))).toBe(true);
  });
});
