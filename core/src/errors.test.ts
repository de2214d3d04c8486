import { describe, expect, it } from "vitest";
import {
  CustomUserError,
  InvalidConfigurationError,
  NotTTYError,
  OperationCanceledError,
  OperationInterruptedError,
  TerminalIOError,
} from "./errors.js";

describe("InvalidConfigurationError", () => {
  it("is an instance of Error", () => {
    expect(new InvalidConfigurationError("x")).toBeInstanceOf(Error);
  });

  it("prefixes the detail", () => {
    const err = new InvalidConfigurationError("Available options can not be empty");
    expect(err.message).toBe(
      "The prompt configuration is invalid: Available options can not be empty",
    );
    expect(err.detail).toBe("Available options can not be empty");
    expect(err.name).toBe("InvalidConfigurationError");
  });
});

describe("OperationCanceledError", () => {
  it("uses default message when none provided", () => {
    const err = new OperationCanceledError();
    expect(err.message).toBe("Operation was canceled by the user");
    expect(err.name).toBe("OperationCanceledError");
  });
});

describe("OperationInterruptedError", () => {
  it("uses default message when none provided", () => {
    const err = new OperationInterruptedError();
    expect(err.message).toBe("Operation was interrupted by the user");
    expect(err.name).toBe("OperationInterruptedError");
  });

  it("is not a cancel", () => {
    expect(new OperationInterruptedError()).not.toBeInstanceOf(OperationCanceledError);
  });
});

describe("CustomUserError", () => {
  it("wraps an Error cause", () => {
    const cause = new Error("database offline");
    const err = new CustomUserError(cause);
    expect(err.message).toBe("User-provided error: database offline");
    expect(err.cause).toBe(cause);
  });

  it("stringifies non-Error causes", () => {
    expect(new CustomUserError("boom").message).toBe("User-provided error: boom");
  });
});

describe("TerminalIOError", () => {
  it("keeps the cause when given", () => {
    const cause = new Error("EPIPE");
    const err = new TerminalIOError("write failed", cause);
    expect(err.message).toBe("write failed");
    expect(err.cause).toBe(cause);
  });

  it("has no cause by default", () => {
    expect(new TerminalIOError("closed").cause).toBeUndefined();
  });
});

describe("NotTTYError", () => {
  it("has the default message", () => {
    expect(new NotTTYError().message).toBe("The input device is not a TTY");
  });
});
