import { describe, expect, it } from "vitest";
import { SimpleHistory } from "./history.js";

describe("SimpleHistory", () => {
  it("walks from the newest entry to the oldest and stays there", () => {
    const history = new SimpleHistory(["newest", "older"]);
    expect(history.earlierElement()).toBe("newest");
    expect(history.earlierElement()).toBe("older");
    expect(history.earlierElement()).toBe("older");
  });

  it("returns null after stepping later than the newest entry", () => {
    const history = new SimpleHistory(["newest", "older"]);
    history.earlierElement();
    history.earlierElement();
    expect(history.laterElement()).toBe("newest");
    expect(history.laterElement()).toBeNull();
    expect(history.laterElement()).toBeNull();
    expect(history.earlierElement()).toBe("newest");
  });

  it("has nothing to offer when empty", () => {
    const history = new SimpleHistory();
    expect(history.earlierElement()).toBeNull();
    expect(history.laterElement()).toBeNull();
  });

  it("prepends answers and restarts browsing from them", () => {
    const history = new SimpleHistory(["old"]);
    history.earlierElement();
    history.prependElement("new");
    history.prependElement("");
    expect(history.earlierElement()).toBe("new");
    expect(history.earlierElement()).toBe("old");
  });
});
