import { afterEach, describe, expect, it } from "vitest";
import { defaultColoredRenderConfig, emptyRenderConfig } from "../ui/render-config.js";
import {
  _resetGlobalRenderConfigForTesting,
  colorDisabledByEnv,
  getGlobalRenderConfig,
  renderConfigFromEnv,
  setGlobalRenderConfig,
} from "./global.js";

afterEach(() => {
  _resetGlobalRenderConfigForTesting();
});

describe("colorDisabledByEnv", () => {
  it("is true for a non-empty NO_COLOR", () => {
    expect(colorDisabledByEnv({ NO_COLOR: "1" })).toBe(true);
  });

  it("is false when NO_COLOR is unset or empty", () => {
    expect(colorDisabledByEnv({})).toBe(false);
    expect(colorDisabledByEnv({ NO_COLOR: "" })).toBe(false);
  });
});

describe("renderConfigFromEnv", () => {
  it("picks the colourless preset under NO_COLOR", () => {
    expect(renderConfigFromEnv({ NO_COLOR: "true" })).toEqual(emptyRenderConfig());
  });

  it("picks the coloured preset otherwise", () => {
    expect(renderConfigFromEnv({})).toEqual(defaultColoredRenderConfig());
  });
});

describe("global render config", () => {
  it("initialises once and returns the same object", () => {
    expect(getGlobalRenderConfig()).toBe(getGlobalRenderConfig());
  });

  it("returns the config that was set", () => {
    const config = emptyRenderConfig();
    setGlobalRenderConfig(config);
    expect(getGlobalRenderConfig()).toBe(config);
  });
});
