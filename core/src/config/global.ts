/**
 * Process-wide default render config.
 *
 * Initialised on first read from the environment (NO_COLOR set to a
 * non-empty value selects the colourless preset), optionally replaced by
 * `setGlobalRenderConfig`, and consulted whenever a prompt is built without
 * an explicit render config.
 */

import {
  defaultColoredRenderConfig,
  emptyRenderConfig,
  type RenderConfig,
} from "../ui/render-config.js";

let _global: RenderConfig | null = null;

/** True when the environment asks for output without colour sequences. */
export function colorDisabledByEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.NO_COLOR;
  return value !== undefined && value !== "";
}

export function renderConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RenderConfig {
  return colorDisabledByEnv(env) ? emptyRenderConfig() : defaultColoredRenderConfig();
}

export function getGlobalRenderConfig(): RenderConfig {
  if (!_global) {
    _global = renderConfigFromEnv();
  }
  return _global;
}

export function setGlobalRenderConfig(config: RenderConfig): void {
  _global = config;
}

/** Forget the global config so the next read consults the environment again. Only for testing. */
export function _resetGlobalRenderConfigForTesting(): void {
  _global = null;
}
