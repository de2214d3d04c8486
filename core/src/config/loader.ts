/**
 * Config loader — reads config.yaml, validates, and exports the defaults
 * applied to prompts built by the CLI.
 *
 * Resolution order (highest priority wins):
 *   1. Environment variables (KEYPROMPT_PAGE_SIZE, KEYPROMPT_VIM_MODE, KEYPROMPT_EDITOR, NO_COLOR)
 *   2. config/config.yaml (optional)
 *   3. Built-in defaults
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { InvalidConfigurationError } from "../errors.js";
import { DEFAULT_PAGE_SIZE, DEFAULT_VIM_MODE } from "../prompts/base.js";
import { type Weekday, WEEKDAYS } from "../utils/date-utils.js";
import { colorDisabledByEnv } from "./global.js";

// --- Types ---

export interface PromptDefaults {
  pageSize: number;
  vimMode: boolean;
  color: boolean;
  /** Editor command for the editor prompt; null falls back to EDITOR/VISUAL. */
  editor: string | null;
  weekStart: Weekday;
}

// --- Defaults ---

const DEFAULTS: PromptDefaults = {
  pageSize: DEFAULT_PAGE_SIZE,
  vimMode: DEFAULT_VIM_MODE,
  color: true,
  editor: null,
  weekStart: "sun",
};

const CONFIG_HINT =
  "See config/config.example.yaml for a complete template.\n" +
  "Quick start: cp config/config.example.yaml config/config.yaml";

// --- Field parsing ---

function invalid(field: string, expected: string): InvalidConfigurationError {
  return new InvalidConfigurationError(
    `'${field}' in config/config.yaml must be ${expected}.\n${CONFIG_HINT}`,
  );
}

function readPageSize(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw invalid("pageSize", "a positive integer");
  }
  return value;
}

function readBoolean(field: string, value: unknown): boolean {
  if (typeof value !== "boolean") throw invalid(field, "true or false");
  return value;
}

function readEditor(value: unknown): string | null {
  if (value === null) return null;
  if (typeof value !== "string" || value.trim() === "") throw invalid("editor", "a command");
  return value;
}

function isWeekday(value: unknown): value is Weekday {
  return typeof value === "string" && WEEKDAYS.some((day) => day === value);
}

function readWeekStart(value: unknown): Weekday {
  if (!isWeekday(value)) throw invalid("weekStart", `one of ${WEEKDAYS.join(", ")}`);
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Validates a parsed YAML document and merges it over the built-in defaults. */
export function parseConfigDocument(doc: unknown): PromptDefaults {
  if (doc === null || doc === undefined) return { ...DEFAULTS };
  if (!isRecord(doc)) {
    throw new InvalidConfigurationError(
      `config/config.yaml must contain a mapping of settings.\n${CONFIG_HINT}`,
    );
  }

  return {
    pageSize: "pageSize" in doc ? readPageSize(doc.pageSize) : DEFAULTS.pageSize,
    vimMode: "vimMode" in doc ? readBoolean("vimMode", doc.vimMode) : DEFAULTS.vimMode,
    color: "color" in doc ? readBoolean("color", doc.color) : DEFAULTS.color,
    editor: "editor" in doc ? readEditor(doc.editor) : DEFAULTS.editor,
    weekStart: "weekStart" in doc ? readWeekStart(doc.weekStart) : DEFAULTS.weekStart,
  };
}

function applyEnvOverrides(config: PromptDefaults, env: NodeJS.ProcessEnv): PromptDefaults {
  const result = { ...config };

  if (env.KEYPROMPT_PAGE_SIZE) {
    const pageSize = Number(env.KEYPROMPT_PAGE_SIZE);
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new InvalidConfigurationError(
        `KEYPROMPT_PAGE_SIZE must be a positive integer, got "${env.KEYPROMPT_PAGE_SIZE}"`,
      );
    }
    result.pageSize = pageSize;
  }

  const vim = env.KEYPROMPT_VIM_MODE?.toLowerCase();
  if (vim === "1" || vim === "true") result.vimMode = true;
  if (vim === "0" || vim === "false") result.vimMode = false;

  if (env.KEYPROMPT_EDITOR) {
    result.editor = env.KEYPROMPT_EDITOR;
  }

  if (colorDisabledByEnv(env)) {
    result.color = false;
  }

  return result;
}

// --- Loader ---

let _cached: PromptDefaults | null = null;

/** Reset the config cache. Only for testing. */
export function _resetConfigCacheForTesting(): void {
  _cached = null;
}

/**
 * Find the project root by walking up from this file.
 * This file lives at core/src/config/loader.ts, so project root is 3 levels up.
 */
function getProjectRoot(): string {
  const thisDir = dirname(fileURLToPath(import.meta.url));
  return resolve(thisDir, "..", "..", "..");
}

/**
 * Load and return the prompt defaults. Cached after first call.
 */
export function loadConfig(): PromptDefaults {
  if (_cached) return _cached;

  const configPath = resolve(getProjectRoot(), "config", "config.yaml");

  let fileConfig: PromptDefaults = { ...DEFAULTS };
  if (existsSync(configPath)) {
    const raw = readFileSync(configPath, "utf-8");
    fileConfig = parseConfigDocument(parseYaml(raw));
  }

  _cached = applyEnvOverrides(fileConfig, process.env);
  return _cached;
}
