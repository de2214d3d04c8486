#!/usr/bin/env node

/**
 * keyprompt CLI — run one prompt from the shell and print the answer to stdout.
 *
 * Usage:
 *   keyprompt select "Fruit?" apple banana cherry
 *   keyprompt date "Deadline?" --min 2024-01-01
 *   keyprompt password "Password:" --mode masked --toggle
 *
 * The prompt itself draws on stderr, so answers can be piped or captured.
 */

import { setGlobalRenderConfig } from "../config/global.js";
import { loadConfig } from "../config/loader.js";
import { defaultColoredRenderConfig, emptyRenderConfig } from "../ui/render-config.js";
import { createProgram } from "./commands.js";
import { exitCodeFor, formatError, shouldReport } from "./errors.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  const config = loadConfig();
  setGlobalRenderConfig(config.color ? defaultColoredRenderConfig() : emptyRenderConfig());

  const program = createProgram(
    {
      config,
      openIO: () => undefined,
      print: (line) => console.log(line),
    },
    VERSION,
  );
  await program.parseAsync();
}

main().catch((err: unknown) => {
  if (shouldReport(err)) {
    console.error(`\n${formatError(err)}\n`);
  }
  process.exit(exitCodeFor(err));
});
