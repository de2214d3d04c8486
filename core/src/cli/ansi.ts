/** ANSI color constants for the CLI's own messages (prompts style themselves). */

export const RED = "\x1b[31m";
export const GREEN = "\x1b[32m";
export const RESET = "\x1b[0m";
