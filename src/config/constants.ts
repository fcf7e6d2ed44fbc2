export const DEFAULT_VOCABULARY_FILE = "config/vocabulary.json";
export const DEFAULT_GRAMMAR_ROOT = "config";

export const EVENT_TEXT_LIMIT = 120;

export const COLOR_CODES = {
  reset: "\u001B[0m",
  session: "\u001B[36m", // cyan - lifecycle and state transitions
  bind: "\u001B[34m", // blue - semantic meanings and coercion
  dispatch: "\u001B[33m", // yellow - handler invocations
  handler: "\u001B[32m", // green - output from handlers
  warn: "\u001B[35m",
  error: "\u001B[31m",
} as const;

export type ColorCode = (typeof COLOR_CODES)[keyof typeof COLOR_CODES];

export const ENABLE_COLOR =
  process.stdout.isTTY &&
  (process.env["NO_COLOR"] ?? "").toLowerCase() !== "1";
