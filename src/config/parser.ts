import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import type { ParseResult } from "../types.js";
import { DEFAULT_GRAMMAR_ROOT, DEFAULT_VOCABULARY_FILE } from "./constants.js";

function resolveFromCwd(filePath: string): string {
  return path.isAbsolute(filePath)
    ? filePath
    : path.resolve(process.cwd(), filePath);
}

export function parseConfig(argv: string[] = process.argv.slice(2)): ParseResult {
  const {
    values: { vocabulary, grammarRoot, debug, manual, describe },
  } = parseArgs({
    args: argv,
    options: {
      vocabulary: {
        type: "string",
        short: "v",
        default: process.env["VOCABULARY_FILE"] ?? DEFAULT_VOCABULARY_FILE,
      },
      grammarRoot: {
        type: "string",
        default: process.env["GRAMMAR_ROOT"] ?? DEFAULT_GRAMMAR_ROOT,
      },
      debug: {
        type: "boolean",
        default:
          process.env["DEBUG"] === "1" || process.env["DEBUG"] === "true",
      },
      manual: {
        type: "boolean",
        default: false,
      },
      describe: {
        type: "boolean",
        default: false,
      },
    },
    allowPositionals: false,
  });

  return {
    config: {
      vocabularyFile: resolveFromCwd(vocabulary ?? DEFAULT_VOCABULARY_FILE),
      grammarRoot: resolveFromCwd(grammarRoot ?? DEFAULT_GRAMMAR_ROOT),
      debug: debug ?? false,
      manualStart: manual ?? false,
      describe: describe ?? false,
    },
  };
}
