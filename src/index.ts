#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { parseConfig } from "./config/parser.js";
import { createLoggers, describeError } from "./ui/logger.js";
import { blankLine, formatReport, formatVocabulary, separator } from "./ui/output.js";
import { createCoercionRegistry } from "./core/coercion.js";
import { ConfigError } from "./core/errors.js";
import { createHandlerRegistry } from "./core/handlers.js";
import { createGrammarSession } from "./core/session.js";
import type { ActivateOptions } from "./core/session-types.js";
import { loadVocabularyFile } from "./core/vocabulary.js";
import { createConsoleRecognizer } from "./recognizer/console.js";
import { createScene } from "./handlers/scene.js";
import { createPaletteHandlers } from "./handlers/palette.js";

async function main(): Promise<void> {
  const { config } = parseConfig();
  const loggers = createLoggers(config.debug);

  const vocabulary = loadVocabularyFile(config.vocabularyFile, {
    warn: loggers.sessionWarn,
  });

  if (config.describe) {
    for (const line of formatVocabulary(vocabulary)) {
      console.log(line);
    }
    return;
  }

  const scene = createScene(loggers.handlerLog);
  const handlers = createHandlerRegistry([
    ...scene.handlers,
    ...createPaletteHandlers(loggers.handlerLog),
  ]);

  const recognizer = createConsoleRecognizer();
  const session = createGrammarSession({
    vocabulary,
    coercion: createCoercionRegistry(),
    handlers,
    createRecognizer: () => recognizer,
    grammarRoot: config.grammarRoot,
    sessionLog: loggers.sessionLog,
    sessionWarn: loggers.sessionWarn,
    sessionError: loggers.sessionError,
    bindLog: loggers.bindLog,
    dispatchLog: loggers.dispatchLog,
    dispatchWarn: loggers.dispatchWarn,
    onOutcome: (outcome) => {
      if (outcome.kind === "dispatched") {
        loggers.sessionLog(`[session] ${formatReport(outcome.report)}`);
      }
    },
  });

  const activateOptions: ActivateOptions = config.manualStart
    ? { startBehavior: "manual" }
    : {};
  if (!session.activate(activateOptions)) {
    loggers.sessionError("[cli] Recognizer did not start; see warnings above.");
    process.exitCode = 1;
    return;
  }

  const rl = readline.createInterface({ input, output });

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    session.teardown();
    rl.close();
  };

  process.on("SIGINT", () => {
    loggers.sessionLog("\n[cli] Caught Ctrl+C. Shutting down...");
    shutdown();
    process.exit(0);
  });

  separator(config.debug, "READY");
  console.log(
    'Enter phrases as key=value pairs (e.g. "action=move direction=left distance=25"),\n' +
      '":start", ":stop", ":key <code>", ":vocab" or "exit".'
  );
  if (!session.isRunning) {
    console.log('Recognizer is stopped; type ":start" to listen.');
  }

  while (!shuttingDown) {
    let line: string;
    try {
      line = (await rl.question("phrase> ")).trim();
    } catch (error) {
      if (error && typeof error === "object" && "code" in error) {
        if (error.code === "ERR_USE_AFTER_CLOSE" || error.code === "ABORT_ERR") {
          break;
        }
      }
      throw error;
    }

    if (!line) continue;
    if (["exit", "quit"].includes(line.toLowerCase())) break;

    if (line === ":start") {
      session.start();
    } else if (line === ":stop") {
      session.stop();
    } else if (line === ":vocab") {
      for (const entry of formatVocabulary(vocabulary)) {
        console.log(entry);
      }
    } else if (line.startsWith(":key ")) {
      const keyCode = line.slice(":key ".length).trim();
      const keyReport = session.pressKey(keyCode);
      if (keyReport) {
        console.log(formatReport(keyReport));
      } else {
        console.log(`No action bound to key "${keyCode}"`);
      }
    } else if (!recognizer.feed(line)) {
      console.log('Not listening; type ":start" first.');
    }
    blankLine(config.debug);
  }

  shutdown();
}

try {
  await main();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`[cli] ${error.message}`);
    const issues = error.details?.["issues"];
    if (Array.isArray(issues)) {
      for (const issue of issues) console.error(`  - ${String(issue)}`);
    }
  } else {
    console.error("[cli] Fatal error:", describeError(error));
  }
  process.exit(1);
}
