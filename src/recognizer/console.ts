/**
 * Line-driven recognizer.
 *
 * Stands in for a speech engine: each fed line is treated as an already
 * matched utterance whose semantic groups are written as `key=value` pairs.
 *   action=move direction=left distance=2.5
 *   action=paint colors=red,green,blue
 *   action=say words="hello there"
 */

import type { ConfidenceLevel, PhraseEvent, SemanticMeaning } from "../types.js";
import type { PhraseListener, PhraseRecognizer } from "./types.js";

const PAIR_PATTERN = /([^\s=]+)=("([^"]*)"|\S*)/g;

export function parsePhraseLine(line: string): SemanticMeaning[] {
  const meanings: SemanticMeaning[] = [];
  for (const match of line.matchAll(PAIR_PATTERN)) {
    const key = match[1] ?? "";
    const quoted = match[3];
    const values =
      quoted !== undefined
        ? [quoted]
        : (match[2] ?? "").split(",").filter((value) => value.length > 0);
    meanings.push({ key, values });
  }
  return meanings;
}

export interface ConsoleRecognizer extends PhraseRecognizer {
  /** Delivers `line` as a phrase event. Returns false while stopped. */
  feed(line: string): boolean;
}

export interface ConsoleRecognizerOptions {
  confidence?: ConfidenceLevel;
  now?: () => Date;
}

export function createConsoleRecognizer(
  options: ConsoleRecognizerOptions = {}
): ConsoleRecognizer {
  const listeners = new Set<PhraseListener>();
  const now = options.now ?? (() => new Date());
  let running = false;
  let disposed = false;

  return {
    get isRunning() {
      return running;
    },

    start(): void {
      if (!disposed) running = true;
    },

    stop(): void {
      running = false;
    },

    onPhrase(listener: PhraseListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    dispose(): void {
      running = false;
      disposed = true;
      listeners.clear();
    },

    feed(line: string): boolean {
      if (!running) return false;
      const event: PhraseEvent = {
        confidence: options.confidence ?? "high",
        phraseDuration: 0,
        phraseStartTime: now(),
        text: line,
        semanticMeanings: parsePhraseLine(line),
      };
      for (const listener of [...listeners]) {
        listener(event);
      }
      return true;
    },
  };
}
