import type { PhraseEvent } from "../types.js";

export type PhraseListener = (event: PhraseEvent) => void;

/**
 * Boundary to a speech engine that has already matched a grammar and
 * produced semantic key/value groups.
 */
export interface PhraseRecognizer {
  readonly isRunning: boolean;
  start(): void;
  stop(): void;
  /** Returns a function that removes the listener. */
  onPhrase(listener: PhraseListener): () => void;
  dispose(): void;
}

export type RecognizerFactory = (grammarFile: string | undefined) => PhraseRecognizer;
