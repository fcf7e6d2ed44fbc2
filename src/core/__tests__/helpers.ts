import type { PhraseEvent, SemanticMeaning } from "../../types.js";
import type { Logger } from "../../ui/logger.js";
import { loadVocabulary, type ActionVocabulary, type VocabularyConfig } from "../vocabulary.js";

export const silent: Logger = () => undefined;

export function meaning(key: string, ...values: string[]): SemanticMeaning {
  return { key, values };
}

export function phrase(...semanticMeanings: SemanticMeaning[]): PhraseEvent {
  return {
    confidence: "high",
    phraseDuration: 420,
    phraseStartTime: new Date("2024-03-01T09:30:00.000Z"),
    text: semanticMeanings.map((m) => m.values.join(" ")).join(" "),
    semanticMeanings,
  };
}

export const MOVE_CONFIG: VocabularyConfig = {
  actions: [
    { keyword: "move", keyCode: "m", handlers: ["mover"], argumentPrecedence: ["direction", "distance"] },
    { keyword: "stop", keyCode: "s", handlers: ["halt"] },
    { keyword: "go", handlers: ["go"] },
    { keyword: "tag", handlers: ["tagger"], argumentPrecedence: ["labels", "weight", "direction"] },
  ],
  arguments: [
    { key: "direction", type: "String" },
    { key: "distance", type: "Float" },
    { key: "labels", type: "string", isCollection: true },
    { key: "weight", type: "int32" },
    { key: "steps", type: "int32", isCollection: true },
  ],
};

export function moveVocabulary(): ActionVocabulary {
  return loadVocabulary(MOVE_CONFIG);
}
