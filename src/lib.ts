export * from "./types.js";
export {
  DispatchError,
  ConfigError,
  ResourceUnavailableError,
  CoercionError,
  HandlerResolutionError,
} from "./core/errors.js";
export {
  createCoercionRegistry,
  signatureOf,
  type CoercionRegistry,
  type Converter,
} from "./core/coercion.js";
export {
  loadVocabulary,
  loadVocabularyFile,
  DEFAULT_PRIMARY_ACTION_KEY,
  type ActionVocabulary,
  type VocabularyConfig,
} from "./core/vocabulary.js";
export {
  createArgumentBinder,
  type ArgumentBinder,
  type BindOutcome,
  type ScanResult,
} from "./core/binder.js";
export {
  defineHandler,
  createHandlerRegistry,
  bindHandlers,
  type HandlerDescriptor,
  type HandlerOverload,
  type HandlerRegistry,
  type HandlerTable,
} from "./core/handlers.js";
export { createHandlerDispatcher, type HandlerDispatcher } from "./core/dispatcher.js";
export { createGrammarSession, type GrammarSession, type SessionDeps } from "./core/session.js";
export { MachineState, type ActivateOptions, type SessionStatus } from "./core/session-types.js";
export type { PhraseRecognizer, PhraseListener, RecognizerFactory } from "./recognizer/types.js";
export { createConsoleRecognizer, parsePhraseLine, type ConsoleRecognizer } from "./recognizer/console.js";
export { createLoggers, type Logger, type Loggers } from "./ui/logger.js";
