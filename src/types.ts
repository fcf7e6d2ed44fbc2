export interface Config {
  vocabularyFile: string;
  grammarRoot: string;
  debug: boolean;
  manualStart: boolean;
  describe: boolean;
}

export interface ParseResult {
  config: Config;
}

// === Type tags ===

export const TYPE_TAGS = [
  "none",
  "bool",
  "string",
  "int32",
  "int64",
  "uint16",
  "uint32",
  "uint64",
  "float",
  "double",
  "decimal",
  "datetime",
] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

/** Runtime type name a coerced scalar reports; `none` values are strings. */
export type ScalarTypeName = Exclude<TypeTag, "none">;

export type ParameterType = ScalarTypeName | `${ScalarTypeName}[]`;

export type ScalarValue = boolean | string | number | bigint | Date;

export type BoundValue = ScalarValue | ScalarValue[];

// === Vocabulary ===

export interface ArgumentSpec {
  readonly key: string;
  readonly typeTag: TypeTag;
  readonly isCollection: boolean;
  readonly defaults: readonly string[];
}

export interface ActionSpec {
  readonly triggerKeyword: string;
  readonly keyCode: string | undefined;
  readonly argumentPrecedence: readonly string[];
  readonly handlerRefs: readonly string[];
}

export type StartBehavior = "auto" | "manual";

// === Recognition events ===

export interface SemanticMeaning {
  readonly key: string;
  readonly values: readonly string[];
}

export type ConfidenceLevel = "high" | "medium" | "low" | "rejected";

export interface PhraseEvent {
  confidence: ConfidenceLevel;
  /** Milliseconds. */
  phraseDuration: number;
  phraseStartTime: Date;
  text: string;
  semanticMeanings: readonly SemanticMeaning[];
}

// === Binding ===

export interface BoundArgument {
  spec: ArgumentSpec;
  meaning: SemanticMeaning;
  coercedValue: BoundValue;
  signature: ParameterType;
}

export type DispatchArity = "none" | "single" | "multiple";

export interface DispatchResult {
  action: ActionSpec;
  arguments: Map<string, BoundArgument>;
  arity: DispatchArity;
  positional: BoundValue[];
  signature: ParameterType[];
}

export type ActionResolutionMiss = "no-primary-key" | "empty-trigger" | "unknown-action";

// === Dispatch ===

export type HandlerStatus = "invoked" | "no-receiver" | "unresolved";

export interface HandlerOutcome {
  handler: string;
  status: HandlerStatus;
}

export interface DispatchReport {
  action: string;
  outcomes: HandlerOutcome[];
}

export type PhraseOutcome =
  | { kind: "no-action"; reason: ActionResolutionMiss; triggerKeyword?: string }
  | { kind: "coercion-failed"; action: string; key: string; message: string }
  | { kind: "dispatched"; report: DispatchReport };
