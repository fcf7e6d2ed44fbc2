/**
 * Action vocabulary.
 *
 * Built once from configuration data and read-only afterwards. Duplicate
 * trigger keywords and argument keys are resolved last-wins; each overwrite
 * is reported through `warn` so it does not go unnoticed.
 */

import fs from "node:fs";
import { z } from "zod";
import {
  TYPE_TAGS,
  type ActionSpec,
  type ArgumentSpec,
  type StartBehavior,
} from "../types.js";
import type { Logger } from "../ui/logger.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_PRIMARY_ACTION_KEY = "action";

// === Schema ===

const TypeTagSchema = z
  .string()
  .default("none")
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(TYPE_TAGS));

export const ArgumentConfigSchema = z.object({
  key: z.string().min(1),
  type: TypeTagSchema,
  isCollection: z.boolean().default(false),
  defaults: z.array(z.string()).default([]),
});

export const ActionConfigSchema = z.object({
  keyword: z.string().min(1),
  keyCode: z.string().min(1).optional(),
  handlers: z.array(z.string().min(1)).default([]),
  argumentPrecedence: z.array(z.string().min(1)).default([]),
});

export const VocabularyConfigSchema = z.object({
  primaryActionKey: z.string().min(1).default(DEFAULT_PRIMARY_ACTION_KEY),
  grammarPath: z.string().min(1).optional(),
  startBehavior: z.enum(["auto", "manual"]).default("auto"),
  actions: z.array(ActionConfigSchema),
  arguments: z.array(ArgumentConfigSchema).default([]),
});

export type VocabularyConfig = z.input<typeof VocabularyConfigSchema>;

// === Vocabulary ===

export interface ActionVocabulary {
  readonly primaryActionKey: string;
  readonly grammarPath: string | undefined;
  readonly startBehavior: StartBehavior;
  readonly actions: readonly ActionSpec[];
  readonly argumentSpecs: readonly ArgumentSpec[];
  lookupAction(triggerKeyword: string): ActionSpec | undefined;
  lookupArgumentSpec(key: string): ArgumentSpec | undefined;
  /** First action bound to `keyCode`, in declaration order. */
  findActionByKeyCode(keyCode: string): ActionSpec | undefined;
}

export interface LoadOptions {
  warn?: Logger;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

export function loadVocabulary(
  config: unknown,
  options: LoadOptions = {}
): ActionVocabulary {
  const parsed = VocabularyConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigError("Vocabulary failed validation", {
      issues: formatIssues(parsed.error),
    });
  }

  const data = parsed.data;
  if (data.actions.length === 0) {
    throw new ConfigError("Vocabulary must have at least one action");
  }

  const argumentSpecs = new Map<string, ArgumentSpec>();
  for (const entry of data.arguments) {
    if (argumentSpecs.has(entry.key)) {
      options.warn?.(`[vocabulary] Duplicate argument "${entry.key}"; the later declaration wins`);
    }
    argumentSpecs.set(
      entry.key,
      Object.freeze({
        key: entry.key,
        typeTag: entry.type,
        isCollection: entry.isCollection,
        defaults: Object.freeze([...entry.defaults]),
      })
    );
  }

  const actions = new Map<string, ActionSpec>();
  for (const entry of data.actions) {
    const unknownKeys = entry.argumentPrecedence.filter((key) => !argumentSpecs.has(key));
    if (unknownKeys.length > 0) {
      throw new ConfigError(
        `Action "${entry.keyword}" orders undeclared arguments: ${unknownKeys.join(", ")}`,
        { action: entry.keyword, unknownKeys }
      );
    }
    if (actions.has(entry.keyword)) {
      options.warn?.(`[vocabulary] Duplicate action "${entry.keyword}"; the later declaration wins`);
    }
    actions.set(
      entry.keyword,
      Object.freeze({
        triggerKeyword: entry.keyword,
        keyCode: entry.keyCode,
        argumentPrecedence: Object.freeze([...entry.argumentPrecedence]),
        handlerRefs: Object.freeze([...entry.handlers]),
      })
    );
  }

  const actionList = Object.freeze([...actions.values()]);

  return Object.freeze({
    primaryActionKey: data.primaryActionKey,
    grammarPath: data.grammarPath,
    startBehavior: data.startBehavior,
    actions: actionList,
    argumentSpecs: Object.freeze([...argumentSpecs.values()]),
    lookupAction: (triggerKeyword: string) => actions.get(triggerKeyword),
    lookupArgumentSpec: (key: string) => argumentSpecs.get(key),
    findActionByKeyCode: (keyCode: string) =>
      actionList.find((action) => action.keyCode === keyCode),
  });
}

export function loadVocabularyFile(
  filePath: string,
  options: LoadOptions = {}
): ActionVocabulary {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read vocabulary file ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Vocabulary file ${filePath} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return loadVocabulary(json, options);
}
