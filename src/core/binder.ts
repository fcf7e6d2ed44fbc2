/**
 * Argument binder.
 *
 * Turns one phrase event into the typed, ordered argument list for the action
 * it triggers. The phases are exposed separately so the session can step
 * through them; `bind` runs all of them in order.
 */

import type {
  ActionResolutionMiss,
  ActionSpec,
  ArgumentSpec,
  BoundArgument,
  BoundValue,
  DispatchResult,
  PhraseEvent,
  SemanticMeaning,
} from "../types.js";
import type { Logger } from "../ui/logger.js";
import { signatureOf, type CoercionRegistry } from "./coercion.js";
import { CoercionError } from "./errors.js";
import type { ActionVocabulary } from "./vocabulary.js";

export interface MatchedMeaning {
  spec: ArgumentSpec;
  meaning: SemanticMeaning;
}

export interface ScanResult {
  triggerKeyword: string | undefined;
  matched: Map<string, MatchedMeaning>;
}

export type Resolution =
  | { resolved: true; action: ActionSpec }
  | { resolved: false; reason: ActionResolutionMiss; triggerKeyword?: string };

export type BindOutcome =
  | { kind: "bound"; result: DispatchResult }
  | { kind: "no-action"; reason: ActionResolutionMiss; triggerKeyword?: string };

export interface ArgumentBinder {
  scan(event: PhraseEvent): ScanResult;
  resolve(scan: ScanResult): Resolution;
  bindArguments(action: ActionSpec, scan: ScanResult): DispatchResult;
  bind(event: PhraseEvent): BindOutcome;
}

export interface BinderDeps {
  vocabulary: ActionVocabulary;
  coercion: CoercionRegistry;
  bindLog?: Logger;
}

export function createArgumentBinder(deps: BinderDeps): ArgumentBinder {
  const { vocabulary, coercion } = deps;
  const log: Logger = deps.bindLog ?? (() => undefined);

  function coerceArgument(entry: MatchedMeaning): BoundValue {
    const { spec, meaning } = entry;
    try {
      if (spec.isCollection) {
        return meaning.values.map((raw) => coercion.coerce(spec.typeTag, raw));
      }
      const first = meaning.values[0];
      if (first === undefined) {
        throw new CoercionError(spec.typeTag, undefined, "no value recognized");
      }
      return coercion.coerce(spec.typeTag, first);
    } catch (error) {
      if (error instanceof CoercionError) throw error.withKey(spec.key);
      throw error;
    }
  }

  function scan(event: PhraseEvent): ScanResult {
    let triggerKeyword: string | undefined;
    const matched = new Map<string, MatchedMeaning>();

    for (const meaning of event.semanticMeanings) {
      log(`[bind] meaning ${meaning.key}=[${meaning.values.join(", ")}]`);

      if (meaning.key === vocabulary.primaryActionKey) {
        if (triggerKeyword === undefined && meaning.values.length > 0) {
          triggerKeyword = meaning.values[0];
        }
        continue;
      }

      const spec = vocabulary.lookupArgumentSpec(meaning.key);
      if (!spec) continue;
      matched.set(meaning.key, { spec, meaning });
    }

    return { triggerKeyword, matched };
  }

  function resolve(result: ScanResult): Resolution {
    const { triggerKeyword } = result;
    if (triggerKeyword === undefined) {
      return { resolved: false, reason: "no-primary-key" };
    }
    if (triggerKeyword === "") {
      return { resolved: false, reason: "empty-trigger", triggerKeyword };
    }
    const action = vocabulary.lookupAction(triggerKeyword);
    if (!action) {
      return { resolved: false, reason: "unknown-action", triggerKeyword };
    }
    return { resolved: true, action };
  }

  function bindArguments(action: ActionSpec, result: ScanResult): DispatchResult {
    const bound = new Map<string, BoundArgument>();
    for (const [key, entry] of result.matched) {
      bound.set(key, {
        spec: entry.spec,
        meaning: entry.meaning,
        coercedValue: coerceArgument(entry),
        signature: signatureOf(entry.spec.typeTag, entry.spec.isCollection),
      });
    }

    if (bound.size === 0) {
      return { action, arguments: bound, arity: "none", positional: [], signature: [] };
    }

    if (bound.size === 1) {
      const only = [...bound.values()];
      return {
        action,
        arguments: bound,
        arity: "single",
        positional: only.map((arg) => arg.coercedValue),
        signature: only.map((arg) => arg.signature),
      };
    }

    // Precedence filters and orders; keys it does not name are dropped.
    const ordered = action.argumentPrecedence.flatMap((key) => {
      const arg = bound.get(key);
      return arg ? [arg] : [];
    });

    return {
      action,
      arguments: bound,
      arity: "multiple",
      positional: ordered.map((arg) => arg.coercedValue),
      signature: ordered.map((arg) => arg.signature),
    };
  }

  function bind(event: PhraseEvent): BindOutcome {
    const scanned = scan(event);
    const resolution = resolve(scanned);
    if (!resolution.resolved) {
      const { reason, triggerKeyword } = resolution;
      return triggerKeyword === undefined
        ? { kind: "no-action", reason }
        : { kind: "no-action", reason, triggerKeyword };
    }
    return { kind: "bound", result: bindArguments(resolution.action, scanned) };
  }

  return { scan, resolve, bindArguments, bind };
}
