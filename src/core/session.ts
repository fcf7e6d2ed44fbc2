/**
 * Grammar session.
 *
 * Owns the recognizer subscription and runs one state-machine cycle per
 * phrase event. Configuration problems surface from `activate`; anything that
 * goes wrong while handling a single event stays with that event.
 */

import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import type { ActionSpec, DispatchReport, PhraseEvent, PhraseOutcome } from "../types.js";
import type { Logger } from "../ui/logger.js";
import { describeError } from "../ui/logger.js";
import { truncateMiddle } from "../utils/strings.js";
import { EVENT_TEXT_LIMIT } from "../config/constants.js";
import type { PhraseRecognizer, RecognizerFactory } from "../recognizer/types.js";
import { createArgumentBinder, type ScanResult } from "./binder.js";
import type { CoercionRegistry } from "./coercion.js";
import { createHandlerDispatcher, type HandlerDispatcher } from "./dispatcher.js";
import {
  CoercionError,
  ResourceUnavailableError,
  type DispatchError,
} from "./errors.js";
import { bindHandlers, type HandlerRegistry } from "./handlers.js";
import {
  MachineState,
  type ActivateOptions,
  type MachineStep,
  type SessionStatus,
} from "./session-types.js";
import type { ActionVocabulary } from "./vocabulary.js";

// === Dependencies ===

export interface SessionDeps {
  vocabulary: ActionVocabulary;
  coercion: CoercionRegistry;
  handlers: HandlerRegistry;
  createRecognizer: RecognizerFactory;
  /** Directory the vocabulary's grammar path is resolved against. */
  grammarRoot?: string;
  sessionLog: Logger;
  sessionWarn: Logger;
  sessionError: Logger;
  bindLog?: Logger;
  dispatchLog?: Logger;
  dispatchWarn?: Logger;
  /** Receives every per-event error the session reports instead of throwing. */
  onError?: (error: DispatchError) => void;
  /** Called after each recognized phrase has been handled. */
  onOutcome?: (outcome: PhraseOutcome) => void;
}

export interface GrammarSession {
  readonly status: SessionStatus;
  readonly isRunning: boolean;
  activate(options?: ActivateOptions): boolean;
  start(): void;
  stop(): void;
  teardown(): void;
  handlePhrase(event: PhraseEvent): PhraseOutcome;
  /**
   * Fires the first action bound to `keyCode` with no arguments. Returns the
   * dispatch report, or `undefined` when no action is bound to the key.
   */
  pressKey(keyCode: string): DispatchReport | undefined;
}

function describeEvent(event: PhraseEvent): string {
  return (
    `confidence=${event.confidence}, duration=${event.phraseDuration}ms, ` +
    `start=${event.phraseStartTime.toISOString()}, ` +
    `text="${truncateMiddle(event.text, EVENT_TEXT_LIMIT)}"`
  );
}

export function createGrammarSession(deps: SessionDeps): GrammarSession {
  const { vocabulary } = deps;
  const binder = createArgumentBinder({
    vocabulary,
    coercion: deps.coercion,
    ...(deps.bindLog ? { bindLog: deps.bindLog } : {}),
  });

  let status: SessionStatus = "inactive";
  let recognizer: PhraseRecognizer | undefined;
  let unsubscribe: (() => void) | undefined;
  let dispatcher: HandlerDispatcher | undefined;

  function report(error: DispatchError): void {
    deps.onError?.(error);
  }

  function requireDispatcher(): HandlerDispatcher {
    if (!dispatcher) {
      dispatcher = createHandlerDispatcher({
        handlers: bindHandlers(vocabulary, deps.handlers),
        ...(deps.dispatchLog ? { dispatchLog: deps.dispatchLog } : {}),
        ...(deps.dispatchWarn ? { dispatchWarn: deps.dispatchWarn } : {}),
        onError: report,
      });
    }
    return dispatcher;
  }

  function resolveGrammarFile(): string | undefined {
    if (!vocabulary.grammarPath) return undefined;
    return path.resolve(deps.grammarRoot ?? process.cwd(), vocabulary.grammarPath);
  }

  // === Per-event state machine ===

  function handlePhrase(event: PhraseEvent): PhraseOutcome {
    deps.sessionLog(`[session] Phrase: ${describeEvent(event)}`);
    const active = requireDispatcher();

    let step: MachineStep = { state: MachineState.PRIMARY_KEY_SCAN };

    // Exits via return statements
    while (true) {
      deps.sessionLog(`[session] State: ${step.state}`);

      switch (step.state) {
        case MachineState.PRIMARY_KEY_SCAN: {
          const scan = binder.scan(event);
          const resolution = binder.resolve(scan);
          step = resolution.resolved
            ? { state: MachineState.ACTION_RESOLVED, action: resolution.action, scan }
            : {
                state: MachineState.NO_ACTION,
                reason: resolution.reason,
                triggerKeyword: resolution.triggerKeyword,
              };
          break;
        }

        case MachineState.NO_ACTION: {
          const { reason, triggerKeyword } = step;
          if (reason === "unknown-action") {
            deps.sessionLog(`[session] No action registered for "${triggerKeyword ?? ""}"`);
          }
          deps.sessionLog(`[session] State: ${MachineState.IDLE}`);
          return triggerKeyword === undefined
            ? { kind: "no-action", reason }
            : { kind: "no-action", reason, triggerKeyword };
        }

        case MachineState.ACTION_RESOLVED: {
          deps.sessionLog(`[session] Action: ${step.action.triggerKeyword}`);
          step = { state: MachineState.ARGUMENT_BINDING, action: step.action, scan: step.scan };
          break;
        }

        case MachineState.ARGUMENT_BINDING: {
          const action: ActionSpec = step.action;
          const scan: ScanResult = step.scan;
          try {
            step = {
              state: MachineState.DISPATCHING,
              result: binder.bindArguments(action, scan),
            };
          } catch (error) {
            if (!(error instanceof CoercionError)) throw error;
            deps.sessionWarn(`[session] ${error.message}`);
            report(error);
            deps.sessionLog(`[session] State: ${MachineState.IDLE}`);
            return {
              kind: "coercion-failed",
              action: action.triggerKeyword,
              key: error.key ?? "",
              message: error.message,
            };
          }
          break;
        }

        case MachineState.DISPATCHING: {
          const dispatchReport = active.dispatch(step.result);
          deps.sessionLog(`[session] State: ${MachineState.IDLE}`);
          return { kind: "dispatched", report: dispatchReport };
        }
      }
    }
  }

  function onRecognized(event: PhraseEvent): void {
    try {
      const outcome = handlePhrase(event);
      deps.onOutcome?.(outcome);
    } catch (error) {
      deps.sessionError(`[session] Handler failed: ${describeError(error)}`);
    }
  }

  // === Lifecycle ===

  function start(): void {
    if (recognizer && !recognizer.isRunning) {
      recognizer.start();
      status = "listening";
      deps.sessionLog("[session] Listening");
    }
  }

  function stop(): void {
    if (recognizer?.isRunning) {
      recognizer.stop();
      status = "stopped";
      deps.sessionLog("[session] Stopped");
    }
  }

  function activate(options: ActivateOptions = {}): boolean {
    if (status === "torn-down") {
      deps.sessionWarn("[session] Cannot activate after teardown");
      return false;
    }
    if (recognizer) return true;

    requireDispatcher();

    const grammarFile = resolveGrammarFile();
    if (grammarFile !== undefined && !fs.existsSync(grammarFile)) {
      const error = new ResourceUnavailableError(grammarFile);
      deps.sessionWarn(`[session] ${error.message}`);
      report(error);
      return false;
    }

    if (grammarFile) {
      deps.sessionLog(`[session] Loading grammar ${grammarFile}`);
    }
    recognizer = deps.createRecognizer(grammarFile);
    unsubscribe = recognizer.onPhrase(onRecognized);
    status = "stopped";

    const startBehavior = options.startBehavior ?? vocabulary.startBehavior;
    if (startBehavior === "auto") {
      start();
    }
    deps.sessionLog(`[session] Activated, running=${recognizer.isRunning}`);
    return true;
  }

  function teardown(): void {
    unsubscribe?.();
    unsubscribe = undefined;
    recognizer?.dispose();
    recognizer = undefined;
    status = "torn-down";
  }

  function pressKey(keyCode: string): DispatchReport | undefined {
    const action = vocabulary.findActionByKeyCode(keyCode);
    if (!action) return undefined;
    deps.sessionLog(`[session] Key "${keyCode}" → ${action.triggerKeyword}`);
    return requireDispatcher().dispatch({
      action,
      arguments: new Map(),
      arity: "none",
      positional: [],
      signature: [],
    });
  }

  return {
    get status() {
      return status;
    },
    get isRunning() {
      return recognizer?.isRunning ?? false;
    },
    activate,
    start,
    stop,
    teardown,
    handlePhrase,
    pressKey,
  };
}
