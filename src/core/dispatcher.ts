import type { DispatchReport, DispatchResult, HandlerOutcome } from "../types.js";
import type { Logger } from "../ui/logger.js";
import { formatValues } from "../utils/strings.js";
import { HandlerResolutionError } from "./errors.js";
import { findOverload, type HandlerTable } from "./handlers.js";

export interface HandlerDispatcher {
  dispatch(result: DispatchResult): DispatchReport;
}

export interface DispatcherDeps {
  handlers: HandlerTable;
  dispatchLog?: Logger;
  dispatchWarn?: Logger;
  onError?: (error: HandlerResolutionError) => void;
}

/**
 * Invokes every handler registered for the resolved action.
 *
 * A handler with no overload for a zero- or one-argument call is skipped
 * quietly; an N-argument miss is reported as a HandlerResolutionError. Either
 * way the remaining handlers still run. Errors thrown by a handler itself
 * propagate to the caller.
 */
export function createHandlerDispatcher(deps: DispatcherDeps): HandlerDispatcher {
  const log: Logger = deps.dispatchLog ?? (() => undefined);
  const warn: Logger = deps.dispatchWarn ?? (() => undefined);

  function dispatch(result: DispatchResult): DispatchReport {
    const keyword = result.action.triggerKeyword;
    const descriptors = deps.handlers.get(keyword) ?? [];
    const outcomes: HandlerOutcome[] = [];

    for (const descriptor of descriptors) {
      const overload = findOverload(descriptor, result.signature);

      if (!overload) {
        if (result.arity === "multiple") {
          const error = new HandlerResolutionError(keyword, descriptor.name, result.signature);
          warn(`[dispatch] ${error.message}`);
          deps.onError?.(error);
          outcomes.push({ handler: descriptor.name, status: "unresolved" });
        } else {
          log(`[dispatch] ${descriptor.name} has no receiver for (${result.signature.join(", ")})`);
          outcomes.push({ handler: descriptor.name, status: "no-receiver" });
        }
        continue;
      }

      log(`[dispatch] ${keyword} → ${descriptor.name}(${formatValues(result.positional)})`);
      overload.invoke(result.positional);
      outcomes.push({ handler: descriptor.name, status: "invoked" });
    }

    return { action: keyword, outcomes };
  }

  return { dispatch };
}
