/**
 * Type definitions for the per-phrase state machine.
 *
 * Each phrase event runs one cycle:
 *   IDLE → PRIMARY_KEY_SCAN → ACTION_RESOLVED | NO_ACTION
 *        → ARGUMENT_BINDING → DISPATCHING → IDLE
 * NO_ACTION ends the cycle. Nothing carries over to the next event.
 */

import type {
  ActionResolutionMiss,
  ActionSpec,
  DispatchResult,
  StartBehavior,
} from "../types.js";
import type { ScanResult } from "./binder.js";

export enum MachineState {
  IDLE = "IDLE",
  PRIMARY_KEY_SCAN = "PRIMARY_KEY_SCAN",
  ACTION_RESOLVED = "ACTION_RESOLVED",
  NO_ACTION = "NO_ACTION",
  ARGUMENT_BINDING = "ARGUMENT_BINDING",
  DISPATCHING = "DISPATCHING",
}

export type MachineStep =
  | { state: MachineState.PRIMARY_KEY_SCAN }
  | { state: MachineState.ACTION_RESOLVED; action: ActionSpec; scan: ScanResult }
  | { state: MachineState.NO_ACTION; reason: ActionResolutionMiss; triggerKeyword: string | undefined }
  | { state: MachineState.ARGUMENT_BINDING; action: ActionSpec; scan: ScanResult }
  | { state: MachineState.DISPATCHING; result: DispatchResult };

// === Lifecycle ===

export type SessionStatus = "inactive" | "stopped" | "listening" | "torn-down";

export interface ActivateOptions {
  /** Overrides the vocabulary's configured start behavior. */
  startBehavior?: StartBehavior;
}
