import type { AppConfig } from "../types/config.js";
import type { Clock } from "../shared/clock.js";
import type { LockProbe, ProcessSignaller } from "../lock/probe.js";
import type { SafetyGate } from "../safety/gate.js";
import type { SourceReconciler } from "../sources/reconciler.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Everything a tool module needs, built once by createContext().
 * Tools read the config and call collaborators through it, never through module state.
 */
export interface ServerContext {
  readonly config: AppConfig;
  readonly reconciler: SourceReconciler;
  readonly lockProbe: LockProbe;
  readonly signaller: ProcessSignaller;
  readonly safetyGate: SafetyGate;
  readonly registry: ToolRegistry;
  readonly clock: Clock;
  readonly osReleasePath: string;
  readonly configPath: string;
  readonly firstRun: boolean;
}
