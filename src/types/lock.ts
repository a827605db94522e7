/** Lock arbitration states. Transitions only move forward. */
export type LockState = "free" | "held_by_other" | "escalated" | "killed" | "abandoned";

export interface LockHandle {
  readonly resource: string;
  readonly state: LockState;
  readonly holders: number[];
  readonly polls: number;
  /** True when the arbiter reports the resource as free to use. */
  readonly available: boolean;
}

/** What the user collaborator is shown when the wait times out. */
export interface EscalationRequest {
  readonly resource: string;
  readonly holders: number[];
  readonly waitedMs: number;
}

/** Returns true only when the user explicitly authorizes terminating the holders. */
export type EscalationPrompt = (request: EscalationRequest) => Promise<boolean>;
