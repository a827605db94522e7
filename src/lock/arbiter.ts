// Lock arbiter: waits for the externally held package-database lock.
// free → held_by_other → (timeout) escalated → killed | abandoned. States only move forward.
// Holders are terminated only after the EscalationPrompt returns true; there is no other path to a signal.
import type { AppConfig } from "../types/config.js";
import type { EscalationPrompt, LockHandle, LockState } from "../types/lock.js";
import type { LockProbe, ProcessSignaller } from "./probe.js";
import { RetryExecutor } from "../retry/executor.js";
import { systemClock, type Clock } from "../shared/clock.js";
import { LockTimeoutError } from "../shared/errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";

const NEXT_STATES: Record<LockState, readonly LockState[]> = {
  free: ["held_by_other"],
  held_by_other: ["escalated"],
  escalated: ["killed", "abandoned"],
  killed: [],
  abandoned: [],
};

export interface LockWaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
}

export interface LockArbiterOptions {
  probe: LockProbe;
  signaller: ProcessSignaller;
  confirm: EscalationPrompt;
  defaults: LockWaitOptions;
  gracePeriodMs: number;
  clock?: Clock;
  logger?: Logger;
}

/** Thrown by a poll that found the lock held; consumed by the retry loop. */
class LockHeld extends Error {
  constructor(readonly holders: number[]) {
    super(`held by ${holders.join(", ")}`);
  }
}

/** Mutable view of one arbitration, snapshotted into an immutable LockHandle. */
class Arbitration {
  state: LockState = "free";
  holders: number[] = [];
  polls = 0;

  constructor(readonly resource: string) {}

  moveTo(next: LockState): void {
    if (!NEXT_STATES[this.state].includes(next)) {
      throw new Error(`Illegal lock state transition ${this.state} → ${next}`);
    }
    this.state = next;
  }

  handle(available: boolean): LockHandle {
    return { resource: this.resource, state: this.state, holders: [...this.holders], polls: this.polls, available };
  }
}

export class LockArbiter {
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly retry: RetryExecutor;

  constructor(private readonly options: LockArbiterOptions) {
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ component: "lock", resource: options.probe.resource });
    this.retry = new RetryExecutor(
      { maxAttempts: 1, baseBackoffMs: options.defaults.pollIntervalMs, backoff: "fixed" },
      this.clock,
      this.log,
    );
  }

  static fromConfig(
    config: Pick<AppConfig, "lock">,
    deps: Pick<LockArbiterOptions, "probe" | "signaller" | "confirm" | "clock" | "logger">,
  ): LockArbiter {
    return new LockArbiter({
      ...deps,
      defaults: {
        timeoutMs: config.lock.timeout_seconds * 1000,
        pollIntervalMs: config.lock.poll_interval_seconds * 1000,
      },
      gracePeriodMs: config.lock.grace_period_seconds * 1000,
    });
  }

  /** One probe, no waiting. */
  async status(): Promise<LockHandle> {
    const run = new Arbitration(this.options.probe.resource);
    run.polls = 1;
    run.holders = await this.options.probe.holders();
    if (run.holders.length > 0) run.moveTo("held_by_other");
    return run.handle(run.holders.length === 0);
  }

  /**
   * Poll until the lock is free or the timeout passes. Polls happen at t = 0, p, 2p, …
   * strictly before the timeout; the timeout itself escalates without another poll.
   * Resolves with an available handle, or rejects with LockTimeoutError.
   */
  async waitForLock(overrides: Partial<LockWaitOptions> = {}): Promise<LockHandle> {
    const { timeoutMs, pollIntervalMs } = { ...this.options.defaults, ...overrides };
    const run = new Arbitration(this.options.probe.resource);
    const started = this.clock.now();

    try {
      await this.retry.execute(async () => {
        run.polls++;
        const holders = await this.options.probe.holders();
        if (holders.length === 0) return;
        if (run.state === "free") {
          run.moveTo("held_by_other");
          this.log.info({ holders }, "Lock held by another process, waiting");
        }
        run.holders = holders;
        throw new LockHeld(holders);
      }, {
        maxAttempts: Math.max(1, Math.ceil(timeoutMs / pollIntervalMs)),
        baseBackoffMs: pollIntervalMs,
        backoff: "fixed",
        shouldRetry: (err) => err instanceof LockHeld,
        label: "lock-poll",
      });
      if (run.state !== "free") this.log.info({ polls: run.polls }, "Lock released");
      return run.handle(true);
    } catch (err) {
      if (!(err instanceof LockHeld)) throw err;
    }

    const remaining = timeoutMs - (this.clock.now() - started);
    if (remaining > 0) await this.clock.sleep(remaining);
    return this.escalate(run, this.clock.now() - started);
  }

  private async escalate(run: Arbitration, waitedMs: number): Promise<LockHandle> {
    run.moveTo("escalated");
    this.log.warn({ holders: run.holders, waitedMs }, "Lock wait timed out, asking whether to terminate holders");
    const consent = await this.options.confirm({ resource: run.resource, holders: [...run.holders], waitedMs });

    if (!consent) {
      run.moveTo("abandoned");
      return this.fail(run, waitedMs, "holders were not terminated (declined)");
    }

    run.moveTo("killed");
    const { signaller } = this.options;
    this.log.warn({ holders: run.holders }, "Terminating lock holders with user consent");
    await signaller.signal(run.holders, "TERM");
    await this.clock.sleep(this.options.gracePeriodMs);

    const survivors: number[] = [];
    for (const pid of run.holders) {
      if (await signaller.isAlive(pid)) survivors.push(pid);
    }
    if (survivors.length > 0) {
      this.log.warn({ survivors }, "Holders ignored SIGTERM, sending SIGKILL");
      await signaller.signal(survivors, "KILL");
      await this.clock.sleep(this.options.gracePeriodMs);
    }

    // Exactly one re-check after a forced release.
    run.polls++;
    const holders = await this.options.probe.holders();
    if (holders.length > 0) {
      run.holders = holders;
      return this.fail(run, waitedMs, "lock still held after terminating holders");
    }
    this.log.info("Lock free after terminating holders");
    return run.handle(true);
  }

  private fail(run: Arbitration, waitedMs: number, reason: string): never {
    const error = new LockTimeoutError(run.resource, [...run.holders], waitedMs, reason);
    this.log.error({ code: error.code, holders: run.holders, waitedMs, state: run.state }, error.message);
    throw error;
  }
}
