// Lock probe and process signaller: the only places the engine touches other processes.
// Both go through the Executor so that every external command is a structured argv.
import type { AppConfig } from "../types/config.js";
import type { Executor } from "../execution/executor.js";
import { privileged } from "../execution/executor.js";
import { COMMAND_TIMEOUTS } from "../types/risk.js";
import { LockProbeError } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Answers "who holds the lock right now". Must query live state on every call. */
export interface LockProbe {
  readonly resource: string;
  holders(): Promise<number[]>;
}

export type KillSignal = "TERM" | "KILL";

export interface ProcessSignaller {
  signal(pids: readonly number[], signal: KillSignal): Promise<void>;
  isAlive(pid: number): Promise<boolean>;
}

/** Extract a sorted, de-duplicated PID list from fuser's stdout. */
export function parsePids(stdout: string): number[] {
  const pids = (stdout.match(/\d+/g) ?? []).map(Number).filter((n) => Number.isSafeInteger(n) && n > 0);
  return [...new Set(pids)].sort((a, b) => a - b);
}

/**
 * fuser over the APT/dpkg lock files. fuser writes PIDs to stdout and exits 1 when
 * no process has any of the files open, including when the files do not exist yet.
 */
export class FuserLockProbe implements LockProbe {
  constructor(
    private readonly executor: Executor,
    private readonly config: Pick<AppConfig, "lock" | "privilege">,
  ) {}

  get resource(): string {
    return this.config.lock.paths.join(", ");
  }

  async holders(): Promise<number[]> {
    const command = privileged(this.config, ["fuser", ...this.config.lock.paths]);
    const r = await this.executor.execute(command, COMMAND_TIMEOUTS.probe);
    if (r.exitCode === 0) return parsePids(r.stdout);
    if (r.exitCode === 1 && r.stdout.trim() === "" && !r.stderr.includes("sudo:")) return [];
    throw new LockProbeError(`Could not query lock holders: ${r.stderr.trim() || `fuser exited ${r.exitCode}`}`, {
      argv: command.argv,
      exitCode: r.exitCode,
    });
  }
}

export class KillSignaller implements ProcessSignaller {
  constructor(
    private readonly executor: Executor,
    private readonly config: Pick<AppConfig, "privilege">,
  ) {}

  async signal(pids: readonly number[], signal: KillSignal): Promise<void> {
    if (pids.length === 0) return;
    const r = await this.executor.execute(privileged(this.config, ["kill", `-${signal}`, ...pids.map(String)]), COMMAND_TIMEOUTS.signal);
    // Non-zero is expected when a holder exits between the probe and the signal.
    if (r.exitCode !== 0) logger.warn({ pids, signal, stderr: r.stderr.trim() }, "kill reported an error");
  }

  async isAlive(pid: number): Promise<boolean> {
    const r = await this.executor.execute(privileged(this.config, ["kill", "-0", String(pid)]), COMMAND_TIMEOUTS.signal);
    return r.exitCode === 0;
  }
}
