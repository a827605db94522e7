// Command execution layer: every external command (fuser, kill) passes through this module.
// LocalExecutor.execute() is the hard boundary between the engine and the OS: argv only,
// never a shell, so PIDs and paths can never be reinterpreted as shell syntax.
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";
import type { AppConfig } from "../types/config.js";
import { logger } from "../logger.js";

/** Result of command execution. Failures are reported through exitCode, never thrown. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      return { stdout: "", stderr: "empty command", exitCode: 127, durationMs: 0 };
    }
    logger.debug({ argv: command.argv }, "exec");

    return new Promise<ExecResult>((resolve) => {
      execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          maxBuffer: 1024 * 1024,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          // A numeric code is the exit status; a string code (ENOENT, EACCES) means it never ran.
          const exitCode = !error ? 0 : typeof error.code === "number" ? error.code : 127;
          resolve({ stdout: String(stdout), stderr: String(stderr), exitCode, durationMs });
        },
      );
    });
  }
}

/** Prefix argv with sudo when the config asks for privilege escalation. */
export function privileged(config: Pick<AppConfig, "privilege">, argv: string[]): Command {
  return { argv: config.privilege.method === "sudo" ? ["sudo", "-n", ...argv] : argv };
}
