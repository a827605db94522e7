import { z } from "zod";
import type { ServerContext } from "../context.js";
import type { EscalationPrompt } from "../../types/lock.js";
import { registerTool, success, elapsed } from "../helpers.js";
import { LockArbiter } from "../../lock/arbiter.js";
import { logger } from "../../logger.js";

/**
 * Consent for a forced release is given per PID, up front: holders are terminated only
 * if every PID still holding the lock at timeout was named by the caller.
 */
export function consentFor(pids: readonly number[] | undefined): EscalationPrompt {
  return async ({ holders }) => {
    if (!pids?.length) return false;
    const unapproved = holders.filter((pid) => !pids.includes(pid));
    if (unapproved.length > 0) {
      logger.warn({ holders, approved: pids, unapproved }, "Lock holders changed since approval, not terminating");
      return false;
    }
    return true;
  };
}

export function registerLockTools(ctx: ServerContext): void {
  const arbiterFor = (confirm: EscalationPrompt) =>
    LockArbiter.fromConfig(ctx.config, { probe: ctx.lockProbe, signaller: ctx.signaller, confirm, clock: ctx.clock });

  // ── lock_status ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "lock_status", description: "Report whether the APT/dpkg lock is held, and by which PIDs.",
    module: "lock", riskLevel: "read-only",
    inputShape: {},
    annotations: { readOnlyHint: true },
  }, async (_args, started) => {
    const handle = await arbiterFor(consentFor(undefined)).status();
    return success("lock_status", elapsed(ctx, started), { resource: handle.resource, locked: !handle.available, holders: handle.holders });
  });

  // ── lock_wait ───────────────────────────────────────────────────
  registerTool(ctx, {
    name: "lock_wait",
    description: "Wait for the APT/dpkg lock to be released. On timeout, returns blocked with the holder PIDs. Passing kill_pids terminates those holders at timeout. Critical risk.",
    module: "lock", riskLevel: "critical",
    inputShape: {
      timeout_seconds: z.number().positive().max(3600).optional().describe("Defaults to lock.timeout_seconds"),
      poll_interval_seconds: z.number().positive().optional().describe("Defaults to lock.poll_interval_seconds"),
      kill_pids: z.array(z.number().int().positive()).min(1).optional().describe("PIDs you authorize terminating if they still hold the lock at timeout"),
      confirmed: z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response."),
    },
    annotations: { readOnlyHint: false, destructiveHint: true },
  }, async (args, started) => {
    if (args.kill_pids) {
      const gate = ctx.safetyGate.check({
        toolName: "lock_wait", riskLevel: "critical", action: "terminate",
        description: `Terminate PID ${args.kill_pids.join(", ")} if they still hold the package lock at timeout`,
        warnings: ["Killing dpkg mid-transaction can leave packages half-configured; run 'dpkg --configure -a' afterwards"],
        confirmed: args.confirmed, supportsDryRun: false,
      });
      if (gate) return gate;
    }
    const handle = await arbiterFor(consentFor(args.kill_pids)).waitForLock({
      ...(args.timeout_seconds !== undefined ? { timeoutMs: args.timeout_seconds * 1000 } : {}),
      ...(args.poll_interval_seconds !== undefined ? { pollIntervalMs: args.poll_interval_seconds * 1000 } : {}),
    });
    return success("lock_wait", elapsed(ctx, started), {
      resource: handle.resource, state: handle.state, available: handle.available, polls: handle.polls,
    });
  });
}
