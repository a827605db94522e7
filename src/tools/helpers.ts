import { z } from "zod";
import type { ServerContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, BlockedResponse, ErrorCategory } from "../types/response.js";
import type { ToolMetadata } from "../types/tool.js";
import { LockTimeoutError, ReconcileError, ReconcileErrorCode, messageOf } from "../shared/errors.js";
import { logger } from "../logger.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, durationMs: number, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, duration_ms: durationMs, data, ...extra };
}

export function error(tool: string, durationMs: number, opts: { code: string; category: ErrorCategory; message: string; remediation?: string[]; context?: Record<string, unknown> }): ErrorResponse {
  return {
    status: "error", tool, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    remediation: opts.remediation ?? [],
    ...(opts.context ? { context: opts.context } : {}),
  };
}

/** Build a blocked response for package-database lock contention. */
export function blocked(tool: string, durationMs: number, opts: { code: string; message: string; holders: number[]; remediation?: string[] }): BlockedResponse {
  return {
    status: "blocked", tool, duration_ms: durationMs,
    error_code: opts.code, error_category: "lock", message: opts.message,
    holders: opts.holders,
    remediation: opts.remediation ?? [],
  };
}

// ── Error Categorization ───────────────────────────────────────────

const CATEGORY: Record<ReconcileErrorCode, { category: ErrorCategory; remediation: string[] }> = {
  [ReconcileErrorCode.SCAN_FAILED]: { category: "io", remediation: ["Check the file permissions of the listed source file"] },
  [ReconcileErrorCode.WRITE_FAILED]: {
    category: "io",
    remediation: ["Files listed under 'rewritten' are already deduplicated", "Fix the cause, then run sources_apply again to process the remaining files"],
  },
  [ReconcileErrorCode.BACKUP_FAILED]: {
    category: "backup",
    remediation: ["Verify backup.root is writable", "Re-run sources_scan if the files were edited since the last scan"],
  },
  [ReconcileErrorCode.RESTORE_FAILED]: {
    category: "backup",
    remediation: ["Run sources_backups to list restorable backups", "Use sources_undo with files instead of backup_id to strip markers"],
  },
  [ReconcileErrorCode.LOCK_TIMEOUT]: { category: "lock", remediation: [] },
  [ReconcileErrorCode.LOCK_PROBE_FAILED]: { category: "lock", remediation: ["Verify fuser (psmisc) is installed", "Verify passwordless sudo for fuser and kill"] },
  [ReconcileErrorCode.CONFIG_INVALID]: { category: "validation", remediation: ["Fix the configuration file and restart the server"] },
  [ReconcileErrorCode.UNSUPPORTED_DISTRO]: { category: "validation", remediation: ["Pass distro and codename explicitly"] },
  [ReconcileErrorCode.CANCELLED]: { category: "state", remediation: ["Run sources_apply again to process the remaining files"] },
};

/** Map a thrown error to the matching response; lock timeouts become blocked responses. */
export function fromError(tool: string, durationMs: number, err: unknown): ErrorResponse | BlockedResponse {
  if (err instanceof LockTimeoutError) {
    return blocked(tool, durationMs, {
      code: err.code,
      message: err.message,
      holders: err.holders,
      remediation: [
        "Wait for the other package manager (apt, unattended-upgrades, Synaptic) to finish",
        `To terminate the holders, call lock_wait with kill_pids: [${err.holders.join(", ")}] and confirmed: true`,
      ],
    });
  }
  if (err instanceof ReconcileError) {
    const { category, remediation } = CATEGORY[err.code];
    return error(tool, durationMs, { code: err.code, category, message: err.message, remediation, context: err.context });
  }
  logger.error({ tool, error: messageOf(err) }, "Unexpected tool failure");
  return error(tool, durationMs, { code: "INTERNAL_ERROR", category: "state", message: messageOf(err), remediation: ["Check server logs for details"] });
}

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool whose handler receives arguments already validated against its shape.
 * Validation failures and thrown errors are turned into responses here.
 */
export function registerTool<S extends z.ZodRawShape>(
  ctx: ServerContext,
  metadata: ToolMetadata & { readonly inputShape: S },
  handler: (args: z.infer<z.ZodObject<S>>, started: number) => Promise<ToolResponse>,
): void {
  const schema = z.object(metadata.inputShape);
  ctx.registry.register({
    metadata,
    execute: async (raw) => {
      const started = ctx.clock.now();
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        return error(metadata.name, 0, {
          code: "INVALID_ARGUMENTS", category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
        });
      }
      try {
        return await handler(parsed.data, started);
      } catch (err) {
        return fromError(metadata.name, ctx.clock.now() - started, err);
      }
    },
  });
}

/** MCP hints for a tool: declared annotations first, then what its risk level implies. */
export function mcpAnnotations(metadata: ToolMetadata): { readOnlyHint: boolean; destructiveHint: boolean; idempotentHint: boolean; openWorldHint: boolean } {
  return {
    readOnlyHint: metadata.annotations?.readOnlyHint ?? metadata.riskLevel === "read-only",
    destructiveHint: metadata.annotations?.destructiveHint ?? false,
    idempotentHint: metadata.annotations?.idempotentHint ?? false,
    openWorldHint: false,
  };
}

/** Milliseconds since a handler started. */
export function elapsed(ctx: ServerContext, started: number): number {
  return ctx.clock.now() - started;
}
