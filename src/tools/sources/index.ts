import { z } from "zod";
import type { ServerContext } from "../context.js";
import type { DistroRepository } from "../../types/distro.js";
import { registerTool, success, error, elapsed } from "../helpers.js";
import { isActionable } from "../../sources/detector.js";
import { readDistroRepository } from "../../distro/detector.js";
import { toDistroRepository } from "../../distro/repositories.js";
import { BACKUP_ID_PATTERN } from "../../backup/manager.js";

const filesArg = z.array(z.string().min(1)).min(1).optional()
  .describe("Source files in scan order. Omit for sources.list followed by sources.list.d/*.list.");
const confirmedArg = z.boolean().optional().default(false)
  .describe("Pass true to confirm execution after reviewing a confirmation_required response.");
const dryRunArg = z.boolean().optional().default(false)
  .describe("Preview only: returns what would change without modifying any file.");
const distroArgs = {
  distro: z.enum(["auto", "kali", "debian", "ubuntu"]).optional().default("auto").describe("Distro whose official repositories to use; auto reads /etc/os-release"),
  codename: z.string().min(1).optional().describe("Release codename, required for debian and ubuntu unless distro is auto"),
};

async function resolveDistro(ctx: ServerContext, args: { distro: "auto" | DistroRepository["kind"]; codename?: string }): Promise<DistroRepository> {
  if (args.distro === "auto") return readDistroRepository(ctx.osReleasePath);
  return toDistroRepository(args.distro, args.codename);
}

export function registerSourceTools(ctx: ServerContext): void {
  const { reconciler } = ctx;

  // ── sources_scan ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "sources_scan", description: "Scan APT source files for duplicate repository entries and report them.",
    module: "sources", riskLevel: "read-only",
    inputShape: { files: filesArg },
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args, started) => {
    const scan = await reconciler.scan(args.files);
    const duplicates = scan.groups.filter(isActionable);
    return success("sources_scan", elapsed(ctx, started), {
      report: scan.report,
      files_scanned: scan.files.filter((f) => f.exists).map((f) => f.path),
      files_missing: scan.files.filter((f) => !f.exists).map((f) => f.path),
      entries: scan.entries.length,
      duplicate_groups: duplicates.length,
      lines_to_comment: duplicates.reduce((n, g) => n + g.occurrences.length - 1, 0),
    }, { summary: duplicates.length ? `${duplicates.length} duplicated entr${duplicates.length === 1 ? "y" : "ies"} found` : "No duplicate entries" });
  });

  // ── sources_apply ───────────────────────────────────────────────
  registerTool(ctx, {
    name: "sources_apply",
    description: `Comment out every duplicate entry after its first occurrence, prefixing it with '${ctx.config.sources.marker}: '. Files are backed up first. Moderate risk.`,
    module: "sources", riskLevel: "moderate",
    inputShape: { files: filesArg, confirmed: confirmedArg, dry_run: dryRunArg },
    annotations: { destructiveHint: false, idempotentHint: true },
  }, async (args, started) => {
    const gate = ctx.safetyGate.check({
      toolName: "sources_apply", riskLevel: "moderate", action: "deduplicate",
      description: `Comment duplicate entries in ${args.files?.join(", ") ?? "all APT source files"}`,
      confirmed: args.confirmed, dryRun: args.dry_run,
    });
    if (gate) return gate;
    if (args.dry_run) {
      const { scan, plan } = await reconciler.plan(args.files);
      return success("sources_apply", elapsed(ctx, started), {
        report: scan.report,
        would_comment: plan.map((p) => ({ file: p.file, lines: p.lines.map((l) => l.line) })),
      }, { dry_run: true });
    }
    const result = await reconciler.apply(args.files);
    return success("sources_apply", elapsed(ctx, started), {
      backup_id: result.backup?.id ?? null,
      rewritten: result.rewritten,
      commented: result.commented,
      report: result.report,
    });
  });

  // ── sources_undo ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "sources_undo",
    description: "Undo a deduplication: restore files from a backup (backup_id) or strip the marker from files in place (files). High risk.",
    module: "sources", riskLevel: "high",
    inputShape: {
      backup_id: z.string().regex(BACKUP_ID_PATTERN, "not a backup id; use one listed by sources_backups").optional().describe("Backup to restore in full"),
      files: z.array(z.string().min(1)).min(1).optional().describe("Files whose marked lines are reactivated"),
      confirmed: confirmedArg,
    },
    annotations: { destructiveHint: true },
  }, async (args, started) => {
    if ((args.backup_id === undefined) === (args.files === undefined)) {
      return error("sources_undo", elapsed(ctx, started), { code: "INVALID_ARGUMENTS", category: "validation", message: "Pass exactly one of backup_id or files" });
    }
    const target = args.backup_id ?? args.files ?? [];
    const gate = ctx.safetyGate.check({
      toolName: "sources_undo", riskLevel: "high", action: "restore",
      description: typeof target === "string" ? `Overwrite files with backup ${target}` : `Reactivate marked lines in ${target.join(", ")}`,
      confirmed: args.confirmed, supportsDryRun: false,
    });
    if (gate) return gate;
    const restored = await reconciler.undo(target);
    return success("sources_undo", elapsed(ctx, started), { restored });
  });

  // ── sources_backups ─────────────────────────────────────────────
  registerTool(ctx, {
    name: "sources_backups", description: "List source-file backups, newest first.",
    module: "sources", riskLevel: "read-only",
    inputShape: { limit: z.number().int().min(1).max(200).optional().default(20) },
    annotations: { readOnlyHint: true },
  }, async (args, started) => {
    const backups = await reconciler.backups.list();
    return success("sources_backups", elapsed(ctx, started), {
      backups: backups.slice(0, args.limit).map((b) => ({ id: b.id, created_at: b.createdAt, files: b.files.map((f) => f.path) })),
      total: backups.length,
    });
  });

  // ── sources_check_repo ──────────────────────────────────────────
  registerTool(ctx, {
    name: "sources_check_repo", description: "Check which official repository lines of the distro are active.",
    module: "sources", riskLevel: "read-only",
    inputShape: { ...distroArgs, files: filesArg },
    annotations: { readOnlyHint: true },
  }, async (args, started) => {
    const distro = await resolveDistro(ctx, args);
    const statuses = await reconciler.checkRepository(distro, args.files);
    const missing = statuses.filter((s) => !s.present).length;
    return success("sources_check_repo", elapsed(ctx, started), { distro, repositories: statuses }, {
      summary: missing ? `${missing} of ${statuses.length} repository lines missing` : "All repository lines present",
    });
  });

  // ── sources_ensure_repo ─────────────────────────────────────────
  registerTool(ctx, {
    name: "sources_ensure_repo", description: "Append the distro's missing official repository lines to a source file, after backing it up. Moderate risk.",
    module: "sources", riskLevel: "moderate",
    inputShape: {
      ...distroArgs,
      target: z.string().min(1).optional().describe("File to append to (defaults to sources.main_list)"),
      files: filesArg, confirmed: confirmedArg, dry_run: dryRunArg,
    },
    annotations: { destructiveHint: false, idempotentHint: true },
  }, async (args, started) => {
    const distro = await resolveDistro(ctx, args);
    const target = args.target ?? ctx.config.sources.main_list;
    const gate = ctx.safetyGate.check({
      toolName: "sources_ensure_repo", riskLevel: "moderate", action: "append",
      description: `Add ${distro.kind} repository lines to ${target}`, confirmed: args.confirmed, dryRun: args.dry_run,
    });
    if (gate) return gate;
    if (args.dry_run) {
      const scanned = args.files ?? (await reconciler.defaultFiles());
      const statuses = await reconciler.checkRepository(distro, scanned.includes(target) ? scanned : [...scanned, target]);
      return success("sources_ensure_repo", elapsed(ctx, started), { target, would_add: statuses.filter((s) => !s.present).map((s) => s.line) }, { dry_run: true });
    }
    const result = await reconciler.ensureRepository(distro, target, args.files);
    return success("sources_ensure_repo", elapsed(ctx, started), { target, added: result.added, backup_id: result.backup?.id ?? null });
  });
}
