// Source reconciler, the capability surface consumed by the tools:
// scan → report, apply → (backup, rewritten files), undo → files restored,
// plus repository presence checks and additions for the detected distro.
// One AppConfig value is passed in at construction; nothing here reads global state.
import { readFile } from "node:fs/promises";
import type { AppConfig } from "../types/config.js";
import type { Backup } from "../types/backup.js";
import type { DistroRepository } from "../types/distro.js";
import type { ScanResult } from "../types/sources.js";
import { AtomicFileWriter } from "../shared/atomic-write.js";
import { WriteError, errnoCode } from "../shared/errors.js";
import { BackupManager, assertSnapshotCurrent } from "../backup/manager.js";
import { providesRepository, repositoryLines } from "../distro/repositories.js";
import { bytesToText, collect, encodeLine, expandSourceFiles, joinLines, splitLines, textToBytes } from "./collector.js";
import { detect, isActionable } from "./detector.js";
import { Deduplicator, type FilePlan } from "./deduplicator.js";
import { formatReport } from "./report.js";
import { logger as rootLogger, type Logger } from "../logger.js";

export interface ApplyResult {
  /** Null when there was nothing to deduplicate, so no snapshot was taken. */
  readonly backup: Backup | null;
  readonly rewritten: string[];
  readonly commented: number;
  readonly report: string;
}

export interface RepositoryStatus {
  readonly line: string;
  readonly present: boolean;
  /** file:line of every active copy. */
  readonly locations: string[];
}

export interface EnsureRepositoryResult {
  readonly target: string;
  readonly added: string[];
  readonly backup: Backup | null;
}

export interface ReconcilerOptions {
  config: Pick<AppConfig, "sources" | "backup">;
  writer?: AtomicFileWriter;
  logger?: Logger;
}

export class SourceReconciler {
  readonly backups: BackupManager;
  private readonly dedup: Deduplicator;
  private readonly writer: AtomicFileWriter;
  private readonly config: ReconcilerOptions["config"];
  private readonly log: Logger;

  constructor(options: ReconcilerOptions) {
    this.config = options.config;
    this.writer = options.writer ?? new AtomicFileWriter();
    const logger = options.logger ?? rootLogger;
    this.log = logger.child({ component: "reconciler" });
    this.backups = new BackupManager({ root: options.config.backup.root, marker: this.marker, writer: this.writer, logger });
    this.dedup = new Deduplicator({ marker: this.marker, writer: this.writer, logger });
  }

  get marker(): string {
    return this.config.sources.marker;
  }

  /** sources.list followed by sources.list.d/*.list. */
  async defaultFiles(): Promise<string[]> {
    return expandSourceFiles(this.config.sources.main_list, this.config.sources.parts_dir);
  }

  async scan(files?: readonly string[]): Promise<ScanResult> {
    const paths = files ?? (await this.defaultFiles());
    const collected = await collect(paths, this.marker);
    const groups = detect(collected.entries);
    const report = formatReport(groups);
    this.log.info(
      { files: paths.length, entries: collected.entries.length, duplicateGroups: groups.filter(isActionable).length },
      "Scan complete",
    );
    return { ...collected, groups, report };
  }

  /** What apply would change, without touching anything. */
  async plan(files?: readonly string[]): Promise<{ scan: ScanResult; plan: FilePlan[] }> {
    const scan = await this.scan(files);
    return { scan, plan: this.dedup.plan(scan.groups, scan.files.map((f) => f.path)) };
  }

  /**
   * Snapshot the files that will change, then comment every duplicate after its first
   * occurrence. A second run finds nothing to do: marked lines never join a group.
   */
  async apply(files?: readonly string[], options: { signal?: AbortSignal } = {}): Promise<ApplyResult> {
    const { scan, plan } = await this.plan(files);
    if (plan.length === 0) {
      this.log.info("No duplicate entries, nothing to apply");
      return { backup: null, rewritten: [], commented: 0, report: scan.report };
    }
    const targets = plan.map((p) => p.file);
    const backup = await this.backups.snapshot(targets);
    const result = await this.dedup.apply(scan.groups, targets, backup, options.signal);
    this.log.info({ backupId: backup.id, rewritten: result.rewritten, commented: result.commented }, "Deduplication applied");
    return { backup, ...result, report: scan.report };
  }

  /** Restore by backup (object or id), or strip markers from a file list. */
  async undo(target: Backup | string | readonly string[]): Promise<string[]> {
    if (typeof target === "string" || !isFileList(target)) return this.backups.restoreFromBackup(target);
    return this.backups.undoMarkers(target);
  }

  /** Which official lines are provided by an active entry, and where. See providesRepository(). */
  async checkRepository(distro: DistroRepository, files?: readonly string[]): Promise<RepositoryStatus[]> {
    const { entries } = await this.scan(files);
    return repositoryLines(distro).map((line) => {
      const locations = entries.filter((e) => providesRepository(e.raw, line)).map((e) => `${e.file}:${e.line}`);
      return { line, present: locations.length > 0, locations };
    });
  }

  /**
   * Append the distro's missing repository lines to target, after a snapshot of it.
   * Presence is judged across target plus the scanned files, so nothing already active is added twice.
   */
  async ensureRepository(distro: DistroRepository, target: string, files?: readonly string[]): Promise<EnsureRepositoryResult> {
    const scanned = files ?? (await this.defaultFiles());
    const statuses = await this.checkRepository(distro, scanned.includes(target) ? scanned : [...scanned, target]);
    const missing = statuses.filter((s) => !s.present).map((s) => s.line);
    if (missing.length === 0) return { target, added: [], backup: null };

    const backup = await this.backups.snapshot([target]);
    const current = await readOrNull(target);
    assertSnapshotCurrent(backup, target, current);
    const { lines } = splitLines(current === null ? "" : bytesToText(current));
    const added = missing.map(encodeLine);
    try {
      await this.writer.write(target, textToBytes(joinLines({ lines: [...lines, ...added], trailingNewline: true })));
    } catch (err) {
      const error = new WriteError(target, [], [], err);
      this.log.error({ file: target, error: error.message }, "Repository addition failed");
      throw error;
    }
    this.log.info({ file: target, added: missing, backupId: backup.id }, "Repository lines added");
    return { target, added: missing, backup };
  }
}

function isFileList(value: Backup | readonly string[]): value is readonly string[] {
  return Array.isArray(value);
}

async function readOrNull(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}
