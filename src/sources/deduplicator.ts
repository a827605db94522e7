import { readFile } from "node:fs/promises";
import type { Backup } from "../types/backup.js";
import type { DuplicateGroup } from "../types/sources.js";
import { AtomicFileWriter } from "../shared/atomic-write.js";
import { ReconcileError, ReconcileErrorCode, WriteError } from "../shared/errors.js";
import { assertSnapshotCurrent } from "../backup/manager.js";
import { canonicalize, markLine } from "./canonicalize.js";
import { bytesToText, decodeLine, joinLines, splitLines, textToBytes } from "./collector.js";
import { logger as rootLogger, type Logger } from "../logger.js";

/** Lines of one file that a dedup run would comment out. */
export interface FilePlan {
  readonly file: string;
  readonly lines: { readonly line: number; readonly raw: string; readonly key: string }[];
}

export interface DedupResult {
  readonly rewritten: string[];
  readonly commented: number;
}

export interface DeduplicatorOptions {
  marker: string;
  writer?: AtomicFileWriter;
  logger?: Logger;
}

export class Deduplicator {
  private readonly marker: string;
  private readonly writer: AtomicFileWriter;
  private readonly log: Logger;

  constructor(options: DeduplicatorOptions) {
    this.marker = options.marker;
    this.writer = options.writer ?? new AtomicFileWriter();
    this.log = (options.logger ?? rootLogger).child({ component: "dedup" });
  }

  /** Per-file list of the lines to comment, files in the given order, lines ascending. */
  plan(groups: readonly DuplicateGroup[], files: readonly string[]): FilePlan[] {
    const byFile = new Map<string, FilePlan["lines"]>();
    for (const group of groups) {
      for (const occ of group.occurrences) {
        if (occ.role !== "comment") continue;
        const lines = byFile.get(occ.entry.file) ?? [];
        lines.push({ line: occ.entry.line, raw: occ.entry.raw, key: group.key });
        byFile.set(occ.entry.file, lines);
      }
    }
    const order = [...new Set([...files, ...byFile.keys()])];
    return order
      .filter((file) => byFile.has(file))
      .map((file) => ({ file, lines: (byFile.get(file) ?? []).sort((a, b) => a.line - b.line) }));
  }

  /**
   * Comment every non-first occurrence, one atomic rewrite per file, in plan order.
   * A failed write stops the batch: files already rewritten stay rewritten and the
   * WriteError lists the ones never reached. Cancellation is honoured only between files.
   */
  async apply(groups: readonly DuplicateGroup[], files: readonly string[], backup: Backup, signal?: AbortSignal): Promise<DedupResult> {
    const plans = this.plan(groups, files);
    const rewritten: string[] = [];
    let commented = 0;

    for (const [i, plan] of plans.entries()) {
      const remaining = plans.slice(i).map((p) => p.file);
      if (signal?.aborted) {
        this.log.warn({ rewritten, unprocessed: remaining }, "Deduplication cancelled between files");
        throw new ReconcileError(ReconcileErrorCode.CANCELLED, "Deduplication cancelled", { rewritten, unprocessed: remaining });
      }

      let content: Buffer;
      try {
        content = await readFile(plan.file);
        assertSnapshotCurrent(backup, plan.file, content);
      } catch (err) {
        throw this.writeFailure(plan.file, rewritten, remaining.slice(1), err);
      }

      const source = splitLines(bytesToText(content));
      let changed = 0;
      for (const { line, key } of plan.lines) {
        const current = source.lines[line - 1];
        if (current === undefined || canonicalize(decodeLine(current), this.marker) !== key) {
          throw this.writeFailure(plan.file, rewritten, remaining.slice(1), new Error(`line ${line} no longer matches the scanned entry`));
        }
        source.lines[line - 1] = markLine(current, this.marker);
        changed++;
      }

      try {
        await this.writer.write(plan.file, textToBytes(joinLines(source)));
      } catch (err) {
        throw this.writeFailure(plan.file, rewritten, remaining.slice(1), err);
      }
      rewritten.push(plan.file);
      commented += changed;
      this.log.info({ file: plan.file, commented: changed }, "Duplicate entries commented");
    }
    return { rewritten, commented };
  }

  private writeFailure(file: string, rewritten: string[], unprocessed: string[], cause: unknown): WriteError {
    const error = new WriteError(file, [...rewritten], unprocessed, cause);
    this.log.error({ file, rewritten, unprocessed, error: error.message }, "Rewrite failed, remaining files left untouched");
    return error;
  }
}
