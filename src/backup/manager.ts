// Backup manager: every mutation of a source file set is preceded by snapshot().
// Layout: <root>/<id>/manifest.json plus one blob per existing file. The manifest is
// written last, so a directory without one is an incomplete snapshot and never restorable.
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { createHash, randomBytes } from "node:crypto";
import { z } from "zod";
import type { Backup, BackupFile } from "../types/backup.js";
import { AtomicFileWriter } from "../shared/atomic-write.js";
import { BackupError, RestoreError, errnoCode, messageOf } from "../shared/errors.js";
import { bytesToText, joinLines, splitLines, textToBytes } from "../sources/collector.js";
import { isMarked, unmarkLine } from "../sources/canonicalize.js";
import { logger as rootLogger, type Logger } from "../logger.js";

const MANIFEST = "manifest.json";

/** Shape of every id generateBackupId() returns; anything else never names a backup. */
export const BACKUP_ID_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-[0-9a-f]{6}$/;

const manifestSchema = z.object({
  id: z.string().regex(BACKUP_ID_PATTERN),
  createdAt: z.string().min(1),
  files: z.array(z.object({
    path: z.string().min(1),
    existed: z.boolean(),
    sha256: z.string().nullable(),
    blob: z.string().nullable(),
  })),
});

export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export function isBackupId(id: string): boolean {
  return BACKUP_ID_PATTERN.test(id);
}

export function generateBackupId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[:.]/g, "-").slice(0, 19);
  return `${stamp}-${randomBytes(3).toString("hex")}`;
}

/**
 * Refuse to mutate a file the backup does not cover, or one that changed after the
 * snapshot was taken (a snapshot of already-mutated content is not a valid backup).
 */
export function assertSnapshotCurrent(backup: Backup, path: string, current: string | Buffer | null): void {
  const entry = backup.files.find((f) => f.path === path);
  if (!entry) {
    throw new BackupError(`Backup ${backup.id} does not cover ${path}`, { backupId: backup.id, file: path });
  }
  const currentHash = current === null ? null : sha256(current);
  if (currentHash !== entry.sha256) {
    throw new BackupError(`${path} changed after backup ${backup.id} was taken`, { backupId: backup.id, file: path });
  }
}

export interface BackupManagerOptions {
  root: string;
  marker: string;
  writer?: AtomicFileWriter;
  logger?: Logger;
}

export class BackupManager {
  private readonly root: string;
  private readonly marker: string;
  private readonly writer: AtomicFileWriter;
  private readonly log: Logger;

  constructor(options: BackupManagerOptions) {
    this.root = options.root;
    this.marker = options.marker;
    this.writer = options.writer ?? new AtomicFileWriter();
    this.log = (options.logger ?? rootLogger).child({ component: "backup" });
  }

  /** Snapshot the given files. Any failure removes the partial snapshot and throws BackupError. */
  async snapshot(paths: readonly string[]): Promise<Backup> {
    const id = generateBackupId();
    const dir = join(this.root, id);
    const unique = [...new Set(paths)];
    try {
      await mkdir(dir, { recursive: true });
      const files: BackupFile[] = [];
      for (const [i, path] of unique.entries()) {
        const content = await readIfExists(path);
        if (content === null) {
          files.push({ path, existed: false, sha256: null, blob: null });
          continue;
        }
        const blob = `${String(i).padStart(3, "0")}-${basename(path)}`;
        await writeFile(join(dir, blob), content);
        files.push({ path, existed: true, sha256: sha256(content), blob });
      }
      const backup: Backup = { id, createdAt: new Date().toISOString(), dir, files };
      await writeFile(join(dir, MANIFEST), JSON.stringify({ id, createdAt: backup.createdAt, files }, null, 2), "utf-8");
      this.log.info({ backupId: id, files: unique.length }, "Backup created");
      return backup;
    } catch (err) {
      await rm(dir, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
        this.log.warn({ dir, error: messageOf(cleanupErr) }, "Could not remove partial backup");
      });
      const error = new BackupError(`Could not snapshot source files into ${dir}: ${messageOf(err)}`, { backupId: id, files: unique });
      this.log.error({ backupId: id, code: error.code, error: error.message }, "Backup failed, no file will be modified");
      throw error;
    }
  }

  /** Read a backup's manifest. Malformed ids, missing or malformed manifests are a RestoreError. */
  async load(id: string): Promise<Backup> {
    if (!isBackupId(id)) {
      throw new RestoreError(`Invalid backup id ${JSON.stringify(id)}`, { backupId: id });
    }
    const dir = join(this.root, id);
    let raw: string;
    try {
      raw = await readFile(join(dir, MANIFEST), "utf-8");
    } catch (err) {
      throw new RestoreError(`Backup ${id} not found under ${this.root}: ${messageOf(err)}`, { backupId: id });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new RestoreError(`Backup ${id} has a corrupt manifest: ${messageOf(err)}`, { backupId: id });
    }
    const result = manifestSchema.safeParse(parsed);
    if (!result.success) {
      throw new RestoreError(`Backup ${id} has a corrupt manifest: ${result.error.issues[0]?.message ?? "invalid"}`, { backupId: id });
    }
    return { ...result.data, dir };
  }

  /** All complete backups under the root, newest first. */
  async list(): Promise<Backup[]> {
    let names: string[];
    try {
      names = await readdir(this.root);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw err;
    }
    const backups: Backup[] = [];
    for (const name of names) {
      if (!isBackupId(name)) continue;
      try {
        backups.push(await this.load(name));
      } catch (err) {
        this.log.warn({ backupId: name, error: messageOf(err) }, "Skipping unreadable backup");
      }
    }
    return backups.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id.localeCompare(a.id));
  }

  /**
   * Overwrite every covered file with its snapshot. All blobs are verified before the
   * first write, so a corrupt backup restores nothing. Files absent at snapshot time are removed.
   */
  async restoreFromBackup(target: Backup | string): Promise<string[]> {
    const backup = typeof target === "string" ? await this.load(target) : target;
    const contents = new Map<string, Buffer>();
    for (const file of backup.files) {
      if (!file.existed || file.blob === null) continue;
      let content: Buffer;
      try {
        content = await readFile(join(backup.dir, file.blob));
      } catch (err) {
        throw new RestoreError(`Backup ${backup.id} is missing its copy of ${file.path}: ${messageOf(err)}`, { backupId: backup.id, file: file.path });
      }
      if (sha256(content) !== file.sha256) {
        throw new RestoreError(`Backup ${backup.id} copy of ${file.path} is corrupt (checksum mismatch)`, { backupId: backup.id, file: file.path });
      }
      contents.set(file.path, content);
    }

    const restored: string[] = [];
    for (const file of backup.files) {
      try {
        const content = contents.get(file.path);
        if (content) await this.writer.write(file.path, content);
        else await rm(file.path, { force: true });
      } catch (err) {
        const error = new RestoreError(`Restoring ${file.path} from backup ${backup.id} failed: ${messageOf(err)}`, { backupId: backup.id, file: file.path, restored });
        this.log.error({ backupId: backup.id, file: file.path, error: error.message }, "Restore failed");
        throw error;
      }
      restored.push(file.path);
    }
    this.log.info({ backupId: backup.id, files: restored.length }, "Backup restored");
    return restored;
  }

  /**
   * Strip the marker from every marked line, in place and without any backup.
   * Returns the files that were rewritten.
   */
  async undoMarkers(paths: readonly string[]): Promise<string[]> {
    const rewritten: string[] = [];
    for (const path of paths) {
      let content: Buffer | null;
      try {
        content = await readIfExists(path);
      } catch (err) {
        throw new RestoreError(`Reading ${path} failed: ${messageOf(err)}`, { file: path, restored: rewritten });
      }
      if (content === null) continue;
      const file = splitLines(bytesToText(content));
      if (!file.lines.some((l) => isMarked(l, this.marker))) continue;
      const lines = file.lines.map((l) => unmarkLine(l, this.marker));
      try {
        await this.writer.write(path, textToBytes(joinLines({ lines, trailingNewline: file.trailingNewline })));
      } catch (err) {
        const error = new RestoreError(`Removing markers from ${path} failed: ${messageOf(err)}`, { file: path, restored: rewritten });
        this.log.error({ file: path, error: error.message }, "Marker undo failed");
        throw error;
      }
      rewritten.push(path);
    }
    this.log.info({ files: rewritten }, "Markers removed");
    return rewritten;
  }
}

async function readIfExists(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}
