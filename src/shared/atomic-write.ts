import { open, rename, rm, stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { randomBytes } from "node:crypto";
import { errnoCode } from "./errors.js";

export interface AtomicWriterOps {
  rename(from: string, to: string): Promise<void>;
}

/**
 * Temp-write, fsync, rename. Readers see either the old file or the new one, never
 * a partial write. The temp file sits beside the target (same filesystem, so rename
 * is atomic) and is deleted on every exit path that did not commit it.
 */
export class AtomicFileWriter {
  constructor(private readonly ops: AtomicWriterOps = { rename }) {}

  async write(target: string, content: string | Buffer): Promise<void> {
    const temp = join(dirname(target), `.${basename(target)}.${randomBytes(4).toString("hex")}.tmp`);
    const mode = await existingMode(target);
    let committed = false;
    try {
      const handle = await open(temp, "wx", mode ?? 0o644);
      try {
        await handle.writeFile(content);
        if (mode !== undefined) await handle.chmod(mode);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await this.ops.rename(temp, target);
      committed = true;
    } finally {
      if (!committed) await rm(temp, { force: true });
    }
  }
}

async function existingMode(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).mode & 0o7777;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return undefined;
    throw err;
  }
}
