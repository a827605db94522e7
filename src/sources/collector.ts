import { readFile, readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { SourceEntry, SourceFile } from "../types/sources.js";
import { ScanError, errnoCode } from "../shared/errors.js";
import { canonicalize, isExcluded } from "./canonicalize.js";
import { logger } from "../logger.js";

/** Split file content into lines, remembering whether it ended with a newline. */
export function splitLines(content: string): { lines: string[]; trailingNewline: boolean } {
  if (content === "") return { lines: [], trailingNewline: false };
  const trailingNewline = content.endsWith("\n");
  const lines = (trailingNewline ? content.slice(0, -1) : content).split("\n");
  return { lines, trailingNewline };
}

export function joinLines(file: Pick<SourceFile, "lines" | "trailingNewline">): string {
  if (file.lines.length === 0) return "";
  return file.lines.join("\n") + (file.trailingNewline ? "\n" : "");
}

/**
 * Rewrites work on a latin1 view of the file: one char per byte, so bytes that are not
 * valid UTF-8 are written back exactly as read. Only ASCII is ever inserted.
 */
export function bytesToText(content: Buffer): string {
  return content.toString("latin1");
}

export function textToBytes(text: string): Buffer {
  return Buffer.from(text, "latin1");
}

/** A line of the latin1 view, decoded the way readSourceFile() decodes it. */
export function decodeLine(line: string): string {
  return Buffer.from(line, "latin1").toString("utf-8");
}

/** Inverse of decodeLine, for lines added to a rewritten file. */
export function encodeLine(line: string): string {
  return Buffer.from(line, "utf-8").toString("latin1");
}

/** Read one source file. A missing file yields an empty, non-existent SourceFile. */
export async function readSourceFile(path: string): Promise<SourceFile> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      logger.debug({ file: path }, "Source file absent, skipped");
      return { path, lines: [], exists: false, trailingNewline: false };
    }
    const scanError = new ScanError(path, err);
    logger.error({ file: path, code: scanError.code, error: scanError.message }, "Scan failed");
    throw scanError;
  }
  return { path, exists: true, ...splitLines(content) };
}

/**
 * Drop paths naming a file already listed, keeping the first spelling and position.
 * A file read twice would have every line grouped against itself.
 */
export function uniquePaths(paths: readonly string[]): string[] {
  const seen = new Set<string>();
  return paths.filter((path) => {
    const key = resolve(path);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Read files in the given order and flatten their groupable lines into entries.
 * Ordinals follow file order, then ascending line order.
 */
export async function collect(paths: readonly string[], marker: string): Promise<{ files: SourceFile[]; entries: SourceEntry[] }> {
  const files: SourceFile[] = [];
  const entries: SourceEntry[] = [];
  for (const path of uniquePaths(paths)) {
    const file = await readSourceFile(path);
    files.push(file);
    file.lines.forEach((raw, i) => {
      if (isExcluded(raw, marker)) return;
      entries.push({ raw, canonical: canonicalize(raw, marker), file: path, line: i + 1, ordinal: entries.length });
    });
  }
  return { files, entries };
}

/**
 * The default APT file set: the main list, then every *.list file of the parts
 * directory in lexical order (the order APT itself reads them in).
 */
export async function expandSourceFiles(mainList: string, partsDir: string): Promise<string[]> {
  let parts: string[];
  try {
    parts = (await readdir(partsDir)).filter((name) => name.endsWith(".list")).sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [mainList];
    throw new ScanError(partsDir, err);
  }
  return [mainList, ...parts.map((name) => join(partsDir, name))];
}
