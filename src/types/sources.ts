/** One APT source file as read at scan time. */
export interface SourceFile {
  readonly path: string;
  readonly lines: string[];
  /** False when the file was absent; absent files contribute no entries. */
  readonly exists: boolean;
  readonly trailingNewline: boolean;
}

/** A groupable line of a source file. */
export interface SourceEntry {
  readonly raw: string;
  readonly canonical: string;
  readonly file: string;
  /** 1-based line number within the file. */
  readonly line: number;
  /** 0-based position across the whole scan, in file order then line order. */
  readonly ordinal: number;
}

export type OccurrenceRole = "keep" | "comment";

export interface Occurrence {
  readonly entry: SourceEntry;
  /** 1-based index of this occurrence within its group. */
  readonly index: number;
  readonly role: OccurrenceRole;
}

/** Entries sharing one canonical form. Actionable when it has more than one occurrence. */
export interface DuplicateGroup {
  readonly key: string;
  readonly occurrences: Occurrence[];
}

export interface ScanResult {
  readonly files: SourceFile[];
  readonly entries: SourceEntry[];
  readonly groups: DuplicateGroup[];
  readonly report: string;
}
