export interface BackupFile {
  readonly path: string;
  readonly existed: boolean;
  /** sha256 of the snapshot bytes; null when the file did not exist. */
  readonly sha256: string | null;
  /** Blob name under the backup directory; null when the file did not exist. */
  readonly blob: string | null;
}

/** A snapshot of a file set taken before any mutation of it. */
export interface Backup {
  readonly id: string;
  readonly createdAt: string;
  readonly dir: string;
  readonly files: BackupFile[];
}
