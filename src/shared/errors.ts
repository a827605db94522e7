export enum ReconcileErrorCode {
  SCAN_FAILED = "SCAN_FAILED",
  WRITE_FAILED = "WRITE_FAILED",
  BACKUP_FAILED = "BACKUP_FAILED",
  RESTORE_FAILED = "RESTORE_FAILED",
  LOCK_TIMEOUT = "LOCK_TIMEOUT",
  LOCK_PROBE_FAILED = "LOCK_PROBE_FAILED",
  CONFIG_INVALID = "CONFIG_INVALID",
  UNSUPPORTED_DISTRO = "UNSUPPORTED_DISTRO",
  CANCELLED = "CANCELLED",
}

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ReconcileErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ReconcileError";
    this.code = code;
    this.context = context;
  }
}

/** An existing source file could not be read. A missing file is not a ScanError. */
export class ScanError extends ReconcileError {
  constructor(readonly file: string, cause: unknown) {
    super(ReconcileErrorCode.SCAN_FAILED, `Cannot read source file ${file}: ${messageOf(cause)}`, { file });
    this.name = "ScanError";
  }
}

/** A file's atomic rewrite failed; files after it in the batch were left untouched. */
export class WriteError extends ReconcileError {
  constructor(
    readonly file: string,
    readonly rewritten: string[],
    readonly unprocessed: string[],
    cause: unknown,
  ) {
    super(ReconcileErrorCode.WRITE_FAILED, `Rewrite of ${file} failed: ${messageOf(cause)}`, {
      file,
      rewritten,
      unprocessed,
    });
    this.name = "WriteError";
  }
}

/** No valid snapshot exists for a file set, so it must not be mutated. */
export class BackupError extends ReconcileError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ReconcileErrorCode.BACKUP_FAILED, message, context);
    this.name = "BackupError";
  }
}

/** A backup is missing or corrupt, or writing its contents back failed. */
export class RestoreError extends ReconcileError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ReconcileErrorCode.RESTORE_FAILED, message, context);
    this.name = "RestoreError";
  }
}

/** The configuration file does not validate against the schema. */
export class ConfigError extends ReconcileError {
  constructor(message: string, readonly issues: string[]) {
    super(ReconcileErrorCode.CONFIG_INVALID, message, { issues });
    this.name = "ConfigError";
  }
}

/** The holder probe itself failed, so nothing is known about the lock. */
export class LockProbeError extends ReconcileError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ReconcileErrorCode.LOCK_PROBE_FAILED, message, context);
    this.name = "LockProbeError";
  }
}

/** The lock was never released and its holders were not (or could not be) terminated. */
export class LockTimeoutError extends ReconcileError {
  constructor(
    readonly resource: string,
    readonly holders: number[],
    readonly waitedMs: number,
    reason: string,
  ) {
    super(ReconcileErrorCode.LOCK_TIMEOUT, `${resource} is still locked by PID ${holders.join(", ")}: ${reason}`, {
      resource,
      holders,
      waitedMs,
    });
    this.name = "LockTimeoutError";
  }
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node fs errors carry an errno code; anything else has none. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}
