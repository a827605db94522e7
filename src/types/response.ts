import type { RiskLevel } from "./risk.js";

/** Error categories reported by tools. */
export type ErrorCategory =
  | "not_found"
  | "io"
  | "backup"
  | "lock"
  | "validation"
  | "state";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error" | "blocked" | "confirmation_required";
  tool: string;
  duration_ms: number | null;
}

export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  summary?: string;
  dry_run?: boolean;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  remediation: string[];
  context?: Record<string, unknown>;
}

/**
 * Blocked response for package-database lock contention.
 * Distinct from ErrorResponse so the caller can tell "another process holds the lock"
 * from "the operation failed".
 */
export interface BlockedResponse extends ResponseBase {
  status: "blocked";
  error_code: string;
  error_category: "lock";
  message: string;
  holders: number[];
  remediation: string[];
}

export interface ConfirmationResponse extends ResponseBase {
  status: "confirmation_required";
  risk_level: RiskLevel;
  dry_run_available: boolean;
  preview: {
    action: string;
    description: string;
    warnings: string[];
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | BlockedResponse | ConfirmationResponse;
