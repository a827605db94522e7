// Every state-changing tool asks the gate before touching anything. At or above the
// configured threshold the first call returns a preview; the caller repeats it with
// `confirmed: true` to go ahead.
import type { RiskLevel } from "../types/risk.js";
import { riskAtLeast } from "../types/risk.js";
import type { AppConfig } from "../types/config.js";
import type { ConfirmationResponse } from "../types/response.js";
import { logger } from "../logger.js";

export interface GateRequest {
  toolName: string;
  riskLevel: RiskLevel;
  /** Short verb shown in the preview (deduplicate, restore, append, terminate). */
  action: string;
  description: string;
  warnings?: string[];
  confirmed?: boolean;
  dryRun?: boolean;
  /** False for tools without a dry_run argument. */
  supportsDryRun?: boolean;
}

export class SafetyGate {
  constructor(private readonly config: AppConfig["safety"]) {}

  /** Null when the operation may run now. */
  check(request: GateRequest): ConfirmationResponse | null {
    if (!this.needsConfirmation(request)) return null;

    logger.info(
      { tool: request.toolName, riskLevel: request.riskLevel, threshold: this.config.confirmation_threshold },
      "Confirmation required",
    );
    return {
      status: "confirmation_required",
      tool: request.toolName,
      // Nothing ran, so there is no duration to report.
      duration_ms: null,
      risk_level: request.riskLevel,
      dry_run_available: request.supportsDryRun !== false,
      preview: { action: request.action, description: request.description, warnings: request.warnings ?? [] },
    };
  }

  private needsConfirmation({ riskLevel, confirmed, dryRun }: GateRequest): boolean {
    if (dryRun && this.config.dry_run_bypass_confirmation) return false;
    return !confirmed && riskAtLeast(riskLevel, this.config.confirmation_threshold);
  }
}
