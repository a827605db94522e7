/** Risk levels, lowest first. A tool's level decides whether SafetyGate asks for confirmation. */
export const RISK_LEVELS = ["read-only", "low", "moderate", "high", "critical"] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

export function riskAtLeast(level: RiskLevel, threshold: RiskLevel): boolean {
  return RISK_LEVELS.indexOf(level) >= RISK_LEVELS.indexOf(threshold);
}

/** Timeouts for the external commands the engine runs. fuser and kill return at once. */
export const COMMAND_TIMEOUTS = {
  probe: 5_000,
  signal: 5_000,
} as const;
