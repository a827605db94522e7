import type { z } from "zod";
import type { RiskLevel } from "./risk.js";
import type { ToolResponse } from "./response.js";

/** Metadata declared by every tool at registration time. */
export interface ToolMetadata {
  readonly name: string;
  readonly description: string;
  readonly module: string;
  readonly riskLevel: RiskLevel;
  readonly inputShape: z.ZodRawShape;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
  };
}

/** A registered tool. execute() validates raw arguments against the input shape. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>) => Promise<ToolResponse>;
}
