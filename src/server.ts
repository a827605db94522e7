#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { FuserLockProbe, KillSignaller } from "./lock/probe.js";
import { SafetyGate } from "./safety/gate.js";
import { SourceReconciler } from "./sources/reconciler.js";
import { systemClock } from "./shared/clock.js";
import { messageOf } from "./shared/errors.js";
import { ToolRegistry } from "./tools/registry.js";
import { mcpAnnotations } from "./tools/helpers.js";
import type { ServerContext } from "./tools/context.js";

import { registerSourceTools } from "./tools/sources/index.js";
import { registerLockTools } from "./tools/lock/index.js";

export function createContext(options: { configPath?: string; osReleasePath?: string } = {}): ServerContext {
  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(options.configPath);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Wire components ──────────────────────────────────
  const executor = new LocalExecutor();
  const ctx: ServerContext = {
    config,
    reconciler: new SourceReconciler({ config }),
    lockProbe: new FuserLockProbe(executor, config),
    signaller: new KillSignaller(executor, config),
    safetyGate: new SafetyGate(config.safety),
    registry: new ToolRegistry(),
    clock: systemClock,
    osReleasePath: options.osReleasePath ?? "/etc/os-release",
    configPath,
    firstRun,
  };

  // ── Phase 3: Register tool modules ────────────────────────────
  registerSourceTools(ctx);
  registerLockTools(ctx);
  logger.info({ toolCount: ctx.registry.size }, "All tool modules registered");
  return ctx;
}

async function main(): Promise<void> {
  logger.info("Starting apt-sources-mcp server");
  const ctx = createContext({ configPath: process.env.APT_SOURCES_CONFIG });

  const server = new McpServer({ name: "apt-sources-mcp", version: "0.1.0" });

  for (const tool of ctx.registry.list()) {
    const meta = tool.metadata;
    server.registerTool(
      meta.name,
      {
        title: meta.name,
        description: meta.description,
        inputSchema: meta.inputShape,
        annotations: mcpAnnotations(meta),
      },
      async (args: Record<string, unknown>) => {
        // execute() never throws: failures come back as error or blocked responses.
        const response = await tool.execute(args);
        return { content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }] };
      },
    );
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: ctx.registry.size }, "apt-sources-mcp server running on stdio");
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ error: messageOf(err) }, "Fatal startup error");
    process.exit(1);
  });
}
