import type { RegisteredTool } from "../types/tool.js";
import { logger } from "../logger.js";

/**
 * Tool registry. The MCP server lists these for tools/list; tests call execute() directly.
 * Names are unique: registering one twice is a wiring bug and throws.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    const { name, module } = tool.metadata;
    if (this.tools.has(name)) throw new Error(`Tool ${name} is already registered`);
    this.tools.set(name, tool);
    logger.debug({ tool: name, module }, "Tool registered");
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  /** Registered tools in registration order, optionally limited to one module. */
  list(module?: string): RegisteredTool[] {
    const all = [...this.tools.values()];
    return module === undefined ? all : all.filter((t) => t.metadata.module === module);
  }

  get size(): number {
    return this.tools.size;
  }
}
