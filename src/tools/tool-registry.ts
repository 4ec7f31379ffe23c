/**
 * Cliniq - Tool Registry
 *
 * Name-keyed lookup of tool instances. Owns the tools for the lifetime of an
 * agent and releases their held connections on cleanup.
 */

import { errorMessage } from "../errors.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import type { AnyClinicalTool, ToolSchema } from "./tool-contract.ts";

export class ToolRegistry {
  private readonly tools = new Map<string, AnyClinicalTool>();

  constructor(private readonly logger: Logger = silentLogger) {}

  register(tool: AnyClinicalTool): void {
    if (this.tools.has(tool.name)) this.logger.warn(`Replacing registered tool: ${tool.name}`);
    this.tools.set(tool.name, tool);
    this.logger.info(`Registered tool: ${tool.name}`);
  }

  get(name: string): AnyClinicalTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): Record<string, ToolSchema> {
    return Object.fromEntries([...this.tools].map(([name, tool]) => [name, tool.schema]));
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Release every tool's resources. One failing cleanup does not stop the
   * others; failures are logged and the last one is rethrown.
   */
  async cleanup(): Promise<void> {
    let failure: unknown;
    for (const tool of this.tools.values()) {
      if (!tool.cleanup) continue;
      try {
        await tool.cleanup();
      } catch (err) {
        this.logger.error(`Cleanup of ${tool.name} failed: ${errorMessage(err)}`);
        failure = err;
      }
    }
    if (failure !== undefined) throw failure;
  }
}
