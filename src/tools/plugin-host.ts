/**
 * Cliniq - Tool Plugin Host
 *
 * Tools ship as plugins (`extensions/<name>/index.ts`) that register one or
 * more tools through the API handed to `register`. The host owns the
 * registry; plugins only see the API.
 */

import type { RouterConfig } from "../config/router-config.ts";
import type { Logger } from "../logging/logger.ts";
import type { WarehouseConnection } from "../warehouse/connection.ts";
import type { AnyClinicalTool } from "./tool-contract.ts";
import type { ToolRegistry } from "./tool-registry.ts";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/** Process resources a plugin may bind its tools to. */
export interface PluginResources {
  warehouse?: WarehouseConnection;
  fetch: FetchLike;
  now: () => Date;
}

export interface ToolPluginApi {
  logger: Logger;
  config: RouterConfig;
  resources: PluginResources;
  registerTool(tool: AnyClinicalTool): void;
}

export interface ToolPlugin {
  id: string;
  name: string;
  description: string;
  version: string;
  register(api: ToolPluginApi): void | Promise<void>;
}

export interface LoadPluginsOptions {
  registry: ToolRegistry;
  config: RouterConfig;
  resources: PluginResources;
  logger: Logger;
}

/** Register plugins in order; a plugin that throws aborts loading. */
export async function loadToolPlugins(plugins: ToolPlugin[], options: LoadPluginsOptions): Promise<void> {
  for (const plugin of plugins) {
    const logger = options.logger.child(plugin.id);
    await plugin.register({
      logger,
      config: options.config,
      resources: options.resources,
      registerTool: (tool) => options.registry.register(tool),
    });
  }
}
