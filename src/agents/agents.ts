/**
 * Cliniq - Agent Assembly
 *
 * Wires config, tool plugins, the completion oracle and a skill catalog into
 * a ready SkillRouter. Anything the caller injects (oracle, warehouse, fetch,
 * clock) replaces what would otherwise be built from config.
 */

import type { RouterConfig } from "../config/router-config.ts";
import { errorMessage } from "../errors.ts";
import { createLogger, type Logger } from "../logging/logger.ts";
import { loadToolPlugins, type FetchLike, type ToolPlugin } from "../tools/plugin-host.ts";
import { ToolRegistry } from "../tools/tool-registry.ts";
import { PgWarehouseConnection, getConnectionConfig, type WarehouseConnection } from "../warehouse/connection.ts";
import warehouseAnalyticsPlugin from "../../extensions/warehouse-analytics/index.ts";
import fhirSearchPlugin from "../../extensions/fhir-search/index.ts";
import medicalKnowledgePlugin from "../../extensions/medical-knowledge/index.ts";
import schedulingPlugin from "../../extensions/scheduling/index.ts";
import { OpenAiCompletionOracle, type CompletionOracle } from "./completion-oracle.ts";
import { SkillRouter, type RouteOutcome } from "./skill-router.ts";
import { ADMINISTRATIVE_SKILLS, CLINICAL_SKILLS, type SkillCatalog } from "./skills.ts";

export const CLINICAL_PLUGINS: ToolPlugin[] = [warehouseAnalyticsPlugin, fhirSearchPlugin, medicalKnowledgePlugin];
export const ADMINISTRATIVE_PLUGINS: ToolPlugin[] = [schedulingPlugin];

export interface AgentDependencies {
  oracle?: CompletionOracle;
  warehouse?: WarehouseConnection;
  fetch?: FetchLike;
  now?: () => Date;
  logger?: Logger;
  /** Replaces the agent's default plugin list. */
  plugins?: ToolPlugin[];
}

export interface Agent {
  readonly id: SkillCatalog["id"];
  readonly router: SkillRouter;
  readonly registry: ToolRegistry;
  ask(query: string): Promise<RouteOutcome>;
  /** Release every tool's held connections. */
  shutdown(): Promise<void>;
}

interface AssembleOptions {
  catalog: SkillCatalog;
  plugins: ToolPlugin[];
  model: string;
  warehouse?: WarehouseConnection;
}

async function assembleAgent(config: RouterConfig, deps: AgentDependencies, opts: AssembleOptions): Promise<Agent> {
  const logger = deps.logger ?? createLogger(opts.catalog.id, config.logging.level);
  const now = deps.now ?? (() => new Date());
  const registry = new ToolRegistry(logger.child("tools"));
  const { warehouse } = opts;

  try {
    await loadToolPlugins(deps.plugins ?? opts.plugins, {
      registry,
      config,
      resources: { warehouse, fetch: deps.fetch ?? fetch, now },
      logger,
    });
  } catch (err) {
    logger.error(`Tool plugin loading failed: ${errorMessage(err)}`);
    try {
      await registry.cleanup();
    } catch (cleanupErr) {
      logger.warn(`Cleanup after failed load: ${errorMessage(cleanupErr)}`);
    } finally {
      await warehouse?.close();
    }
    throw err;
  }

  const oracle = deps.oracle ?? OpenAiCompletionOracle.fromConfig(config.llm, opts.model, logger.child("llm"));
  const router = new SkillRouter({ catalog: opts.catalog, registry, oracle, logger: logger.child("router"), now });
  logger.info(`${opts.catalog.id} agent ready with tools: ${registry.names().join(", ") || "none"}`);

  return {
    id: opts.catalog.id,
    router,
    registry,
    ask: (query) => router.handle(query),
    async shutdown() {
      try {
        await registry.cleanup();
      } finally {
        await warehouse?.close();
      }
    },
  };
}

export function createClinicalAgent(config: RouterConfig, deps: AgentDependencies = {}): Promise<Agent> {
  const warehouse =
    deps.warehouse ??
    (config.warehouse.host
      ? new PgWarehouseConnection(getConnectionConfig(config.warehouse), deps.logger?.child("warehouse"))
      : undefined);
  return assembleAgent(config, deps, {
    catalog: CLINICAL_SKILLS,
    plugins: CLINICAL_PLUGINS,
    model: config.llm.model,
    warehouse,
  });
}

export function createAdministrativeAgent(config: RouterConfig, deps: AgentDependencies = {}): Promise<Agent> {
  return assembleAgent(config, deps, {
    catalog: ADMINISTRATIVE_SKILLS,
    plugins: ADMINISTRATIVE_PLUGINS,
    model: config.llm.adminModel ?? config.llm.model,
  });
}
