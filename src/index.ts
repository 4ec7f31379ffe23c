/**
 * Cliniq - public entry points
 */

export { configFromEnv, loadRouterConfig, routerConfigSchema, type RouterConfig } from "./config/router-config.ts";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logging/logger.ts";
export * from "./errors.ts";

export {
  PgWarehouseConnection,
  getConnectionConfig,
  type WarehouseConnection,
  type WarehouseQuery,
  type WarehouseRow,
} from "./warehouse/connection.ts";
export { SchemaProfile, type CapabilityMap, type ProfileDescription, type SchemaMapping } from "./warehouse/schema-profile.ts";
export { buildPopulationQuery, buildSectionQuery } from "./warehouse/query-builder.ts";
export { formatRecord } from "./warehouse/record-format.ts";

export { defineTool, type ClinicalTool, type ToolResult, type ToolSchema } from "./tools/tool-contract.ts";
export { ToolRegistry } from "./tools/tool-registry.ts";
export { loadToolPlugins, type PluginResources, type ToolPlugin, type ToolPluginApi } from "./tools/plugin-host.ts";

export { OpenAiCompletionOracle, type ChatMessage, type CompletionOracle } from "./agents/completion-oracle.ts";
export { extractJsonObject, extractSkillChoice } from "./agents/response-extractor.ts";
export { ParameterNormalizer, type NormalizeRequest } from "./agents/parameter-normalizer.ts";
export { ADMINISTRATIVE_SKILLS, CLINICAL_SKILLS, type SkillCatalog, type SkillDefinition } from "./agents/skills.ts";
export { SkillRouter, TOKEN_BUDGETS, type RouteOutcome, type RouterState } from "./agents/skill-router.ts";
export {
  createAdministrativeAgent,
  createClinicalAgent,
  type Agent,
  type AgentDependencies,
} from "./agents/agents.ts";
