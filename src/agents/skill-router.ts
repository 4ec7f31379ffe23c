/**
 * Cliniq - Skill Router
 *
 * One request runs through
 *
 *   ROUTING → PARAM_EXTRACTION → TOOL_INVOKE → SYNTHESIS → DONE
 *
 * with FAILED reachable from every state. Routing that names no known skill
 * answers from the model directly and goes straight to DONE. A failed tool
 * call ends in DONE with the tool's error text; a failed completion call or a
 * skill whose tool is not registered ends in FAILED. Nothing is retried.
 */

import { ToolNotRegisteredError, errorMessage } from "../errors.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import type { JsonObject } from "../shared/json.ts";
import type { ToolResult } from "../tools/tool-contract.ts";
import type { ToolRegistry } from "../tools/tool-registry.ts";
import type { ChatMessage, CompletionOracle } from "./completion-oracle.ts";
import { ParameterNormalizer } from "./parameter-normalizer.ts";
import { extractJsonObject, extractSkillChoice } from "./response-extractor.ts";
import { renderPrompt, routingPrompt, synthesisPrompt, type SkillCatalog, type SkillDefinition } from "./skills.ts";

export type RouterState = "ROUTING" | "PARAM_EXTRACTION" | "TOOL_INVOKE" | "SYNTHESIS" | "DONE" | "FAILED";

export const TOKEN_BUDGETS = {
  routing: 50,
  parameters: 200,
  synthesis: 1000,
  general: 1500,
} as const;

export type RouteOutcome =
  | {
      state: "DONE";
      text: string;
      skill?: string;
      parameters?: JsonObject;
      toolResult?: ToolResult;
      trace: RouterState[];
    }
  | {
      state: "FAILED";
      error: string;
      failedAt: RouterState;
      skill?: string;
      trace: RouterState[];
    };

export interface SkillRouterOptions {
  catalog: SkillCatalog;
  registry: ToolRegistry;
  oracle: CompletionOracle;
  normalizer?: ParameterNormalizer;
  logger?: Logger;
  now?: () => Date;
}

class OracleError extends Error {
  constructor(readonly state: RouterState, cause: unknown) {
    super(`Completion failed during ${state}: ${errorMessage(cause)}`);
    this.name = "OracleError";
  }
}

export class SkillRouter {
  readonly catalog: SkillCatalog;
  private readonly registry: ToolRegistry;
  private readonly oracle: CompletionOracle;
  private readonly normalizer: ParameterNormalizer;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: SkillRouterOptions) {
    this.catalog = opts.catalog;
    this.registry = opts.registry;
    this.oracle = opts.oracle;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? (() => new Date());
    this.normalizer = opts.normalizer ?? new ParameterNormalizer({ now: this.now, logger: this.logger });
  }

  /** The skill the model picked, or undefined for the general fallback. */
  async route(query: string): Promise<SkillDefinition | undefined> {
    const raw = await this.ask(
      "ROUTING",
      [
        { role: "system", content: this.catalog.routingSystemPrompt },
        { role: "user", content: routingPrompt(this.catalog, query) },
      ],
      TOKEN_BUDGETS.routing,
    );
    const choice = extractSkillChoice(raw);
    const skill = choice && Object.hasOwn(this.catalog.skills, choice) ? this.catalog.skills[choice] : undefined;
    if (!skill) this.logger.info(`No skill resolved from routing output (${choice ?? "none"}), answering directly`);
    return skill;
  }

  /** Run one request to a terminal state. Never rejects. */
  async handle(query: string): Promise<RouteOutcome> {
    const trace: RouterState[] = [];
    let state: RouterState = "ROUTING";
    let skillName: string | undefined;
    const enter = (next: RouterState) => {
      state = next;
      trace.push(next);
    };

    try {
      enter("ROUTING");
      const skill = await this.route(query);
      if (!skill) {
        const text = await this.answerDirectly(query);
        enter("DONE");
        return { state: "DONE", text, trace };
      }
      skillName = skill.name;
      this.logger.info(`Routed to skill: ${skill.name}`);

      enter("PARAM_EXTRACTION");
      const tool = this.registry.get(skill.tool);
      if (!tool) {
        // No point asking for parameters nobody can take.
        enter("TOOL_INVOKE");
        const error = new ToolNotRegisteredError(skill.tool, skill.name);
        this.logger.error(error.message);
        enter("FAILED");
        return { state: "FAILED", error: error.message, failedAt: "TOOL_INVOKE", skill: skill.name, trace };
      }

      const raw = await this.ask(
        "PARAM_EXTRACTION",
        [
          { role: "system", content: this.catalog.parameterSystemPrompt },
          {
            role: "user",
            content: renderPrompt(skill.promptTemplate, {
              query,
              today: this.now().toISOString().slice(0, 10),
            }),
          },
        ],
        TOKEN_BUDGETS.parameters,
      );
      const parameters = this.normalizer.normalize(
        { skill: skill.name, extracted: extractJsonObject(raw), queryText: query },
        tool.schema.inputSchema,
      );

      enter("TOOL_INVOKE");
      const toolResult = await tool.safeInvoke(parameters);
      if (!toolResult.success) {
        enter("DONE");
        return {
          state: "DONE",
          text: `Tool execution failed: ${toolResult.error}`,
          skill: skill.name,
          parameters,
          toolResult,
          trace,
        };
      }

      enter("SYNTHESIS");
      const text = await this.ask(
        "SYNTHESIS",
        [
          { role: "system", content: this.catalog.synthesisSystemPrompt },
          { role: "user", content: synthesisPrompt(query, toolResult.result) },
        ],
        TOKEN_BUDGETS.synthesis,
      );
      enter("DONE");
      return { state: "DONE", text, skill: skill.name, parameters, toolResult, trace };
    } catch (err) {
      const failedAt = err instanceof OracleError ? err.state : state;
      this.logger.error(`Request failed in ${failedAt}: ${errorMessage(err)}`);
      enter("FAILED");
      return { state: "FAILED", error: errorMessage(err), failedAt, skill: skillName, trace };
    }
  }

  private answerDirectly(query: string): Promise<string> {
    return this.ask(
      "ROUTING",
      [
        { role: "system", content: this.catalog.generalSystemPrompt },
        { role: "user", content: query },
      ],
      TOKEN_BUDGETS.general,
    );
  }

  private async ask(state: RouterState, messages: ChatMessage[], maxTokens: number): Promise<string> {
    try {
      return await this.oracle.complete({ messages, maxTokens });
    } catch (err) {
      throw new OracleError(state, err);
    }
  }
}
