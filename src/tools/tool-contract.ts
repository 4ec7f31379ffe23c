/**
 * Cliniq - Tool Contract
 *
 * Every concrete tool declares a unique name and a TypeBox input schema (plain
 * JSON Schema on the wire), executes through `invoke`, and is called by the
 * router through `safeInvoke`, which validates first and turns every failure
 * into a structured ToolResult.
 */

import type { Static, TObject, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { errorMessage } from "../errors.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";

export type ToolErrorKind = "validation" | "execution";

export type ToolResult<R = unknown> =
  | { success: true; result: R; error: null }
  | { success: false; result: null; error: string; errorKind: ToolErrorKind };

export interface ToolSchema<T extends TObject = TObject> {
  name: string;
  description: string;
  inputSchema: T;
  outputSchema?: TSchema;
}

export interface ClinicalTool<T extends TObject = TObject, R = unknown> {
  readonly name: string;
  readonly schema: ToolSchema<T>;
  invoke(params: Static<T>): Promise<R>;
  safeInvoke(params: unknown): Promise<ToolResult<R>>;
  /** Release held connections / clients. */
  cleanup?(): Promise<void>;
}

export type AnyClinicalTool = ClinicalTool<TObject, unknown>;

export interface ToolDefinition<T extends TObject, R> {
  name: string;
  description: string;
  inputSchema: T;
  outputSchema?: TSchema;
  invoke(params: Static<T>): Promise<R>;
  cleanup?(): Promise<void>;
  logger?: Logger;
}

/** First schema violation as `path: message`, or the root message. */
export function describeValidationError(schema: TSchema, value: unknown): string {
  const first = Value.Errors(schema, value).First();
  if (!first) return "invalid input";
  return first.path ? `${first.path}: ${first.message}` : first.message;
}

export function defineTool<T extends TObject, R>(definition: ToolDefinition<T, R>): ClinicalTool<T, R> {
  const logger = definition.logger ?? silentLogger;
  const schema: ToolSchema<T> = {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    outputSchema: definition.outputSchema,
  };

  const tool: ClinicalTool<T, R> = {
    name: definition.name,
    schema,
    invoke: (params) => definition.invoke(params),

    async safeInvoke(params) {
      if (!Value.Check(definition.inputSchema, params)) {
        const detail = describeValidationError(definition.inputSchema, params);
        logger.error(`Tool ${definition.name} validation error: ${detail}`);
        return { success: false, result: null, error: `Validation error: ${detail}`, errorKind: "validation" };
      }
      try {
        const result = await definition.invoke(params);
        logger.debug(`Tool ${definition.name} executed successfully`);
        return { success: true, result, error: null };
      } catch (err) {
        logger.error(`Tool ${definition.name} execution error: ${errorMessage(err)}`);
        return {
          success: false,
          result: null,
          error: `Execution error: ${errorMessage(err)}`,
          errorKind: "execution",
        };
      }
    },
  };

  if (definition.cleanup) tool.cleanup = definition.cleanup;
  return tool;
}
