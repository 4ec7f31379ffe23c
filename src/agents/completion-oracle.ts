/**
 * Cliniq - Completion Oracle
 *
 * The router's only view of the language model: messages in, text out. The
 * text is untrusted; everything downstream copes with malformed output.
 */

import OpenAI from "openai";
import type { RouterConfig } from "../config/router-config.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  maxTokens: number;
}

export interface CompletionOracle {
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAiOracleOptions {
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  logger?: Logger;
}

/** OpenAI-compatible chat completions (local servers included). No retries. */
export class OpenAiCompletionOracle implements CompletionOracle {
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(private readonly opts: OpenAiOracleOptions) {
    this.client = new OpenAI({
      baseURL: opts.baseUrl,
      // Local servers ignore the key but the SDK requires one.
      apiKey: opts.apiKey || "unused",
      timeout: opts.timeoutMs,
      maxRetries: 0,
    });
    this.logger = opts.logger ?? silentLogger;
  }

  static fromConfig(llm: RouterConfig["llm"], model: string, logger?: Logger): OpenAiCompletionOracle {
    return new OpenAiCompletionOracle({
      baseUrl: llm.baseUrl,
      apiKey: llm.apiKey,
      model,
      temperature: llm.temperature,
      timeoutMs: llm.timeoutMs,
      logger,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.opts.model,
      messages: request.messages,
      max_tokens: request.maxTokens,
      temperature: this.opts.temperature,
    });
    const text = response.choices[0]?.message?.content ?? "";
    this.logger.debug(`Completion (${request.maxTokens} max tokens): ${text.slice(0, 120)}`);
    return text;
  }
}
