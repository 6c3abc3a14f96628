// src/llm/client.ts — Chat-completions client for OpenAI-compatible endpoints

import OpenAI, { type ClientOptions } from "openai";
import type { ApiConfig } from "../types.js";
import { GenerationError } from "../types.js";

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  /** Ask for a JSON object reply. */
  jsonMode: boolean;
}

export interface ChatCompletionClient {
  complete(request: ChatRequest): Promise<string>;
}

export interface OpenAIChatClientOptions {
  timeoutMs?: number;
  maxRetries?: number;
  /** Custom fetch, e.g. for proxies or tests. */
  fetch?: ClientOptions["fetch"];
}

/**
 * Talks to any endpoint speaking the OpenAI chat-completions protocol
 * (OpenAI, Gemini's compatibility layer, DeepSeek, Ollama).
 */
export class OpenAIChatClient implements ChatCompletionClient {
  private readonly client: OpenAI;

  constructor(api: ApiConfig, options: OpenAIChatClientOptions = {}) {
    this.client = new OpenAI({
      baseURL: api.baseUrl,
      apiKey: api.apiKey,
      timeout: options.timeoutMs ?? 120_000,
      maxRetries: options.maxRetries ?? 2,
      fetch: options.fetch,
    });
  }

  async complete(request: ChatRequest): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        response_format: request.jsonMode ? { type: "json_object" } : undefined,
      });
      content = response.choices[0]?.message?.content;
    } catch (err: unknown) {
      if (err instanceof OpenAI.APIError) {
        // Truncate error body to avoid leaking sensitive data in logs
        const safeMessage = err.message.slice(0, 200);
        throw new GenerationError(`LLM API returned ${err.status ?? "an error"}: ${safeMessage}`, {
          cause: err,
          statusCode: err.status,
        });
      }
      throw err;
    }

    if (!content) {
      throw new GenerationError("LLM response missing content");
    }
    return content;
  }
}
