// src/generator.ts — Prompt assembly, context-window check, LLM call

import type { GenerationConfig } from "./types.js";
import { ContextLimitError, GenerationError, InvalidSourceError } from "./types.js";
import type { ChatCompletionClient, ChatMessage } from "./llm/client.js";
import type { Logger } from "./logger.js";
import { errorMessage, silentLogger } from "./logger.js";

export interface DocGenerator {
  /** Raw model reply documenting `source`. */
  generate(source: string, context?: string): Promise<string>;
}

/**
 * Token estimate for a prompt. Code runs denser than prose, so ~3.5
 * characters per token.
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / 3.5);
}

const RESPONSE_SHAPE = `Reply with a JSON object of this exact shape and nothing else:
{"responses": [{"content": "<the documentation comment text>", "format": "jsdoc"}]}`;

export class DocautoGenerator implements DocGenerator {
  constructor(
    private readonly client: ChatCompletionClient,
    readonly config: GenerationConfig,
    private readonly logger: Logger = silentLogger,
  ) {}

  async generate(source: string, context?: string): Promise<string> {
    if (source.trim() === "") {
      throw new InvalidSourceError("source cannot be empty");
    }

    const systemPrompt = this.buildSystemPrompt();
    const userPrompt = this.buildPrompt(source, context);

    const promptTokens = estimateTokens(`${systemPrompt}\n${userPrompt}\n`);
    const budget = this.config.maxContext - this.config.minResponseTokens;
    if (promptTokens > budget) {
      throw new ContextLimitError(promptTokens, budget);
    }

    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: userPrompt },
    ];

    try {
      return await this.client.complete({
        model: this.config.model,
        messages,
        temperature: this.config.temperature,
        maxTokens: this.config.maxContext - promptTokens,
        jsonMode: this.config.structuredOutput,
      });
    } catch (err: unknown) {
      this.logger.error(`Documentation generation failed: ${errorMessage(err)}`);
      throw new GenerationError("Failed to generate documentation", {
        cause: err,
        statusCode: err instanceof GenerationError ? err.statusCode : undefined,
      });
    }
  }

  /**
   * Fenced source plus optional context, cut to `promptLengthLimit` characters.
   */
  buildPrompt(source: string, context?: string): string {
    const lines = ["```ts", source.trim(), "```"];
    if (context) lines.push(`Additional context: ${context}`);

    const prompt = lines.join("\n");
    const limit = this.config.promptLengthLimit;
    if (prompt.length <= limit) return prompt;

    this.logger.warn(
      `Prompt was trimmed from ${prompt.length} to ${limit} characters to fit context window`,
    );
    return prompt.slice(0, limit);
  }

  buildSystemPrompt(): string {
    const constraints = this.config.constraints.map((c, i) => `${i + 1}. ${c}`).join("\n");
    const sections = [
      "You're a professional documentation writer.",
      "You'll be given the source code of a TypeScript or JavaScript function, method or class and you write its documentation comment.",
      `System constraints:
1. Keep it short, precise and accurate.
2. Don't ask questions.
3. Don't make assumptions. Use only the facts in the provided code.
4. Don't include the comment delimiters (/** and */) or leading asterisks.
5. Use JSDoc tags unless the user constraints name another format.`,
      `User constraints:\n${constraints}`,
    ];
    if (this.config.structuredOutput) sections.push(RESPONSE_SHAPE);
    return sections.join("\n\n");
  }
}
