// src/response-parser.ts — LLM reply → doc comment text

import { z } from "zod";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { Sanitizer } from "./sanitizers.js";
import { applySanitizers, DEFAULT_SANITIZERS, removeMarkdownFences } from "./sanitizers.js";

export const docstringSingleResponseSchema = z.object({
  content: z.string(),
  format: z.string().default("jsdoc"),
  metadata: z.record(z.unknown()).default({}),
});

export const docstringResponseSchema = z.object({
  responses: z.array(docstringSingleResponseSchema).min(1),
  metadata: z.record(z.unknown()).default({}),
});

export type DocstringSingleResponse = z.infer<typeof docstringSingleResponseSchema>;
export type DocstringResponse = z.infer<typeof docstringResponseSchema>;

/**
 * Generic schema-backed parser. Returns undefined when the text is not
 * JSON or does not match the schema.
 */
export class LLMResponseParser<T> {
  constructor(private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>) {}

  tryParse(raw: string): T | undefined {
    let json: unknown;
    try {
      json = JSON.parse(removeMarkdownFences(raw.trim()));
    } catch {
      return undefined;
    }
    const result = this.schema.safeParse(json);
    return result.success ? result.data : undefined;
  }
}

export class DocstringResponseParser {
  private readonly envelope = new LLMResponseParser(docstringResponseSchema);

  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly sanitizers: readonly Sanitizer[] = DEFAULT_SANITIZERS,
  ) {}

  /**
   * Comment text from a reply: the first entry of the JSON envelope when
   * present, otherwise the sanitized plain text. Returns "" when empty.
   */
  parse(raw: string): string {
    const structured = this.envelope.tryParse(raw);
    const text = structured ? structured.responses[0].content : raw;
    if (!structured) {
      this.logger.debug("Reply is not a JSON envelope, treating it as plain text");
    }

    const content = applySanitizers(text, this.sanitizers);
    if (!content) {
      this.logger.warn("No content found in response.");
      return "";
    }
    return content;
  }
}
