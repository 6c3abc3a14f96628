// src/sanitizers.ts — Clean-up steps for plain-text LLM replies

import { GenerationError } from "./types.js";

export type SanitizerFn = (text: string) => string;

export interface SanitizerEntry {
  sanitizer: SanitizerFn;
  /** On failure, pass the input through unchanged instead of aborting. */
  failSilent?: boolean;
}

export type Sanitizer = SanitizerFn | SanitizerEntry;

export const trim: SanitizerFn = (text) => text.trim();

/**
 * Remove markdown code fences, keeping the fenced content.
 */
export const removeMarkdownFences: SanitizerFn = (text) =>
  text.replace(/^```[\w-]*[ \t]*\r?\n/gm, "").replace(/\r?\n```[ \t]*$/gm, "");

const DECLARATION_LINE = new RegExp(
  "^[ \\t]*(?:export\\s+(?:default\\s+)?)?(?:declare\\s+)?(?:" +
    // class Name ... {
    "(?:abstract\\s+)?class\\s+[\\w$]+[^\\n]*\\{[ \\t]*" +
    // function name<T>(...
    "|(?:async\\s+)?function\\*?\\s*[\\w$]*\\s*(?:<[^\\n]*?>)?\\([^\\n]*" +
    // const name = (...) => / function / x =>
    "|(?:const|let|var)\\s+[\\w$]+[^=\\n]*=\\s*(?:async\\s+)?(?:function\\b|\\(|[\\w$]+\\s*=>)[^\\n]*" +
    ")(?:\\r?\\n|$)",
);

/**
 * Remove a function, class or arrow-function declaration line the model
 * echoed back before the comment.
 */
export const removeDeclarationLine: SanitizerFn = (text) => text.replace(DECLARATION_LINE, "");

/**
 * Content of the first `/** … *\/` block or triple-quoted string, or the
 * input when there is none.
 */
export const extractCommentContent: SanitizerFn = (text) => {
  const block = /\/\*\*([\s\S]*?)\*\//.exec(text);
  if (block) {
    return block[1]
      .split(/\r?\n/)
      .map((line, i) => (i === 0 ? line.trim() : line.replace(/^\s*\*? ?/, "").trimEnd()))
      .join("\n");
  }
  const quoted = /('''|""")([\s\S]*?)\1/.exec(text);
  return quoted ? quoted[2] : text;
};

export const DEFAULT_SANITIZERS: readonly Sanitizer[] = [
  trim,
  { sanitizer: removeMarkdownFences, failSilent: true },
  { sanitizer: removeDeclarationLine, failSilent: true },
  extractCommentContent,
  trim,
];

export function applySanitizer(sanitizer: Sanitizer, text: string): string {
  if (typeof sanitizer === "function") {
    try {
      return sanitizer(text);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new GenerationError(`Sanitizer failed: ${msg}`, { cause: err });
    }
  }

  try {
    return sanitizer.sanitizer(text);
  } catch (err: unknown) {
    if (sanitizer.failSilent) return text;
    const msg = err instanceof Error ? err.message : String(err);
    throw new GenerationError(`Sanitizer failed: ${msg}`, { cause: err });
  }
}

export function applySanitizers(
  text: string,
  sanitizers: readonly Sanitizer[] = DEFAULT_SANITIZERS,
): string {
  return sanitizers.reduce((acc, s) => applySanitizer(s, acc), text);
}
