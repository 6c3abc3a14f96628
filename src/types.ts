// src/types.ts — Shared types for docauto

// ─── Configuration ──────────────────────────────────────────────────────────

export interface ApiConfig {
  baseUrl: string;
  apiKey: string;
}

export interface GenerationConfig {
  model: string;
  maxContext: number;
  constraints: string[];
  /** Globs matched against a unit's name and qualified name. */
  ignorePatterns: string[];
  /** Character cap applied to the user prompt. */
  promptLengthLimit: number;
  /** Tokens kept free for the reply when checking the context window. */
  minResponseTokens: number;
  temperature: number;
  /** Ask the model for a JSON envelope instead of bare comment text. */
  structuredOutput: boolean;
}

export interface DocautoConfig {
  api: ApiConfig;
  generation: GenerationConfig;
}

/** Partial, user-facing shape shared by presets, config files and CLI flags. */
export interface DocautoOptions {
  api?: Partial<ApiConfig>;
  generation?: Partial<GenerationConfig>;
}

// ─── Warnings ───────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Documentable units ─────────────────────────────────────────────────────

export type UnitKind =
  | "function"
  | "arrow-function"
  | "class"
  | "method"
  | "constructor";

export interface ExistingDoc {
  /** Comment body without the delimiters and leading asterisks. */
  text: string;
  start: number;
  end: number;
}

export interface DocumentableUnit {
  filePath: string;
  name: string;
  /** `Class.member` for class members, otherwise the plain name. */
  qualifiedName: string;
  kind: UnitKind;
  parentClass?: string;
  /** Declaration source, without leading trivia. */
  source: string;
  existingDoc?: ExistingDoc;
  /** Offset where a new comment is inserted. */
  insertAt: number;
  /** Whitespace prefix of the declaration's first line. */
  indent: string;
  /** 1-based line of the declaration. */
  line: number;
}

export type TrackedObjectState = "pending" | "processed" | "failed" | "skipped";

// ─── Constants ──────────────────────────────────────────────────────────────

export const DOCAUTO_VERSION = "0.1.0";

export const DEFAULT_EXCLUDE_DIRS: readonly string[] = [
  "node_modules",
  "dist",
  "build",
  "out",
  "coverage",
  ".git",
  ".next",
  ".turbo",
  ".cache",
];

export const SOURCE_EXTENSIONS = /\.(ts|tsx|mts|cts|js|jsx|mjs|cjs)$/;
export const DTS_EXTENSION = /\.d\.(ts|tsx|mts|cts)$/;

// ─── Errors ─────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`File not found: ${filePath}`, { cause });
    this.name = "FileNotFoundError";
  }
}

export class InvalidSourceError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
  ) {
    super(message);
    this.name = "InvalidSourceError";
  }
}

export class GenerationError extends Error {
  readonly statusCode?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; statusCode?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = "GenerationError";
    this.statusCode = options?.statusCode;
  }
}

export class ContextLimitError extends Error {
  constructor(
    public readonly promptTokens: number,
    public readonly limit: number,
  ) {
    super("Prompt exceeds max_context limit.");
    this.name = "ContextLimitError";
  }
}
