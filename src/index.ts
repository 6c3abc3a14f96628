// src/index.ts — Library API
// One entry point: document(); the building blocks are exported for custom wiring.

import type { DocautoOptions } from "./types.js";
import { apiKeyFromEnv, createConfig } from "./config.js";
import type { FileSystem } from "./file-discovery.js";
import { FileSystemService } from "./file-discovery.js";
import type { ChatCompletionClient } from "./llm/client.js";
import { OpenAIChatClient } from "./llm/client.js";
import { DocautoGenerator } from "./generator.js";
import { DocstringResponseParser } from "./response-parser.js";
import { DefaultProgressTracker } from "./tracker.js";
import { DocTransformer } from "./transformer.js";
import type { ProcessSummary } from "./service.js";
import { DocumentationService } from "./service.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { getPreset } from "./presets.js";

export type {
  ApiConfig,
  GenerationConfig,
  DocautoConfig,
  DocautoOptions,
  DocumentableUnit,
  ExistingDoc,
  UnitKind,
  TrackedObjectState,
  Warning,
} from "./types.js";
export {
  DOCAUTO_VERSION,
  ConfigError,
  UsageError,
  FileNotFoundError,
  InvalidSourceError,
  GenerationError,
  ContextLimitError,
} from "./types.js";

export { apiKeyFromEnv, createConfig, DEFAULT_CONSTRAINTS, DEFAULT_IGNORE_PATTERNS } from "./config.js";
export {
  ConfigurationManager,
  YamlConfigParser,
  JsonConfigParser,
  DEFAULT_CONFIG_FILES,
} from "./config-file.js";
export type { ConfigFileParser, ConfigFileContents } from "./config-file.js";
export {
  getPreset,
  registerPreset,
  unregisterPreset,
  listPresets,
  hasPreset,
} from "./presets.js";
export type { Preset } from "./presets.js";
export { discoverFiles, resolvePaths, validatePaths, FileSystemService } from "./file-discovery.js";
export type { FileSystem } from "./file-discovery.js";
export { extractUnits, isIgnored } from "./unit-extractor.js";
export { applySanitizers, DEFAULT_SANITIZERS } from "./sanitizers.js";
export type { Sanitizer, SanitizerEntry, SanitizerFn } from "./sanitizers.js";
export { DocstringResponseParser, LLMResponseParser } from "./response-parser.js";
export { OpenAIChatClient } from "./llm/client.js";
export type { ChatCompletionClient, ChatRequest, ChatMessage } from "./llm/client.js";
export { DocautoGenerator, estimateTokens } from "./generator.js";
export type { DocGenerator } from "./generator.js";
export { DocTransformer, formatDocComment } from "./transformer.js";
export type { TransformResult, UnitResult } from "./transformer.js";
export { DefaultProgressTracker } from "./tracker.js";
export type { ProgressTracker } from "./tracker.js";
export { DocumentationService } from "./service.js";
export type { ProcessSummary } from "./service.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export interface DocumentOptions extends DocautoOptions {
  /** Built-in or registered preset to start from. */
  preset?: string;
  exclude?: string[];
  overwrite?: boolean;
  dryRun?: boolean;
  /** Where API keys are looked up; defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  fs?: FileSystem;
  client?: ChatCompletionClient;
}

/**
 * Document every source file under `paths`.
 *
 * @example
 * const summary = await document(["./src"], { preset: "ollama", dryRun: true });
 */
export async function document(
  paths: string[],
  options: DocumentOptions = {},
): Promise<ProcessSummary> {
  const preset: DocautoOptions = options.preset ? getPreset(options.preset) : {};
  const config = createConfig({
    api: {
      ...preset.api,
      apiKey: apiKeyFromEnv(options.preset, options.env) ?? preset.api?.apiKey,
      ...options.api,
    },
    generation: { ...preset.generation, ...options.generation },
  });
  const logger = options.logger ?? silentLogger;
  const fs = options.fs ?? new FileSystemService();

  const transformer = new DocTransformer(
    new DocautoGenerator(options.client ?? new OpenAIChatClient(config.api), config.generation, logger),
    new DocstringResponseParser(logger),
    new DefaultProgressTracker(logger),
    { overwrite: options.overwrite ?? false, ignorePatterns: config.generation.ignorePatterns },
    logger,
  );
  const service = new DocumentationService(fs, transformer, logger);
  const files = fs.resolvePaths(paths, options.exclude ?? []);
  return service.processPaths(files, { dryRun: options.dryRun ?? false });
}
