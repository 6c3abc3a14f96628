// src/config.ts — Config Resolver
// Merge order: preset ← config file ← environment (API key) ← CLI flags

import type {
  ApiConfig,
  DocautoConfig,
  DocautoOptions,
  GenerationConfig,
  Warning,
} from "./types.js";
import { ConfigError, UsageError } from "./types.js";
import { BUILTIN_PRESET_NAMES, getPreset, presetApiKeyEnv } from "./presets.js";
import type { ConfigFileContents } from "./config-file.js";

export const DEFAULT_CONSTRAINTS: readonly string[] = [
  "Respond only with the documentation comment text. Never respond with code.",
  `Write the comment in JSDoc format:

Summary line.

@param name - Description of the parameter.
@returns Description of the returned value.
@throws {ErrorType} When the error is thrown.

Use one @param tag per parameter, in declaration order. Do not repeat types that the signature already declares.
Leave out @param when there are no parameters, @returns when nothing is returned, and @throws when nothing is thrown.`,
  "Single line descriptions must not end with trailing whitespace.",
];

// Constructors are described by the class comment.
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = ["constructor"];

const GENERATION_DEFAULTS = {
  maxContext: 16_384,
  promptLengthLimit: 10_000,
  minResponseTokens: 1_024,
  temperature: 0.3,
  structuredOutput: true,
} as const;

/**
 * Build a validated, frozen configuration from partial options.
 */
export function createConfig(options: DocautoOptions): DocautoConfig {
  const api = validateApi(options.api ?? {});
  const generation = validateGeneration(options.generation ?? {});
  return Object.freeze({
    api: Object.freeze(api),
    generation: Object.freeze(generation),
  });
}

function validateApi(api: Partial<ApiConfig>): ApiConfig {
  const { baseUrl, apiKey } = api;
  if (!baseUrl) throw new ConfigError("Base URL is required");
  if (!apiKey) throw new ConfigError("API key required");
  if (!isHttpUrl(baseUrl)) {
    throw new ConfigError(`Invalid base URL format: ${baseUrl}`);
  }
  return { baseUrl, apiKey };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === "http:" || url.protocol === "https:") && url.host !== "";
  } catch {
    return false;
  }
}

function validateGeneration(generation: Partial<GenerationConfig>): GenerationConfig {
  const model = generation.model;
  if (!model) throw new ConfigError("AI model is required");

  const constraints = generation.constraints ?? [...DEFAULT_CONSTRAINTS];
  if (constraints.length === 0) {
    throw new ConfigError("At least one constraint is required");
  }

  const maxContext = generation.maxContext ?? GENERATION_DEFAULTS.maxContext;
  if (!Number.isInteger(maxContext) || maxContext < 1) {
    throw new ConfigError("maxContext must be positive");
  }

  const promptLengthLimit =
    generation.promptLengthLimit ?? GENERATION_DEFAULTS.promptLengthLimit;
  if (!Number.isInteger(promptLengthLimit) || promptLengthLimit < 1) {
    throw new ConfigError("promptLengthLimit must be positive");
  }

  const minResponseTokens =
    generation.minResponseTokens ?? GENERATION_DEFAULTS.minResponseTokens;
  if (!Number.isInteger(minResponseTokens) || minResponseTokens < 0) {
    throw new ConfigError("minResponseTokens must not be negative");
  }

  const temperature = generation.temperature ?? GENERATION_DEFAULTS.temperature;
  if (temperature < 0 || temperature > 2) {
    throw new ConfigError("temperature must be between 0 and 2");
  }

  return {
    model,
    maxContext,
    constraints: [...constraints],
    ignorePatterns: [...(generation.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS)],
    promptLengthLimit,
    minResponseTokens,
    temperature,
    structuredOutput: generation.structuredOutput ?? GENERATION_DEFAULTS.structuredOutput,
  };
}

// ─── CLI ────────────────────────────────────────────────────────────────────

export interface ParsedArgs {
  paths: string[];
  preset?: string;
  baseUrl?: string;
  apiKey?: string;
  model?: string;
  maxContext?: number;
  constraints: string[];
  ignore: string[];
  exclude: string[];
  config?: string;
  dryRun: boolean;
  overwrite: boolean;
  verbose: boolean;
  quiet: boolean;
  help: boolean;
  version: boolean;
}

export interface ResolvedCliConfig extends DocautoConfig {
  preset?: string;
  paths: string[];
  exclude: string[];
  overwrite: boolean;
  dryRun: boolean;
  verbose: boolean;
  quiet: boolean;
}

const BOOLEAN_FLAGS = [
  ...BUILTIN_PRESET_NAMES,
  "dry-run",
  "overwrite",
  "verbose",
  "quiet",
  "help",
  "version",
];

const STRING_FLAGS = [
  "preset",
  "base-url",
  "api-key",
  "model",
  "max-context",
  "constraint",
  "ignore",
  "exclude",
  "config",
];

const SHORT_FLAGS: Record<string, string> = {
  b: "base-url",
  k: "api-key",
  m: "model",
  c: "constraint",
  i: "ignore",
  e: "exclude",
  d: "dry-run",
  o: "overwrite",
  v: "verbose",
  q: "quiet",
  h: "help",
};

/**
 * Parse CLI args using mri. Unknown flags and conflicting presets are usage errors.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;

  // mri only recognises names listed under `alias` once `unknown` is set.
  const alias: Record<string, string[]> = {};
  for (const flag of [...BOOLEAN_FLAGS, ...STRING_FLAGS]) alias[flag] = [];
  for (const [short, long] of Object.entries(SHORT_FLAGS)) alias[long] = [short];

  const args = mri(argv, {
    alias,
    // mri appends aliases to these arrays in place
    boolean: [...BOOLEAN_FLAGS],
    string: [...STRING_FLAGS],
    unknown: (flag: string) => {
      throw new UsageError(`Unknown option: ${flag}`);
    },
  });

  const selected: string[] = BUILTIN_PRESET_NAMES.filter((name) => args[name] === true);
  const explicitPreset = readString(args.preset);
  if (explicitPreset && !selected.includes(explicitPreset)) {
    selected.push(explicitPreset);
  }
  if (selected.length > 1) {
    throw new UsageError(`Only one preset may be selected (got: ${selected.join(", ")})`);
  }

  return {
    paths: args._.map((p) => String(p)),
    preset: selected[0],
    baseUrl: readString(args["base-url"]),
    apiKey: readString(args["api-key"]),
    model: readString(args.model),
    maxContext: readInteger(args["max-context"], "--max-context"),
    constraints: readStrings(args.constraint),
    ignore: readStrings(args.ignore),
    exclude: readStrings(args.exclude),
    config: readString(args.config),
    dryRun: args["dry-run"] === true,
    overwrite: args.overwrite === true,
    verbose: args.verbose === true,
    quiet: args.quiet === true,
    help: args.help === true,
    version: args.version === true,
  };
}

function readString(value: unknown): string | undefined {
  if (Array.isArray(value)) return readString(value[value.length - 1]);
  if (typeof value === "string" && value !== "") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function readStrings(value: unknown): string[] {
  const values: unknown[] = Array.isArray(value) ? value : [value];
  return values
    .map((v) => readString(v))
    .filter((v): v is string => v !== undefined);
}

function readInteger(value: unknown, flag: string): number | undefined {
  const raw = readString(value);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`${flag} must be a positive integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * API key from DOCAUTO_API_KEY, else from the preset's own variable.
 */
export function apiKeyFromEnv(
  presetName: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const presetKeyEnv = presetName ? presetApiKeyEnv(presetName) : undefined;
  return nonEmpty(env.DOCAUTO_API_KEY) ?? (presetKeyEnv ? nonEmpty(env[presetKeyEnv]) : undefined);
}

/**
 * Resolve the effective configuration from CLI args, config file, and environment.
 */
export function resolveConfig(
  args: ParsedArgs,
  fileConfig: ConfigFileContents | null = null,
  env: NodeJS.ProcessEnv = process.env,
  warnings: Warning[] = [],
): ResolvedCliConfig {
  if (args.preset && fileConfig?.preset && args.preset !== fileConfig.preset) {
    warnings.push({
      level: "info",
      module: "config",
      message: `Preset "${args.preset}" overrides "${fileConfig.preset}" from the config file`,
    });
  }

  const presetName = args.preset ?? fileConfig?.preset;
  const preset: DocautoOptions = presetName ? getPreset(presetName) : {};
  const envApiKey = apiKeyFromEnv(presetName, env);

  const fileApi = fileConfig?.api ?? {};
  const fileGen = fileConfig?.generation ?? {};
  const presetApi = preset.api ?? {};
  const presetGen = preset.generation ?? {};

  const config = createConfig({
    api: {
      baseUrl: args.baseUrl ?? fileApi.baseUrl ?? presetApi.baseUrl,
      apiKey: args.apiKey ?? envApiKey ?? fileApi.apiKey ?? presetApi.apiKey,
    },
    generation: {
      model: args.model ?? fileGen.model ?? presetGen.model,
      maxContext: args.maxContext ?? fileGen.maxContext ?? presetGen.maxContext,
      constraints:
        args.constraints.length > 0
          ? args.constraints
          : fileGen.constraints ?? presetGen.constraints,
      ignorePatterns: [
        ...(fileGen.ignorePatterns ?? presetGen.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS),
        ...args.ignore,
      ],
      promptLengthLimit: fileGen.promptLengthLimit ?? presetGen.promptLengthLimit,
      minResponseTokens: fileGen.minResponseTokens ?? presetGen.minResponseTokens,
      temperature: fileGen.temperature ?? presetGen.temperature,
      structuredOutput: fileGen.structuredOutput ?? presetGen.structuredOutput,
    },
  });

  return {
    ...config,
    preset: presetName,
    paths: args.paths,
    exclude: [...(fileConfig?.exclude ?? []), ...args.exclude],
    overwrite: args.overwrite || fileConfig?.overwrite === true,
    dryRun: args.dryRun,
    verbose: args.verbose,
    quiet: args.quiet,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}
