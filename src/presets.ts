// src/presets.ts — Named backend bundles (OpenAI-compatible endpoints)

import type { DocautoOptions } from "./types.js";
import { ConfigError } from "./types.js";

export interface Preset {
  options: DocautoOptions;
  /** Environment variable consulted for the API key. */
  apiKeyEnv?: string;
}

export const OLLAMA_PRESET: Preset = {
  options: {
    api: { baseUrl: "http://localhost:11434/v1", apiKey: "ollama" },
    generation: { model: "phi4", maxContext: 16_384 },
  },
};

export const OPENAI_PRESET: Preset = {
  options: {
    api: { baseUrl: "https://api.openai.com/v1" },
    generation: { model: "gpt-4o-mini", maxContext: 16_384 },
  },
  apiKeyEnv: "OPENAI_API_KEY",
};

export const GEMINI_PRESET: Preset = {
  options: {
    api: { baseUrl: "https://generativelanguage.googleapis.com/v1beta/openai/" },
    generation: { model: "gemini-2.0-flash-exp", maxContext: 131_072 },
  },
  apiKeyEnv: "GEMINI_API_KEY",
};

export const DEEPSEEK_PRESET: Preset = {
  options: {
    api: { baseUrl: "https://api.deepseek.com/v1" },
    generation: { model: "deepseek-chat", maxContext: 65_536 },
  },
  apiKeyEnv: "DEEPSEEK_API_KEY",
};

export const BUILTIN_PRESET_NAMES = ["ollama", "openai", "gemini", "deepseek"] as const;

const registry = new Map<string, Preset>([
  ["ollama", OLLAMA_PRESET],
  ["openai", OPENAI_PRESET],
  ["gemini", GEMINI_PRESET],
  ["deepseek", DEEPSEEK_PRESET],
]);

function copyOptions(options: DocautoOptions): DocautoOptions {
  return {
    api: options.api ? { ...options.api } : undefined,
    generation: options.generation
      ? {
          ...options.generation,
          constraints: options.generation.constraints
            ? [...options.generation.constraints]
            : undefined,
          ignorePatterns: options.generation.ignorePatterns
            ? [...options.generation.ignorePatterns]
            : undefined,
        }
      : undefined,
  };
}

export function hasPreset(name: string): boolean {
  return registry.has(name);
}

/**
 * Options of a registered preset. Returns a copy, so callers may mutate it.
 */
export function getPreset(name: string): DocautoOptions {
  const preset = registry.get(name);
  if (!preset) throw new ConfigError(`Unknown preset: ${name}`);
  return copyOptions(preset.options);
}

export function registerPreset(name: string, preset: Preset): void {
  if (registry.has(name)) {
    throw new ConfigError(`Preset ${name} already exists`);
  }
  registry.set(name, { ...preset, options: copyOptions(preset.options) });
}

/** Remove a preset added with registerPreset. Built-ins cannot be removed. */
export function unregisterPreset(name: string): boolean {
  const builtins: readonly string[] = BUILTIN_PRESET_NAMES;
  if (builtins.includes(name)) return false;
  return registry.delete(name);
}

export function listPresets(): string[] {
  return [...registry.keys()];
}

export function presetApiKeyEnv(name: string): string | undefined {
  return registry.get(name)?.apiKeyEnv;
}
