// src/config-file.ts — .docauto.yaml / docauto.config.json loading

import { existsSync, readFileSync } from "node:fs";
import { extname, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Warning } from "./types.js";
import { ConfigError, FileNotFoundError } from "./types.js";

const configFileSchema = z
  .object({
    preset: z.string().min(1).optional(),
    api: z
      .object({
        baseUrl: z.string().optional(),
        apiKey: z.string().optional(),
      })
      .strict()
      .optional(),
    generation: z
      .object({
        model: z.string().optional(),
        maxContext: z.number().int().positive().optional(),
        constraints: z.array(z.string()).optional(),
        ignorePatterns: z.array(z.string()).optional(),
        promptLengthLimit: z.number().int().positive().optional(),
        minResponseTokens: z.number().int().nonnegative().optional(),
        temperature: z.number().min(0).max(2).optional(),
        structuredOutput: z.boolean().optional(),
      })
      .strict()
      .optional(),
    exclude: z.array(z.string()).optional(),
    overwrite: z.boolean().optional(),
  })
  .strict();

export type ConfigFileContents = z.infer<typeof configFileSchema>;

export interface ConfigFileParser {
  canHandle(filePath: string): boolean;
  /** Parse and validate. Throws ConfigError on malformed content. */
  parse(filePath: string, warnings: Warning[]): ConfigFileContents;
}

abstract class SchemaConfigParser implements ConfigFileParser {
  protected abstract readonly extensions: readonly string[];

  protected abstract decode(content: string): unknown;

  canHandle(filePath: string): boolean {
    return this.extensions.includes(extname(filePath).toLowerCase());
  }

  parse(filePath: string, warnings: Warning[]): ConfigFileContents {
    if (!existsSync(filePath)) throw new FileNotFoundError(filePath);

    let raw: unknown;
    try {
      raw = this.decode(readFileSync(filePath, "utf-8"));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Invalid configuration in ${filePath}: ${msg}`, { cause: err });
    }

    // An empty file is an empty config
    const result = configFileSchema.safeParse(raw ?? {});
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new ConfigError(`Invalid configuration in ${filePath}: ${issues}`);
    }

    if (result.data.api?.apiKey) {
      warnings.push({
        level: "warn",
        module: "config",
        message:
          "API keys should not be stored in config files. Use DOCAUTO_API_KEY or the preset's environment variable instead.",
        file: filePath,
      });
    }

    return result.data;
  }
}

export class YamlConfigParser extends SchemaConfigParser {
  protected readonly extensions = [".yml", ".yaml"];

  protected decode(content: string): unknown {
    return parseYaml(content);
  }
}

export class JsonConfigParser extends SchemaConfigParser {
  protected readonly extensions = [".json"];

  protected decode(content: string): unknown {
    return content.trim() === "" ? {} : JSON.parse(content);
  }
}

export const DEFAULT_CONFIG_FILES = [
  ".docauto.yml",
  ".docauto.yaml",
  "docauto.yml",
  "docauto.yaml",
  "docauto.config.json",
] as const;

export class ConfigurationManager {
  private readonly parsers: ConfigFileParser[] = [
    new YamlConfigParser(),
    new JsonConfigParser(),
  ];

  registerParser(parser: ConfigFileParser): void {
    this.parsers.push(parser);
  }

  /**
   * Locate the config file: the explicit path when given, otherwise the
   * first default name present in `cwd`.
   */
  findConfigFile(explicitPath?: string, cwd: string = process.cwd()): string | null {
    if (explicitPath) {
      const absPath = resolve(cwd, explicitPath);
      return existsSync(absPath) ? absPath : null;
    }
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = join(cwd, name);
      if (existsSync(candidate)) return candidate;
    }
    return null;
  }

  /**
   * Load and validate the config file. Returns null when no default file
   * exists; a missing explicit path is an error.
   */
  loadConfig(
    explicitPath?: string,
    cwd: string = process.cwd(),
    warnings: Warning[] = [],
  ): ConfigFileContents | null {
    const configPath = this.findConfigFile(explicitPath, cwd);
    if (!configPath) {
      if (explicitPath) throw new FileNotFoundError(resolve(cwd, explicitPath));
      return null;
    }

    const parser = this.parsers.find((p) => p.canHandle(configPath));
    if (!parser) throw new ConfigError(`No parser found for file: ${configPath}`);
    return parser.parse(configPath, warnings);
  }
}
