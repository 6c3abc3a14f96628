// src/cli.ts — The docauto command: argument handling and run orchestration

import { resolve } from "node:path";
import type { ApiConfig, Warning } from "./types.js";
import { DOCAUTO_VERSION } from "./types.js";
import { parseCliArgs, resolveConfig } from "./config.js";
import { ConfigurationManager } from "./config-file.js";
import type { FileSystem } from "./file-discovery.js";
import { FileSystemService } from "./file-discovery.js";
import type { ChatCompletionClient } from "./llm/client.js";
import { OpenAIChatClient } from "./llm/client.js";
import { DocautoGenerator } from "./generator.js";
import { DocstringResponseParser } from "./response-parser.js";
import { DefaultProgressTracker } from "./tracker.js";
import { DocTransformer } from "./transformer.js";
import { DocumentationService } from "./service.js";
import type { LogSink } from "./logger.js";
import { createLogger, errorMessage, reportWarnings } from "./logger.js";
import { listPresets } from "./presets.js";

export const HELP_TEXT = `
docauto v${DOCAUTO_VERSION}

Usage:
  docauto [options] <paths...>

Arguments:
  paths                Files or directories to document

Presets:
  --ollama             Local Ollama server (phi4)
  --openai             OpenAI (gpt-4o-mini, OPENAI_API_KEY)
  --gemini             Google Gemini (gemini-2.0-flash-exp, GEMINI_API_KEY)
  --deepseek           DeepSeek (deepseek-chat, DEEPSEEK_API_KEY)
  --preset <name>      Select a preset by name

Options:
  --base-url, -b       API base URL
  --api-key, -k        API key (prefer DOCAUTO_API_KEY)
  --model, -m          Model name
  --max-context <n>    Context window of the model, in tokens
  --constraint, -c     Documentation constraint (repeatable, replaces the defaults)
  --ignore, -i         Skip units whose name matches this glob (repeatable)
  --exclude, -e        Skip files matching this glob (repeatable)
  --config <file>      Path to config file (default: .docauto.yml / .docauto.yaml)
  --dry-run, -d        Show what would change without writing files
  --overwrite, -o      Replace existing doc comments
  --verbose, -v        Print debug output
  --quiet, -q          Only print warnings and errors
  --help, -h           Show this help text
  --version            Show the version

Environment Variables:
  DOCAUTO_API_KEY      API key for any preset

Examples:
  docauto --ollama ./src
  docauto --openai --dry-run ./src/index.ts
  docauto --deepseek --overwrite -e "**/*.test.ts" ./src
`.trim();

export interface CliDependencies {
  fs?: FileSystem;
  stdout?: LogSink;
  stderr?: LogSink;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  configManager?: ConfigurationManager;
  createClient?: (api: ApiConfig) => ChatCompletionClient;
}

export class DocautoCli {
  private stopRequested = false;
  private readonly fs: FileSystem;
  private readonly stdout: LogSink;
  private readonly stderr: LogSink;
  private readonly env: NodeJS.ProcessEnv;
  private readonly cwd: string;
  private readonly configManager: ConfigurationManager;
  private readonly createClient: (api: ApiConfig) => ChatCompletionClient;

  constructor(deps: CliDependencies = {}) {
    this.fs = deps.fs ?? new FileSystemService();
    this.stdout = deps.stdout ?? process.stdout;
    this.stderr = deps.stderr ?? process.stderr;
    this.env = deps.env ?? process.env;
    this.cwd = deps.cwd ?? process.cwd();
    this.configManager = deps.configManager ?? new ConfigurationManager();
    this.createClient = deps.createClient ?? ((api) => new OpenAIChatClient(api));
  }

  /**
   * Ask the running command to stop after the current file. Returns true
   * when a stop was already requested, meaning the caller should exit now.
   */
  requestShutdown(): boolean {
    if (this.stopRequested) return true;
    this.stopRequested = true;
    createLogger({ sink: this.stderr }).warn(
      "Stopping after the current file. Press Ctrl+C again to exit immediately.",
    );
    return false;
  }

  get shutdownRequested(): boolean {
    return this.stopRequested;
  }

  async run(argv: string[]): Promise<number> {
    let logger = createLogger({ sink: this.stderr });

    try {
      const args = await parseCliArgs(argv);
      if (args.help) {
        this.stdout.write(HELP_TEXT + "\n");
        return 0;
      }
      if (args.version) {
        this.stdout.write(`${DOCAUTO_VERSION}\n`);
        return 0;
      }

      logger = createLogger({ verbose: args.verbose, quiet: args.quiet, sink: this.stderr });

      if (args.paths.length === 0) {
        logger.error("At least one path is required. Run docauto --help for usage.");
        return 1;
      }

      const warnings: Warning[] = [];
      const fileConfig = this.configManager.loadConfig(args.config, this.cwd, warnings);
      const config = resolveConfig(args, fileConfig, this.env, warnings);
      reportWarnings(warnings, logger);
      warnings.length = 0;

      const paths = config.paths.map((p) => resolve(this.cwd, p));
      if (!this.fs.isValidPaths(paths)) {
        logger.error(`Invalid paths: ${config.paths.join(", ")}`);
        return 1;
      }
      const files = this.fs.resolvePaths(paths, config.exclude, warnings);
      reportWarnings(warnings, logger);

      logger.debug(
        `Using ${config.preset ?? "custom"} backend: ${config.generation.model} at ${config.api.baseUrl}`,
      );
      logger.info(`Found ${files.length} file(s) to process`);

      const tracker = new DefaultProgressTracker(logger);
      const generator = new DocautoGenerator(
        this.createClient(config.api),
        config.generation,
        logger,
      );
      const transformer = new DocTransformer(
        generator,
        new DocstringResponseParser(logger),
        tracker,
        { overwrite: config.overwrite, ignorePatterns: config.generation.ignorePatterns },
        logger,
      );
      const service = new DocumentationService(this.fs, transformer, logger);

      const summary = await service.processPaths(files, {
        dryRun: config.dryRun,
        shouldStop: () => this.stopRequested,
      });

      logger.info(
        `Processed ${summary.processed} files (${summary.updated} updated)${config.dryRun ? " [dry-run]" : ""}`,
      );
      logger.debug(`Units: ${tracker.summary()}`);
      return summary.failed > 0 ? 1 : 0;
    } catch (err: unknown) {
      logger.error(errorMessage(err));
      if (err instanceof Error && err.message.startsWith("Unknown preset")) {
        logger.info(`Available presets: ${listPresets().join(", ")}`);
      }
      return 1;
    }
  }
}
