// src/service.ts — File-level orchestration: read, transform, write

import type { FileSystem } from "./file-discovery.js";
import type { DocTransformer, TransformResult } from "./transformer.js";
import type { Logger } from "./logger.js";
import { errorMessage, silentLogger } from "./logger.js";
import { InvalidSourceError } from "./types.js";

export interface ProcessOptions {
  dryRun: boolean;
  /** Polled between files; true stops the run after the current file. */
  shouldStop?: () => boolean;
}

export interface ProcessSummary {
  processed: number;
  updated: number;
  failed: number;
}

export class DocumentationService {
  constructor(
    private readonly fs: FileSystem,
    private readonly transformer: DocTransformer,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Document one file. Returns true when the file was (or, in a dry run,
   * would be) changed.
   */
  async processFile(filePath: string, dryRun: boolean): Promise<boolean> {
    const content = this.fs.readFile(filePath);

    let result: TransformResult;
    try {
      result = await this.transformer.transform(filePath, content);
    } catch (err: unknown) {
      if (err instanceof InvalidSourceError) {
        this.logger.warn(`Skipping ${filePath}: ${err.message}`);
        return false;
      }
      throw err;
    }

    if (!result.changed) {
      this.logger.debug(`${filePath}: no changes`);
      return false;
    }

    const documented = result.results.filter((r) => r.state === "processed").length;
    if (dryRun) {
      this.logger.info(`Would update ${filePath} (${documented} doc comment(s))`);
      return true;
    }

    this.fs.writeFile(filePath, result.content);
    this.logger.info(`Updated ${filePath} (${documented} doc comment(s))`);
    return true;
  }

  async processPaths(paths: string[], options: ProcessOptions): Promise<ProcessSummary> {
    const summary: ProcessSummary = { processed: 0, updated: 0, failed: 0 };

    for (const filePath of paths) {
      if (options.shouldStop?.()) {
        this.logger.warn(`Stopping early, ${paths.length - summary.processed} file(s) not processed`);
        break;
      }
      try {
        if (await this.processFile(filePath, options.dryRun)) summary.updated++;
      } catch (err: unknown) {
        this.logger.error(`Failed to process ${filePath}: ${errorMessage(err)}`);
        summary.failed++;
      }
      summary.processed++;
    }

    return summary;
  }
}
