// src/transformer.ts — Generate doc comments for a file's units and splice them in

import type { DocumentableUnit, TrackedObjectState } from "./types.js";
import type { DocGenerator } from "./generator.js";
import type { DocstringResponseParser } from "./response-parser.js";
import type { ProgressTracker } from "./tracker.js";
import type { Logger } from "./logger.js";
import { errorMessage, silentLogger } from "./logger.js";
import { extractUnits, isIgnored } from "./unit-extractor.js";

export interface TransformOptions {
  /** Replace comments that already exist. */
  overwrite: boolean;
  ignorePatterns: readonly string[];
}

export interface UnitResult {
  unit: DocumentableUnit;
  state: TrackedObjectState;
  comment?: string;
  error?: string;
}

export interface TransformResult {
  content: string;
  changed: boolean;
  results: UnitResult[];
}

interface Edit {
  start: number;
  end: number;
  text: string;
}

/**
 * Render comment text as a JSDoc block for a declaration at `indent`,
 * joining lines with `eol`.
 */
export function formatDocComment(text: string, indent: string, eol = "\n"): string {
  const lines = text.replace(/\*\//g, "*\\/").split(/\r?\n/);
  if (lines.length === 1) return `/** ${lines[0]} */`;

  const body = lines.map((line) => (line.trim() === "" ? `${indent} *` : `${indent} * ${line}`));
  return ["/**", ...body, `${indent} */`].join(eol);
}

export function detectLineEnding(content: string): string {
  return /\r\n/.test(content) ? "\r\n" : "\n";
}

export function unitId(unit: DocumentableUnit): string {
  return `${unit.qualifiedName}:${unit.line}`;
}

export class DocTransformer {
  constructor(
    private readonly generator: DocGenerator,
    private readonly parser: DocstringResponseParser,
    private readonly tracker: ProgressTracker,
    private readonly options: TransformOptions,
    private readonly logger: Logger = silentLogger,
  ) {}

  needsDocstring(unit: DocumentableUnit): boolean {
    if (!unit.existingDoc) return true;
    return this.options.overwrite;
  }

  async transform(filePath: string, content: string): Promise<TransformResult> {
    const units = extractUnits(filePath, content);
    const eol = detectLineEnding(content);
    const results: UnitResult[] = [];
    const edits: Edit[] = [];

    // Register every unit up front so progress lines carry the file's total
    const queue: DocumentableUnit[] = [];
    for (const unit of units) {
      if (isIgnored(unit, this.options.ignorePatterns) || !this.needsDocstring(unit)) {
        this.tracker.track(filePath, unitId(unit), "skipped");
        results.push({ unit, state: "skipped" });
      } else {
        this.tracker.track(filePath, unitId(unit), "pending");
        queue.push(unit);
      }
    }

    for (const unit of queue) {
      const id = unitId(unit);
      try {
        const context = unit.parentClass ? `Class: ${unit.parentClass}` : undefined;
        const raw = await this.generator.generate(unit.source, context);
        const text = this.parser.parse(raw);
        if (!text) {
          this.tracker.track(filePath, id, "failed");
          results.push({ unit, state: "failed", error: "empty documentation" });
          continue;
        }

        const comment = formatDocComment(text, unit.indent, eol);
        edits.push(
          unit.existingDoc
            ? { start: unit.existingDoc.start, end: unit.existingDoc.end, text: comment }
            : { start: unit.insertAt, end: unit.insertAt, text: `${comment}${eol}${unit.indent}` },
        );
        this.tracker.track(filePath, id, "processed");
        results.push({ unit, state: "processed", comment });
      } catch (err: unknown) {
        const msg = errorMessage(err);
        this.logger.warn(`${filePath}:${unit.line} ${unit.qualifiedName}: ${msg}`);
        this.tracker.track(filePath, id, "failed");
        results.push({ unit, state: "failed", error: msg });
      }
    }

    const updated = applyEdits(content, edits);
    results.sort((a, b) => a.unit.insertAt - b.unit.insertAt);
    return { content: updated, changed: updated !== content, results };
  }
}

function applyEdits(content: string, edits: Edit[]): string {
  let out = content;
  for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
    out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
  }
  return out;
}
