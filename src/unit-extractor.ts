// src/unit-extractor.ts — Documentable unit discovery via the TypeScript AST

import { extname } from "node:path";
import ts from "typescript";
import picomatch from "picomatch";
import type { DocumentableUnit, ExistingDoc, UnitKind } from "./types.js";
import { InvalidSourceError } from "./types.js";

function scriptKindFor(filePath: string): ts.ScriptKind {
  switch (extname(filePath).toLowerCase()) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".jsx":
      return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

/**
 * Syntax diagnostics for a file. Uses transpileModule, which only reports
 * what the parser finds; no type information is needed.
 */
export function syntaxErrors(filePath: string, content: string): string[] {
  const result = ts.transpileModule(content, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: {
      allowJs: true,
      jsx: ts.JsxEmit.Preserve,
      target: ts.ScriptTarget.Latest,
    },
  });
  return (result.diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) => ts.flattenDiagnosticMessageText(d.messageText, "\n"));
}

/**
 * All documentable units of a file, in source order.
 * Throws InvalidSourceError when the file does not parse.
 */
export function extractUnits(filePath: string, content: string): DocumentableUnit[] {
  const errors = syntaxErrors(filePath, content);
  if (errors.length > 0) {
    throw new InvalidSourceError(
      `${filePath} has ${errors.length} syntax error(s): ${errors[0]}`,
      filePath,
    );
  }

  const sourceFile = ts.createSourceFile(
    filePath,
    content,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(filePath),
  );

  const units: DocumentableUnit[] = [];
  const collector = new UnitCollector(sourceFile, filePath, units);
  collector.visitStatements(sourceFile.statements);
  return units.sort((a, b) => a.insertAt - b.insertAt);
}

class UnitCollector {
  constructor(
    private readonly sourceFile: ts.SourceFile,
    private readonly filePath: string,
    private readonly units: DocumentableUnit[],
  ) {}

  visitStatements(statements: ts.NodeArray<ts.Statement>): void {
    let overloads: OverloadRun | undefined;
    for (const stmt of statements) {
      if (ts.isFunctionDeclaration(stmt)) {
        const name = declarationName(stmt);
        if (!stmt.body) {
          if (overloads?.name !== name) overloads = { name, first: stmt };
          continue;
        }
        this.add(stmt, name, "function", undefined, overloadAnchor(overloads, name));
        overloads = undefined;
        continue;
      }
      overloads = undefined;
      if (ts.isClassDeclaration(stmt)) {
        const name = declarationName(stmt);
        this.add(stmt, name, "class");
        this.visitClassMembers(stmt, name);
      } else if (ts.isVariableStatement(stmt)) {
        this.visitVariableStatement(stmt);
      } else if (ts.isModuleDeclaration(stmt) && stmt.body && ts.isModuleBlock(stmt.body)) {
        this.visitStatements(stmt.body.statements);
      }
    }
  }

  private visitVariableStatement(stmt: ts.VariableStatement): void {
    // A doc comment on a multi-declaration statement belongs to none of them
    const declarations = stmt.declarationList.declarations;
    if (declarations.length !== 1) return;
    const decl = declarations[0];
    if (!ts.isIdentifier(decl.name) || !decl.initializer) return;

    const init = decl.initializer;
    const name = decl.name.text;
    if (ts.isArrowFunction(init) || ts.isFunctionExpression(init)) {
      this.add(stmt, name, "arrow-function");
    } else if (ts.isClassExpression(init)) {
      this.add(stmt, name, "class");
      this.visitClassMembers(init, name);
    }
  }

  private visitClassMembers(node: ts.ClassLikeDeclaration, className: string): void {
    let overloads: OverloadRun | undefined;
    for (const member of node.members) {
      if (ts.isConstructorDeclaration(member) || ts.isMethodDeclaration(member)) {
        const name = ts.isConstructorDeclaration(member) ? "constructor" : memberName(member.name);
        if (!name) {
          overloads = undefined;
          continue;
        }
        if (!member.body) {
          if (overloads?.name !== name) overloads = { name, first: member };
          continue;
        }
        const kind: UnitKind = ts.isConstructorDeclaration(member) ? "constructor" : "method";
        this.add(member, name, kind, className, overloadAnchor(overloads, name));
        overloads = undefined;
        continue;
      }
      overloads = undefined;
      if (
        ts.isPropertyDeclaration(member) &&
        member.initializer &&
        (ts.isArrowFunction(member.initializer) || ts.isFunctionExpression(member.initializer))
      ) {
        const name = memberName(member.name);
        if (name) this.add(member, name, "method", className);
      }
    }
  }

  /**
   * Record a unit. `anchor` is where its comment lives: the host itself, or
   * the first overload signature when the host is an implementation.
   */
  private add(
    host: ts.Node,
    name: string,
    kind: UnitKind,
    parentClass?: string,
    anchor: ts.Node = host,
  ): void {
    const text = this.sourceFile.text;
    const insertAt = anchor.getStart(this.sourceFile);
    const { line } = this.sourceFile.getLineAndCharacterOfPosition(insertAt);
    const lineStart = this.sourceFile.getPositionOfLineAndCharacter(line, 0);

    this.units.push({
      filePath: this.filePath,
      name,
      qualifiedName: parentClass ? `${parentClass}.${name}` : name,
      kind,
      parentClass,
      source: text.slice(insertAt, host.getEnd()),
      existingDoc: findDocComment(text, anchor.getFullStart(), insertAt),
      insertAt,
      indent: leadingWhitespace(text.slice(lineStart, insertAt)),
      line: line + 1,
    });
  }
}

interface OverloadRun {
  name: string;
  first: ts.Node;
}

function overloadAnchor(run: OverloadRun | undefined, name: string): ts.Node | undefined {
  return run?.name === name ? run.first : undefined;
}

function declarationName(node: ts.FunctionDeclaration | ts.ClassDeclaration): string {
  return node.name?.text ?? "default";
}

function memberName(name: ts.PropertyName): string | undefined {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return undefined; // computed names
}

function leadingWhitespace(linePrefix: string): string {
  const match = /^[ \t]*/.exec(linePrefix);
  return match ? match[0] : "";
}

const FILE_LEVEL_TAG = /@(?:license|preserve|file|fileoverview|module|packageDocumentation)\b/;

/**
 * The last `/** … *\/` comment in the leading trivia at `pos`.
 *
 * File-level comments are not a declaration's doc: blocks carrying a
 * license or module tag, and, at the very top of the file, a block
 * separated from the declaration (at `declStart`) by a blank line.
 */
export function findDocComment(
  text: string,
  pos: number,
  declStart = text.length,
): ExistingDoc | undefined {
  const ranges = ts.getLeadingCommentRanges(text, pos) ?? [];
  for (let i = ranges.length - 1; i >= 0; i--) {
    const range = ranges[i];
    if (range.kind !== ts.SyntaxKind.MultiLineCommentTrivia) continue;
    const raw = text.slice(range.pos, range.end);
    if (!raw.startsWith("/**") || raw.startsWith("/**/")) continue;
    if (FILE_LEVEL_TAG.test(raw)) return undefined;
    if (pos === 0 && /\n[ \t]*\r?\n/.test(text.slice(range.end, declStart))) return undefined;
    return { text: docCommentBody(raw), start: range.pos, end: range.end };
  }
  return undefined;
}

/**
 * Comment text without `/**`, `*\/` and leading asterisks.
 */
export function docCommentBody(comment: string): string {
  const inner = comment.replace(/^\/\*\*/, "").replace(/\*\/$/, "");
  const lines = inner
    .split(/\r?\n/)
    .map((line, i) => (i === 0 ? line.trim() : line.replace(/^\s*\*? ?/, "").trimEnd()));

  while (lines.length > 0 && lines[0] === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines.join("\n");
}

export function isIgnored(unit: DocumentableUnit, patterns: readonly string[]): boolean {
  if (patterns.length === 0) return false;
  const matches = picomatch([...patterns]);
  return matches(unit.name) || matches(unit.qualifiedName);
}
