import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  docCommentBody,
  extractUnits,
  findDocComment,
  isIgnored,
  syntaxErrors,
} from "../src/unit-extractor.js";
import { InvalidSourceError } from "../src/types.js";

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), "fixtures");
const CALCULATOR = join(FIXTURES, "calculator.ts");

describe("extractUnits", () => {
  const content = readFileSync(CALCULATOR, "utf-8");
  const units = extractUnits(CALCULATOR, content);

  it("finds functions, classes and members in source order", () => {
    expect(units.map((u) => [u.qualifiedName, u.kind, u.line])).toEqual([
      ["add", "function", 4],
      ["Calculator", "class", 8],
      ["Calculator.constructor", "constructor", 11],
      ["Calculator.value", "method", 19],
      ["Calculator.reset", "method", 23],
      ["double", "arrow-function", 28],
      ["overloaded", "function", 30],
    ]);
  });

  it("skips nested functions and object literal methods", () => {
    const names = units.map((u) => u.name);
    expect(names).not.toContain("inner");
    expect(names).not.toContain("load");
  });

  it("reads existing doc comments", () => {
    const add = units[0];
    expect(add.existingDoc?.text).toBe("Adds numbers.");
    expect(content.slice(add.existingDoc?.start, add.existingDoc?.end)).toBe("/** Adds numbers. */");

    const value = units[3];
    expect(value.existingDoc?.text).toBe("Current total.\n@returns the total");
    expect(units[1].existingDoc).toBeUndefined();
  });

  it("records parent class, indent and insertion point", () => {
    const value = units[3];
    expect(value.parentClass).toBe("Calculator");
    expect(value.indent).toBe("  ");
    expect(content.slice(value.insertAt, value.insertAt + 7)).toBe("value()");

    const add = units[0];
    expect(add.indent).toBe("");
    expect(add.source.startsWith("export function add(")).toBe(true);
    expect(add.source.endsWith("return a + b;\n}")).toBe(true);
  });

  it("uses the variable statement for arrow functions", () => {
    const double = units[5];
    expect(double.source).toBe("export const double = (n: number): number => n * 2;");
  });

  it("handles class expressions, namespaces and default exports", () => {
    const source = [
      "const Widget = class {",
      "  render() {",
      "    return 1;",
      "  }",
      "};",
      "namespace Util {",
      "  export function helper(): void {}",
      "}",
      "export default function () {}",
      "",
    ].join("\n");
    const found = extractUnits("widget.ts", source);
    expect(found.map((u) => [u.qualifiedName, u.kind])).toEqual([
      ["Widget", "class"],
      ["Widget.render", "method"],
      ["helper", "function"],
      ["default", "function"],
    ]);
    expect(found[2].indent).toBe("  ");
  });

  it("anchors overloaded functions at the first signature", () => {
    const overloaded = units[6];
    expect(content.slice(overloaded.insertAt).startsWith("function overloaded(a: string): string;")).toBe(true);
    expect(overloaded.source.endsWith("return a;\n}")).toBe(true);
  });

  it("reads the doc comment of the first overload", () => {
    const source = [
      "/** Parses input. */",
      "export function parse(a: string): string;",
      "export function parse(a: number): number;",
      "export function parse(a: unknown): unknown {",
      "  return a;",
      "}",
      "",
    ].join("\n");
    const [parse] = extractUnits("parse.ts", source);
    expect(parse.line).toBe(2);
    expect(parse.existingDoc?.text).toBe("Parses input.");
  });

  it("anchors overloaded methods at the first signature", () => {
    const source = [
      "class Box {",
      "  get(key: string): string;",
      "  get(key: string, fallback?: string): string {",
      "    return fallback ?? key;",
      "  }",
      "}",
      "",
    ].join("\n");
    const [, get] = extractUnits("box.ts", source);
    expect(get.qualifiedName).toBe("Box.get");
    expect(get.line).toBe(2);
    expect(get.indent).toBe("  ");
  });

  it("does not take a license header as the first unit's doc", () => {
    const [f] = extractUnits("lic.ts", "/** @license MIT Copyright Acme */\nexport function f() {}\n");
    expect(f.existingDoc).toBeUndefined();
  });

  it("does not take a file header separated by a blank line as doc", () => {
    const [f] = extractUnits("head.ts", "/**\n * Helpers for f.\n */\n\nexport function f() {}\n");
    expect(f.existingDoc).toBeUndefined();
  });

  it("skips multi-declaration statements", () => {
    expect(extractUnits("multi.ts", "const a = () => 1, b = () => 2;\n")).toEqual([]);
  });

  it("parses JSX in .tsx files", () => {
    const found = extractUnits("button.tsx", "export const Button = () => <button>ok</button>;\n");
    expect(found.map((u) => u.name)).toEqual(["Button"]);
  });

  it("parses plain JavaScript", () => {
    const found = extractUnits("legacy.js", "function old(a) {\n  return a;\n}\n");
    expect(found.map((u) => u.name)).toEqual(["old"]);
  });

  it("throws InvalidSourceError on syntax errors", () => {
    expect(() => extractUnits("broken.ts", "function broken( {\n")).toThrow(InvalidSourceError);
    expect(() => extractUnits("broken.ts", "function broken( {\n")).toThrow(
      /^broken\.ts has \d+ syntax error\(s\): /,
    );
  });
});

describe("syntaxErrors", () => {
  it("is empty for valid code", () => {
    expect(syntaxErrors("ok.ts", "export const x: number = 1;\n")).toEqual([]);
  });

  it("does not need type information", () => {
    expect(syntaxErrors("ok.ts", "const y: Missing = make();\n")).toEqual([]);
  });
});

describe("findDocComment", () => {
  it("picks the last JSDoc block before the declaration", () => {
    const text = "/** first */\n// note\n/** second */\nfunction f() {}\n";
    expect(findDocComment(text, 0)?.text).toBe("second");
  });

  it("ignores plain block comments", () => {
    expect(findDocComment("/* plain */\nfunction f() {}\n", 0)).toBeUndefined();
  });

  it("ignores blocks with file-level tags", () => {
    const text = "const a = 1;\n/** @module helpers */\nfunction f() {}\n";
    expect(findDocComment(text, 12, 36)).toBeUndefined();
  });

  it("keeps a comment directly above the first declaration", () => {
    const text = "/** Runs f. */\nfunction f() {}\n";
    expect(findDocComment(text, 0, 15)?.text).toBe("Runs f.");
  });
});

describe("docCommentBody", () => {
  it("strips delimiters and asterisks", () => {
    expect(docCommentBody("/**\n * Summary.\n *\n * @param a - first\n */")).toBe(
      "Summary.\n\n@param a - first",
    );
  });
});

describe("isIgnored", () => {
  const [add, , ctor, value] = extractUnits(CALCULATOR, readFileSync(CALCULATOR, "utf-8"));

  it("matches the plain name", () => {
    expect(isIgnored(ctor, ["constructor"])).toBe(true);
    expect(isIgnored(add, ["constructor"])).toBe(false);
  });

  it("matches the qualified name", () => {
    expect(isIgnored(value, ["Calculator.*"])).toBe(true);
    expect(isIgnored(add, ["Calculator.*"])).toBe(false);
  });

  it("matches globs", () => {
    expect(isIgnored(add, ["a*"])).toBe(true);
    expect(isIgnored(add, [])).toBe(false);
  });
});
