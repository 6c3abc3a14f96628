// src/file-discovery.ts — Source file discovery and file access
// gitignore support via git ls-files, picomatch exclusion, symlink boundary checks

import type { Dirent, Stats } from "node:fs";
import {
  existsSync,
  readdirSync,
  readFileSync,
  realpathSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { execSync } from "node:child_process";
import { join, relative, resolve, sep } from "node:path";
import picomatch from "picomatch";
import type { Warning } from "./types.js";
import { errorMessage } from "./logger.js";
import {
  DEFAULT_EXCLUDE_DIRS,
  DTS_EXTENSION,
  FileNotFoundError,
  SOURCE_EXTENSIONS,
} from "./types.js";

export function isSourceFile(filePath: string): boolean {
  return SOURCE_EXTENSIONS.test(filePath) && !DTS_EXTENSION.test(filePath);
}

function isExcludedDir(name: string): boolean {
  return DEFAULT_EXCLUDE_DIRS.includes(name);
}

function discoveryWarning(level: Warning["level"], message: string, file: string): Warning {
  return { level, module: "file-discovery", message, file };
}

/**
 * Source files under `dir`, sorted, minus anything matching
 * `excludePatterns` (relative to `dir`). Honours .gitignore when `dir` is
 * inside a git work tree.
 */
export function discoverFiles(
  dir: string,
  excludePatterns: string[] = [],
  warnings: Warning[] = [],
): string[] {
  const root = resolve(dir);
  const found = listGitFiles(root) ?? walkSourceFiles(root, warnings);

  const isExcluded = excludePatterns.length > 0 ? picomatch(excludePatterns, { dot: true }) : undefined;
  const toRelative = (file: string): string => relative(root, file).split(sep).join("/");
  return found.filter((file) => !isExcluded?.(toRelative(file))).sort();
}

/** null when git is missing or `root` is outside a work tree. */
function listGitFiles(root: string): string[] | null {
  let output: string;
  try {
    output = execSync("git ls-files --cached --others --exclude-standard", {
      cwd: root,
      encoding: "utf-8",
      timeout: 5000,
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch {
    return null;
  }

  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "" && isSourceFile(line) && !line.split("/").some(isExcludedDir))
    .map((line) => resolve(root, line))
    .filter((file) => existsSync(file)); // tracked files deleted from the work tree
}

/**
 * Depth-first walk that follows symlinks only while they stay under `root`,
 * entering each linked directory once.
 */
function walkSourceFiles(root: string, warnings: Warning[]): string[] {
  const realRoot = realpathSync(root);
  const linkedDirs = new Set<number>();
  const files: string[] = [];
  const pending = [root];

  let dir: string | undefined;
  while ((dir = pending.pop()) !== undefined) {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err: unknown) {
      warnings.push(discoveryWarning("warn", `Cannot read directory: ${errorMessage(err)}`, dir));
      continue;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isFile()) {
        if (isSourceFile(entry.name)) files.push(path);
      } else if (entry.isDirectory()) {
        if (!isExcludedDir(entry.name)) pending.push(path);
      } else if (entry.isSymbolicLink()) {
        const target = followLink(path, realRoot, linkedDirs, warnings);
        if (target === "file" && isSourceFile(entry.name)) files.push(path);
        if (target === "dir" && !isExcludedDir(entry.name)) pending.push(path);
      }
    }
  }
  return files;
}

function followLink(
  path: string,
  realRoot: string,
  linkedDirs: Set<number>,
  warnings: Warning[],
): "file" | "dir" | undefined {
  let target: string;
  let stat: Stats;
  try {
    target = realpathSync(path);
    stat = statSync(target);
  } catch (err: unknown) {
    warnings.push(discoveryWarning("warn", `Cannot resolve symlink: ${errorMessage(err)}`, path));
    return undefined;
  }

  const shown = relative(realRoot, path);
  if (target !== realRoot && !target.startsWith(realRoot + sep)) {
    warnings.push(discoveryWarning("info", `Symlink ${shown} points outside ${realRoot}, skipped`, path));
    return undefined;
  }
  if (stat.isFile()) return "file";
  if (!stat.isDirectory()) return undefined;
  if (linkedDirs.has(stat.ino)) {
    warnings.push(discoveryWarning("info", `Symlink cycle at ${shown}, skipped`, path));
    return undefined;
  }
  linkedDirs.add(stat.ino);
  return "dir";
}

/**
 * Expand files and directories into the list of source files to process,
 * in argument order and without duplicates.
 */
export function resolvePaths(
  paths: string[],
  excludePatterns: string[] = [],
  warnings: Warning[] = [],
): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  const add = (file: string): void => {
    if (seen.has(file)) return;
    seen.add(file);
    result.push(file);
  };

  for (const p of paths) {
    const absPath = resolve(p);
    if (!existsSync(absPath)) throw new FileNotFoundError(absPath);

    if (statSync(absPath).isDirectory()) {
      for (const file of discoverFiles(absPath, excludePatterns, warnings)) add(file);
    } else if (isSourceFile(absPath)) {
      add(absPath);
    } else {
      warnings.push(discoveryWarning("warn", "Unsupported file type — skipped", absPath));
    }
  }
  return result;
}

export function validatePaths(paths: string[]): boolean {
  return paths.length > 0 && paths.every((p) => existsSync(resolve(p)));
}

// ─── File access ────────────────────────────────────────────────────────────

export interface FileSystem {
  readFile(filePath: string): string;
  writeFile(filePath: string, content: string): void;
  resolvePaths(paths: string[], excludePatterns?: string[], warnings?: Warning[]): string[];
  isValidPaths(paths: string[]): boolean;
}

export class FileSystemService implements FileSystem {
  readFile(filePath: string): string {
    try {
      return readFileSync(filePath, "utf-8");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new FileNotFoundError(filePath, err);
      }
      throw err;
    }
  }

  writeFile(filePath: string, content: string): void {
    writeFileSync(filePath, content, "utf-8");
  }

  resolvePaths(paths: string[], excludePatterns: string[] = [], warnings: Warning[] = []): string[] {
    return resolvePaths(paths, excludePatterns, warnings);
  }

  isValidPaths(paths: string[]): boolean {
    return validatePaths(paths);
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
