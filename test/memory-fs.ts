import type { FileSystem } from "../src/file-discovery.js";
import { FileNotFoundError } from "../src/types.js";

/** In-memory FileSystem for service and CLI tests. */
export class MemoryFileSystem implements FileSystem {
  readonly files: Map<string, string>;
  readonly writes: string[] = [];

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  readFile(filePath: string): string {
    const content = this.files.get(filePath);
    if (content === undefined) throw new FileNotFoundError(filePath);
    return content;
  }

  writeFile(filePath: string, content: string): void {
    this.files.set(filePath, content);
    this.writes.push(filePath);
  }

  resolvePaths(paths: string[]): string[] {
    const prefixes = paths.map((p) => (p.endsWith("/") ? p : `${p}/`));
    return [...this.files.keys()]
      .filter((f) => paths.includes(f) || prefixes.some((prefix) => f.startsWith(prefix)))
      .sort();
  }

  isValidPaths(paths: string[]): boolean {
    return (
      paths.length > 0 &&
      paths.every((p) => this.files.has(p) || [...this.files.keys()].some((f) => f.startsWith(`${p}/`)))
    );
  }
}
