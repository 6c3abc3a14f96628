import { describe, it, expect, vi } from "vitest";
import { document } from "../src/index.js";
import type { ChatRequest } from "../src/llm/client.js";
import { MemoryFileSystem } from "./memory-fs.js";

describe("document", () => {
  it("documents files with a preset and an injected client", async () => {
    const fs = new MemoryFileSystem({
      "/repo/src/sum.ts": "export const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0);\n",
    });
    const complete = vi.fn(async (_request: ChatRequest) => "Sums the values.");

    const summary = await document(["/repo/src"], { preset: "ollama", fs, client: { complete } });

    expect(summary).toEqual({ processed: 1, updated: 1, failed: 0 });
    expect(fs.files.get("/repo/src/sum.ts")).toBe(
      "/** Sums the values. */\nexport const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0);\n",
    );
    expect(complete.mock.calls[0][0].model).toBe("phi4");
  });

  it("lets options override the preset", async () => {
    const fs = new MemoryFileSystem({ "/repo/a.ts": "export function a() {}\n" });
    const complete = vi.fn(async (_request: ChatRequest) => "Does a.");

    await document(["/repo/a.ts"], {
      preset: "ollama",
      generation: { model: "llama3", structuredOutput: false },
      dryRun: true,
      fs,
      client: { complete },
    });

    expect(complete.mock.calls[0][0]).toMatchObject({ model: "llama3", jsonMode: false });
    expect(fs.writes).toEqual([]);
  });

  it("requires an API key for hosted presets", async () => {
    await expect(
      document(["/repo"], { preset: "openai", env: {}, client: { complete: vi.fn() } }),
    ).rejects.toThrow("API key required");
  });

  it("reads the preset's API key variable", async () => {
    const fs = new MemoryFileSystem({ "/repo/a.ts": "export function a() {}\n" });
    const summary = await document(["/repo/a.ts"], {
      preset: "openai",
      env: { OPENAI_API_KEY: "test-secret" },
      fs,
      client: { complete: vi.fn(async (_request: ChatRequest) => "Does a.") },
    });
    expect(summary).toEqual({ processed: 1, updated: 1, failed: 0 });
  });

  it("accepts DOCAUTO_API_KEY for hosted presets", async () => {
    const fs = new MemoryFileSystem({ "/repo/a.ts": "export function a() {}\n" });
    const complete = vi.fn(async (_request: ChatRequest) => "Does a.");
    await expect(
      document(["/repo/a.ts"], {
        preset: "gemini",
        env: { DOCAUTO_API_KEY: "test-secret" },
        fs,
        client: { complete },
        dryRun: true,
      }),
    ).resolves.toEqual({ processed: 1, updated: 1, failed: 0 });
  });
});
