import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadTemplateBundle } from "../src/codegen/bundle.js";
import type { TemplateBundle } from "../src/codegen/types.js";
import { ExemplarEngine } from "../src/engine/exemplar-engine.js";
import { createMCPServer, parseExamples, type MCPToolResult } from "../src/mcp-server.js";
import { ArtifactRegistry } from "../src/registry/registry.js";
import { SymbolTable } from "../src/registry/symbol-table.js";
import { InvoiceExtractor } from "./fixtures/namespace/invoice.js";

const EXAMPLES = [
  { input: { amount: "1,000,000" }, output: { amount: 1000000 } },
  { input: { amount: "2,500" }, output: { amount: 2500 } },
  { input: { amount: "75" }, output: { amount: 75 } },
];

function textOf(result: MCPToolResult): string {
  const [first] = result.content;
  return first?.type === "text" ? first.text : "";
}

describe("MCP Server", () => {
  let dir: string;
  let bundle: TemplateBundle;
  let engine: ExemplarEngine;

  beforeAll(async () => {
    bundle = await loadTemplateBundle();
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "exemplar-mcp-"));
    const symbols = new SymbolTable();
    symbols.define("exemplar.artifacts.invoice.InvoiceExtractor", InvoiceExtractor);
    const registry = await ArtifactRegistry.open({ path: join(dir, "registry.json"), symbols });
    engine = new ExemplarEngine({ registry, bundle });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should expose the three tools", () => {
    const server = createMCPServer({ engine });
    expect(server.name).toBe("exemplar");
    expect(server.getTools().map((t) => t.name)).toEqual([
      "analyze_examples",
      "synthesize_artifact",
      "list_artifacts",
    ]);
    const synthesize = server.getTools().find((t) => t.name === "synthesize_artifact");
    expect(synthesize?.inputSchema.required).toEqual(["name", "examples"]);
  });

  it("should analyze examples", async () => {
    const server = createMCPServer({ engine });
    const result = await server.callTool("analyze_examples", { examples: EXAMPLES });
    const summary = JSON.parse(textOf(result));

    expect(result.isError).toBeUndefined();
    expect(summary.exampleCount).toBe(3);
    expect(summary.outputFields).toEqual([{ path: "amount", type: "integer", required: true, nullable: false }]);
    expect(summary.patterns[0]).toMatchObject({ target: "amount", source: "amount", kind: "type-conversion", confidence: 1 });
  });

  it("should synthesize and write an artifact", async () => {
    const server = createMCPServer({ engine });
    const result = await server.callTool("synthesize_artifact", {
      name: "pay",
      examples: EXAMPLES,
      description: "Payment amounts",
      outputDir: dir,
    });
    const payload = JSON.parse(textOf(result));

    expect(payload.symbol).toBe("PayExtractor");
    expect(payload.validation).toEqual({ valid: true, errors: [] });
    expect(payload.directory).toBe(join(dir, "pay"));
    expect(Object.keys(payload.files).sort()).toEqual([
      "manifest.json",
      "pay.extractor.test.ts",
      "pay.extractor.ts",
      "pay.model.ts",
      "pay.prompt.md",
    ]);
    expect(await readFile(join(dir, "pay", "pay.extractor.ts"), "utf-8")).toBe(payload.files["pay.extractor.ts"]);
  });

  it("should list registered artifacts", async () => {
    await engine.registry.register({
      name: "invoice",
      symbolPath: "exemplar.artifacts.invoice.InvoiceExtractor",
      version: "1.0.0",
      domain: "finance",
      confidence: 0.8,
    });
    const server = createMCPServer({ engine });

    const all = JSON.parse(textOf(await server.callTool("list_artifacts", {})));
    expect(all.map((m: { name: string }) => m.name)).toEqual(["invoice"]);

    const none = JSON.parse(textOf(await server.callTool("list_artifacts", { minConfidence: 0.9 })));
    expect(none).toEqual([]);
  });

  it("should report bad arguments as tool errors", async () => {
    const server = createMCPServer({ engine });
    const result = await server.callTool("analyze_examples", { examples: "none" });
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Error: 'examples' must be a list of { input, output } pairs");
  });

  it("should answer an unknown tool", async () => {
    const server = createMCPServer({ engine });
    expect(textOf(await server.callTool("nope", {}))).toBe("Unknown tool: nope");
  });

  describe("engine from a config file", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("should open one engine for concurrent first calls", async () => {
      const configPath = join(dir, "exemplar.config.json");
      await writeFile(configPath, JSON.stringify({ registry: { path: join(dir, "catalog.json") } }));
      const open = vi.spyOn(ExemplarEngine, "open");
      const server = createMCPServer({ configPath });

      const results = await Promise.all([
        server.callTool("list_artifacts", {}),
        server.callTool("list_artifacts", {}),
        server.callTool("analyze_examples", { examples: EXAMPLES }),
      ]);

      expect(results.map((r) => r.isError)).toEqual([undefined, undefined, undefined]);
      expect(open).toHaveBeenCalledTimes(1);
      const opened = await open.mock.results[0]?.value;
      if (opened instanceof ExemplarEngine) opened.close();
    });

    it("should retry opening after a failure", async () => {
      const configPath = join(dir, "exemplar.config.json");
      await writeFile(configPath, "{ registry: ");
      const server = createMCPServer({ configPath });

      expect((await server.callTool("list_artifacts", {})).isError).toBe(true);
      await writeFile(configPath, JSON.stringify({ registry: { path: join(dir, "catalog.json") } }));
      const result = await server.callTool("list_artifacts", {});
      expect(result.isError).toBeUndefined();
      expect(JSON.parse(textOf(result))).toEqual([]);
    });
  });

  describe("parseExamples", () => {
    it("should keep hints", () => {
      const [pair] = parseExamples([
        { input: "Salary 100", output: { salary: 100 }, hints: { sectionMarkers: ["Pay Table"] } },
      ]);
      expect(pair.hints?.sectionMarkers).toEqual(["Pay Table"]);
    });

    it("should reject pairs without an output", () => {
      expect(() => parseExamples([{ input: "x" }])).toThrow("Example 1 needs an input and an output");
    });
  });
});
