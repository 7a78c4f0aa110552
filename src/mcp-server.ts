#!/usr/bin/env node
/**
 * MCP Server for Exemplar
 *
 * Exposes example analysis, artifact synthesis and the registry listing as
 * MCP tools over stdio.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { writeArtifact } from "./codegen/writer.js";
import { validateArtifact } from "./codegen/validator.js";
import { loadConfig } from "./config.js";
import { ExemplarEngine } from "./engine/exemplar-engine.js";
import { errorMessage } from "./errors.js";
import type { ExampleHints, ExamplePair, ParsedExamples } from "./patterns/types.js";
import { asExampleValue, isPlainRecord } from "./schema/values.js";

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required: string[];
  };
}

export type MCPToolResult = CallToolResult;

export interface MCPServerOptions {
  /** Engine to serve; opened from the config file on first use otherwise */
  engine?: ExemplarEngine;
  configPath?: string;
}

export interface MCPServerInstance {
  name: string;
  getTools(): MCPTool[];
  callTool(name: string, args: Record<string, unknown>): Promise<MCPToolResult>;
  start(): Promise<void>;
}

const EXAMPLES_PROPERTY = {
  type: "array",
  description: "Example pairs: [{ input, output, hints? }], 2-5 recommended",
  items: {
    type: "object",
    properties: {
      input: { description: "Example input (text or structured value)" },
      output: { type: "object", description: "Expected output record" },
      hints: {
        type: "object",
        description: "Optional sectionMarkers, requiredKeywords, rejectedKeywords, parsingRules (string lists)",
      },
    },
    required: ["input", "output"],
  },
};

const ANALYZE_EXAMPLES_TOOL: MCPTool = {
  name: "analyze_examples",
  description:
    "Infer input and output schemas from example pairs and detect the transformation " +
    "patterns relating them, each with a confidence score.",
  inputSchema: {
    type: "object",
    properties: {
      examples: EXAMPLES_PROPERTY,
    },
    required: ["examples"],
  },
};

const SYNTHESIZE_ARTIFACT_TOOL: MCPTool = {
  name: "synthesize_artifact",
  description:
    "Render an extraction artifact (data model, prompt, extractor, tests, manifest) from " +
    "example pairs. Optionally writes the files under outputDir.",
  inputSchema: {
    type: "object",
    properties: {
      name: { type: "string", description: "Artifact name: lowercase letters, digits, '-' and '_'" },
      examples: EXAMPLES_PROPERTY,
      domain: { type: "string", description: "Domain label (compensation, tax, patent, filing or any other)" },
      description: { type: "string", description: "What the artifact extracts" },
      outputDir: { type: "string", description: "Directory to write the artifact into" },
    },
    required: ["name", "examples"],
  },
};

const LIST_ARTIFACTS_TOOL: MCPTool = {
  name: "list_artifacts",
  description: "List registered artifacts, optionally filtered by domain, tags and minimum confidence.",
  inputSchema: {
    type: "object",
    properties: {
      domain: { type: "string" },
      tags: { type: "array", items: { type: "string" } },
      minConfidence: { type: "number" },
    },
    required: [],
  },
};

const TOOLS = [ANALYZE_EXAMPLES_TOOL, SYNTHESIZE_ARTIFACT_TOOL, LIST_ARTIFACTS_TOOL];

function text(value: string): MCPToolResult {
  return { content: [{ type: "text", text: value }] };
}

function json(value: unknown): MCPToolResult {
  return text(JSON.stringify(value, null, 2));
}

function optionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new TypeError(`'${key}' must be a string`);
  return value;
}

function optionalStrings(raw: Record<string, unknown>, key: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new TypeError(`'${key}' must be a list of strings`);
  }
  return value;
}

/**
 * Narrow tool arguments to example pairs.
 */
export function parseExamples(raw: unknown): ExamplePair[] {
  if (!Array.isArray(raw)) throw new TypeError("'examples' must be a list of { input, output } pairs");
  return raw.map((item, index) => {
    if (!isPlainRecord(item)) throw new TypeError(`Example ${index + 1} must be an object`);
    const input = asExampleValue(item.input);
    const output = asExampleValue(item.output);
    if (input === undefined || output === undefined) {
      throw new TypeError(`Example ${index + 1} needs an input and an output`);
    }
    const pair: ExamplePair = { input, output };
    if (item.hints !== undefined) {
      if (!isPlainRecord(item.hints)) throw new TypeError(`Example ${index + 1} hints must be an object`);
      const hints: ExampleHints = {
        sectionMarkers: optionalStrings(item.hints, "sectionMarkers"),
        requiredKeywords: optionalStrings(item.hints, "requiredKeywords"),
        rejectedKeywords: optionalStrings(item.hints, "rejectedKeywords"),
        parsingRules: optionalStrings(item.hints, "parsingRules"),
      };
      pair.hints = hints;
    }
    return pair;
  });
}

/** JSON-friendly view of a detection */
export function summarizeParsed(parsed: ParsedExamples) {
  const fields = (schema: ParsedExamples["inputSchema"]) =>
    [...schema.fields.values()].map((f) => ({
      path: f.path,
      type: f.type,
      required: f.required,
      nullable: f.nullable,
    }));
  return {
    exampleCount: parsed.exampleCount,
    confidence: parsed.confidence,
    inputFields: fields(parsed.inputSchema),
    outputFields: fields(parsed.outputSchema),
    patterns: parsed.patterns.map((p) => ({
      target: p.targetPath,
      source: p.sourcePath,
      kind: p.kind,
      confidence: p.confidence,
      description: p.description,
    })),
    warnings: parsed.warnings.map((w) => w.message),
  };
}

/**
 * Create an MCP server instance for testing or direct use
 */
export function createMCPServer(options: MCPServerOptions = {}): MCPServerInstance {
  // Shared by concurrent first calls; cleared when opening fails so a later call retries
  let opening: Promise<ExemplarEngine> | undefined = options.engine ? Promise.resolve(options.engine) : undefined;

  const openEngine = async (): Promise<ExemplarEngine> => {
    const config = await loadConfig(options.configPath);
    return ExemplarEngine.open({ config });
  };

  const ensureEngine = (): Promise<ExemplarEngine> => {
    opening ??= openEngine().catch((error: unknown) => {
      opening = undefined;
      throw error;
    });
    return opening;
  };

  const handlers: Record<string, (args: Record<string, unknown>) => Promise<MCPToolResult>> = {
    async analyze_examples(args) {
      const examples = parseExamples(args.examples);
      const { synthesizer } = await ensureEngine();
      const detection = synthesizer.analyze({ name: "analysis", examples }).parsed;
      return json(summarizeParsed(detection));
    },

    async synthesize_artifact(args) {
      const name = optionalString(args, "name");
      if (!name) throw new TypeError("'name' is required");
      const current = await ensureEngine();
      const artifact = current.synthesize({
        name,
        examples: parseExamples(args.examples),
        domain: optionalString(args, "domain"),
        description: optionalString(args, "description"),
      });
      const validation = validateArtifact(artifact);
      const outputDir = optionalString(args, "outputDir");
      const written = outputDir && validation.valid ? await writeArtifact(artifact, outputDir) : null;
      return json({
        name: artifact.name,
        symbol: artifact.symbolName,
        version: artifact.version,
        domain: artifact.domain,
        confidence: artifact.analysis.confidence,
        validation,
        directory: written?.directory ?? null,
        files: Object.fromEntries(Object.values(artifact.files).map((f) => [f.fileName, f.content])),
      });
    },

    async list_artifacts(args) {
      const minConfidence = args.minConfidence;
      if (minConfidence !== undefined && typeof minConfidence !== "number") {
        throw new TypeError("'minConfidence' must be a number");
      }
      const current = await ensureEngine();
      return json(
        current.list({
          domain: optionalString(args, "domain"),
          tags: optionalStrings(args, "tags"),
          minConfidence,
        })
      );
    },
  };

  return {
    name: "exemplar",

    getTools(): MCPTool[] {
      return TOOLS;
    },

    async callTool(name: string, args: Record<string, unknown>): Promise<MCPToolResult> {
      const handler = handlers[name];
      if (!handler) {
        return text(`Unknown tool: ${name}`);
      }
      try {
        return await handler(args);
      } catch (err) {
        return { ...text(`Error: ${errorMessage(err)}`), isError: true };
      }
    },

    async start(): Promise<void> {
      const server = new Server(
        { name: "exemplar", version: "0.1.0" },
        { capabilities: { tools: {} } }
      );

      server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: TOOLS,
      }));

      server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return this.callTool(name, args || {});
      });

      const transport = new StdioServerTransport();
      await server.connect(transport);
    },
  };
}

// Main entry point - run server when executed directly
if (process.argv[1]?.endsWith("mcp-server.ts") || process.argv[1]?.endsWith("mcp-server.js") || process.argv[1]?.endsWith("exemplar-mcp")) {
  const server = createMCPServer();
  server.start().catch((err) => {
    console.error("Failed to start MCP server:", err);
    process.exit(1);
  });
}
