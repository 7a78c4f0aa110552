/**
 * Exemplar Library Entry Point
 *
 * This module exports the public API for programmatic use.
 */

// Schema inference
export * from "./schema/index.js";

// Pattern detection
export * from "./patterns/index.js";

// Artifact synthesis
export * from "./codegen/index.js";

// Registry
export * from "./registry/index.js";

// Refinement
export * from "./refinement/index.js";

// Engine
export * from "./engine/index.js";

// Errors
export * from "./errors.js";

// MCP Server
export { createMCPServer, type MCPServerOptions, type MCPServerInstance, type MCPTool } from "./mcp-server.js";

// Config
export { loadConfig, resolveConfig, DEFAULT_CONFIG, type Config } from "./config.js";
