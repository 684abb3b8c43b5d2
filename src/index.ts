/**
 * hyperliquid-info-mcp
 *
 * Read-only MCP server and client for the Hyperliquid info API.
 *
 * @packageDocumentation
 */

// Client
export * from "./client/index.js";

// MCP server
export { createInfoServer } from "./server.js";
export { createHttpApp } from "./http.js";
export type { HttpAppOptions } from "./http.js";

// Tools
export { TOOLS, PROMPTS, SERVER_INFO } from "./tools/definitions.js";
export { callTool, getPrompt, errorResult, successResult } from "./tools/handlers.js";
export type { ToolContext } from "./tools/handlers.js";
export { toEpochMillis, parseParams } from "./tools/params.js";
export { shapeMetadata, toStructuredContent } from "./tools/shape.js";
export type { Metadata } from "./tools/shape.js";

// Configuration
export { loadConfig, ServerConfigSchema } from "./config.js";
export type { ServerConfig } from "./config.js";
