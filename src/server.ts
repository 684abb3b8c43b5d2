import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  type CallToolRequest,
  CallToolRequestSchema,
  type CallToolResult,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { HyperliquidInfoClient } from "./client/client.js";
import { PROMPTS, SERVER_INFO, TOOLS } from "./tools/definitions.js";
import { callTool, getPrompt } from "./tools/handlers.js";

// ============================================================================
// MCP SERVER SETUP (Standard @modelcontextprotocol/sdk pattern)
//
// A Server instance binds to one transport at a time, so every session gets
// its own instance. They all share the same read-only client.
// ============================================================================

export function createInfoServer(client: HyperliquidInfoClient): Server {
  const server = new Server(
    { name: SERVER_INFO.name, version: SERVER_INFO.version },
    { capabilities: { tools: {}, prompts: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS,
  }));

  server.setRequestHandler(
    CallToolRequestSchema,
    async (request: CallToolRequest, extra): Promise<CallToolResult> => {
      const { name, arguments: args } = request.params;
      return callTool(name, args, { client, signal: extra.signal });
    }
  );

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: PROMPTS,
  }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) =>
    getPrompt(request.params.name, request.params.arguments)
  );

  return server;
}
