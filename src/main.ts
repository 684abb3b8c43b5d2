#!/usr/bin/env node
/**
 * Hyperliquid Info MCP Server
 *
 * Read-only MCP tools over the Hyperliquid info API, served over stdio or
 * HTTP (SSE and Streamable HTTP). See `.env.example` for configuration.
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { HyperliquidInfoClient } from "./client/client.js";
import { loadConfig } from "./config.js";
import { createHttpApp } from "./http.js";
import { createInfoServer } from "./server.js";
import { SERVER_INFO, TOOLS } from "./tools/definitions.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const client = new HyperliquidInfoClient({
    network: config.network,
    baseUrl: config.apiUrl,
    timeoutMs: config.timeoutMs,
  });

  if (config.transport === "stdio") {
    await createInfoServer(client).connect(new StdioServerTransport());
    console.error(`${SERVER_INFO.name} v${SERVER_INFO.version} listening on stdio (${client.baseUrl})`);
    return;
  }

  const app = createHttpApp({ client, network: config.network });
  const httpServer = app.listen(config.port, config.host, () => {
    console.error(`\n ${SERVER_INFO.name} v${SERVER_INFO.version} (${config.network}: ${client.baseUrl})\n`);
    console.error(` SSE endpoint:  http://${config.host}:${config.port}/sse`);
    console.error(` MCP endpoint:  http://${config.host}:${config.port}/mcp`);
    console.error(` Health check:  http://${config.host}:${config.port}/health\n`);
    console.error(`  Available tools (${TOOLS.length}):`);
    for (const tool of TOOLS) {
      console.error(`    ${tool.name}`);
    }
    console.error("");
  });

  httpServer.on("error", (error) => {
    console.error(`HTTP server error: ${error.message}`);
    process.exitCode = 1;
  });
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error instanceof Error ? error.message : error);
  process.exit(1);
});
