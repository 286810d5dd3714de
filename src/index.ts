#!/usr/bin/env node

/**
 * STA Summary - Model Context Protocol server for timing report triage
 *
 * Exposes the timing report summaries as MCP tools over stdio.
 */

// Load environment variables from .env file
import dotenv from "dotenv";
dotenv.config();

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";

async function main() {
  const config = loadConfig();
  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // stdout carries the protocol, so startup info goes to stderr
  console.error(`=== ${SERVER_NAME} MCP server v${SERVER_VERSION} ===`);
  console.error("Tools:");
  console.error("  - summarize_timing_report");
  console.error("  - summarize_timing_totals");
  console.error("  - list_worst_startpoints");
  if (config.blockMapFiles.length) {
    console.error(`Block map files: ${config.blockMapFiles.join(", ")}`);
  }
  console.error("================================");
}

main().catch((error) => {
  console.error("Server failed to start:", error);
  process.exit(1);
});
