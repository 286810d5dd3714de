/**
 * MCP server wiring for the timing summary tools
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { SummaryConfig } from "./config.js";
import { summaryToolDefinitions, summaryToolHandlers } from "./tools/index.js";

export const SERVER_NAME = "sta-summary";
export const SERVER_VERSION = "1.0.0";

/**
 * Create an MCP server exposing the summary tools
 */
export function createServer(config: SummaryConfig): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: summaryToolDefinitions,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = summaryToolHandlers[name];
    if (!handler) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool not found: ${name}`);
    }

    try {
      const text = await handler(args, config);
      return {
        content: [{ type: "text", text }],
      };
    } catch (error) {
      if (error instanceof McpError) throw error;
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`Tool ${name} failed:`, errorMessage);
      throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage}`);
    }
  });

  return server;
}
