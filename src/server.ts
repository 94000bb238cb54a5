/**
 * McpServer factory, shared by the stdio entry point and the tests.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { SERVER_NAME, SERVER_VERSION } from "./config.js";
import type { ServerFacade } from "./facade.js";
import { registerAllTools } from "./tools.js";

export function createHolsterServer(facade: ServerFacade): McpServer {
  const mcpServer = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      instructions:
        "Manages MCP server entries in the host's config file. " +
        "New servers start inactive; activate them with update_server_status. " +
        "Call explain for a description of every tool.",
    }
  );
  registerAllTools(mcpServer, facade);
  return mcpServer;
}
