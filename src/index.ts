#!/usr/bin/env node

/**
 * MCP Holster
 *
 * Manages the MCP server entries in a host application's JSON config file.
 * Entries move between two collections:
 * - mcpServers: active, launched by the host
 * - unusedMcpServers: inactive, parked and ignored by the host
 *
 * Runs as a stdio MCP server. The config file is the only state; every
 * tool call loads it, applies one change and writes it back atomically.
 *
 * Tools (7):
 * - create_server, list_servers, get_server, update_server_status,
 *   delete_servers, ping, explain
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import {
  HOLSTER_CONFIG_PATH,
  HOLSTER_LOG_LEVEL,
  SERVER_NAME,
  SERVER_VERSION,
  parseConfigFlag,
} from "./config.js";
import { ConfigStore } from "./config-store.js";
import { errorMessage } from "./errors.js";
import { ServerFacade } from "./facade.js";
import { ConsoleLogger } from "./logger.js";
import { createHolsterServer } from "./server.js";

const logger = new ConsoleLogger("Holster", HOLSTER_LOG_LEVEL);

// --- Shutdown Handlers ---

function setupShutdownHandlers(mcpServer: McpServer): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      logger.warn(`Force exit on second ${signal}`);
      process.exit(1);
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);

    try {
      await mcpServer.close();
    } catch (err) {
      logger.error(`Error during shutdown: ${errorMessage(err)}`);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

// --- Start Server ---

async function main() {
  const configPath = parseConfigFlag(process.argv.slice(2)) ?? HOLSTER_CONFIG_PATH;
  const store = new ConfigStore(configPath, logger);
  const facade = new ServerFacade(store, logger);

  const mcpServer = createHolsterServer(facade);
  setupShutdownHandlers(mcpServer);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);
  logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on stdio (config: ${configPath})`);
}

main().catch((error) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
