/**
 * Tool Registration - the 7 Holster tools.
 *
 * registerAllTools() wires every ServerFacade operation onto an McpServer.
 * Results are returned as pretty-printed JSON text; any thrown error becomes
 * an isError result and leaves the config file untouched.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { errorMessage } from "./errors.js";
import type { ServerFacade } from "./facade.js";

// Applies to new names only; existing entries may use any name.
const newServerName = z.string().regex(/^[a-zA-Z0-9_.-]+$/);

const serverNames = z
  .array(z.string())
  .describe("Server names (use list_servers to see names)");

function jsonResult(value: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

function errorResult(verb: string, error: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: `Error ${verb}: ${errorMessage(error)}`,
      },
    ],
    isError: true,
  };
}

export function registerAllTools(mcpServer: McpServer, facade: ServerFacade): void {
  // ============================================================
  // Tool 1: create_server
  // ============================================================
  mcpServer.tool(
    "create_server",
    `Create a new MCP server entry. New servers are added to the INACTIVE collection (unusedMcpServers); use update_server_status to activate them.

By default the server is launched as: <command> --directory <directory> run <script> (e.g. command="uv").
Pass 'args' instead of directory/script for any other launch form.

Server names must match: [a-zA-Z0-9_.-]+`,
    {
      name: newServerName.describe("Server name (letters, numbers, dots, underscores, hyphens)"),
      command: z
        .string()
        .min(1)
        .describe("Executable that launches the server, e.g. 'uv', 'npx', 'node'"),
      directory: z
        .string()
        .optional()
        .describe("Project directory of the server (used with script)"),
      script: z
        .string()
        .optional()
        .describe("Entry script inside the directory, e.g. 'server.py'"),
      args: z
        .array(z.string())
        .optional()
        .describe("Explicit launch arguments; overrides directory/script"),
      env: z
        .record(z.string())
        .optional()
        .describe("Environment variables for the server process"),
    },
    async (params) => {
      try {
        return jsonResult(await facade.createServer(params));
      } catch (error) {
        return errorResult("creating server", error);
      }
    }
  );

  // ============================================================
  // Tool 2: list_servers
  // ============================================================
  mcpServer.tool(
    "list_servers",
    "List all configured MCP servers. Returns two mappings of name -> descriptor: 'active' (mcpServers, launched by the host) and 'inactive' (unusedMcpServers).",
    {},
    async () => {
      try {
        return jsonResult(await facade.listServers());
      } catch (error) {
        return errorResult("listing servers", error);
      }
    }
  );

  // ============================================================
  // Tool 3: get_server
  // ============================================================
  mcpServer.tool(
    "get_server",
    "Show one server's launch descriptor and whether it is active or inactive.",
    {
      name: z.string().describe("Server name"),
    },
    async (params) => {
      try {
        return jsonResult(await facade.getServer(params.name));
      } catch (error) {
        return errorResult("reading server", error);
      }
    }
  );

  // ============================================================
  // Tool 4: update_server_status
  // ============================================================
  mcpServer.tool(
    "update_server_status",
    `Activate or deactivate servers by moving them between mcpServers (active) and unusedMcpServers (inactive).

Names already in the requested state are reported as updated. Unknown names are reported in not_found; the other names are still processed. The host application must be restarted to pick up the change.`,
    {
      server_names: serverNames,
      active: z
        .boolean()
        .describe("true to activate (mcpServers), false to deactivate (unusedMcpServers)"),
    },
    async (params) => {
      try {
        return jsonResult(await facade.updateServerStatus(params.server_names, params.active));
      } catch (error) {
        return errorResult("updating server status", error);
      }
    }
  );

  // ============================================================
  // Tool 5: delete_servers
  // ============================================================
  mcpServer.tool(
    "delete_servers",
    "Delete servers from whichever collection holds them. Unknown names are reported in not_found and are not an error. Returns the names remaining in each collection.",
    {
      server_names: serverNames,
    },
    async (params) => {
      try {
        return jsonResult(await facade.deleteServers(params.server_names));
      } catch (error) {
        return errorResult("deleting servers", error);
      }
    }
  );

  // ============================================================
  // Tool 6: ping
  // ============================================================
  mcpServer.tool("ping", "Ping the Holster server", {}, async () => ({
    content: [{ type: "text" as const, text: facade.ping() }],
  }));

  // ============================================================
  // Tool 7: explain
  // ============================================================
  mcpServer.tool(
    "explain",
    "Explain what Holster does and describe each of its tools.",
    {},
    async () => jsonResult(facade.explain())
  );
}
