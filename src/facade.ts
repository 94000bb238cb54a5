/**
 * One load → transform → persist cycle per request.
 *
 * The facade owns no Document state between calls: each operation loads
 * the file, applies a registry transformation, and saves only when the
 * transformation actually changed something. Any thrown error aborts the
 * cycle before the save.
 */

import type { ConfigStore } from "./config-store.js";
import { ServerNotFoundError, ValidationError } from "./errors.js";
import { NoopLogger, type Logger } from "./logger.js";
import * as registry from "./registry.js";
import type {
  CreateServerInput,
  CreateServerResult,
  DeleteServersResult,
  Explanation,
  ServerDescriptor,
  ServerDetails,
  ServerListing,
  UpdateStatusResult,
} from "./types.js";

export const PONG = "Pong!";

export const EXPLANATION: Explanation = {
  overview: [
    "MCP Holster manages the MCP server entries in the host application's config file.",
    "Servers live in one of two collections: 'mcpServers' (active, launched by the host)",
    "and 'unusedMcpServers' (inactive, parked and ignored by the host).",
    "New servers are always created inactive; activate them explicitly.",
    "The host only picks up changes after it is restarted.",
  ].join(" "),
  tools: [
    "create_server(name, command, directory, script): add a server to the inactive collection. Launch args become ['--directory', directory, 'run', script] unless explicit args are given. Fails if the name exists in either collection.",
    "list_servers(): return both collections as name -> descriptor mappings.",
    "get_server(name): return one server's descriptor and which collection holds it.",
    "update_server_status(server_names, active): move servers into the active or inactive collection. Names already in place are reported as updated; unknown names as not_found.",
    "delete_servers(server_names): remove servers from whichever collection holds them. Unknown names are reported as not_found and are not an error.",
    "ping(): liveness check, returns 'Pong!'.",
    "explain(): this text.",
  ].join("\n"),
};

export class ServerFacade {
  constructor(
    private readonly store: ConfigStore,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  get configPath(): string {
    return this.store.path;
  }

  async createServer(input: CreateServerInput): Promise<CreateServerResult> {
    const descriptor = this.buildDescriptor(input);

    const doc = await this.store.load();
    const next = registry.createServer(doc, input.name, descriptor);
    await this.store.save(next);

    this.logger.info(`Created server '${input.name}' (inactive)`);
    return { created: input.name };
  }

  async listServers(): Promise<ServerListing> {
    const doc = await this.store.load();
    return registry.listServers(doc);
  }

  async getServer(name: string): Promise<ServerDetails> {
    const doc = await this.store.load();
    const found = registry.findServer(doc, name);
    if (!found) {
      throw new ServerNotFoundError(name);
    }
    return { name, status: found.status, descriptor: found.descriptor };
  }

  async updateServerStatus(names: readonly string[], active: boolean): Promise<UpdateStatusResult> {
    const doc = await this.store.load();
    const change = registry.setServerStatus(doc, names, active);

    if (change.changed) {
      await this.store.save(change.document);
      this.logger.info(
        `Set ${change.updated.join(", ")} ${active ? "active" : "inactive"}`
      );
    }
    if (change.notFound.length > 0) {
      this.logger.warn(`Status update skipped unknown servers: ${change.notFound.join(", ")}`);
    }

    return { updated: change.updated, not_found: change.notFound };
  }

  async deleteServers(names: readonly string[]): Promise<DeleteServersResult> {
    const doc = await this.store.load();
    const deletion = registry.deleteServers(doc, names);

    if (deletion.changed) {
      await this.store.save(deletion.document);
      this.logger.info(`Deleted ${deletion.deleted.join(", ")}`);
    }
    if (deletion.notFound.length > 0) {
      this.logger.warn(`Delete skipped unknown servers: ${deletion.notFound.join(", ")}`);
    }

    return {
      deleted: deletion.deleted,
      not_found: deletion.notFound,
      remaining_active: Object.keys(deletion.document.active),
      remaining_inactive: Object.keys(deletion.document.inactive),
    };
  }

  ping(): string {
    return PONG;
  }

  explain(): Explanation {
    return EXPLANATION;
  }

  private buildDescriptor(input: CreateServerInput): ServerDescriptor {
    let args: string[];
    if (input.args) {
      args = [...input.args];
    } else if (input.directory && input.script) {
      args = registry.buildLaunchArgs(input.directory, input.script);
    } else {
      throw new ValidationError(
        `Server '${input.name}' needs either 'args' or both 'directory' and 'script'`
      );
    }

    const descriptor: ServerDescriptor = { command: input.command, args };
    if (input.env && Object.keys(input.env).length > 0) {
      descriptor.env = { ...input.env };
    }
    return descriptor;
  }
}
