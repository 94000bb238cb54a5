/**
 * Shared type definitions for MCP Holster.
 */

// --- Server Descriptor ---

/**
 * Launch metadata for one server entry, usually `command`, `args` and `env`.
 * Carried through untouched; nothing inside it is validated.
 */
export type ServerDescriptor = Record<string, unknown>;

export type ServerMap = Record<string, ServerDescriptor>;

export type ServerStatus = "active" | "inactive";

// --- Document ---

export interface HolsterDocument {
  /** `mcpServers`: entries the host application launches */
  active: ServerMap;
  /** `unusedMcpServers`: parked entries the host ignores */
  inactive: ServerMap;
  /** Any other top-level keys of the file, preserved verbatim */
  extra: Record<string, unknown>;
}

// --- Registry results ---

export interface ServerListing {
  active: ServerMap;
  inactive: ServerMap;
}

export interface FoundServer {
  status: ServerStatus;
  descriptor: ServerDescriptor;
}

export interface StatusChange {
  document: HolsterDocument;
  updated: string[];
  notFound: string[];
  /** False when every name was already in place or missing */
  changed: boolean;
}

export interface Deletion {
  document: HolsterDocument;
  deleted: string[];
  notFound: string[];
  changed: boolean;
}

// --- Facade results (wire shape) ---

export interface CreateServerInput {
  name: string;
  command: string;
  directory?: string;
  script?: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface CreateServerResult {
  created: string;
}

export interface UpdateStatusResult {
  updated: string[];
  not_found: string[];
}

export interface DeleteServersResult {
  deleted: string[];
  not_found: string[];
  remaining_active: string[];
  remaining_inactive: string[];
}

export interface ServerDetails {
  name: string;
  status: ServerStatus;
  descriptor: ServerDescriptor;
}

export interface Explanation {
  overview: string;
  tools: string;
}
