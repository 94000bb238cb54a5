/**
 * JSON persistence for the host config file.
 *
 * The file on disk is the only state. Every operation loads it fresh and,
 * when something changed, writes a complete replacement: the new content
 * goes to a temp file beside the target which is then renamed over it, so
 * readers only ever see the old file or the new one.
 */

import { randomUUID } from "crypto";
import { chmod, mkdir, readFile, realpath, rename, rm, stat, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";

import { ConfigIOError, ParseError, errorMessage } from "./errors.js";
import { NoopLogger, type Logger } from "./logger.js";
import { setEntry } from "./registry.js";
import type { HolsterDocument, ServerMap } from "./types.js";

export const ACTIVE_KEY = "mcpServers";
export const INACTIVE_KEY = "unusedMcpServers";

// Descriptors are opaque: only "an object" is checked.
const DescriptorSchema = z.record(z.unknown());

const DocumentSchema = z
  .object({
    [ACTIVE_KEY]: z.record(DescriptorSchema).optional(),
    [INACTIVE_KEY]: z.record(DescriptorSchema).optional(),
  })
  .passthrough();

export function emptyDocument(): HolsterDocument {
  return { active: {}, inactive: {}, extra: {} };
}

/**
 * Decode file content into a Document. Missing collections decode as empty.
 */
export function parseDocument(text: string, path: string): HolsterDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ParseError(path, errorMessage(err), { cause: err });
  }

  if (!isPlainObject(raw)) {
    throw new ParseError(path, "top-level value must be a JSON object");
  }

  const result = DocumentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue
      ? `${issue.path.join(".") || "(root)"}: ${issue.message}`
      : "unexpected document shape";
    throw new ParseError(path, detail, { cause: result.error });
  }

  // Built from the raw value: zod's rebuilt objects leave out a "__proto__" key.
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key !== ACTIVE_KEY && key !== INACTIVE_KEY) {
      setEntry(extra, key, value);
    }
  }

  return {
    active: toServerMap(raw[ACTIVE_KEY]),
    inactive: toServerMap(raw[INACTIVE_KEY]),
    extra,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toServerMap(value: unknown): ServerMap {
  const map: ServerMap = {};
  if (!isPlainObject(value)) return map;
  for (const [name, descriptor] of Object.entries(value)) {
    if (isPlainObject(descriptor)) {
      setEntry(map, name, descriptor);
    }
  }
  return map;
}

/**
 * Encode a Document. Both collections are always written, even when empty.
 */
export function serializeDocument(doc: HolsterDocument): string {
  const body = {
    [ACTIVE_KEY]: doc.active,
    [INACTIVE_KEY]: doc.inactive,
    ...doc.extra,
  };
  return JSON.stringify(body, null, 2) + "\n";
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Follows a symlinked config to the file it points to. */
async function resolveTarget(configPath: string): Promise<string> {
  try {
    return await realpath(configPath);
  } catch (err) {
    if (isMissingFile(err)) return configPath;
    throw err;
  }
}

async function existingMode(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).mode & 0o777;
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

export class ConfigStore {
  constructor(
    private readonly configPath: string,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  get path(): string {
    return this.configPath;
  }

  async load(): Promise<HolsterDocument> {
    let text: string;
    try {
      text = await readFile(this.configPath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.debug(`No config at ${this.configPath}, starting empty`);
        return emptyDocument();
      }
      throw new ConfigIOError(this.configPath, "read", { cause: err });
    }

    const doc = parseDocument(text, this.configPath);
    this.logger.debug(
      `Loaded ${this.configPath} (${Object.keys(doc.active).length} active, ${Object.keys(doc.inactive).length} inactive)`
    );
    return doc;
  }

  async save(doc: HolsterDocument): Promise<void> {
    const content = serializeDocument(doc);

    let targetPath: string;
    let mode: number | undefined;
    try {
      targetPath = await resolveTarget(this.configPath);
      mode = await existingMode(targetPath);
    } catch (err) {
      throw new ConfigIOError(this.configPath, "write", { cause: err });
    }

    const tempPath = `${targetPath}.${randomUUID()}.tmp`;
    try {
      await mkdir(dirname(targetPath), { recursive: true });
      await writeFile(tempPath, content, "utf-8");
      if (mode !== undefined) {
        await chmod(tempPath, mode);
      }
      await rename(tempPath, targetPath);
    } catch (err) {
      try {
        await rm(tempPath, { force: true });
      } catch (cleanupErr) {
        this.logger.warn(`Could not remove temp file ${tempPath}: ${errorMessage(cleanupErr)}`);
      }
      throw new ConfigIOError(this.configPath, "write", { cause: err });
    }

    this.logger.debug(`Saved ${targetPath}`);
  }
}
