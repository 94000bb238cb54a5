/**
 * Pure transformations over a loaded Document.
 *
 * Nothing here touches the filesystem or mutates its input; each function
 * returns a fresh Document. A name lives in at most one of the two
 * collections, and moves remove and insert within the same step.
 */

import { DuplicateNameError } from "./errors.js";
import type {
  Deletion,
  FoundServer,
  HolsterDocument,
  ServerDescriptor,
  ServerListing,
  ServerMap,
  StatusChange,
} from "./types.js";

function cloneDocument(doc: HolsterDocument): HolsterDocument {
  return {
    active: { ...doc.active },
    inactive: { ...doc.inactive },
    extra: doc.extra,
  };
}

function has(map: ServerMap, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, name);
}

/**
 * Own-property write. Plain assignment of "__proto__" would swap the
 * object's prototype instead of adding an entry.
 */
export function setEntry<T>(map: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(map, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/** Batch names are a set: duplicates collapse, first occurrence wins the order. */
export function uniqueNames(names: readonly string[]): string[] {
  return Array.from(new Set(names));
}

export function findServer(doc: HolsterDocument, name: string): FoundServer | undefined {
  if (has(doc.active, name)) {
    return { status: "active", descriptor: doc.active[name] };
  }
  if (has(doc.inactive, name)) {
    return { status: "inactive", descriptor: doc.inactive[name] };
  }
  return undefined;
}

/**
 * `uv --directory <dir> run <script>`, the launch form used for new servers.
 */
export function buildLaunchArgs(directory: string, script: string): string[] {
  return ["--directory", directory, "run", script];
}

/**
 * Add a server. New entries are parked in the inactive collection so the
 * host never picks one up until it is explicitly activated.
 */
export function createServer(
  doc: HolsterDocument,
  name: string,
  descriptor: ServerDescriptor
): HolsterDocument {
  const existing = findServer(doc, name);
  if (existing) {
    throw new DuplicateNameError(name, existing.status);
  }

  const next = cloneDocument(doc);
  setEntry(next.inactive, name, { ...descriptor });
  return next;
}

export function listServers(doc: HolsterDocument): ServerListing {
  return {
    active: { ...doc.active },
    inactive: { ...doc.inactive },
  };
}

/**
 * Move each named server into the target collection. Names already there
 * count as updated without a change; names in neither collection are
 * reported as not found.
 */
export function setServerStatus(
  doc: HolsterDocument,
  names: readonly string[],
  active: boolean
): StatusChange {
  const next = cloneDocument(doc);
  const target = active ? next.active : next.inactive;
  const source = active ? next.inactive : next.active;

  const updated: string[] = [];
  const notFound: string[] = [];
  let changed = false;

  for (const name of uniqueNames(names)) {
    if (has(target, name)) {
      // A hand-edited file can hold the name twice; settle it in the target.
      if (has(source, name)) {
        delete source[name];
        changed = true;
      }
      updated.push(name);
    } else if (has(source, name)) {
      setEntry(target, name, source[name]);
      delete source[name];
      changed = true;
      updated.push(name);
    } else {
      notFound.push(name);
    }
  }

  return { document: changed ? next : doc, updated, notFound, changed };
}

export function deleteServers(doc: HolsterDocument, names: readonly string[]): Deletion {
  const next = cloneDocument(doc);
  const deleted: string[] = [];
  const notFound: string[] = [];

  for (const name of uniqueNames(names)) {
    let removed = false;
    if (has(next.active, name)) {
      delete next.active[name];
      removed = true;
    }
    if (has(next.inactive, name)) {
      delete next.inactive[name];
      removed = true;
    }
    (removed ? deleted : notFound).push(name);
  }

  const changed = deleted.length > 0;
  return { document: changed ? next : doc, deleted, notFound, changed };
}
