import { describe, it, expect } from "vitest";

import { emptyDocument } from "../src/config-store.js";
import { DuplicateNameError } from "../src/errors.js";
import {
  buildLaunchArgs,
  createServer,
  deleteServers,
  findServer,
  listServers,
  setServerStatus,
  uniqueNames,
} from "../src/registry.js";
import type { HolsterDocument } from "../src/types.js";

function sampleDocument(): HolsterDocument {
  return {
    active: {
      weather: { command: "uv", args: ["--directory", "/srv/weather", "run", "weather.py"] },
      notes: { command: "npx", args: ["-y", "notes-server"], env: { NOTES_DIR: "/tmp/notes" } },
    },
    inactive: {
      calendar: { command: "uv", args: ["--directory", "/srv/calendar", "run", "calendar.py"] },
    },
    extra: { globalShortcut: "Ctrl+Space" },
  };
}

function namesInBoth(doc: HolsterDocument): string[] {
  return Object.keys(doc.active).filter((name) => name in doc.inactive);
}

describe("registry", () => {
  describe("createServer", () => {
    it("adds new servers to the inactive collection only", () => {
      const doc = sampleDocument();
      const next = createServer(doc, "search", { command: "uv", args: ["run", "search.py"] });

      expect(next.inactive.search).toEqual({ command: "uv", args: ["run", "search.py"] });
      expect(next.active.search).toBeUndefined();
      expect(Object.keys(next.inactive)).toEqual(["calendar", "search"]);
      expect(Object.keys(next.active)).toEqual(["weather", "notes"]);
    });

    it("does not mutate the input document", () => {
      const doc = sampleDocument();
      createServer(doc, "search", { command: "uv" });
      expect(Object.keys(doc.inactive)).toEqual(["calendar"]);
    });

    it("rejects a name already in the active collection", () => {
      const doc = sampleDocument();
      expect(() => createServer(doc, "weather", { command: "uv" })).toThrow(DuplicateNameError);
      expect(doc).toEqual(sampleDocument());
    });

    it("rejects a name already in the inactive collection", () => {
      const attempt = () => createServer(sampleDocument(), "calendar", { command: "uv" });
      expect(attempt).toThrow(DuplicateNameError);
      expect(attempt).toThrow("Server 'calendar' already exists (inactive)");
    });
  });

  describe("listServers", () => {
    it("returns both collections as they are", () => {
      const listing = listServers(sampleDocument());
      expect(Object.keys(listing.active)).toEqual(["weather", "notes"]);
      expect(Object.keys(listing.inactive)).toEqual(["calendar"]);
      expect(listing.active.notes.env).toEqual({ NOTES_DIR: "/tmp/notes" });
    });

    it("returns empty mappings for an empty document", () => {
      expect(listServers(emptyDocument())).toEqual({ active: {}, inactive: {} });
    });
  });

  describe("setServerStatus", () => {
    it("deactivates an active server", () => {
      const change = setServerStatus(sampleDocument(), ["weather"], false);

      expect(change.updated).toEqual(["weather"]);
      expect(change.notFound).toEqual([]);
      expect(change.changed).toBe(true);
      expect(Object.keys(change.document.active)).toEqual(["notes"]);
      expect(Object.keys(change.document.inactive)).toEqual(["calendar", "weather"]);
      expect(change.document.inactive.weather).toEqual({
        command: "uv",
        args: ["--directory", "/srv/weather", "run", "weather.py"],
      });
    });

    it("round-trips activate then deactivate", () => {
      const doc = sampleDocument();
      const activated = setServerStatus(doc, ["calendar"], true).document;
      expect(Object.keys(activated.active)).toEqual(["weather", "notes", "calendar"]);

      const parked = setServerStatus(activated, ["calendar"], false).document;
      expect(parked.inactive.calendar).toEqual(doc.inactive.calendar);
      expect(parked.active.calendar).toBeUndefined();
    });

    it("treats names already in the target collection as updated without change", () => {
      const doc = sampleDocument();
      const first = setServerStatus(doc, ["calendar", "weather"], true);
      const second = setServerStatus(first.document, ["calendar", "weather"], true);

      expect(first.updated).toEqual(["calendar", "weather"]);
      expect(first.changed).toBe(true);
      expect(second.updated).toEqual(["calendar", "weather"]);
      expect(second.changed).toBe(false);
      expect(second.document).toEqual(first.document);
    });

    it("reports unknown names and still processes the rest", () => {
      const change = setServerStatus(sampleDocument(), ["ghost", "notes"], false);

      expect(change.updated).toEqual(["notes"]);
      expect(change.notFound).toEqual(["ghost"]);
      expect(change.document.inactive.notes).toBeDefined();
    });

    it("returns the same document when only unknown names are given", () => {
      const doc = sampleDocument();
      const change = setServerStatus(doc, ["ghost"], true);

      expect(change.changed).toBe(false);
      expect(change.document).toBe(doc);
      expect(change.notFound).toEqual(["ghost"]);
    });

    it("collapses duplicate names", () => {
      const change = setServerStatus(sampleDocument(), ["weather", "weather"], false);
      expect(change.updated).toEqual(["weather"]);
    });

    it("settles a name found in both collections into the target", () => {
      const doc = sampleDocument();
      doc.inactive.weather = { command: "old" };

      const change = setServerStatus(doc, ["weather"], true);

      expect(change.updated).toEqual(["weather"]);
      expect(change.changed).toBe(true);
      expect(change.document.inactive.weather).toBeUndefined();
      expect(change.document.active.weather.command).toBe("uv");
    });

    it("preserves top-level extra keys", () => {
      const change = setServerStatus(sampleDocument(), ["weather"], false);
      expect(change.document.extra).toEqual({ globalShortcut: "Ctrl+Space" });
    });
  });

  describe("deleteServers", () => {
    it("removes names from whichever collection holds them", () => {
      const deletion = deleteServers(sampleDocument(), ["weather", "calendar"]);

      expect(deletion.deleted).toEqual(["weather", "calendar"]);
      expect(deletion.notFound).toEqual([]);
      expect(deletion.changed).toBe(true);
      expect(Object.keys(deletion.document.active)).toEqual(["notes"]);
      expect(Object.keys(deletion.document.inactive)).toEqual([]);
    });

    it("reports missing names without failing", () => {
      const doc = emptyDocument();
      const deletion = deleteServers(doc, ["missing"]);

      expect(deletion.deleted).toEqual([]);
      expect(deletion.notFound).toEqual(["missing"]);
      expect(deletion.changed).toBe(false);
      expect(deletion.document).toBe(doc);
    });

    it("does not treat inherited object keys as servers", () => {
      const deletion = deleteServers(sampleDocument(), ["toString", "constructor"]);
      expect(deletion.notFound).toEqual(["toString", "constructor"]);
      expect(deletion.changed).toBe(false);
    });
  });

  describe("invariants", () => {
    it("never leaves a name in both collections after a sequence of operations", () => {
      let doc = sampleDocument();
      doc = createServer(doc, "search", { command: "uv" });
      doc = setServerStatus(doc, ["search", "calendar"], true).document;
      doc = setServerStatus(doc, ["weather", "search"], false).document;
      doc = setServerStatus(doc, ["weather"], true).document;
      doc = deleteServers(doc, ["notes"]).document;
      doc = createServer(doc, "notes", { command: "node" });

      expect(namesInBoth(doc)).toEqual([]);
      expect(Object.keys(doc.active).sort()).toEqual(["calendar", "weather"]);
      expect(Object.keys(doc.inactive).sort()).toEqual(["notes", "search"]);
    });
  });

  describe("helpers", () => {
    it("builds uv launch args", () => {
      expect(buildLaunchArgs("/path", "server.py")).toEqual([
        "--directory",
        "/path",
        "run",
        "server.py",
      ]);
    });

    it("finds a server and its collection", () => {
      const doc = sampleDocument();
      expect(findServer(doc, "calendar")?.status).toBe("inactive");
      expect(findServer(doc, "notes")?.status).toBe("active");
      expect(findServer(doc, "ghost")).toBeUndefined();
    });

    it("dedupes names keeping first-seen order", () => {
      expect(uniqueNames(["b", "a", "b", "c", "a"])).toEqual(["b", "a", "c"]);
    });
  });
});
