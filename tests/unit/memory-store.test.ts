import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import fs from "fs";
import os from "os";
import path from "path";
import { DuplicateContentError, StoreBusyError } from "../../src/errors.js";
import { MemoryStore, hashContent, normalizeTagList } from "../../src/memory-store.js";
import { createTempStore, type TempStore } from "../helpers/temp-store.js";

describe("hashContent()", () => {
  it("ignores surrounding whitespace", () => {
    expect(hashContent("  hello world\n")).toBe(hashContent("hello world"));
  });

  it("treats composed and decomposed accents as the same content", () => {
    expect(hashContent("caf\u00e9")).toBe(hashContent("cafe\u0301"));
  });

  it("is a 64-character hex digest", () => {
    expect(hashContent("x")).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("normalizeTagList()", () => {
  it("splits on commas, trims, and drops blanks and duplicates", () => {
    expect(normalizeTagList(["a, b", " a ", "", "c,,"])).toEqual(["a", "b", "c"]);
  });

  it("keeps case-distinct tags", () => {
    expect(normalizeTagList(["API", "api"])).toEqual(["API", "api"]);
  });
});

describe("MemoryStore", () => {
  let temp: TempStore;
  let store: MemoryStore;

  beforeEach(() => {
    temp = createTempStore();
    store = temp.store;
  });

  afterEach(() => {
    temp.cleanup();
  });

  // ── init ──────────────────────────────────────────────────

  describe("init()", () => {
    it("creates missing parent directories", () => {
      const nested = new MemoryStore({ dbPath: path.join(temp.dir, "a", "b", "memory.db") });
      nested.init();
      expect(fs.existsSync(path.join(temp.dir, "a", "b", "memory.db"))).toBe(true);
      nested.close();
    });

    it("runs the journal in WAL mode", () => {
      const raw = new Database(temp.dbPath, { readonly: true });
      expect(raw.pragma("journal_mode", { simple: true })).toBe("wal");
      raw.close();
    });

    it("adds the access_count column to a database that lacks it", () => {
      const legacyPath = path.join(temp.dir, "legacy.db");
      const raw = new Database(legacyPath);
      raw.exec(`
        CREATE TABLE memories (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          content_hash TEXT UNIQUE NOT NULL,
          content TEXT NOT NULL,
          tags TEXT,
          memory_type TEXT,
          metadata TEXT,
          created_at REAL,
          updated_at REAL,
          created_at_iso TEXT,
          updated_at_iso TEXT,
          deleted_at REAL DEFAULT NULL
        );
        INSERT INTO memories (content_hash, content, tags, memory_type, metadata, created_at, updated_at)
        VALUES ('legacy-hash', 'old record', 'old,imported', 'note', '{}', 1700000000, 1700000000);
      `);
      raw.close();

      const legacy = new MemoryStore({ dbPath: legacyPath });
      legacy.init();
      const memory = legacy.getByHash("legacy-hash");
      expect(memory?.accessCount).toBe(0);
      expect(memory?.tags).toEqual(["old", "imported"]);
      expect(memory?.createdAt).toBe("2023-11-14T22:13:20.000Z");
      legacy.close();
    });

    it("can be retried after failing with StoreBusyError", () => {
      const freshPath = path.join(temp.dir, "fresh.db");
      const holder = new Database(freshPath);
      holder.pragma("journal_mode = WAL");
      holder.exec("BEGIN IMMEDIATE");

      const fresh = new MemoryStore({ dbPath: freshPath, busyTimeoutMs: 50 });
      try {
        expect(() => fresh.init()).toThrow(StoreBusyError);
        expect(() => fresh.count()).toThrow("not initialized");
      } finally {
        holder.exec("ROLLBACK");
        holder.close();
      }

      fresh.init();
      expect(fresh.storeMemory({ content: "hello" }).content).toBe("hello");
      expect(fresh.count()).toBe(1);
      fresh.close();
    });

    it("throws when used before init", () => {
      const fresh = new MemoryStore({ dbPath: path.join(temp.dir, "other.db") });
      expect(() => fresh.count()).toThrow("not initialized");
    });
  });

  // ── storeMemory ───────────────────────────────────────────

  describe("storeMemory()", () => {
    it("returns the stored record with its row id and hash", () => {
      const memory = store.storeMemory({ content: "TypeScript is great", tags: ["lang"] });
      expect(memory.id).toBeGreaterThan(0);
      expect(memory.contentHash).toBe(hashContent("TypeScript is great"));
      expect(memory.tags).toEqual(["lang"]);
      expect(memory.memoryType).toBe("note");
      expect(memory.metadata).toEqual({});
      expect(memory.deletedAt).toBeNull();
      expect(memory.accessCount).toBe(0);
      expect(memory.updatedAt).toBe(memory.createdAt);
    });

    it("round-trips through getByHash", () => {
      const created = new Date("2026-02-03T04:05:06.000Z");
      const stored = store.storeMemory({
        content: "deploy on fridays is banned",
        tags: ["ops", "policy"],
        memoryType: "observation",
        metadata: { source: "test", nested: { n: 1 } },
        createdAt: created,
      });
      expect(store.getByHash(stored.contentHash)).toEqual(stored);
      expect(stored.createdAt).toBe("2026-02-03T04:05:06.000Z");
    });

    it("rejects identical content with DuplicateContentError", () => {
      const first = store.storeMemory({ content: "same text" });
      expect(() => store.storeMemory({ content: "  same text  " })).toThrow(DuplicateContentError);
      try {
        store.storeMemory({ content: "same text" });
      } catch (error) {
        expect(error).toBeInstanceOf(DuplicateContentError);
        if (error instanceof DuplicateContentError) expect(error.contentHash).toBe(first.contentHash);
      }
      expect(store.count()).toBe(1);
    });

    it("rejects content matching a soft-deleted record", () => {
      const first = store.storeMemory({ content: "gone but not forgotten" });
      store.softDelete(first.contentHash);
      expect(() => store.storeMemory({ content: "gone but not forgotten" })).toThrow(DuplicateContentError);
    });

    it("stores injection-shaped text literally", () => {
      const content = "'); DROP TABLE memories; --";
      const memory = store.storeMemory({ content, tags: ["x' OR '1'='1"] });
      expect(store.getByHash(memory.contentHash)?.content).toBe(content);
      expect(store.getByHash("' OR 1=1 --")).toBeNull();
      expect(store.searchByTag("x' OR")).toHaveLength(1);
      expect(store.searchByTag("%' OR 1=1 --")).toHaveLength(0);
      expect(store.count()).toBe(1);
    });
  });

  // ── lookup and listing ───────────────────────────────────

  describe("getByHash()", () => {
    it("hides soft-deleted records", () => {
      const memory = store.storeMemory({ content: "hidden soon" });
      store.softDelete(memory.contentHash);
      expect(store.getByHash(memory.contentHash)).toBeNull();
    });

    it("getByHashIncludingDeleted still finds them", () => {
      const memory = store.storeMemory({ content: "hidden soon" });
      store.softDelete(memory.contentHash);
      const found = store.getByHashIncludingDeleted(memory.contentHash);
      expect(found?.content).toBe("hidden soon");
      expect(found?.deletedAt).not.toBeNull();
    });

    it("returns null for an unknown hash", () => {
      expect(store.getByHash("nope")).toBeNull();
    });
  });

  describe("getAll()", () => {
    beforeEach(() => {
      store.storeMemory({ content: "oldest", createdAt: new Date("2026-01-01T00:00:00Z") });
      store.storeMemory({ content: "newest", createdAt: new Date("2026-03-01T00:00:00Z") });
      store.storeMemory({ content: "middle", createdAt: new Date("2026-02-01T00:00:00Z") });
    });

    it("lists live records newest first", () => {
      expect(store.getAll().map((m) => m.content)).toEqual(["newest", "middle", "oldest"]);
    });

    it("paginates with limit and offset", () => {
      expect(store.getAll(1, 1).map((m) => m.content)).toEqual(["middle"]);
    });

    it("skips soft-deleted records", () => {
      store.softDelete(hashContent("middle"));
      expect(store.getAll().map((m) => m.content)).toEqual(["newest", "oldest"]);
    });
  });

  describe("searchByTag()", () => {
    it("matches substrings of the stored tag string", () => {
      store.storeMemory({ content: "one", tags: ["rapid"] });
      store.storeMemory({ content: "two", tags: ["web"] });
      expect(store.searchByTag("api").map((m) => m.content)).toEqual(["one"]);
    });

    it("treats LIKE wildcards in the query literally", () => {
      store.storeMemory({ content: "percent", tags: ["100%"] });
      store.storeMemory({ content: "plain", tags: ["1000"] });
      store.storeMemory({ content: "underscore", tags: ["a_b"] });
      store.storeMemory({ content: "letters", tags: ["axb"] });
      expect(store.searchByTag("100%").map((m) => m.content)).toEqual(["percent"]);
      expect(store.searchByTag("a_b").map((m) => m.content)).toEqual(["underscore"]);
    });

    it("excludes soft-deleted records", () => {
      const memory = store.storeMemory({ content: "tagged", tags: ["project-x"] });
      store.softDelete(memory.contentHash);
      expect(store.searchByTag("project-x")).toEqual([]);
    });
  });

  // ── mutation ─────────────────────────────────────────────

  describe("updateTags()", () => {
    it("replaces the tag set and bumps updatedAt", () => {
      const memory = store.storeMemory({
        content: "retag me",
        tags: ["old"],
        createdAt: new Date("2026-01-01T00:00:00Z"),
      });
      expect(store.updateTags(memory.contentHash, ["new", "new", " other "])).toBe(true);

      const updated = store.getByHash(memory.contentHash);
      expect(updated?.tags).toEqual(["new", "other"]);
      expect(updated?.createdAt).toBe("2026-01-01T00:00:00.000Z");
      expect(updated?.updatedAt).not.toBe(memory.updatedAt);
    });

    it("returns false for unknown or deleted records", () => {
      const memory = store.storeMemory({ content: "deleted first" });
      store.softDelete(memory.contentHash);
      expect(store.updateTags(memory.contentHash, ["x"])).toBe(false);
      expect(store.updateTags("unknown", ["x"])).toBe(false);
    });
  });

  describe("softDelete()", () => {
    it("returns true once, then false", () => {
      const memory = store.storeMemory({ content: "delete me" });
      expect(store.softDelete(memory.contentHash)).toBe(true);
      expect(store.softDelete(memory.contentHash)).toBe(false);
      expect(store.count()).toBe(0);
    });

    it("keeps the first deletion time", () => {
      const memory = store.storeMemory({ content: "delete me" });
      store.softDelete(memory.contentHash);
      const firstDeletedAt = store.getByHashIncludingDeleted(memory.contentHash)?.deletedAt;
      store.softDelete(memory.contentHash);
      expect(store.getByHashIncludingDeleted(memory.contentHash)?.deletedAt).toBe(firstDeletedAt);
    });
  });

  describe("storeMerged()", () => {
    it("adds the merged record and retires the originals together", () => {
      const a = store.storeMemory({ content: "alpha fact" });
      const b = store.storeMemory({ content: "alpha fact again" });
      const merged = store.storeMerged({ content: "alpha fact, merged" }, [a.contentHash, b.contentHash]);

      expect(store.getAll().map((m) => m.contentHash)).toEqual([merged.contentHash]);
      expect(store.getByHashIncludingDeleted(a.contentHash)?.deletedAt).not.toBeNull();
      expect(store.getByHashIncludingDeleted(b.contentHash)?.deletedAt).not.toBeNull();
    });

    it("changes nothing when the merged content already exists", () => {
      const a = store.storeMemory({ content: "first" });
      const b = store.storeMemory({ content: "second" });
      expect(() => store.storeMerged({ content: "first" }, [a.contentHash, b.contentHash])).toThrow(
        DuplicateContentError,
      );
      expect(store.count()).toBe(2);
    });
  });

  describe("recordAccess()", () => {
    it("increments accessCount without touching updatedAt", () => {
      const memory = store.storeMemory({ content: "popular", createdAt: new Date("2026-01-01T00:00:00Z") });
      store.recordAccess([memory.contentHash]);
      store.recordAccess([memory.contentHash, "unknown"]);

      const read = store.getByHash(memory.contentHash);
      expect(read?.accessCount).toBe(2);
      expect(read?.updatedAt).toBe("2026-01-01T00:00:00.000Z");
    });
  });

  // ── graph ────────────────────────────────────────────────

  describe("storeEdge()", () => {
    it("inserts once and ignores repeats, keeping the first weight", () => {
      expect(store.storeEdge({ sourceHash: "a", targetHash: "b", similarity: 0.4 })).toBe(true);
      expect(store.storeEdge({ sourceHash: "a", targetHash: "b", similarity: 0.9 })).toBe(false);

      const edges = store.getEdges("a");
      expect(edges).toHaveLength(1);
      expect(edges[0].similarity).toBe(0.4);
      expect(edges[0].connectionTypes).toBe("consolidation");
      expect(edges[0].relationshipType).toBe("related");
    });

    it("treats the reverse direction as a different edge", () => {
      store.storeEdge({ sourceHash: "a", targetHash: "b", similarity: 0.5 });
      store.storeEdge({ sourceHash: "b", targetHash: "a", similarity: 0.5 });
      expect(store.getEdges("a")).toHaveLength(2);
      expect(store.stats().edgeCount).toBe(2);
    });

    it("rejects similarity outside [0, 1]", () => {
      expect(() => store.storeEdge({ sourceHash: "a", targetHash: "b", similarity: 1.5 })).toThrow(RangeError);
      expect(() => store.storeEdge({ sourceHash: "a", targetHash: "b", similarity: -0.1 })).toThrow(RangeError);
      expect(() => store.storeEdge({ sourceHash: "a", targetHash: "b", similarity: Number.NaN })).toThrow(RangeError);
    });

    it("accepts the bounds themselves", () => {
      expect(store.storeEdge({ sourceHash: "a", targetHash: "b", similarity: 0 })).toBe(true);
      expect(store.storeEdge({ sourceHash: "a", targetHash: "c", similarity: 1 })).toBe(true);
    });

    it("keeps custom labels and metadata", () => {
      store.storeEdge({
        sourceHash: "a",
        targetHash: "b",
        similarity: 0.7,
        connectionTypes: "compaction",
        relationshipType: "supersedes",
        metadata: { reasoning: "newer" },
      });
      const [edge] = store.getEdges("b");
      expect(edge.connectionTypes).toBe("compaction");
      expect(edge.relationshipType).toBe("supersedes");
      expect(edge.metadata).toEqual({ reasoning: "newer" });
    });
  });

  // ── stats ────────────────────────────────────────────────

  describe("stats()", () => {
    it("reports zeros for an empty store", () => {
      const stats = store.stats();
      expect(stats.count).toBe(0);
      expect(stats.deletedCount).toBe(0);
      expect(stats.edgeCount).toBe(0);
      expect(stats.sizeBytes).toBeGreaterThan(0);
    });

    it("counts live and deleted records separately", () => {
      store.storeMemory({ content: "one" });
      const two = store.storeMemory({ content: "two" });
      store.softDelete(two.contentHash);
      const stats = store.stats();
      expect(stats.count).toBe(1);
      expect(stats.deletedCount).toBe(1);
    });
  });

  // ── concurrency ──────────────────────────────────────────

  describe("multiple connections", () => {
    it("lets exactly one of two racing inserts succeed", async () => {
      const other = new MemoryStore({ dbPath: temp.dbPath });
      other.init();
      const results = await Promise.allSettled(
        [store, other].map(async (s) => s.storeMemory({ content: "racing content" })),
      );
      other.close();

      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      const rejected = results.filter((r) => r.status === "rejected");
      expect(rejected).toHaveLength(1);
      expect(rejected[0].status === "rejected" && rejected[0].reason).toBeInstanceOf(DuplicateContentError);
    });

    it("sees writes from another connection", () => {
      const other = new MemoryStore({ dbPath: temp.dbPath });
      other.init();
      other.storeMemory({ content: "written elsewhere" });
      expect(store.getByHash(hashContent("written elsewhere"))?.content).toBe("written elsewhere");
      other.close();
    });

    it("fails with StoreBusyError while another connection holds the write lock", () => {
      const impatient = new MemoryStore({ dbPath: temp.dbPath, busyTimeoutMs: 50 });
      impatient.init();
      const holder = new Database(temp.dbPath);
      holder.exec("BEGIN IMMEDIATE");
      try {
        expect(() => impatient.storeMemory({ content: "blocked" })).toThrow(StoreBusyError);
        // readers are not blocked in WAL mode
        expect(impatient.count()).toBe(0);
      } finally {
        holder.exec("ROLLBACK");
        holder.close();
        impatient.close();
      }
    });
  });

  // ── backup ───────────────────────────────────────────────

  describe("backupTo()", () => {
    it("writes a readable copy of the database", async () => {
      store.storeMemory({ content: "kept in backup" });
      const dest = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "store-backup-")), "copy.db");
      await store.backupTo(dest);

      const copy = new MemoryStore({ dbPath: dest });
      copy.init();
      expect(copy.getAll().map((m) => m.content)).toEqual(["kept in backup"]);
      copy.close();
      fs.rmSync(path.dirname(dest), { recursive: true, force: true });
    });
  });
});
