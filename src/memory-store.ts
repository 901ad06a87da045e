import Database from "better-sqlite3";
import { createHash } from "crypto";
import path from "path";
import fs from "fs";
import { DuplicateContentError, StoreBusyError } from "./errors.js";
import { logger } from "./logger.js";
import type {
  GraphEdge,
  GraphEdgeRow,
  Memory,
  MemoryRow,
  MemoryStoreConfig,
  NewGraphEdge,
  NewMemory,
  StoreStats,
} from "./types.js";

const DEFAULT_BUSY_TIMEOUT_MS = 5000;
const SCHEMA_VERSION = "2";
const TAG_DELIMITER = ",";

const MEMORY_COLUMNS =
  "id, content_hash, content, tags, memory_type, metadata, created_at, updated_at, created_at_iso, updated_at_iso, deleted_at, access_count";

/** SHA-256 of the NFC-normalized, trimmed content. */
export function hashContent(content: string): string {
  return createHash("sha256").update(content.normalize("NFC").trim()).digest("hex");
}

/** Split, trim and de-duplicate tags, keeping first-seen order. */
export function normalizeTagList(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of tags) {
    for (const piece of raw.split(TAG_DELIMITER)) {
      const tag = piece.trim();
      if (tag) seen.add(tag);
    }
  }
  return [...seen];
}

function parseTags(raw: string | null): string[] {
  return normalizeTagList(raw ? [raw] : []);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(raw: string | null, context: string): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) return parsed;
  } catch (error) {
    logger.warn(`Unreadable metadata on ${context}`, { error: String(error) });
    return {};
  }
  logger.warn(`Metadata on ${context} is not an object`);
  return {};
}

function epochSeconds(date: Date): number {
  return date.getTime() / 1000;
}

function isoFromRow(iso: string | null, seconds: number): string {
  return iso ?? new Date(seconds * 1000).toISOString();
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * SQLite-backed memory store with a weighted relationship graph.
 *
 * Several processes may open the same file: the journal runs in WAL mode so readers
 * never wait on writers, and every write is one auto-committed statement or a short
 * IMMEDIATE transaction. A write that cannot get the lock within the busy timeout
 * fails with {@link StoreBusyError}; the store never retries on its own.
 */
export class MemoryStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly busyTimeoutMs: number;

  constructor(config: MemoryStoreConfig) {
    this.dbPath = config.dbPath;
    this.busyTimeoutMs = config.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
  }

  get path(): string {
    return this.dbPath;
  }

  /**
   * Open the database and create or upgrade the schema. Must be called before any operations.
   */
  init(): void {
    if (this.db) return;

    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const db = new Database(this.dbPath, { timeout: this.busyTimeoutMs });
    try {
      this.guard("open", () => {
        db.pragma("journal_mode = WAL");
        db.pragma("synchronous = NORMAL");
        this.initializeSchema(db);
      });
    } catch (error) {
      // A half-initialized handle must not stick: a retried init() opens afresh
      db.close();
      throw error;
    }
    this.db = db;
  }

  private initializeSchema(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS metadata (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS memories (
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
        deleted_at REAL DEFAULT NULL,
        access_count INTEGER NOT NULL DEFAULT 0
      );
      CREATE INDEX IF NOT EXISTS idx_content_hash ON memories(content_hash);
      CREATE INDEX IF NOT EXISTS idx_created_at ON memories(created_at);
      CREATE INDEX IF NOT EXISTS idx_memory_type ON memories(memory_type);
      CREATE INDEX IF NOT EXISTS idx_deleted_at ON memories(deleted_at);

      CREATE TABLE IF NOT EXISTS memory_graph (
        source_hash TEXT NOT NULL,
        target_hash TEXT NOT NULL,
        similarity REAL NOT NULL,
        connection_types TEXT NOT NULL,
        metadata TEXT,
        created_at REAL NOT NULL,
        relationship_type TEXT DEFAULT 'related',
        PRIMARY KEY (source_hash, target_hash)
      );
      CREATE INDEX IF NOT EXISTS idx_graph_source ON memory_graph(source_hash);
      CREATE INDEX IF NOT EXISTS idx_graph_target ON memory_graph(target_hash);
    `);

    // Databases written by older tools have no access_count column
    const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(memories)`).all();
    if (!columns.some((column) => column.name === "access_count")) {
      db.exec(`ALTER TABLE memories ADD COLUMN access_count INTEGER NOT NULL DEFAULT 0`);
    }

    const seed = db.prepare<[string, string]>(`INSERT OR IGNORE INTO metadata (key, value) VALUES (?, ?)`);
    seed.run("distance_metric", "cosine");
    seed.run("schema_version", SCHEMA_VERSION);
  }

  private conn(): Database.Database {
    if (!this.db) {
      throw new Error("Memory store not initialized. Call init() first.");
    }
    return this.db;
  }

  /** Run a storage call, translating lock contention into StoreBusyError. */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code.startsWith("SQLITE_BUSY")) {
        throw new StoreBusyError(operation, { cause: error });
      }
      throw error;
    }
  }

  // ── records ────────────────────────────────────────────────

  /**
   * Insert a new memory. This is not an upsert: a content hash that already exists,
   * even on a soft-deleted row, raises {@link DuplicateContentError}.
   */
  storeMemory(input: NewMemory): Memory {
    const db = this.conn();
    return this.guard("storeMemory", () => this.insertRecord(db, input));
  }

  /**
   * Store a consolidated record and soft-delete the records it replaces, all in one
   * IMMEDIATE transaction. Either everything is written or nothing is.
   */
  storeMerged(input: NewMemory, replacedHashes: readonly string[]): Memory {
    const db = this.conn();
    const tx = db.transaction((record: NewMemory, hashes: readonly string[]) => {
      const merged = this.insertRecord(db, record);
      const now = new Date();
      for (const hash of hashes) this.markDeleted(db, hash, now);
      return merged;
    });
    return this.guard("storeMerged", () => tx.immediate(input, replacedHashes));
  }

  private insertRecord(db: Database.Database, input: NewMemory): Memory {
    const contentHash = input.contentHash ?? hashContent(input.content);
    const createdAt = input.createdAt ?? new Date();
    const updatedAt = input.updatedAt ?? createdAt;
    const tags = normalizeTagList(input.tags ?? []);
    const memoryType = input.memoryType ?? "note";
    const metadata = input.metadata ?? {};

    let result: Database.RunResult;
    try {
      result = db
        .prepare<[string, string, string, string, string, number, number, string, string]>(
          `INSERT INTO memories (content_hash, content, tags, memory_type, metadata,
             created_at, updated_at, created_at_iso, updated_at_iso)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          contentHash,
          input.content,
          tags.join(TAG_DELIMITER),
          memoryType,
          JSON.stringify(metadata),
          epochSeconds(createdAt),
          epochSeconds(updatedAt),
          createdAt.toISOString(),
          updatedAt.toISOString(),
        );
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code.startsWith("SQLITE_CONSTRAINT")) {
        throw new DuplicateContentError(contentHash, { cause: error });
      }
      throw error;
    }

    return {
      id: Number(result.lastInsertRowid),
      content: input.content,
      contentHash,
      tags,
      memoryType,
      metadata,
      createdAt: createdAt.toISOString(),
      updatedAt: updatedAt.toISOString(),
      deletedAt: null,
      accessCount: 0,
    };
  }

  /**
   * Get a live memory by content hash.
   */
  getByHash(hash: string): Memory | null {
    const row = this.guard("getByHash", () =>
      this.conn()
        .prepare<[string], MemoryRow>(
          `SELECT ${MEMORY_COLUMNS} FROM memories WHERE content_hash = ? AND deleted_at IS NULL`,
        )
        .get(hash),
    );
    return row ? this.rowToMemory(row) : null;
  }

  /**
   * Get a memory by content hash whether or not it has been soft-deleted.
   */
  getByHashIncludingDeleted(hash: string): Memory | null {
    const row = this.guard("getByHashIncludingDeleted", () =>
      this.conn()
        .prepare<[string], MemoryRow>(`SELECT ${MEMORY_COLUMNS} FROM memories WHERE content_hash = ?`)
        .get(hash),
    );
    return row ? this.rowToMemory(row) : null;
  }

  /**
   * Retrieve live memories, ordered by most recent first.
   */
  getAll(limit = 100, offset = 0): Memory[] {
    const rows = this.guard("getAll", () =>
      this.conn()
        .prepare<[number, number], MemoryRow>(
          `SELECT ${MEMORY_COLUMNS} FROM memories WHERE deleted_at IS NULL
           ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`,
        )
        .all(limit, offset),
    );
    return rows.map((row) => this.rowToMemory(row));
  }

  /**
   * Live memories whose tag string contains `tag` as a substring, newest first.
   * "api" matches a record tagged "rapid"; callers that need whole tags filter the result.
   */
  searchByTag(tag: string): Memory[] {
    const rows = this.guard("searchByTag", () =>
      this.conn()
        .prepare<[string], MemoryRow>(
          `SELECT ${MEMORY_COLUMNS} FROM memories
           WHERE tags LIKE ? ESCAPE '\\' AND deleted_at IS NULL
           ORDER BY created_at DESC, id DESC`,
        )
        .all(`%${escapeLike(tag)}%`),
    );
    return rows.map((row) => this.rowToMemory(row));
  }

  /**
   * Replace the tag set of a live memory. Returns false when no live memory has that hash.
   */
  updateTags(hash: string, tags: readonly string[]): boolean {
    const now = new Date();
    const result = this.guard("updateTags", () =>
      this.conn()
        .prepare<[string, number, string, string]>(
          `UPDATE memories SET tags = ?, updated_at = ?, updated_at_iso = ?
           WHERE content_hash = ? AND deleted_at IS NULL`,
        )
        .run(normalizeTagList(tags).join(TAG_DELIMITER), epochSeconds(now), now.toISOString(), hash),
    );
    return result.changes > 0;
  }

  /**
   * Mark a memory deleted. Already-deleted or unknown hashes are a no-op returning false.
   */
  softDelete(hash: string): boolean {
    const db = this.conn();
    return this.guard("softDelete", () => this.markDeleted(db, hash, new Date()));
  }

  private markDeleted(db: Database.Database, hash: string, now: Date): boolean {
    const seconds = epochSeconds(now);
    const result = db
      .prepare<[number, number, string, string]>(
        `UPDATE memories SET deleted_at = ?, updated_at = ?, updated_at_iso = ?
         WHERE content_hash = ? AND deleted_at IS NULL`,
      )
      .run(seconds, seconds, now.toISOString(), hash);
    return result.changes > 0;
  }

  /**
   * Count one retrieval for each hash. Does not touch updatedAt.
   */
  recordAccess(hashes: readonly string[]): void {
    if (hashes.length === 0) return;
    const db = this.conn();
    const bump = db.prepare<[string]>(
      `UPDATE memories SET access_count = access_count + 1 WHERE content_hash = ? AND deleted_at IS NULL`,
    );
    const tx = db.transaction((list: readonly string[]) => {
      for (const hash of list) bump.run(hash);
    });
    this.guard("recordAccess", () => tx.immediate(hashes));
  }

  /**
   * Get live memory count.
   */
  count(): number {
    const row = this.guard("count", () =>
      this.conn()
        .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM memories WHERE deleted_at IS NULL`)
        .get(),
    );
    return row?.count ?? 0;
  }

  // ── graph ──────────────────────────────────────────────────

  /**
   * Insert an edge unless one already exists for (source, target). The first write wins:
   * a repeated insert neither errors nor overwrites. Returns whether a row was added.
   */
  storeEdge(edge: NewGraphEdge): boolean {
    if (!Number.isFinite(edge.similarity) || edge.similarity < 0 || edge.similarity > 1) {
      throw new RangeError(`Edge similarity must be within [0, 1], got ${edge.similarity}`);
    }

    const result = this.guard("storeEdge", () =>
      this.conn()
        .prepare<[string, string, number, string, string, number, string]>(
          `INSERT OR IGNORE INTO memory_graph
             (source_hash, target_hash, similarity, connection_types, metadata, created_at, relationship_type)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          edge.sourceHash,
          edge.targetHash,
          edge.similarity,
          edge.connectionTypes ?? "consolidation",
          JSON.stringify(edge.metadata ?? {}),
          epochSeconds(new Date()),
          edge.relationshipType ?? "related",
        ),
    );
    return result.changes > 0;
  }

  /**
   * Edges that start or end at the given hash, oldest first.
   */
  getEdges(hash: string): GraphEdge[] {
    const rows = this.guard("getEdges", () =>
      this.conn()
        .prepare<[string, string], GraphEdgeRow>(
          `SELECT source_hash, target_hash, similarity, connection_types, metadata, created_at, relationship_type
           FROM memory_graph WHERE source_hash = ? OR target_hash = ? ORDER BY created_at ASC`,
        )
        .all(hash, hash),
    );
    return rows.map((row) => ({
      sourceHash: row.source_hash,
      targetHash: row.target_hash,
      similarity: row.similarity,
      connectionTypes: row.connection_types,
      relationshipType: row.relationship_type ?? "related",
      metadata: parseJsonObject(row.metadata, `edge ${row.source_hash}->${row.target_hash}`),
      createdAt: new Date(row.created_at * 1000).toISOString(),
    }));
  }

  // ── maintenance ────────────────────────────────────────────

  stats(): StoreStats {
    const db = this.conn();
    return this.guard("stats", () => {
      const counts = db
        .prepare<[], { live: number | null; deleted: number | null }>(
          `SELECT SUM(deleted_at IS NULL) AS live, SUM(deleted_at IS NOT NULL) AS deleted FROM memories`,
        )
        .get();
      const edges = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM memory_graph`).get();
      const pageCount = Number(db.pragma("page_count", { simple: true }));
      const pageSize = Number(db.pragma("page_size", { simple: true }));
      return {
        count: counts?.live ?? 0,
        deletedCount: counts?.deleted ?? 0,
        edgeCount: edges?.count ?? 0,
        sizeBytes: pageCount * pageSize,
      };
    });
  }

  /**
   * Write a consistent snapshot of the database to `destination` while it stays open.
   */
  async backupTo(destination: string): Promise<void> {
    await this.conn().backup(destination);
  }

  /**
   * Close the database connection.
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private rowToMemory(row: MemoryRow): Memory {
    return {
      id: row.id,
      content: row.content,
      contentHash: row.content_hash,
      tags: parseTags(row.tags),
      memoryType: row.memory_type ?? "note",
      metadata: parseJsonObject(row.metadata, `memory ${row.id}`),
      createdAt: isoFromRow(row.created_at_iso, row.created_at),
      updatedAt: isoFromRow(row.updated_at_iso, row.updated_at),
      deletedAt: row.deleted_at === null ? null : new Date(row.deleted_at * 1000).toISOString(),
      accessCount: row.access_count,
    };
  }
}
