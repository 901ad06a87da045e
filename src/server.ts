import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { BackupManager } from "./backup.js";
import { LlmMergeJudge, runCompact, COMPACT_DEFAULTS } from "./compactor.js";
import { consolidateSession, reflectOnSession } from "./consolidator.js";
import { CapabilityUnavailableError, DuplicateContentError } from "./errors.js";
import { logger } from "./logger.js";
import type { MemoryStore } from "./memory-store.js";
import { generatePreload, writePreload } from "./predictor.js";
import { RelevanceScorer } from "./scoring.js";
import { readSessionLog } from "./session-log.js";
import { jaccardSimilarity } from "./similarity.js";
import type { Memory, TextCompleter } from "./types.js";

export const SERVER_NAME = "memory-consolidator";
export const SERVER_VERSION = "0.1.0";

const RECALL_CANDIDATES = 1000;

export interface ServerDeps {
  store: MemoryStore;
  /** Needed by consolidate_session, compact_memories and predict_preload only. */
  completer?: TextCompleter;
  scorer?: RelevanceScorer;
  sessionLogPath?: string;
  openQuestionsPath?: string;
  /** Where predict_preload writes the briefing when asked to. */
  preloadPath?: string;
  /** When set, a mutating compaction pass is preceded by a backup. */
  backups?: BackupManager;
}

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function errorResult(action: string, error: unknown): ToolResult {
  const msg = error instanceof Error ? error.message : String(error);
  if (!(error instanceof DuplicateContentError) && !(error instanceof CapabilityUnavailableError)) {
    logger.error(`Tool failed: ${action}`, { error: msg });
  }
  return { content: [{ type: "text", text: `Error ${action}: ${msg}` }], isError: true };
}

function summarize(m: Memory) {
  return {
    id: m.id,
    contentHash: m.contentHash,
    content: m.content,
    tags: m.tags,
    memoryType: m.memoryType,
    createdAt: m.createdAt,
  };
}

const hashArg = z.string().min(1).describe("Content hash (SHA-256 hex) of the memory");

export function createServer(deps: ServerDeps): McpServer {
  const { store } = deps;
  const scorer = deps.scorer ?? new RelevanceScorer();

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  function requireCompleter(): TextCompleter {
    if (!deps.completer) {
      throw new CapabilityUnavailableError("No text-completion backend is configured for this server");
    }
    return deps.completer;
  }

  // ─── Tool: save_memory ──────────────────────────────────────────────────────

  server.tool(
    "save_memory",
    "Store a new memory. Content is immutable and de-duplicated by hash: saving identical text twice is an error.",
    {
      content: z.string().min(1).describe("The text content to store"),
      tags: z.array(z.string()).optional().describe("Labels for categorization (e.g. [\"project-x\", \"decision\"])"),
      memory_type: z.string().min(1).optional().describe("Record type (default: note)"),
      metadata: z.record(z.unknown()).optional().describe("Optional JSON metadata attached to the memory"),
    },
    async ({ content, tags, memory_type, metadata }) => {
      try {
        const memory = store.storeMemory({
          content,
          ...(tags ? { tags } : {}),
          ...(memory_type ? { memoryType: memory_type } : {}),
          ...(metadata ? { metadata } : {}),
        });
        return jsonResult({
          status: "saved",
          id: memory.id,
          contentHash: memory.contentHash,
          preview: content.length > 120 ? content.slice(0, 120) + "..." : content,
          tags: memory.tags,
          memoryType: memory.memoryType,
          createdAt: memory.createdAt,
        });
      } catch (error) {
        return errorResult("saving memory", error);
      }
    },
  );

  // ─── Tool: get_memory ───────────────────────────────────────────────────────

  server.tool(
    "get_memory",
    "Fetch one memory by content hash. Soft-deleted memories are hidden unless include_deleted is set.",
    {
      content_hash: hashArg,
      include_deleted: z.boolean().optional().default(false).describe("Also return a soft-deleted memory"),
    },
    async ({ content_hash, include_deleted }) => {
      try {
        const memory = include_deleted ? store.getByHashIncludingDeleted(content_hash) : store.getByHash(content_hash);
        if (!memory) return textResult(`Memory ${content_hash} not found.`);
        return jsonResult(memory);
      } catch (error) {
        return errorResult("retrieving memory", error);
      }
    },
  );

  // ─── Tool: get_all_memories ─────────────────────────────────────────────────

  server.tool(
    "get_all_memories",
    "List live memories, most recent first. Results are paginated.",
    {
      limit: z.number().int().min(1).max(500).optional().default(100).describe("Maximum number of memories to return (default: 100)"),
      offset: z.number().int().min(0).optional().default(0).describe("Number of memories to skip for pagination (default: 0)"),
    },
    async ({ limit, offset }) => {
      try {
        const memories = store.getAll(limit, offset);
        const total = store.count();
        return jsonResult({ total, returned: memories.length, offset, memories: memories.map(summarize) });
      } catch (error) {
        return errorResult("retrieving memories", error);
      }
    },
  );

  // ─── Tool: search_by_tag ────────────────────────────────────────────────────

  server.tool(
    "search_by_tag",
    "Find live memories whose tag list contains the given text (substring match), newest first.",
    {
      tag: z.string().min(1).describe("Tag text to look for"),
    },
    async ({ tag }) => {
      try {
        const results = store.searchByTag(tag);
        if (results.length === 0) return textResult(`No memories found with tag: ${tag}`);
        return jsonResult(results.map(summarize));
      } catch (error) {
        return errorResult("searching by tag", error);
      }
    },
  );

  // ─── Tool: update_tags ──────────────────────────────────────────────────────

  server.tool(
    "update_tags",
    "Replace the tags of a live memory.",
    {
      content_hash: hashArg,
      tags: z.array(z.string()).describe("The complete new tag list"),
    },
    async ({ content_hash, tags }) => {
      try {
        const updated = store.updateTags(content_hash, tags);
        if (!updated) return textResult(`Memory ${content_hash} not found.`);
        return jsonResult({ status: "updated", contentHash: content_hash, tags: store.getByHash(content_hash)?.tags ?? [] });
      } catch (error) {
        return errorResult("updating tags", error);
      }
    },
  );

  // ─── Tool: delete_memory ────────────────────────────────────────────────────

  server.tool(
    "delete_memory",
    "Soft-delete a memory. It disappears from listings and recall but stays in the database, and its content cannot be saved again.",
    {
      content_hash: hashArg,
    },
    async ({ content_hash }) => {
      try {
        const deleted = store.softDelete(content_hash);
        return textResult(deleted ? `Memory ${content_hash} deleted.` : `Memory ${content_hash} not found or already deleted.`);
      } catch (error) {
        return errorResult("deleting memory", error);
      }
    },
  );

  // ─── Tool: link_memories ────────────────────────────────────────────────────

  server.tool(
    "link_memories",
    "Record a weighted relationship between two live memories. An existing link between the same pair is kept unchanged.",
    {
      source_hash: hashArg,
      target_hash: hashArg,
      similarity: z.number().min(0).max(1).describe("Edge weight in [0, 1]"),
      relationship_type: z.string().min(1).optional().describe("Relationship label (default: related)"),
      connection_types: z.string().min(1).optional().describe("How the link was found (default: consolidation)"),
    },
    async ({ source_hash, target_hash, similarity, relationship_type, connection_types }) => {
      try {
        for (const hash of [source_hash, target_hash]) {
          if (!store.getByHash(hash)) {
            return { ...textResult(`Memory ${hash} not found.`), isError: true };
          }
        }
        const created = store.storeEdge({
          sourceHash: source_hash,
          targetHash: target_hash,
          similarity,
          ...(relationship_type ? { relationshipType: relationship_type } : {}),
          ...(connection_types ? { connectionTypes: connection_types } : {}),
        });
        return jsonResult({ status: created ? "linked" : "exists", sourceHash: source_hash, targetHash: target_hash });
      } catch (error) {
        return errorResult("linking memories", error);
      }
    },
  );

  // ─── Tool: get_links ────────────────────────────────────────────────────────

  server.tool(
    "get_links",
    "List the relationship edges in which a memory is the source or the target.",
    {
      content_hash: hashArg,
    },
    async ({ content_hash }) => {
      try {
        return jsonResult(store.getEdges(content_hash));
      } catch (error) {
        return errorResult("retrieving links", error);
      }
    },
  );

  // ─── Tool: recall_memories ──────────────────────────────────────────────────

  server.tool(
    "recall_memories",
    "Rank live memories for a query by word overlap, recency and how often they were recalled before. Returned memories count as accessed.",
    {
      query: z.string().min(1).describe("What to recall"),
      limit: z.number().int().min(1).max(50).optional().default(5).describe("Maximum number of results (default: 5)"),
    },
    async ({ query, limit }) => {
      try {
        const candidates = store
          .getAll(RECALL_CANDIDATES)
          .map((memory) => ({ memory, similarity: jaccardSimilarity(query, memory.content) }))
          .filter((candidate) => candidate.similarity > 0);
        const ranked = scorer.rank(candidates).slice(0, limit);
        if (ranked.length === 0) return textResult("No relevant memories found.");

        store.recordAccess(ranked.map((r) => r.memory.contentHash));
        return jsonResult(
          ranked.map((r, i) => ({
            rank: i + 1,
            score: Math.round(r.score * 1000) / 1000,
            ...summarize(r.memory),
            accessCount: r.memory.accessCount + 1,
          })),
        );
      } catch (error) {
        return errorResult("recalling memories", error);
      }
    },
  );

  // ─── Tool: memory_stats ─────────────────────────────────────────────────────

  server.tool(
    "memory_stats",
    "Statistics about the memory store: live and deleted counts, graph edges, database size and location.",
    {},
    async () => {
      try {
        return jsonResult({ ...store.stats(), databasePath: store.path });
      } catch (error) {
        return errorResult("getting stats", error);
      }
    },
  );

  // ─── Tool: consolidate_session ──────────────────────────────────────────────

  server.tool(
    "consolidate_session",
    "Digest the latest session of the session log into one state-delta memory. With dry_run the digest is returned without storing it.",
    {
      log_text: z.string().optional().describe("Session log text (default: the configured session log file)"),
      dry_run: z.boolean().optional().default(false).describe("Return the digest without storing it"),
    },
    async ({ log_text, dry_run }) => {
      try {
        const completer = requireCompleter();
        const text = log_text ?? (deps.sessionLogPath ? readSessionLog(deps.sessionLogPath) : null);
        if (text === null) return textResult("No session log found.");

        const outcome = dry_run ? await reflectOnSession(text, completer) : await consolidateSession(text, store, completer);
        switch (outcome.status) {
          case "no-session":
            return textResult("No session found in the log.");
          case "malformed":
            return { ...textResult("The summarizer returned no usable digest; nothing was stored."), isError: true };
          case "previewed":
            return jsonResult({ status: "previewed", digest: outcome.digest });
          case "stored":
            return jsonResult({ status: "stored", digest: outcome.digest, memory: summarize(outcome.memory) });
        }
      } catch (error) {
        return errorResult("consolidating session", error);
      }
    },
  );

  // ─── Tool: compact_memories ─────────────────────────────────────────────────

  server.tool(
    "compact_memories",
    "Find overlapping memories and merge or retire duplicates and superseded ones. Use dry_run to preview the verdicts.",
    {
      dry_run: z.boolean().optional().default(false).describe("Judge pairs but change nothing"),
      threshold: z.number().min(0).max(1).optional().default(COMPACT_DEFAULTS.threshold).describe("Minimum word-overlap score for a candidate pair (default: 0.3)"),
      limit: z.number().int().min(2).optional().default(COMPACT_DEFAULTS.limit).describe("Most recent memories to compare (default: 1000)"),
    },
    async ({ dry_run, threshold, limit }) => {
      try {
        const judge = new LlmMergeJudge(requireCompleter());
        if (!dry_run && deps.backups) {
          await deps.backups.createBackup(store);
        }
        const report = await runCompact(store, judge, { dryRun: dry_run, threshold, limit });
        return jsonResult(report);
      } catch (error) {
        return errorResult("compacting memories", error);
      }
    },
  );

  // ─── Tool: predict_preload ──────────────────────────────────────────────────

  server.tool(
    "predict_preload",
    "Write a briefing for the next session from the recent session log, open questions and state deltas.",
    {
      log_text: z.string().optional().describe("Session log text (default: the configured session log file)"),
      open_questions: z.string().optional().describe("Open questions notes (default: the configured open questions file)"),
      write_file: z.boolean().optional().default(false).describe("Also write the briefing to the configured preload file"),
    },
    async ({ log_text, open_questions, write_file }) => {
      try {
        const completer = requireCompleter();
        const outputPath = deps.preloadPath;
        if (write_file && outputPath === undefined) {
          return { ...textResult("No preload file is configured; nothing was generated."), isError: true };
        }
        const outcome = await generatePreload(store, completer, {
          logText: log_text ?? (deps.sessionLogPath ? readSessionLog(deps.sessionLogPath) : null),
          openQuestions: open_questions ?? (deps.openQuestionsPath ? readSessionLog(deps.openQuestionsPath) : null),
        });
        if (outcome.status === "empty") {
          return { ...textResult("The model returned an empty briefing; nothing was written."), isError: true };
        }
        if (write_file && outputPath !== undefined) {
          writePreload(outputPath, outcome.briefing);
          return jsonResult({ status: "generated", briefing: outcome.briefing, stateDeltas: outcome.stateDeltaCount, writtenTo: outputPath });
        }
        return jsonResult({ status: "generated", briefing: outcome.briefing, stateDeltas: outcome.stateDeltaCount });
      } catch (error) {
        return errorResult("predicting the next session", error);
      }
    },
  );

  return server;
}
