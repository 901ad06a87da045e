import { CapabilityUnavailableError, DuplicateContentError } from "./errors.js";
import { logger } from "./logger.js";
import type { MemoryStore } from "./memory-store.js";
import { mergePrompt } from "./prompts.js";
import { parseMergeVerdict, type MergeVerdict } from "./responses.js";
import { findCandidatePairs, type CandidatePair } from "./similarity.js";
import { extractJson } from "./structured-output.js";
import type { Memory, TextCompleter } from "./types.js";

export const COMPACT_DEFAULTS = {
  threshold: 0.3,
  limit: 1000,
};

const MERGE_MAX_TOKENS = 512;
const MERGE_TEMPERATURE = 0.1;

/** Decides how two overlapping memories relate. Null means no usable verdict. */
export interface MergeJudge {
  judge(a: Memory, b: Memory): Promise<MergeVerdict | null>;
}

export class LlmMergeJudge implements MergeJudge {
  constructor(private readonly completer: TextCompleter) {}

  async judge(a: Memory, b: Memory): Promise<MergeVerdict | null> {
    const reply = await this.completer.complete(mergePrompt(a, b), MERGE_MAX_TOKENS, MERGE_TEMPERATURE);
    return parseMergeVerdict(extractJson(reply));
  }
}

export type CompactAction =
  | "delete-a"
  | "delete-b"
  | "merge"
  | "link"
  | "none"
  | "judge-failed"
  | "stale"
  | "empty-merge"
  | "duplicate-merge";

export interface PairOutcome {
  aHash: string;
  bHash: string;
  similarity: number;
  verdict: MergeVerdict | null;
  action: CompactAction;
  /** False in dry-run mode and for actions that change nothing. */
  applied: boolean;
  /** Hash of the record created by an applied merge. */
  mergedHash?: string;
}

export interface CompactReport {
  dryRun: boolean;
  threshold: number;
  compared: number;
  candidates: number;
  merged: number;
  linked: number;
  outcomes: PairOutcome[];
}

export interface CompactOptions {
  dryRun?: boolean;
  threshold?: number;
  /** Most-recent live memories to compare; the pass is quadratic in this. */
  limit?: number;
}

/** Union of two tag lists: trimmed, de-duplicated, case preserved, sorted. */
export function mergeTags(a: readonly string[], b: readonly string[]): string[] {
  const all = new Set<string>();
  for (const tag of [...a, ...b]) {
    const trimmed = tag.trim();
    if (trimmed) all.add(trimmed);
  }
  return [...all].sort();
}

function planAction(verdict: MergeVerdict): CompactAction {
  switch (verdict.relationship) {
    case "duplicate":
    case "superseded":
      if (verdict.keep === "A") return "delete-b";
      if (verdict.keep === "B") return "delete-a";
      if (verdict.keep === "merge") return verdict.mergedContent ? "merge" : "empty-merge";
      return "none";
    case "related":
      return "link";
    case "distinct":
      return "none";
  }
}

async function askJudge(judge: MergeJudge, pair: CandidatePair): Promise<MergeVerdict | null> {
  try {
    return await judge.judge(pair.a, pair.b);
  } catch (error) {
    if (error instanceof CapabilityUnavailableError) throw error;
    logger.warn("Judge call failed; skipping pair", {
      a: pair.a.contentHash.slice(0, 16),
      b: pair.b.contentHash.slice(0, 16),
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function applyMerge(store: MemoryStore, pair: CandidatePair, verdict: MergeVerdict): string | null {
  try {
    const merged = store.storeMerged(
      {
        content: verdict.mergedContent,
        tags: mergeTags(pair.a.tags, pair.b.tags),
        memoryType: "note",
        metadata: {
          source: "compact",
          merged_from: [pair.a.contentHash, pair.b.contentHash],
          reasoning: verdict.reasoning,
        },
      },
      [pair.a.contentHash, pair.b.contentHash],
    );
    return merged.contentHash;
  } catch (error) {
    if (error instanceof DuplicateContentError) {
      logger.warn("Merged content already stored; leaving both originals", { hash: error.contentHash.slice(0, 16) });
      return null;
    }
    throw error;
  }
}

/**
 * Find overlapping memories, let the judge classify each pair, and consolidate the
 * duplicates and superseded ones. Nothing is ever hard-deleted: losers are soft-deleted
 * and a merge writes a new record. With `dryRun` the store is not touched.
 *
 * Candidates come from one snapshot taken before any change, so later pairs may name
 * records an earlier pair already removed; those are reported as "stale" and skipped.
 */
export async function runCompact(
  store: MemoryStore,
  judge: MergeJudge,
  options: CompactOptions = {},
): Promise<CompactReport> {
  const dryRun = options.dryRun ?? false;
  const threshold = options.threshold ?? COMPACT_DEFAULTS.threshold;
  const memories = store.getAll(options.limit ?? COMPACT_DEFAULTS.limit);

  const report: CompactReport = {
    dryRun,
    threshold,
    compared: memories.length,
    candidates: 0,
    merged: 0,
    linked: 0,
    outcomes: [],
  };

  if (memories.length < 2) {
    logger.info("Not enough memories to compare");
    return report;
  }

  const pairs = findCandidatePairs(memories, threshold);
  report.candidates = pairs.length;
  logger.info(`Comparing ${memories.length} memories (threshold ${threshold}): ${pairs.length} candidate pair(s)`);

  for (const pair of pairs) {
    const outcome: PairOutcome = {
      aHash: pair.a.contentHash,
      bHash: pair.b.contentHash,
      similarity: pair.similarity,
      verdict: null,
      action: "none",
      applied: false,
    };
    report.outcomes.push(outcome);

    if (!store.getByHash(pair.a.contentHash) || !store.getByHash(pair.b.contentHash)) {
      outcome.action = "stale";
      continue;
    }

    const verdict = await askJudge(judge, pair);
    if (!verdict) {
      outcome.action = "judge-failed";
      continue;
    }
    outcome.verdict = verdict;
    outcome.action = planAction(verdict);
    logger.info(`Pair ${pair.a.id}/${pair.b.id}: ${verdict.relationship} (keep ${verdict.keep ?? "both"})`, {
      similarity: Number(pair.similarity.toFixed(2)),
      reasoning: verdict.reasoning,
    });

    if (dryRun) continue;

    switch (outcome.action) {
      case "delete-a":
        store.softDelete(pair.a.contentHash);
        outcome.applied = true;
        report.merged++;
        break;
      case "delete-b":
        store.softDelete(pair.b.contentHash);
        outcome.applied = true;
        report.merged++;
        break;
      case "merge": {
        const mergedHash = applyMerge(store, pair, verdict);
        if (mergedHash) {
          outcome.applied = true;
          outcome.mergedHash = mergedHash;
          report.merged++;
        } else {
          outcome.action = "duplicate-merge";
        }
        break;
      }
      case "link":
        outcome.applied = store.storeEdge({
          sourceHash: pair.a.contentHash,
          targetHash: pair.b.contentHash,
          similarity: pair.similarity,
          connectionTypes: "compaction",
          relationshipType: "related",
          metadata: { reasoning: verdict.reasoning },
        });
        if (outcome.applied) report.linked++;
        break;
      default:
        break;
    }
  }

  logger.info(`Compact complete: ${report.merged} merge(s), ${report.linked} link(s)${dryRun ? " (dry run)" : ""}`);
  return report;
}
