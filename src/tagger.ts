import { logger } from "./logger.js";
import type { MemoryStore } from "./memory-store.js";
import { entityTagPrompt } from "./prompts.js";
import { parseTagSuggestion, toTag, type TagSuggestion } from "./responses.js";
import { extractJson } from "./structured-output.js";
import type { Memory, TextCompleter } from "./types.js";

const TAG_MAX_TOKENS = 256;
const TAG_TEMPERATURE = 0.1;
/** Records with at least this many tags are left alone by a bulk pass. */
export const WELL_TAGGED_THRESHOLD = 5;

export type TagOutcome =
  | { status: "not-found"; hash: string }
  | { status: "malformed"; hash: string }
  | { status: "tagged"; hash: string; tags: string[]; added: string[] };

export interface TagAllReport {
  scanned: number;
  skipped: number;
  tagged: number;
  malformed: number;
  tagsAdded: number;
}

function suggestedLabels(suggestion: TagSuggestion): string[] {
  const labels: string[] = [];
  for (const label of [
    ...suggestion.people,
    ...suggestion.projects,
    ...suggestion.tools,
    ...suggestion.topics,
    ...suggestion.suggestedTags,
  ]) {
    const tag = toTag(label);
    if (tag) labels.push(tag);
  }
  return labels;
}

async function tagRecord(store: MemoryStore, completer: TextCompleter, memory: Memory): Promise<TagOutcome> {
  const reply = await completer.complete(entityTagPrompt(memory.content), TAG_MAX_TOKENS, TAG_TEMPERATURE);
  const suggestion = parseTagSuggestion(extractJson(reply));
  if (!suggestion) {
    logger.warn(`No usable tag suggestion for memory #${memory.id}`);
    return { status: "malformed", hash: memory.contentHash };
  }

  const existing = new Set(memory.tags);
  const added = [...new Set(suggestedLabels(suggestion))].filter((tag) => !existing.has(tag));
  const tags = [...new Set([...memory.tags, ...added])].sort();
  if (added.length > 0) {
    store.updateTags(memory.contentHash, tags);
  }
  return { status: "tagged", hash: memory.contentHash, tags, added };
}

/** Enrich one live record with entity tags suggested by the completer. */
export async function tagMemory(store: MemoryStore, completer: TextCompleter, hash: string): Promise<TagOutcome> {
  const memory = store.getByHash(hash);
  if (!memory) return { status: "not-found", hash };
  return tagRecord(store, completer, memory);
}

/**
 * Tag every live record that has fewer than {@link WELL_TAGGED_THRESHOLD} tags.
 * A malformed reply skips that record; an unreachable completer aborts the pass.
 */
export async function tagAll(store: MemoryStore, completer: TextCompleter, limit = 1000): Promise<TagAllReport> {
  const memories = store.getAll(limit);
  const report: TagAllReport = { scanned: memories.length, skipped: 0, tagged: 0, malformed: 0, tagsAdded: 0 };

  for (const memory of memories) {
    if (memory.tags.length >= WELL_TAGGED_THRESHOLD) {
      report.skipped++;
      continue;
    }
    const outcome = await tagRecord(store, completer, memory);
    if (outcome.status === "tagged") {
      report.tagged++;
      report.tagsAdded += outcome.added.length;
    } else {
      report.malformed++;
    }
  }

  logger.info(`Tagged ${report.tagged} of ${report.scanned} memories (+${report.tagsAdded} tags)`);
  return report;
}
