import { logger } from "./logger.js";
import type { MemoryStore } from "./memory-store.js";
import { consolidationPrompt } from "./prompts.js";
import { parseConsolidationResult, toTag, type ConsolidationResult } from "./responses.js";
import { parseLatestSession } from "./session-log.js";
import { extractJson } from "./structured-output.js";
import type { Memory, NewMemory, TextCompleter } from "./types.js";

export const STATE_DELTA_MARKER = "[State Delta]";
export const STATE_DELTA_TAG = "state-delta";
export const STATE_DELTA_TYPE = "state_delta";

const CONSOLIDATION_MAX_TOKENS = 512;

export type DigestOutcome =
  | { status: "no-session" }
  | { status: "malformed"; sessionText: string }
  | { status: "previewed"; sessionText: string; digest: ConsolidationResult }
  | { status: "stored"; sessionText: string; digest: ConsolidationResult; memory: Memory };

/**
 * Ask the completer for a structured digest of one session. Null when the reply
 * holds no valid digest; an unreachable backend still rejects.
 */
export async function summarizeSession(
  completer: TextCompleter,
  sessionText: string,
): Promise<ConsolidationResult | null> {
  const reply = await completer.complete(consolidationPrompt(sessionText), CONSOLIDATION_MAX_TOKENS);
  return parseConsolidationResult(extractJson(reply));
}

export function buildStateDeltaRecord(digest: ConsolidationResult, now: Date = new Date()): NewMemory {
  const { people, projects, tools } = digest.entities;
  const tags = new Set<string>();
  for (const name of [...people, ...projects, ...tools]) {
    const tag = toTag(name);
    if (tag) tags.add(tag);
  }
  tags.add(STATE_DELTA_TAG);

  return {
    content: `${STATE_DELTA_MARKER} ${digest.stateDelta}`,
    tags: [...tags],
    memoryType: STATE_DELTA_TYPE,
    metadata: {
      entities: digest.entities,
      security_context: digest.securityContext,
      emotional_signals: digest.emotionalSignals,
      open_threads: digest.openThreads,
      source: "consolidate",
      session_date: now.toISOString().slice(0, 10),
    },
    createdAt: now,
  };
}

async function extractDigest(
  logText: string,
  completer: TextCompleter,
): Promise<Exclude<DigestOutcome, { status: "stored" }>> {
  const sessionText = parseLatestSession(logText);
  if (!sessionText) {
    logger.info("No session found in log");
    return { status: "no-session" };
  }

  logger.info(`Summarizing session (${sessionText.length} chars)`);
  const digest = await summarizeSession(completer, sessionText);
  if (!digest) {
    logger.warn("Summarizer reply held no valid digest; nothing stored");
    return { status: "malformed", sessionText };
  }
  return { status: "previewed", sessionText, digest };
}

/**
 * Digest the latest session of `logText` and store it as one state-delta record.
 * A DuplicateContentError from the store propagates to the caller.
 */
export async function consolidateSession(
  logText: string,
  store: MemoryStore,
  completer: TextCompleter,
  now: Date = new Date(),
): Promise<DigestOutcome> {
  const outcome = await extractDigest(logText, completer);
  if (outcome.status !== "previewed") return outcome;

  const memory = store.storeMemory(buildStateDeltaRecord(outcome.digest, now));
  logger.info(`Stored state delta as memory #${memory.id}`, { hash: memory.contentHash.slice(0, 16) });
  return { status: "stored", sessionText: outcome.sessionText, digest: outcome.digest, memory };
}

/** Same extraction as {@link consolidateSession}, without writing anything. */
export async function reflectOnSession(logText: string, completer: TextCompleter): Promise<DigestOutcome> {
  return extractDigest(logText, completer);
}
