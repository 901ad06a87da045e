import fs from "fs";
import path from "path";
import { STATE_DELTA_TYPE } from "./consolidator.js";
import { logger } from "./logger.js";
import type { MemoryStore } from "./memory-store.js";
import { preloadPrompt } from "./prompts.js";
import { parseRecentSessions } from "./session-log.js";
import type { Memory, TextCompleter } from "./types.js";

export const PRELOAD_LIMITS = {
  /** Sessions taken from the end of the log. */
  sessions: 2,
  sessionChars: 3000,
  openQuestionsChars: 2000,
  /** Live records scanned for state deltas, newest first. */
  scanned: 100,
  stateDeltas: 5,
  deltaChars: 200,
};

const PRELOAD_MAX_TOKENS = 1024;
const PRELOAD_TEMPERATURE = 0.3;

export interface PreloadInput {
  /** Session log text; null when there is no log. */
  logText: string | null;
  /** Open questions notes; null when there are none. */
  openQuestions: string | null;
}

export type PreloadOutcome =
  | { status: "empty" }
  | { status: "generated"; briefing: string; stateDeltaCount: number; sessionFound: boolean };

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

/** The newest live state-delta records. */
export function recentStateDeltas(store: MemoryStore): Memory[] {
  return store
    .getAll(PRELOAD_LIMITS.scanned)
    .filter((m) => m.memoryType === STATE_DELTA_TYPE)
    .slice(0, PRELOAD_LIMITS.stateDeltas);
}

/** One bullet per delta, with its open threads beneath. */
export function formatStateDeltas(deltas: readonly Memory[]): string {
  if (deltas.length === 0) return "(no state deltas yet)";
  const lines: string[] = [];
  for (const delta of deltas) {
    lines.push(`- ${delta.content.slice(0, PRELOAD_LIMITS.deltaChars)}`);
    const threads = stringList(delta.metadata.open_threads);
    if (threads.length) lines.push(`  open: ${threads.join("; ")}`);
  }
  return lines.join("\n");
}

/** "2026-05-04 10:00 UTC" */
export function briefingTimestamp(now: Date): string {
  return `${now.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

/**
 * Ask the completer for a plain-text briefing for the next session, built from the
 * last sessions of the log, the open questions and the newest state deltas.
 * Nothing is written; a blank reply yields `empty`.
 */
export async function generatePreload(
  store: MemoryStore,
  completer: TextCompleter,
  input: PreloadInput,
  now: Date = new Date(),
): Promise<PreloadOutcome> {
  const sessions = input.logText === null ? null : parseRecentSessions(input.logText, PRELOAD_LIMITS.sessions);
  const deltas = recentStateDeltas(store);

  const prompt = preloadPrompt({
    sessionText:
      input.logText === null
        ? "(no session log found)"
        : (sessions ?? "(no sessions in the log)").slice(0, PRELOAD_LIMITS.sessionChars),
    openQuestions: (input.openQuestions ?? "(no open questions file found)").slice(0, PRELOAD_LIMITS.openQuestionsChars),
    stateDeltas: formatStateDeltas(deltas),
    generatedAt: briefingTimestamp(now),
  });

  logger.info(`Generating briefing from ${deltas.length} state delta(s)`);
  const reply = await completer.complete(prompt, PRELOAD_MAX_TOKENS, PRELOAD_TEMPERATURE);
  const briefing = reply.trim();
  if (!briefing) {
    logger.warn("Briefing reply was empty; nothing to write");
    return { status: "empty" };
  }
  return { status: "generated", briefing, stateDeltaCount: deltas.length, sessionFound: sessions !== null };
}

/** Write the briefing, creating the parent directory when needed. */
export function writePreload(outputPath: string, briefing: string): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, `${briefing}\n`, "utf-8");
  logger.info(`Briefing written to ${outputPath}`, { chars: briefing.length });
}
