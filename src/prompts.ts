import type { Memory } from "./types.js";

export function consolidationPrompt(sessionText: string): string {
  return `You are a memory consolidation system. Given the following session log, extract a structured summary.

SESSION LOG:
${sessionText}

Return a JSON object with exactly these fields:
{
  "state_delta": "A 50-100 word dense summary of what changed, what was decided, what's unresolved",
  "entities": {
    "people": ["list of people mentioned"],
    "projects": ["projects or products affected"],
    "tools": ["tech, tools, or services referenced"]
  },
  "security_context": "Any regulated data, credentials, or permission boundaries discussed (or 'none')",
  "emotional_signals": "Detected frustration, excitement, urgency, or other emotional tone (or 'neutral')",
  "open_threads": ["unresolved items or follow-ups"]
}

Return ONLY the JSON object, no other text.`;
}

export function mergePrompt(a: Memory, b: Memory): string {
  return `You are a memory deduplication system. Given these two memories, determine if they should be merged.

MEMORY A (created ${a.createdAt}):
${a.content}

MEMORY B (created ${b.createdAt}):
${b.content}

Analyze and return a JSON object:
{
  "relationship": "duplicate" | "superseded" | "related" | "distinct",
  "keep": "A" | "B" | "merge",
  "merged_content": "If keep is 'merge', provide the merged text. Otherwise empty string.",
  "reasoning": "Brief explanation of your decision"
}

Rules:
- "duplicate": Nearly identical information. Keep the newer one.
- "superseded": One updates/replaces the other. Keep the newer/more complete one.
- "related": Similar topic but distinct information. Keep both.
- "distinct": Unrelated. Keep both.

Return ONLY the JSON object.`;
}

export function entityTagPrompt(content: string): string {
  return `Given this memory content, extract entity tags.

MEMORY:
${content}

Return a JSON object with exactly these fields:
{
  "people": ["people mentioned by name"],
  "projects": ["projects, products, or companies"],
  "tools": ["technologies, tools, services"],
  "topics": ["abstract topics or themes"],
  "suggested_tags": ["all of the above as short tags"]
}

Return ONLY the JSON object, no other text.`;
}

export interface PreloadPromptInput {
  sessionText: string;
  openQuestions: string;
  stateDeltas: string;
  /** Shown in the briefing header, e.g. "2026-05-04 10:00 UTC". */
  generatedAt: string;
}

export function preloadPrompt(input: PreloadPromptInput): string {
  return `You are a session preparation system. Given the following context about an ongoing collaboration, generate a dense briefing for the next session.

RECENT SESSION LOG:
${input.sessionText}

OPEN QUESTIONS:
${input.openQuestions}

RECENT STATE DELTAS:
${input.stateDeltas}

Generate a briefing document in this exact format:

# PRELOAD: Session Briefing
Generated: ${input.generatedAt}

## Active Context
[2-3 sentences: what we're in the middle of, what was happening when last session ended]

## Unresolved Threads
[Bulleted list of open items requiring attention]

## Key People State
[For each person mentioned recently: last known status, any pending interactions]

## Suggested First Moves
[2-3 concrete actions to start the next session productively]

## Emotional/Relational Notes
[Any interpersonal dynamics, frustrations, or sensitivities to be aware of]

Return the document as plain text (NOT JSON). Use markdown formatting.`;
}
