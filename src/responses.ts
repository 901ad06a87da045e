import { z } from "zod";

/**
 * Validation for the structured replies the completer returns. Each schema accepts
 * the loose shapes small local models produce and normalizes them once, so callers
 * never re-check for missing keys. A reply that fails validation parses to null.
 */

const stringList = z
  .union([z.array(z.unknown()), z.string()])
  .catch([])
  .transform((value) => {
    const items: unknown[] = typeof value === "string" ? value.split(",") : value;
    return items
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter(Boolean);
  });

const textOr = (fallback: string) =>
  z
    .string()
    .catch(fallback)
    .transform((value) => value.trim() || fallback);

const loweredText = z.string().transform((value) => value.trim().toLowerCase());

const entitiesSchema = z
  .object({
    people: stringList,
    projects: stringList,
    tools: stringList,
  })
  .catch({ people: [], projects: [], tools: [] });

const consolidationSchema = z
  .object({
    state_delta: z.string().trim().min(1),
    entities: entitiesSchema,
    security_context: textOr("none"),
    emotional_signals: textOr("neutral"),
    open_threads: stringList,
  })
  .transform((raw) => ({
    stateDelta: raw.state_delta,
    entities: raw.entities,
    securityContext: raw.security_context,
    emotionalSignals: raw.emotional_signals,
    openThreads: raw.open_threads,
  }));

export type ConsolidationResult = z.infer<typeof consolidationSchema>;
export type SessionEntities = ConsolidationResult["entities"];

export const RELATIONSHIPS = ["duplicate", "superseded", "related", "distinct"] as const;
export type Relationship = (typeof RELATIONSHIPS)[number];

const keepSchema = z
  .string()
  .transform((value) => {
    const trimmed = value.trim();
    if (trimmed.toUpperCase() === "A") return "A" as const;
    if (trimmed.toUpperCase() === "B") return "B" as const;
    if (trimmed.toLowerCase() === "merge") return "merge" as const;
    return null;
  })
  .catch(null);

const mergeVerdictSchema = z
  .object({
    relationship: loweredText.pipe(z.enum(RELATIONSHIPS)),
    keep: keepSchema,
    merged_content: textOr(""),
    reasoning: textOr(""),
  })
  .transform((raw) => ({
    relationship: raw.relationship,
    keep: raw.keep,
    mergedContent: raw.merged_content,
    reasoning: raw.reasoning,
  }));

/** `keep` is null when the judge asked to keep both records or named no side. */
export type MergeVerdict = z.infer<typeof mergeVerdictSchema>;

const tagSuggestionSchema = z
  .object({
    people: stringList,
    projects: stringList,
    tools: stringList,
    topics: stringList,
    suggested_tags: stringList,
  })
  .transform((raw) => ({
    people: raw.people,
    projects: raw.projects,
    tools: raw.tools,
    topics: raw.topics,
    suggestedTags: raw.suggested_tags,
  }));

export type TagSuggestion = z.infer<typeof tagSuggestionSchema>;

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: Record<string, unknown> | null): T | null {
  if (!raw) return null;
  const result = schema.safeParse(raw);
  return result.success ? result.data : null;
}

export function parseConsolidationResult(raw: Record<string, unknown> | null): ConsolidationResult | null {
  return parseWith(consolidationSchema, raw);
}

export function parseMergeVerdict(raw: Record<string, unknown> | null): MergeVerdict | null {
  return parseWith(mergeVerdictSchema, raw);
}

export function parseTagSuggestion(raw: Record<string, unknown> | null): TagSuggestion | null {
  return parseWith(tagSuggestionSchema, raw);
}

/** Lowercase, with runs of whitespace turned into single hyphens: "Mac Mini" becomes "mac-mini". */
export function toTag(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, "-");
}
