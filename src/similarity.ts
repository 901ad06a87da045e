import type { Memory } from "./types.js";

export interface CandidatePair {
  a: Memory;
  b: Memory;
  similarity: number;
}

function tokenSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

/**
 * Jaccard coefficient of the lowercased whitespace token sets.
 * Returns 0 when either side has no tokens.
 */
export function jaccardSimilarity(a: string, b: string): number {
  return setJaccard(tokenSet(a), tokenSet(b));
}

/**
 * Every unordered pair whose similarity is at least `threshold`, in input order.
 * Quadratic in the number of memories: callers bound the input.
 */
export function findCandidatePairs(memories: readonly Memory[], threshold: number): CandidatePair[] {
  const tokens = memories.map((m) => tokenSet(m.content));
  const pairs: CandidatePair[] = [];

  for (let i = 0; i < memories.length; i++) {
    for (let j = i + 1; j < memories.length; j++) {
      const similarity = setJaccard(tokens[i], tokens[j]);
      if (similarity >= threshold) {
        pairs.push({ a: memories[i], b: memories[j], similarity });
      }
    }
  }
  return pairs;
}

function setJaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}
