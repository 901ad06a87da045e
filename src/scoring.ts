import type { Memory, ScoredMemory, ScoringWeights } from "./types.js";

export const SCORING_CONFIG = {
  defaultWeights: {
    relevance: 0.6,
    recency: 0.3,
    access: 0.1,
    halfLifeDays: 14,
  } satisfies ScoringWeights,
  /** Access count at which accessScore reaches 1. */
  accessSaturation: 50,
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Exponential recency decay: 1 for a brand-new record, 0.5 after one half-life.
 * Future timestamps count as age 0. `halfLifeDays` must be strictly positive;
 * zero or negative values are outside the contract and are not guarded.
 */
export function recencyDecay(createdAt: Date, halfLifeDays: number, now: Date = new Date()): number {
  const ageDays = Math.max(0, now.getTime() - createdAt.getTime()) / MS_PER_DAY;
  return Math.exp((-Math.LN2 * ageDays) / halfLifeDays);
}

/** Log-scaled access frequency in [0, 1]. */
export function accessScore(count: number): number {
  if (count <= 0) return 0;
  return Math.min(1, Math.log1p(count) / Math.log1p(SCORING_CONFIG.accessSaturation));
}

/**
 * Weighted blend of similarity, recency and access frequency.
 *
 * The similarity input is clamped into [0, 1], with NaN counting as 0; the result is
 * not clamped. Weights that sum above 1 can therefore produce scores above 1.
 */
export function compositeScore(
  cosineSim: number,
  createdAt: Date,
  accessCount: number,
  weights: ScoringWeights = SCORING_CONFIG.defaultWeights,
  now: Date = new Date(),
): number {
  const relevance = Number.isNaN(cosineSim) ? 0 : Math.max(0, Math.min(1, cosineSim));
  const recency = recencyDecay(createdAt, weights.halfLifeDays, now);
  const access = accessScore(accessCount);
  return weights.relevance * relevance + weights.recency * recency + weights.access * access;
}

export class RelevanceScorer {
  readonly weights: ScoringWeights;

  constructor(weights: Partial<ScoringWeights> = {}) {
    this.weights = { ...SCORING_CONFIG.defaultWeights, ...weights };
  }

  score(memory: Memory, similarity: number, now: Date = new Date()): number {
    return compositeScore(similarity, new Date(memory.createdAt), memory.accessCount, this.weights, now);
  }

  /** Highest composite score first. Ties keep their input order. */
  rank(candidates: ReadonlyArray<{ memory: Memory; similarity: number }>, now: Date = new Date()): ScoredMemory[] {
    return candidates
      .map(({ memory, similarity }) => ({ memory, score: this.score(memory, similarity, now) }))
      .sort((a, b) => b.score - a.score);
  }
}
