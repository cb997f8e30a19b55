import { RelevanceTier } from './interfaces/matching.types';

/** Ranker threshold applied when neither configuration nor caller overrides it. */
export const DEFAULT_MIN_SCORE = 0.6;

/** Scores strictly above this are what the scoring prompt calls highly relevant. */
export const HIGH_RELEVANCE_SCORE = 0.7;

export const MEDIUM_RELEVANCE_SCORE = 0.4;

export interface NormalizedScore {
  score: number;
  /** False when the raw value was out of range, non-numeric or missing. */
  inRange: boolean;
}

export function clampScore(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function normalizeScore(raw: unknown): NormalizedScore {
  let value: number | undefined;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    value = Number(raw.trim());
  }

  if (value === undefined || !Number.isFinite(value)) {
    return { score: 0, inRange: false };
  }
  return { score: clampScore(value), inRange: value >= 0 && value <= 1 };
}

export function toRelevanceTier(score: number): RelevanceTier {
  if (score > HIGH_RELEVANCE_SCORE) return RelevanceTier.HIGH;
  if (score >= MEDIUM_RELEVANCE_SCORE) return RelevanceTier.MEDIUM;
  return RelevanceTier.LOW;
}
