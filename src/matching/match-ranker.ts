import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import matchingConfig from '../config/matching.config';
import { DEFAULT_MIN_SCORE } from './scoring';

interface Ranked {
  relevanceScore: number;
}

/**
 * Drops matches below `minScore` and orders the rest best first.
 * Array.prototype.sort is stable, so equal scores keep their input order
 * and ranking an already-ranked list returns it unchanged.
 */
export function rankMatches<T extends Ranked>(
  matches: readonly T[],
  minScore: number = DEFAULT_MIN_SCORE,
): T[] {
  return matches
    .filter((match) => match.relevanceScore >= minScore)
    .sort((a, b) => b.relevanceScore - a.relevanceScore);
}

@Injectable()
export class MatchRanker {
  constructor(
    @Inject(matchingConfig.KEY)
    private readonly config: ConfigType<typeof matchingConfig>,
  ) {}

  get defaultMinScore(): number {
    return this.config.minScore;
  }

  rank<T extends Ranked>(matches: readonly T[], minScore?: number): T[] {
    return rankMatches(matches, minScore ?? this.config.minScore);
  }
}
