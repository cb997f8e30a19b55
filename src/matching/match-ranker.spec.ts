import { OracleProviderName } from '../config/matching.config';
import { MatchRanker, rankMatches } from './match-ranker';

interface Scored {
  id: string;
  relevanceScore: number;
}

const scored = (id: string, relevanceScore: number): Scored => ({ id, relevanceScore });

// Small deterministic generator so the property checks are reproducible
function seededScores(seed: number, count: number): Scored[] {
  let state = seed;
  return Array.from({ length: count }, (_, index) => {
    state = (state * 48271) % 2147483647;
    // Two decimals so ties show up regularly
    return scored(`opp-${index}`, Math.round((state / 2147483647) * 100) / 100);
  });
}

describe('rankMatches', () => {
  it('should keep scores at or above the threshold, best first', () => {
    const ranked = rankMatches(
      [scored('a', 0.9), scored('b', 0.5), scored('c', 0.75)],
      0.6,
    );

    expect(ranked.map((m) => m.id)).toEqual(['a', 'c']);
  });

  it('should include a match scored exactly at the threshold', () => {
    expect(rankMatches([scored('a', 0.6)], 0.6)).toHaveLength(1);
  });

  it('should default the threshold to 0.6', () => {
    const ranked = rankMatches([scored('a', 0.59), scored('b', 0.6)]);

    expect(ranked.map((m) => m.id)).toEqual(['b']);
  });

  it('should return an empty list for empty input', () => {
    expect(rankMatches([], 0.6)).toEqual([]);
  });

  it('should return an empty list when everything is below the threshold', () => {
    expect(rankMatches([scored('a', 0.1), scored('b', 0.2), scored('c', 0.3)], 0.6)).toEqual([]);
  });

  it('should keep input order for equal scores', () => {
    const ranked = rankMatches(
      [scored('first', 0.8), scored('top', 0.95), scored('second', 0.8), scored('third', 0.8)],
      0,
    );

    expect(ranked.map((m) => m.id)).toEqual(['top', 'first', 'second', 'third']);
  });

  it('should not mutate its input', () => {
    const input = [scored('a', 0.2), scored('b', 0.9)];
    rankMatches(input, 0);

    expect(input.map((m) => m.id)).toEqual(['a', 'b']);
  });

  describe('properties over generated lists', () => {
    const thresholds = [0, 0.25, 0.6, 0.7, 1];
    const seeds = [1, 7, 42, 1234, 99991];

    it('should only return matches at or above the threshold', () => {
      for (const seed of seeds) {
        const input = seededScores(seed, 40);
        for (const threshold of thresholds) {
          const ranked = rankMatches(input, threshold);
          const eligible = input.filter((m) => m.relevanceScore >= threshold);

          expect(ranked.every((m) => m.relevanceScore >= threshold)).toBe(true);
          expect(ranked).toHaveLength(eligible.length);
          expect(ranked.every((m) => input.includes(m))).toBe(true);
        }
      }
    });

    it('should sort descending by score', () => {
      for (const seed of seeds) {
        const ranked = rankMatches(seededScores(seed, 40), 0);
        for (let i = 1; i < ranked.length; i++) {
          expect(ranked[i - 1].relevanceScore).toBeGreaterThanOrEqual(ranked[i].relevanceScore);
        }
      }
    });

    it('should be idempotent', () => {
      for (const seed of seeds) {
        for (const threshold of thresholds) {
          const once = rankMatches(seededScores(seed, 40), threshold);
          const twice = rankMatches(once, threshold);

          expect(twice).toEqual(once);
        }
      }
    });
  });
});

describe('MatchRanker', () => {
  const ranker = new MatchRanker({
    minScore: 0.8,
    concurrency: 5,
    oracleTimeoutMs: 30000,
    contentPreviewLength: 500,
    oracleProvider: OracleProviderName.HEURISTIC,
  });

  it('should apply the configured threshold by default', () => {
    const ranked = ranker.rank([scored('a', 0.75), scored('b', 0.85)]);

    expect(ranked.map((m) => m.id)).toEqual(['b']);
    expect(ranker.defaultMinScore).toBe(0.8);
  });

  it('should let callers override the threshold', () => {
    const ranked = ranker.rank([scored('a', 0.75), scored('b', 0.85)], 0.5);

    expect(ranked.map((m) => m.id)).toEqual(['b', 'a']);
  });
});
