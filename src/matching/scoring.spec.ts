import { RelevanceTier } from './interfaces/matching.types';
import { clampScore, normalizeScore, toRelevanceTier } from './scoring';

describe('scoring', () => {
  describe('normalizeScore', () => {
    it.each([
      [1.5, 1, false],
      [-3, 0, false],
      ['NaN', 0, false],
      [Number.NaN, 0, false],
      [Number.POSITIVE_INFINITY, 0, false],
      [undefined, 0, false],
      [null, 0, false],
      ['', 0, false],
      [{ value: 0.9 }, 0, false],
      [0.8, 0.8, true],
      [' 0.65 ', 0.65, true],
      [0, 0, true],
      [1, 1, true],
    ])('should normalize %p to %p (in range: %p)', (raw, score, inRange) => {
      expect(normalizeScore(raw)).toEqual({ score, inRange });
    });

    it('should always land inside [0, 1]', () => {
      const samples: unknown[] = [-1e9, -0.0001, 0.3, 0.99, 1.0001, 42, '7', '-2', 'high'];
      for (const sample of samples) {
        const { score } = normalizeScore(sample);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    });
  });

  it('should clamp numbers into [0, 1]', () => {
    expect(clampScore(2)).toBe(1);
    expect(clampScore(-0.5)).toBe(0);
    expect(clampScore(0.42)).toBe(0.42);
  });

  describe('toRelevanceTier', () => {
    it('should reserve High for scores strictly above 0.7', () => {
      expect(toRelevanceTier(0.71)).toBe(RelevanceTier.HIGH);
      expect(toRelevanceTier(0.7)).toBe(RelevanceTier.MEDIUM);
    });

    it('should grade Medium from 0.4 and Low below it', () => {
      expect(toRelevanceTier(0.4)).toBe(RelevanceTier.MEDIUM);
      expect(toRelevanceTier(0.39)).toBe(RelevanceTier.LOW);
      expect(toRelevanceTier(0)).toBe(RelevanceTier.LOW);
    });
  });
});
