import { FreshnessPolicy, assertValidMaxAge, isStale } from '../../../src/services/cache/FreshnessPolicy.js';
import { cacheKeys } from '../../../src/services/cache/cacheKeys.js';
import { InputValidationError } from '../../../src/errors/index.js';

describe('FreshnessPolicy', () => {
  const now = new Date('2024-06-01T12:00:00.000Z');

  describe('isStale', () => {
    it('should treat a missing entry as stale', () => {
      expect(isStale(null, 60000, now)).toBe(true);
    });

    it('should be fresh up to and including maxAge', () => {
      expect(isStale(new Date('2024-06-01T11:59:00.000Z'), 60000, now)).toBe(false);
      expect(isStale(new Date('2024-06-01T11:58:59.999Z'), 60000, now)).toBe(true);
    });

    it('should always be stale with a zero maxAge once time has passed', () => {
      expect(isStale(new Date('2024-06-01T11:59:59.999Z'), 0, now)).toBe(true);
      expect(isStale(now, 0, now)).toBe(false);
    });
  });

  it('should reject negative or non-finite max ages', () => {
    expect(() => assertValidMaxAge(-1)).toThrow(InputValidationError);
    expect(() => assertValidMaxAge(Number.NaN)).toThrow(InputValidationError);
    expect(() => assertValidMaxAge(0)).not.toThrow();
  });

  it('should map each key kind to its configured max age', () => {
    const policy = new FreshnessPolicy({ listing: 1000, anime: 2000, episodes: 3000, sources: 4000 });

    expect(policy.maxAgeFor(cacheKeys.listing('updates', 2))).toBe(1000);
    expect(policy.maxAgeFor(cacheKeys.anime('naruto'))).toBe(2000);
    expect(policy.maxAgeFor(cacheKeys.episodes('naruto'))).toBe(3000);
    expect(policy.maxAgeFor(cacheKeys.episodeSources('https://example.test/e/1'))).toBe(4000);
  });

  it('should refuse an invalid configured max age', () => {
    expect(() => new FreshnessPolicy({ listing: 1000, anime: -5, episodes: 3000, sources: 4000 })).toThrow(
      InputValidationError
    );
  });
});
