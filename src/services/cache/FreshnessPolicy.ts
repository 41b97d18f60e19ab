import { CacheKey, CacheKeyKind } from '../../types/cache.js';
import { CacheConfig } from '../../config/types.js';
import { InputValidationError } from '../../errors/index.js';

/**
 * Stale once strictly older than maxAgeMs; a missing entry is always stale.
 */
export function isStale(lastFetched: Date | null, maxAgeMs: number, now: Date): boolean {
  if (!lastFetched) {
    return true;
  }
  return now.getTime() - lastFetched.getTime() > maxAgeMs;
}

export function assertValidMaxAge(maxAgeMs: number): void {
  if (!Number.isFinite(maxAgeMs) || maxAgeMs < 0) {
    throw new InputValidationError('maxAgeMs', maxAgeMs, 'Max age must be a non-negative number of milliseconds');
  }
}

/**
 * Default max age per cache-key kind, for callers that have no opinion
 * of their own.
 */
export class FreshnessPolicy {
  private readonly maxAgeByKind: Record<CacheKeyKind, number>;

  constructor(maxAgeMs: CacheConfig['maxAgeMs']) {
    this.maxAgeByKind = {
      listing: maxAgeMs.listing,
      anime: maxAgeMs.anime,
      episodes: maxAgeMs.episodes,
      'episode-sources': maxAgeMs.sources,
    };
    Object.values(this.maxAgeByKind).forEach(assertValidMaxAge);
  }

  maxAgeFor(key: CacheKey): number {
    return this.maxAgeByKind[key.kind];
  }
}
