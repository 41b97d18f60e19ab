export type ListingName = 'updates' | 'completed' | 'crawled';

/**
 * Tagged cache key. Each kind serializes into its own string namespace so
 * keys from unrelated domains never collide in the ledger.
 */
export type CacheKey =
  | { kind: 'listing'; listing: ListingName; page?: number }
  | { kind: 'anime'; slug: string }
  | { kind: 'episodes'; slug: string }
  | { kind: 'episode-sources'; episodeUrl: string };

export type CacheKeyKind = CacheKey['kind'];

export interface LedgerEntry {
  cacheKey: string;
  lastFetched: Date;
  createdAt: Date;
}

/** Row counts written by one refresh */
export interface MergeSummary {
  anime: number;
  episodes: number;
  videoSources: number;
  crawledAnime: number;
  completedAnime: number;
  animeUpdates: number;
}

export type FreshnessResult =
  | { status: 'hit'; cacheKey: string; lastFetched: Date; ageMs: number }
  | { status: 'refreshed'; cacheKey: string; lastFetched: Date; merged: MergeSummary };

export interface EnsureFreshOptions {
  /** Skip the ledger check and crawl regardless */
  force?: boolean;
  /** Overrides the coordinator's crawl timeout for this call */
  timeoutMs?: number;
}
