import type {
  AnimeInput,
  AnimeUpdateInput,
  CompletedAnimeInput,
  CrawledAnimeInput,
  EpisodeInput,
  EpisodeSource,
} from './catalogue.js';
import type { CacheKey } from './cache.js';

/** The complete source set of one episode; replaces whatever was stored */
export interface EpisodeSourceSet {
  episodeUrl: string;
  sources: EpisodeSource[];
}

/**
 * What a crawl hands back. Every kind is optional; the coordinator merges
 * whatever is present.
 */
export interface CrawlPayload {
  anime?: AnimeInput[];
  episodes?: EpisodeInput[];
  videoSources?: EpisodeSourceSet[];
  crawledAnime?: CrawledAnimeInput[];
  completedAnime?: CompletedAnimeInput[];
  animeUpdates?: AnimeUpdateInput[];
}

export interface CrawlOptions {
  /** Aborted when the crawl times out */
  signal: AbortSignal;
}

/**
 * External scraper boundary.
 */
export interface Crawler {
  crawl(key: CacheKey, options: CrawlOptions): Promise<CrawlPayload>;
}
