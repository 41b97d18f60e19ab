import { SqlExecutor } from '../../types/database.js';
import {
  CacheKey,
  EnsureFreshOptions,
  FreshnessResult,
  MergeSummary,
} from '../../types/cache.js';
import { CrawlPayload, Crawler } from '../../types/crawler.js';
import {
  CRAWL_RETRY_POLICY,
  CrawlFailureError,
  CrawlTimeoutError,
  RetryPolicy,
  RetryStrategy,
} from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { Clock, systemClock } from '../../utils/timestamps.js';
import { CatalogueStore } from '../catalogue/CatalogueStore.js';
import { ListingStore } from '../catalogue/ListingStore.js';
import { CacheLedger } from './CacheLedger.js';
import { serializeCacheKey } from './cacheKeys.js';
import { assertValidMaxAge, isStale } from './FreshnessPolicy.js';

export const DEFAULT_CRAWL_TIMEOUT_MS = 30000;

export interface FreshnessCoordinatorOptions {
  crawler: Crawler;
  clock?: Clock;
  /** Deadline for a whole refresh: every crawl attempt and the backoff between them */
  crawlTimeoutMs?: number;
  /** Merged over CRAWL_RETRY_POLICY */
  retryPolicy?: Partial<RetryPolicy>;
}

/**
 * Freshness Coordinator
 *
 * Decides per cache key whether stored data may be served or must be
 * re-crawled. A refresh crawls, then merges the payload and moves the
 * ledger forward in one transaction, ledger last: if anything fails the
 * whole merge rolls back and the key stays stale, so the next call crawls
 * again.
 *
 * A fresh ledger entry only counts as a hit while the rows it vouches for
 * are still stored; a key whose data was deleted is crawled again.
 *
 * Concurrent calls for the same key in this process share one refresh.
 * Separate processes may still both crawl a stale key; the upserts make a
 * double merge harmless.
 */
export class FreshnessCoordinator {
  private readonly crawler: Crawler;
  private readonly clock: Clock;
  private readonly crawlTimeoutMs: number;
  private readonly retryStrategy: RetryStrategy;
  private readonly ledger: CacheLedger;
  private readonly inFlight = new Map<string, Promise<FreshnessResult>>();

  constructor(
    private readonly db: SqlExecutor,
    options: FreshnessCoordinatorOptions
  ) {
    this.crawler = options.crawler;
    this.clock = options.clock ?? systemClock;
    this.crawlTimeoutMs = options.crawlTimeoutMs ?? DEFAULT_CRAWL_TIMEOUT_MS;
    this.retryStrategy = new RetryStrategy({ ...CRAWL_RETRY_POLICY, ...options.retryPolicy });
    this.ledger = new CacheLedger(db);
  }

  /**
   * Serve from cache when the key was refreshed within `maxAgeMs`,
   * otherwise crawl and merge.
   *
   * @throws CrawlTimeoutError when the crawler does not answer in time
   * @throws CrawlFailureError when the crawler rejects
   * @throws DuplicateKeyError / ForeignKeyViolationError when the payload
   *   conflicts with stored data
   */
  async ensureFresh(
    key: CacheKey,
    maxAgeMs: number,
    options: EnsureFreshOptions = {}
  ): Promise<FreshnessResult> {
    assertValidMaxAge(maxAgeMs);
    const cacheKey = serializeCacheKey(key);

    if (!options.force) {
      const lastFetched = await this.ledger.getLastFetched(key);
      const now = this.clock();
      if (lastFetched && !isStale(lastFetched, maxAgeMs, now)) {
        const ageMs = now.getTime() - lastFetched.getTime();
        if (await this.hasStoredData(key)) {
          logger.debug('Cache hit', { cacheKey, ageMs, maxAgeMs });
          return { status: 'hit', cacheKey, lastFetched, ageMs };
        }
        logger.info('Ledger is fresh but no data is stored, refreshing', { cacheKey, ageMs });
      }
    }

    const pending = this.inFlight.get(cacheKey);
    if (pending) {
      logger.debug('Joining in-flight refresh', { cacheKey });
      return pending;
    }

    const refresh = this.refresh(key, cacheKey, options.timeoutMs ?? this.crawlTimeoutMs).finally(
      () => {
        this.inFlight.delete(cacheKey);
      }
    );
    this.inFlight.set(cacheKey, refresh);
    return refresh;
  }

  async getLastFetched(key: CacheKey): Promise<Date | null> {
    return this.ledger.getLastFetched(key);
  }

  /**
   * Forget a key's refresh time; the next ensureFresh crawls.
   * Catalogue rows are kept.
   */
  async invalidate(key: CacheKey): Promise<boolean> {
    const removed = await this.ledger.delete(key);
    logger.info('Cache key invalidated', { cacheKey: serializeCacheKey(key), removed });
    return removed;
  }

  async invalidateAll(): Promise<number> {
    const removed = await this.ledger.deleteAll();
    logger.info('Cache ledger cleared', { removed });
    return removed;
  }

  private async refresh(key: CacheKey, cacheKey: string, timeoutMs: number): Promise<FreshnessResult> {
    const startTime = Date.now();

    const payload = await this.crawlWithDeadline(key, cacheKey, timeoutMs);

    const lastFetched = this.clock();

    try {
      const merged = await this.db.transaction((tx) => this.merge(tx, key, payload, lastFetched));

      logger.info('Cache refreshed', {
        cacheKey,
        durationMs: Date.now() - startTime,
        ...merged,
      });

      return { status: 'refreshed', cacheKey, lastFetched, merged };
    } catch (error) {
      logger.error('Merging crawl result failed; ledger left unchanged', {
        cacheKey,
        error: getErrorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Crawl with retries, all of it bounded by one timer. When it fires the
   * signal the crawler holds is aborted and no further attempt starts.
   */
  private async crawlWithDeadline(
    key: CacheKey,
    cacheKey: string,
    timeoutMs: number
  ): Promise<CrawlPayload> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        logger.warn('Crawl timed out', { cacheKey, timeoutMs });
        controller.abort();
        reject(new CrawlTimeoutError(cacheKey, timeoutMs));
      }, timeoutMs);
    });

    const attempts = this.retryStrategy.execute(
      () => this.crawlOnce(key, cacheKey, controller.signal),
      `crawl ${cacheKey}`,
      controller.signal
    );

    try {
      return await Promise.race([attempts, timeoutPromise]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async crawlOnce(key: CacheKey, cacheKey: string, signal: AbortSignal): Promise<CrawlPayload> {
    try {
      return await this.crawler.crawl(key, { signal });
    } catch (error) {
      if (error instanceof CrawlTimeoutError || error instanceof CrawlFailureError) {
        throw error;
      }
      throw new CrawlFailureError(cacheKey, undefined, toError(error), {
        operation: 'crawl',
      });
    }
  }

  private async hasStoredData(key: CacheKey): Promise<boolean> {
    const catalogue = new CatalogueStore(this.db, this.clock);
    const listings = new ListingStore(this.db, this.clock);

    switch (key.kind) {
      case 'anime':
        return (await catalogue.getAnimeBySlug(key.slug)) !== null;
      case 'episodes':
        return (await catalogue.getEpisodesForAnime(key.slug)).length > 0;
      case 'episode-sources':
        return (await catalogue.getVideoSourcesForEpisode(key.episodeUrl)).length > 0;
      case 'listing':
        switch (key.listing) {
          case 'updates':
            return (await listings.getAnimeUpdatesCount()) > 0;
          case 'completed':
            return (await listings.getCompletedAnimeCount()) > 0;
          case 'crawled':
            return (await listings.getCrawledAnimeCount()) > 0;
        }
    }
  }

  /**
   * Runs inside the refresh transaction. Order matters: anime before the
   * episodes that reference them, the ledger strictly last.
   */
  private async merge(
    tx: SqlExecutor,
    key: CacheKey,
    payload: CrawlPayload,
    fetchedAt: Date
  ): Promise<MergeSummary> {
    const clock: Clock = () => fetchedAt;
    const catalogue = new CatalogueStore(tx, clock);
    const listings = new ListingStore(tx, clock);
    const ledger = new CacheLedger(tx);

    const merged: MergeSummary = {
      anime: 0,
      episodes: 0,
      videoSources: 0,
      crawledAnime: 0,
      completedAnime: 0,
      animeUpdates: 0,
    };

    for (const anime of payload.anime ?? []) {
      await catalogue.upsertAnime(anime);
      merged.anime++;
    }

    for (const episode of payload.episodes ?? []) {
      await catalogue.upsertEpisode(episode);
      merged.episodes++;
    }

    for (const set of payload.videoSources ?? []) {
      merged.videoSources += await catalogue.replaceVideoSources(set.episodeUrl, set.sources);
    }

    merged.crawledAnime = await listings.saveCrawledAnimeBatch(payload.crawledAnime ?? []);
    merged.completedAnime = await listings.saveCompletedAnime(payload.completedAnime ?? []);
    merged.animeUpdates = await listings.saveAnimeUpdates(payload.animeUpdates ?? []);

    await ledger.touch(key, fetchedAt);

    return merged;
  }
}
