import { SqlExecutor, SqlParam } from '../../types/database.js';
import {
  AnimeUpdateRow,
  CompletedAnimeRow,
  CountRow,
  CrawledAnimeRow,
} from '../../types/database-models.js';
import {
  AnimeUpdateInput,
  AnimeUpdateRecord,
  CompletedAnimeInput,
  CompletedAnimeRecord,
  CrawledAnimeInput,
  CrawledAnimeRecord,
  ListingQuery,
} from '../../types/catalogue.js';
import { logger } from '../../utils/logging.js';
import { Clock, systemClock, toDate, toDbTimestamp } from '../../utils/timestamps.js';
import { parseStringSet, serializeStringSet } from '../../utils/stringSet.js';
import { assertPageValue } from '../../utils/pagination.js';

function mapCrawledAnimeRow(row: CrawledAnimeRow): CrawledAnimeRecord {
  return {
    slug: row.slug,
    url: row.url,
    title: row.title,
    thumbnail: row.thumbnail,
    status: row.status,
    type: row.type,
    episodeStatus: row.episode_status,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function mapCompletedAnimeRow(row: CompletedAnimeRow): CompletedAnimeRecord {
  return {
    url: row.url,
    title: row.title,
    thumbnail: row.thumbnail,
    type: row.type,
    episodeCount: row.episode_count,
    status: row.status,
    postedBy: row.posted_by,
    postedAt: row.posted_at,
    seriesTitle: row.series_title,
    seriesUrl: row.series_url,
    genres: parseStringSet(row.genres),
    rating: row.rating,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function mapAnimeUpdateRow(row: AnimeUpdateRow): AnimeUpdateRecord {
  return {
    episodeUrl: row.episode_url,
    title: row.title,
    thumbnail: row.thumbnail,
    episodeNumber: row.episode_number,
    type: row.type,
    seriesTitle: row.series_title,
    seriesUrl: row.series_url,
    status: row.status,
    releaseInfo: row.release_info,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

/**
 * Listing Store
 *
 * What the crawler last saw on the browse pages, the completed list and the
 * update feed. Independent of anime_details: removing a detail record never
 * touches these rows and vice versa.
 */
export class ListingStore {
  constructor(
    private readonly db: SqlExecutor,
    private readonly clock: Clock = systemClock
  ) {}

  // ============================================
  // CRAWLED ANIME (browse pages, keyed by slug)
  // ============================================

  async saveCrawledAnime(input: CrawledAnimeInput): Promise<void> {
    await this.upsertCrawledAnime(this.db, input, toDbTimestamp(this.clock()));
  }

  /**
   * Save a page of crawled anime in one transaction
   */
  async saveCrawledAnimeBatch(inputs: CrawledAnimeInput[]): Promise<number> {
    if (inputs.length === 0) {
      return 0;
    }
    const now = toDbTimestamp(this.clock());

    return this.db.transaction(async (tx) => {
      for (const input of inputs) {
        await this.upsertCrawledAnime(tx, input, now);
      }
      logger.debug('Saved crawled anime batch', { count: inputs.length });
      return inputs.length;
    });
  }

  async getCrawledAnimeBySlug(slug: string): Promise<CrawledAnimeRecord | null> {
    const row = await this.db.get<CrawledAnimeRow>('SELECT * FROM crawled_anime WHERE slug = ?', [
      slug,
    ]);
    return row ? mapCrawledAnimeRow(row) : null;
  }

  /**
   * Most recently refreshed first
   */
  async getCrawledAnime(query: ListingQuery = {}): Promise<CrawledAnimeRecord[]> {
    const rows = await this.db.query<CrawledAnimeRow>(
      ...this.paged('SELECT * FROM crawled_anime ORDER BY updated_at DESC, id ASC', query)
    );
    return rows.map(mapCrawledAnimeRow);
  }

  async getCrawledAnimeCount(): Promise<number> {
    return this.countRows('crawled_anime');
  }

  async deleteCrawledAnime(slug: string): Promise<boolean> {
    const result = await this.db.execute('DELETE FROM crawled_anime WHERE slug = ?', [slug]);
    return result.affectedRows > 0;
  }

  async deleteAllCrawledAnime(): Promise<number> {
    const result = await this.db.execute('DELETE FROM crawled_anime');
    return result.affectedRows;
  }

  // ============================================
  // COMPLETED ANIME (keyed by url)
  // ============================================

  async saveCompletedAnime(inputs: CompletedAnimeInput[]): Promise<number> {
    if (inputs.length === 0) {
      return 0;
    }
    const now = toDbTimestamp(this.clock());

    return this.db.transaction(async (tx) => {
      for (const input of inputs) {
        await tx.execute(
          `INSERT INTO completed_anime (
             title, url, thumbnail, type, episode_count, status, posted_by, posted_at,
             series_title, series_url, genres, rating, created_at, updated_at
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (url) DO UPDATE SET
             title = excluded.title,
             thumbnail = excluded.thumbnail,
             type = excluded.type,
             episode_count = excluded.episode_count,
             status = excluded.status,
             posted_by = excluded.posted_by,
             posted_at = excluded.posted_at,
             series_title = excluded.series_title,
             series_url = excluded.series_url,
             genres = excluded.genres,
             rating = excluded.rating,
             updated_at = excluded.updated_at`,
          [
            input.title,
            input.url,
            input.thumbnail ?? null,
            input.type ?? null,
            input.episodeCount ?? null,
            input.status ?? null,
            input.postedBy ?? null,
            input.postedAt ?? null,
            input.seriesTitle ?? null,
            input.seriesUrl ?? null,
            serializeStringSet(input.genres),
            input.rating ?? null,
            now,
            now,
          ]
        );
      }
      return inputs.length;
    });
  }

  async getCompletedAnime(query: ListingQuery = {}): Promise<CompletedAnimeRecord[]> {
    const rows = await this.db.query<CompletedAnimeRow>(
      ...this.paged('SELECT * FROM completed_anime ORDER BY updated_at DESC, id ASC', query)
    );
    return rows.map(mapCompletedAnimeRow);
  }

  async getCompletedAnimeCount(): Promise<number> {
    return this.countRows('completed_anime');
  }

  async deleteAllCompletedAnime(): Promise<number> {
    const result = await this.db.execute('DELETE FROM completed_anime');
    return result.affectedRows;
  }

  // ============================================
  // ANIME UPDATES (update feed, keyed by episode url)
  // ============================================

  async saveAnimeUpdates(inputs: AnimeUpdateInput[]): Promise<number> {
    if (inputs.length === 0) {
      return 0;
    }
    const now = toDbTimestamp(this.clock());

    return this.db.transaction(async (tx) => {
      for (const input of inputs) {
        await tx.execute(
          `INSERT INTO anime_updates (
             title, episode_url, thumbnail, episode_number, type, series_title,
             series_url, status, release_info, created_at, updated_at
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (episode_url) DO UPDATE SET
             title = excluded.title,
             thumbnail = excluded.thumbnail,
             episode_number = excluded.episode_number,
             type = excluded.type,
             series_title = excluded.series_title,
             series_url = excluded.series_url,
             status = excluded.status,
             release_info = excluded.release_info,
             updated_at = excluded.updated_at`,
          [
            input.title,
            input.episodeUrl,
            input.thumbnail ?? null,
            input.episodeNumber ?? null,
            input.type ?? null,
            input.seriesTitle ?? null,
            input.seriesUrl ?? null,
            input.status ?? null,
            input.releaseInfo ?? null,
            now,
            now,
          ]
        );
      }
      return inputs.length;
    });
  }

  async getAnimeUpdates(query: ListingQuery = {}): Promise<AnimeUpdateRecord[]> {
    const rows = await this.db.query<AnimeUpdateRow>(
      ...this.paged('SELECT * FROM anime_updates ORDER BY updated_at DESC, id ASC', query)
    );
    return rows.map(mapAnimeUpdateRow);
  }

  async getAnimeUpdatesCount(): Promise<number> {
    return this.countRows('anime_updates');
  }

  async deleteAllAnimeUpdates(): Promise<number> {
    const result = await this.db.execute('DELETE FROM anime_updates');
    return result.affectedRows;
  }

  private async upsertCrawledAnime(
    executor: SqlExecutor,
    input: CrawledAnimeInput,
    now: string
  ): Promise<void> {
    await executor.execute(
      `INSERT INTO crawled_anime (
         slug, title, url, thumbnail, status, type, episode_status, created_at, updated_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (slug) DO UPDATE SET
         title = excluded.title,
         url = excluded.url,
         thumbnail = excluded.thumbnail,
         status = excluded.status,
         type = excluded.type,
         episode_status = excluded.episode_status,
         updated_at = excluded.updated_at`,
      [
        input.slug,
        input.title,
        input.url,
        input.thumbnail ?? null,
        input.status ?? null,
        input.type ?? null,
        input.episodeStatus ?? null,
        now,
        now,
      ]
    );
  }

  private paged(sql: string, query: ListingQuery): [string, SqlParam[]] {
    if (query.offset !== undefined) {
      assertPageValue('offset', query.offset);
    }
    if (query.limit === undefined) {
      return [sql, []];
    }
    assertPageValue('limit', query.limit);
    return [`${sql} LIMIT ? OFFSET ?`, [query.limit, query.offset ?? 0]];
  }

  private async countRows(table: 'crawled_anime' | 'completed_anime' | 'anime_updates'): Promise<number> {
    const row = await this.db.get<CountRow>(`SELECT COUNT(*) AS count FROM ${table}`);
    return Number(row?.count ?? 0);
  }
}
