import { SqlExecutor } from '../../types/database.js';
import { AnimeDetailRow, EpisodeRow, VideoSourceRow } from '../../types/database-models.js';
import {
  AnimeInput,
  AnimeRecord,
  AnimeWithEpisodes,
  EpisodeInput,
  EpisodeRecord,
  EpisodeSource,
  VideoSourceInput,
  VideoSourceRecord,
} from '../../types/catalogue.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ErrorCode,
  ForeignKeyViolationError,
} from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { Clock, systemClock, toDate, toDbTimestamp } from '../../utils/timestamps.js';
import { parseStringSet, serializeStringSet } from '../../utils/stringSet.js';
import { extractSlugFromUrl } from '../../utils/slug.js';

export function mapAnimeRow(row: AnimeDetailRow): AnimeRecord {
  return {
    slug: row.slug,
    url: row.url,
    title: row.title,
    alternateTitles: row.alternate_titles,
    poster: row.poster,
    rating: row.rating,
    trailerUrl: row.trailer_url,
    status: row.status,
    studio: row.studio,
    releaseDate: row.release_date,
    duration: row.duration,
    season: row.season,
    type: row.type,
    totalEpisodes: row.total_episodes,
    director: row.director,
    casts: parseStringSet(row.casts),
    genres: parseStringSet(row.genres),
    synopsis: row.synopsis,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

export function mapEpisodeRow(row: EpisodeRow): EpisodeRecord {
  return {
    url: row.url,
    slug: extractSlugFromUrl(row.url),
    animeSlug: row.anime_slug,
    number: row.number,
    title: row.title,
    releaseDate: row.release_date,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

export function mapVideoSourceRow(row: VideoSourceRow): VideoSourceRecord {
  return {
    id: row.id,
    episodeUrl: row.episode_url,
    server: row.server,
    quality: row.quality,
    url: row.url,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

/**
 * Catalogue Store
 *
 * Canonical crawled entities keyed by their natural keys:
 * - anime_details by slug (url is unique too)
 * - episodes by url, owned by an anime (deleting the anime deletes them)
 * - video_sources by (episode_url, server, quality), joined to episodes by
 *   value only; they survive their episode until garbage collection
 *
 * Upserts overwrite mutable fields and bump updated_at. Slug and url are
 * identity fields and never change once set.
 */
export class CatalogueStore {
  constructor(
    private readonly db: SqlExecutor,
    private readonly clock: Clock = systemClock
  ) {}

  // ============================================
  // ANIME
  // ============================================

  async upsertAnime(input: AnimeInput): Promise<AnimeRecord> {
    const now = toDbTimestamp(this.clock());

    try {
      await this.db.execute(
        `INSERT INTO anime_details (
           slug, url, title, alternate_titles, poster, rating, trailer_url, status,
           studio, release_date, duration, season, type, total_episodes, director,
           casts, genres, synopsis, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (slug) DO UPDATE SET
           url = COALESCE(anime_details.url, excluded.url),
           title = excluded.title,
           alternate_titles = excluded.alternate_titles,
           poster = excluded.poster,
           rating = excluded.rating,
           trailer_url = excluded.trailer_url,
           status = excluded.status,
           studio = excluded.studio,
           release_date = excluded.release_date,
           duration = excluded.duration,
           season = excluded.season,
           type = excluded.type,
           total_episodes = excluded.total_episodes,
           director = excluded.director,
           casts = excluded.casts,
           genres = excluded.genres,
           synopsis = excluded.synopsis,
           updated_at = excluded.updated_at`,
        [
          input.slug,
          input.url ?? null,
          input.title,
          input.alternateTitles ?? null,
          input.poster ?? null,
          input.rating ?? null,
          input.trailerUrl ?? null,
          input.status ?? null,
          input.studio ?? null,
          input.releaseDate ?? null,
          input.duration ?? null,
          input.season ?? null,
          input.type ?? null,
          input.totalEpisodes ?? null,
          input.director ?? null,
          serializeStringSet(input.casts),
          serializeStringSet(input.genres),
          input.synopsis ?? null,
          now,
          now,
        ]
      );
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw new DuplicateKeyError(
          'anime_details',
          'url',
          `Anime url '${input.url ?? ''}' already belongs to another slug`,
          { service: 'CatalogueStore', operation: 'upsertAnime', entityId: input.slug }
        );
      }
      throw error;
    }

    const record = await this.getAnimeBySlug(input.slug);
    if (!record) {
      throw new DatabaseError(
        `Anime '${input.slug}' missing after upsert`,
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        { service: 'CatalogueStore', operation: 'upsertAnime', entityId: input.slug }
      );
    }

    logger.debug('Upserted anime', { slug: input.slug });
    return record;
  }

  async getAnimeBySlug(slug: string): Promise<AnimeRecord | null> {
    const row = await this.db.get<AnimeDetailRow>(
      'SELECT * FROM anime_details WHERE slug = ?',
      [slug]
    );
    return row ? mapAnimeRow(row) : null;
  }

  async getAnimeWithEpisodes(slug: string): Promise<AnimeWithEpisodes | null> {
    const anime = await this.getAnimeBySlug(slug);
    if (!anime) {
      return null;
    }
    const episodes = await this.getEpisodesForAnime(slug);
    return { ...anime, episodes };
  }

  /**
   * Deletes the anime and, through the foreign key, its episodes.
   * Video sources are left for garbage collection.
   */
  async deleteAnime(slug: string): Promise<boolean> {
    const result = await this.db.execute('DELETE FROM anime_details WHERE slug = ?', [slug]);
    if (result.affectedRows > 0) {
      logger.info('Deleted anime', { slug });
    }
    return result.affectedRows > 0;
  }

  // ============================================
  // EPISODES
  // ============================================

  /**
   * Insert or refresh an episode.
   *
   * An episode url already stored under another anime is a crawler
   * inconsistency: it raises DuplicateKeyError and nothing is written.
   */
  async upsertEpisode(input: EpisodeInput): Promise<EpisodeRecord> {
    const now = toDbTimestamp(this.clock());
    const context = { service: 'CatalogueStore', operation: 'upsertEpisode', entityId: input.url };

    let affectedRows: number;
    try {
      const result = await this.db.execute(
        `INSERT INTO episodes (anime_slug, number, title, url, release_date, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (url) DO UPDATE SET
           number = excluded.number,
           title = excluded.title,
           release_date = excluded.release_date,
           updated_at = excluded.updated_at
         WHERE episodes.anime_slug = excluded.anime_slug`,
        [
          input.animeSlug,
          input.number ?? null,
          input.title ?? null,
          input.url,
          input.releaseDate ?? null,
          now,
          now,
        ]
      );
      affectedRows = result.affectedRows;
    } catch (error) {
      if (error instanceof ForeignKeyViolationError) {
        throw new ForeignKeyViolationError(
          'episodes',
          'fk_episodes_anime_slug',
          `Episode '${input.url}' references unknown anime '${input.animeSlug}'`,
          context
        );
      }
      throw error;
    }

    if (affectedRows === 0) {
      const existing = await this.getEpisodeByUrl(input.url);
      throw new DuplicateKeyError(
        'episodes',
        'url',
        `Episode '${input.url}' already belongs to anime '${existing?.animeSlug ?? 'unknown'}', not '${input.animeSlug}'`,
        { ...context, metadata: { animeSlug: input.animeSlug, existingAnimeSlug: existing?.animeSlug } }
      );
    }

    const record = await this.getEpisodeByUrl(input.url);
    if (!record) {
      throw new DatabaseError(
        `Episode '${input.url}' missing after upsert`,
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        context
      );
    }
    return record;
  }

  async getEpisodeByUrl(url: string): Promise<EpisodeRecord | null> {
    const row = await this.db.get<EpisodeRow>('SELECT * FROM episodes WHERE url = ?', [url]);
    return row ? mapEpisodeRow(row) : null;
  }

  /**
   * Episodes in the order they were first stored
   */
  async getEpisodesForAnime(animeSlug: string): Promise<EpisodeRecord[]> {
    const rows = await this.db.query<EpisodeRow>(
      'SELECT * FROM episodes WHERE anime_slug = ? ORDER BY id ASC',
      [animeSlug]
    );
    return rows.map(mapEpisodeRow);
  }

  async deleteEpisodesForAnime(animeSlug: string): Promise<number> {
    const result = await this.db.execute('DELETE FROM episodes WHERE anime_slug = ?', [animeSlug]);
    return result.affectedRows;
  }

  // ============================================
  // VIDEO SOURCES
  // ============================================

  /**
   * Match on (episode_url, server, quality): refresh the url when the
   * source exists, insert it otherwise. Runs as one transaction so two
   * concurrent upserts of the same source cannot both insert.
   */
  async upsertVideoSource(input: VideoSourceInput): Promise<VideoSourceRecord> {
    const now = toDbTimestamp(this.clock());
    const server = input.server ?? null;
    const quality = input.quality ?? null;
    const match = `episode_url = ? AND ${this.nullSafeEquals('server')} AND ${this.nullSafeEquals('quality')}`;

    const row = await this.db.transaction(async (tx) => {
      const updated = await tx.execute(
        `UPDATE video_sources SET url = ?, updated_at = ? WHERE ${match}`,
        [input.url ?? null, now, input.episodeUrl, server, quality]
      );

      if (updated.affectedRows === 0) {
        await this.insertVideoSource(tx, input, now);
      }

      return tx.get<VideoSourceRow>(
        `SELECT * FROM video_sources WHERE ${match} ORDER BY id ASC LIMIT 1`,
        [input.episodeUrl, server, quality]
      );
    });

    if (!row) {
      throw new DatabaseError(
        `Video source for '${input.episodeUrl}' missing after upsert`,
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        { service: 'CatalogueStore', operation: 'upsertVideoSource', entityId: input.episodeUrl }
      );
    }
    return mapVideoSourceRow(row);
  }

  /**
   * Replace an episode's whole source set (delete, then insert) atomically.
   */
  async replaceVideoSources(episodeUrl: string, sources: EpisodeSource[]): Promise<number> {
    const now = toDbTimestamp(this.clock());

    return this.db.transaction(async (tx) => {
      await tx.execute('DELETE FROM video_sources WHERE episode_url = ?', [episodeUrl]);
      for (const source of sources) {
        await this.insertVideoSource(tx, { ...source, episodeUrl }, now);
      }
      logger.debug('Replaced video sources', { episodeUrl, count: sources.length });
      return sources.length;
    });
  }

  async getVideoSourcesForEpisode(episodeUrl: string): Promise<VideoSourceRecord[]> {
    const rows = await this.db.query<VideoSourceRow>(
      'SELECT * FROM video_sources WHERE episode_url = ? ORDER BY id ASC',
      [episodeUrl]
    );
    return rows.map(mapVideoSourceRow);
  }

  async deleteVideoSources(episodeUrl: string): Promise<number> {
    const result = await this.db.execute('DELETE FROM video_sources WHERE episode_url = ?', [
      episodeUrl,
    ]);
    return result.affectedRows;
  }

  private async insertVideoSource(
    executor: SqlExecutor,
    input: VideoSourceInput,
    now: string
  ): Promise<void> {
    await executor.execute(
      `INSERT INTO video_sources (episode_url, server, quality, url, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [input.episodeUrl, input.server ?? null, input.quality ?? null, input.url ?? null, now, now]
    );
  }

  /**
   * Equality that also matches NULL against NULL
   */
  private nullSafeEquals(column: string): string {
    return this.db.dialect === 'postgres'
      ? `${column} IS NOT DISTINCT FROM ?`
      : `${column} IS ?`;
  }
}
