import { SqlExecutor } from '../../types/database.js';
import { UserFavoriteRow, UserHistoryRow } from '../../types/database-models.js';
import {
  AnimeSnapshot,
  FavoriteEntry,
  HistoryEntry,
  SubscriptionEntry,
  WatchedEpisode,
} from '../../types/users.js';
import {
  DatabaseError,
  ErrorCode,
  ForeignKeyViolationError,
  InputValidationError,
} from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { Clock, systemClock, toDate, toDbTimestamp } from '../../utils/timestamps.js';
import { assertPageValue } from '../../utils/pagination.js';

type SnapshotTable = 'user_favorites' | 'user_subscriptions';

function mapHistoryRow(row: UserHistoryRow): HistoryEntry {
  return {
    userId: row.user_id,
    episodeSlug: row.episode_slug,
    animeSlug: row.anime_slug,
    episodeTitle: row.episode_title,
    animeTitle: row.anime_title,
    thumbnail: row.thumbnail,
    watchedAt: toDate(row.watched_at),
  };
}

function mapFavoriteRow(row: UserFavoriteRow): FavoriteEntry {
  return {
    userId: row.user_id,
    animeSlug: row.anime_slug,
    animeTitle: row.anime_title,
    thumbnail: row.thumbnail,
    createdAt: toDate(row.created_at),
  };
}

function requireSlug(field: string, value: string): void {
  if (value.trim() === '') {
    throw new InputValidationError(field, value, `${field} must not be empty`);
  }
}

/**
 * User Relation Store
 *
 * History, favorites and subscriptions. Each row carries a snapshot of the
 * titles/thumbnail taken when it was written so lists render without a join;
 * the snapshot only changes through refreshSnapshots(). Slugs are not checked
 * against the catalogue, so rows outlive deleted anime.
 *
 * Every write is idempotent on (user_id, key). Writing for a user that does
 * not exist raises ForeignKeyViolationError.
 */
export class UserRelationStore {
  constructor(
    private readonly db: SqlExecutor,
    private readonly clock: Clock = systemClock
  ) {}

  // ============================================
  // HISTORY
  // ============================================

  /**
   * Re-watching moves watched_at forward and refreshes the snapshot;
   * there is never a second row for the same episode.
   */
  async recordHistory(userId: number, episode: WatchedEpisode): Promise<HistoryEntry> {
    requireSlug('episodeSlug', episode.episodeSlug);
    requireSlug('animeSlug', episode.animeSlug);
    const now = toDbTimestamp(this.clock());

    await this.withUserCheck(userId, 'user_history', 'recordHistory', () =>
      this.db.execute(
        `INSERT INTO user_history (
           user_id, episode_slug, anime_slug, episode_title, anime_title, thumbnail, watched_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (user_id, episode_slug) DO UPDATE SET
           anime_slug = excluded.anime_slug,
           episode_title = excluded.episode_title,
           anime_title = excluded.anime_title,
           thumbnail = excluded.thumbnail,
           watched_at = excluded.watched_at`,
        [
          userId,
          episode.episodeSlug,
          episode.animeSlug,
          episode.episodeTitle ?? null,
          episode.animeTitle ?? null,
          episode.thumbnail ?? null,
          now,
        ]
      )
    );

    const row = await this.db.get<UserHistoryRow>(
      'SELECT * FROM user_history WHERE user_id = ? AND episode_slug = ?',
      [userId, episode.episodeSlug]
    );
    if (!row) {
      throw new DatabaseError(
        `History entry for user ${userId} missing after write`,
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        { service: 'UserRelationStore', operation: 'recordHistory', entityId: userId }
      );
    }
    return mapHistoryRow(row);
  }

  /**
   * Most recently watched first
   */
  async getHistory(userId: number, limit?: number): Promise<HistoryEntry[]> {
    const sql = 'SELECT * FROM user_history WHERE user_id = ? ORDER BY watched_at DESC, id DESC';
    if (limit !== undefined) {
      assertPageValue('limit', limit);
    }
    const rows =
      limit === undefined
        ? await this.db.query<UserHistoryRow>(sql, [userId])
        : await this.db.query<UserHistoryRow>(`${sql} LIMIT ?`, [userId, limit]);
    return rows.map(mapHistoryRow);
  }

  async removeHistory(userId: number, episodeSlug: string): Promise<boolean> {
    const result = await this.db.execute(
      'DELETE FROM user_history WHERE user_id = ? AND episode_slug = ?',
      [userId, episodeSlug]
    );
    return result.affectedRows > 0;
  }

  async clearHistory(userId: number): Promise<number> {
    const result = await this.db.execute('DELETE FROM user_history WHERE user_id = ?', [userId]);
    return result.affectedRows;
  }

  // ============================================
  // FAVORITES
  // ============================================

  /**
   * Favoriting twice is a no-op: the first row and its snapshot stay.
   */
  async addFavorite(userId: number, anime: AnimeSnapshot): Promise<FavoriteEntry> {
    return this.addSnapshotRow('user_favorites', userId, anime, 'addFavorite');
  }

  async removeFavorite(userId: number, animeSlug: string): Promise<boolean> {
    return this.removeSnapshotRow('user_favorites', userId, animeSlug);
  }

  async getFavorites(userId: number): Promise<FavoriteEntry[]> {
    return this.listSnapshotRows('user_favorites', userId);
  }

  async isFavorite(userId: number, animeSlug: string): Promise<boolean> {
    return this.hasSnapshotRow('user_favorites', userId, animeSlug);
  }

  // ============================================
  // SUBSCRIPTIONS
  // ============================================

  async subscribe(userId: number, anime: AnimeSnapshot): Promise<SubscriptionEntry> {
    return this.addSnapshotRow('user_subscriptions', userId, anime, 'subscribe');
  }

  async unsubscribe(userId: number, animeSlug: string): Promise<boolean> {
    return this.removeSnapshotRow('user_subscriptions', userId, animeSlug);
  }

  async getSubscriptions(userId: number): Promise<SubscriptionEntry[]> {
    return this.listSnapshotRows('user_subscriptions', userId);
  }

  async isSubscribed(userId: number, animeSlug: string): Promise<boolean> {
    return this.hasSnapshotRow('user_subscriptions', userId, animeSlug);
  }

  /**
   * Users to notify when an anime gets a new episode
   */
  async getSubscriberIds(animeSlug: string): Promise<number[]> {
    const rows = await this.db.query<{ user_id: number }>(
      'SELECT user_id FROM user_subscriptions WHERE anime_slug = ? ORDER BY user_id ASC',
      [animeSlug]
    );
    return rows.map(row => row.user_id);
  }

  // ============================================
  // SNAPSHOTS
  // ============================================

  /**
   * Copy the current title and poster of an anime into every favorite,
   * subscription and history row that references it. Returns the number
   * of rows touched; 0 when the anime is not in the catalogue.
   */
  async refreshSnapshots(animeSlug: string): Promise<number> {
    return this.db.transaction(async (tx) => {
      const anime = await tx.get<{ title: string; poster: string | null }>(
        'SELECT title, poster FROM anime_details WHERE slug = ?',
        [animeSlug]
      );
      if (!anime) {
        return 0;
      }

      let touched = 0;
      for (const table of ['user_favorites', 'user_subscriptions'] as const) {
        const result = await tx.execute(
          `UPDATE ${table} SET anime_title = ?, thumbnail = ? WHERE anime_slug = ?`,
          [anime.title, anime.poster, animeSlug]
        );
        touched += result.affectedRows;
      }

      const history = await tx.execute(
        'UPDATE user_history SET anime_title = ? WHERE anime_slug = ?',
        [anime.title, animeSlug]
      );
      touched += history.affectedRows;

      logger.info('Refreshed relation snapshots', { animeSlug, touched });
      return touched;
    });
  }

  private async addSnapshotRow(
    table: SnapshotTable,
    userId: number,
    anime: AnimeSnapshot,
    operation: string
  ): Promise<FavoriteEntry> {
    requireSlug('animeSlug', anime.animeSlug);
    await this.withUserCheck(userId, table, operation, () =>
      this.db.execute(
        `INSERT INTO ${table} (user_id, anime_slug, anime_title, thumbnail, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (user_id, anime_slug) DO NOTHING`,
        [userId, anime.animeSlug, anime.animeTitle, anime.thumbnail ?? null, toDbTimestamp(this.clock())]
      )
    );

    const row = await this.db.get<UserFavoriteRow>(
      `SELECT * FROM ${table} WHERE user_id = ? AND anime_slug = ?`,
      [userId, anime.animeSlug]
    );
    if (!row) {
      throw new DatabaseError(
        `${table} row for user ${userId} missing after write`,
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        { service: 'UserRelationStore', operation, entityId: userId }
      );
    }
    return mapFavoriteRow(row);
  }

  private async removeSnapshotRow(
    table: SnapshotTable,
    userId: number,
    animeSlug: string
  ): Promise<boolean> {
    const result = await this.db.execute(
      `DELETE FROM ${table} WHERE user_id = ? AND anime_slug = ?`,
      [userId, animeSlug]
    );
    return result.affectedRows > 0;
  }

  private async listSnapshotRows(table: SnapshotTable, userId: number): Promise<FavoriteEntry[]> {
    const rows = await this.db.query<UserFavoriteRow>(
      `SELECT * FROM ${table} WHERE user_id = ? ORDER BY created_at DESC, id DESC`,
      [userId]
    );
    return rows.map(mapFavoriteRow);
  }

  private async hasSnapshotRow(
    table: SnapshotTable,
    userId: number,
    animeSlug: string
  ): Promise<boolean> {
    const row = await this.db.get<{ id: number }>(
      `SELECT id FROM ${table} WHERE user_id = ? AND anime_slug = ?`,
      [userId, animeSlug]
    );
    return row !== undefined;
  }

  /**
   * Name the relation table in the foreign key error the driver raises
   * for an unknown user.
   */
  private async withUserCheck<T>(
    userId: number,
    table: string,
    operation: string,
    write: () => Promise<T>
  ): Promise<T> {
    try {
      return await write();
    } catch (error) {
      if (error instanceof ForeignKeyViolationError) {
        throw new ForeignKeyViolationError(
          table,
          `fk_${table}_user_id`,
          `User ${userId} does not exist`,
          { service: 'UserRelationStore', operation, entityId: userId }
        );
      }
      throw error;
    }
  }
}
