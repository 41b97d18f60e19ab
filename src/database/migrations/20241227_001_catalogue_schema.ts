import { DatabaseConnection, DatabaseType } from '../../types/database.js';
import { logger } from '../../utils/logging.js';

/**
 * Catalogue Schema Migration
 *
 * CATALOGUE (crawled content, keyed by slug/url):
 * - anime_details: canonical detail record, unique slug and url
 * - episodes: unique url, owned by anime_details (ON DELETE CASCADE)
 * - video_sources: joined to episodes by value only (no FK), see GC service
 * - crawled_anime / completed_anime / anime_updates: listing snapshots
 *
 * FRESHNESS:
 * - cache_metadata: one row per cache key, last successful refresh
 *
 * USERS (every child row cascades with its user):
 * - users, verification_tokens
 * - user_history (user_id, episode_slug), user_favorites and
 *   user_subscriptions (user_id, anime_slug)
 *
 * Genre and cast sets are JSON arrays in TEXT columns. Timestamps are
 * ISO-8601 UTC text on SQLite and TIMESTAMPTZ on PostgreSQL.
 */

interface ColumnTypes {
  id: string;
  timestamp: string;
  now: string;
  false: string;
}

function columnTypes(dialect: DatabaseType): ColumnTypes {
  if (dialect === 'postgres') {
    return {
      id: 'SERIAL PRIMARY KEY',
      timestamp: 'TIMESTAMPTZ',
      now: 'CURRENT_TIMESTAMP',
      false: 'FALSE',
    };
  }
  return {
    id: 'INTEGER PRIMARY KEY AUTOINCREMENT',
    timestamp: 'TEXT',
    // Same shape as Date.prototype.toISOString() so text comparisons order correctly
    now: "(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))",
    false: '0',
  };
}

export class CatalogueSchemaMigration {
  static version = '20241227_001';
  static migrationName = 'catalogue_schema';

  static async up(db: DatabaseConnection): Promise<void> {
    const t = columnTypes(db.dialect);

    logger.info('Creating catalogue schema', { dialect: db.dialect });

    // ============================================================
    // CATALOGUE
    // ============================================================

    await db.execute(`
      CREATE TABLE anime_details (
        id ${t.id},
        slug VARCHAR(500) UNIQUE NOT NULL,
        url VARCHAR(1000) UNIQUE,
        title VARCHAR(500) NOT NULL,
        alternate_titles TEXT,
        poster VARCHAR(1000),
        rating VARCHAR(20),
        trailer_url VARCHAR(1000),
        status VARCHAR(50),
        studio VARCHAR(200),
        release_date VARCHAR(100),
        duration VARCHAR(50),
        season VARCHAR(100),
        type VARCHAR(50),
        total_episodes VARCHAR(50),
        director VARCHAR(200),
        casts TEXT NOT NULL DEFAULT '[]',
        genres TEXT NOT NULL DEFAULT '[]',
        synopsis TEXT,
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        updated_at ${t.timestamp} NOT NULL DEFAULT ${t.now}
      )
    `);

    await db.execute(`
      CREATE TABLE episodes (
        id ${t.id},
        anime_slug VARCHAR(500) NOT NULL,
        number VARCHAR(20),
        title VARCHAR(500),
        url VARCHAR(1000) UNIQUE NOT NULL,
        release_date VARCHAR(100),
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        updated_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        CONSTRAINT fk_episodes_anime_slug
          FOREIGN KEY (anime_slug)
          REFERENCES anime_details(slug)
          ON DELETE CASCADE
      )
    `);

    await db.execute('CREATE INDEX idx_episodes_anime_slug ON episodes(anime_slug)');

    // No FK to episodes: sources are matched by value and reconciled by GC
    await db.execute(`
      CREATE TABLE video_sources (
        id ${t.id},
        episode_url VARCHAR(1000) NOT NULL,
        server VARCHAR(100),
        quality VARCHAR(20),
        url VARCHAR(2000),
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        updated_at ${t.timestamp} NOT NULL DEFAULT ${t.now}
      )
    `);

    await db.execute('CREATE INDEX idx_video_sources_episode_url ON video_sources(episode_url)');

    // ============================================================
    // LISTINGS
    // ============================================================

    await db.execute(`
      CREATE TABLE crawled_anime (
        id ${t.id},
        slug VARCHAR(500) UNIQUE NOT NULL,
        title VARCHAR(500) NOT NULL,
        url VARCHAR(1000) UNIQUE NOT NULL,
        thumbnail VARCHAR(1000),
        status VARCHAR(50),
        type VARCHAR(50),
        episode_status VARCHAR(50),
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        updated_at ${t.timestamp} NOT NULL DEFAULT ${t.now}
      )
    `);

    await db.execute('CREATE INDEX idx_crawled_anime_status ON crawled_anime(status)');
    await db.execute('CREATE INDEX idx_crawled_anime_type ON crawled_anime(type)');

    await db.execute(`
      CREATE TABLE completed_anime (
        id ${t.id},
        title VARCHAR(500) NOT NULL,
        url VARCHAR(1000) UNIQUE NOT NULL,
        thumbnail VARCHAR(1000),
        type VARCHAR(50),
        episode_count VARCHAR(50),
        status VARCHAR(50),
        posted_by VARCHAR(100),
        posted_at VARCHAR(100),
        series_title VARCHAR(500),
        series_url VARCHAR(1000),
        genres TEXT NOT NULL DEFAULT '[]',
        rating VARCHAR(20),
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        updated_at ${t.timestamp} NOT NULL DEFAULT ${t.now}
      )
    `);

    await db.execute(`
      CREATE TABLE anime_updates (
        id ${t.id},
        title VARCHAR(500) NOT NULL,
        episode_url VARCHAR(1000) UNIQUE NOT NULL,
        thumbnail VARCHAR(1000),
        episode_number VARCHAR(50),
        type VARCHAR(50),
        series_title VARCHAR(500),
        series_url VARCHAR(1000),
        status VARCHAR(50),
        release_info VARCHAR(200),
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        updated_at ${t.timestamp} NOT NULL DEFAULT ${t.now}
      )
    `);

    // ============================================================
    // FRESHNESS LEDGER
    // ============================================================

    await db.execute(`
      CREATE TABLE cache_metadata (
        id ${t.id},
        cache_key VARCHAR(500) UNIQUE NOT NULL,
        last_fetched ${t.timestamp} NOT NULL,
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now}
      )
    `);

    // ============================================================
    // USERS
    // ============================================================

    await db.execute(`
      CREATE TABLE users (
        id ${t.id},
        email VARCHAR(255) UNIQUE NOT NULL,
        password_hash VARCHAR(255),
        google_id VARCHAR(255) UNIQUE,
        name VARCHAR(255),
        avatar VARCHAR(1000),
        email_verified BOOLEAN NOT NULL DEFAULT ${t.false},
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        updated_at ${t.timestamp} NOT NULL DEFAULT ${t.now}
      )
    `);

    await db.execute(`
      CREATE TABLE verification_tokens (
        id ${t.id},
        user_id INTEGER NOT NULL,
        token VARCHAR(255) UNIQUE NOT NULL,
        token_type VARCHAR(50) NOT NULL CHECK(token_type IN ('email_verification', 'password_reset')),
        expires_at ${t.timestamp} NOT NULL,
        used_at ${t.timestamp},
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        CONSTRAINT fk_verification_tokens_user_id
          FOREIGN KEY (user_id)
          REFERENCES users(id)
          ON DELETE CASCADE
      )
    `);

    await db.execute('CREATE INDEX idx_verification_tokens_user_id ON verification_tokens(user_id)');
    await db.execute('CREATE INDEX idx_verification_tokens_type ON verification_tokens(token_type)');

    await db.execute(`
      CREATE TABLE user_history (
        id ${t.id},
        user_id INTEGER NOT NULL,
        episode_slug VARCHAR(500) NOT NULL,
        anime_slug VARCHAR(500) NOT NULL,
        episode_title VARCHAR(500),
        anime_title VARCHAR(500),
        thumbnail VARCHAR(1000),
        watched_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        CONSTRAINT fk_user_history_user_id
          FOREIGN KEY (user_id)
          REFERENCES users(id)
          ON DELETE CASCADE,
        CONSTRAINT user_history_user_episode_unique
          UNIQUE(user_id, episode_slug)
      )
    `);

    await db.execute('CREATE INDEX idx_user_history_anime ON user_history(anime_slug)');
    await db.execute('CREATE INDEX idx_user_history_watched ON user_history(user_id, watched_at DESC)');

    await db.execute(`
      CREATE TABLE user_favorites (
        id ${t.id},
        user_id INTEGER NOT NULL,
        anime_slug VARCHAR(500) NOT NULL,
        anime_title VARCHAR(500) NOT NULL,
        thumbnail VARCHAR(1000),
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        CONSTRAINT fk_user_favorites_user_id
          FOREIGN KEY (user_id)
          REFERENCES users(id)
          ON DELETE CASCADE,
        CONSTRAINT user_favorites_user_anime_unique
          UNIQUE(user_id, anime_slug)
      )
    `);

    await db.execute('CREATE INDEX idx_user_favorites_slug ON user_favorites(anime_slug)');

    await db.execute(`
      CREATE TABLE user_subscriptions (
        id ${t.id},
        user_id INTEGER NOT NULL,
        anime_slug VARCHAR(500) NOT NULL,
        anime_title VARCHAR(500) NOT NULL,
        thumbnail VARCHAR(1000),
        created_at ${t.timestamp} NOT NULL DEFAULT ${t.now},
        CONSTRAINT fk_user_subscriptions_user_id
          FOREIGN KEY (user_id)
          REFERENCES users(id)
          ON DELETE CASCADE,
        CONSTRAINT user_subscriptions_user_anime_unique
          UNIQUE(user_id, anime_slug)
      )
    `);

    await db.execute('CREATE INDEX idx_user_subscriptions_slug ON user_subscriptions(anime_slug)');

    logger.info('Catalogue schema created');
  }

  static async down(db: DatabaseConnection): Promise<void> {
    // Children before parents
    const tables = [
      'user_subscriptions',
      'user_favorites',
      'user_history',
      'verification_tokens',
      'users',
      'cache_metadata',
      'anime_updates',
      'completed_anime',
      'crawled_anime',
      'video_sources',
      'episodes',
      'anime_details',
    ];

    for (const table of tables) {
      await db.execute(`DROP TABLE IF EXISTS ${table}`);
    }
  }
}
