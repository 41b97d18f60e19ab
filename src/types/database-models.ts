/**
 * Database Row Type Definitions
 *
 * Raw rows as the drivers return them. Timestamps come back as ISO text
 * from SQLite and as Date from PostgreSQL; booleans as 0/1 from SQLite.
 */

export type DbTimestamp = string | Date;
export type DbBoolean = number | boolean;

export interface AnimeDetailRow {
  id: number;
  slug: string;
  url: string | null;
  title: string;
  alternate_titles: string | null;
  poster: string | null;
  rating: string | null;
  trailer_url: string | null;
  status: string | null;
  studio: string | null;
  release_date: string | null;
  duration: string | null;
  season: string | null;
  type: string | null;
  total_episodes: string | null;
  director: string | null;
  casts: string; // JSON array
  genres: string; // JSON array
  synopsis: string | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface EpisodeRow {
  id: number;
  anime_slug: string;
  number: string | null;
  title: string | null;
  url: string;
  release_date: string | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface VideoSourceRow {
  id: number;
  episode_url: string;
  server: string | null;
  quality: string | null;
  url: string | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface CrawledAnimeRow {
  id: number;
  slug: string;
  title: string;
  url: string;
  thumbnail: string | null;
  status: string | null;
  type: string | null;
  episode_status: string | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface CompletedAnimeRow {
  id: number;
  title: string;
  url: string;
  thumbnail: string | null;
  type: string | null;
  episode_count: string | null;
  status: string | null;
  posted_by: string | null;
  posted_at: string | null;
  series_title: string | null;
  series_url: string | null;
  genres: string; // JSON array
  rating: string | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface AnimeUpdateRow {
  id: number;
  title: string;
  episode_url: string;
  thumbnail: string | null;
  episode_number: string | null;
  type: string | null;
  series_title: string | null;
  series_url: string | null;
  status: string | null;
  release_info: string | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface CacheMetadataRow {
  id: number;
  cache_key: string;
  last_fetched: DbTimestamp;
  created_at: DbTimestamp;
}

export interface UserRow {
  id: number;
  email: string;
  password_hash: string | null;
  google_id: string | null;
  name: string | null;
  avatar: string | null;
  email_verified: DbBoolean;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export interface VerificationTokenRow {
  id: number;
  user_id: number;
  token: string;
  token_type: string;
  expires_at: DbTimestamp;
  used_at: DbTimestamp | null;
  created_at: DbTimestamp;
}

export interface UserHistoryRow {
  id: number;
  user_id: number;
  episode_slug: string;
  anime_slug: string;
  episode_title: string | null;
  anime_title: string | null;
  thumbnail: string | null;
  watched_at: DbTimestamp;
}

export interface UserFavoriteRow {
  id: number;
  user_id: number;
  anime_slug: string;
  anime_title: string;
  thumbnail: string | null;
  created_at: DbTimestamp;
}

export type UserSubscriptionRow = UserFavoriteRow;

export interface CountRow {
  count: number | string; // pg returns bigint counts as text
}
