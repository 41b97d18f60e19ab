/**
 * Catalogue domain records. Slug and url are the natural keys; surrogate
 * row ids never leave the stores.
 */

export interface AnimeRecord {
  slug: string;
  url: string | null;
  title: string;
  alternateTitles: string | null;
  poster: string | null;
  rating: string | null;
  trailerUrl: string | null;
  status: string | null;
  studio: string | null;
  releaseDate: string | null;
  duration: string | null;
  season: string | null;
  type: string | null;
  totalEpisodes: string | null;
  director: string | null;
  casts: string[];
  genres: string[];
  synopsis: string | null;
  createdAt: Date;
  updatedAt: Date;
}

type AnimeMutableFields = Omit<AnimeRecord, 'slug' | 'title' | 'createdAt' | 'updatedAt'>;

/**
 * Crawler-shaped anime detail. Omitted fields are written as null (or an
 * empty set) since every refresh overwrites the mutable fields.
 */
export type AnimeInput = Pick<AnimeRecord, 'slug' | 'title'> & Partial<AnimeMutableFields>;

export interface EpisodeRecord {
  url: string;
  /** Last path segment of the url */
  slug: string;
  animeSlug: string;
  number: string | null;
  title: string | null;
  releaseDate: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface EpisodeInput {
  url: string;
  animeSlug: string;
  number?: string | null;
  title?: string | null;
  releaseDate?: string | null;
}

export interface AnimeWithEpisodes extends AnimeRecord {
  episodes: EpisodeRecord[];
}

export interface VideoSourceRecord {
  id: number;
  episodeUrl: string;
  server: string | null;
  quality: string | null;
  url: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface VideoSourceInput {
  episodeUrl: string;
  server?: string | null;
  quality?: string | null;
  url?: string | null;
}

/** A source without its episode, as found inside one episode's full set */
export type EpisodeSource = Omit<VideoSourceInput, 'episodeUrl'>;

// ============================================
// LISTINGS
// ============================================

export interface CrawledAnimeRecord {
  slug: string;
  url: string;
  title: string;
  thumbnail: string | null;
  status: string | null;
  type: string | null;
  episodeStatus: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type CrawledAnimeInput = Pick<CrawledAnimeRecord, 'slug' | 'url' | 'title'> &
  Partial<Pick<CrawledAnimeRecord, 'thumbnail' | 'status' | 'type' | 'episodeStatus'>>;

export interface CompletedAnimeRecord {
  url: string;
  title: string;
  thumbnail: string | null;
  type: string | null;
  episodeCount: string | null;
  status: string | null;
  postedBy: string | null;
  postedAt: string | null;
  seriesTitle: string | null;
  seriesUrl: string | null;
  genres: string[];
  rating: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type CompletedAnimeInput = Pick<CompletedAnimeRecord, 'url' | 'title'> &
  Partial<Omit<CompletedAnimeRecord, 'url' | 'title' | 'createdAt' | 'updatedAt'>>;

export interface AnimeUpdateRecord {
  episodeUrl: string;
  title: string;
  thumbnail: string | null;
  episodeNumber: string | null;
  type: string | null;
  seriesTitle: string | null;
  seriesUrl: string | null;
  status: string | null;
  releaseInfo: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type AnimeUpdateInput = Pick<AnimeUpdateRecord, 'episodeUrl' | 'title'> &
  Partial<Omit<AnimeUpdateRecord, 'episodeUrl' | 'title' | 'createdAt' | 'updatedAt'>>;

export interface ListingQuery {
  limit?: number;
  offset?: number;
}
