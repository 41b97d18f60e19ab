import { CacheKey, ListingName } from '../../types/cache.js';
import { InputValidationError } from '../../errors/index.js';

const LISTINGS: readonly ListingName[] = ['updates', 'completed', 'crawled'];
const LISTING_PAGE = /^(updates|completed|crawled):page:(\d+)$/;

function isListingName(value: string): value is ListingName {
  return LISTINGS.some((listing) => listing === value);
}

function requireNonEmpty(field: string, value: string): string {
  if (value.trim() === '') {
    throw new InputValidationError(field, value, `Cache key ${field} must not be empty`);
  }
  return value;
}

function requirePage(page: number): number {
  if (!Number.isInteger(page) || page < 1) {
    throw new InputValidationError('page', page, 'Listing page must be a positive integer');
  }
  return page;
}

/**
 * Constructors for the four cache-key kinds
 */
export const cacheKeys = {
  listing(listing: ListingName, page?: number): CacheKey {
    return page === undefined
      ? { kind: 'listing', listing }
      : { kind: 'listing', listing, page: requirePage(page) };
  },
  anime(slug: string): CacheKey {
    return { kind: 'anime', slug: requireNonEmpty('slug', slug) };
  },
  episodes(slug: string): CacheKey {
    return { kind: 'episodes', slug: requireNonEmpty('slug', slug) };
  },
  episodeSources(episodeUrl: string): CacheKey {
    return { kind: 'episode-sources', episodeUrl: requireNonEmpty('episodeUrl', episodeUrl) };
  },
};

/**
 * Ledger string for a key:
 * `updates`, `crawled:page:2`, `anime:<slug>`, `episodes:<slug>`,
 * `sources:<episodeUrl>`
 */
export function serializeCacheKey(key: CacheKey): string {
  switch (key.kind) {
    case 'listing':
      return key.page === undefined ? key.listing : `${key.listing}:page:${key.page}`;
    case 'anime':
      return `anime:${key.slug}`;
    case 'episodes':
      return `episodes:${key.slug}`;
    case 'episode-sources':
      return `sources:${key.episodeUrl}`;
  }
}

export function parseCacheKey(value: string): CacheKey {
  if (isListingName(value)) {
    return cacheKeys.listing(value);
  }

  const page = LISTING_PAGE.exec(value);
  if (page && page[1] !== undefined && page[2] !== undefined && isListingName(page[1])) {
    return cacheKeys.listing(page[1], parseInt(page[2], 10));
  }

  const separator = value.indexOf(':');
  if (separator > 0) {
    const prefix = value.slice(0, separator);
    const rest = value.slice(separator + 1);
    switch (prefix) {
      case 'anime':
        return cacheKeys.anime(rest);
      case 'episodes':
        return cacheKeys.episodes(rest);
      case 'sources':
        return cacheKeys.episodeSources(rest);
    }
  }

  throw new InputValidationError('cacheKey', value, `Unrecognized cache key: '${value}'`);
}
