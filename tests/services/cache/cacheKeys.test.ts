import { cacheKeys, parseCacheKey, serializeCacheKey } from '../../../src/services/cache/cacheKeys.js';
import { InputValidationError } from '../../../src/errors/index.js';

describe('cacheKeys', () => {
  describe('serializeCacheKey', () => {
    it('should serialize every key kind into its own namespace', () => {
      expect(serializeCacheKey(cacheKeys.listing('updates'))).toBe('updates');
      expect(serializeCacheKey(cacheKeys.listing('crawled', 2))).toBe('crawled:page:2');
      expect(serializeCacheKey(cacheKeys.anime('naruto'))).toBe('anime:naruto');
      expect(serializeCacheKey(cacheKeys.episodes('naruto'))).toBe('episodes:naruto');
      expect(serializeCacheKey(cacheKeys.episodeSources('https://example.test/episode/naruto-1'))).toBe(
        'sources:https://example.test/episode/naruto-1'
      );
    });

    it('should keep anime and episodes of the same slug apart', () => {
      expect(serializeCacheKey(cacheKeys.anime('naruto'))).not.toBe(
        serializeCacheKey(cacheKeys.episodes('naruto'))
      );
    });
  });

  describe('parseCacheKey', () => {
    it('should parse what serializeCacheKey writes', () => {
      expect(parseCacheKey('completed')).toEqual({ kind: 'listing', listing: 'completed' });
      expect(parseCacheKey('updates:page:3')).toEqual({ kind: 'listing', listing: 'updates', page: 3 });
      expect(parseCacheKey('anime:naruto')).toEqual({ kind: 'anime', slug: 'naruto' });
      expect(parseCacheKey('sources:https://example.test/episode/naruto-1')).toEqual({
        kind: 'episode-sources',
        episodeUrl: 'https://example.test/episode/naruto-1',
      });
    });

    it('should reject unknown keys', () => {
      expect(() => parseCacheKey('movies:naruto')).toThrow(InputValidationError);
      expect(() => parseCacheKey('naruto')).toThrow("Unrecognized cache key: 'naruto'");
    });
  });

  describe('validation', () => {
    it('should reject empty slugs', () => {
      expect(() => cacheKeys.anime('')).toThrow('Cache key slug must not be empty');
      expect(() => cacheKeys.episodeSources('  ')).toThrow(InputValidationError);
    });

    it('should reject pages below 1 or fractional pages', () => {
      expect(() => cacheKeys.listing('crawled', 0)).toThrow('Listing page must be a positive integer');
      expect(() => cacheKeys.listing('crawled', 1.5)).toThrow(InputValidationError);
      expect(() => parseCacheKey('crawled:page:0')).toThrow(InputValidationError);
    });
  });
});
