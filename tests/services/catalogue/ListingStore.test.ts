import { TestDatabase, createTestDatabase, ManualClock, MINUTE } from '../../utils/testDatabase.js';
import { ListingStore } from '../../../src/services/catalogue/ListingStore.js';
import { CatalogueStore } from '../../../src/services/catalogue/CatalogueStore.js';
import { InputValidationError } from '../../../src/errors/index.js';

describe('ListingStore', () => {
  let testDb: TestDatabase;
  let clock: ManualClock;
  let store: ListingStore;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    clock = new ManualClock('2024-06-01T12:00:00.000Z');
    store = new ListingStore(testDb.db, clock.now);
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  describe('crawled anime', () => {
    it('should upsert by slug', async () => {
      await store.saveCrawledAnime({ slug: 'naruto', url: 'https://example.test/anime/naruto', title: 'Naruto', status: 'Ongoing' });
      clock.advance(MINUTE);
      await store.saveCrawledAnime({ slug: 'naruto', url: 'https://example.test/anime/naruto', title: 'Naruto', status: 'Completed' });

      const stored = await store.getCrawledAnimeBySlug('naruto');

      expect(stored?.status).toBe('Completed');
      expect(stored?.createdAt.toISOString()).toBe('2024-06-01T12:00:00.000Z');
      expect(stored?.updatedAt.toISOString()).toBe('2024-06-01T12:01:00.000Z');
      expect(await store.getCrawledAnimeCount()).toBe(1);
    });

    it('should save a batch and list the most recently refreshed first', async () => {
      const saved = await store.saveCrawledAnimeBatch([
        { slug: 'naruto', url: 'https://example.test/anime/naruto', title: 'Naruto' },
        { slug: 'bleach', url: 'https://example.test/anime/bleach', title: 'Bleach' },
      ]);
      clock.advance(MINUTE);
      await store.saveCrawledAnime({ slug: 'one-piece', url: 'https://example.test/anime/one-piece', title: 'One Piece' });

      expect(saved).toBe(2);
      const all = await store.getCrawledAnime();
      expect(all.map(a => a.slug)).toEqual(['one-piece', 'naruto', 'bleach']);

      const page = await store.getCrawledAnime({ limit: 1, offset: 1 });
      expect(page.map(a => a.slug)).toEqual(['naruto']);
    });

    it('should return 0 for an empty batch', async () => {
      expect(await store.saveCrawledAnimeBatch([])).toBe(0);
    });

    it('should delete one or all crawled anime', async () => {
      await store.saveCrawledAnimeBatch([
        { slug: 'naruto', url: 'https://example.test/anime/naruto', title: 'Naruto' },
        { slug: 'bleach', url: 'https://example.test/anime/bleach', title: 'Bleach' },
      ]);

      expect(await store.deleteCrawledAnime('naruto')).toBe(true);
      expect(await store.deleteCrawledAnime('naruto')).toBe(false);
      expect(await store.deleteAllCrawledAnime()).toBe(1);
    });

    it('should be independent of anime details', async () => {
      const catalogue = new CatalogueStore(testDb.db, clock.now);
      await catalogue.upsertAnime({ slug: 'naruto', title: 'Naruto' });
      await store.saveCrawledAnime({ slug: 'naruto', url: 'https://example.test/anime/naruto', title: 'Naruto' });

      await catalogue.deleteAnime('naruto');

      expect(await store.getCrawledAnimeBySlug('naruto')).not.toBeNull();
    });
  });

  describe('completed anime', () => {
    it('should upsert by url and keep genres as a set', async () => {
      await store.saveCompletedAnime([
        { url: 'https://example.test/anime/naruto', title: 'Naruto', genres: ['Action', 'Action', 'Comedy'] },
      ]);
      await store.saveCompletedAnime([
        { url: 'https://example.test/anime/naruto', title: 'Naruto', episodeCount: '220', genres: ['Action', 'Comedy'] },
      ]);

      const completed = await store.getCompletedAnime();

      expect(completed).toHaveLength(1);
      expect(completed[0]?.episodeCount).toBe('220');
      expect(completed[0]?.genres).toEqual(['Action', 'Comedy']);
    });

    it('should clear the completed list', async () => {
      await store.saveCompletedAnime([
        { url: 'https://example.test/anime/a', title: 'A' },
        { url: 'https://example.test/anime/b', title: 'B' },
      ]);

      expect(await store.deleteAllCompletedAnime()).toBe(2);
      expect(await store.getCompletedAnime()).toEqual([]);
    });
  });

  describe('anime updates', () => {
    it('should upsert by episode url', async () => {
      await store.saveAnimeUpdates([
        { episodeUrl: 'https://example.test/episode/naruto-220', title: 'Naruto', episodeNumber: '220' },
      ]);
      await store.saveAnimeUpdates([
        { episodeUrl: 'https://example.test/episode/naruto-220', title: 'Naruto', episodeNumber: '220', releaseInfo: 'Today' },
        { episodeUrl: 'https://example.test/episode/bleach-1', title: 'Bleach', episodeNumber: '1' },
      ]);

      const updates = await store.getAnimeUpdates();

      expect(updates).toHaveLength(2);
      const naruto = updates.find(u => u.episodeUrl === 'https://example.test/episode/naruto-220');
      expect(naruto?.releaseInfo).toBe('Today');
      expect(await store.deleteAllAnimeUpdates()).toBe(2);
    });
  });

  describe('paging', () => {
    beforeEach(async () => {
      await store.saveAnimeUpdates([
        { episodeUrl: 'https://example.test/episode/a-1', title: 'A' },
        { episodeUrl: 'https://example.test/episode/b-1', title: 'B' },
        { episodeUrl: 'https://example.test/episode/c-1', title: 'C' },
      ]);
    });

    it('should apply limit and offset in insertion order for rows written together', async () => {
      const page = await store.getAnimeUpdates({ limit: 1, offset: 1 });

      expect(page.map(u => u.title)).toEqual(['B']);
      expect(await store.getAnimeUpdatesCount()).toBe(3);
    });

    it('should reject a negative or fractional limit', async () => {
      await expect(store.getAnimeUpdates({ limit: -1 })).rejects.toBeInstanceOf(InputValidationError);
      await expect(store.getCompletedAnime({ limit: 2.5 })).rejects.toMatchObject({ field: 'limit' });
    });

    it('should reject a negative offset', async () => {
      await expect(store.getCrawledAnime({ limit: 10, offset: -5 })).rejects.toMatchObject({
        field: 'offset',
        message: 'offset must be a non-negative integer',
      });
    });
  });
});
