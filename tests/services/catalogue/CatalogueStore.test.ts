import { TestDatabase, createTestDatabase, ManualClock, MINUTE } from '../../utils/testDatabase.js';
import { CatalogueStore } from '../../../src/services/catalogue/CatalogueStore.js';
import { DuplicateKeyError, ForeignKeyViolationError } from '../../../src/errors/index.js';

describe('CatalogueStore', () => {
  let testDb: TestDatabase;
  let clock: ManualClock;
  let store: CatalogueStore;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    clock = new ManualClock('2024-06-01T12:00:00.000Z');
    store = new CatalogueStore(testDb.db, clock.now);
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  describe('upsertAnime', () => {
    it('should insert a new anime with every omitted field null', async () => {
      const anime = await store.upsertAnime({
        slug: 'naruto',
        url: 'https://example.test/anime/naruto',
        title: 'Naruto',
        genres: ['Action', 'Adventure', 'Action'],
      });

      expect(anime.slug).toBe('naruto');
      expect(anime.url).toBe('https://example.test/anime/naruto');
      expect(anime.title).toBe('Naruto');
      expect(anime.genres).toEqual(['Action', 'Adventure']);
      expect(anime.casts).toEqual([]);
      expect(anime.synopsis).toBeNull();
      expect(anime.createdAt.toISOString()).toBe('2024-06-01T12:00:00.000Z');
      expect(anime.updatedAt.toISOString()).toBe('2024-06-01T12:00:00.000Z');
    });

    it('should overwrite mutable fields and bump updatedAt on refresh', async () => {
      await store.upsertAnime({
        slug: 'naruto',
        url: 'https://example.test/anime/naruto',
        title: 'Naruto',
        status: 'Ongoing',
        synopsis: 'A ninja',
      });

      clock.advance(10 * MINUTE);
      const refreshed = await store.upsertAnime({
        slug: 'naruto',
        url: 'https://example.test/anime/naruto',
        title: 'Naruto (TV)',
        status: 'Completed',
      });

      expect(refreshed.title).toBe('Naruto (TV)');
      expect(refreshed.status).toBe('Completed');
      expect(refreshed.synopsis).toBeNull();
      expect(refreshed.createdAt.toISOString()).toBe('2024-06-01T12:00:00.000Z');
      expect(refreshed.updatedAt.toISOString()).toBe('2024-06-01T12:10:00.000Z');
      expect(await testDb.count('anime_details')).toBe(1);
    });

    it('should never change a url once it is set', async () => {
      await store.upsertAnime({ slug: 'naruto', url: 'https://example.test/anime/naruto', title: 'Naruto' });

      const refreshed = await store.upsertAnime({
        slug: 'naruto',
        url: 'https://example.test/anime/naruto-moved',
        title: 'Naruto',
      });

      expect(refreshed.url).toBe('https://example.test/anime/naruto');
    });

    it('should fill in a url that was missing', async () => {
      await store.upsertAnime({ slug: 'naruto', title: 'Naruto' });

      const refreshed = await store.upsertAnime({
        slug: 'naruto',
        url: 'https://example.test/anime/naruto',
        title: 'Naruto',
      });

      expect(refreshed.url).toBe('https://example.test/anime/naruto');
    });

    it('should reject a url already used by another slug', async () => {
      await store.upsertAnime({ slug: 'naruto', url: 'https://example.test/anime/naruto', title: 'Naruto' });

      const attempt = store.upsertAnime({
        slug: 'naruto-copy',
        url: 'https://example.test/anime/naruto',
        title: 'Naruto Copy',
      });

      await expect(attempt).rejects.toBeInstanceOf(DuplicateKeyError);
      await expect(attempt).rejects.toMatchObject({ table: 'anime_details', key: 'url' });
      expect(await store.getAnimeBySlug('naruto-copy')).toBeNull();
    });
  });

  describe('episodes', () => {
    beforeEach(async () => {
      await store.upsertAnime({ slug: 'naruto', url: 'https://example.test/anime/naruto', title: 'Naruto' });
      await store.upsertAnime({ slug: 'bleach', url: 'https://example.test/anime/bleach', title: 'Bleach' });
    });

    it('should insert an episode and derive its slug from the url', async () => {
      const episode = await store.upsertEpisode({
        url: 'https://example.test/episode/naruto-episode-1/',
        animeSlug: 'naruto',
        number: '1',
        title: 'Enter: Naruto Uzumaki!',
      });

      expect(episode.slug).toBe('naruto-episode-1');
      expect(episode.animeSlug).toBe('naruto');
      expect(episode.number).toBe('1');
    });

    it('should update an existing episode in place', async () => {
      await store.upsertEpisode({ url: 'https://example.test/episode/naruto-episode-1', animeSlug: 'naruto', title: 'Old' });
      clock.advance(MINUTE);

      const updated = await store.upsertEpisode({
        url: 'https://example.test/episode/naruto-episode-1',
        animeSlug: 'naruto',
        title: 'New',
      });

      expect(updated.title).toBe('New');
      expect(updated.updatedAt.toISOString()).toBe('2024-06-01T12:01:00.000Z');
      expect(await testDb.count('episodes')).toBe(1);
    });

    it('should fail with a foreign key violation for an unknown anime', async () => {
      const attempt = store.upsertEpisode({
        url: 'https://example.test/episode/ghost-episode-1',
        animeSlug: 'ghost-slug',
      });

      await expect(attempt).rejects.toBeInstanceOf(ForeignKeyViolationError);
      await expect(attempt).rejects.toMatchObject({
        table: 'episodes',
        constraint: 'fk_episodes_anime_slug',
      });
      expect(await testDb.count('episodes')).toBe(0);
    });

    it('should refuse to move an episode url to another anime', async () => {
      await store.upsertEpisode({ url: 'https://example.test/episode/shared-1', animeSlug: 'naruto', title: 'Original' });

      const attempt = store.upsertEpisode({
        url: 'https://example.test/episode/shared-1',
        animeSlug: 'bleach',
        title: 'Hijacked',
      });

      await expect(attempt).rejects.toBeInstanceOf(DuplicateKeyError);
      await expect(attempt).rejects.toMatchObject({ table: 'episodes', key: 'url' });

      const stored = await store.getEpisodeByUrl('https://example.test/episode/shared-1');
      expect(stored?.animeSlug).toBe('naruto');
      expect(stored?.title).toBe('Original');
    });

    it('should list episodes of one anime in insertion order', async () => {
      await store.upsertEpisode({ url: 'https://example.test/episode/naruto-2', animeSlug: 'naruto', number: '2' });
      await store.upsertEpisode({ url: 'https://example.test/episode/naruto-1', animeSlug: 'naruto', number: '1' });
      await store.upsertEpisode({ url: 'https://example.test/episode/bleach-1', animeSlug: 'bleach', number: '1' });

      const episodes = await store.getEpisodesForAnime('naruto');

      expect(episodes.map(e => e.number)).toEqual(['2', '1']);
    });

    it('should return an anime together with its episodes', async () => {
      await store.upsertEpisode({ url: 'https://example.test/episode/naruto-1', animeSlug: 'naruto' });

      const detail = await store.getAnimeWithEpisodes('naruto');

      expect(detail?.title).toBe('Naruto');
      expect(detail?.episodes.map(e => e.slug)).toEqual(['naruto-1']);
      expect(await store.getAnimeWithEpisodes('missing')).toBeNull();
    });

    it('should delete only the deleted anime episodes and keep video sources', async () => {
      await store.upsertEpisode({ url: 'https://example.test/episode/naruto-1', animeSlug: 'naruto' });
      await store.upsertEpisode({ url: 'https://example.test/episode/bleach-1', animeSlug: 'bleach' });
      await store.upsertVideoSource({
        episodeUrl: 'https://example.test/episode/naruto-1',
        server: 'alpha',
        quality: '720p',
        url: 'https://cdn.example.test/naruto-1.mp4',
      });

      expect(await store.deleteAnime('naruto')).toBe(true);

      expect(await store.getEpisodesForAnime('naruto')).toEqual([]);
      expect(await store.getEpisodesForAnime('bleach')).toHaveLength(1);
      expect(await store.getVideoSourcesForEpisode('https://example.test/episode/naruto-1')).toHaveLength(1);
      expect(await store.deleteAnime('naruto')).toBe(false);
    });

    it('should delete all episodes of an anime', async () => {
      await store.upsertEpisode({ url: 'https://example.test/episode/naruto-1', animeSlug: 'naruto' });
      await store.upsertEpisode({ url: 'https://example.test/episode/naruto-2', animeSlug: 'naruto' });

      expect(await store.deleteEpisodesForAnime('naruto')).toBe(2);
      expect(await store.getAnimeBySlug('naruto')).not.toBeNull();
    });
  });

  describe('video sources', () => {
    const episodeUrl = 'https://example.test/episode/naruto-1';

    it('should update the url of a source with the same server and quality', async () => {
      const first = await store.upsertVideoSource({ episodeUrl, server: 'alpha', quality: '720p', url: 'https://cdn.example.test/a' });
      clock.advance(MINUTE);
      const second = await store.upsertVideoSource({ episodeUrl, server: 'alpha', quality: '720p', url: 'https://cdn.example.test/b' });

      expect(second.id).toBe(first.id);
      expect(second.url).toBe('https://cdn.example.test/b');
      expect(second.updatedAt.toISOString()).toBe('2024-06-01T12:01:00.000Z');
      expect(await testDb.count('video_sources')).toBe(1);
    });

    it('should treat a missing quality as part of the identity', async () => {
      await store.upsertVideoSource({ episodeUrl, server: 'alpha', url: 'https://cdn.example.test/a' });
      await store.upsertVideoSource({ episodeUrl, server: 'alpha', url: 'https://cdn.example.test/b' });
      await store.upsertVideoSource({ episodeUrl, server: 'alpha', quality: '1080p', url: 'https://cdn.example.test/c' });

      const sources = await store.getVideoSourcesForEpisode(episodeUrl);

      expect(sources.map(s => [s.quality, s.url])).toEqual([
        [null, 'https://cdn.example.test/b'],
        ['1080p', 'https://cdn.example.test/c'],
      ]);
    });

    it('should store one row when the same source is upserted concurrently', async () => {
      const source = { episodeUrl, server: 'alpha', quality: '720p', url: 'https://cdn.example.test/a' };

      const [first, second] = await Promise.all([
        store.upsertVideoSource(source),
        store.upsertVideoSource(source),
      ]);

      expect(second.id).toBe(first.id);
      expect(await store.getVideoSourcesForEpisode(episodeUrl)).toHaveLength(1);
    });

    it('should replace the whole source set of an episode', async () => {
      await store.upsertVideoSource({ episodeUrl, server: 'old', quality: '480p', url: 'https://cdn.example.test/old' });

      const written = await store.replaceVideoSources(episodeUrl, [
        { server: 'alpha', quality: '720p', url: 'https://cdn.example.test/alpha' },
        { server: 'beta', quality: '1080p', url: 'https://cdn.example.test/beta' },
      ]);

      expect(written).toBe(2);
      const sources = await store.getVideoSourcesForEpisode(episodeUrl);
      expect(sources.map(s => s.server)).toEqual(['alpha', 'beta']);
    });

    it('should delete the sources of one episode', async () => {
      await store.upsertVideoSource({ episodeUrl, server: 'alpha', url: 'https://cdn.example.test/a' });
      await store.upsertVideoSource({ episodeUrl: 'https://example.test/episode/other', server: 'alpha' });

      expect(await store.deleteVideoSources(episodeUrl)).toBe(1);
      expect(await testDb.count('video_sources')).toBe(1);
    });
  });
});
