import { TestDatabase, createTestDatabase, ManualClock, HOUR } from '../utils/testDatabase.js';
import { GarbageCollectionService } from '../../src/services/garbageCollectionService.js';
import { CatalogueStore } from '../../src/services/catalogue/CatalogueStore.js';
import { IdentityStore } from '../../src/services/users/IdentityStore.js';

const DAY = 24 * HOUR;

describe('GarbageCollectionService', () => {
  let testDb: TestDatabase;
  let clock: ManualClock;
  let service: GarbageCollectionService;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    clock = new ManualClock('2024-06-20T12:00:00.000Z');
    service = new GarbageCollectionService(testDb.db, {
      gcHour: 3,
      tokenRetentionDays: 7,
      clock: clock.now,
    });
  });

  afterEach(async () => {
    service.stop();
    await testDb.destroy();
  });

  describe('runCollection', () => {
    it('should delete video sources whose episode is gone', async () => {
      const catalogue = new CatalogueStore(testDb.db, clock.now);
      await catalogue.upsertAnime({ slug: 'naruto', title: 'Naruto' });
      await catalogue.upsertAnime({ slug: 'bleach', title: 'Bleach' });
      await catalogue.upsertEpisode({ url: 'https://example.test/episode/naruto-1', animeSlug: 'naruto' });
      await catalogue.upsertEpisode({ url: 'https://example.test/episode/bleach-1', animeSlug: 'bleach' });
      await catalogue.replaceVideoSources('https://example.test/episode/naruto-1', [
        { server: 'alpha', url: 'https://cdn.example.test/n1' },
      ]);
      await catalogue.replaceVideoSources('https://example.test/episode/bleach-1', [
        { server: 'alpha', url: 'https://cdn.example.test/b1a' },
        { server: 'beta', url: 'https://cdn.example.test/b1b' },
      ]);
      await catalogue.deleteAnime('bleach');

      const result = await service.runCollection();

      expect(result.orphanedVideoSourcesDeleted).toBe(2);
      expect(result.errors).toEqual([]);
      expect(await catalogue.getVideoSourcesForEpisode('https://example.test/episode/naruto-1')).toHaveLength(1);
    });

    it('should delete tokens spent or expired before the retention window', async () => {
      const userId = await testDb.seedUser('alice@example.test');
      const tokenClock = new ManualClock();
      const identity = new IdentityStore(testDb.db, tokenClock.now);

      // Expired 11 days ago
      tokenClock.set('2024-06-09T12:00:00.000Z');
      await identity.createVerificationToken(userId, 'email_verification', HOUR);

      // Used 10 days ago, not yet expired
      tokenClock.set('2024-06-10T12:00:00.000Z');
      const longLived = await identity.createVerificationToken(userId, 'password_reset', 30 * DAY);
      await identity.markTokenUsed(longLived.token);

      // Expired yesterday
      tokenClock.set('2024-06-19T12:00:00.000Z');
      await identity.createVerificationToken(userId, 'email_verification', HOUR);

      // Used yesterday
      const recentlyUsed = await identity.createVerificationToken(userId, 'password_reset', 2 * DAY);
      await identity.markTokenUsed(recentlyUsed.token);

      // Still valid
      tokenClock.set('2024-06-20T11:30:00.000Z');
      const live = await identity.createVerificationToken(userId, 'email_verification', HOUR);

      const result = await service.runCollection();

      expect(result.tokensDeleted).toBe(2);
      expect(await testDb.count('verification_tokens')).toBe(3);
      expect(await identity.findVerificationToken(live.token)).not.toBeNull();
      expect(await identity.findVerificationToken(longLived.token)).toBeNull();
    });

    it('should report zero counts on an empty database', async () => {
      const result = await service.runCollection();

      expect(result).toEqual({
        startTime: '2024-06-20T12:00:00.000Z',
        endTime: '2024-06-20T12:00:00.000Z',
        orphanedVideoSourcesDeleted: 0,
        tokensDeleted: 0,
        errors: [],
      });
    });

    it('should record a failing step and still run the others', async () => {
      await testDb.db.execute('DROP TABLE video_sources');

      const result = await service.runCollection();

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^video_sources: /);
      expect(result.tokensDeleted).toBe(0);
    });
  });

  describe('scheduling', () => {
    it('should wait until the configured hour today when it is still ahead', () => {
      expect(service.msUntilNextRun(new Date(2024, 5, 1, 2, 30, 0, 0))).toBe(30 * 60 * 1000);
    });

    it('should wait until tomorrow once the hour has passed', () => {
      expect(service.msUntilNextRun(new Date(2024, 5, 1, 4, 0, 0, 0))).toBe(23 * HOUR);
      expect(service.msUntilNextRun(new Date(2024, 5, 1, 3, 0, 0, 0))).toBe(DAY);
    });

    it('should start once and stop', () => {
      service.start();
      service.start();
      expect(service.isRunning()).toBe(true);

      service.stop();
      expect(service.isRunning()).toBe(false);
    });
  });
});
