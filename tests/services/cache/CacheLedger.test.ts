import { TestDatabase, createTestDatabase } from '../../utils/testDatabase.js';
import { CacheLedger } from '../../../src/services/cache/CacheLedger.js';
import { cacheKeys } from '../../../src/services/cache/cacheKeys.js';

describe('CacheLedger', () => {
  let testDb: TestDatabase;
  let ledger: CacheLedger;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    ledger = new CacheLedger(testDb.db);
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  it('should return null for a key never refreshed', async () => {
    expect(await ledger.getEntry(cacheKeys.anime('naruto'))).toBeNull();
    expect(await ledger.getLastFetched(cacheKeys.anime('naruto'))).toBeNull();
  });

  it('should move lastFetched forward and keep createdAt', async () => {
    const key = cacheKeys.anime('naruto');

    await ledger.touch(key, new Date('2024-06-01T12:00:00.000Z'));
    await ledger.touch(key, new Date('2024-06-01T13:00:00.000Z'));

    const entry = await ledger.getEntry(key);
    expect(entry?.cacheKey).toBe('anime:naruto');
    expect(entry?.lastFetched.toISOString()).toBe('2024-06-01T13:00:00.000Z');
    expect(entry?.createdAt.toISOString()).toBe('2024-06-01T12:00:00.000Z');
    expect(await testDb.count('cache_metadata')).toBe(1);
  });

  it('should list entries ordered by key', async () => {
    await ledger.touch(cacheKeys.listing('updates'), new Date('2024-06-01T12:00:00.000Z'));
    await ledger.touch(cacheKeys.anime('naruto'), new Date('2024-06-01T12:00:00.000Z'));

    const entries = await ledger.listEntries();

    expect(entries.map(e => e.cacheKey)).toEqual(['anime:naruto', 'updates']);
  });

  it('should delete one key or all keys', async () => {
    await ledger.touch(cacheKeys.anime('naruto'), new Date('2024-06-01T12:00:00.000Z'));
    await ledger.touch(cacheKeys.anime('bleach'), new Date('2024-06-01T12:00:00.000Z'));
    await ledger.touch(cacheKeys.anime('one-piece'), new Date('2024-06-01T12:00:00.000Z'));

    expect(await ledger.delete(cacheKeys.anime('naruto'))).toBe(true);
    expect(await ledger.delete(cacheKeys.anime('naruto'))).toBe(false);
    expect(await ledger.deleteAll()).toBe(2);
  });
});
