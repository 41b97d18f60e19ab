import { SqlExecutor } from '../../types/database.js';
import { CacheMetadataRow } from '../../types/database-models.js';
import { CacheKey, LedgerEntry } from '../../types/cache.js';
import { serializeCacheKey } from './cacheKeys.js';
import { toDate, toDbTimestamp } from '../../utils/timestamps.js';

function mapLedgerRow(row: CacheMetadataRow): LedgerEntry {
  return {
    cacheKey: row.cache_key,
    lastFetched: toDate(row.last_fetched),
    createdAt: toDate(row.created_at),
  };
}

/**
 * Cache Freshness Ledger
 *
 * One cache_metadata row per cache key holding the time of the last
 * successful refresh. Rows appear on the first refresh, move forward on
 * every later one and are only removed by an explicit invalidation.
 */
export class CacheLedger {
  constructor(private readonly db: SqlExecutor) {}

  async getEntry(key: CacheKey): Promise<LedgerEntry | null> {
    const row = await this.db.get<CacheMetadataRow>(
      'SELECT * FROM cache_metadata WHERE cache_key = ?',
      [serializeCacheKey(key)]
    );
    return row ? mapLedgerRow(row) : null;
  }

  async getLastFetched(key: CacheKey): Promise<Date | null> {
    const entry = await this.getEntry(key);
    return entry ? entry.lastFetched : null;
  }

  /**
   * Record a successful refresh at `fetchedAt`
   */
  async touch(key: CacheKey, fetchedAt: Date): Promise<void> {
    const timestamp = toDbTimestamp(fetchedAt);
    await this.db.execute(
      `INSERT INTO cache_metadata (cache_key, last_fetched, created_at)
       VALUES (?, ?, ?)
       ON CONFLICT (cache_key) DO UPDATE SET last_fetched = excluded.last_fetched`,
      [serializeCacheKey(key), timestamp, timestamp]
    );
  }

  async delete(key: CacheKey): Promise<boolean> {
    const result = await this.db.execute('DELETE FROM cache_metadata WHERE cache_key = ?', [
      serializeCacheKey(key),
    ]);
    return result.affectedRows > 0;
  }

  async deleteAll(): Promise<number> {
    const result = await this.db.execute('DELETE FROM cache_metadata');
    return result.affectedRows;
  }

  async listEntries(): Promise<LedgerEntry[]> {
    const rows = await this.db.query<CacheMetadataRow>(
      'SELECT * FROM cache_metadata ORDER BY cache_key ASC'
    );
    return rows.map(mapLedgerRow);
  }
}
