import { logger } from '../utils/logging.js';
import { SqlExecutor } from '../types/database.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { Clock, systemClock, toDbTimestamp } from '../utils/timestamps.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface GarbageCollectionOptions {
  /** Local hour of day (0-23) for the scheduled run */
  gcHour: number;
  /** How long spent or expired tokens are kept before deletion */
  tokenRetentionDays: number;
  clock?: Clock;
}

/**
 * Garbage Collection Service
 *
 * Reconciles what the schema does not enforce.
 *
 * Schedule: daily at the configured hour
 * - Delete video sources whose episode_url matches no episode (they are
 *   joined by value, so deleting an anime leaves them behind)
 * - Delete verification tokens that were used, or expired, longer ago than
 *   the retention period
 *
 * Catalogue rows and the cache ledger are never touched here.
 */
export class GarbageCollectionService {
  private timeoutId: NodeJS.Timeout | null = null;
  private readonly clock: Clock;

  constructor(
    private readonly db: SqlExecutor,
    private readonly options: GarbageCollectionOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Start the garbage collection scheduler
   */
  start(): void {
    if (this.timeoutId) {
      logger.warn('Garbage collection scheduler already running');
      return;
    }

    logger.info('Starting garbage collection scheduler', { gcHour: this.options.gcHour });

    const scheduleNextRun = (): void => {
      const msUntilNext = this.msUntilNextRun(this.clock());

      logger.info('Next garbage collection scheduled', {
        scheduledFor: new Date(this.clock().getTime() + msUntilNext).toISOString(),
        msUntil: msUntilNext,
      });

      this.timeoutId = setTimeout(() => {
        this.runCollection()
          .catch((error: unknown) => {
            logger.error('Scheduled garbage collection failed', { error: getErrorMessage(error) });
          })
          .finally(() => {
            // stop() during a run clears the handle; don't reschedule then
            if (this.timeoutId) {
              scheduleNextRun();
            }
          });
      }, msUntilNext);
    };

    scheduleNextRun();
  }

  /**
   * Stop the garbage collection scheduler
   */
  stop(): void {
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
      logger.info('Garbage collection scheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.timeoutId !== null;
  }

  /**
   * Time from `now` to the next occurrence of gcHour:00 local time.
   * Exactly on the hour counts as passed.
   */
  msUntilNextRun(now: Date): number {
    const next = new Date(now.getTime());
    next.setHours(this.options.gcHour, 0, 0, 0);
    if (next.getTime() <= now.getTime()) {
      next.setDate(next.getDate() + 1);
    }
    return next.getTime() - now.getTime();
  }

  /**
   * Manually trigger garbage collection.
   * Each step runs on its own; a failing step is recorded and the rest still run.
   */
  async runCollection(): Promise<GarbageCollectionResult> {
    logger.info('Starting garbage collection');

    const result: GarbageCollectionResult = {
      startTime: this.clock().toISOString(),
      orphanedVideoSourcesDeleted: 0,
      tokensDeleted: 0,
      errors: [],
    };

    try {
      result.orphanedVideoSourcesDeleted = await this.deleteOrphanedVideoSources();
    } catch (error) {
      result.errors.push(`video_sources: ${getErrorMessage(error)}`);
    }

    try {
      result.tokensDeleted = await this.deleteSpentTokens();
    } catch (error) {
      result.errors.push(`verification_tokens: ${getErrorMessage(error)}`);
    }

    result.endTime = this.clock().toISOString();

    if (result.errors.length > 0) {
      logger.error('Garbage collection finished with errors', result);
    } else {
      logger.info('Garbage collection complete', result);
    }
    return result;
  }

  private async deleteOrphanedVideoSources(): Promise<number> {
    try {
      const deleted = await this.db.execute(
        `DELETE FROM video_sources
         WHERE NOT EXISTS (
           SELECT 1 FROM episodes WHERE episodes.url = video_sources.episode_url
         )`
      );

      if (deleted.affectedRows === 0) {
        logger.debug('No orphaned video sources to delete');
      } else {
        logger.info('Deleted orphaned video sources', { count: deleted.affectedRows });
      }
      return deleted.affectedRows;
    } catch (error) {
      logger.error('Failed to delete orphaned video sources', {
        error: getErrorMessage(error),
      });
      throw error;
    }
  }

  private async deleteSpentTokens(): Promise<number> {
    const cutoff = toDbTimestamp(
      new Date(this.clock().getTime() - this.options.tokenRetentionDays * DAY_MS)
    );

    try {
      const deleted = await this.db.execute(
        `DELETE FROM verification_tokens
         WHERE (used_at IS NOT NULL AND used_at < ?)
            OR expires_at < ?`,
        [cutoff, cutoff]
      );

      if (deleted.affectedRows > 0) {
        logger.info('Deleted spent verification tokens', { count: deleted.affectedRows, cutoff });
      }
      return deleted.affectedRows;
    } catch (error) {
      logger.error('Failed to delete spent verification tokens', {
        error: getErrorMessage(error),
      });
      throw error;
    }
  }
}

export interface GarbageCollectionResult {
  startTime: string;
  endTime?: string;
  orphanedVideoSourcesDeleted: number;
  tokensDeleted: number;
  errors: string[];
}
