import { ConfigManager } from './config/ConfigManager.js';
import { AppConfig } from './config/types.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { MigrationRunner } from './database/MigrationRunner.js';
import { GarbageCollectionService } from './services/garbageCollectionService.js';
import { CatalogueStore } from './services/catalogue/CatalogueStore.js';
import { ListingStore } from './services/catalogue/ListingStore.js';
import { FreshnessCoordinator } from './services/cache/FreshnessCoordinator.js';
import { FreshnessPolicy } from './services/cache/FreshnessPolicy.js';
import { UserRelationStore } from './services/users/UserRelationStore.js';
import { IdentityStore } from './services/users/IdentityStore.js';
import { CacheKey, EnsureFreshOptions, FreshnessResult } from './types/cache.js';
import { Crawler } from './types/crawler.js';
import { initializeLogger, logger } from './utils/logging.js';
import { getErrorMessage } from './utils/errorHandling.js';
import { Clock, systemClock } from './utils/timestamps.js';

export interface CatalogueCacheAppOptions {
  crawler: Crawler;
  /** Defaults to ConfigManager's configuration */
  config?: AppConfig;
  clock?: Clock;
  /** Schedule the daily garbage collection (default true) */
  enableGarbageCollection?: boolean;
  /** Database health check interval; 0 disables it (default 30s) */
  healthCheckIntervalMs?: number;
}

/**
 * Wires configuration, the database, the stores and the freshness
 * coordinator together. The HTTP layer that sits on top is not part of
 * this package; it gets the stores from here.
 */
export class CatalogueCacheApp {
  readonly config: AppConfig;
  readonly dbManager: DatabaseManager;
  readonly catalogue: CatalogueStore;
  readonly listings: ListingStore;
  readonly relations: UserRelationStore;
  readonly identity: IdentityStore;
  readonly coordinator: FreshnessCoordinator;
  readonly freshnessPolicy: FreshnessPolicy;
  private readonly garbageCollector: GarbageCollectionService;
  private readonly enableGarbageCollection: boolean;
  private readonly healthCheckIntervalMs: number;
  private started = false;

  constructor(options: CatalogueCacheAppOptions) {
    this.config = options.config ?? ConfigManager.getInstance().getConfig();
    const clock = options.clock ?? systemClock;

    this.dbManager = new DatabaseManager(this.config.database);
    this.catalogue = new CatalogueStore(this.dbManager, clock);
    this.listings = new ListingStore(this.dbManager, clock);
    this.relations = new UserRelationStore(this.dbManager, clock);
    this.identity = new IdentityStore(this.dbManager, clock);
    this.freshnessPolicy = new FreshnessPolicy(this.config.cache.maxAgeMs);
    this.coordinator = new FreshnessCoordinator(this.dbManager, {
      crawler: options.crawler,
      clock,
      crawlTimeoutMs: this.config.crawler.timeoutMs,
      retryPolicy: { maxAttempts: this.config.crawler.maxAttempts },
    });
    this.garbageCollector = new GarbageCollectionService(this.dbManager, {
      gcHour: this.config.maintenance.gcHour,
      tokenRetentionDays: this.config.maintenance.tokenRetentionDays,
      clock,
    });
    this.enableGarbageCollection = options.enableGarbageCollection ?? true;
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 30000;
  }

  public async start(): Promise<void> {
    if (this.started) {
      return;
    }

    try {
      // Connect to database
      await this.dbManager.connect();
      logger.info('Database connected successfully', { type: this.config.database.type });

      if (this.healthCheckIntervalMs > 0) {
        this.dbManager.startHealthCheck(this.healthCheckIntervalMs);
      }

      // Run migrations
      const migrationRunner = new MigrationRunner(this.dbManager.getConnection());
      await migrationRunner.migrate();
      logger.info('Database migrations completed');

      if (this.enableGarbageCollection) {
        this.garbageCollector.start();
      }

      this.started = true;
      logger.info('Catalogue cache started');
    } catch (error) {
      logger.error('Failed to start catalogue cache', { error: getErrorMessage(error) });
      throw error;
    }
  }

  public async stop(): Promise<void> {
    try {
      this.garbageCollector.stop();
      await this.dbManager.disconnect();
      this.started = false;
      logger.info('Catalogue cache stopped');
    } catch (error) {
      logger.error('Error during shutdown', { error: getErrorMessage(error) });
      throw error;
    }
  }

  /**
   * ensureFresh with the configured max age for the key's kind
   */
  public refresh(key: CacheKey, options?: EnsureFreshOptions): Promise<FreshnessResult> {
    return this.coordinator.ensureFresh(key, this.freshnessPolicy.maxAgeFor(key), options);
  }

  public getGarbageCollector(): GarbageCollectionService {
    return this.garbageCollector;
  }
}

/**
 * Build the app from ConfigManager with the logger configured
 */
export function createCatalogueCacheApp(
  crawler: Crawler,
  options: Omit<CatalogueCacheAppOptions, 'crawler' | 'config'> = {}
): CatalogueCacheApp {
  const configManager = ConfigManager.getInstance();
  configManager.validate();
  initializeLogger();
  return new CatalogueCacheApp({ ...options, crawler, config: configManager.getConfig() });
}
