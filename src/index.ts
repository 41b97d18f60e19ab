import { CatalogueCacheApp, createCatalogueCacheApp } from './app.js';
import { Crawler } from './types/crawler.js';
import { logger } from './utils/logging.js';
import { getErrorMessage } from './utils/errorHandling.js';

export { CatalogueCacheApp, createCatalogueCacheApp } from './app.js';
export type { CatalogueCacheAppOptions } from './app.js';
export { ConfigManager } from './config/ConfigManager.js';
export type { AppConfig } from './config/types.js';
export { DatabaseManager } from './database/DatabaseManager.js';
export { MigrationRunner } from './database/MigrationRunner.js';
export { CatalogueStore } from './services/catalogue/CatalogueStore.js';
export { ListingStore } from './services/catalogue/ListingStore.js';
export { CacheLedger } from './services/cache/CacheLedger.js';
export { cacheKeys, parseCacheKey, serializeCacheKey } from './services/cache/cacheKeys.js';
export { FreshnessCoordinator } from './services/cache/FreshnessCoordinator.js';
export { FreshnessPolicy, isStale } from './services/cache/FreshnessPolicy.js';
export { UserRelationStore } from './services/users/UserRelationStore.js';
export { IdentityStore } from './services/users/IdentityStore.js';
export { consumeVerificationToken } from './services/users/tokenVerification.js';
export { GarbageCollectionService } from './services/garbageCollectionService.js';
export * from './errors/index.js';
export type * from './types/catalogue.js';
export type * from './types/cache.js';
export type * from './types/crawler.js';
export type * from './types/users.js';

/**
 * Start the catalogue cache with `crawler` and stop it cleanly on
 * SIGTERM/SIGINT. For hosts that own no lifecycle of their own.
 */
export async function runCatalogueCache(crawler: Crawler): Promise<CatalogueCacheApp> {
  const app = createCatalogueCacheApp(crawler);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal} signal, shutting down gracefully`);
    app
      .stop()
      .then(() => {
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Failed to shut down gracefully', { error: getErrorMessage(error) });
        process.exit(1);
      });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
      reason: reason instanceof Error ? {
        name: reason.name,
        message: reason.message,
        stack: reason.stack,
      } : reason,
    });
  });

  await app.start();
  return app;
}
