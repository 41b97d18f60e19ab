import { DatabaseManager } from './DatabaseManager.js';
import { MigrationRunner } from './MigrationRunner.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { initializeLogger, logger } from '../utils/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';

/**
 * Usage: migrate [up|down|status] [targetVersion]
 */
async function runMigrations(): Promise<void> {
  const [command = 'up', targetVersion] = process.argv.slice(2);

  const configManager = ConfigManager.getInstance();
  configManager.validate();
  initializeLogger();

  const dbConfig = configManager.getDatabaseConfig();
  logger.info('Starting database migration', {
    type: dbConfig.type,
    location: dbConfig.filename ?? `${dbConfig.host}:${dbConfig.port}/${dbConfig.database}`,
  });

  const dbManager = new DatabaseManager(dbConfig);

  try {
    await dbManager.connect();
    const migrationRunner = new MigrationRunner(dbManager.getConnection());

    if (command === 'down') {
      await migrationRunner.rollback(targetVersion);
      logger.info('Rollback completed');
    } else if (command === 'up') {
      await migrationRunner.migrate();
      logger.info('Migrations completed successfully');
    }

    const status = await migrationRunner.status();
    for (const migration of status) {
      logger.info(`${migration.executed ? 'applied' : 'pending'} ${migration.version} - ${migration.name}`);
    }
  } finally {
    await dbManager.disconnect();
  }
}

runMigrations().catch((error) => {
  logger.error('Migration failed', { error: getErrorMessage(error) });
  process.exitCode = 1;
});
