import { DatabaseConnection, MigrationInterface } from '../types/database.js';
import { CatalogueSchemaMigration } from './migrations/20241227_001_catalogue_schema.js';
import { logger } from '../utils/logging.js';
import { MigrationError } from '../errors/index.js';
import { getErrorMessage, toError } from '../utils/errorHandling.js';

interface MigrationRecord {
  version: string;
}

export interface MigrationStatus {
  version: string;
  name: string;
  executed: boolean;
}

/**
 * Applies versioned migrations in order, each in its own transaction,
 * and records them in the `migrations` table.
 */
export class MigrationRunner {
  private db: DatabaseConnection;
  private migrations: MigrationInterface[];

  constructor(db: DatabaseConnection, migrations: MigrationInterface[] = [CatalogueSchemaMigration]) {
    this.db = db;
    this.migrations = [...migrations].sort((a, b) => a.version.localeCompare(b.version));
  }

  async ensureMigrationTable(): Promise<void> {
    const timestampType = this.db.dialect === 'postgres' ? 'TIMESTAMPTZ' : 'DATETIME';
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS migrations (
        version VARCHAR(255) PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        executed_at ${timestampType} NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async getExecutedMigrations(): Promise<string[]> {
    const results = await this.db.query<MigrationRecord>(
      'SELECT version FROM migrations ORDER BY version'
    );
    return results.map(row => row.version);
  }

  async migrate(): Promise<void> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    for (const migration of this.migrations) {
      if (executedMigrations.includes(migration.version)) {
        continue;
      }

      logger.info(`Running migration: ${migration.version} - ${migration.migrationName}`);

      try {
        await this.db.beginTransaction();
        await migration.up(this.db);
        await this.db.execute('INSERT INTO migrations (version, name) VALUES (?, ?)', [
          migration.version,
          migration.migrationName,
        ]);
        await this.db.commit();

        logger.info(`Migration completed: ${migration.version}`);
      } catch (error) {
        await this.db.rollback();
        throw new MigrationError(
          migration.version,
          `Migration failed: ${migration.version} - ${getErrorMessage(error)}`,
          toError(error)
        );
      }
    }
  }

  async rollback(targetVersion?: string): Promise<void> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    const migrationsToRollback = this.migrations
      .filter(migration => executedMigrations.includes(migration.version))
      .reverse();

    for (const migration of migrationsToRollback) {
      if (targetVersion && migration.version <= targetVersion) {
        break;
      }

      logger.info(`Rolling back migration: ${migration.version} - ${migration.migrationName}`);

      try {
        await this.db.beginTransaction();
        await migration.down(this.db);
        await this.db.execute('DELETE FROM migrations WHERE version = ?', [migration.version]);
        await this.db.commit();

        logger.info(`Rollback completed: ${migration.version}`);
      } catch (error) {
        await this.db.rollback();
        throw new MigrationError(
          migration.version,
          `Rollback failed: ${migration.version} - ${getErrorMessage(error)}`,
          toError(error)
        );
      }
    }
  }

  async status(): Promise<MigrationStatus[]> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    return this.migrations.map(migration => ({
      version: migration.version,
      name: migration.migrationName,
      executed: executedMigrations.includes(migration.version),
    }));
  }
}
