import dotenv from 'dotenv';
import { AppConfig, CacheConfig, CrawlerConfig, DatabaseConfig, MaintenanceConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    config.env = this.getEnum('NODE_ENV', config.env, ['development', 'production', 'test']);

    // Database configuration
    config.database.type = this.getEnum('DB_TYPE', config.database.type, ['sqlite3', 'postgres']);

    if (config.database.type === 'sqlite3') {
      config.database.filename = this.getString('DB_FILE', config.database.filename);
    } else {
      config.database.host = this.getString('DB_HOST', 'localhost');
      config.database.port = this.getNumber('DB_PORT', 5432);
      config.database.database = this.getString('DB_NAME', config.database.database);
      config.database.username = this.getString('DB_USER');
      config.database.password = this.getString('DB_PASSWORD');
      config.database.ssl = this.getBoolean('DB_SSL', false);
    }

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    // Freshness defaults per cache-key namespace
    const maxAge = config.cache.maxAgeMs;
    maxAge.listing = this.getNumber('CACHE_MAX_AGE_LISTING_MS', maxAge.listing);
    maxAge.anime = this.getNumber('CACHE_MAX_AGE_ANIME_MS', maxAge.anime);
    maxAge.episodes = this.getNumber('CACHE_MAX_AGE_EPISODES_MS', maxAge.episodes);
    maxAge.sources = this.getNumber('CACHE_MAX_AGE_SOURCES_MS', maxAge.sources);

    // Crawler
    config.crawler.timeoutMs = this.getNumber('CRAWL_TIMEOUT_MS', config.crawler.timeoutMs);
    config.crawler.maxAttempts = this.getNumber('CRAWL_MAX_ATTEMPTS', config.crawler.maxAttempts);

    // Maintenance
    config.maintenance.gcHour = this.getNumber('GC_HOUR', config.maintenance.gcHour);
    config.maintenance.tokenRetentionDays = this.getNumber(
      'TOKEN_RETENTION_DAYS',
      config.maintenance.tokenRetentionDays
    );

    return config;
  }

  private getString(key: string, defaultValue?: string): string {
    const value = process.env[key];
    if (value) {
      return value;
    }
    if (defaultValue === undefined || defaultValue === '') {
      throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
    }
    return defaultValue;
  }

  private getNumber(key: string, defaultValue?: number): number {
    const value = process.env[key];
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find((valid) => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  getCacheConfig(): CacheConfig {
    return this.config.cache;
  }

  getCrawlerConfig(): CrawlerConfig {
    return this.config.crawler;
  }

  getMaintenanceConfig(): MaintenanceConfig {
    return this.config.maintenance;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const errors: string[] = [];

    if (this.config.database.type === 'postgres') {
      if (!this.config.database.username) {
        errors.push('Database username is required for PostgreSQL');
      }
      if (!this.config.database.password) {
        errors.push('Database password is required for PostgreSQL');
      }
    }

    for (const [namespace, ms] of Object.entries(this.config.cache.maxAgeMs)) {
      if (ms < 0) {
        errors.push(`Cache max age for '${namespace}' must not be negative`);
      }
    }

    if (this.config.crawler.timeoutMs <= 0) {
      errors.push('Crawl timeout must be greater than zero');
    }
    if (this.config.crawler.maxAttempts < 1) {
      errors.push('Crawl attempts must be at least 1');
    }

    const { gcHour, tokenRetentionDays } = this.config.maintenance;
    if (gcHour < 0 || gcHour > 23) {
      errors.push('GC hour must be between 0 and 23');
    }
    if (tokenRetentionDays < 0) {
      errors.push('Token retention days must not be negative');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'config',
        `Configuration validation failed:\n${errors.join('\n')}`
      );
    }
  }
}
