import type { DatabaseConfig } from '../types/database.js';

export type { DatabaseConfig };

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    maxSize: number; // megabytes
    maxFiles: number; // days
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

/**
 * Default maximum age per cache-key namespace, in milliseconds.
 * Callers may always pass their own value to ensureFresh().
 */
export interface CacheConfig {
  maxAgeMs: {
    listing: number;
    anime: number;
    episodes: number;
    sources: number;
  };
}

export interface CrawlerConfig {
  timeoutMs: number;
  maxAttempts: number;
}

export interface MaintenanceConfig {
  gcHour: number; // 0-23, local time
  tokenRetentionDays: number;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  database: DatabaseConfig;
  logging: LoggingConfig;
  cache: CacheConfig;
  crawler: CrawlerConfig;
  maintenance: MaintenanceConfig;
}
