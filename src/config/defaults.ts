import { AppConfig } from './types.js';

const ONE_HOUR_MS = 60 * 60 * 1000;

export const defaultConfig: AppConfig = {
  env: 'development',
  database: {
    type: 'sqlite3',
    database: 'catalogue',
    filename: './data/catalogue.sqlite',
    pool: {
      min: 2,
      max: 10,
    },
  },
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: './logs',
      maxSize: 10,
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  cache: {
    maxAgeMs: {
      listing: ONE_HOUR_MS,
      anime: ONE_HOUR_MS,
      episodes: ONE_HOUR_MS,
      sources: ONE_HOUR_MS,
    },
  },
  crawler: {
    timeoutMs: 30000, // 30 seconds
    maxAttempts: 2,
  },
  maintenance: {
    gcHour: 3, // 3 AM
    tokenRetentionDays: 7,
  },
};
