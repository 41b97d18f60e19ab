import { ConfigManager } from '../../src/config/ConfigManager.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('ConfigManager', () => {
  const originalEnv = process.env;
  let manager: ConfigManager;

  beforeEach(() => {
    process.env = { ...originalEnv, NODE_ENV: 'test' };
    manager = ConfigManager.getInstance();
  });

  afterEach(() => {
    process.env = originalEnv;
    manager.reload();
  });

  it('should fall back to the defaults', () => {
    manager.reload();

    expect(manager.getCacheConfig().maxAgeMs).toEqual({
      listing: 3600000,
      anime: 3600000,
      episodes: 3600000,
      sources: 3600000,
    });
    expect(manager.getCrawlerConfig()).toEqual({ timeoutMs: 30000, maxAttempts: 2 });
    expect(manager.getMaintenanceConfig()).toEqual({ gcHour: 3, tokenRetentionDays: 7 });
    expect(manager.getConfig().env).toBe('test');
  });

  it('should read cache, crawler and maintenance settings from the environment', () => {
    process.env.CACHE_MAX_AGE_ANIME_MS = '300000';
    process.env.CACHE_MAX_AGE_SOURCES_MS = '60000';
    process.env.CRAWL_TIMEOUT_MS = '5000';
    process.env.CRAWL_MAX_ATTEMPTS = '4';
    process.env.GC_HOUR = '22';
    process.env.TOKEN_RETENTION_DAYS = '30';

    manager.reload();

    expect(manager.getCacheConfig().maxAgeMs.anime).toBe(300000);
    expect(manager.getCacheConfig().maxAgeMs.sources).toBe(60000);
    expect(manager.getCacheConfig().maxAgeMs.listing).toBe(3600000);
    expect(manager.getCrawlerConfig()).toEqual({ timeoutMs: 5000, maxAttempts: 4 });
    expect(manager.getMaintenanceConfig()).toEqual({ gcHour: 22, tokenRetentionDays: 30 });
  });

  it('should read PostgreSQL settings', () => {
    process.env.DB_TYPE = 'postgres';
    process.env.DB_HOST = 'db.internal';
    process.env.DB_NAME = 'catalogue_test';
    process.env.DB_USER = 'catalogue';
    process.env.DB_PASSWORD = 'test-secret';
    process.env.DB_SSL = 'true';

    manager.reload();

    expect(manager.getDatabaseConfig()).toMatchObject({
      type: 'postgres',
      host: 'db.internal',
      port: 5432,
      database: 'catalogue_test',
      username: 'catalogue',
      password: 'test-secret',
      ssl: true,
    });
    expect(() => manager.validate()).not.toThrow();
  });

  it('should reject values that do not parse', () => {
    process.env.CRAWL_TIMEOUT_MS = 'soon';
    expect(() => manager.reload()).toThrow('Environment variable CRAWL_TIMEOUT_MS must be a valid number');

    process.env.CRAWL_TIMEOUT_MS = '1000';
    process.env.DB_TYPE = 'mysql';
    expect(() => manager.reload()).toThrow(ConfigurationError);
  });

  it('should list every invalid setting on validate', () => {
    process.env.CACHE_MAX_AGE_EPISODES_MS = '-1';
    process.env.CRAWL_MAX_ATTEMPTS = '0';
    process.env.GC_HOUR = '24';
    manager.reload();

    expect(() => manager.validate()).toThrow(
      'Configuration validation failed:\n' +
        "Cache max age for 'episodes' must not be negative\n" +
        'Crawl attempts must be at least 1\n' +
        'GC hour must be between 0 and 23'
    );
  });
});
