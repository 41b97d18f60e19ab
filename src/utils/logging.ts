import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';

// Created with a default config first to avoid a circular dependency on
// ConfigManager; reconfigured by initializeLogger()
export const logger = winston.createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    // Console transport for early initialization logs
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Initialize logger with configuration from ConfigManager
 * Must be called after ConfigManager is fully initialized
 */
export function initializeLogger(): void {
  if (isInitialized) {
    return;
  }

  const config = ConfigManager.getInstance().getConfig();

  logger.level = config.logging.level;
  logger.silent = config.env === 'test';

  logger.clear();

  if (config.logging.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.logging.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: `${config.logging.file.maxSize}m`,
        maxFiles: `${config.logging.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.logging.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.logging.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: `${config.logging.file.maxSize}m`,
        maxFiles: `${config.logging.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.logging.file.path}/.audit-app.json`,
      })
    );
  }

  if (config.logging.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.logging.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  isInitialized = true;
  logger.info('Logger initialized with configuration');
}
