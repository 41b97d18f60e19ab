import {
  DatabaseConfig,
  DatabaseConnection,
  DatabaseType,
  ExecuteResult,
  SqlExecutor,
  SqlParam,
  SqlRow,
} from '../types/database.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { PostgresConnection } from './connections/PostgresConnection.js';
import { logger } from '../utils/logging.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { getErrorMessage, toError } from '../utils/errorHandling.js';

/**
 * Executor handed to transaction callbacks. Statements go straight to the
 * connection that holds the open transaction.
 */
class TransactionScope implements SqlExecutor {
  readonly dialect: DatabaseType;

  constructor(private readonly connection: DatabaseConnection) {
    this.dialect = connection.dialect;
  }

  query<T = SqlRow>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.connection.query<T>(sql, params);
  }

  get<T = SqlRow>(sql: string, params?: SqlParam[]): Promise<T | undefined> {
    return this.connection.get<T>(sql, params);
  }

  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult> {
    return this.connection.execute(sql, params);
  }

  transaction<T>(callback: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return callback(this);
  }
}

/**
 * Owns the driver connection.
 *
 * Statements issued through the manager are serialized; a transaction holds
 * the queue from BEGIN to COMMIT/ROLLBACK so nothing else lands inside it.
 * Code running inside a transaction callback must use the scope it was given,
 * never the manager, or it waits on itself.
 */
export class DatabaseManager implements SqlExecutor {
  private connection: DatabaseConnection | null = null;
  private config: DatabaseConfig;
  private queue: Promise<void> = Promise.resolve();
  private reconnecting: boolean = false;
  private reconnectAttempts: number = 0;
  private readonly MAX_RECONNECT_ATTEMPTS = 5;
  private readonly RECONNECT_DELAY_MS = 1000;
  private healthCheckInterval: NodeJS.Timeout | null = null;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  get dialect(): DatabaseType {
    return this.config.type;
  }

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const connection = this.createConnection();
    await connection.connect?.();
    this.connection = connection;
  }

  private createConnection(): DatabaseConnection {
    switch (this.config.type) {
      case 'sqlite3':
        return new SqliteConnection(this.config);
      case 'postgres':
        return new PostgresConnection(this.config);
      default:
        throw new DatabaseError(
          `Unsupported database type: ${String(this.config.type)}`,
          ErrorCode.DATABASE_CONNECTION_FAILED,
          false,
          {
            service: 'DatabaseManager',
            operation: 'connect',
            metadata: { requestedType: this.config.type },
          }
        );
    }
  }

  async disconnect(): Promise<void> {
    if (this.healthCheckInterval) {
      clearInterval(this.healthCheckInterval);
      this.healthCheckInterval = null;
    }

    if (this.connection) {
      // Let queued work drain first
      await this.queue;
      await this.connection.close();
      this.connection = null;
    }
  }

  /**
   * Start periodic health checks
   * Validates connection and attempts reconnection if needed
   */
  startHealthCheck(intervalMs: number = 30000): void {
    if (this.healthCheckInterval) {
      return;
    }

    this.healthCheckInterval = setInterval(() => {
      this.runHealthCheck().catch((error) => {
        logger.error('Database health check crashed', { error: getErrorMessage(error) });
      });
    }, intervalMs);

    // Prevent interval from blocking process exit
    this.healthCheckInterval.unref();

    logger.info('Database health check started', { intervalMs });
  }

  private async runHealthCheck(): Promise<void> {
    const isValid = await this.validateConnection();
    if (!isValid) {
      logger.error('Database health check failed');
      await this.reconnect();
    }
  }

  /**
   * Validate database connection by running a simple query
   */
  async validateConnection(): Promise<boolean> {
    if (!this.connection) {
      return false;
    }

    try {
      await this.connection.query('SELECT 1 as ping', []);
      return true;
    } catch (error) {
      logger.warn('Database connection validation failed', {
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  /**
   * Attempt to reconnect to database with exponential backoff
   */
  private async reconnect(): Promise<void> {
    if (this.reconnecting) {
      return;
    }

    if (this.reconnectAttempts >= this.MAX_RECONNECT_ATTEMPTS) {
      logger.error('Max reconnection attempts reached', {
        attempts: this.reconnectAttempts,
      });
      return;
    }

    this.reconnecting = true;
    this.reconnectAttempts++;

    try {
      logger.info('Attempting database reconnection', {
        attempt: this.reconnectAttempts,
        maxAttempts: this.MAX_RECONNECT_ATTEMPTS,
      });

      if (this.connection) {
        try {
          await this.connection.close();
        } catch (error) {
          logger.debug('Closing stale connection failed', { error: getErrorMessage(error) });
        }
        this.connection = null;
      }

      const delay = this.RECONNECT_DELAY_MS * Math.pow(2, this.reconnectAttempts - 1);
      await new Promise(resolve => setTimeout(resolve, delay));

      await this.connect();

      const isValid = await this.validateConnection();
      if (isValid) {
        logger.info('Database reconnection successful', {
          attempt: this.reconnectAttempts,
        });
        this.reconnectAttempts = 0;
      } else {
        throw new DatabaseError(
          'Connection validation failed after reconnect',
          ErrorCode.DATABASE_CONNECTION_FAILED,
          true,
          {
            service: 'DatabaseManager',
            operation: 'reconnect',
            metadata: { attempt: this.reconnectAttempts },
          }
        );
      }
    } catch (error) {
      logger.error('Database reconnection failed', {
        attempt: this.reconnectAttempts,
        error: getErrorMessage(error),
      });

      if (this.reconnectAttempts < this.MAX_RECONNECT_ATTEMPTS) {
        setTimeout(() => {
          this.reconnect().catch((retryError) => {
            logger.error('Database reconnection retry crashed', {
              error: getErrorMessage(retryError),
            });
          });
        }, 1000);
      }
    } finally {
      this.reconnecting = false;
    }
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new DatabaseError(
        'Database not connected. Call connect() first.',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        {
          service: 'DatabaseManager',
          operation: 'getConnection',
        }
      );
    }
    return this.connection;
  }

  /**
   * Run `task` once everything queued before it has settled.
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  query<T = SqlRow>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.enqueue(() => this.getConnection().query<T>(sql, params));
  }

  get<T = SqlRow>(sql: string, params?: SqlParam[]): Promise<T | undefined> {
    return this.enqueue(() => this.getConnection().get<T>(sql, params));
  }

  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult> {
    return this.enqueue(() => this.getConnection().execute(sql, params));
  }

  transaction<T>(callback: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return this.enqueue(async () => {
      const connection = this.getConnection();
      await connection.beginTransaction();

      try {
        const result = await callback(new TransactionScope(connection));
        await connection.commit();
        return result;
      } catch (error) {
        try {
          await connection.rollback();
        } catch (rollbackError) {
          logger.error('Transaction rollback failed', {
            error: getErrorMessage(rollbackError),
            cause: getErrorMessage(error),
          });
          throw new DatabaseError(
            `Transaction rollback failed: ${getErrorMessage(rollbackError)}`,
            ErrorCode.DATABASE_TRANSACTION_FAILED,
            false,
            { service: 'DatabaseManager', operation: 'transaction' },
            toError(error)
          );
        }
        throw error;
      }
    });
  }

  getDatabaseType(): DatabaseType {
    return this.config.type;
  }

  isConnected(): boolean {
    return this.connection !== null;
  }
}
