import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import {
  DatabaseConfig,
  DatabaseConnection,
  ExecuteResult,
  SqlParam,
  SqlRow,
} from '../../types/database.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  FileSystemError,
  ErrorCode,
} from '../../errors/index.js';

const IN_MEMORY = ':memory:';

export class SqliteConnection implements DatabaseConnection {
  readonly dialect = 'sqlite3' as const;
  private db: sqlite3.Database | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    const dbPath = this.config.filename || './data/catalogue.sqlite';

    if (dbPath !== IN_MEMORY) {
      const dir = path.dirname(dbPath);
      try {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      } catch (err) {
        throw new FileSystemError(
          `Failed to create database directory: ${dir}`,
          ErrorCode.FS_PERMISSION_DENIED,
          dir,
          false,
          { service: 'SqliteConnection', operation: 'connect' },
          err instanceof Error ? err : undefined
        );
      }
    }

    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(dbPath, err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to connect to SQLite database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            true,
            {
              service: 'SqliteConnection',
              operation: 'connect',
              metadata: { dbPath },
            },
            err
          ));
        } else {
          resolve(handle);
        }
      });
    });

    this.db = db;
    // Cascades on episodes and user relations depend on this
    await this.execute('PRAGMA foreign_keys = ON');
  }

  async query<T = SqlRow>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all(sql, params, (err, rows) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows as T[]);
        }
      });
    });
  }

  async get<T = SqlRow>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb('get');

    return new Promise((resolve, reject) => {
      db.get(sql, params, (err, row) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row as T | undefined);
        }
      });
    });
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const db = this.requireDb('execute');

    return new Promise((resolve, reject) => {
      // Store reference to class instance for error conversion
      const self = this;
      db.run(sql, params, function (err) {
        if (err) {
          reject(self.convertDatabaseError(err, sql, 'execute'));
        } else {
          // 'this' refers to the statement context, providing changes and lastID
          resolve({
            affectedRows: this.changes,
            insertId: this.lastID,
          });
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close(err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to close database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            false,
            { service: 'SqliteConnection', operation: 'close' },
            err
          ));
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  async beginTransaction(): Promise<void> {
    await this.execute('BEGIN TRANSACTION');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  private requireDb(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  /**
   * Convert SQLite errors to ApplicationError types
   */
  private convertDatabaseError(
    error: Error,
    sql: string,
    operation: string
  ): Error {
    const errorMessage = error.message.toLowerCase();
    const context = {
      service: 'SqliteConnection',
      operation,
      metadata: { sql, sqliteError: error.message },
    };

    // "UNIQUE constraint failed: episodes.url"
    if (errorMessage.includes('unique constraint')) {
      const match = error.message.match(/unique constraint failed: (\w+)\.(\w+)/i);
      return new DuplicateKeyError(
        match?.[1] ?? 'unknown',
        match?.[2] ?? 'unknown',
        error.message,
        context
      );
    }

    if (errorMessage.includes('foreign key constraint')) {
      return new ForeignKeyViolationError(
        'unknown', // SQLite doesn't name the table
        'foreign_key',
        error.message,
        context
      );
    }

    return new DatabaseError(
      `Database ${operation} failed: ${error.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      true,
      context,
      error
    );
  }
}
