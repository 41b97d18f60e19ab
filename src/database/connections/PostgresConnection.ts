import { Pool, PoolClient, QueryResult } from 'pg';
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
  ErrorCode,
} from '../../errors/index.js';
import { toError } from '../../utils/errorHandling.js';

interface PgErrorFields {
  code?: string;
  table?: string;
  constraint?: string;
}

function pgErrorFields(error: unknown): PgErrorFields {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  const fields: PgErrorFields = {};
  if ('code' in error && typeof error.code === 'string') fields.code = error.code;
  if ('table' in error && typeof error.table === 'string') fields.table = error.table;
  if ('constraint' in error && typeof error.constraint === 'string') {
    fields.constraint = error.constraint;
  }
  return fields;
}

/**
 * Rewrite `?` placeholders to PostgreSQL's `$1, $2, ...`.
 * Question marks inside quoted strings or identifiers are left alone.
 */
export function toPostgresPlaceholders(sql: string): string {
  let out = '';
  let index = 0;
  let quote: "'" | '"' | null = null;

  for (const ch of sql) {
    if (quote) {
      out += ch;
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      out += ch;
    } else if (ch === '?') {
      index++;
      out += `$${index}`;
    } else {
      out += ch;
    }
  }

  return out;
}

export class PostgresConnection implements DatabaseConnection {
  readonly dialect = 'postgres' as const;
  private pool: Pool | null = null;
  private client: PoolClient | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    this.pool = new Pool({
      host: this.config.host || 'localhost',
      port: this.config.port || 5432,
      database: this.config.database,
      user: this.config.username,
      password: this.config.password,
      ssl: this.config.ssl || false,
      min: this.config.pool?.min || 2,
      max: this.config.pool?.max || 10,
    });

    // Test connection
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw new DatabaseError(
        `Failed to connect to PostgreSQL database: ${toError(error).message}`,
        ErrorCode.DATABASE_CONNECTION_FAILED,
        true,
        {
          service: 'PostgresConnection',
          operation: 'connect',
          metadata: {
            host: this.config.host,
            database: this.config.database,
          },
        },
        toError(error)
      );
    }
  }

  async query<T = SqlRow>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const result = await this.run(sql, params, 'query');
    return result.rows as T[];
  }

  async get<T = SqlRow>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const result = await this.run(sql, params, 'get');
    return result.rows[0] as T | undefined;
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const result = await this.run(sql, params, 'execute');
    const first: unknown = result.rows[0];
    const id =
      typeof first === 'object' && first !== null && 'id' in first && typeof first.id === 'number'
        ? first.id
        : undefined;
    return {
      affectedRows: result.rowCount ?? 0,
      ...(id !== undefined && { insertId: id }),
    };
  }

  async close(): Promise<void> {
    if (this.client) {
      this.client.release();
      this.client = null;
    }
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  async beginTransaction(): Promise<void> {
    const pool = this.requirePool('beginTransaction');

    if (this.client) {
      throw new DatabaseError(
        'Transaction already in progress',
        ErrorCode.DATABASE_TRANSACTION_FAILED,
        false,
        { service: 'PostgresConnection', operation: 'beginTransaction' }
      );
    }

    const client = await pool.connect();
    try {
      await client.query('BEGIN');
    } catch (error) {
      client.release();
      throw this.convertDatabaseError(error, 'BEGIN', 'beginTransaction');
    }
    this.client = client;
  }

  async commit(): Promise<void> {
    await this.endTransaction('COMMIT', 'commit');
  }

  async rollback(): Promise<void> {
    await this.endTransaction('ROLLBACK', 'rollback');
  }

  private async endTransaction(statement: string, operation: string): Promise<void> {
    const client = this.client;
    if (!client) {
      throw new DatabaseError(
        'No transaction in progress',
        ErrorCode.DATABASE_TRANSACTION_FAILED,
        false,
        { service: 'PostgresConnection', operation }
      );
    }

    try {
      await client.query(statement);
    } finally {
      client.release();
      this.client = null;
    }
  }

  /**
   * Statements issued while a transaction is open go through its client,
   * otherwise through the pool.
   */
  private async run(sql: string, params: SqlParam[], operation: string): Promise<QueryResult> {
    const pool = this.requirePool(operation);
    const text = toPostgresPlaceholders(sql);
    try {
      if (this.client) {
        return await this.client.query(text, params);
      }
      return await pool.query(text, params);
    } catch (error) {
      throw this.convertDatabaseError(error, sql, operation);
    }
  }

  private requirePool(operation: string): Pool {
    if (!this.pool) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'PostgresConnection', operation }
      );
    }
    return this.pool;
  }

  /**
   * Convert PostgreSQL errors to ApplicationError types
   * PostgreSQL error codes: https://www.postgresql.org/docs/current/errcodes-appendix.html
   */
  private convertDatabaseError(
    raw: unknown,
    sql: string,
    operation: string
  ): Error {
    const error = toError(raw);
    const pgError = pgErrorFields(raw);
    const context = {
      service: 'PostgresConnection',
      operation,
      metadata: {
        sql,
        pgError: error.message,
        pgCode: pgError.code,
      },
    };

    switch (pgError.code) {
      case '23505': // unique_violation
        return new DuplicateKeyError(
          pgError.table || 'unknown',
          pgError.constraint || 'unknown',
          error.message,
          context
        );

      case '23503': // foreign_key_violation
        return new ForeignKeyViolationError(
          pgError.table || 'unknown',
          pgError.constraint || 'unknown',
          error.message,
          context
        );

      case '23502': // not_null_violation
      case '23514': // check_violation
      case '23P01': // exclusion_violation
        return new DatabaseError(
          `Constraint violation: ${error.message}`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          context,
          error
        );

      case '40001': // serialization_failure
      case '40P01': // deadlock_detected
        return new DatabaseError(
          `Transaction conflict: ${error.message}`,
          ErrorCode.DATABASE_TRANSACTION_FAILED,
          true,
          context,
          error
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
