export type DatabaseType = 'sqlite3' | 'postgres';

/**
 * Valid SQL parameter types
 * Includes undefined for optional parameters
 */
export type SqlParam = string | number | boolean | null | undefined | Buffer;

export type SqlRow = Record<string, unknown>;

export interface DatabaseConfig {
  type: DatabaseType;
  host?: string;
  port?: number;
  database: string;
  username?: string;
  password?: string;
  filename?: string; // For SQLite
  ssl?: boolean;
  pool?: {
    min: number;
    max: number;
  };
}

export interface ExecuteResult {
  affectedRows: number;
  insertId?: number;
}

/**
 * Connection contract shared by every driver.
 *
 * SQL is written with `?` placeholders; drivers that need another
 * placeholder style rewrite it before sending.
 */
export interface DatabaseConnection {
  readonly dialect: DatabaseType;
  connect?(): Promise<void>;
  query<T = SqlRow>(sql: string, params?: SqlParam[]): Promise<T[]>;
  get<T = SqlRow>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
  close(): Promise<void>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * What stores run their SQL against: the DatabaseManager itself, or the
 * scope handed to a transaction callback. Calling `transaction()` on a
 * scope joins the enclosing transaction instead of opening a new one.
 */
export interface SqlExecutor {
  readonly dialect: DatabaseType;
  query<T = SqlRow>(sql: string, params?: SqlParam[]): Promise<T[]>;
  get<T = SqlRow>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
  transaction<T>(callback: (tx: SqlExecutor) => Promise<T>): Promise<T>;
}

export interface MigrationInterface {
  version: string;
  migrationName: string;
  up(db: DatabaseConnection): Promise<void>;
  down(db: DatabaseConnection): Promise<void>;
}
