import { DatabaseError, ErrorCode } from '../errors/index.js';

/** Source of "now"; injected so freshness decisions can be tested */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Timestamps are written as ISO-8601 UTC text. SQLite stores that text
 * as-is; PostgreSQL parses it into TIMESTAMPTZ.
 */
export function toDbTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Normalize a timestamp column to a Date (pg already returns one).
 */
export function toDate(value: string | Date): Date {
  const date = value instanceof Date ? value : new Date(value);
  if (isNaN(date.getTime())) {
    throw new DatabaseError(
      `Unparseable timestamp: ${String(value)}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      false,
      { service: 'timestamps', operation: 'toDate' }
    );
  }
  return date;
}

export function toNullableDate(value: string | Date | null): Date | null {
  return value === null ? null : toDate(value);
}
