import { InputValidationError } from '../errors/index.js';

/**
 * LIMIT and OFFSET values must be non-negative integers. SQLite reads a
 * negative LIMIT as unbounded where PostgreSQL rejects it.
 */
export function assertPageValue(field: 'limit' | 'offset', value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InputValidationError(field, value, `${field} must be a non-negative integer`);
  }
}
