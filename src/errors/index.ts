/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors (4xx)
export {
  ValidationError,
  InputValidationError,
} from './ApplicationError.js';

// Resource errors (4xx)
export { ResourceNotFoundError } from './ApplicationError.js';

// Verification token errors (4xx)
export {
  TokenError,
  TokenInvalidError,
  TokenExpiredError,
  TokenAlreadyUsedError,
} from './ApplicationError.js';

// Operational errors (5xx - retryable)
export {
  OperationalError,
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  FileSystemError,
  TimeoutError,
  CrawlTimeoutError,
  CrawlFailureError,
} from './ApplicationError.js';

// Permanent errors (5xx - not retryable)
export {
  PermanentError,
  ConfigurationError,
  MigrationError,
} from './ApplicationError.js';

// Retry strategies
export {
  RetryStrategy,
  DEFAULT_RETRY_POLICY,
  CRAWL_RETRY_POLICY,
  createRetryStrategy,
} from './RetryStrategy.js';

export type {
  RetryPolicy,
  RetryResult,
} from './RetryStrategy.js';
