/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Retry/recovery strategy hints
 * - HTTP status code mapping for the API layer that consumes these errors
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors (4xx)
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',
  VALIDATION_REQUIRED_FIELD = 'VALIDATION_REQUIRED_FIELD',

  // Resource Errors (4xx)
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  // Authentication (4xx)
  AUTH_TOKEN_INVALID = 'AUTH_TOKEN_INVALID',
  AUTH_TOKEN_EXPIRED = 'AUTH_TOKEN_EXPIRED',
  AUTH_TOKEN_USED = 'AUTH_TOKEN_USED',

  // Database Errors (5xx - operational)
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  DATABASE_DUPLICATE_KEY = 'DATABASE_DUPLICATE_KEY',
  DATABASE_FOREIGN_KEY_VIOLATION = 'DATABASE_FOREIGN_KEY_VIOLATION',
  DATABASE_TRANSACTION_FAILED = 'DATABASE_TRANSACTION_FAILED',
  DATABASE_MIGRATION_FAILED = 'DATABASE_MIGRATION_FAILED',

  // File System Errors (5xx - operational)
  FS_PERMISSION_DENIED = 'FS_PERMISSION_DENIED',

  // Network Errors (5xx - operational, retryable)
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',

  // Crawler Errors (5xx - operational)
  CRAWL_FAILED = 'CRAWL_FAILED',

  // Configuration Errors (5xx - permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Generic fallback
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'upsertEpisode', 'ensureFresh') */
  operation?: string;

  /** Entity type being operated on (e.g., 'anime', 'episode') */
  entityType?: string;

  /** Entity key if applicable (slug, url, cache key, user id) */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Attempt number if retrying */
  attemptNumber?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * HTTP status code for API responses
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether this error is retryable
   */
  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  declare public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS (4xx - Client Error)
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, 400, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class InputValidationError extends ValidationError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid input for field '${field}'`,
      { ...context, metadata: { ...context?.metadata, field, value } }
    );
  }
}

// ============================================
// RESOURCE ERRORS (4xx - Client Error)
// ============================================

export class ResourceNotFoundError extends ApplicationError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `${resourceType} not found: ${resourceId}`,
      ErrorCode.RESOURCE_NOT_FOUND,
      404,
      {
        isOperational: true,
        retryable: false,
        context: { ...context, entityType: resourceType, entityId: resourceId },
      }
    );
  }
}

// ============================================
// VERIFICATION TOKEN ERRORS (4xx)
// ============================================

export class TokenError extends ApplicationError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext) {
    super(message, code, 400, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
    });
  }
}

export class TokenInvalidError extends TokenError {
  constructor(message = 'Invalid or expired token', context?: ErrorContext) {
    super(message, ErrorCode.AUTH_TOKEN_INVALID, context);
  }
}

export class TokenExpiredError extends TokenError {
  constructor(
    public readonly expiresAt: Date,
    context?: ErrorContext
  ) {
    super(
      `Token has expired at ${expiresAt.toISOString()}`,
      ErrorCode.AUTH_TOKEN_EXPIRED,
      { ...context, metadata: { ...context?.metadata, expiresAt: expiresAt.toISOString() } }
    );
  }
}

export class TokenAlreadyUsedError extends TokenError {
  constructor(context?: ErrorContext) {
    super('Token has already been used', ErrorCode.AUTH_TOKEN_USED, context);
  }
}

// ============================================
// OPERATIONAL ERRORS (5xx - Retryable)
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// Database Errors
export class DatabaseError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATABASE_QUERY_FAILED,
    retryable = true,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, 500, retryable, context, cause);
  }
}

/**
 * A natural key collided with a row that cannot be merged into
 * (e.g. an episode URL already owned by a different anime).
 */
export class DuplicateKeyError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly key: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Duplicate key in table '${table}': ${key}`,
      ErrorCode.DATABASE_DUPLICATE_KEY,
      false, // Don't retry duplicate keys
      { ...context, metadata: { ...context?.metadata, table, key } }
    );
  }
}

export class ForeignKeyViolationError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly constraint: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Foreign key violation in table '${table}': ${constraint}`,
      ErrorCode.DATABASE_FOREIGN_KEY_VIOLATION,
      false, // Don't retry foreign key violations
      { ...context, metadata: { ...context?.metadata, table, constraint } }
    );
  }
}

// File System Errors
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      500,
      retryable,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

// Network Errors
export class TimeoutError extends OperationalError {
  constructor(
    public readonly timeoutMs: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Operation timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      504,
      true, // Timeouts are retryable
      { ...context, durationMs: timeoutMs }
    );
  }
}

// Crawler Errors

/**
 * The crawler did not answer within the allotted time.
 * The cache ledger is left untouched.
 */
export class CrawlTimeoutError extends TimeoutError {
  constructor(
    public readonly cacheKey: string,
    timeoutMs: number,
    context?: ErrorContext
  ) {
    super(
      timeoutMs,
      `Crawl for '${cacheKey}' timed out after ${timeoutMs}ms`,
      { ...context, service: 'crawler', entityId: cacheKey }
    );
  }
}

/**
 * The crawler rejected. Retryable unless the underlying cause says otherwise.
 */
export class CrawlFailureError extends OperationalError {
  constructor(
    public readonly cacheKey: string,
    message?: string,
    cause?: Error,
    context?: ErrorContext
  ) {
    super(
      message || `Crawl for '${cacheKey}' failed${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.CRAWL_FAILED,
      502,
      cause instanceof ApplicationError ? cause.retryable : true,
      { ...context, service: 'crawler', entityId: cacheKey },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (5xx - Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: false, // These are programmer errors
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      500,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

export class MigrationError extends PermanentError {
  constructor(
    public readonly version: string,
    message: string,
    cause?: Error
  ) {
    super(
      message,
      ErrorCode.DATABASE_MIGRATION_FAILED,
      500,
      { service: 'MigrationRunner', metadata: { version } },
      cause
    );
  }
}
