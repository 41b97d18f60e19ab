import crypto from 'crypto';
import { SqlExecutor } from '../../types/database.js';
import { UserRow, VerificationTokenRow } from '../../types/database-models.js';
import {
  CreateUserInput,
  TOKEN_TYPES,
  TokenType,
  UserRecord,
  VerificationTokenRecord,
} from '../../types/users.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ErrorCode,
  ForeignKeyViolationError,
  InputValidationError,
  TokenAlreadyUsedError,
} from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { Clock, systemClock, toDate, toDbTimestamp, toNullableDate } from '../../utils/timestamps.js';

const TOKEN_BYTES = 32;

function mapUserRow(row: UserRow): UserRecord {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    googleId: row.google_id,
    name: row.name,
    avatar: row.avatar,
    // SQLite hands back 0/1
    emailVerified: Boolean(row.email_verified),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function parseTokenType(value: string): TokenType {
  const tokenType = TOKEN_TYPES.find(type => type === value);
  if (!tokenType) {
    throw new DatabaseError(
      `Unknown token type in verification_tokens: ${value}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      false,
      { service: 'IdentityStore', operation: 'mapTokenRow' }
    );
  }
  return tokenType;
}

function mapTokenRow(row: VerificationTokenRow): VerificationTokenRecord {
  return {
    id: row.id,
    userId: row.user_id,
    token: row.token,
    tokenType: parseTokenType(row.token_type),
    expiresAt: toDate(row.expires_at),
    usedAt: toNullableDate(row.used_at),
    createdAt: toDate(row.created_at),
  };
}

/**
 * Identity & Verification Store
 *
 * Users plus their single-use email verification and password reset
 * tokens. Deleting a user removes its tokens and relation rows through the
 * schema's cascades. Password hashing happens upstream; only the hash is
 * stored here.
 */
export class IdentityStore {
  constructor(
    private readonly db: SqlExecutor,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @throws DuplicateKeyError keyed 'email' or 'google_id'
   */
  async createUser(input: CreateUserInput): Promise<UserRecord> {
    const now = toDbTimestamp(this.clock());

    try {
      const result = await this.db.execute(
        `INSERT INTO users (
           email, password_hash, google_id, name, avatar, email_verified, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          input.email,
          input.passwordHash ?? null,
          input.googleId ?? null,
          input.name ?? null,
          input.avatar ?? null,
          input.emailVerified ?? false,
          now,
          now,
        ]
      );

      const user = await this.getUserByEmail(input.email);
      if (!user) {
        throw new DatabaseError(
          `User ${input.email} missing after insert`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          { service: 'IdentityStore', operation: 'createUser', entityId: result.insertId }
        );
      }

      logger.info('User created', { userId: user.id, google: user.googleId !== null });
      return user;
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        // pg names the constraint (users_google_id_key), SQLite the column
        const key = error.key.includes('google_id') ? 'google_id' : 'email';
        throw new DuplicateKeyError('users', key, `A user with this ${key} already exists`, {
          service: 'IdentityStore',
          operation: 'createUser',
        });
      }
      logger.error('Failed to create user', { error: getErrorMessage(error) });
      throw error;
    }
  }

  async getUserById(id: number): Promise<UserRecord | null> {
    const row = await this.db.get<UserRow>('SELECT * FROM users WHERE id = ?', [id]);
    return row ? mapUserRow(row) : null;
  }

  async getUserByEmail(email: string): Promise<UserRecord | null> {
    const row = await this.db.get<UserRow>('SELECT * FROM users WHERE email = ?', [email]);
    return row ? mapUserRow(row) : null;
  }

  async getUserByGoogleId(googleId: string): Promise<UserRecord | null> {
    const row = await this.db.get<UserRow>('SELECT * FROM users WHERE google_id = ?', [googleId]);
    return row ? mapUserRow(row) : null;
  }

  async setEmailVerified(userId: number, verified = true): Promise<boolean> {
    const result = await this.db.execute(
      'UPDATE users SET email_verified = ?, updated_at = ? WHERE id = ?',
      [verified, toDbTimestamp(this.clock()), userId]
    );
    return result.affectedRows > 0;
  }

  async updatePasswordHash(userId: number, passwordHash: string): Promise<boolean> {
    const result = await this.db.execute(
      'UPDATE users SET password_hash = ?, updated_at = ? WHERE id = ?',
      [passwordHash, toDbTimestamp(this.clock()), userId]
    );
    return result.affectedRows > 0;
  }

  /**
   * Link a Google account to an existing (email) user
   */
  async linkGoogleAccount(userId: number, googleId: string): Promise<boolean> {
    try {
      const result = await this.db.execute(
        'UPDATE users SET google_id = ?, updated_at = ? WHERE id = ?',
        [googleId, toDbTimestamp(this.clock()), userId]
      );
      return result.affectedRows > 0;
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw new DuplicateKeyError('users', 'google_id', 'Google account is linked to another user', {
          service: 'IdentityStore',
          operation: 'linkGoogleAccount',
          entityId: userId,
        });
      }
      throw error;
    }
  }

  /**
   * Single statement; history, favorites, subscriptions and tokens go with it
   */
  async deleteUser(userId: number): Promise<boolean> {
    const result = await this.db.execute('DELETE FROM users WHERE id = ?', [userId]);
    if (result.affectedRows > 0) {
      logger.info('User deleted', { userId });
    }
    return result.affectedRows > 0;
  }

  // ============================================
  // VERIFICATION TOKENS
  // ============================================

  async createVerificationToken(
    userId: number,
    tokenType: TokenType,
    ttlMs: number
  ): Promise<VerificationTokenRecord> {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new InputValidationError('ttlMs', ttlMs, 'Token lifetime must be a positive number of milliseconds');
    }

    const now = this.clock();
    const token = crypto.randomBytes(TOKEN_BYTES).toString('hex');
    const expiresAt = new Date(now.getTime() + ttlMs);

    try {
      await this.db.execute(
        `INSERT INTO verification_tokens (user_id, token, token_type, expires_at, created_at)
         VALUES (?, ?, ?, ?, ?)`,
        [userId, token, tokenType, toDbTimestamp(expiresAt), toDbTimestamp(now)]
      );
    } catch (error) {
      if (error instanceof ForeignKeyViolationError) {
        throw new ForeignKeyViolationError(
          'verification_tokens',
          'fk_verification_tokens_user_id',
          `User ${userId} does not exist`,
          { service: 'IdentityStore', operation: 'createVerificationToken', entityId: userId }
        );
      }
      throw error;
    }

    const record = await this.findVerificationToken(token);
    if (!record) {
      throw new DatabaseError(
        `Verification token for user ${userId} missing after insert`,
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        { service: 'IdentityStore', operation: 'createVerificationToken', entityId: userId }
      );
    }

    logger.debug('Verification token created', { userId, tokenType, expiresAt: record.expiresAt });
    return record;
  }

  async findVerificationToken(token: string): Promise<VerificationTokenRecord | null> {
    const row = await this.db.get<VerificationTokenRow>(
      'SELECT * FROM verification_tokens WHERE token = ?',
      [token]
    );
    return row ? mapTokenRow(row) : null;
  }

  /**
   * Sets used_at exactly once. The guard lives in the UPDATE itself, so of
   * two concurrent consumers only one sees a changed row.
   *
   * @throws TokenAlreadyUsedError when the token is unknown or already spent
   */
  async markTokenUsed(token: string): Promise<Date> {
    const usedAt = this.clock();
    const result = await this.db.execute(
      'UPDATE verification_tokens SET used_at = ? WHERE token = ? AND used_at IS NULL',
      [toDbTimestamp(usedAt), token]
    );
    if (result.affectedRows === 0) {
      throw new TokenAlreadyUsedError({ service: 'IdentityStore', operation: 'markTokenUsed' });
    }
    return usedAt;
  }

  /**
   * Drop a user's unused tokens of one type, e.g. before resending a
   * verification mail
   */
  async deleteUnusedTokens(userId: number, tokenType: TokenType): Promise<number> {
    const result = await this.db.execute(
      'DELETE FROM verification_tokens WHERE user_id = ? AND token_type = ? AND used_at IS NULL',
      [userId, tokenType]
    );
    return result.affectedRows;
  }
}
