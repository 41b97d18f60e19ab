import { TokenType, VerificationTokenRecord } from '../../types/users.js';
import {
  ResourceNotFoundError,
  TokenAlreadyUsedError,
  TokenExpiredError,
  TokenInvalidError,
} from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { Clock, systemClock } from '../../utils/timestamps.js';
import { IdentityStore } from './IdentityStore.js';

/**
 * Check a token presented by a user and spend it.
 *
 * Order of checks: existence, type, expiry, prior use. Only a token that
 * passes all four is marked used; the mark itself is race-safe, so a second
 * concurrent consumer still gets TokenAlreadyUsedError.
 *
 * @returns the token as it was before consumption, with usedAt filled in
 * @throws ResourceNotFoundError for an unknown token
 * @throws TokenInvalidError when the token is of another type
 * @throws TokenExpiredError
 * @throws TokenAlreadyUsedError
 */
export async function consumeVerificationToken(
  store: IdentityStore,
  token: string,
  expectedType: TokenType,
  clock: Clock = systemClock
): Promise<VerificationTokenRecord> {
  const context = { service: 'tokenVerification', operation: 'consumeVerificationToken' };

  const record = await store.findVerificationToken(token);
  if (!record) {
    throw new ResourceNotFoundError('verification_token', 'unknown', 'Verification token not found', context);
  }

  if (record.tokenType !== expectedType) {
    logger.warn('Token presented for the wrong purpose', {
      userId: record.userId,
      tokenType: record.tokenType,
      expectedType,
    });
    throw new TokenInvalidError(`Token is not a ${expectedType} token`, context);
  }

  if (record.expiresAt.getTime() < clock().getTime()) {
    throw new TokenExpiredError(record.expiresAt, context);
  }

  if (record.usedAt) {
    throw new TokenAlreadyUsedError(context);
  }

  const usedAt = await store.markTokenUsed(token);
  logger.info('Verification token consumed', { userId: record.userId, tokenType: record.tokenType });

  return { ...record, usedAt };
}
