import { TestDatabase, createTestDatabase, ManualClock, HOUR } from '../../utils/testDatabase.js';
import { IdentityStore } from '../../../src/services/users/IdentityStore.js';
import { consumeVerificationToken } from '../../../src/services/users/tokenVerification.js';
import {
  ErrorCode,
  ResourceNotFoundError,
  TokenAlreadyUsedError,
  TokenExpiredError,
  TokenInvalidError,
} from '../../../src/errors/index.js';

describe('consumeVerificationToken', () => {
  let testDb: TestDatabase;
  let clock: ManualClock;
  let store: IdentityStore;
  let userId: number;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    clock = new ManualClock('2024-06-01T12:00:00.000Z');
    store = new IdentityStore(testDb.db, clock.now);
    userId = (await store.createUser({ email: 'alice@example.test' })).id;
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  it('should consume a valid token and return it with usedAt set', async () => {
    const created = await store.createVerificationToken(userId, 'email_verification', HOUR);
    clock.advance(HOUR / 4);

    const consumed = await consumeVerificationToken(store, created.token, 'email_verification', clock.now);

    expect(consumed.userId).toBe(userId);
    expect(consumed.usedAt?.toISOString()).toBe('2024-06-01T12:15:00.000Z');
  });

  it('should reject an unknown token', async () => {
    await expect(
      consumeVerificationToken(store, 'missing-token', 'email_verification', clock.now)
    ).rejects.toBeInstanceOf(ResourceNotFoundError);
  });

  it('should reject a token of the other type without spending it', async () => {
    const created = await store.createVerificationToken(userId, 'password_reset', HOUR);

    const attempt = consumeVerificationToken(store, created.token, 'email_verification', clock.now);

    await expect(attempt).rejects.toBeInstanceOf(TokenInvalidError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.AUTH_TOKEN_INVALID });
    expect((await store.findVerificationToken(created.token))?.usedAt).toBeNull();
  });

  it('should reject an expired token', async () => {
    const created = await store.createVerificationToken(userId, 'password_reset', HOUR);
    clock.advance(HOUR + 1);

    const attempt = consumeVerificationToken(store, created.token, 'password_reset', clock.now);

    await expect(attempt).rejects.toBeInstanceOf(TokenExpiredError);
    await expect(attempt).rejects.toThrow('Token has expired at 2024-06-01T13:00:00.000Z');
  });

  it('should still accept a token at the exact expiry instant', async () => {
    const created = await store.createVerificationToken(userId, 'password_reset', HOUR);
    clock.advance(HOUR);

    const consumed = await consumeVerificationToken(store, created.token, 'password_reset', clock.now);

    expect(consumed.usedAt?.toISOString()).toBe('2024-06-01T13:00:00.000Z');
  });

  it('should reject a token that was already used', async () => {
    const created = await store.createVerificationToken(userId, 'email_verification', HOUR);
    await consumeVerificationToken(store, created.token, 'email_verification', clock.now);

    await expect(
      consumeVerificationToken(store, created.token, 'email_verification', clock.now)
    ).rejects.toBeInstanceOf(TokenAlreadyUsedError);
  });

  it('should report expiry before prior use', async () => {
    const created = await store.createVerificationToken(userId, 'email_verification', HOUR);
    await store.markTokenUsed(created.token);
    clock.advance(2 * HOUR);

    await expect(
      consumeVerificationToken(store, created.token, 'email_verification', clock.now)
    ).rejects.toBeInstanceOf(TokenExpiredError);
  });
});
