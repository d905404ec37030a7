import { describe, it, expect, beforeEach } from 'vitest';
import { RegisterUserUseCase } from './RegisterUserUseCase';
import { AuthenticateUserUseCase } from './AuthenticateUserUseCase';
import { LogoutUseCase } from './LogoutUseCase';
import { InMemoryDatabase } from '../../infrastructure/repositories/InMemoryDatabase';
import { InMemoryUserRepository } from '../../infrastructure/repositories/InMemoryUserRepository';
import { InMemorySessionRepository } from '../../infrastructure/repositories/InMemorySessionRepository';
import { BcryptPasswordHasher } from '../../infrastructure/security/BcryptPasswordHasher';
import { HabitTrackerErrorCode, isHabitTrackerError } from '../errors/HabitTrackerError';

async function expectCode(promise: Promise<unknown>, code: HabitTrackerErrorCode): Promise<void> {
  const error = await promise.then(
    () => null,
    (err: unknown) => err
  );
  expect(isHabitTrackerError(error, code)).toBe(true);
}

describe('auth use cases', () => {
  let db: InMemoryDatabase;
  let users: InMemoryUserRepository;
  let register: RegisterUserUseCase;
  let authenticate: AuthenticateUserUseCase;

  beforeEach(() => {
    db = new InMemoryDatabase();
    users = new InMemoryUserRepository(db);
    const hasher = new BcryptPasswordHasher(4);
    register = new RegisterUserUseCase(users, hasher);
    authenticate = new AuthenticateUserUseCase(users, hasher);
  });

  it('registers a user and authenticates with the same credentials', async () => {
    const userId = await register.execute('alice', 'test-password');

    expect(userId).toBe(1);
    await expect(authenticate.execute('alice', 'test-password')).resolves.toEqual({ userId: 1, username: 'alice' });
  });

  it('never stores the raw password', async () => {
    await register.execute('alice', 'test-password');

    const stored = await users.findByUsername('alice');
    expect(stored?.passwordHash).not.toBe('test-password');
    expect(stored?.passwordHash.startsWith('$2')).toBe(true);
  });

  it('rejects a second registration with the same username', async () => {
    await register.execute('alice', 'test-password');

    await expectCode(register.execute('alice', 'other-password'), 'DuplicateUsername');
    expect(db.users.size).toBe(1);
  });

  it('treats surrounding whitespace in the username as the same name', async () => {
    await register.execute('alice', 'test-password');

    await expectCode(register.execute('  alice ', 'test-password'), 'DuplicateUsername');
  });

  it('requires both fields', async () => {
    await expectCode(register.execute('', 'test-password'), 'InvalidInput');
    await expectCode(register.execute('alice', '   '), 'InvalidInput');
    await expectCode(register.execute(null, null), 'InvalidInput');
  });

  it('rejects a wrong password or an unknown user', async () => {
    await register.execute('alice', 'test-password');

    await expectCode(authenticate.execute('alice', 'wrong-password'), 'InvalidCredentials');
    await expectCode(authenticate.execute('bob', 'test-password'), 'InvalidCredentials');
    await expectCode(authenticate.execute('alice', null), 'InvalidCredentials');
  });

  it('logs out idempotently', async () => {
    const sessions = new InMemorySessionRepository(db);
    const logout = new LogoutUseCase(sessions);
    await sessions.save('session-1', { userId: 1, username: 'alice', flashes: [] }, 60);

    await logout.execute('session-1');
    await logout.execute('session-1');
    await logout.execute(null);

    await expect(sessions.get('session-1')).resolves.toBeNull();
  });
});
