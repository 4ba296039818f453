import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { AuthService, requireAuthorization, type IdentityProvider } from '../../../src/services/AuthService';
import { JWTService } from '../../../src/services/JWTService';
import {
  AuthError,
  InvalidTokenError,
  MissingTokenError,
  UnauthorizedError,
} from '../../../src/types/errors';
import { createTestContext, TEST_SECRET } from '../../_fakes/context';
import { InMemoryPersistence } from '../../_fakes/InMemoryPersistence';

const freshAuth = () => new AuthService(new InMemoryPersistence(), new JWTService(TEST_SECRET));

describe('AuthService.bootstrapAdmin and authenticate', () => {
  it('creates the first admin once and lets them log in', async () => {
    const auth = freshAuth();

    const admin = await auth.bootstrapAdmin('Root@Example.com', 'test-password');
    expect(admin).toMatchObject({ email: 'root@example.com', role: 'admin', name: 'Administrator' });
    expect(admin && 'passwordHash' in admin).toBe(false);
    await expect(auth.bootstrapAdmin('other@example.com', 'test-password')).resolves.toBeNull();

    const session = await auth.authenticate({ email: 'root@example.com', password: 'test-password' });
    expect(session.principal).toEqual({ userId: admin?.userId, email: 'root@example.com', role: 'admin' });
    await expect(auth.identify(session.token)).resolves.toEqual(session.principal);
  });

  it('rejects a wrong password and an unknown email alike', async () => {
    const auth = freshAuth();
    await auth.bootstrapAdmin('root@example.com', 'test-password');

    await expect(auth.authenticate({ email: 'root@example.com', password: 'wrong-password' })).rejects.toBeInstanceOf(
      AuthError,
    );
    await expect(
      auth.authenticate({ email: 'nobody@example.com', password: 'test-password' }),
    ).rejects.toMatchObject({ statusCode: 401, code: 'AUTH_FAILED', message: 'Invalid credentials' });
  });
});

describe('AuthService.authorize', () => {
  it('follows the role table', async () => {
    const ctx = await createTestContext();
    const { auth } = ctx.services;

    await expect(auth.authorize(ctx.tokens.viewer, 'job:read')).resolves.toBe(true);
    await expect(auth.authorize(ctx.tokens.viewer, 'job:submit')).resolves.toBe(false);
    await expect(auth.authorize(ctx.tokens.operator, 'schedule:delete')).resolves.toBe(true);
    await expect(auth.authorize(ctx.tokens.operator, 'user:create')).resolves.toBe(false);
    await expect(auth.authorize(ctx.tokens.admin, 'user:create')).resolves.toBe(true);
  });

  it('denies absent and invalid tokens without throwing', async () => {
    const ctx = await createTestContext();
    const foreign = new JWTService('another-secret').sign(ctx.principals.admin);

    await expect(ctx.services.auth.authorize(undefined, 'job:read')).resolves.toBe(false);
    await expect(ctx.services.auth.authorize('not-a-token', 'job:read')).resolves.toBe(false);
    await expect(ctx.services.auth.authorize(foreign, 'job:read')).resolves.toBe(false);
  });
});

describe('AuthService.register', () => {
  it('is reserved for admins', async () => {
    const ctx = await createTestContext();
    const user = { email: 'new@example.com', name: 'new', role: 'viewer' as const, password: 'test-password' };

    await expect(ctx.services.auth.register([user], ctx.tokens.operator)).rejects.toBeInstanceOf(UnauthorizedError);
    expect(ctx.persistence.state.users.size).toBe(3);
  });

  it('reports duplicate emails per item', async () => {
    const ctx = await createTestContext();

    const results = await ctx.services.auth.register(
      [
        { email: 'new@example.com', name: 'new', role: 'viewer', password: 'test-password' },
        { email: 'NEW@example.com', name: 'again', role: 'viewer', password: 'test-password' },
        { email: 'viewer@example.com', name: 'viewer', role: 'viewer', password: 'test-password' },
      ],
      ctx.tokens.admin,
    );

    expect(results.map((r) => (r.ok ? r.value.email : r.error.code))).toEqual([
      'new@example.com',
      'USER_EXISTS',
      'USER_EXISTS',
    ]);
    expect(results[2]).toMatchObject({ error: { message: 'User already exists with email viewer@example.com' } });
  });
});

describe('requireAuthorization', () => {
  it('turns a failing provider into UnauthorizedError', async () => {
    const broken: IdentityProvider = {
      authenticate: async () => {
        throw new Error('offline');
      },
      authorize: async () => {
        throw new Error('offline');
      },
      identify: async () => {
        throw new Error('offline');
      },
    };

    await expect(requireAuthorization(broken, 'test-token', 'job:read')).rejects.toMatchObject({
      statusCode: 403,
      message: 'Not authorized to job:read',
    });
  });
});

describe('JWTService', () => {
  const service = new JWTService(TEST_SECRET);
  const principal = { userId: 'u-1', email: 'u@example.com', role: 'operator' as const };

  it('round-trips a principal', () => {
    expect(service.verify(service.sign(principal))).toEqual(principal);
  });

  it('tells a missing token from an invalid one', () => {
    expect(() => service.verify(undefined)).toThrow(MissingTokenError);
    expect(() => service.verify(`${service.sign(principal)}x`)).toThrow(InvalidTokenError);
  });

  it('rejects expired tokens', () => {
    const expired = new JWTService(TEST_SECRET, -10).sign(principal);
    expect(() => service.verify(expired)).toThrow('Invalid session token: token expired');
  });

  it('rejects a payload with an unknown role', () => {
    const token = jwt.sign({ email: 'u@example.com', role: 'root' }, TEST_SECRET, { subject: 'u-1' });
    expect(() => service.verify(token)).toThrow('Invalid session token: unexpected payload');
  });
});
