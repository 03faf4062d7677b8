import { JwtService } from '@nestjs/jwt';
import { createTestDatabase, TestDatabase } from '../../../test/support/test-database';
import { testConfig } from '../../../test/support/test-config';
import { UsersService } from '../users/users.service';
import { AuthService } from './auth.service';
import type { JwtAccessPayload, JwtRefreshPayload } from './types/jwt-payload';

describe('AuthService', () => {
  const config = testConfig();
  let database: TestDatabase;
  let jwt: JwtService;
  let auth: AuthService;
  let userId: number;

  beforeEach(async () => {
    database = await createTestDatabase();
    jwt = new JwtService({});
    const users = new UsersService();
    auth = new AuthService(jwt, users, config);

    const created = await database.run((s) =>
      users.create(s, {
        email: 'carol@example.com',
        username: 'carol',
        password: 'test-password',
        firstName: 'Carol',
        lastName: 'Danvers',
      }),
    );
    if (created.kind !== 'ok') throw new Error('user not created');
    userId = created.value.id;
  });

  afterEach(async () => {
    await database.close();
  });

  describe('login', () => {
    test('valid credentials => token pair signed with the configured secrets', async () => {
      const result = await database.run((s) =>
        auth.login(s, { email: ' Carol@Example.com ', password: 'test-password' }),
      );

      expect(result.kind).toBe('ok');
      if (result.kind !== 'ok') return;
      expect(result.value.user).toMatchObject({ id: userId, email: 'carol@example.com' });
      expect(result.value.user).not.toHaveProperty('password');

      const access = await jwt.verifyAsync<JwtAccessPayload>(result.value.accessToken, {
        secret: config.JWT_ACCESS_SECRET,
      });
      const refresh = await jwt.verifyAsync<JwtRefreshPayload>(result.value.refreshToken, {
        secret: config.JWT_REFRESH_SECRET,
      });
      expect(access).toMatchObject({ sub: userId, email: 'carol@example.com', typ: 'access' });
      expect(refresh).toMatchObject({ sub: userId, typ: 'refresh' });
    });

    test('wrong password => unauthorized', async () => {
      const result = await database.run((s) => auth.login(s, { email: 'carol@example.com', password: 'wrong-password' }));

      expect(result).toEqual({ kind: 'unauthorized', message: 'Invalid email or password' });
    });

    test('unknown email => same unauthorized message', async () => {
      const result = await database.run((s) => auth.login(s, { email: 'nobody@example.com', password: 'test-password' }));

      expect(result).toEqual({ kind: 'unauthorized', message: 'Invalid email or password' });
    });
  });

  describe('refresh', () => {
    test('existing user => new pair', async () => {
      const result = await database.run((s) => auth.refresh(s, userId));

      expect(result.kind === 'ok' && result.value.user.username).toBe('carol');
    });

    test('deleted user => unauthorized', async () => {
      const result = await database.run((s) => auth.refresh(s, userId + 100));

      expect(result).toEqual({ kind: 'unauthorized', message: 'User no longer exists' });
    });
  });

  test('me returns the profile of the token subject', async () => {
    const result = await database.run((s) => auth.me(s, userId));

    expect(result.kind === 'ok' && result.value.profile).toMatchObject({ firstName: 'Carol', lastName: 'Danvers' });
  });
});
