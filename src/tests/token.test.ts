import request from 'supertest';
import { setTestNow } from '../shared/clock';
import { bearer, createTestApp, decodePayload, login, seedUser, TEST_PASSWORD, type TestApp } from './helpers';

const T0 = new Date('2026-03-02T09:00:00Z');

describe('token endpoints', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = createTestApp();
  });

  afterEach(() => {
    setTestNow(null);
  });

  describe('A. obtain', () => {
    test('A1: valid credentials return a pair and the user summary', async () => {
      const user = await seedUser(ctx.users, { username: 'alice', role: 'BARBER' });

      const res = await request(ctx.app).post('/token').send({ username: 'alice', password: TEST_PASSWORD });

      expect(res.status).toBe(200);
      expect(typeof res.body.access).toBe('string');
      expect(typeof res.body.refresh).toBe('string');
      expect(res.body.user).toEqual({
        id: user.id,
        username: 'alice',
        email: 'alice@example.com',
        role: 'BARBER',
        first_name: '',
        last_name: '',
      });
      expect(decodePayload(res.body.access)).toMatchObject({ sub: user.id, role: 'BARBER', token_type: 'access' });
      expect(decodePayload(res.body.refresh)).toMatchObject({ sub: user.id, token_type: 'refresh' });
    });

    test('A2: email works as the identifier', async () => {
      await seedUser(ctx.users, { username: 'alice' });

      const res = await request(ctx.app).post('/token').send({ username: 'alice@example.com', password: TEST_PASSWORD });

      expect(res.status).toBe(200);
    });

    test('A3: wrong password and unknown user get the same answer', async () => {
      await seedUser(ctx.users, { username: 'alice' });

      const wrong = await request(ctx.app).post('/token').send({ username: 'alice', password: 'wrong-password' });
      const unknown = await request(ctx.app).post('/token').send({ username: 'nobody', password: TEST_PASSWORD });

      expect(wrong.status).toBe(401);
      expect(unknown.status).toBe(401);
      expect(wrong.body).toEqual({ detail: 'No active account found with the given credentials.' });
      expect(unknown.body).toEqual(wrong.body);
    });

    test('A4: an inactive user cannot obtain tokens', async () => {
      await seedUser(ctx.users, { username: 'alice', isActive: false });

      const res = await request(ctx.app).post('/token').send({ username: 'alice', password: TEST_PASSWORD });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'User account is disabled.' });
    });

    test('A5: missing fields are named', async () => {
      const res = await request(ctx.app).post('/token').send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        username: ['This field is required.'],
        password: ['This field is required.'],
      });
    });

    test('A6: malformed JSON is a 400', async () => {
      const res = await request(ctx.app)
        .post('/token')
        .set('Content-Type', 'application/json')
        .send('{"username": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Malformed JSON body.' });
    });

    test('A7: a stale Authorization header does not block login', async () => {
      await seedUser(ctx.users, { username: 'alice' });

      const res = await request(ctx.app)
        .post('/token')
        .set('Authorization', 'Bearer not-a-jwt')
        .send({ username: 'alice', password: TEST_PASSWORD });

      expect(res.status).toBe(200);
      expect(typeof res.body.access).toBe('string');
    });

    test('A8: repeated failures do not lock the account', async () => {
      await seedUser(ctx.users, { username: 'alice' });

      for (let attempt = 0; attempt < 10; attempt++) {
        await request(ctx.app).post('/token').send({ username: 'alice', password: 'wrong-password' }).expect(401);
      }
      const res = await request(ctx.app).post('/token').send({ username: 'alice', password: TEST_PASSWORD });

      expect(res.status).toBe(200);
    });
  });

  describe('B. refresh', () => {
    test('B1: refresh rotates both tokens', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const first = await login(ctx.app, 'alice');

      const res = await request(ctx.app).post('/token/refresh').send({ refresh: first.refresh });

      expect(res.status).toBe(200);
      expect(res.body.access).not.toBe(first.access);
      expect(res.body.refresh).not.toBe(first.refresh);
    });

    test('B2: a consumed refresh token cannot be reused', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');

      await request(ctx.app).post('/token/refresh').send({ refresh }).expect(200);
      const reuse = await request(ctx.app).post('/token/refresh').send({ refresh });

      expect(reuse.status).toBe(401);
      expect(reuse.body).toEqual({ detail: 'Token is blacklisted.' });
    });

    test('B3: concurrent refreshes with one token: exactly one wins', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');

      const results = await Promise.all([
        request(ctx.app).post('/token/refresh').send({ refresh }),
        request(ctx.app).post('/token/refresh').send({ refresh }),
      ]);

      expect(results.map(r => r.status).sort()).toEqual([200, 401]);
    });

    test('B4: an access token is not a refresh token', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { access } = await login(ctx.app, 'alice');

      const res = await request(ctx.app).post('/token/refresh').send({ refresh: access });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token has wrong type.' });
    });

    test('B5: the role is re-read from the user record', async () => {
      const user = await seedUser(ctx.users, { username: 'alice', role: 'CLIENT' });
      const { refresh } = await login(ctx.app, 'alice');
      await ctx.users.update(user.id, { role: 'BARBER' });

      const res = await request(ctx.app).post('/token/refresh').send({ refresh });

      expect(res.status).toBe(200);
      expect(decodePayload(res.body.access).role).toBe('BARBER');
    });

    test('B6: a deactivated user cannot refresh', async () => {
      const user = await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');
      await ctx.users.update(user.id, { isActive: false });

      const res = await request(ctx.app).post('/token/refresh').send({ refresh });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'User not found or inactive.' });
    });

    test('B7: an expired refresh token is rejected', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const loginRes = await request(ctx.app)
        .post('/token')
        .set('X-Test-Now', T0.toISOString())
        .send({ username: 'alice', password: TEST_PASSWORD });

      const later = new Date(T0.getTime() + (7 * 24 * 3600 + 1) * 1000);
      const res = await request(ctx.app)
        .post('/token/refresh')
        .set('X-Test-Now', later.toISOString())
        .send({ refresh: loginRes.body.refresh });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token is expired.' });
    });

    test('B8: a missing refresh token is named', async () => {
      const res = await request(ctx.app).post('/token/refresh').send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ refresh: ['This field is required.'] });
    });

    test('B9: an expired access token in the header does not block refresh', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const loginRes = await request(ctx.app)
        .post('/token')
        .set('X-Test-Now', T0.toISOString())
        .send({ username: 'alice', password: TEST_PASSWORD });

      const res = await request(ctx.app)
        .post('/token/refresh')
        .set('X-Test-Now', new Date(T0.getTime() + 301 * 1000).toISOString())
        .set(bearer(loginRes.body.access))
        .send({ refresh: loginRes.body.refresh });

      expect(res.status).toBe(200);
      expect(typeof res.body.access).toBe('string');
      expect(res.body.refresh).not.toBe(loginRes.body.refresh);
    });
  });

  describe('C. verify', () => {
    test('C1: valid tokens of either type verify', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { access, refresh } = await login(ctx.app, 'alice');

      const a = await request(ctx.app).post('/token/verify').send({ token: access });
      const r = await request(ctx.app).post('/token/verify').send({ token: refresh });

      expect(a.status).toBe(200);
      expect(a.body).toEqual({});
      expect(r.status).toBe(200);
    });

    test('C2: an expired access token does not verify', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const loginRes = await request(ctx.app)
        .post('/token')
        .set('X-Test-Now', String(T0.getTime()))
        .send({ username: 'alice', password: TEST_PASSWORD });

      const res = await request(ctx.app)
        .post('/token/verify')
        .set('X-Test-Now', String(T0.getTime() + 300 * 1000))
        .send({ token: loginRes.body.access });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token is expired.' });
    });

    test('C3: a tampered token does not verify', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { access } = await login(ctx.app, 'alice');
      const [header, payload, signature] = access.split('.');
      const forged = Buffer.from(JSON.stringify({ ...decodePayload(access), role: 'ADMIN' })).toString('base64url');

      const res = await request(ctx.app).post('/token/verify').send({ token: `${header}.${forged}.${signature}` });

      expect(payload).not.toBe(forged);
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token is invalid.' });
    });

    test('C4: a blacklisted refresh token does not verify', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');
      await request(ctx.app).post('/token/blacklist').send({ refresh }).expect(200);

      const res = await request(ctx.app).post('/token/verify').send({ token: refresh });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token is blacklisted.' });
    });

    test('C5: a missing token is named', async () => {
      const res = await request(ctx.app).post('/token/verify').send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ token: ['This field is required.'] });
    });

    test('C6: verify ignores a malformed Authorization header', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { access } = await login(ctx.app, 'alice');

      const res = await request(ctx.app)
        .post('/token/verify')
        .set('Authorization', 'Basic dGVzdDp0ZXN0')
        .send({ token: access });

      expect(res.status).toBe(200);
    });
  });

  describe('D. blacklist and logout', () => {
    test('D1: blacklisting revokes the refresh token', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');

      const res = await request(ctx.app).post('/token/blacklist').send({ refresh });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ detail: 'Token blacklisted.' });
      await request(ctx.app).post('/token/refresh').send({ refresh }).expect(401);
    });

    test('D2: blacklisting twice is rejected the second time', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');

      await request(ctx.app).post('/token/blacklist').send({ refresh }).expect(200);
      const again = await request(ctx.app).post('/token/blacklist').send({ refresh });

      expect(again.status).toBe(401);
      expect(again.body).toEqual({ detail: 'Token is blacklisted.' });
    });

    test('D3: an access token cannot be blacklisted', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { access } = await login(ctx.app, 'alice');

      const res = await request(ctx.app).post('/token/blacklist').send({ refresh: access });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token has wrong type.' });
    });

    test('D4: logout needs a bearer token', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');

      const res = await request(ctx.app).post('/logout').send({ refresh });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Authentication credentials were not provided.' });
    });

    test('D5: logout revokes only the given session', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const laptop = await login(ctx.app, 'alice');
      const phone = await login(ctx.app, 'alice');

      const res = await request(ctx.app).post('/logout').set(bearer(laptop.access)).send({ refresh: laptop.refresh });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ detail: 'Successfully logged out.' });
      await request(ctx.app).post('/token/refresh').send({ refresh: laptop.refresh }).expect(401);
      await request(ctx.app).post('/token/refresh').send({ refresh: phone.refresh }).expect(200);
    });

    test("D6: logout with someone else's refresh token is forbidden", async () => {
      await seedUser(ctx.users, { username: 'alice' });
      await seedUser(ctx.users, { username: 'bob' });
      const alice = await login(ctx.app, 'alice');
      const bob = await login(ctx.app, 'bob');

      const res = await request(ctx.app).post('/logout').set(bearer(alice.access)).send({ refresh: bob.refresh });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ detail: 'Token does not belong to the authenticated user.' });
      await request(ctx.app).post('/token/refresh').send({ refresh: bob.refresh }).expect(200);
    });

    test('D7: logout without a refresh token names the field', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { access } = await login(ctx.app, 'alice');

      const res = await request(ctx.app).post('/logout').set(bearer(access)).send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ refresh: ['This field is required.'] });
    });

    test('D8: the access token stays usable until it expires', async () => {
      const user = await seedUser(ctx.users, { username: 'alice' });
      const { access, refresh } = await login(ctx.app, 'alice');

      await request(ctx.app).post('/logout').set(bearer(access)).send({ refresh }).expect(200);
      const res = await request(ctx.app).get(`/users/${user.id}`).set(bearer(access));

      expect(res.status).toBe(200);
    });

    test('D9: a missing refresh token is named on blacklist', async () => {
      const res = await request(ctx.app).post('/token/blacklist').send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ refresh: ['This field is required.'] });
    });

    test('D10: blacklist ignores a garbage bearer token', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');

      const res = await request(ctx.app).post('/token/blacklist').set(bearer('garbage')).send({ refresh });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ detail: 'Token blacklisted.' });
    });

    test('D11: logout with an expired bearer token is rejected', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const loginRes = await request(ctx.app)
        .post('/token')
        .set('X-Test-Now', T0.toISOString())
        .send({ username: 'alice', password: TEST_PASSWORD });

      const res = await request(ctx.app)
        .post('/logout')
        .set('X-Test-Now', new Date(T0.getTime() + 301 * 1000).toISOString())
        .set(bearer(loginRes.body.access))
        .send({ refresh: loginRes.body.refresh });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token is expired.' });
      await request(ctx.app).post('/token/refresh').send({ refresh: loginRes.body.refresh }).expect(200);
    });
  });

  describe('E. bearer authentication', () => {
    test('E1: a refresh token is not accepted as a bearer token', async () => {
      const user = await seedUser(ctx.users, { username: 'alice' });
      const { refresh } = await login(ctx.app, 'alice');

      const res = await request(ctx.app).get(`/users/${user.id}`).set(bearer(refresh));

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token has wrong type.' });
    });

    test('E2: a non-bearer scheme is rejected', async () => {
      const res = await request(ctx.app).get('/users').set('Authorization', 'Basic dGVzdDp0ZXN0');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Malformed authorization header.' });
    });

    test('E3: a token from another deployment is rejected', async () => {
      const other = createTestApp();
      const user = await seedUser(other.users, { username: 'alice' });
      const { access } = await login(other.app, 'alice');

      const res = await request(ctx.app).get(`/users/${user.id}`).set(bearer(access));

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: 'Token is invalid.' });
    });
  });

  describe('F. full lifecycle', () => {
    test('F1: login, verify, refresh, verify, logout, refresh fails', async () => {
      await seedUser(ctx.users, { username: 'alice' });
      const first = await login(ctx.app, 'alice');

      await request(ctx.app).post('/token/verify').send({ token: first.access }).expect(200);

      const refreshed = await request(ctx.app).post('/token/refresh').send({ refresh: first.refresh }).expect(200);
      expect(refreshed.body.access).not.toBe(first.access);

      await request(ctx.app).post('/token/verify').send({ token: refreshed.body.access }).expect(200);

      await request(ctx.app)
        .post('/logout')
        .set(bearer(refreshed.body.access))
        .send({ refresh: refreshed.body.refresh })
        .expect(200);

      const after = await request(ctx.app).post('/token/refresh').send({ refresh: refreshed.body.refresh });
      expect(after.status).toBe(401);
    });

    test('F2: health needs no authentication', async () => {
      const res = await request(ctx.app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', service: 'barbershop-api' });
    });
  });
});
