import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { bearer, createTestApp, signUp, type TestApp } from '../support/http';
import type { TestHarness } from '../support/fakes';

describe('auth routes', () => {
  let app: TestApp;
  let h: TestHarness;

  beforeEach(() => {
    ({ app, h } = createTestApp());
  });

  it('registers an account without exposing the password hash', async () => {
    const res = await request(app)
      .post('/auth/register')
      .send({ username: 'alice', password: 'secret1', email: 'alice@example.com' });

    expect(res.status).toBe(201);
    expect(res.body.verification_sent).toBe(true);
    expect(res.body.user).toMatchObject({ username: 'alice', email: 'alice@example.com', email_verified: false });
    expect(res.body.user.password_hash).toBeUndefined();
    expect(h.mail.sent).toHaveLength(1);
  });

  it('rejects registrations without a contact', async () => {
    const res = await request(app).post('/auth/register').send({ username: 'bobby', password: 'secret1' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Email or phone number is required', code: 'VALIDATION_ERROR' });
  });

  it('logs in with a cookie session and logs out', async () => {
    await request(app).post('/auth/register').send({ username: 'alice', password: 'secret1', email: 'alice@example.com' });
    const login = await request(app).post('/auth/login').send({ login: 'alice', password: 'secret1' });
    expect(login.status).toBe(200);
    expect(login.body.expires_at).toBe('2024-03-01T21:00:00.000Z');
    expect(String(login.headers['set-cookie'])).toContain(`session_id=${login.body.session_id}`);

    // The test clock sits in the past, so a cookie jar would drop the cookie as expired
    const cookie = `session_id=${login.body.session_id}`;
    const me = await request(app).get('/auth/me').set('Cookie', cookie);
    expect(me.status).toBe(200);
    expect(me.body.user.username).toBe('alice');
    expect(me.body.credits).toEqual({ unlimited: false, remaining: 3 });

    await request(app).post('/auth/logout').set('Cookie', cookie).expect(200, { ok: true });
    const after = await request(app).get('/auth/me').set(bearer(login.body.session_id));
    expect(after.status).toBe(401);
  });

  it('reports remaining attempts after a wrong password', async () => {
    await signUp(app, 'alice');
    const res = await request(app).post('/auth/login').send({ login: 'alice', password: 'wrong-pass' });
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Invalid login or password', code: 'AUTH_ERROR', details: { attempts_left: 4 } });
  });

  it('requires a session for /me', async () => {
    const res = await request(app).get('/auth/me');
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Invalid or expired session', code: 'AUTH_ERROR' });
  });

  it('verifies email codes', async () => {
    const { userId } = await signUp(app, 'alice');
    const code = h.repos.verifications.table.get(userId)?.verification_code ?? '';

    await request(app).get('/auth/verify-email').expect(400);
    const res = await request(app).get('/auth/verify-email').query({ code });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ verified: true, referral_rewarded: false });
    expect(h.repos.users.table.get(userId)?.email_verified).toBe(true);
  });

  it('moves guest templates to the signed-in account', async () => {
    const created = await request(app)
      .post('/templates')
      .send({ question: 'Why this company?', answer: 'The product solves a problem I had.' })
      .expect(201);
    const { token, userId } = await signUp(app, 'alice');

    const res = await request(app)
      .post('/auth/claim-guest-data')
      .set(bearer(token))
      .send({ template_ids: [created.body.template.id] });

    expect(res.body).toEqual({ claimed: { templates: 1, versions: 0 } });
    expect(h.repos.templates.table.get(created.body.template.id)?.user_id).toBe(userId);
  });
});
