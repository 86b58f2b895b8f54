/**
 * Tests for /auth login, token refresh and profile routes.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { STAFF, TEST_PASSWORD, createTestHarness, readJson, type TestHarness } from '../helpers.js';

const tokenBody = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  user: z.record(z.unknown()),
});

function login(harness: TestHarness, username: string, password = TEST_PASSWORD) {
  return harness.app.request('/auth/login', {
    method: 'POST',
    body: new URLSearchParams({ username, password }),
  });
}

describe('POST /auth/login', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = await createTestHarness();
  });

  it('issues a bearer token pair', async () => {
    const res = await login(harness, 'emp-1');
    expect(res.status).toBe(200);

    const raw: unknown = await res.clone().json();
    expect(raw).toMatchObject({
      ok: true,
      token_type: 'bearer',
      expires_in: 1800,
      user: { id: 'emp-1', fullName: 'Asha Rao', role: 'employee', grade: 'A' },
    });
    const body = await readJson(res, tokenBody);
    expect(body.user).not.toHaveProperty('passwordHash');

    const claims = await harness.tokens.verify(body.access_token, 'access');
    expect(claims.sub).toBe('emp-1');
    await expect(harness.tokens.verify(body.refresh_token, 'refresh')).resolves.toMatchObject({ sub: 'emp-1' });
  });

  it('accepts the email address as login', async () => {
    const res = await login(harness, 'mgr-1@example.com');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ user: { id: 'mgr-1' } });
  });

  it('rejects a wrong password', async () => {
    const res = await login(harness, 'emp-1', 'not-the-password');
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      ok: false,
      error: { type: 'unauthorized', message: 'Incorrect username or password' },
    });
  });

  it('rejects unknown users with the same message', async () => {
    const res = await login(harness, 'nobody');
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Incorrect username or password' } });
  });

  it('rejects inactive accounts', async () => {
    const stored = await harness.storage.employees.get(STAFF.colleague.id);
    if (!stored) throw new Error('seed missing');
    await harness.storage.employees.save({ ...stored, active: false });

    const res = await login(harness, 'emp-2');
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Account is not active' } });
  });

  it('requires both fields', async () => {
    const res = await harness.app.request('/auth/login', {
      method: 'POST',
      body: new URLSearchParams({ username: 'emp-1' }),
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { type: 'validation_error', message: 'password: Required' },
    });
  });

  it('counts attempts in the metrics', async () => {
    await login(harness, 'emp-1');
    await login(harness, 'emp-1', 'not-the-password');
    const text = await harness.metrics.text();
    expect(text).toContain('claimflow_auth_attempts_total{result="success"} 1');
    expect(text).toContain('claimflow_auth_attempts_total{result="failure"} 1');
  });

  it('limits repeated attempts per username', async () => {
    const limited = await createTestHarness({ rateLimit: { maxRequests: 2, windowMs: 60_000 } });
    await login(limited, 'emp-1', 'not-the-password');
    await login(limited, 'emp-1', 'not-the-password');

    const res = await login(limited, 'emp-1');
    expect(res.status).toBe(429);
    expect(Number(res.headers.get('Retry-After'))).toBeGreaterThan(0);

    expect((await login(limited, 'mgr-1')).status).toBe(200);
  });
});

describe('POST /auth/refresh', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = await createTestHarness();
  });

  function refresh(token: string) {
    return harness.app.request('/auth/refresh', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ refresh_token: token }),
    });
  }

  it('exchanges a refresh token for a new pair', async () => {
    const pair = await harness.tokens.issuePair(STAFF.hr);
    const res = await refresh(pair.refreshToken);
    expect(res.status).toBe(200);
    const body = await readJson(res, tokenBody);
    expect(body.user).toMatchObject({ id: 'hr-1', role: 'hr' });
    await expect(harness.tokens.verify(body.access_token, 'access')).resolves.toMatchObject({ sub: 'hr-1' });
  });

  it('does not accept an access token', async () => {
    const pair = await harness.tokens.issuePair(STAFF.hr);
    const res = await refresh(pair.accessToken);
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Expected a refresh token' } });
  });

  it('refuses accounts deactivated since the token was issued', async () => {
    const pair = await harness.tokens.issuePair(STAFF.colleague);
    const stored = await harness.storage.employees.get(STAFF.colleague.id);
    if (!stored) throw new Error('seed missing');
    await harness.storage.employees.save({ ...stored, active: false });

    const res = await refresh(pair.refreshToken);
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Account is not active' } });
  });

  it('validates the body', async () => {
    const res = await refresh('');
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'refresh_token: refresh_token is required' } });
  });

  it('rejects malformed JSON', async () => {
    const res = await harness.app.request('/auth/refresh', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'Request body must be valid JSON' } });
  });
});

describe('GET /auth/me', () => {
  it('returns the profile and role permissions', async () => {
    const harness = await createTestHarness();
    const res = await harness.app.request('/auth/me', { headers: await harness.authHeader(STAFF.finance) });
    expect(res.status).toBe(200);

    const body = await readJson(res, z.object({ user: z.record(z.unknown()), permissions: z.array(z.string()) }));
    expect(body.user).toMatchObject({ id: 'fin-1', role: 'finance' });
    expect(body.user).not.toHaveProperty('passwordHash');
    expect(body.permissions).toEqual([
      'claim:create',
      'claim:read_own',
      'claim:read_all',
      'approval:act',
      'reports:read',
      'audit:read',
    ]);
  });

  it('requires a bearer token', async () => {
    const harness = await createTestHarness();
    const res = await harness.app.request('/auth/me');
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Missing or invalid Authorization header' } });
  });

  it('rejects refresh tokens used as access tokens', async () => {
    const harness = await createTestHarness();
    const pair = await harness.tokens.issuePair(STAFF.employee);
    const res = await harness.app.request('/auth/me', {
      headers: { Authorization: `Bearer ${pair.refreshToken}` },
    });
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Expected a access token' } });
  });
});
