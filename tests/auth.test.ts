/**
 * Auth building blocks: password hashing, JWT issue/verify and the RBAC
 * permission matrix.
 */

import { describe, it, expect } from 'vitest';
import * as jose from 'jose';
import { hashPassword, verifyPassword } from '../src/auth/password.js';
import { employeeHasPermission, getPermissions, hasPermission, isValidRole } from '../src/auth/rbac.js';
import { TokenService } from '../src/auth/token-service.js';
import { UnauthorizedError } from '../src/core/errors.js';
import { STAFF, TEST_SECRET } from './helpers.js';

// =============================================================================
// § Passwords
// =============================================================================

describe('password hashing', () => {
  it('verifies the original password only', async () => {
    const stored = await hashPassword('test-password');
    expect(stored).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
    expect(await verifyPassword('test-password', stored)).toBe(true);
    expect(await verifyPassword('wrong-password', stored)).toBe(false);
  });

  it('salts every hash', async () => {
    expect(await hashPassword('same')).not.toBe(await hashPassword('same'));
  });

  it('rejects malformed stored values', async () => {
    expect(await verifyPassword('x', 'plain-text')).toBe(false);
    expect(await verifyPassword('x', 'bcrypt$00$00')).toBe(false);
    expect(await verifyPassword('x', 'scrypt$00$00')).toBe(false);
  });
});

// =============================================================================
// § Tokens
// =============================================================================

describe('TokenService', () => {
  const service = new TokenService({
    secret: TEST_SECRET,
    issuer: 'claimflow-test',
    accessTokenTtlSeconds: 1800,
    refreshTokenTtlSeconds: 3600,
  });

  it('issues an access and refresh pair', async () => {
    const pair = await service.issuePair(STAFF.employee);
    expect(pair.expiresIn).toBe(1800);

    const claims = await service.verify(pair.accessToken, 'access');
    expect(claims).toMatchObject({ sub: 'emp-1', username: 'emp-1', role: 'employee', grade: 'A', typ: 'access' });
    expect(claims.exp - claims.iat).toBe(1800);

    const refresh = await service.verify(pair.refreshToken, 'refresh');
    expect(refresh.exp - refresh.iat).toBe(3600);
  });

  it('refuses a refresh token where an access token is expected', async () => {
    const pair = await service.issuePair(STAFF.employee);
    await expect(service.verify(pair.refreshToken, 'access')).rejects.toThrow('Expected a access token');
  });

  it('refuses tokens signed with another secret', async () => {
    const other = new TokenService({
      secret: 'another-test-secret',
      issuer: 'claimflow-test',
      accessTokenTtlSeconds: 60,
      refreshTokenTtlSeconds: 60,
    });
    const pair = await other.issuePair(STAFF.employee);
    await expect(service.verify(pair.accessToken, 'access')).rejects.toThrow('Invalid token signature');
  });

  it('refuses expired tokens', async () => {
    const now = Math.floor(Date.now() / 1000);
    const token = await new jose.SignJWT({ username: 'emp-1', role: 'employee', grade: 'A', typ: 'access' })
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject('emp-1')
      .setIssuer('claimflow-test')
      .setIssuedAt(now - 120)
      .setExpirationTime(now - 60)
      .sign(new TextEncoder().encode(TEST_SECRET));
    await expect(service.verify(token, 'access')).rejects.toThrow('Token expired');
  });

  it('refuses tokens missing profile claims', async () => {
    const now = Math.floor(Date.now() / 1000);
    const token = await new jose.SignJWT({ typ: 'access' })
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject('emp-1')
      .setIssuer('claimflow-test')
      .setIssuedAt(now)
      .setExpirationTime(now + 60)
      .sign(new TextEncoder().encode(TEST_SECRET));
    await expect(service.verify(token, 'access')).rejects.toThrow('Token is missing required claims');
  });

  it('refuses garbage', async () => {
    await expect(service.verify('not-a-jwt', 'access')).rejects.toBeInstanceOf(UnauthorizedError);
  });
});

// =============================================================================
// § RBAC
// =============================================================================

describe('RBAC', () => {
  it('lets employees submit but not review', () => {
    expect(getPermissions('employee')).toEqual(['claim:create', 'claim:read_own']);
    expect(hasPermission('employee', 'approval:act')).toBe(false);
  });

  it('gives reviewers approval and reporting rights', () => {
    for (const role of ['manager', 'hr', 'finance'] as const) {
      expect(hasPermission(role, 'approval:act')).toBe(true);
      expect(hasPermission(role, 'reports:read')).toBe(true);
    }
    expect(hasPermission('manager', 'audit:read')).toBe(false);
    expect(hasPermission('hr', 'audit:read')).toBe(true);
  });

  it('keeps admin out of the approval chain', () => {
    expect(hasPermission('admin', 'approval:act')).toBe(false);
    expect(hasPermission('admin', 'claim:create')).toBe(false);
    expect(hasPermission('admin', 'audit:read')).toBe(true);
    expect(hasPermission('admin', 'user:manage')).toBe(true);
    expect(hasPermission('hr', 'user:manage')).toBe(false);
  });

  it('requires the claim flag and an active account to create claims', () => {
    expect(employeeHasPermission(STAFF.employee, 'claim:create')).toBe(true);
    expect(employeeHasPermission({ ...STAFF.employee, canClaimExpenses: false }, 'claim:create')).toBe(false);
    expect(employeeHasPermission({ ...STAFF.employee, active: false }, 'claim:read_own')).toBe(false);
  });

  it('validates role names', () => {
    expect(isValidRole('finance')).toBe(true);
    expect(isValidRole('superuser')).toBe(false);
  });
});
