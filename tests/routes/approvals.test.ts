/**
 * Tests for the /approvals routes.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { ClaimId } from '../../src/types/branded.js';
import type { Employee } from '../../src/types/claim-contract.js';
import { STAFF, createTestHarness, makeClaim, readJson, type TestHarness } from '../helpers.js';

const pendingPage = z.object({ total: z.number(), items: z.array(z.object({ id: z.string() }).passthrough()) });

describe('approval routes', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = await createTestHarness();
    const { claims } = harness.storage;
    await claims.insert(makeClaim({ id: 'EXP-20250305-AAAAAA', createdAt: '2025-03-05T10:00:00.000Z' }));
    await claims.insert(makeClaim({ id: 'EXP-20250304-BBBBBB', createdAt: '2025-03-04T10:00:00.000Z' }));
    await claims.insert(
      makeClaim({ id: 'EXP-20250303-CCCCCC', status: 'hr_review', createdAt: '2025-03-03T10:00:00.000Z' })
    );
    await claims.insert(
      makeClaim({ id: 'EXP-20250302-DDDDDD', ownerId: STAFF.manager.id, createdAt: '2025-03-02T10:00:00.000Z' })
    );
    await claims.insert(
      makeClaim({ id: 'EXP-20250301-EEEEEE', status: 'approved', resolvedAt: '2025-03-02T00:00:00.000Z' })
    );
  });

  async function decide(employee: Employee, id: string, outcome: 'approve' | 'reject', body?: unknown) {
    return harness.app.request(`/approvals/${id}/${outcome}`, {
      method: 'POST',
      headers: { ...(await harness.authHeader(employee)), 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  describe('GET /approvals/pending', () => {
    it("lists the manager's queue oldest first, leaving out their own claims", async () => {
      const res = await harness.app.request('/approvals/pending', { headers: await harness.authHeader(STAFF.manager) });
      expect(res.status).toBe(200);
      const body = await readJson(res, pendingPage);
      expect(body.total).toBe(2);
      expect(body.items.map((c) => c.id)).toEqual(['EXP-20250304-BBBBBB', 'EXP-20250305-AAAAAA']);
    });

    it('gives HR the claims at HR review', async () => {
      const res = await harness.app.request('/approvals/pending', { headers: await harness.authHeader(STAFF.hr) });
      const body = await readJson(res, pendingPage);
      expect(body.items.map((c) => c.id)).toEqual(['EXP-20250303-CCCCCC']);
    });

    it('is closed to employees and admins', async () => {
      for (const employee of [STAFF.employee, STAFF.admin]) {
        const res = await harness.app.request('/approvals/pending', { headers: await harness.authHeader(employee) });
        expect(res.status).toBe(403);
        expect(await res.json()).toMatchObject({
          error: { type: 'forbidden', message: "Permission 'approval:act' is required" },
        });
      }
    });
  });

  describe('POST /approvals/:id/approve', () => {
    it('moves a manager-approved claim to HR review', async () => {
      const res = await decide(STAFF.manager, 'EXP-20250305-AAAAAA', 'approve', { comments: 'Looks fine' });
      expect(res.status).toBe(200);

      const decision = {
        actorId: 'mgr-1',
        actorRole: 'manager',
        outcome: 'approve',
        comment: 'Looks fine',
        fromStatus: 'submitted',
        toStatus: 'hr_review',
        timestamp: '2025-03-10T09:00:00.000Z',
      };
      expect(await res.json()).toMatchObject({
        ok: true,
        claim: { id: 'EXP-20250305-AAAAAA', status: 'hr_review', decisions: [decision], resolvedAt: null },
        decision,
      });
      expect((await harness.storage.claims.get(ClaimId('EXP-20250305-AAAAAA')))?.status).toBe('hr_review');
    });

    it('accepts an empty body', async () => {
      const res = await decide(STAFF.hr, 'EXP-20250303-CCCCCC', 'approve');
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        claim: { status: 'finance_review' },
        decision: { comment: null },
      });
    });

    it('refuses the wrong stage', async () => {
      const res = await decide(STAFF.hr, 'EXP-20250305-AAAAAA', 'approve');
      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({
        error: {
          type: 'forbidden',
          message: "Claim EXP-20250305-AAAAAA is in 'submitted', only manager can approve it",
        },
      });
    });

    it('refuses self-approval', async () => {
      const res = await decide(STAFF.manager, 'EXP-20250302-DDDDDD', 'approve');
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        ok: false,
        error: { type: 'self_approval', message: 'Cannot act on your own claim: EXP-20250302-DDDDDD' },
      });
    });

    it('refuses decided claims', async () => {
      const res = await decide(STAFF.finance, 'EXP-20250301-EEEEEE', 'approve');
      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({
        error: { type: 'invalid_state', message: "Claim EXP-20250301-EEEEEE is already 'approved', cannot approve" },
      });
    });

    it('reports unknown claims', async () => {
      const res = await decide(STAFF.manager, 'EXP-20250101-FFFFFF', 'approve');
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        error: { type: 'not_found', message: 'Claim not found: EXP-20250101-FFFFFF' },
      });
    });

    it('limits comment length', async () => {
      const res = await decide(STAFF.manager, 'EXP-20250305-AAAAAA', 'approve', { comments: 'x'.repeat(1001) });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { message: 'comments: Comments are too long' } });
    });
  });

  describe('POST /approvals/:id/reject', () => {
    it('rejects with a reason', async () => {
      const res = await decide(STAFF.hr, 'EXP-20250303-CCCCCC', 'reject', { comments: 'Not a business expense' });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        claim: {
          status: 'rejected',
          resolvedAt: '2025-03-10T09:00:00.000Z',
          rejectionReason: 'Not a business expense',
        },
        decision: { outcome: 'reject', fromStatus: 'hr_review', toStatus: 'rejected' },
      });
    });

    it('requires a reason', async () => {
      for (const body of [undefined, {}, { comments: '   ' }]) {
        const res = await decide(STAFF.manager, 'EXP-20250305-AAAAAA', 'reject', body);
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({
          ok: false,
          error: {
            type: 'validation_error',
            message: 'A comment is required to reject a claim',
            issues: [{ field: 'comments', message: 'Rejection reason is required' }],
          },
        });
      }
    });

    it('audits refused decisions', async () => {
      await decide(STAFF.manager, 'EXP-20250302-DDDDDD', 'reject', { comments: 'No' });
      const trail = await harness.storage.audit.list({ claimId: ClaimId('EXP-20250302-DDDDDD') });
      expect(trail.items).toMatchObject([
        {
          actorId: 'mgr-1',
          action: 'claim.reject',
          outcome: 'failure',
          beforeStatus: 'submitted',
          afterStatus: 'submitted',
          comment: 'No',
          error: { type: 'self_approval', message: 'Cannot act on your own claim: EXP-20250302-DDDDDD' },
        },
      ]);
    });
  });
});
