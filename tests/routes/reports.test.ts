/**
 * Tests for reviewer search, summary and audit trail routes.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import type { Employee } from '../../src/types/claim-contract.js';
import { STAFF, createTestHarness, makeClaim, readJson, sampleAnalysis, type TestHarness } from '../helpers.js';

const page = z.object({ total: z.number(), items: z.array(z.object({ id: z.string() }).passthrough()) });

const LUNCH = 'EXP-20250305-AAAAAA';
const FLIGHT = 'EXP-20250302-BBBBBB';
const CLINIC = 'EXP-20250221-CCCCCC';
const MOBILE = 'EXP-20250308-DDDDDD';

describe('report routes', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = await createTestHarness();
    const { claims } = harness.storage;
    await claims.insert(
      makeClaim({
        id: LUNCH,
        category: 'food',
        amount: 400,
        expenseDate: '2025-03-05',
        description: 'Team lunch with client',
        analysis: sampleAnalysis(),
        createdAt: '2025-03-05T10:00:00.000Z',
      })
    );
    await claims.insert(
      makeClaim({
        id: FLIGHT,
        category: 'travel',
        amount: 1800,
        expenseDate: '2025-03-02',
        description: 'Flight to Delhi for the audit',
        status: 'rejected',
        limitCheck: { withinLimits: false, reason: 'Amount 1800 exceeds the travel limit of 1,500 for grade A', ceiling: 1500 },
        analysis: sampleAnalysis({
          recommendation: 'REJECT',
          extracted: { ...sampleAnalysis().extracted, vendorName: 'SkyHigh Air', billNumber: 'SH-77' },
        }),
        createdAt: '2025-03-02T10:00:00.000Z',
      })
    );
    await claims.insert(
      makeClaim({
        id: CLINIC,
        ownerId: STAFF.colleague.id,
        category: 'medical',
        amount: 900,
        expenseDate: '2025-02-20',
        description: 'Clinic visit after a site injury',
        status: 'approved',
        createdAt: '2025-02-21T10:00:00.000Z',
      })
    );
    await claims.insert(
      makeClaim({
        id: MOBILE,
        ownerId: STAFF.colleague.id,
        category: 'communication',
        amount: 250,
        expenseDate: '2025-03-08',
        description: 'Mobile data top-up',
        status: 'hr_review',
        createdAt: '2025-03-08T10:00:00.000Z',
      })
    );
  });

  async function get(employee: Employee, path: string) {
    return harness.app.request(path, { headers: await harness.authHeader(employee) });
  }

  async function searchIds(query: string): Promise<string[]> {
    const res = await get(STAFF.finance, `/reports/search${query}`);
    expect(res.status).toBe(200);
    return (await readJson(res, page)).items.map((c) => c.id);
  }

  describe('GET /reports/search', () => {
    it('returns every claim, newest first, by default', async () => {
      expect(await searchIds('')).toEqual([MOBILE, LUNCH, FLIGHT, CLINIC]);
    });

    it.each([
      ['?q=kiran', [MOBILE, CLINIC]],
      ['?q=skyhigh', [FLIGHT]],
      ['?q=LUNCH', [LUNCH]],
      ['?q=EXP-20250221', [CLINIC]],
      ['?grade=C', [MOBILE, CLINIC]],
      ['?category=travel&within_limits=false', [FLIGHT]],
      ['?recommendation=reject', [FLIGHT]],
      ['?status=approved', [CLINIC]],
      ['?employee_id=emp-1', [LUNCH, FLIGHT]],
      ['?min_amount=300&max_amount=1000', [LUNCH, CLINIC]],
      ['?from_date=2025-03-01&to_date=2025-03-06', [LUNCH, FLIGHT]],
      ['?sort_by=amount&sort_order=asc', [MOBILE, LUNCH, CLINIC, FLIGHT]],
      ['?sort_by=expenseDate&sort_order=asc&limit=2', [CLINIC, FLIGHT]],
    ])('filters with %s', async (query, expected) => {
      expect(await searchIds(query)).toEqual(expected);
    });

    it('returns reviewer views with the full analysis', async () => {
      const res = await get(STAFF.manager, '/reports/search?q=skyhigh');
      expect(await res.json()).toMatchObject({
        ok: true,
        total: 1,
        items: [{ id: FLIGHT, analysisPresent: true, analysis: { recommendation: 'REJECT' } }],
      });
    });

    it('checks the amount range', async () => {
      const res = await get(STAFF.finance, '/reports/search?min_amount=500&max_amount=100');
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { type: 'validation_error', message: 'min_amount: min_amount must not exceed max_amount' },
      });
    });

    it('is closed to employees', async () => {
      const res = await get(STAFF.employee, '/reports/search');
      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({ error: { message: "Permission 'reports:read' is required" } });
    });
  });

  describe('GET /reports/summary', () => {
    it('totals claims by status and category', async () => {
      const res = await get(STAFF.admin, '/reports/summary');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        ok: true,
        total: { count: 4, totalAmount: 3350 },
        byStatus: [
          { status: 'submitted', count: 1, totalAmount: 400 },
          { status: 'hr_review', count: 1, totalAmount: 250 },
          { status: 'finance_review', count: 0, totalAmount: 0 },
          { status: 'approved', count: 1, totalAmount: 900 },
          { status: 'rejected', count: 1, totalAmount: 1800 },
        ],
        byCategory: [
          { category: 'travel', count: 1, totalAmount: 1800 },
          { category: 'food', count: 1, totalAmount: 400 },
          { category: 'medical', count: 1, totalAmount: 900 },
          { category: 'accommodation', count: 0, totalAmount: 0 },
          { category: 'communication', count: 1, totalAmount: 250 },
          { category: 'other', count: 0, totalAmount: 0 },
        ],
      });
    });
  });

  describe('GET /reports/audit/:id', () => {
    it('returns the audit trail of a claim', async () => {
      await harness.app.request(`/approvals/${LUNCH}/approve`, {
        method: 'POST',
        headers: await harness.authHeader(STAFF.manager),
      });

      const res = await get(STAFF.hr, `/reports/audit/${LUNCH}`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        ok: true,
        total: 1,
        items: [
          {
            actorId: 'mgr-1',
            actorRole: 'manager',
            action: 'claim.approve',
            claimId: LUNCH,
            outcome: 'success',
            beforeStatus: 'submitted',
            afterStatus: 'hr_review',
            comment: null,
            error: null,
            timestamp: '2025-03-10T09:00:00.000Z',
          },
        ],
      });
    });

    it('returns an empty trail for a claim without entries', async () => {
      const res = await get(STAFF.finance, `/reports/audit/${CLINIC}`);
      expect(await res.json()).toMatchObject({ ok: true, total: 0, items: [] });
    });

    it('reports unknown claims', async () => {
      const res = await get(STAFF.admin, '/reports/audit/EXP-20240101-000000');
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { message: 'Claim not found: EXP-20240101-000000' } });
    });

    it('is closed to managers', async () => {
      const res = await get(STAFF.manager, `/reports/audit/${LUNCH}`);
      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({ error: { message: "Permission 'audit:read' is required" } });
    });
  });
});
