/**
 * End-to-end claim lifecycle over HTTP: login, submission, the
 * manager → HR → finance chain, notifications and the audit trail.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import {
  TEST_PASSWORD,
  claimForm,
  createTestHarness,
  readJson,
  sampleAnalysis,
  type TestHarness,
} from '../helpers.js';

const loginBody = z.object({ access_token: z.string() });
const claimBody = z.object({ claim: z.object({ id: z.string() }).passthrough() });
const inbox = z.object({
  unreadCount: z.number(),
  items: z.array(z.object({ type: z.string(), title: z.string(), message: z.string() }).passthrough()),
});

describe('claim approval workflow', () => {
  let harness: TestHarness;
  const tokens = new Map<string, string>();

  beforeEach(async () => {
    harness = await createTestHarness();
    tokens.clear();
  });

  async function as(username: string): Promise<Record<string, string>> {
    let token = tokens.get(username);
    if (!token) {
      const res = await harness.app.request('/auth/login', {
        method: 'POST',
        body: new URLSearchParams({ username, password: TEST_PASSWORD }),
      });
      expect(res.status).toBe(200);
      token = (await readJson(res, loginBody)).access_token;
      tokens.set(username, token);
    }
    return { Authorization: `Bearer ${token}` };
  }

  async function submit(username: string, fields: Record<string, string>, bill: { name: string; content: string }) {
    const res = await harness.app.request('/expenses/claim', {
      method: 'POST',
      headers: await as(username),
      body: claimForm(fields, bill),
    });
    expect(res.status).toBe(201);
    return (await readJson(res, claimBody)).claim.id;
  }

  async function decide(username: string, id: string, outcome: 'approve' | 'reject', comments?: string) {
    return harness.app.request(`/approvals/${id}/${outcome}`, {
      method: 'POST',
      headers: { ...(await as(username)), 'Content-Type': 'application/json' },
      body: JSON.stringify(comments === undefined ? {} : { comments }),
    });
  }

  async function notifications(username: string) {
    const res = await harness.app.request('/notifications/my-notifications', { headers: await as(username) });
    return readJson(res, inbox);
  }

  it('takes a claim through manager, HR and finance to approval', async () => {
    const id = await submit(
      'emp-1',
      {
        category: 'travel',
        amount: '1200',
        expense_date: '2025-03-05',
        description: 'Bus to the client site in Mumbai',
        travel_mode: 'bus',
        travel_from: 'Pune',
        travel_to: 'Mumbai',
      },
      { name: 'ticket.pdf', content: '%PDF-ticket' }
    );
    const label = `${id} (travel, INR 1,200)`;

    expect((await notifications('mgr-1')).items).toMatchObject([
      { type: 'approval_required', message: `Claim ${label} is waiting for manager review.` },
    ]);

    expect((await decide('hr-1', id, 'approve')).status).toBe(403);
    expect((await decide('mgr-1', id, 'approve', 'Route checks out')).status).toBe(200);

    expect((await notifications('hr-1')).items).toMatchObject([
      { type: 'approval_required', message: `Claim ${label} is waiting for HR review.` },
    ]);

    expect((await decide('hr-1', id, 'approve')).status).toBe(200);
    const final = await decide('fin-1', id, 'approve', 'Paid with March payroll');
    expect(final.status).toBe(200);
    expect(await final.json()).toMatchObject({
      claim: { status: 'approved', resolvedAt: '2025-03-10T09:00:00.000Z' },
      decision: { actorRole: 'finance', fromStatus: 'finance_review', toStatus: 'approved' },
    });

    const ownerInbox = await notifications('emp-1');
    expect(ownerInbox.unreadCount).toBe(4);
    expect(ownerInbox.items.map((n) => n.type).sort()).toEqual([
      'claim_advanced',
      'claim_advanced',
      'claim_approved',
      'claim_submitted',
    ]);
    expect(ownerInbox.items.map((n) => n.message)).toContain(`Your claim ${label} was approved and is now with HR.`);
    expect(ownerInbox.items.map((n) => n.message)).toContain(`Your claim ${label} was approved and is now with finance.`);

    const trail = await harness.app.request(`/reports/audit/${id}`, { headers: await as('fin-1') });
    expect(await trail.json()).toMatchObject({
      total: 5,
      items: [
        { action: 'claim.submit', actorId: 'emp-1', outcome: 'success', beforeStatus: null, afterStatus: 'submitted' },
        { action: 'claim.approve', actorId: 'hr-1', outcome: 'failure', error: { type: 'forbidden' } },
        { action: 'claim.approve', actorId: 'mgr-1', beforeStatus: 'submitted', afterStatus: 'hr_review', comment: 'Route checks out' },
        { action: 'claim.approve', actorId: 'hr-1', beforeStatus: 'hr_review', afterStatus: 'finance_review' },
        { action: 'claim.approve', actorId: 'fin-1', beforeStatus: 'finance_review', afterStatus: 'approved' },
      ],
    });

    const withdraw = await harness.app.request(`/expenses/${id}`, { method: 'DELETE', headers: await as('emp-1') });
    expect(withdraw.status).toBe(409);
    expect(await withdraw.json()).toMatchObject({
      error: { type: 'invalid_state', message: `Claim ${id} is 'approved' and can no longer be deleted` },
    });

    const again = await decide('fin-1', id, 'reject', 'Changed my mind');
    expect(again.status).toBe(409);
  });

  it('shows the owner why a claim was rejected', async () => {
    harness.analyzer.enqueue(
      sampleAnalysis({
        isAuthentic: false,
        confidenceScore: 35,
        recommendation: 'REJECT',
        redFlags: ['Edited total', 'No GST number', 'Date mismatch', 'Blurred stamp'],
        summary: 'Restaurant bill with an altered total',
      })
    );
    const id = await submit(
      'emp-1',
      { category: 'food', amount: '480', expense_date: '2025-03-07', description: 'Dinner with the vendor team' },
      { name: 'dinner.jpg', content: 'jpeg-dinner' }
    );

    const res = await decide('mgr-1', id, 'reject', 'Bill appears altered');
    expect(res.status).toBe(200);

    const view = await harness.app.request(`/expenses/${id}`, { headers: await as('emp-1') });
    expect(await view.json()).toMatchObject({
      claim: {
        status: 'rejected',
        analysis: null,
        analysisPresent: true,
        rejectionReason: 'Bill appears altered',
        analysisSummary: {
          isAuthentic: false,
          confidenceScore: 35,
          recommendation: 'REJECT',
          redFlags: ['Edited total', 'No GST number', 'Date mismatch'],
          summary: 'Restaurant bill with an altered total',
        },
      },
    });

    const owner = await notifications('emp-1');
    expect(owner.items.find((n) => n.type === 'claim_rejected')).toMatchObject({
      title: 'Claim rejected',
      message: `Your claim ${id} (food, INR 480) was rejected by manager: Bill appears altered`,
    });

    const reviewers = await notifications('hr-1');
    expect(reviewers.items).toEqual([]);
  });

  it('approves a self-declared claim without bill analysis', async () => {
    const selfDeclared = await harness.app.request('/expenses/claim', {
      method: 'POST',
      headers: await as('emp-1'),
      body: claimForm({
        category: 'food',
        amount: '200',
        expense_date: '2025-03-08',
        description: 'Tea and snacks for the quarterly client workshop at the Pune office',
        self_declared: 'on',
        no_bill_reason: 'Roadside stall without receipts',
      }),
    });
    expect(selfDeclared.status).toBe(201);
    const { claim } = await readJson(selfDeclared, claimBody);

    expect((await decide('mgr-1', claim.id, 'approve')).status).toBe(200);
    expect((await decide('hr-1', claim.id, 'approve')).status).toBe(200);
    expect((await decide('fin-1', claim.id, 'approve')).status).toBe(200);
    expect(harness.analyzer.calls).toEqual([]);

    const metrics = await harness.metrics.text();
    expect(metrics).toContain('claimflow_claims_submitted_total{category="food"} 1');
    expect(metrics).toContain('claimflow_claim_decisions_total{stage="finance_review",outcome="approve"} 1');
  });
});
