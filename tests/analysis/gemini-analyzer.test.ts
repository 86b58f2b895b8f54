import { describe, it, expect, vi } from 'vitest';
import type { AnalysisContext } from '../../src/analysis/bill-analyzer.js';
import { DisabledBillAnalyzer } from '../../src/analysis/bill-analyzer.js';
import { GeminiBillAnalyzer, type GenerateContentClient } from '../../src/analysis/gemini-analyzer.js';
import { SYSTEM_INSTRUCTION, buildAnalysisPrompt } from '../../src/analysis/prompts.js';
import { AnalysisUnavailableError } from '../../src/core/errors.js';
import { FIXED_NOW, billBytes } from '../helpers.js';

const bill = { filename: 'ticket.pdf', mimeType: 'application/pdf', data: billBytes('%PDF') };

const context: AnalysisContext = {
  category: 'travel',
  amount: 1200,
  currency: 'INR',
  expenseDate: '2025-03-05',
  description: 'Bus to client site',
  grade: 'A',
  travelMode: 'bus',
  ceiling: 1500,
  allowedTravelModes: ['bus', 'train'],
};

const modelJson = JSON.stringify({
  is_authentic: true,
  confidence_score: 80,
  bill_number: 'T-1',
  vendor_name: 'State Transport',
  extracted_amount: 1200,
  travel_mode: 'bus',
  recommendation: 'APPROVE',
  recommendation_reason: 'Matches',
});

function analyzerWith(generateContent: GenerateContentClient['generateContent'], timeoutMs = 1000) {
  return new GeminiBillAnalyzer({
    client: { generateContent },
    model: 'test-model',
    timeoutMs,
    now: () => FIXED_NOW,
  });
}

describe('GeminiBillAnalyzer', () => {
  it('sends the bill inline with the prompt and parses the answer', async () => {
    const generateContent = vi.fn<GenerateContentClient['generateContent']>().mockResolvedValue({ text: modelJson });
    const analysis = await analyzerWith(generateContent).analyze(bill, context);

    expect(analysis.recommendation).toBe('APPROVE');
    expect(analysis.extracted.vendorName).toBe('State Transport');
    expect(analysis.model).toBe('test-model');
    expect(analysis.analyzedAt).toBe(FIXED_NOW.toISOString());

    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(generateContent.mock.calls[0]?.[0]).toMatchObject({
      model: 'test-model',
      contents: [
        {
          role: 'user',
          parts: [
            { inlineData: { data: 'JVBERg==', mimeType: 'application/pdf' } },
            { text: buildAnalysisPrompt(context, FIXED_NOW) },
          ],
        },
      ],
      config: { systemInstruction: SYSTEM_INSTRUCTION, responseMimeType: 'application/json', temperature: 0.1 },
    });
  });

  it('turns a client failure into AnalysisUnavailable', async () => {
    const generateContent = vi.fn<GenerateContentClient['generateContent']>().mockRejectedValue(new Error('quota exceeded'));
    await expect(analyzerWith(generateContent).analyze(bill, context)).rejects.toThrow(
      'Bill analysis unavailable: model request failed: quota exceeded'
    );
  });

  it('gives up after the timeout', async () => {
    const generateContent = vi
      .fn<GenerateContentClient['generateContent']>()
      .mockReturnValue(new Promise<{ text?: string }>(() => undefined));
    await expect(analyzerWith(generateContent, 20).analyze(bill, context)).rejects.toThrow(
      'Bill analysis unavailable: model did not respond within 20ms'
    );
  });

  it('aborts the request it gave up on', async () => {
    const generateContent = vi
      .fn<GenerateContentClient['generateContent']>()
      .mockReturnValue(new Promise<{ text?: string }>(() => undefined));
    await expect(analyzerWith(generateContent, 20).analyze(bill, context)).rejects.toThrow(
      'model did not respond within 20ms'
    );

    const signal = generateContent.mock.calls[0]?.[0].config?.abortSignal;
    expect(signal).toBeInstanceOf(AbortSignal);
    expect(signal?.aborted).toBe(true);
  });

  it('leaves the signal alone when the model answers in time', async () => {
    const generateContent = vi.fn<GenerateContentClient['generateContent']>().mockResolvedValue({ text: modelJson });
    await analyzerWith(generateContent).analyze(bill, context);
    expect(generateContent.mock.calls[0]?.[0].config?.abortSignal?.aborted).toBe(false);
  });

  it('rejects unusable output', async () => {
    const generateContent = vi.fn<GenerateContentClient['generateContent']>().mockResolvedValue({ text: 'I cannot read this' });
    await expect(analyzerWith(generateContent).analyze(bill, context)).rejects.toBeInstanceOf(
      AnalysisUnavailableError
    );
  });
});

describe('DisabledBillAnalyzer', () => {
  it('is always unavailable', async () => {
    await expect(new DisabledBillAnalyzer().analyze()).rejects.toThrow(
      'Bill analysis unavailable: no AI model configured'
    );
  });
});

describe('buildAnalysisPrompt', () => {
  it('states today day first and the grade rules', () => {
    const prompt = buildAnalysisPrompt(context, FIXED_NOW);
    expect(prompt).toContain('- Today is 10/03/2025 (2025-03-10)');
    expect(prompt).toContain('- Claimed amount: INR 1200');
    expect(prompt).toContain('- Claimed travel mode: bus');
    expect(prompt).toContain('"allowed_travel_modes": [\n    "bus",\n    "train"\n  ]');
    expect(prompt).toContain('1. Ticket or receipt shows the travel mode');
  });

  it('omits travel rules for other categories', () => {
    const prompt = buildAnalysisPrompt({ ...context, category: 'food', travelMode: null, ceiling: 500 }, FIXED_NOW);
    expect(prompt).not.toContain('allowed_travel_modes');
    expect(prompt).toContain('"max_amount": 500');
  });
});
