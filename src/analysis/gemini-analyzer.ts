/**
 * Gemini implementation of BillAnalyzer (@google/genai).
 *
 * One request per bill: the file goes inline as base64 next to the prompt.
 * No retries. A request that outlives `timeoutMs` is aborted and resolves to
 * AnalysisUnavailable.
 */

import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import type { Logger } from "pino";
import { AnalysisUnavailableError } from "../core/errors.js";
import type { BillAnalysis } from "../types/claim-contract.js";
import type { AnalysisContext, BillAnalyzer, BillDocument } from "./bill-analyzer.js";
import { SYSTEM_INSTRUCTION, buildAnalysisPrompt } from "./prompts.js";
import { parseAnalysisResponse } from "./response-parser.js";

/** The slice of the Gemini models API this adapter calls */
export interface GenerateContentClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export function createGeminiClient(apiKey: string): GenerateContentClient {
  return new GoogleGenAI({ apiKey }).models;
}

export interface GeminiBillAnalyzerOptions {
  client: GenerateContentClient;
  model: string;
  timeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

/** Rejects after `ms` and aborts the signal handed to `run` */
function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new AnalysisUnavailableError(`model did not respond within ${ms}ms`));
      controller.abort();
    }, ms);
  });
  return Promise.race([run(controller.signal), timeout]).finally(() => clearTimeout(timer));
}

export class GeminiBillAnalyzer implements BillAnalyzer {
  private readonly now: () => Date;

  constructor(private readonly options: GeminiBillAnalyzerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async analyze(bill: BillDocument, context: AnalysisContext): Promise<BillAnalysis> {
    const { client, model, timeoutMs, logger } = this.options;
    const started = Date.now();

    let text: string | undefined;
    try {
      const response = await withTimeout(
        (signal) => client.generateContent({
          model,
          contents: [
            {
              role: "user",
              parts: [
                {
                  inlineData: {
                    data: Buffer.from(bill.data).toString("base64"),
                    mimeType: bill.mimeType,
                  },
                },
                { text: buildAnalysisPrompt(context, this.now()) },
              ],
            },
          ],
          config: {
            systemInstruction: SYSTEM_INSTRUCTION,
            responseMimeType: "application/json",
            temperature: 0.1,
            abortSignal: signal,
          },
        }),
        timeoutMs
      );
      text = response.text;
    } catch (error) {
      if (error instanceof AnalysisUnavailableError) throw error;
      throw new AnalysisUnavailableError(
        `model request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const analysis = parseAnalysisResponse(text, {
      model,
      analyzedAt: this.now().toISOString(),
    });
    logger?.debug(
      {
        filename: bill.filename,
        recommendation: analysis.recommendation,
        confidence: analysis.confidenceScore,
        latencyMs: Date.now() - started,
      },
      "Bill analysed"
    );
    return analysis;
  }
}
