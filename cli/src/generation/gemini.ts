/**
 * GeminiClient: GenerationClient over the Gemini generateContent REST API
 *
 * One request per call; no chat session is kept. Transport failures,
 * non-2xx statuses and empty candidates are raised internally as
 * GenerationError and turned into error proposals before returning, so
 * callers never see an exception.
 */

import { z } from 'zod';
import type { Proposal } from '../core/types.js';
import {
  GenerationError,
  decodeAuditReport,
  decodeProposal,
  type AuditReportResult,
  type CorrectionRequest,
  type GenerationClient,
  type NextActionRequest,
} from './client.js';
import { auditReportPrompt, correctionPrompt, nextActionPrompt, type ToolDescriptor } from './prompts.js';

const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
const DEFAULT_TIMEOUT_MS = 120_000;

export const GENERATION_CONFIG = {
  temperature: 0.2,
  topP: 0.95,
  topK: 40,
  responseMimeType: 'application/json',
} as const;

const ResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
    finishReason: z.string().optional(),
  })).default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

const ErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

export interface GeminiOptions {
  apiKey: string;
  model: string;
  tools: ToolDescriptor[];
  fetch?: typeof fetch;
  baseUrl?: string;
  timeoutMs?: number;
}

export class GeminiClient implements GenerationClient {
  private apiKey: string;
  private model: string;
  private tools: ToolDescriptor[];
  private fetchFn: typeof fetch;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: GeminiOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.tools = options.tools;
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async nextAction(request: NextActionRequest): Promise<Proposal> {
    return this.propose(nextActionPrompt(request, this.tools));
  }

  async correction(request: CorrectionRequest): Promise<Proposal> {
    return this.propose(correctionPrompt(request, this.tools));
  }

  async auditReport(data: Record<string, unknown>): Promise<AuditReportResult> {
    try {
      return decodeAuditReport(await this.generate(auditReportPrompt(data)));
    } catch (err) {
      return { ok: false, ...describeError(err) };
    }
  }

  private async propose(prompt: string): Promise<Proposal> {
    try {
      const text = await this.generate(prompt);
      const proposal = decodeProposal(text);
      if (proposal.kind === 'error') {
        console.error(`  [gemini] Could not decode response: ${text.slice(0, 200)}`);
      }
      return proposal;
    } catch (err) {
      return { kind: 'error', ...describeError(err) };
    }
  }

  private async generate(prompt: string): Promise<string> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey,
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: GENERATION_CONFIG,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new GenerationError(`Gemini request failed: ${(err as Error).message}`);
    }

    const body = await response.text();
    if (!response.ok) {
      const detail = ErrorSchema.safeParse(safeJson(body));
      const message = detail.success ? detail.data.error.message : `HTTP ${response.status}`;
      throw new GenerationError(`Gemini API error (${response.status}): ${message}`, body);
    }

    const parsed = ResponseSchema.safeParse(safeJson(body));
    if (!parsed.success) {
      throw new GenerationError('Gemini API returned an unexpected payload', body);
    }

    const blockReason = parsed.data.promptFeedback?.blockReason;
    if (blockReason) {
      throw new GenerationError(`Gemini blocked the prompt: ${blockReason}`, body);
    }

    const text = (parsed.data.candidates[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');
    if (!text.trim()) {
      throw new GenerationError('Gemini returned no candidate text', body);
    }
    return text;
  }
}

function describeError(err: unknown): { error: string; raw?: string } {
  if (err instanceof GenerationError) {
    console.error(`  [gemini] ${err.message}`);
    return err.raw === undefined ? { error: err.message } : { error: err.message, raw: err.raw };
  }
  const message = err instanceof Error ? err.message : String(err);
  console.error(`  [gemini] ${message}`);
  return { error: message };
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
