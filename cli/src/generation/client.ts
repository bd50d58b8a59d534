/**
 * Generation Client: the contract with the text-generation service
 *
 * The service is stateless from the agent's point of view: every request
 * carries the full rendered transcript. Responses come back as model text
 * and go through decodeProposal(), which is the only way model output
 * becomes a Proposal. Anything that does not decode is an error proposal,
 * never a silent "no action".
 */

import { z } from 'zod';
import type { Proposal } from '../core/types.js';

export interface NextActionRequest {
  transcript: string;
  instruction: string;
}

export interface CorrectionRequest {
  transcript: string;
  /** Human-readable description of the action that failed. */
  failedAction: string;
  stdout: string;
  stderr: string;
  overrideInstruction?: string;
}

export type AuditReportResult =
  | { ok: true; report: string }
  | { ok: false; error: string; raw?: string };

export interface GenerationClient {
  nextAction(request: NextActionRequest): Promise<Proposal>;
  correction(request: CorrectionRequest): Promise<Proposal>;
  auditReport(data: Record<string, unknown>): Promise<AuditReportResult>;
}

/** Transport or protocol failure inside a client adapter. */
export class GenerationError extends Error {
  readonly raw?: string;

  constructor(message: string, raw?: string) {
    super(message);
    this.name = 'GenerationError';
    this.raw = raw;
  }
}

export const INVALID_RESPONSE = 'invalid response';

export const ProposalSchema = z.object({
  commands: z.array(z.string()).nullish(),
  tool: z.string().nullish(),
  tool_args: z.record(z.unknown()).nullish(),
  explanation: z.string().nullish(),
});

const AuditReportSchema = z.object({
  report: z.string().min(1),
});

export function decodeProposal(text: string): Proposal {
  const json = parseJson(text);
  if (json === undefined) {
    return { kind: 'error', error: INVALID_RESPONSE, raw: text };
  }

  const parsed = ProposalSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: 'error', error: INVALID_RESPONSE, raw: text };
  }

  const { tool_args, explanation } = parsed.data;
  const commands = parsed.data.commands ?? [];
  const tool = parsed.data.tool?.trim() ?? '';
  const why = explanation ?? '';

  if (tool && commands.length > 0) {
    return { kind: 'error', error: INVALID_RESPONSE, raw: text };
  }
  if (tool) {
    return { kind: 'action', action: { kind: 'tool', name: tool, args: tool_args ?? {} }, explanation: why };
  }
  if (commands.length > 0) {
    return { kind: 'action', action: { kind: 'shell', commands }, explanation: why };
  }
  return { kind: 'none', explanation: why };
}

export function decodeAuditReport(text: string): AuditReportResult {
  const parsed = AuditReportSchema.safeParse(parseJson(text));
  if (!parsed.success) {
    return { ok: false, error: INVALID_RESPONSE, raw: text };
  }
  return { ok: true, report: parsed.data.report };
}

/** Parse model text as JSON, or the body of a reply that is a single Markdown code fence. */
export function parseJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    // fall through to a fenced reply
  }

  const fenced = /^\s*```(?:json)?\s*([\s\S]*?)\s*```\s*$/i.exec(text);
  if (!fenced) return undefined;
  try {
    return JSON.parse(fenced[1]);
  } catch {
    return undefined;
  }
}
