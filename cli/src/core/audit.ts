/**
 * AuditLog: append-only JSONL history file
 *
 * Every history entry of every session is written as a single JSON line.
 * The file outlives the process; nothing reads it back into a session.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { actionTag } from './history.js';
import type { HistoryEntry } from './types.js';

export interface AuditRecord {
  timestamp: string;
  session: string;
  tag: string;
  entry: HistoryEntry;
}

const ActionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('shell'), commands: z.array(z.string()) }),
  z.object({ kind: z.literal('tool'), name: z.string(), args: z.record(z.unknown()) }),
]);

const HistoryActionSchema = z.union([
  ActionSchema,
  z.object({ kind: z.enum(['user_instruction', 'none']) }),
  z.object({ kind: z.enum(['skip', 'denied']), action: ActionSchema }),
]);

const ExecutionResultSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('shell'),
    success: z.boolean(),
    results: z.array(z.object({
      command: z.string(),
      success: z.boolean(),
      exitCode: z.number().nullable(),
      stdout: z.string(),
      stderr: z.string(),
    })),
  }),
  z.object({
    kind: z.literal('tool'),
    success: z.boolean(),
    data: z.object({ success: z.boolean(), error: z.string().optional() }).passthrough(),
  }),
  z.object({ kind: z.literal('note'), success: z.boolean(), message: z.string().optional() }),
]);

const AuditRecordSchema: z.ZodType<AuditRecord, z.ZodTypeDef, unknown> = z.object({
  timestamp: z.string(),
  session: z.string(),
  tag: z.string(),
  entry: z.object({
    stepLabel: z.string(),
    action: HistoryActionSchema,
    explanation: z.string(),
    result: ExecutionResultSchema,
    timestamp: z.string().optional(),
  }),
});

export interface AuditLog {
  append(entry: HistoryEntry): void;
}

export class FileAuditLog implements AuditLog {
  private logPath: string;
  private session: string;

  constructor(logPath: string, session: string) {
    this.logPath = logPath;
    this.session = session;
  }

  append(entry: HistoryEntry): void {
    const record: AuditRecord = {
      timestamp: entry.timestamp ?? new Date().toISOString(),
      session: this.session,
      tag: actionTag(entry.action),
      entry,
    };
    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    fs.appendFileSync(this.logPath, JSON.stringify(record) + '\n', 'utf-8');
  }
}

/** In-memory log for sessions that persist nothing. */
export class MemoryAuditLog implements AuditLog {
  readonly records: HistoryEntry[] = [];

  append(entry: HistoryEntry): void {
    this.records.push(entry);
  }
}

/**
 * Read the last `limit` records. Lines that do not decode as records are
 * skipped and counted.
 */
export function readAuditLog(logPath: string, limit?: number): { records: AuditRecord[]; skipped: number } {
  if (!fs.existsSync(logPath)) {
    return { records: [], skipped: 0 };
  }

  const lines = fs.readFileSync(logPath, 'utf-8').split('\n').filter(Boolean);
  const records: AuditRecord[] = [];
  let skipped = 0;

  for (const line of lines) {
    const record = parseRecord(line);
    if (record) records.push(record);
    else skipped += 1;
  }

  return {
    records: limit !== undefined && limit > 0 ? records.slice(-limit) : records,
    skipped,
  };
}

function parseRecord(line: string): AuditRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  const result = AuditRecordSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
