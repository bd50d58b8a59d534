import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileAuditLog, MemoryAuditLog, readAuditLog } from '../core/audit.js';
import type { HistoryEntry } from '../core/types.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'steward-audit-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function entry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    stepLabel: 'list files',
    action: { kind: 'tool', name: 'list_files', args: { path: '.' } },
    explanation: 'List the current directory',
    result: { kind: 'tool', success: true, data: { success: true, items: [] } },
    timestamp: '2026-03-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('FileAuditLog', () => {
  it('writes one JSON line per entry, creating the directory', () => {
    const logPath = path.join(tmpDir, 'nested', 'history.jsonl');
    const log = new FileAuditLog(logPath, 'session-1');

    log.append(entry());
    log.append(entry({ action: { kind: 'shell', commands: ['ls'] }, result: { kind: 'shell', success: true, results: [] } }));

    const lines = fs.readFileSync(logPath, 'utf-8').trim().split('\n');
    assert.strictEqual(lines.length, 2);

    const first = JSON.parse(lines[0]);
    assert.strictEqual(first.session, 'session-1');
    assert.strictEqual(first.tag, 'tool:list_files');
    assert.strictEqual(first.timestamp, '2026-03-01T10:00:00.000Z');
    assert.deepStrictEqual(first.entry.action, { kind: 'tool', name: 'list_files', args: { path: '.' } });
    assert.strictEqual(JSON.parse(lines[1]).tag, 'shell');
  });

  it('appends to an existing file instead of replacing it', () => {
    const logPath = path.join(tmpDir, 'history.jsonl');
    new FileAuditLog(logPath, 'a').append(entry());
    new FileAuditLog(logPath, 'b').append(entry());

    const { records } = readAuditLog(logPath);
    assert.deepStrictEqual(records.map((r) => r.session), ['a', 'b']);
  });
});

describe('readAuditLog', () => {
  it('returns nothing for a missing file', () => {
    assert.deepStrictEqual(readAuditLog(path.join(tmpDir, 'none.jsonl')), { records: [], skipped: 0 });
  });

  it('keeps the last records when a limit is given', () => {
    const logPath = path.join(tmpDir, 'history.jsonl');
    const log = new FileAuditLog(logPath, 's');
    for (const label of ['one', 'two', 'three']) {
      log.append(entry({ stepLabel: label }));
    }

    const { records } = readAuditLog(logPath, 2);
    assert.deepStrictEqual(records.map((r) => r.entry.stepLabel), ['two', 'three']);
  });

  it('skips and counts lines that are not records', () => {
    const logPath = path.join(tmpDir, 'history.jsonl');
    new FileAuditLog(logPath, 's').append(entry());
    fs.appendFileSync(logPath, 'not json\n{"timestamp":"x"}\n');

    const { records, skipped } = readAuditLog(logPath);
    assert.strictEqual(records.length, 1);
    assert.strictEqual(skipped, 2);
  });

  it('decodes skip and denied entries', () => {
    const logPath = path.join(tmpDir, 'history.jsonl');
    const log = new FileAuditLog(logPath, 's');
    log.append(entry({
      action: { kind: 'denied', action: { kind: 'shell', commands: ['rm -rf /'] } },
      result: { kind: 'note', success: false, message: "Command 'rm' is blacklisted by the security policy." },
    }));

    const { records, skipped } = readAuditLog(logPath);
    assert.strictEqual(skipped, 0);
    assert.strictEqual(records[0].tag, 'denied_shell');
  });
});

describe('MemoryAuditLog', () => {
  it('keeps entries in order', () => {
    const log = new MemoryAuditLog();
    log.append(entry({ stepLabel: 'a' }));
    log.append(entry({ stepLabel: 'b' }));

    assert.deepStrictEqual(log.records.map((r) => r.stepLabel), ['a', 'b']);
  });
});
