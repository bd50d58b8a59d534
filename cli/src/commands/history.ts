/**
 * steward history: print the persisted history log
 */

import { loadConfig } from '../config/config.js';
import { readAuditLog } from '../core/audit.js';
import { renderEntry } from '../core/history.js';

interface HistoryCommandOptions {
  limit?: string;
}

export async function historyCommand(options: HistoryCommandOptions): Promise<void> {
  const config = loadConfig();
  const limit = options.limit === undefined ? 20 : Number.parseInt(options.limit, 10);
  if (!Number.isFinite(limit) || limit <= 0) {
    console.error(`  ❌ Invalid --limit: ${options.limit}`);
    process.exitCode = 1;
    return;
  }

  const { records, skipped } = readAuditLog(config.historyFile, limit);
  if (records.length === 0) {
    console.log(`  No history yet (${config.historyFile})`);
    return;
  }

  console.log('');
  let session = '';
  for (const record of records) {
    if (record.session !== session) {
      session = record.session;
      console.log(`  ── session ${session} ──`);
    }
    console.log(`  ${record.timestamp}  [${record.tag}]`);
    console.log(`    ${renderEntry(record.entry, config.outputLimit)}`);
  }
  if (skipped > 0) {
    console.log(`  (${skipped} unreadable line(s) skipped)`);
  }
  console.log('');
}
