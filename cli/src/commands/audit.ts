/**
 * steward audit: non-interactive security audit
 *
 * Collects facts through the tool registry (each call vetted like any
 * agent action), asks the generation service for a Markdown report and
 * saves it.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Policy } from '../core/policy.js';
import type { ToolArgs, ToolResult } from '../core/types.js';
import type { GenerationClient } from '../generation/client.js';
import type { ToolName, ToolRegistry } from '../tools/index.js';
import { createSession, loadReadyConfig } from './session.js';

interface AuditCommandOptions {
  output: string;
}

interface AuditCall {
  key: string;
  name: ToolName;
  args: ToolArgs;
}

const AUDIT_CALLS: readonly AuditCall[] = [
  { key: 'check_policies', name: 'check_policies', args: {} },
  { key: 'list_packages', name: 'list_packages', args: {} },
  { key: 'get_cpu_info', name: 'get_cpu_info', args: {} },
  { key: 'get_memory_info', name: 'get_memory_info', args: {} },
];

/** Last ten critical, error and warning events from the Security log. */
const WINDOWS_AUDIT_CALLS: readonly AuditCall[] = [
  {
    key: 'windows_security_events',
    name: 'read_windows_event_log',
    args: { log_name: 'Security', event_count: 10, event_type: ['Critical', 'Error', 'Warning'] },
  },
];

export async function collectAuditData(
  tools: ToolRegistry,
  policy: Policy,
  platform: NodeJS.Platform = process.platform,
): Promise<Record<string, unknown>> {
  const data: Record<string, unknown> = {
    os_info: {
      platform: os.platform(),
      release: os.release(),
      version: os.version(),
      arch: os.arch(),
      hostname: os.hostname(),
    },
  };

  const calls = platform === 'win32' ? [...AUDIT_CALLS, ...WINDOWS_AUDIT_CALLS] : AUDIT_CALLS;
  for (const { key, name, args } of calls) {
    console.log(`  [audit] Collecting ${key}...`);
    const verdict = policy.vet({ kind: 'tool', name, args }, tools);
    const result: ToolResult = verdict.allowed
      ? await tools.invoke(name, args)
      : { success: false, error: verdict.reason };
    if (!result.success) {
      console.error(`  [audit] ${key} failed: ${String(result.error ?? 'unknown error')}`);
    }
    data[key] = result;
  }

  return data;
}

export async function writeAuditReport(
  generator: GenerationClient,
  data: Record<string, unknown>,
  outputPath: string,
): Promise<boolean> {
  console.log('  [audit] Generating report...');
  const result = await generator.auditReport(data);

  if (!result.ok) {
    console.error(`  ❌ Could not generate the audit report: ${result.error}`);
    if (result.raw) {
      console.error(`  Raw response: ${result.raw}`);
    }
    return false;
  }

  console.log('');
  console.log(result.report);
  console.log('');
  fs.writeFileSync(outputPath, result.report, 'utf-8');
  console.log(`  ✅ Report saved to ${outputPath}`);
  return true;
}

export async function auditCommand(options: AuditCommandOptions): Promise<void> {
  const config = loadReadyConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const session = createSession(config, { autoApprove: true });
  const data = await collectAuditData(session.tools, session.policy);
  const saved = await writeAuditReport(session.generator, data, path.resolve(options.output));
  if (!saved) process.exitCode = 1;
}
