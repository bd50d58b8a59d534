/**
 * steward watch: periodic policy check
 *
 * Runs check_policies on a timer through a registry of its own. It
 * never shares an orchestrator, history or retry counter with an
 * interactive session.
 */

import { loadConfig } from '../config/config.js';
import { createToolContext, createToolRegistry, type ToolRegistry } from '../tools/index.js';

interface WatchCommandOptions {
  interval?: string;
  once?: boolean;
}

export interface PolicyCheckOutcome {
  ok: boolean;
  violations: number;
  message: string;
}

export async function runPolicyCheck(tools: ToolRegistry): Promise<PolicyCheckOutcome> {
  const result = await tools.invoke('check_policies', {});
  const stamp = new Date().toISOString();

  if (!result.success) {
    const message = typeof result.error === 'string' ? result.error : 'check_policies failed';
    console.error(`  [watch] ${stamp} ❌ ${message}`);
    return { ok: false, violations: 0, message };
  }

  const violations = Array.isArray(result.violations) ? result.violations : [];
  const message = typeof result.message === 'string' ? result.message : '';
  console.log(`  [watch] ${stamp} ${violations.length === 0 ? '✅' : '⚠️ '} ${message}`);
  for (const violation of violations) {
    console.log(`  [watch]   - ${JSON.stringify(violation)}`);
  }
  return { ok: true, violations: violations.length, message };
}

export async function watchCommand(options: WatchCommandOptions): Promise<void> {
  const config = loadConfig();
  const tools = createToolRegistry(createToolContext(config));

  if (options.once) {
    const outcome = await runPolicyCheck(tools);
    if (!outcome.ok || outcome.violations > 0) process.exitCode = 1;
    return;
  }

  const parsed = options.interval === undefined ? NaN : Number.parseInt(options.interval, 10);
  const intervalSeconds = Number.isFinite(parsed) && parsed > 0 ? parsed : config.watchIntervalSeconds;
  console.log(`  [watch] Checking policies every ${intervalSeconds}s. Press Ctrl+C to stop.`);

  let running = false;
  const tick = async (): Promise<void> => {
    if (running) return;
    running = true;
    try {
      await runPolicyCheck(tools);
    } finally {
      running = false;
    }
  };

  await tick();
  const timer = setInterval(() => {
    tick().catch((err: unknown) => {
      console.error(`  [watch] Check failed: ${(err as Error).message}`);
    });
  }, intervalSeconds * 1000);

  process.once('SIGINT', () => {
    clearInterval(timer);
    console.log('');
    console.log('  [watch] Stopped.');
  });
}
