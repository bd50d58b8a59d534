/**
 * steward run <instruction...>: one step for a one-off instruction
 */

import type { StepReport } from '../core/agent.js';
import { createSession, loadReadyConfig } from './session.js';

interface RunOptions {
  yes?: boolean;
}

export async function runCommand(words: string[], options: RunOptions): Promise<void> {
  const instruction = words.join(' ').trim();
  if (!instruction) {
    console.error('  ❌ Usage: steward run <instruction...>');
    process.exitCode = 1;
    return;
  }

  const config = loadReadyConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const { agent } = createSession(config, { autoApprove: options.yes || undefined });
  agent.recordInstruction(instruction);
  const report = await agent.runStep(instruction);
  printReport(report);
  if (report.status === 'failed') process.exitCode = 1;
}

export function printReport(report: StepReport): void {
  switch (report.status) {
    case 'done':
      console.log(`  ✅ Done${report.corrections > 0 ? ` after ${report.corrections} correction(s)` : ''}`);
      return;
    case 'cancelled':
      console.log('  Step cancelled');
      return;
    case 'failed':
      console.error(`  ❌ ${describeFailure(report)}`);
  }
}

function describeFailure(report: StepReport): string {
  const failure = report.failure;
  if (!failure) return 'Step failed';

  switch (failure.kind) {
    case 'generation_error':
      return failure.raw
        ? `Generation failed: ${failure.message}\n    Raw response: ${failure.raw.slice(0, 500)}`
        : `Generation failed: ${failure.message}`;
    case 'policy_denied':
      return `Denied: ${failure.reason}`;
    case 'retry_budget_exhausted': {
      const { lastFailure } = failure;
      const detail = lastFailure.stderr || lastFailure.stdout || 'No output';
      return `Failed after ${report.corrections} correction(s): ${lastFailure.description}\n    ${detail.slice(0, 500)}`;
    }
  }
}
