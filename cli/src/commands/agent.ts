/**
 * steward agent: interactive session
 *
 * Reads one instruction at a time until `quit` or `exit`. A failed step
 * is reported and the session moves on to the next instruction; only
 * the history carries over between steps.
 */

import { prompt } from '../channels/terminal.js';
import type { StepReport } from '../core/agent.js';
import { createSession, loadReadyConfig, type Session } from './session.js';
import { printReport } from './run.js';

interface AgentCommandOptions {
  yes?: boolean;
}

/** Asks one question; null means the input is closed. */
export type Ask = (question: string) => Promise<string | null>;

const EXIT_WORDS = new Set(['quit', 'exit']);

export async function agentCommand(options: AgentCommandOptions): Promise<void> {
  const config = loadReadyConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const session = createSession(config, { autoApprove: options.yes || undefined });

  console.log('');
  console.log('  steward agent');
  console.log('  ─────────────');
  console.log(`  Model:    ${config.model}`);
  console.log(`  Approval: ${options.yes || config.autoApprove ? 'automatic' : 'interactive'}`);
  console.log(`  History:  ${config.historyFile}`);
  console.log('  Type "quit" or "exit" to leave.');
  console.log('');

  await runInstructions(session, prompt);

  console.log(`  Session ${session.id} ended after ${session.history.size} history entries.`);
}

/**
 * Runs instructions until `quit`, `exit` or end of input and returns one
 * report per step. A failed step does not end the loop.
 */
export async function runInstructions(session: Pick<Session, 'agent' | 'history'>, ask: Ask): Promise<StepReport[]> {
  const reports: StepReport[] = [];

  for (;;) {
    const answer = await ask('  You: ');
    if (answer === null) break;

    const instruction = answer.trim();
    if (!instruction) continue;
    if (EXIT_WORDS.has(instruction.toLowerCase())) break;

    session.agent.recordInstruction(instruction);
    const report = await session.agent.runStep(instruction);
    reports.push(report);
    printReport(report);

    const last = session.history.entries().at(-1);
    if (report.status === 'done' && last?.action.kind === 'none' && last.explanation) {
      console.log('');
      console.log(`  ${last.explanation}`);
    }
    console.log('');
  }

  return reports;
}
