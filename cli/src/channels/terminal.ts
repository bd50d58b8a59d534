/**
 * Terminal Confirmer
 *
 * Displays a proposed action in the terminal and waits for the user to
 * approve, skip, cancel or type a replacement instruction.
 */

import readline from 'node:readline';
import { parseDecision, type ConfirmDecision, type ConfirmRequest, type Confirmer } from '../core/channel.js';

export class TerminalConfirmer implements Confirmer {
  async confirm(request: ConfirmRequest): Promise<ConfirmDecision> {
    console.log('');
    console.log('  ════════════════════════════════════════════════════');
    console.log(request.attempt === 0
      ? '    PROPOSED ACTION'
      : `    PROPOSED CORRECTION (attempt ${request.attempt})`);
    console.log('  ════════════════════════════════════════════════════');
    console.log(formatAction(request).join('\n'));
    console.log('  ════════════════════════════════════════════════════');
    console.log('');

    const answer = await prompt('  Run it? [Y]es / [s]kip / [q]uit step / or type new instructions: ');
    const decision: ConfirmDecision = answer === null ? { kind: 'cancel' } : parseDecision(answer);

    switch (decision.kind) {
      case 'approve':
        console.log('  ✅ Approved');
        break;
      case 'skip':
        console.log('  ⏭  Skipped');
        break;
      case 'cancel':
        console.log('  ❌ Cancelled');
        break;
      case 'override':
        console.log('  ✏️  Regenerating with your instructions');
        break;
    }
    return decision;
  }
}

export function formatAction(request: Pick<ConfirmRequest, 'action' | 'explanation'>): string[] {
  const lines: string[] = [];
  const { action } = request;

  if (action.kind === 'shell') {
    lines.push('    Commands:');
    for (const command of action.commands) {
      lines.push(`      $ ${command}`);
    }
  } else {
    lines.push(`    Tool:     ${action.name}`);
    if (Object.keys(action.args).length > 0) {
      lines.push('    Arguments:');
      lines.push(...JSON.stringify(action.args, null, 2).split('\n').map((line) => '      ' + line));
    }
  }

  if (request.explanation) {
    lines.push('  ────────────────────────────────────────────────────');
    lines.push(`    ${request.explanation}`);
  }
  return lines;
}

/** Ask one question; resolves null when stdin closes first. */
export function prompt(question: string): Promise<string | null> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    let answered = false;
    rl.on('close', () => {
      if (!answered) resolve(null);
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}
