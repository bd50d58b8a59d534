#!/usr/bin/env node

/**
 * steward: natural-language instructions turned into vetted local actions
 *
 * Usage:
 *   steward init [--model <name>] [-y]
 *   steward run [-y] <instruction...>
 *   steward agent [-y]
 *   steward audit [--output <file>]
 *   steward watch [--interval <seconds>] [--once]
 *   steward history [--limit <n>]
 *   steward policy show|check
 *   steward status
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { runCommand } from './commands/run.js';
import { agentCommand } from './commands/agent.js';
import { auditCommand } from './commands/audit.js';
import { watchCommand } from './commands/watch.js';
import { historyCommand } from './commands/history.js';
import { policyCommand } from './commands/policy.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('steward')
  .description('Turn natural-language instructions into policy-vetted shell commands and tool calls')
  .version('0.1.0');

// steward init
program
  .command('init')
  .description('Create ~/.steward with config.yml and profile.yml')
  .option('--model <name>', 'Generation model to use')
  .option('-y, --yes', 'Do not prompt for the API key', false)
  .action(initCommand);

// steward run <instruction...>
program
  .command('run')
  .description('Carry out a single instruction')
  .option('-y, --yes', 'Run proposed actions without asking', false)
  .argument('<instruction...>', 'What to do, in plain language')
  .action(runCommand);

// steward agent
program
  .command('agent')
  .description('Start an interactive session')
  .option('-y, --yes', 'Run proposed actions without asking', false)
  .action(agentCommand);

// steward audit
program
  .command('audit')
  .description('Collect system facts and write a security audit report')
  .option('--output <file>', 'Where to save the report', 'security_audit_report.md')
  .action(auditCommand);

// steward watch
program
  .command('watch')
  .description('Check compliance policies on a timer')
  .option('--interval <seconds>', 'Seconds between checks (default: watch.interval_seconds)')
  .option('--once', 'Run one check and exit', false)
  .action(watchCommand);

// steward history
program
  .command('history')
  .description('Show recent history entries')
  .option('--limit <n>', 'Number of entries to show', '20')
  .action(historyCommand);

// steward policy
const policy = program
  .command('policy')
  .description('Inspect the security policy');

policy
  .command('show')
  .description('Show the effective security policy')
  .action(() => policyCommand('show'));

policy
  .command('check')
  .description('Run the compliance policy check once')
  .action(() => policyCommand('check'));

// steward status
program
  .command('status')
  .description('Show configuration and history status')
  .action(statusCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`  ❌ ${(err as Error).message}`);
  process.exitCode = 1;
});
