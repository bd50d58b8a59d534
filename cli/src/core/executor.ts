/**
 * Sequential Command Executor
 *
 * Runs an ordered list of command lines one at a time and stops after the
 * first one that exits non-zero. Later commands are never started, so the
 * result list is shorter than the input exactly when something failed.
 *
 * On POSIX a command line is tokenized with shell quoting rules and exec'd
 * directly (no globbing, no variable expansion, no pipes). On Windows the
 * command line is handed to the platform shell.
 */

import { runProcess, type ProcessRunner } from './process.js';
import type { CommandResult } from './types.js';

export interface ExecutorOptions {
  runner?: ProcessRunner;
  platform?: NodeJS.Platform;
  cwd?: string;
}

export class CommandExecutor {
  private runner: ProcessRunner;
  private platform: NodeJS.Platform;
  private cwd?: string;

  constructor(options: ExecutorOptions = {}) {
    this.runner = options.runner ?? runProcess;
    this.platform = options.platform ?? process.platform;
    this.cwd = options.cwd;
  }

  async executeAll(commands: string[]): Promise<CommandResult[]> {
    const results: CommandResult[] = [];

    for (const command of commands) {
      const result = await this.execute(command);
      results.push(result);

      if (!result.success) {
        console.log(`  [executor] Stopping after failed command: ${command}`);
        break;
      }
    }

    return results;
  }

  async execute(command: string): Promise<CommandResult> {
    console.log(`  [executor] Running: ${command}`);

    let output;
    if (this.platform === 'win32') {
      if (command.trim().length === 0) {
        return failed(command, 'Empty command');
      }
      output = await this.runner(command, [], { shell: true, cwd: this.cwd });
    } else {
      const parsed = tokenizeCommand(command);
      if (!parsed.ok) {
        return failed(command, parsed.error);
      }
      if (parsed.tokens.length === 0) {
        return failed(command, 'Empty command');
      }
      const [file, ...args] = parsed.tokens;
      output = await this.runner(file, args, { cwd: this.cwd });
    }

    const success = output.exitCode === 0;
    if (!success) {
      console.log(`  [executor] Exit ${output.exitCode ?? 'n/a'}: ${command}`);
    }

    return {
      command,
      success,
      exitCode: output.exitCode,
      stdout: output.stdout,
      stderr: output.error && !output.stderr ? output.error : output.stderr,
    };
  }
}

function failed(command: string, error: string): CommandResult {
  return { command, success: false, exitCode: null, stdout: '', stderr: error };
}

export type TokenizeResult =
  | { ok: true; tokens: string[] }
  | { ok: false; error: string };

/**
 * Split a command line into words following POSIX shell quoting:
 * single quotes are literal, double quotes allow \" \\ \$ \` escapes,
 * a backslash outside quotes escapes the next character.
 */
export function tokenizeCommand(line: string): TokenizeResult {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (quote === "'") {
      if (char === "'") quote = null;
      else current += char;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else if (char === '\\' && i + 1 < line.length && '"\\$`'.includes(line[i + 1])) {
        current += line[++i];
      } else {
        current += char;
      }
      continue;
    }

    if (char === '\\') {
      if (i + 1 >= line.length) {
        return { ok: false, error: 'Cannot tokenize command: trailing backslash' };
      }
      current += line[++i];
      inToken = true;
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
      continue;
    }

    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    current += char;
    inToken = true;
  }

  if (quote) {
    return { ok: false, error: `Cannot tokenize command: unterminated ${quote === '"' ? 'double' : 'single'} quote` };
  }
  if (inToken) tokens.push(current);

  return { ok: true, tokens };
}
