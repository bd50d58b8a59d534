/**
 * Child process spawning
 *
 * Runs one program to completion with captured stdout/stderr:
 * - Environment inherited from the parent
 * - No stdin forwarded (the agent is not interactive with its children)
 * - Spawn errors (ENOENT, EACCES) come back as a result, never thrown
 */

import { spawn } from 'node:child_process';

export interface ProcessOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started or was killed by a signal. */
  error?: string;
}

export interface ProcessOptions {
  cwd?: string;
  /** Hand the command line to the platform shell instead of exec'ing it. */
  shell?: boolean;
}

export type ProcessRunner = (
  file: string,
  args: string[],
  options?: ProcessOptions,
) => Promise<ProcessOutput>;

export const runProcess: ProcessRunner = (file, args, options = {}) => {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (output: ProcessOutput): void => {
      if (settled) return;
      settled = true;
      resolve(output);
    };

    const spawnChild = () => spawn(file, args, {
      cwd: options.cwd ?? process.cwd(),
      env: process.env,
      shell: options.shell ?? false,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let child: ReturnType<typeof spawnChild>;
    try {
      child = spawnChild();
    } catch (err) {
      // Invalid arguments (e.g. a NUL byte) throw synchronously
      const message = (err as Error).message;
      finish({ exitCode: null, stdout: '', stderr: message, error: message });
      return;
    }

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });

    child.on('error', (err) => {
      finish({ exitCode: null, stdout, stderr: stderr || err.message, error: err.message });
    });

    child.on('close', (code, signal) => {
      if (code === null) {
        const reason = `Terminated by signal ${signal ?? 'unknown'}`;
        finish({ exitCode: null, stdout, stderr: stderr || reason, error: reason });
        return;
      }
      finish({ exitCode: code, stdout, stderr });
    });
  });
};
