/**
 * Package management through the platform's package manager:
 * choco on Windows, apt on Linux, brew on macOS.
 */

import { z } from 'zod';
import { defineTool, type ToolContext } from './registry.js';
import type { ToolResult } from '../core/types.js';

type PackageOp = 'install' | 'uninstall' | 'list';

const PACKAGE_NAME = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._+:@-]*$/, 'not a valid package name');

export function packageCommand(platform: NodeJS.Platform, op: PackageOp, name = ''): string[] | null {
  switch (platform) {
    case 'win32':
      if (op === 'list') return ['choco', 'list'];
      return ['choco', op, name, '-y'];
    case 'linux':
      if (op === 'list') return ['apt', 'list', '--installed'];
      return ['sudo', 'apt-get', op === 'install' ? 'install' : 'remove', '-y', name];
    case 'darwin':
      if (op === 'list') return ['brew', 'list'];
      return ['brew', op, name];
    default:
      return null;
  }
}

async function runPackageCommand(ctx: ToolContext, op: PackageOp, name?: string): Promise<ToolResult & { stdout?: string }> {
  const command = packageCommand(ctx.platform, op, name);
  if (!command) {
    return { success: false, error: `Unsupported operating system: ${ctx.platform}` };
  }

  const [file, ...args] = command;
  const output = await ctx.runner(file, args);
  if (output.exitCode === 0) {
    return { success: true, stdout: output.stdout, stderr: output.stderr };
  }
  if (output.exitCode === null) {
    return {
      success: false,
      error: `Command not found: ${file}. Please ensure it is installed and in your PATH.`,
      stderr: output.stderr,
    };
  }
  return {
    success: false,
    error: `Command failed with exit code ${output.exitCode}`,
    stdout: output.stdout,
    stderr: output.stderr,
  };
}

export const installPackage = defineTool({
  name: 'install_package',
  scope: 'system_write',
  signature: 'install_package(name: string)',
  description: 'Installs a software package with the system package manager.',
  args: z.object({ name: PACKAGE_NAME }),
  async handler({ name }, ctx) {
    return runPackageCommand(ctx, 'install', name);
  },
});

export const uninstallPackage = defineTool({
  name: 'uninstall_package',
  scope: 'system_write',
  signature: 'uninstall_package(name: string)',
  description: 'Uninstalls a software package with the system package manager.',
  args: z.object({ name: PACKAGE_NAME }),
  async handler({ name }, ctx) {
    return runPackageCommand(ctx, 'uninstall', name);
  },
});

export const listPackages = defineTool({
  name: 'list_packages',
  scope: 'system_read',
  signature: 'list_packages(query?: string)',
  description: 'Lists installed packages, optionally only those whose line contains the query.',
  args: z.object({ query: z.string().optional() }),
  async handler({ query }, ctx) {
    const result = await runPackageCommand(ctx, 'list');
    if (!result.success || typeof result.stdout !== 'string') return result;

    const needle = query?.toLowerCase();
    const packages = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !/^Listing\.\.\./.test(line))
      .filter((line) => !needle || line.toLowerCase().includes(needle));

    return { success: true, count: packages.length, packages };
  },
});
