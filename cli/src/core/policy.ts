/**
 * Policy: blocklist vetting for proposed actions
 *
 * Shell actions: every command's program name is checked against the
 * command blacklist, case-insensitively. The name is read the way the
 * executor will read it (quotes and escapes removed, directory dropped), so
 * `'rm'`, `\rm` and `/bin/rm` all match `rm`. One blacklisted command
 * denies the whole action. A command that does not tokenize is left to the
 * executor, which fails it without running anything.
 *
 * Tool actions: tools scoped to the filesystem have their path argument
 * resolved to an absolute path and checked against the file access
 * blacklist. A blacklisted entry covers itself and everything below it.
 *
 * Everything not explicitly denied is allowed. Vetting never touches the
 * filesystem beyond path-string normalization.
 *
 * Profile format (security section of profile.yml):
 *   security:
 *     command_blacklist: [rm, mkfs]
 *     file_access_blacklist: [/etc/shadow]
 *     allow_shell_commands: true
 *     allow_tool_usage: true
 */

import path from 'node:path';
import { tokenizeCommand } from './executor.js';
import type { Action, SecurityPolicy, SecurityScope, ShellAction, ToolAction, Verdict } from './types.js';

export interface ToolScope {
  scope: SecurityScope;
  pathArg?: string;
}

/** Scope lookup for tool actions; the tool registry implements it. */
export interface ToolScopes {
  scopeOf(name: string): ToolScope | undefined;
}

const FILESYSTEM_SCOPES: ReadonlySet<SecurityScope> = new Set(['filesystem_read', 'filesystem_write']);

export const DEFAULT_SECURITY_POLICY: SecurityPolicy = {
  commandBlacklist: ['rm', 'del', 'format', 'mkfs', 'shutdown', 'reboot'],
  fileAccessBlacklist: ['/etc/shadow', '/etc/passwd', 'C:\\Windows\\System32\\config'],
  allowShellCommands: true,
  allowToolUsage: true,
};

export class Policy {
  private readonly config: SecurityPolicy;
  private readonly platform: NodeJS.Platform;

  constructor(config: SecurityPolicy, platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
    this.config = {
      ...config,
      commandBlacklist: [...config.commandBlacklist],
      fileAccessBlacklist: [...config.fileAccessBlacklist],
    };
  }

  get settings(): SecurityPolicy {
    return this.config;
  }

  vet(action: Action, tools: ToolScopes): Verdict {
    return action.kind === 'shell'
      ? this.vetShell(action)
      : this.vetTool(action, tools);
  }

  private vetShell(action: ShellAction): Verdict {
    if (!this.config.allowShellCommands) {
      return { allowed: false, reason: 'Shell command execution is disabled by the security policy.' };
    }

    const blacklist = this.config.commandBlacklist.map((entry) => entry.toLowerCase());
    for (const command of action.commands) {
      const program = programName(command, this.platform);
      if (!program) continue;
      if (blacklist.includes(program.toLowerCase())) {
        return { allowed: false, reason: `Command '${program}' is blacklisted by the security policy.` };
      }
    }

    return { allowed: true, reason: 'Action is allowed.' };
  }

  private vetTool(action: ToolAction, tools: ToolScopes): Verdict {
    if (!this.config.allowToolUsage) {
      return { allowed: false, reason: 'Tool usage is disabled by the security policy.' };
    }

    const scope = tools.scopeOf(action.name);
    if (!scope || !FILESYSTEM_SCOPES.has(scope.scope) || !scope.pathArg) {
      return { allowed: true, reason: 'Action is allowed.' };
    }

    const requested = action.args[scope.pathArg];
    if (typeof requested !== 'string' || requested.length === 0) {
      return { allowed: true, reason: 'Action is allowed.' };
    }

    for (const blocked of this.config.fileAccessBlacklist) {
      if (isWithin(requested, blocked)) {
        return { allowed: false, reason: `Access to '${requested}' is restricted by the security policy.` };
      }
    }

    return { allowed: true, reason: 'Action is allowed.' };
  }
}

/**
 * Program name a command line runs, or null when there is none. POSIX lines
 * go through the executor's tokenizer; Windows lines take the first word or
 * quoted string and drop an executable extension.
 */
export function programName(command: string, platform: NodeJS.Platform): string | null {
  if (platform === 'win32') {
    const match = /^\s*(?:"([^"]*)"|(\S+))/.exec(command);
    const word = match ? (match[1] ?? match[2]) : '';
    const name = path.win32.basename(word).replace(/\.(exe|cmd|bat|com)$/i, '');
    return name || null;
  }

  const tokenized = tokenizeCommand(command);
  if (!tokenized.ok || tokenized.tokens.length === 0) return null;
  return path.posix.basename(tokenized.tokens[0]) || null;
}

/**
 * True when `candidate` resolves to `prefix` or to a path below it.
 * `/etc` covers `/etc/shadow` but not `/etcbackup/file`.
 */
export function isWithin(candidate: string, prefix: string): boolean {
  if (!prefix) return false;
  const fold = process.platform === 'win32'
    ? (value: string) => value.toLowerCase()
    : (value: string) => value;

  const target = fold(path.resolve(candidate));
  const base = fold(path.resolve(prefix));
  if (target === base) return true;

  const withSep = base.endsWith(path.sep) ? base : base + path.sep;
  return target.startsWith(withSep);
}

/**
 * Build a policy from the untyped `security` section of a profile.
 * Missing or mistyped fields take their defaults.
 */
export function parseSecurityPolicy(raw: unknown): SecurityPolicy {
  if (!isRecord(raw)) {
    return { ...DEFAULT_SECURITY_POLICY };
  }
  const section = raw;

  return {
    commandBlacklist: stringList(section.command_blacklist) ?? DEFAULT_SECURITY_POLICY.commandBlacklist,
    fileAccessBlacklist: stringList(section.file_access_blacklist) ?? DEFAULT_SECURITY_POLICY.fileAccessBlacklist,
    allowShellCommands: typeof section.allow_shell_commands === 'boolean'
      ? section.allow_shell_commands
      : DEFAULT_SECURITY_POLICY.allowShellCommands,
    allowToolUsage: typeof section.allow_tool_usage === 'boolean'
      ? section.allow_tool_usage
      : DEFAULT_SECURITY_POLICY.allowToolUsage,
  };
}

/** Inverse of parseSecurityPolicy, for writing profile.yml. */
export function serializeSecurityPolicy(policy: SecurityPolicy): Record<string, unknown> {
  return {
    command_blacklist: [...policy.commandBlacklist],
    file_access_blacklist: [...policy.fileAccessBlacklist],
    allow_shell_commands: policy.allowShellCommands,
    allow_tool_usage: policy.allowToolUsage,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}
