/**
 * Tool Registry
 *
 * A closed set of tool names, each bound to exactly one definition:
 * security scope, optional path argument, argument schema and handler.
 * The registry is checked when it is built; lookups by an unknown name
 * produce a failed result instead of throwing.
 *
 * Handlers never throw to the caller. Invalid arguments and handler
 * exceptions both come back as { success: false, error }.
 */

import type { z } from 'zod';
import type { ProcessRunner } from '../core/process.js';
import type { ToolScope, ToolScopes } from '../core/policy.js';
import type { SecurityScope, ToolArgs, ToolResult } from '../core/types.js';
import type { ProfileStore } from '../config/profile.js';

export const TOOL_NAMES = [
  'read_file',
  'write_file',
  'list_files',
  'monitor_file',
  'get_cpu_info',
  'get_memory_info',
  'get_disk_usage',
  'list_processes',
  'list_packages',
  'install_package',
  'uninstall_package',
  'check_policies',
  'manage_profile',
  'web_search',
  'web_scrape',
  'read_windows_event_log',
] as const;

export type ToolName = typeof TOOL_NAMES[number];

export interface ToolContext {
  runner: ProcessRunner;
  fetch: typeof fetch;
  profile: ProfileStore;
  search: { apiKey: string; engineId: string };
  platform: NodeJS.Platform;
  /** Poll interval for monitor_file. */
  pollIntervalMs: number;
}

export interface ToolDefinition<A> {
  name: ToolName;
  scope: SecurityScope;
  pathArg?: string;
  /** Call signature shown to the model, e.g. `read_file(file_path: string)`. */
  signature: string;
  description: string;
  args: z.ZodType<A, z.ZodTypeDef, unknown>;
  handler: (args: A, ctx: ToolContext) => Promise<ToolResult>;
}

export interface RegisteredTool {
  name: ToolName;
  scope: SecurityScope;
  pathArg?: string;
  signature: string;
  description: string;
  invoke(args: unknown, ctx: ToolContext): Promise<ToolResult>;
}

export type ToolOverride = (args: ToolArgs, ctx: ToolContext) => Promise<ToolResult>;

/** Erase a definition's argument type behind schema validation. */
export function defineTool<A>(definition: ToolDefinition<A>): RegisteredTool {
  const { handler, args: schema, ...meta } = definition;
  return {
    ...meta,
    async invoke(args, ctx) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        return { success: false, error: `Invalid arguments for '${definition.name}': ${formatIssues(parsed.error)}` };
      }
      return guard(definition.name, () => handler(parsed.data, ctx));
    },
  };
}

export interface RegistryOptions {
  /** Replace handlers by name, keeping the declared scope. */
  overrides?: Partial<Record<ToolName, ToolOverride>>;
}

export class ToolRegistry implements ToolScopes {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly ctx: ToolContext;
  private readonly overrides: Partial<Record<ToolName, ToolOverride>>;

  constructor(definitions: RegisteredTool[], ctx: ToolContext, options: RegistryOptions = {}) {
    for (const tool of definitions) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Tool '${tool.name}' is defined more than once`);
      }
      if ((tool.scope === 'filesystem_read' || tool.scope === 'filesystem_write') && !tool.pathArg) {
        throw new Error(`Tool '${tool.name}' touches the filesystem but declares no path argument`);
      }
      this.tools.set(tool.name, tool);
    }

    const missing = TOOL_NAMES.filter((name) => !this.tools.has(name));
    if (missing.length > 0) {
      throw new Error(`Tools without a definition: ${missing.join(', ')}`);
    }

    this.ctx = ctx;
    this.overrides = options.overrides ?? {};
  }

  has(name: string): name is ToolName {
    return this.tools.has(name);
  }

  scopeOf(name: string): ToolScope | undefined {
    const tool = this.tools.get(name);
    return tool ? { scope: tool.scope, pathArg: tool.pathArg } : undefined;
  }

  list(): RegisteredTool[] {
    return TOOL_NAMES.flatMap((name) => {
      const tool = this.tools.get(name);
      return tool ? [tool] : [];
    });
  }

  async invoke(name: string, args: ToolArgs): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool || !this.has(name)) {
      return { success: false, error: `Tool '${name}' not found.` };
    }

    const override = this.overrides[name];
    if (override) {
      return guard(name, () => override(args, this.ctx));
    }
    return tool.invoke(args, this.ctx);
  }
}

async function guard(name: string, run: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    const result = await run();
    return typeof result.success === 'boolean'
      ? result
      : { ...result, success: false, error: `Tool '${name}' returned no success flag` };
  } catch (err) {
    return { success: false, error: `Tool '${name}' failed: ${(err as Error).message}` };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'args'}: ${issue.message}`)
    .join('; ');
}
