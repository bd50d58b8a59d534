/**
 * System tools: CPU, memory, disk, processes, compliance checks and the
 * Windows event log. Process listings and event logs come from the
 * platform's own utilities through the context's process runner.
 */

import fs from 'node:fs';
import os from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { defineTool, type ToolContext } from './registry.js';

const CPU_SAMPLE_MS = 500;
const GB = 1024 ** 3;

export const getCpuInfo = defineTool({
  name: 'get_cpu_info',
  scope: 'system_read',
  signature: 'get_cpu_info()',
  description: 'Gets CPU count, model, per-CPU usage and load average.',
  args: z.object({}),
  async handler() {
    const before = os.cpus();
    await sleep(CPU_SAMPLE_MS);
    const after = os.cpus();

    const perCpu = after.map((cpu, i) => {
      const prev = before[i];
      if (!prev) return 0;
      const busy = totalBusy(cpu.times) - totalBusy(prev.times);
      const total = busy + (cpu.times.idle - prev.times.idle);
      return total > 0 ? round((busy / total) * 100, 1) : 0;
    });

    return {
      success: true,
      cpu_count: after.length,
      model: after[0]?.model ?? 'unknown',
      cpu_percent_per_cpu: perCpu,
      load_average: os.loadavg().map((value) => round(value, 2)),
    };
  },
});

export const getMemoryInfo = defineTool({
  name: 'get_memory_info',
  scope: 'system_read',
  signature: 'get_memory_info()',
  description: 'Gets RAM usage, and swap usage where the platform reports it.',
  args: z.object({}),
  async handler(_args, ctx) {
    const total = os.totalmem();
    const free = os.freemem();

    return {
      success: true,
      virtual_memory: {
        total,
        free,
        used: total - free,
        percent: round(((total - free) / total) * 100, 1),
      },
      swap_memory: ctx.platform === 'linux' ? await readLinuxSwap() : null,
    };
  },
});

export const getDiskUsage = defineTool({
  name: 'get_disk_usage',
  scope: 'system_read',
  signature: 'get_disk_usage(path: string = "/")',
  description: "Gets disk usage for the filesystem holding a path (e.g. '/', 'C:\\').",
  args: z.object({ path: z.string().min(1).default('/') }),
  async handler({ path: target }) {
    let stats: fs.StatsFs;
    try {
      stats = await fs.promises.statfs(target);
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      return { success: false, error: code === 'ENOENT' ? `Path not found: ${target}` : (err as Error).message };
    }

    const total = stats.blocks * stats.bsize;
    const free = stats.bavail * stats.bsize;
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    const usable = used + free;

    return {
      success: true,
      total: `${(total / GB).toFixed(2)} GB`,
      used: `${(used / GB).toFixed(2)} GB`,
      free: `${(free / GB).toFixed(2)} GB`,
      percent_used: `${usable > 0 ? round((used / usable) * 100, 1) : 0}%`,
    };
  },
});

export const listProcesses = defineTool({
  name: 'list_processes',
  scope: 'system_read',
  signature: 'list_processes()',
  description: 'Lists the 20 running processes using the most memory.',
  args: z.object({}),
  async handler(_args, ctx) {
    const listing = await snapshotProcesses(ctx);
    if (!listing.ok) return { success: false, error: listing.error };

    const top = [...listing.processes]
      .sort((a, b) => b.rss_kb - a.rss_kb)
      .slice(0, 20);
    return { success: true, processes: top };
  },
});

export const checkPolicies = defineTool({
  name: 'check_policies',
  scope: 'system_read',
  signature: 'check_policies()',
  description: "Checks the system for compliance with the policies in the user's profile.",
  args: z.object({}),
  async handler(_args, ctx) {
    if (!ctx.profile.exists()) {
      return { success: true, violations: [], message: 'No profile found, no policies to check.' };
    }

    const rules = ctx.profile.complianceRules();
    if (rules.length === 0) {
      return { success: true, violations: [], message: 'No policies defined in profile.' };
    }

    const violations: Array<{ policy: string; details: string }> = [];
    const unsupported: string[] = [];

    for (const rule of rules) {
      if (!rule.enabled) continue;

      switch (rule.name) {
        case 'no_root_processes': {
          const listing = await snapshotProcesses(ctx);
          if (!listing.ok) {
            return { success: false, error: `Could not check '${rule.name}': ${listing.error}` };
          }
          for (const proc of listing.processes) {
            if (proc.user === 'root' || proc.user.toUpperCase() === 'SYSTEM') {
              violations.push({
                policy: rule.name,
                details: `Found root-level process: ${proc.name} (pid ${proc.pid}, user ${proc.user})`,
              });
            }
          }
          break;
        }
        default:
          unsupported.push(rule.name);
      }
    }

    const message = violations.length > 0
      ? `Found ${violations.length} policy violations.`
      : 'All checked policies are compliant.';
    return { success: true, violations, unsupported, message };
  },
});

const EVENT_LEVELS = { Critical: 1, Error: 2, Warning: 3, Information: 4 } as const;
const EventType = z.enum(['Critical', 'Error', 'Warning', 'Information']);

export const readWindowsEventLog = defineTool({
  name: 'read_windows_event_log',
  scope: 'system_read',
  signature: 'read_windows_event_log(log_name: string, event_count: number = 10, event_type: string | string[] = "Error")',
  description: "Reads recent events of one or more types ('Critical', 'Error', 'Warning', 'Information') from a Windows Event Log.",
  args: z.object({
    log_name: z.string().min(1),
    event_count: z.coerce.number().int().positive().default(10),
    event_type: z.union([EventType, z.array(EventType).min(1)]).default('Error'),
  }),
  async handler({ log_name, event_count, event_type }, ctx) {
    if (ctx.platform !== 'win32') {
      return { success: false, error: 'This tool is only available on Windows.' };
    }

    const query = eventQuery(typeof event_type === 'string' ? [event_type] : event_type);
    const output = await ctx.runner('wevtutil', [
      'qe', log_name, `/c:${event_count}`, '/rd:true', '/f:text', `/q:${query}`,
    ]);

    if (output.exitCode !== 0) {
      const detail = (output.stderr || output.error || '').trim();
      if (/access is denied/i.test(detail)) {
        return {
          success: false,
          error: `Access denied to '${log_name}' log. The agent may need elevated privileges to read it.`,
        };
      }
      return { success: false, error: detail || `wevtutil exited with code ${output.exitCode ?? 'n/a'}` };
    }

    return { success: true, events: parseEventText(output.stdout).slice(0, event_count) };
  },
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** `['Critical', 'Warning']` -> `*[System[(Level=1 or Level=3)]]` */
export function eventQuery(types: ReadonlyArray<keyof typeof EVENT_LEVELS>): string {
  const levels = [...new Set(types.map((type) => EVENT_LEVELS[type]))].sort((a, b) => a - b);
  return `*[System[(${levels.map((level) => `Level=${level}`).join(' or ')})]]`;
}

export interface ProcessInfo {
  pid: number;
  name: string;
  user: string;
  rss_kb: number;
  cpu_percent: number | null;
}

type ProcessListing =
  | { ok: true; processes: ProcessInfo[] }
  | { ok: false; error: string };

export async function snapshotProcesses(ctx: ToolContext): Promise<ProcessListing> {
  if (ctx.platform === 'win32') {
    const output = await ctx.runner('tasklist', ['/v', '/fo', 'csv', '/nh']);
    if (output.exitCode !== 0) {
      return { ok: false, error: (output.stderr || output.error || 'tasklist failed').trim() };
    }
    return { ok: true, processes: parseTasklist(output.stdout) };
  }

  const output = await ctx.runner('ps', ['-eo', 'pid=,user=,rss=,pcpu=,comm=']);
  if (output.exitCode !== 0) {
    return { ok: false, error: (output.stderr || output.error || 'ps failed').trim() };
  }
  return { ok: true, processes: parsePs(output.stdout) };
}

export function parsePs(stdout: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+(\S+)\s+(\d+)\s+([\d.]+)\s+(.+?)\s*$/.exec(line);
    if (!match) continue;
    processes.push({
      pid: Number(match[1]),
      user: match[2],
      rss_kb: Number(match[3]),
      cpu_percent: Number(match[4]),
      name: match[5],
    });
  }
  return processes;
}

/** `tasklist /v /fo csv /nh`: "Image","PID","Session","#","Mem Usage","Status","User",... */
export function parseTasklist(stdout: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const fields = [...line.matchAll(/"([^"]*)"/g)].map((m) => m[1]);
    if (fields.length < 5) continue;
    const user = fields[6] ?? '';
    processes.push({
      name: fields[0],
      pid: Number(fields[1]),
      rss_kb: Number(fields[4].replace(/[^\d]/g, '')) || 0,
      // "NT AUTHORITY\SYSTEM" -> "SYSTEM"
      user: user.includes('\\') ? user.slice(user.lastIndexOf('\\') + 1) : user,
      cpu_percent: null,
    });
  }
  return processes;
}

export interface EventRecord {
  source_name: string;
  event_id: number | null;
  time_generated: string;
  level: string;
  message: string;
}

export function parseEventText(stdout: string): EventRecord[] {
  const events: EventRecord[] = [];
  const blocks = stdout.split(/^Event\[\d+\]:?\s*$/m).slice(1);

  for (const block of blocks) {
    const field = (name: string) => new RegExp(`^\\s*${name}:\\s*(.*)$`, 'm').exec(block)?.[1]?.trim() ?? '';
    const descriptionAt = block.search(/^\s*Description:\s*$/m);
    const message = descriptionAt >= 0
      ? block.slice(descriptionAt).replace(/^\s*Description:\s*$/m, '').trim()
      : '';
    const eventId = Number.parseInt(field('Event ID'), 10);

    events.push({
      source_name: field('Source'),
      event_id: Number.isNaN(eventId) ? null : eventId,
      time_generated: field('Date'),
      level: field('Level'),
      message,
    });
  }
  return events;
}

async function readLinuxSwap(): Promise<{ total: number; free: number; used: number } | null> {
  try {
    const text = await fs.promises.readFile('/proc/meminfo', 'utf-8');
    const kb = (key: string) => Number(new RegExp(`^${key}:\\s+(\\d+)`, 'm').exec(text)?.[1] ?? NaN);
    const total = kb('SwapTotal') * 1024;
    const free = kb('SwapFree') * 1024;
    if (Number.isNaN(total) || Number.isNaN(free)) return null;
    return { total, free, used: total - free };
  } catch {
    return null;
  }
}

function totalBusy(times: os.CpuInfo['times']): number {
  return times.user + times.nice + times.sys + times.irq;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
