/**
 * History: the session's append-only action log
 *
 * Entries are never mutated or removed. render() turns the log into the
 * transcript handed to the generation service on every call, so it must
 * be deterministic: it reads no clock and never skips an entry.
 *
 *   User: list the files here
 *   Agent: Used tool `list_files` with args {"path":"."} -> Success. Output: {...}
 */

import type { Action, ExecutionResult, HistoryAction, HistoryEntry } from './types.js';

export const DEFAULT_OUTPUT_LIMIT = 500;
const TRUNCATION_MARKER = '... [truncated]';
const NO_OUTPUT = 'No output';

export type Clock = () => Date;

export interface HistoryOptions {
  outputLimit?: number;
  clock?: Clock;
}

export class History {
  private readonly log: HistoryEntry[] = [];
  private readonly outputLimit: number;
  private readonly clock: Clock;

  constructor(options: HistoryOptions = {}) {
    this.outputLimit = options.outputLimit ?? DEFAULT_OUTPUT_LIMIT;
    this.clock = options.clock ?? (() => new Date());
  }

  append(entry: HistoryEntry): HistoryEntry {
    const stamped = deepFreeze(structuredClone({
      ...entry,
      timestamp: entry.timestamp ?? this.clock().toISOString(),
    }));
    this.log.push(stamped);
    return stamped;
  }

  entries(): readonly HistoryEntry[] {
    return Object.freeze([...this.log]);
  }

  get size(): number {
    return this.log.length;
  }

  render(): string {
    return this.log.map((entry) => renderEntry(entry, this.outputLimit)).join('\n');
  }
}

/** Freeze a cloned entry down to its leaves; callers keep their own objects. */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function renderEntry(entry: HistoryEntry, outputLimit = DEFAULT_OUTPUT_LIMIT): string {
  if (entry.action.kind === 'user_instruction') {
    return `User: ${entry.explanation}`;
  }

  const outcome = entry.result.success ? 'Success' : 'Failure';
  const output = truncate(resultOutput(entry.result), outputLimit);
  return `Agent: ${describeHistoryAction(entry.action, entry.explanation)} -> ${outcome}. Output: ${output}`;
}

/** Short tag used in logs and the persisted history file. */
export function actionTag(action: HistoryAction): string {
  switch (action.kind) {
    case 'user_instruction':
    case 'none':
    case 'skip':
    case 'shell':
      return action.kind;
    case 'tool':
      return `tool:${action.name}`;
    case 'denied':
      return action.action.kind === 'shell'
        ? 'denied_shell'
        : `denied_tool:${action.action.name}`;
  }
}

export function describeAction(action: Action): string {
  if (action.kind === 'shell') {
    return `Ran command \`${action.commands.join(' && ')}\``;
  }
  return `Used tool \`${action.name}\` with args ${safeJson(action.args)}`;
}

function describeHistoryAction(action: HistoryAction, explanation: string): string {
  switch (action.kind) {
    case 'user_instruction':
      return explanation;
    case 'none':
      return 'Answered without taking an action';
    case 'skip':
      return `Skipped at the user's request: ${describeAction(action.action)}`;
    case 'denied':
      return `Denied by security policy: ${describeAction(action.action)}`;
    default:
      return describeAction(action);
  }
}

/** Flatten a result into the text shown after `Output:`. */
export function resultOutput(result: ExecutionResult): string {
  switch (result.kind) {
    case 'shell': {
      const text = result.results
        .map((r) => [r.stdout.trim(), r.stderr.trim()].filter(Boolean).join('\n'))
        .filter(Boolean)
        .join('\n');
      return text || NO_OUTPUT;
    }
    case 'tool':
      return safeJson(result.data);
    case 'note':
      return result.message || NO_OUTPUT;
  }
}

export function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return text.slice(0, limit) + TRUNCATION_MARKER;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? NO_OUTPUT;
  } catch {
    // Circular structures or BigInt values from a tool handler
    return String(value);
  }
}
