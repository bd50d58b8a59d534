/**
 * Core Types: Action, Proposal, results, history, policy
 *
 * An Action is what the model wants to do: one shell command group or one
 * tool call. A Proposal wraps an Action (or no action) with the model's
 * explanation, or carries the generation error. Results are values; the
 * core never throws across the vet / execute / evaluate boundary.
 */

export type ToolArgs = Record<string, unknown>;

export interface ShellAction {
  kind: 'shell';
  commands: string[];
}

export interface ToolAction {
  kind: 'tool';
  name: string;
  args: ToolArgs;
}

export type Action = ShellAction | ToolAction;

export type Proposal =
  | { kind: 'action'; action: Action; explanation: string }
  | { kind: 'none'; explanation: string }
  | { kind: 'error'; error: string; raw?: string };

export interface CommandResult {
  command: string;
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface ToolResult {
  success: boolean;
  error?: string;
  [key: string]: unknown;
}

/** Outcome of one step attempt, as recorded in history. */
export type ExecutionResult =
  | { kind: 'shell'; success: boolean; results: CommandResult[] }
  | { kind: 'tool'; success: boolean; data: ToolResult }
  | { kind: 'note'; success: boolean; message?: string };

export type HistoryAction =
  | { kind: 'user_instruction' }
  | { kind: 'none' }
  | { kind: 'skip'; action: Action }
  | { kind: 'denied'; action: Action }
  | Action;

/**
 * One appended record. For `user_instruction` entries the explanation
 * carries the instruction text itself.
 */
export interface HistoryEntry {
  stepLabel: string;
  action: HistoryAction;
  explanation: string;
  result: ExecutionResult;
  timestamp?: string;
}

export type SecurityScope =
  | 'filesystem_read'
  | 'filesystem_write'
  | 'system_read'
  | 'system_write'
  | 'network_read';

export interface SecurityPolicy {
  commandBlacklist: string[];
  fileAccessBlacklist: string[];
  allowShellCommands: boolean;
  allowToolUsage: boolean;
}

export interface Verdict {
  allowed: boolean;
  reason: string;
}
