/**
 * AgentOrchestrator: one instruction in, one step report out
 *
 * For each step:
 *   1. Ask the generation client for a proposal (transcript + instruction)
 *   2. Confirm it with the human unless auto-approving
 *   3. Vet it against the security policy; a denial ends the step
 *   4. Execute it (shell group or tool call) and record the result
 *   5. On failure, request a correction and go back to 2, at most
 *      maxRetries times
 *
 * Every outcome is a value. Nothing thrown by a collaborator is expected
 * to cross this boundary; all failures end up in the StepReport.
 */

import { describeAction } from './history.js';
import type { History } from './history.js';
import type { AuditLog } from './audit.js';
import type { Confirmer } from './channel.js';
import type { Policy, ToolScopes } from './policy.js';
import type { GenerationClient } from '../generation/client.js';
import type {
  Action,
  CommandResult,
  ExecutionResult,
  HistoryAction,
  Proposal,
  ToolArgs,
  ToolResult,
} from './types.js';

export const DEFAULT_MAX_RETRIES = 3;

export type AgentState =
  | 'awaiting_instruction'
  | 'generating'
  | 'proposed'
  | 'confirming'
  | 'vetting'
  | 'executing'
  | 'evaluating'
  | 'correcting'
  | 'done'
  | 'failed';

export interface FailureEvidence {
  action: Action;
  description: string;
  stdout: string;
  stderr: string;
}

export type StepFailure =
  | { kind: 'generation_error'; message: string; raw?: string }
  | { kind: 'policy_denied'; reason: string }
  | { kind: 'retry_budget_exhausted'; lastFailure: FailureEvidence };

export interface StepReport {
  status: 'done' | 'failed' | 'cancelled';
  failure?: StepFailure;
  /** Correction requests made during the step. */
  corrections: number;
  /** States visited, in order. */
  states: AgentState[];
}

export interface ToolInvoker extends ToolScopes {
  invoke(name: string, args: ToolArgs): Promise<ToolResult>;
}

export interface ShellExecutor {
  executeAll(commands: string[]): Promise<CommandResult[]>;
}

export interface AgentOptions {
  policy: Policy;
  generator: GenerationClient;
  tools: ToolInvoker;
  executor: ShellExecutor;
  history: History;
  confirmer: Confirmer;
  audit?: AuditLog;
  autoApprove?: boolean;
  maxRetries?: number;
}

export class AgentOrchestrator {
  private readonly policy: Policy;
  private readonly generator: GenerationClient;
  private readonly tools: ToolInvoker;
  private readonly executor: ShellExecutor;
  private readonly history: History;
  private readonly confirmer: Confirmer;
  private readonly audit?: AuditLog;
  private readonly autoApprove: boolean;
  readonly maxRetries: number;

  constructor(options: AgentOptions) {
    this.policy = options.policy;
    this.generator = options.generator;
    this.tools = options.tools;
    this.executor = options.executor;
    this.history = options.history;
    this.confirmer = options.confirmer;
    this.audit = options.audit;
    this.autoApprove = options.autoApprove ?? false;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  }

  /** Record the user's instruction as the next transcript line. */
  recordInstruction(instruction: string): void {
    this.record({
      stepLabel: instruction,
      action: { kind: 'user_instruction' },
      explanation: instruction,
      result: { kind: 'note', success: true },
    });
  }

  async runStep(instruction: string): Promise<StepReport> {
    const states: AgentState[] = ['awaiting_instruction'];
    let corrections = 0;
    let override: string | undefined;
    let lastFailure: FailureEvidence | undefined;

    const finish = (status: StepReport['status'], failure?: StepFailure): StepReport => {
      if (status !== 'cancelled') states.push(status);
      return failure ? { status, failure, corrections, states } : { status, corrections, states };
    };

    states.push('generating');
    let proposal: Proposal = await this.generator.nextAction({
      transcript: this.history.render(),
      instruction,
    });

    for (;;) {
      if (proposal.kind === 'error') {
        console.error(`  [agent] Generation failed: ${proposal.error}`);
        return finish('failed', { kind: 'generation_error', message: proposal.error, raw: proposal.raw });
      }

      states.push('proposed');
      if (proposal.kind === 'none') {
        console.log('  [agent] No action proposed');
        this.record({
          stepLabel: instruction,
          action: { kind: 'none' },
          explanation: proposal.explanation,
          result: { kind: 'note', success: true, message: proposal.explanation },
        });
        return finish('done');
      }

      const { action, explanation } = proposal;
      console.log(`  [agent] Proposed: ${describeAction(action)}`);

      if (!this.autoApprove) {
        states.push('confirming');
        const decision = await this.confirmer.confirm({ action, explanation, attempt: corrections });

        if (decision.kind === 'cancel') {
          console.log('  [agent] Step cancelled');
          return finish('cancelled');
        }

        if (decision.kind === 'skip') {
          this.record({
            stepLabel: instruction,
            action: { kind: 'skip', action },
            explanation,
            result: { kind: 'note', success: true, message: 'Skipped by user' },
          });
          return finish('done');
        }

        if (decision.kind === 'override') {
          override = decision.instruction;
          console.log(`  [agent] Regenerating with user override: ${override}`);
          states.push('generating');
          proposal = lastFailure
            ? await this.generator.correction({
              transcript: this.history.render(),
              failedAction: lastFailure.description,
              stdout: lastFailure.stdout,
              stderr: lastFailure.stderr,
              overrideInstruction: override,
            })
            : await this.generator.nextAction({ transcript: this.history.render(), instruction: override });
          continue;
        }
      }

      states.push('vetting');
      const verdict = this.policy.vet(action, this.tools);
      console.log(`  [agent] ${describeAction(action).substring(0, 80)} -> policy: ${verdict.allowed ? 'allow' : 'deny'} (${verdict.reason})`);
      if (!verdict.allowed) {
        this.record({
          stepLabel: instruction,
          action: { kind: 'denied', action },
          explanation,
          result: { kind: 'note', success: false, message: verdict.reason },
        });
        return finish('failed', { kind: 'policy_denied', reason: verdict.reason });
      }

      states.push('executing');
      const result = await this.execute(action);
      this.record({ stepLabel: instruction, action, explanation, result });

      states.push('evaluating');
      if (result.success) {
        return finish('done');
      }

      lastFailure = evidence(action, result);
      if (corrections >= this.maxRetries) {
        console.error(`  [agent] Step failed after ${corrections} correction(s)`);
        return finish('failed', { kind: 'retry_budget_exhausted', lastFailure });
      }

      states.push('correcting');
      corrections += 1;
      console.log(`  [agent] Action failed, requesting correction (${corrections}/${this.maxRetries})`);

      states.push('generating');
      proposal = await this.generator.correction({
        transcript: this.history.render(),
        failedAction: lastFailure.description,
        stdout: lastFailure.stdout,
        stderr: lastFailure.stderr,
        overrideInstruction: override,
      });
    }
  }

  private async execute(action: Action): Promise<ExecutionResult> {
    if (action.kind === 'shell') {
      const results = await this.executor.executeAll(action.commands);
      const success = results.length === action.commands.length && results.every((r) => r.success);
      return { kind: 'shell', success, results };
    }

    const data = await this.tools.invoke(action.name, action.args);
    if (!data.success) {
      console.log(`  [agent] Tool ${action.name} failed: ${typeof data.error === 'string' ? data.error : 'no error given'}`);
    }
    return { kind: 'tool', success: data.success, data };
  }

  private record(entry: { stepLabel: string; action: HistoryAction; explanation: string; result: ExecutionResult }): void {
    const stamped = this.history.append(entry);
    if (!this.audit) return;
    try {
      this.audit.append(stamped);
    } catch (err) {
      console.error(`  [audit] Could not write history entry: ${(err as Error).message}`);
    }
  }
}

function evidence(action: Action, result: ExecutionResult): FailureEvidence {
  const description = describeAction(action);

  switch (result.kind) {
    case 'shell':
      return {
        action,
        description,
        stdout: joinOutput(result.results.map((r) => r.stdout)),
        stderr: joinOutput(result.results.map((r) => r.stderr)),
      };
    case 'tool':
      return {
        action,
        description,
        stdout: JSON.stringify(result.data),
        stderr: typeof result.data.error === 'string' ? result.data.error : '',
      };
    case 'note':
      return { action, description, stdout: '', stderr: result.message ?? '' };
  }
}

function joinOutput(parts: string[]): string {
  return parts.map((part) => part.trim()).filter(Boolean).join('\n');
}
