import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AgentOrchestrator, type AgentOptions } from '../core/agent.js';
import { FileAuditLog, MemoryAuditLog } from '../core/audit.js';
import type { ConfirmDecision, ConfirmRequest, Confirmer } from '../core/channel.js';
import { CommandExecutor } from '../core/executor.js';
import { History, actionTag } from '../core/history.js';
import { DEFAULT_SECURITY_POLICY, Policy } from '../core/policy.js';
import type { ProcessOutput, ProcessRunner } from '../core/process.js';
import type { Proposal } from '../core/types.js';
import type {
  AuditReportResult,
  CorrectionRequest,
  GenerationClient,
  NextActionRequest,
} from '../generation/client.js';
import { ProfileStore } from '../config/profile.js';
import { createToolRegistry } from '../tools/index.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'steward-agent-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

/** Hands out queued proposals; repeats the last correction once the queue runs dry. */
class ScriptedGenerator implements GenerationClient {
  readonly nextCalls: NextActionRequest[] = [];
  readonly correctionCalls: CorrectionRequest[] = [];
  private readonly next: Proposal[];
  private readonly corrections: Proposal[];
  private lastCorrection: Proposal = { kind: 'none', explanation: '' };

  constructor(next: Proposal[], corrections: Proposal[] = []) {
    this.next = [...next];
    this.corrections = [...corrections];
  }

  async nextAction(request: NextActionRequest): Promise<Proposal> {
    this.nextCalls.push(request);
    return this.next.shift() ?? { kind: 'none', explanation: '' };
  }

  async correction(request: CorrectionRequest): Promise<Proposal> {
    this.correctionCalls.push(request);
    this.lastCorrection = this.corrections.shift() ?? this.lastCorrection;
    return this.lastCorrection;
  }

  async auditReport(_data: Record<string, unknown>): Promise<AuditReportResult> {
    return { ok: false, error: 'not used' };
  }
}

class ScriptedConfirmer implements Confirmer {
  readonly requests: ConfirmRequest[] = [];
  private readonly decisions: ConfirmDecision[];

  constructor(decisions: ConfirmDecision[]) {
    this.decisions = [...decisions];
  }

  async confirm(request: ConfirmRequest): Promise<ConfirmDecision> {
    this.requests.push(request);
    return this.decisions.shift() ?? { kind: 'approve' };
  }
}

function countingRunner(outputFor: (file: string, args: string[]) => ProcessOutput): { runner: ProcessRunner; calls: string[][] } {
  const calls: string[][] = [];
  const runner: ProcessRunner = async (file, args) => {
    calls.push([file, ...args]);
    return outputFor(file, args);
  };
  return { runner, calls };
}

const ok = (): ProcessOutput => ({ exitCode: 0, stdout: '', stderr: '' });

function shell(...commands: string[]): Proposal {
  return { kind: 'action', action: { kind: 'shell', commands }, explanation: `run ${commands.join(', ')}` };
}

function build(options: Partial<AgentOptions> & Pick<AgentOptions, 'generator'>, runner: ProcessRunner = async () => ok()) {
  const history = new History();
  const audit = new MemoryAuditLog();
  const tools = createToolRegistry({
    runner,
    fetch: async () => new Response('{}'),
    profile: new ProfileStore(path.join(tmpDir, 'profile.yml')),
    search: { apiKey: '', engineId: '' },
    platform: 'linux',
    pollIntervalMs: 10,
  });
  const agent = new AgentOrchestrator({
    policy: new Policy(DEFAULT_SECURITY_POLICY, 'linux'),
    tools,
    executor: new CommandExecutor({ runner, platform: 'linux' }),
    history,
    confirmer: new ScriptedConfirmer([]),
    audit,
    autoApprove: true,
    ...options,
  });
  return { agent, history, audit };
}

describe('AgentOrchestrator: corrections', () => {
  it('stops after maxRetries corrections and runs the action maxRetries + 1 times', async () => {
    const { runner, calls } = countingRunner(() => ({ exitCode: 1, stdout: '', stderr: 'boom' }));
    const generator = new ScriptedGenerator([shell('false')], [shell('false')]);
    const { agent, history } = build({ generator, maxRetries: 2 }, runner);

    const report = await agent.runStep('do the thing');

    assert.strictEqual(report.status, 'failed');
    assert.strictEqual(report.failure?.kind, 'retry_budget_exhausted');
    assert.strictEqual(report.corrections, 2);
    assert.strictEqual(calls.length, 3);
    assert.strictEqual(generator.correctionCalls.length, 2);
    assert.strictEqual(history.size, 3);
    assert.deepStrictEqual(report.states, [
      'awaiting_instruction', 'generating',
      'proposed', 'vetting', 'executing', 'evaluating', 'correcting', 'generating',
      'proposed', 'vetting', 'executing', 'evaluating', 'correcting', 'generating',
      'proposed', 'vetting', 'executing', 'evaluating', 'failed',
    ]);
  });

  it('sends the failed action and its output with the correction request', async () => {
    const { runner } = countingRunner((file) => (file === 'lss'
      ? { exitCode: null, stdout: '', stderr: 'spawn lss ENOENT', error: 'spawn lss ENOENT' }
      : ok()));
    const generator = new ScriptedGenerator([shell('lss -la')], [shell('ls -la')]);
    const { agent } = build({ generator }, runner);

    const report = await agent.runStep('list files');

    assert.deepStrictEqual(report, {
      status: 'done',
      corrections: 1,
      states: [
        'awaiting_instruction', 'generating', 'proposed', 'vetting', 'executing', 'evaluating',
        'correcting', 'generating', 'proposed', 'vetting', 'executing', 'evaluating', 'done',
      ],
    });
    const [request] = generator.correctionCalls;
    assert.strictEqual(request.failedAction, 'Ran command `lss -la`');
    assert.strictEqual(request.stdout, '');
    assert.strictEqual(request.stderr, 'spawn lss ENOENT');
    assert.strictEqual(request.overrideInstruction, undefined);
    assert.ok(request.transcript.includes('Agent: Ran command `lss -la` -> Failure. Output: spawn lss ENOENT'));
  });

  it('ends the step when a correction proposes no action', async () => {
    const { runner } = countingRunner(() => ({ exitCode: 2, stdout: '', stderr: 'bad' }));
    const generator = new ScriptedGenerator([shell('make')], [{ kind: 'none', explanation: 'Cannot be fixed.' }]);
    const { agent, history } = build({ generator }, runner);

    const report = await agent.runStep('build');

    assert.strictEqual(report.status, 'done');
    assert.strictEqual(report.corrections, 1);
    assert.deepStrictEqual(history.entries()[1].action, { kind: 'none' });
  });

  it('reports an unknown tool to the model and accepts the corrected call', async () => {
    const generator = new ScriptedGenerator(
      [{ kind: 'action', action: { kind: 'tool', name: 'format_disk', args: {} }, explanation: '' }],
      [{ kind: 'action', action: { kind: 'tool', name: 'list_files', args: { path: tmpDir } }, explanation: '' }],
    );
    const { agent, history } = build({ generator });

    const report = await agent.runStep('what is here');

    assert.strictEqual(report.status, 'done');
    assert.strictEqual(report.corrections, 1);
    assert.strictEqual(generator.correctionCalls[0].stderr, "Tool 'format_disk' not found.");
    assert.deepStrictEqual(history.entries()[0].result, {
      kind: 'tool',
      success: false,
      data: { success: false, error: "Tool 'format_disk' not found." },
    });
  });

  it('counts a partially run command group as a failure', async () => {
    const { runner, calls } = countingRunner((file) => (file === 'false' ? { exitCode: 1, stdout: '', stderr: '' } : ok()));
    const generator = new ScriptedGenerator([shell('true', 'false', 'true')], [shell('true')]);
    const { agent, history } = build({ generator }, runner);

    const report = await agent.runStep('x');

    assert.strictEqual(report.status, 'done');
    assert.deepStrictEqual(calls, [['true'], ['false'], ['true']]);
    const first = history.entries()[0].result;
    assert.strictEqual(first.kind, 'shell');
    assert.strictEqual(first.success, false);
  });
});

describe('AgentOrchestrator: end to end', () => {
  it('lists files through the tool and records one tagged entry', async () => {
    fs.writeFileSync(path.join(tmpDir, 'report.txt'), 'x');
    const generator = new ScriptedGenerator([
      { kind: 'action', action: { kind: 'tool', name: 'list_files', args: { path: tmpDir } }, explanation: 'List the folder' },
    ]);
    const { agent, history, audit } = build({ generator });

    agent.recordInstruction('list files here');
    const report = await agent.runStep('list files here');

    assert.deepStrictEqual(report, {
      status: 'done',
      corrections: 0,
      states: ['awaiting_instruction', 'generating', 'proposed', 'vetting', 'executing', 'evaluating', 'done'],
    });
    assert.strictEqual(generator.nextCalls[0].transcript, 'User: list files here');
    assert.strictEqual(generator.nextCalls[0].instruction, 'list files here');

    const entries = history.entries();
    assert.strictEqual(entries.length, 2);
    assert.deepStrictEqual(entries.map((e) => actionTag(e.action)), ['user_instruction', 'tool:list_files']);
    assert.strictEqual(entries[1].result.success, true);
    assert.ok(history.render().includes('"name":"report.txt"'));
    assert.deepStrictEqual(audit.records, entries);
  });

  it('denies a blacklisted command without spawning anything', async () => {
    const { runner, calls } = countingRunner(ok);
    const generator = new ScriptedGenerator([shell('rm -rf /')]);
    const { agent, history } = build({ generator }, runner);

    const report = await agent.runStep('clean up everything');

    assert.strictEqual(calls.length, 0);
    assert.strictEqual(report.status, 'failed');
    assert.deepStrictEqual(report.failure, { kind: 'policy_denied', reason: "Command 'rm' is blacklisted by the security policy." });
    assert.strictEqual(generator.correctionCalls.length, 0);
    assert.deepStrictEqual(history.entries()[0].action, { kind: 'denied', action: { kind: 'shell', commands: ['rm -rf /'] } });
  });

  it('denies a blacklisted path for a filesystem tool', async () => {
    const generator = new ScriptedGenerator([
      { kind: 'action', action: { kind: 'tool', name: 'read_file', args: { file_path: '/etc/shadow' } }, explanation: '' },
    ]);
    const { agent } = build({ generator });

    const report = await agent.runStep('read shadow');

    assert.deepStrictEqual(report.failure, { kind: 'policy_denied', reason: "Access to '/etc/shadow' is restricted by the security policy." });
  });

  it('records an answer that needs no action', async () => {
    const generator = new ScriptedGenerator([{ kind: 'none', explanation: 'It is 4.' }]);
    const { agent, history } = build({ generator });

    const report = await agent.runStep('what is 2 + 2');

    assert.strictEqual(report.status, 'done');
    assert.deepStrictEqual(history.entries()[0].result, { kind: 'note', success: true, message: 'It is 4.' });
  });

  it('keeps going when the history file cannot be written', async () => {
    const blocker = path.join(tmpDir, 'not-a-dir');
    fs.writeFileSync(blocker, 'x');
    const generator = new ScriptedGenerator([shell('true')]);
    const { agent, history } = build({ generator, audit: new FileAuditLog(path.join(blocker, 'logs', 'history.jsonl'), 'test-session') });
    const errors = mock.method(console, 'error', () => {});

    try {
      agent.recordInstruction('run true');
      const report = await agent.runStep('run true');

      assert.strictEqual(report.status, 'done');
      assert.strictEqual(history.size, 2);
      assert.strictEqual(errors.mock.callCount(), 2);
      const first = String(errors.mock.calls[0].arguments[0]);
      assert.ok(first.startsWith('  [audit] Could not write history entry: '), first);
    } finally {
      errors.mock.restore();
    }
  });

  it('fails the step on a generation error without recording anything', async () => {
    const generator = new ScriptedGenerator([{ kind: 'error', error: 'invalid response', raw: 'Sure!' }]);
    const { agent, history } = build({ generator });

    const report = await agent.runStep('x');

    assert.strictEqual(report.status, 'failed');
    assert.strictEqual(report.failure?.kind, 'generation_error');
    if (report.failure?.kind === 'generation_error') {
      assert.strictEqual(report.failure.message, 'invalid response');
      assert.strictEqual(report.failure.raw, 'Sure!');
    }
    assert.strictEqual(history.size, 0);
  });
});

describe('AgentOrchestrator: confirmation', () => {
  it('records a skipped action and runs nothing', async () => {
    const { runner, calls } = countingRunner(ok);
    const generator = new ScriptedGenerator([shell('reboot-later')]);
    const confirmer = new ScriptedConfirmer([{ kind: 'skip' }]);
    const { agent, history } = build({ generator, confirmer, autoApprove: false }, runner);

    const report = await agent.runStep('x');

    assert.strictEqual(report.status, 'done');
    assert.strictEqual(calls.length, 0);
    assert.deepStrictEqual(history.entries()[0].action, { kind: 'skip', action: { kind: 'shell', commands: ['reboot-later'] } });
  });

  it('cancels without recording or running anything', async () => {
    const { runner, calls } = countingRunner(ok);
    const generator = new ScriptedGenerator([shell('ls')]);
    const confirmer = new ScriptedConfirmer([{ kind: 'cancel' }]);
    const { agent, history } = build({ generator, confirmer, autoApprove: false }, runner);

    const report = await agent.runStep('x');

    assert.deepStrictEqual(report, {
      status: 'cancelled',
      corrections: 0,
      states: ['awaiting_instruction', 'generating', 'proposed', 'confirming'],
    });
    assert.strictEqual(calls.length, 0);
    assert.strictEqual(history.size, 0);
  });

  it('regenerates from an override before anything failed', async () => {
    const { runner, calls } = countingRunner(ok);
    const generator = new ScriptedGenerator([shell('ls'), shell('ls -la')]);
    const confirmer = new ScriptedConfirmer([{ kind: 'override', instruction: 'include hidden files' }, { kind: 'approve' }]);
    const { agent } = build({ generator, confirmer, autoApprove: false }, runner);

    const report = await agent.runStep('list files');

    assert.strictEqual(report.status, 'done');
    assert.strictEqual(report.corrections, 0);
    assert.strictEqual(generator.nextCalls[1].instruction, 'include hidden files');
    assert.deepStrictEqual(calls, [['ls', '-la']]);
    assert.deepStrictEqual(confirmer.requests.map((r) => r.attempt), [0, 0]);
  });

  it('passes an override to the correction after a failure', async () => {
    const { runner } = countingRunner((file) => (file === 'apt' ? { exitCode: 100, stdout: '', stderr: 'lock held' } : ok()));
    const generator = new ScriptedGenerator([shell('apt install git')], [shell('apt install git'), shell('echo done')]);
    const confirmer = new ScriptedConfirmer([
      { kind: 'approve' },
      { kind: 'override', instruction: 'just print done' },
      { kind: 'approve' },
    ]);
    const { agent } = build({ generator, confirmer, autoApprove: false }, runner);

    const report = await agent.runStep('install git');

    assert.strictEqual(report.status, 'done');
    assert.strictEqual(report.corrections, 1);
    assert.strictEqual(generator.correctionCalls.length, 2);
    assert.strictEqual(generator.correctionCalls[0].overrideInstruction, undefined);
    assert.strictEqual(generator.correctionCalls[1].overrideInstruction, 'just print done');
    assert.strictEqual(generator.correctionCalls[1].stderr, 'lock held');
    assert.deepStrictEqual(confirmer.requests.map((r) => r.attempt), [0, 1, 1]);
  });
});
