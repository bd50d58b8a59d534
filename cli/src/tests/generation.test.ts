import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { INVALID_RESPONSE, decodeAuditReport, decodeProposal, parseJson } from '../generation/client.js';
import { correctionPrompt, nextActionPrompt, renderToolList } from '../generation/prompts.js';

describe('decodeProposal', () => {
  it('decodes a shell proposal', () => {
    assert.deepStrictEqual(decodeProposal('{"commands": ["ls -la"], "explanation": "List files"}'), {
      kind: 'action',
      action: { kind: 'shell', commands: ['ls -la'] },
      explanation: 'List files',
    });
  });

  it('decodes a tool proposal and defaults missing args', () => {
    assert.deepStrictEqual(decodeProposal('{"tool": "get_cpu_info", "explanation": "CPU"}'), {
      kind: 'action',
      action: { kind: 'tool', name: 'get_cpu_info', args: {} },
      explanation: 'CPU',
    });
  });

  it('unwraps a reply that is a single fenced code block', () => {
    const text = '```json\n{"tool": "list_files", "tool_args": {"path": "."}}\n```\n';
    assert.deepStrictEqual(decodeProposal(text), {
      kind: 'action',
      action: { kind: 'tool', name: 'list_files', args: { path: '.' } },
      explanation: '',
    });
  });

  it('keeps backtick fences inside string values', () => {
    const text = '{"commands":["ls -la"],"explanation":"Runs ```ls -la``` to list files"}';
    assert.deepStrictEqual(decodeProposal(text), {
      kind: 'action',
      action: { kind: 'shell', commands: ['ls -la'] },
      explanation: 'Runs ```ls -la``` to list files',
    });
  });

  it('rejects a fence surrounded by prose', () => {
    const text = 'Here you go:\n```json\n{"tool": "list_files"}\n```';
    assert.deepStrictEqual(decodeProposal(text), { kind: 'error', error: 'invalid response', raw: text });
  });

  it('treats an object without tool or commands as no action', () => {
    assert.deepStrictEqual(decodeProposal('{"explanation": "It is 4."}'), { kind: 'none', explanation: 'It is 4.' });
    assert.deepStrictEqual(decodeProposal('{"commands": null, "tool": null, "explanation": null}'), { kind: 'none', explanation: '' });
    assert.deepStrictEqual(decodeProposal('{"commands": [], "tool": "  "}'), { kind: 'none', explanation: '' });
  });

  it('rejects text that is not JSON', () => {
    assert.deepStrictEqual(decodeProposal('I will list the files now.'), {
      kind: 'error',
      error: INVALID_RESPONSE,
      raw: 'I will list the files now.',
    });
  });

  it('rejects fields of the wrong type', () => {
    const text = '{"commands": "ls"}';
    assert.deepStrictEqual(decodeProposal(text), { kind: 'error', error: 'invalid response', raw: text });
  });

  it('rejects a proposal with both a tool and commands', () => {
    const text = '{"tool": "read_file", "commands": ["cat x"]}';
    assert.deepStrictEqual(decodeProposal(text), { kind: 'error', error: 'invalid response', raw: text });
  });
});

describe('decodeAuditReport', () => {
  it('returns the report text', () => {
    assert.deepStrictEqual(decodeAuditReport('{"report": "# Report"}'), { ok: true, report: '# Report' });
  });

  it('rejects a missing or empty report', () => {
    assert.deepStrictEqual(decodeAuditReport('{"report": ""}'), { ok: false, error: 'invalid response', raw: '{"report": ""}' });
    assert.deepStrictEqual(decodeAuditReport('nope'), { ok: false, error: 'invalid response', raw: 'nope' });
  });
});

describe('parseJson', () => {
  it('returns undefined for empty text', () => {
    assert.strictEqual(parseJson('   '), undefined);
    assert.strictEqual(parseJson('```\n```'), undefined);
  });
});

describe('prompts', () => {
  const tools = [{ signature: 'get_cpu_info()', description: 'CPU usage and core count.' }];

  it('renders the tool list', () => {
    assert.strictEqual(renderToolList(tools), '- `get_cpu_info()`: CPU usage and core count.');
  });

  it('includes the transcript and the instruction in the next-action prompt', () => {
    const prompt = nextActionPrompt({ transcript: 'User: hi', instruction: 'show cpu' }, tools);

    assert.ok(prompt.includes('Conversation so far:\nUser: hi\n'));
    assert.ok(prompt.includes('User: "show cpu"'));
    assert.ok(prompt.includes('- `get_cpu_info()`: CPU usage and core count.'));
  });

  it('marks an empty transcript', () => {
    const prompt = nextActionPrompt({ transcript: '', instruction: 'x' }, tools);
    assert.ok(prompt.includes('Conversation so far:\n(no previous conversation)\n'));
  });

  it('includes the failure evidence and override in the correction prompt', () => {
    const prompt = correctionPrompt({
      transcript: 'User: hi',
      failedAction: 'Ran command `lss`',
      stdout: '',
      stderr: 'spawn lss ENOENT',
      overrideInstruction: 'use ls',
    }, tools);

    assert.ok(prompt.includes('The action that failed:\nRan command `lss`\n'));
    assert.ok(prompt.includes('STDOUT:\n(empty)\n'));
    assert.ok(prompt.includes('STDERR:\nspawn lss ENOENT\n'));
    assert.ok(prompt.includes('User: "use ls"'));
  });

  it('leaves out the override block when there is none', () => {
    const prompt = correctionPrompt({ transcript: '', failedAction: 'x', stdout: 'a', stderr: 'b' }, tools);
    assert.ok(!prompt.includes('takes priority'));
  });
});
