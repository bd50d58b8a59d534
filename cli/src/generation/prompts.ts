/**
 * Prompt text sent to the generation service.
 */

import type { CorrectionRequest, NextActionRequest } from './client.js';

export interface ToolDescriptor {
  signature: string;
  description: string;
}

const AUDIT_DATA_LIMIT = 30_000;

const RESPONSE_FORMATS = `
To use a tool, respond with:
{"tool": "tool_name", "tool_args": {"arg": "value"}, "explanation": "Why this tool."}

To run shell commands, respond with:
{"commands": ["command1"], "explanation": "What the commands do."}

If no action is needed (for example you can answer from the conversation), respond with:
{"explanation": "Your answer."}

Respond with the JSON object only. Never include both "tool" and "commands".`;

export function renderToolList(tools: ToolDescriptor[]): string {
  return tools.map((tool) => `- \`${tool.signature}\`: ${tool.description}`).join('\n');
}

function transcriptBlock(transcript: string): string {
  return transcript.trim() ? transcript : '(no previous conversation)';
}

export function nextActionPrompt(request: NextActionRequest, tools: ToolDescriptor[]): string {
  return `You are an assistant that carries out a user's requests on their computer, one action at a time.
Each action is either a group of shell commands or one call to an available tool.

How to work:
1. Decide what information you need. Use tools such as read_file or list_files for local data.
2. If you do not know how to do something, use web_search first and web_scrape to read a result.
3. Gather raw data in one step; you will be called again with the result in the conversation and can answer then.
4. Use manage_profile(action='read') to learn the user's preferences when they matter.
5. Install, remove or list software with the package tools, not with choco, apt or brew directly.
6. Prefer the system tools over ps, df, ls or dir; their output is structured.

Available tools:
${renderToolList(tools)}

Conversation so far:
${transcriptBlock(request.transcript)}

The user's latest request:
User: "${request.instruction}"

Choose the single next action.
${RESPONSE_FORMATS}`;
}

export function correctionPrompt(request: CorrectionRequest, tools: ToolDescriptor[]): string {
  const override = request.overrideInstruction
    ? `
The user added guidance for this correction, and it takes priority:
User: "${request.overrideInstruction}"
`
    : '';

  return `You are an assistant that carries out a user's requests on their computer. Your last action failed.
Analyze the error and propose one new action that recovers from it.
If the cause is unclear, use web_search with the error message.

Available tools:
${renderToolList(tools)}

Conversation so far:
${transcriptBlock(request.transcript)}

The action that failed:
${request.failedAction}

STDOUT:
${request.stdout || '(empty)'}

STDERR:
${request.stderr || '(empty)'}
${override}
If the error cannot be recovered from, respond with an explanation only.
${RESPONSE_FORMATS}`;
}

export function auditReportPrompt(data: Record<string, unknown>): string {
  let serialized = JSON.stringify(data, null, 2);
  if (serialized.length > AUDIT_DATA_LIMIT) {
    serialized = 'The collected data is too large to include. It covers policy checks, installed packages and system information.';
  }

  return `You are a security auditor. Analyze the system data below and write a security report in Markdown with these sections:
1. Executive Summary
2. Policy Compliance
3. Software Inventory (flag software known to be outdated or vulnerable)
4. System Configuration
5. Recommendations (numbered)

System data:
${serialized}

Respond with a JSON object with a single key "report" whose value is the full Markdown report:
{"report": "# Security Audit Report\\n\\n## 1. Executive Summary\\n..."}`;
}
