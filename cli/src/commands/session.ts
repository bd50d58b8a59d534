/**
 * Wiring shared by the commands that talk to the generation service.
 */

import { v4 as uuidv4 } from 'uuid';
import { loadConfig, validateConfig, type Config } from '../config/config.js';
import { AgentOrchestrator } from '../core/agent.js';
import { FileAuditLog } from '../core/audit.js';
import { AutoApprove, type Confirmer } from '../core/channel.js';
import { CommandExecutor } from '../core/executor.js';
import { History } from '../core/history.js';
import { Policy } from '../core/policy.js';
import { TerminalConfirmer } from '../channels/terminal.js';
import { GeminiClient } from '../generation/gemini.js';
import { createToolContext, createToolRegistry, type ToolRegistry } from '../tools/index.js';

export interface SessionOptions {
  autoApprove?: boolean;
  confirmer?: Confirmer;
}

export interface Session {
  id: string;
  config: Config;
  agent: AgentOrchestrator;
  history: History;
  tools: ToolRegistry;
  generator: GeminiClient;
  policy: Policy;
}

/** Load config and print why it is unusable, if it is. */
export function loadReadyConfig(): Config | null {
  const config = loadConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('  ❌ Configuration errors:');
    for (const error of errors) {
      console.error(`    - ${error}`);
    }
    console.error('  Run: steward init');
    return null;
  }
  return config;
}

export function createSession(config: Config, options: SessionOptions = {}): Session {
  const id = uuidv4();
  const ctx = createToolContext(config);
  const tools = createToolRegistry(ctx);
  const policy = new Policy(ctx.profile.securityPolicy(), ctx.platform);
  const history = new History({ outputLimit: config.outputLimit });
  const autoApprove = options.autoApprove ?? config.autoApprove;

  const generator = new GeminiClient({
    apiKey: config.apiKey,
    model: config.model,
    tools: tools.list(),
  });

  const agent = new AgentOrchestrator({
    policy,
    generator,
    tools,
    executor: new CommandExecutor(),
    history,
    confirmer: options.confirmer ?? (autoApprove ? new AutoApprove() : new TerminalConfirmer()),
    audit: new FileAuditLog(config.historyFile, id),
    autoApprove,
    maxRetries: config.maxRetries,
  });

  return { id, config, agent, history, tools, generator, policy };
}
