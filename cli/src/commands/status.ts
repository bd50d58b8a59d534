/**
 * steward status: configuration, profile and history at a glance
 */

import fs from 'node:fs';
import { loadConfig, validateConfig } from '../config/config.js';
import { ProfileStore } from '../config/profile.js';

export async function statusCommand(): Promise<void> {
  const config = loadConfig();

  console.log('');
  console.log('  steward status');
  console.log('  ──────────────');

  if (!fs.existsSync(config.configPath)) {
    console.log('  ❌ Not initialized. Run: steward init');
  } else {
    console.log(`  Config:   ${config.configPath}`);
  }

  console.log(`  Model:    ${config.model}`);
  console.log(`  API key:  ${config.apiKey ? '✅ Present' : '❌ Missing'}`);
  console.log(`  Search:   ${config.search.apiKey && config.search.engineId ? '✅ Configured' : 'Not configured'}`);
  console.log(`  Approval: ${config.autoApprove ? 'automatic' : 'interactive'}`);
  console.log(`  Retries:  ${config.maxRetries}`);

  const profile = new ProfileStore(config.profilePath);
  if (profile.exists()) {
    const policy = profile.securityPolicy();
    console.log(`  Profile:  ✅ ${config.profilePath}`);
    console.log(`  Policy:   shell ${policy.allowShellCommands ? 'on' : 'off'}, tools ${policy.allowToolUsage ? 'on' : 'off'}, ` +
      `${policy.commandBlacklist.length} blocked command(s), ${policy.fileAccessBlacklist.length} blocked path(s)`);
  } else {
    console.log('  Profile:  ❌ Missing (default policy in effect)');
  }

  if (fs.existsSync(config.historyFile)) {
    const lines = fs.readFileSync(config.historyFile, 'utf-8').trim().split('\n').filter(Boolean);
    console.log(`  History:  ✅ ${lines.length} entr${lines.length === 1 ? 'y' : 'ies'}`);
  } else {
    console.log('  History:  No entries yet');
  }

  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.log('');
    console.log('  ⚠️  Problems:');
    for (const error of errors) {
      console.log(`    - ${error}`);
    }
  }

  console.log('');
}
