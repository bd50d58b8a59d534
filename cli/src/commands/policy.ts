/**
 * steward policy: inspect the security policy and compliance rules
 *
 * Commands:
 *   steward policy show    Display the effective security policy
 *   steward policy check   Run check_policies once and list violations
 */

import { stringify as yamlStringify } from 'yaml';
import { loadConfig } from '../config/config.js';
import { ProfileStore } from '../config/profile.js';
import { serializeSecurityPolicy } from '../core/policy.js';
import { createToolContext, createToolRegistry } from '../tools/index.js';
import { runPolicyCheck } from './watch.js';

export async function policyCommand(action: string): Promise<void> {
  const config = loadConfig();
  const profile = new ProfileStore(config.profilePath);

  switch (action) {
    case 'show': {
      if (!profile.exists()) {
        console.log('  No profile found; using the default policy. Run: steward init');
      }

      const policy = profile.securityPolicy();
      console.log('');
      console.log('  Security Policy');
      console.log('  ───────────────');
      console.log('');
      console.log(yamlStringify(serializeSecurityPolicy(policy)).trimEnd().split('\n').map(l => '  ' + l).join('\n'));

      const rules = profile.complianceRules();
      if (rules.length > 0) {
        console.log('');
        console.log('  Compliance rules:');
        for (const rule of rules) {
          console.log(`    ${rule.enabled ? '✅' : '  '} ${rule.name}${rule.description ? ` - ${rule.description}` : ''}`);
        }
      }
      console.log('');
      break;
    }

    case 'check': {
      const tools = createToolRegistry(createToolContext(config));
      const outcome = await runPolicyCheck(tools);
      if (!outcome.ok || outcome.violations > 0) process.exitCode = 1;
      break;
    }

    default:
      console.error(`  ❌ Unknown policy command: ${action}`);
      process.exitCode = 1;
  }
}
