/**
 * Default config.yml and profile.yml contents for new installations.
 */

import { DEFAULT_SECURITY_POLICY, serializeSecurityPolicy } from '../core/policy.js';
import { DEFAULT_MAX_RETRIES } from '../core/agent.js';
import { DEFAULT_OUTPUT_LIMIT } from '../core/history.js';

export { DEFAULT_MAX_RETRIES };
export const DEFAULT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_WATCH_INTERVAL_SECONDS = 300;

export function getDefaultConfigFile(historyFile: string) {
  return {
    api: {
      key: '',
      model: DEFAULT_MODEL,
    },
    behavior: {
      auto_approve: false,
      max_retries: DEFAULT_MAX_RETRIES,
      output_limit: DEFAULT_OUTPUT_LIMIT,
    },
    history: {
      file: historyFile,
    },
    search: {
      google_api_key: '',
      engine_id: '',
    },
    watch: {
      interval_seconds: DEFAULT_WATCH_INTERVAL_SECONDS,
    },
  };
}

export function getDefaultProfile() {
  return {
    name: 'User',
    preferences: {
      default_tool: 'shell',
    },
    policies: [
      {
        name: 'no_root_processes',
        enabled: false,
        description: 'Ensures no processes are running with root or SYSTEM privileges.',
      },
    ],
    security: serializeSecurityPolicy(DEFAULT_SECURITY_POLICY),
  };
}
