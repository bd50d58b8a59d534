/**
 * steward init: setup wizard
 *
 * Creates ~/.steward/ with config.yml and profile.yml. An existing
 * profile is kept as is.
 */

import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolveHomeDir } from '../config/config.js';
import { getDefaultConfigFile } from '../config/defaults.js';
import { ProfileStore } from '../config/profile.js';
import { prompt } from '../channels/terminal.js';

interface InitOptions {
  model?: string;
  yes?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const homeDir = resolveHomeDir();
  const configPath = path.join(homeDir, 'config.yml');
  const profilePath = path.join(homeDir, 'profile.yml');

  console.log('');
  console.log('  steward: natural language to local actions');
  console.log('  ───────────────────────────────────────────');
  console.log('');

  fs.mkdirSync(homeDir, { recursive: true });

  const config = getDefaultConfigFile(path.join(homeDir, 'history.jsonl'));
  if (options.model) {
    config.api.model = options.model;
  }

  if (!process.env.GEMINI_API_KEY && !options.yes) {
    console.log('  Get an API key from Google AI Studio, or leave empty and set GEMINI_API_KEY.');
    const key = (await prompt('  Gemini API key: '))?.trim() ?? '';
    config.api.key = key;
  } else if (process.env.GEMINI_API_KEY) {
    console.log('  Using GEMINI_API_KEY from the environment.');
  }

  if (fs.existsSync(configPath)) {
    console.log(`  Overwriting ${configPath}`);
  }
  fs.writeFileSync(configPath, yamlStringify(config), { encoding: 'utf-8', mode: 0o600 });
  console.log(`  ✅ Config saved to ${configPath}`);

  const profile = new ProfileStore(profilePath);
  if (profile.exists()) {
    console.log(`  ✅ Keeping existing profile at ${profilePath}`);
  } else {
    profile.ensure();
    console.log(`  ✅ Default profile saved to ${profilePath}`);
  }

  console.log('');
  console.log('  🎉 steward initialized! Try:');
  console.log('');
  console.log('    steward run "show disk usage for /"');
  console.log('    steward agent');
  console.log('    steward audit');
  console.log('');
}
