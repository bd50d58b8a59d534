/**
 * ProfileStore: the user's profile.yml
 *
 * Holds the user's name, preferences, compliance policies and the
 * security section the vetting policy is built from. A missing or
 * unreadable profile reads as the default profile.
 */

import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse, stringify as yamlStringify } from 'yaml';
import { getDefaultProfile } from './defaults.js';
import { isObject } from './config.js';
import { parseSecurityPolicy } from '../core/policy.js';
import type { SecurityPolicy } from '../core/types.js';

export interface ComplianceRule {
  name: string;
  enabled: boolean;
  description: string;
}

export class ProfileStore {
  readonly path: string;

  constructor(profilePath: string) {
    this.path = profilePath;
  }

  exists(): boolean {
    return fs.existsSync(this.path);
  }

  /** Write the default profile if none exists yet. */
  ensure(): void {
    if (this.exists()) return;
    this.write(getDefaultProfile());
  }

  read(): Record<string, unknown> {
    if (!this.exists()) return getDefaultProfile();
    try {
      const parsed: unknown = yamlParse(fs.readFileSync(this.path, 'utf-8'));
      return isObject(parsed) ? parsed : getDefaultProfile();
    } catch (err) {
      console.error(`  [profile] Could not read ${this.path}: ${(err as Error).message}`);
      return getDefaultProfile();
    }
  }

  write(profile: Record<string, unknown>): void {
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    fs.writeFileSync(this.path, yamlStringify(profile), 'utf-8');
  }

  /** Look up a dotted key such as `preferences.editor`. */
  get(key: string): unknown {
    let current: unknown = this.read();
    for (const part of key.split('.')) {
      if (!isObject(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  /** Set a dotted key, creating intermediate sections. */
  set(key: string, value: unknown): void {
    const profile = this.read();
    const parts = key.split('.');
    const last = parts.pop();
    if (!last) return;

    let current = profile;
    for (const part of parts) {
      const next = current[part];
      if (isObject(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }
    current[last] = value;
    this.write(profile);
  }

  securityPolicy(): SecurityPolicy {
    return parseSecurityPolicy(this.read().security);
  }

  complianceRules(): ComplianceRule[] {
    const raw = this.read().policies;
    if (!Array.isArray(raw)) return [];

    const rules: ComplianceRule[] = [];
    for (const item of raw) {
      if (!isObject(item) || typeof item.name !== 'string') continue;
      rules.push({
        name: item.name,
        enabled: item.enabled === true,
        description: typeof item.description === 'string' ? item.description : '',
      });
    }
    return rules;
  }
}
