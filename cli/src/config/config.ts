/**
 * Config: ~/.steward/config.yml plus environment overrides
 *
 * Precedence for every setting: environment variable, then config.yml,
 * then the built-in default. Numbers that do not parse as positive
 * integers fall back to the default.
 *
 *   GEMINI_API_KEY                 api.key
 *   STEWARD_MODEL                  api.model
 *   STEWARD_MAX_RETRIES            behavior.max_retries
 *   STEWARD_AUTO_APPROVE           behavior.auto_approve
 *   STEWARD_HISTORY_FILE           history.file
 *   GOOGLE_API_KEY                 search.google_api_key
 *   PROGRAMMABLE_SEARCH_ENGINE_ID  search.engine_id
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { DEFAULT_MAX_RETRIES, DEFAULT_MODEL, DEFAULT_WATCH_INTERVAL_SECONDS } from './defaults.js';
import { DEFAULT_OUTPUT_LIMIT } from '../core/history.js';

export interface Config {
  homeDir: string;
  configPath: string;
  profilePath: string;
  apiKey: string;
  model: string;
  autoApprove: boolean;
  maxRetries: number;
  outputLimit: number;
  historyFile: string;
  search: {
    apiKey: string;
    engineId: string;
  };
  watchIntervalSeconds: number;
}

type Env = Record<string, string | undefined>;

export function resolveHomeDir(env: Env = process.env): string {
  return env.STEWARD_HOME || path.join(env.HOME || os.homedir(), '.steward');
}

export function loadConfig(env: Env = process.env): Config {
  const homeDir = resolveHomeDir(env);
  const configPath = path.join(homeDir, 'config.yml');
  const file = readYamlObject(configPath);

  const api = section(file, 'api');
  const behavior = section(file, 'behavior');
  const history = section(file, 'history');
  const search = section(file, 'search');
  const watch = section(file, 'watch');

  return {
    homeDir,
    configPath,
    profilePath: path.join(homeDir, 'profile.yml'),
    apiKey: env.GEMINI_API_KEY || str(api.key) || '',
    model: env.STEWARD_MODEL || str(api.model) || DEFAULT_MODEL,
    autoApprove: bool(env.STEWARD_AUTO_APPROVE) ?? bool(behavior.auto_approve) ?? false,
    maxRetries: positiveInt(env.STEWARD_MAX_RETRIES) ?? positiveInt(behavior.max_retries) ?? DEFAULT_MAX_RETRIES,
    outputLimit: positiveInt(behavior.output_limit) ?? DEFAULT_OUTPUT_LIMIT,
    historyFile: env.STEWARD_HISTORY_FILE || str(history.file) || path.join(homeDir, 'history.jsonl'),
    search: {
      apiKey: env.GOOGLE_API_KEY || str(search.google_api_key) || '',
      engineId: env.PROGRAMMABLE_SEARCH_ENGINE_ID || str(search.engine_id) || '',
    },
    watchIntervalSeconds: positiveInt(watch.interval_seconds) ?? DEFAULT_WATCH_INTERVAL_SECONDS,
  };
}

/** Errors that stop commands which need the generation service. */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!config.apiKey) {
    errors.push('Missing API key: set GEMINI_API_KEY or api.key in config.yml');
  }
  if (!config.model) {
    errors.push('Missing model name');
  }
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 1) {
    errors.push(`Invalid max_retries: ${config.maxRetries}. Must be a positive integer`);
  }
  if (!Number.isInteger(config.outputLimit) || config.outputLimit < 1) {
    errors.push(`Invalid output_limit: ${config.outputLimit}. Must be a positive integer`);
  }

  return errors;
}

export function readYamlObject(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = yamlParse(fs.readFileSync(filePath, 'utf-8'));
  return isObject(parsed) ? parsed : {};
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function section(file: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = file[key];
  return isObject(value) ? value : {};
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function bool(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function positiveInt(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 ? value : undefined;
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) return undefined;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}
