import { runProcess } from '../core/process.js';
import { ProfileStore } from '../config/profile.js';
import type { Config } from '../config/config.js';
import { ToolRegistry, type RegisteredTool, type RegistryOptions, type ToolContext } from './registry.js';
import { listFiles, monitorFile, readFile, writeFile } from './filesystem.js';
import { checkPolicies, getCpuInfo, getDiskUsage, getMemoryInfo, listProcesses, readWindowsEventLog } from './system.js';
import { installPackage, listPackages, uninstallPackage } from './packages.js';
import { manageProfile } from './profile.js';
import { webScrape, webSearch } from './web.js';

export { ToolRegistry, TOOL_NAMES, defineTool } from './registry.js';
export type { ToolContext, ToolName, RegisteredTool, ToolOverride } from './registry.js';

export const BUILTIN_TOOLS: RegisteredTool[] = [
  readFile,
  writeFile,
  listFiles,
  monitorFile,
  getCpuInfo,
  getMemoryInfo,
  getDiskUsage,
  listProcesses,
  listPackages,
  installPackage,
  uninstallPackage,
  checkPolicies,
  manageProfile,
  webSearch,
  webScrape,
  readWindowsEventLog,
];

export function createToolContext(config: Config, overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    runner: runProcess,
    fetch: globalThis.fetch,
    profile: new ProfileStore(config.profilePath),
    search: config.search,
    platform: process.platform,
    pollIntervalMs: 1000,
    ...overrides,
  };
}

export function createToolRegistry(ctx: ToolContext, options: RegistryOptions = {}): ToolRegistry {
  return new ToolRegistry(BUILTIN_TOOLS, ctx, options);
}
