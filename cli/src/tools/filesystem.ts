/**
 * Filesystem tools: read_file, write_file, list_files, monitor_file
 */

import fs from 'node:fs';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { defineTool } from './registry.js';

export const readFile = defineTool({
  name: 'read_file',
  scope: 'filesystem_read',
  pathArg: 'file_path',
  signature: 'read_file(file_path: string)',
  description: 'Reads the entire content of a text file.',
  args: z.object({ file_path: z.string().min(1) }),
  async handler({ file_path }) {
    try {
      const content = await fs.promises.readFile(file_path, 'utf-8');
      return { success: true, content };
    } catch (err) {
      return { success: false, error: fsError(err, file_path) };
    }
  },
});

export const writeFile = defineTool({
  name: 'write_file',
  scope: 'filesystem_write',
  pathArg: 'file_path',
  signature: 'write_file(file_path: string, content: string)',
  description: 'Writes content to a file, creating it and its parent directories if needed.',
  args: z.object({ file_path: z.string().min(1), content: z.string() }),
  async handler({ file_path, content }) {
    const dir = path.dirname(file_path);
    await fs.promises.mkdir(dir, { recursive: true });
    await fs.promises.writeFile(file_path, content, 'utf-8');
    return { success: true, message: `Successfully wrote to ${file_path}` };
  },
});

export const listFiles = defineTool({
  name: 'list_files',
  scope: 'filesystem_read',
  pathArg: 'path',
  signature: 'list_files(path: string = ".")',
  description: 'Lists the contents of a directory with type, size and modification time.',
  args: z.object({ path: z.string().min(1).default('.') }),
  async handler({ path: dir }) {
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (err) {
      return { success: false, error: fsError(err, dir) };
    }

    const items = [];
    for (const name of names.sort()) {
      const itemPath = path.join(dir, name);
      try {
        const stat = await fs.promises.stat(itemPath);
        items.push({
          name,
          path: itemPath,
          type: stat.isDirectory() ? 'directory' : 'file',
          size: stat.isDirectory() ? null : stat.size,
          modified: stat.mtime.toISOString(),
        });
      } catch {
        // Entries that vanish or deny stat are left out
        continue;
      }
    }

    return { success: true, path: path.resolve(dir), items };
  },
});

/**
 * Blocks until a line containing `keyword` is appended to the file or the
 * timeout passes. Only content written after the call starts is searched.
 */
export const monitorFile = defineTool({
  name: 'monitor_file',
  scope: 'filesystem_read',
  pathArg: 'file_path',
  signature: 'monitor_file(file_path: string, keyword: string, timeout: number = 60)',
  description: 'Watches a file for a new line containing a keyword, up to `timeout` seconds.',
  args: z.object({
    file_path: z.string().min(1),
    keyword: z.string().min(1),
    timeout: z.coerce.number().positive().default(60),
  }),
  async handler({ file_path, keyword, timeout }, ctx) {
    let offset: number;
    try {
      offset = (await fs.promises.stat(file_path)).size;
    } catch (err) {
      return { success: false, error: fsError(err, file_path) };
    }

    const deadline = Date.now() + timeout * 1000;
    let pending = '';

    while (Date.now() < deadline) {
      const { size } = await fs.promises.stat(file_path);
      if (size < offset) {
        // Truncated; start over from the new end
        offset = size;
        pending = '';
      }

      if (size > offset) {
        const chunk = await readRange(file_path, offset, size);
        offset = size;
        pending += chunk;

        const lines = pending.split('\n');
        pending = lines.pop() ?? '';
        const hit = lines.find((line) => line.includes(keyword));
        if (hit !== undefined) {
          return { success: true, found: true, line: hit.trim(), message: `Keyword '${keyword}' found.` };
        }
      }

      await sleep(Math.min(ctx.pollIntervalMs, Math.max(0, deadline - Date.now())));
    }

    if (pending.includes(keyword)) {
      return { success: true, found: true, line: pending.trim(), message: `Keyword '${keyword}' found.` };
    }

    return {
      success: true,
      found: false,
      message: `Timeout reached. Keyword '${keyword}' not found in ${file_path} within ${timeout}s.`,
    };
  },
});

async function readRange(filePath: string, start: number, end: number): Promise<string> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(end - start);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
    return buffer.subarray(0, bytesRead).toString('utf-8');
  } finally {
    await handle.close();
  }
}

function fsError(err: unknown, target: string): string {
  const code = err instanceof Error && 'code' in err ? err.code : undefined;
  switch (code) {
    case 'ENOENT':
      return `Not found: ${target}`;
    case 'EACCES':
    case 'EPERM':
      return `Permission denied: ${target}`;
    case 'EISDIR':
      return `Is a directory: ${target}`;
    case 'ENOTDIR':
      return `Not a directory: ${target}`;
    default:
      return err instanceof Error ? err.message : String(err);
  }
}
