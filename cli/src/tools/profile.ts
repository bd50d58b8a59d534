import { z } from 'zod';
import { defineTool } from './registry.js';

export const manageProfile = defineTool({
  name: 'manage_profile',
  scope: 'system_write',
  signature: 'manage_profile(action: "read" | "get" | "set", key?: string, value?: unknown)',
  description: "Reads ('read'), gets ('get') or sets ('set') values in the user's profile. Keys may be dotted, e.g. 'preferences.editor'.",
  args: z.object({
    action: z.string(),
    key: z.string().min(1).optional(),
    value: z.unknown().optional(),
  }),
  async handler({ action, key, value }, ctx) {
    ctx.profile.ensure();

    switch (action) {
      case 'read':
        return { success: true, profile: ctx.profile.read() };

      case 'get':
        if (!key) return { success: false, error: "A 'key' must be provided for the 'get' action." };
        return { success: true, key, value: ctx.profile.get(key) ?? null };

      case 'set':
        if (!key) return { success: false, error: "A 'key' must be provided for the 'set' action." };
        ctx.profile.set(key, value ?? null);
        return { success: true, message: `Set '${key}' to '${JSON.stringify(value ?? null)}' in profile.` };

      default:
        return { success: false, error: `Invalid action '${action}'. Must be one of 'read', 'get', 'set'.` };
    }
  },
});
