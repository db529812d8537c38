/**
 * Sync config cache: the last remote URL and branch used, so a new session
 * can sync without being configured again.
 *
 * The file lives outside the synced data directory and is overwritten
 * wholesale on every save.
 */

import { z } from 'zod';
import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export const DEFAULT_BRANCH = 'main';

export interface SyncSettings {
  remote: string;
  branch: string;
}

/** Zod schema for the cache file. Unknown keys are ignored. */
const SyncConfigFileSchema = z.object({
  remote: z.string(),
  branch: z.string(),
  lastUpdated: z.string().optional(),
});

export class SyncConfigCache {
  constructor(readonly path: string) {}

  /** Cached settings, or defaults when the file is missing or unreadable. Never throws. */
  load(): SyncSettings {
    const defaults: SyncSettings = { remote: '', branch: DEFAULT_BRANCH };
    if (!existsSync(this.path)) return defaults;

    try {
      const data: unknown = JSON.parse(readFileSync(this.path, 'utf-8'));
      const parsed = SyncConfigFileSchema.safeParse(data);
      if (!parsed.success) {
        console.error(`Warning: ignoring invalid sync config ${this.path}: ${parsed.error.message}`);
        return defaults;
      }
      return {
        remote: parsed.data.remote.trim(),
        branch: parsed.data.branch.trim() || DEFAULT_BRANCH,
      };
    } catch (error) {
      console.error(
        `Warning: could not read sync config ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return defaults;
    }
  }

  save(remote: string, branch: string): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const content = {
      remote: remote.trim(),
      branch: branch.trim() || DEFAULT_BRANCH,
      lastUpdated: new Date().toISOString(),
    };
    writeFileSync(this.path, JSON.stringify(content, null, 2) + '\n');
  }
}
