import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SyncOrchestrator, SyncResult } from '../sync/index.js';
import { errorResult, failure } from './result.js';

const targetFields = {
  remote: z
    .string()
    .optional()
    .describe('Remote repository URL. Omit to use the last one configured.'),
  branch: z.string().optional().describe('Branch name. Omit to use the last one configured (default main).'),
};

/** Summary first, then the raw git transcript. */
function syncResponse(result: SyncResult, extra: Record<string, unknown> = {}) {
  const summary = {
    operation: result.operation,
    ok: result.ok,
    outcome: result.outcome,
    ...(result.failedStep ? { failed_step: result.failedStep } : {}),
    ...extra,
  };
  return {
    content: [
      { type: 'text' as const, text: JSON.stringify(summary) },
      { type: 'text' as const, text: result.transcript },
    ],
    ...(result.ok ? {} : { isError: true }),
  };
}

/**
 * Register the git sync tools. Only one sync operation runs at a time per
 * process; a second call while one is running is refused.
 */
export function registerSyncTools(server: McpServer, sync: SyncOrchestrator): void {
  let syncInProgress = false;

  async function exclusive(action: string, run: () => Promise<ReturnType<typeof syncResponse>>) {
    if (syncInProgress) {
      return errorResult('A sync operation is already in progress. Try again shortly.');
    }
    syncInProgress = true;
    try {
      return await run();
    } catch (error) {
      return failure(action, error);
    } finally {
      syncInProgress = false;
    }
  }

  server.registerTool(
    'sync_status',
    {
      description:
        'Show the git state of the data directory: current branch, configured remote, and ' +
        'uncommitted changes (git status --short).',
      inputSchema: {},
    },
    async () =>
      exclusive('reading sync status', async () => {
        const result = await sync.status();
        return syncResponse(result, { status: result.status });
      }),
  );

  server.registerTool(
    'sync_init',
    {
      description:
        'Initialize the data directory as a git repository and point its "origin" remote at the ' +
        'given URL. The URL and branch are remembered for later syncs.',
      inputSchema: targetFields,
    },
    async ({ remote, branch }) =>
      exclusive('initializing sync', async () => syncResponse(await sync.init({ remote, branch }))),
  );

  server.registerTool(
    'sync_pull',
    {
      description:
        'Pull the team\'s changes from the remote. Initializes the repository first if needed. ' +
        'Retries once with --allow-unrelated-histories when the first pull fails.',
      inputSchema: targetFields,
    },
    async ({ remote, branch }) =>
      exclusive('pulling', async () => syncResponse(await sync.pull({ remote, branch }))),
  );

  server.registerTool(
    'sync_push',
    {
      description:
        'Commit every change in the data directory and push it. Reports "no_changes" without ' +
        'committing when nothing changed. Retries once with upstream tracking when the first push fails.',
      inputSchema: {
        ...targetFields,
        message: z
          .string()
          .optional()
          .describe('Commit message (default: "update data (<UTC timestamp>)")'),
      },
    },
    async ({ remote, branch, message }) =>
      exclusive('pushing', async () => syncResponse(await sync.push({ remote, branch, message }))),
  );
}
