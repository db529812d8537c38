import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CONTEST_STATUSES, MIN_CONTEST_PROBLEMS, MAX_CONTEST_PROBLEMS } from '../types.js';
import type { ContestStore } from '../store/index.js';
import { jsonResult, failure } from './result.js';

const contestFields = {
  name: z.string().trim().min(1).describe('Contest name'),
  total_problems: z
    .number()
    .int()
    .min(MIN_CONTEST_PROBLEMS)
    .max(MAX_CONTEST_PROBLEMS)
    .describe(`Number of problems (${MIN_CONTEST_PROBLEMS}-${MAX_CONTEST_PROBLEMS})`),
  problems: z
    .array(
      z.object({
        pass_count: z.number().int().min(0).optional().describe('Contestants who solved it'),
        attempt_count: z.number().int().min(0).optional().describe('Contestants who attempted it'),
        status: z.enum(CONTEST_STATUSES).optional().describe('Our result on it'),
      }),
    )
    .optional()
    .describe('Per-problem results in order A, B, C, ... Padded or truncated to total_problems.'),
  rank: z.string().nullable().optional().describe('Final standing, e.g. "12/180"'),
  summary: z.string().nullable().optional().describe('Post-contest write-up'),
};

export function registerContestTools(server: McpServer, contests: ContestStore): void {
  server.registerTool(
    'list_contests',
    {
      description: 'List every recorded contest with its per-problem results.',
      inputSchema: {},
    },
    async () => {
      try {
        return jsonResult(await contests.list());
      } catch (error) {
        return failure('listing contests', error);
      }
    },
  );

  server.registerTool(
    'get_contest',
    {
      description: 'Retrieve one contest by ID.',
      inputSchema: { id: z.string().describe('Contest ID') },
    },
    async ({ id }) => {
      try {
        return jsonResult(await contests.get(id));
      } catch (error) {
        return failure('retrieving contest', error);
      }
    },
  );

  server.registerTool(
    'create_contest',
    {
      description:
        'Record a contest. Problems are lettered A, B, C, ... automatically and the list always ' +
        'has exactly total_problems entries.',
      inputSchema: contestFields,
    },
    async (input) => {
      try {
        return jsonResult(await contests.create(input));
      } catch (error) {
        return failure('creating contest', error);
      }
    },
  );

  server.registerTool(
    'update_contest',
    {
      description: 'Replace the fields of an existing contest. Send the complete record.',
      inputSchema: { id: z.string().describe('Contest ID'), ...contestFields },
    },
    async ({ id, ...input }) => {
      try {
        return jsonResult(await contests.update(id, input));
      } catch (error) {
        return failure('updating contest', error);
      }
    },
  );

  server.registerTool(
    'delete_contest',
    {
      description: 'Permanently delete a contest.',
      inputSchema: { id: z.string().describe('Contest ID') },
    },
    async ({ id }) => {
      try {
        await contests.remove(id);
        return jsonResult({ ok: true, deleted_id: id });
      } catch (error) {
        return failure('deleting contest', error);
      }
    },
  );
}
