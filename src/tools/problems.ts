import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { UNSOLVED_STAGES } from '../types.js';
import type { ProblemStore } from '../store/index.js';
import { jsonResult, failure } from './result.js';

const problemFields = {
  title: z.string().trim().min(1).describe('Problem title'),
  link: z.string().url().nullable().optional().describe('URL of the problem statement'),
  source: z
    .string()
    .nullable()
    .optional()
    .describe('Where the problem comes from (e.g. Codeforces, AtCoder, Luogu)'),
  tags: z.array(z.string()).optional().describe('Tags such as ["dp", "graphs"]'),
  assignee: z.string().nullable().optional().describe('Team member currently working on it'),
  solved: z.boolean().optional().describe('Whether the team has solved it (default false)'),
  unsolved_stage: z
    .enum(UNSOLVED_STAGES)
    .nullable()
    .optional()
    .describe(
      'How far along an unsolved problem is: unseen, seen_no_idea, knows_approach_not_implemented. ' +
        'Cleared when solved is true.',
    ),
  unsolved_custom_label: z
    .string()
    .nullable()
    .optional()
    .describe('Free-text label for an unsolved problem. Cleared when solved is true.'),
  pass_count: z
    .number()
    .int()
    .min(0)
    .nullable()
    .optional()
    .describe('How many contestants solved it in contest (higher usually means easier)'),
  notes: z.string().nullable().optional().describe('Free-form notes'),
};

export function registerProblemTools(server: McpServer, problems: ProblemStore): void {
  server.registerTool(
    'list_problems',
    {
      description:
        'List every tracked problem. Each record includes has_solution, which is true when a ' +
        'solution write-up is stored for it.',
      inputSchema: {
        solved: z.boolean().optional().describe('Only return solved (true) or unsolved (false) problems'),
        tag: z.string().optional().describe('Only return problems carrying this tag'),
        assignee: z.string().optional().describe('Only return problems assigned to this person'),
      },
    },
    async ({ solved, tag, assignee }) => {
      try {
        const records = (await problems.list()).filter(
          (p) =>
            (solved === undefined || p.solved === solved) &&
            (tag === undefined || p.tags.includes(tag)) &&
            (assignee === undefined || p.assignee === assignee),
        );
        return jsonResult(records);
      } catch (error) {
        return failure('listing problems', error);
      }
    },
  );

  server.registerTool(
    'get_problem',
    {
      description: 'Retrieve one problem by ID.',
      inputSchema: { id: z.string().describe('Problem ID') },
    },
    async ({ id }) => {
      try {
        return jsonResult(await problems.get(id));
      } catch (error) {
        return failure('retrieving problem', error);
      }
    },
  );

  server.registerTool(
    'create_problem',
    {
      description:
        'Track a new problem. The server assigns the ID and timestamps. ' +
        'Marking it solved clears unsolved_stage and unsolved_custom_label.',
      inputSchema: problemFields,
    },
    async (input) => {
      try {
        return jsonResult(await problems.create(input));
      } catch (error) {
        return failure('creating problem', error);
      }
    },
  );

  server.registerTool(
    'update_problem',
    {
      description:
        'Replace the fields of an existing problem. Fields left out are reset to their defaults, ' +
        'so send the complete record. Marking it solved clears the unsolved fields.',
      inputSchema: { id: z.string().describe('Problem ID'), ...problemFields },
    },
    async ({ id, ...input }) => {
      try {
        return jsonResult(await problems.update(id, input));
      } catch (error) {
        return failure('updating problem', error);
      }
    },
  );

  server.registerTool(
    'delete_problem',
    {
      description: 'Permanently delete a problem and its solution write-up.',
      inputSchema: { id: z.string().describe('Problem ID') },
    },
    async ({ id }) => {
      try {
        await problems.remove(id);
        return jsonResult({ ok: true, deleted_id: id });
      } catch (error) {
        return failure('deleting problem', error);
      }
    },
  );

  server.registerTool(
    'get_solution',
    {
      description: 'Read the Markdown solution write-up of a problem. Empty markdown means none is stored.',
      inputSchema: { id: z.string().describe('Problem ID') },
    },
    async ({ id }) => {
      try {
        return jsonResult(await problems.getSolution(id));
      } catch (error) {
        return failure('reading solution', error);
      }
    },
  );

  server.registerTool(
    'put_solution',
    {
      description:
        'Store the Markdown solution write-up of a problem, replacing any previous one. ' +
        'Sending blank text removes the solution.',
      inputSchema: {
        id: z.string().describe('Problem ID'),
        markdown: z.string().describe('Solution write-up in Markdown'),
      },
    },
    async ({ id, markdown }) => {
      try {
        return jsonResult({ ok: true, ...(await problems.putSolution(id, markdown)) });
      } catch (error) {
        return failure('saving solution', error);
      }
    },
  );

  server.registerTool(
    'delete_solution',
    {
      description: 'Remove the solution write-up of a problem.',
      inputSchema: { id: z.string().describe('Problem ID') },
    },
    async ({ id }) => {
      try {
        return jsonResult({ ok: true, ...(await problems.deleteSolution(id)) });
      } catch (error) {
        return failure('deleting solution', error);
      }
    },
  );

  server.registerTool(
    'export_problems',
    {
      description:
        'Export every problem as JSON, with each solution write-up inlined as solution_markdown. ' +
        'The output can be fed back to import_problems.',
      inputSchema: {},
    },
    async () => {
      try {
        return jsonResult(await problems.exportAll());
      } catch (error) {
        return failure('exporting problems', error);
      }
    },
  );

  server.registerTool(
    'import_problems',
    {
      description:
        'Replace ALL problems with the given records (typically from export_problems). ' +
        'The current problems file is backed up first. Records of older formats are upgraded, and ' +
        'inline solution_markdown fields become solution write-ups.',
      inputSchema: {
        problems: z.array(z.record(z.unknown())).describe('Problem records to import'),
      },
    },
    async ({ problems: records }) => {
      try {
        const count = await problems.importAll(records);
        return jsonResult({ ok: true, replaced_count: count });
      } catch (error) {
        return failure('importing problems', error);
      }
    },
  );
}
