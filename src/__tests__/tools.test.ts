/**
 * Tool-level tests through the MCP protocol.
 *
 * A client talks to the real server over an in-memory transport; the data
 * directory lives in a temp dir and git is replaced by FakeGit.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { FakeGit, makeTempDir, removeTempDir } from './helpers.js';
import { openLedger } from '../ledger.js';
import { createServer } from '../server.js';

interface ToolResponse {
  isError: boolean;
  texts: string[];
}

function toResponse(result: unknown): ToolResponse {
  if (typeof result !== 'object' || result === null || !('content' in result) || !Array.isArray(result.content)) {
    throw new Error('Tool result has no content');
  }
  const texts: string[] = [];
  for (const item of result.content) {
    const entry: unknown = item;
    if (typeof entry === 'object' && entry !== null && 'text' in entry && typeof entry.text === 'string') {
      texts.push(entry.text);
    }
  }
  return { isError: 'isError' in result && result.isError === true, texts };
}

describe('MCP tools', () => {
  let tempDir: string;
  let git: FakeGit;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    tempDir = makeTempDir('tools');
    git = new FakeGit();
    const ledger = openLedger({
      dataDir: join(tempDir, 'data'),
      syncConfigPath: join(tempDir, 'sync.json'),
      git: git.run,
    });
    server = createServer(ledger);
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    removeTempDir(tempDir);
  });

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolResponse> {
    return toResponse(await client.callTool({ name, arguments: args }));
  }

  /** Parsed JSON of the first text block. */
  async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const response = await call(name, args);
    expect(response.isError).toBe(false);
    const parsed: unknown = JSON.parse(response.texts[0]);
    return parsed;
  }

  async function createProblem(args: Record<string, unknown>): Promise<string> {
    const created = await callJson('create_problem', args);
    if (typeof created !== 'object' || created === null || !('id' in created) || typeof created.id !== 'string') {
      throw new Error('create_problem returned no id');
    }
    return created.id;
  }

  it('registers every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'create_contest',
      'create_problem',
      'delete_contest',
      'delete_problem',
      'delete_solution',
      'export_problems',
      'get_contest',
      'get_problem',
      'get_solution',
      'import_problems',
      'list_contests',
      'list_problems',
      'put_solution',
      'sync_init',
      'sync_pull',
      'sync_push',
      'sync_status',
      'update_contest',
      'update_problem',
    ]);
  });

  describe('problems', () => {
    it('creates and fetches a problem', async () => {
      const id = await createProblem({ title: 'Shortest Path', tags: ['graphs'], assignee: 'alice' });

      expect(await callJson('get_problem', { id })).toMatchObject({
        id,
        title: 'Shortest Path',
        tags: ['graphs'],
        assignee: 'alice',
        solved: false,
        has_solution: false,
      });
    });

    it('filters the list', async () => {
      await createProblem({ title: 'Solved one', solved: true, tags: ['dp'] });
      await createProblem({ title: 'Open one', tags: ['dp', 'math'] });
      await createProblem({ title: 'Other', tags: ['math'], assignee: 'bob' });

      const titles = async (args: Record<string, unknown>): Promise<unknown> => {
        const listed = await callJson('list_problems', args);
        return Array.isArray(listed)
          ? listed.map((p: unknown) => (typeof p === 'object' && p !== null && 'title' in p ? p.title : null))
          : null;
      };

      expect(await titles({})).toEqual(['Solved one', 'Open one', 'Other']);
      expect(await titles({ solved: false })).toEqual(['Open one', 'Other']);
      expect(await titles({ tag: 'dp' })).toEqual(['Solved one', 'Open one']);
      expect(await titles({ assignee: 'bob' })).toEqual(['Other']);
    });

    it('reports unknown ids as errors', async () => {
      const response = await call('get_problem', { id: 'nope' });

      expect(response).toEqual({ isError: true, texts: ['Problem not found: nope'] });
    });

    it('stores, reads and removes a solution', async () => {
      const id = await createProblem({ title: 'Flows' });

      expect(await callJson('put_solution', { id, markdown: '# Max flow\nDinic.' })).toMatchObject({
        ok: true,
        has_solution: true,
      });
      expect(await callJson('get_solution', { id })).toMatchObject({ markdown: '# Max flow\nDinic.', has_solution: true });
      expect(await callJson('get_problem', { id })).toMatchObject({ has_solution: true });

      expect(await callJson('delete_solution', { id })).toMatchObject({ ok: true, has_solution: false });
      expect(await callJson('get_solution', { id })).toMatchObject({ markdown: '', has_solution: false });
    });

    it('deletes a problem', async () => {
      const id = await createProblem({ title: 'Gone' });

      expect(await callJson('delete_problem', { id })).toEqual({ ok: true, deleted_id: id });
      expect((await call('get_problem', { id })).isError).toBe(true);
    });

    it('imports what it exported', async () => {
      const id = await createProblem({ title: 'Portable' });
      await call('put_solution', { id, markdown: 'proof' });
      const exported = await callJson('export_problems');

      await call('delete_problem', { id });
      expect(await callJson('import_problems', { problems: exported })).toEqual({ ok: true, replaced_count: 1 });

      expect(await callJson('get_solution', { id })).toMatchObject({ markdown: 'proof', has_solution: true });
    });
  });

  describe('contests', () => {
    it('creates and updates a contest', async () => {
      const created = await callJson('create_contest', {
        name: 'Weekly 7',
        total_problems: 2,
        problems: [{ pass_count: 50, status: 'accepted' }],
      });
      expect(created).toMatchObject({
        name: 'Weekly 7',
        problems: [
          { letter: 'A', pass_count: 50, attempt_count: 0, status: 'accepted' },
          { letter: 'B', pass_count: 0, attempt_count: 0, status: 'unsubmitted' },
        ],
      });

      const id = typeof created === 'object' && created !== null && 'id' in created ? created.id : null;
      const updated = await callJson('update_contest', { id, name: 'Weekly 7', total_problems: 3, rank: '3/40' });

      expect(updated).toMatchObject({ id, total_problems: 3, rank: '3/40' });
      expect(await callJson('list_contests')).toHaveLength(1);
    });

    it('reports unknown contests as errors', async () => {
      expect(await call('delete_contest', { id: 'nope' })).toEqual({
        isError: true,
        texts: ['Contest not found: nope'],
      });
    });
  });

  describe('sync', () => {
    it('returns a summary and the transcript', async () => {
      const response = await call('sync_push', {});

      expect(response.isError).toBe(true);
      expect(JSON.parse(response.texts[0])).toEqual({
        operation: 'push',
        ok: false,
        outcome: 'remote_not_configured',
        failed_step: 'remote',
      });
      expect(response.texts[1]).toContain('Remote "origin" is not configured.');
    });

    it('reports status of an uninitialized data directory', async () => {
      const response = await call('sync_status');

      expect(response.isError).toBe(false);
      expect(JSON.parse(response.texts[0])).toEqual({
        operation: 'status',
        ok: true,
        outcome: 'reported',
        status: { initialized: false, branch: null, remote: null, clean: null, changes: '' },
      });
    });

    it('refuses a second sync while one is running', async () => {
      const release = git.pause();

      const first = call('sync_init', { remote: 'https://example.com/team/problems.git' });
      await vi.waitFor(() => expect(git.calls).toHaveLength(1));

      expect(await call('sync_status')).toEqual({
        isError: true,
        texts: ['A sync operation is already in progress. Try again shortly.'],
      });

      release();
      const done = await first;
      expect(done.isError).toBe(false);
      expect(JSON.parse(done.texts[0])).toMatchObject({ operation: 'init', ok: true, outcome: 'initialized' });
    });
  });
});
