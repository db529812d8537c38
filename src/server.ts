import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { INSTRUCTIONS } from './instructions.js';
import type { Ledger } from './ledger.js';
import { registerProblemTools } from './tools/problems.js';
import { registerContestTools } from './tools/contests.js';
import { registerSyncTools } from './tools/sync.js';

export const SERVER_NAME = 'problem-ledger';
export const SERVER_VERSION = '1.0.0';

/** MCP server with every tool registered against `ledger`. Not yet connected. */
export function createServer(ledger: Ledger): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION }, { instructions: INSTRUCTIONS });

  registerProblemTools(server, ledger.problems);
  registerContestTools(server, ledger.contests);
  registerSyncTools(server, ledger.sync);

  return server;
}
