#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { openLedger } from './ledger.js';
import { parseOptions, USAGE } from './options.js';
import { createServer, SERVER_NAME } from './server.js';

const options = parseOptions(process.argv.slice(2));

if (options.help) {
  console.error(USAGE);
  process.exit(0);
}

async function main(): Promise<void> {
  const ledger = openLedger({ dataDir: options.dataDir, syncConfigPath: options.syncConfigPath });
  console.error(`Data directory: ${ledger.dataDir}`);

  // First load creates missing containers and upgrades old ones in place.
  const [problems, contests] = await Promise.all([ledger.problems.loadAll(), ledger.contests.loadAll()]);
  console.error(`Loaded ${problems.length} problems, ${contests.length} contests`);

  const { remote, branch } = ledger.syncConfig.load();
  console.error(remote ? `Sync remote: ${remote} (${branch})` : 'Sync remote: not configured');

  const server = createServer(ledger);

  const shutdown = (): void => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown error:', error);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(`${SERVER_NAME} server running on stdio`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
