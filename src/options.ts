import { resolve } from 'node:path';
import { homedir } from 'node:os';

export const HOME_ENV_VAR = 'PROBLEM_LEDGER_HOME';

export interface ServerOptions {
  /** Root for data and local settings (default: ~/.problem-ledger). */
  home: string;
  dataDir: string;
  syncConfigPath: string;
  help: boolean;
}

export const USAGE = `
problem-ledger: competitive-programming problem and contest tracker (MCP Server)

Usage:
  problem-ledger [options]

Options:
  --home <path>          Root directory (default: $${HOME_ENV_VAR} or ~/.problem-ledger)
  --data-dir <path>      Data directory synced through git (default: <home>/data)
  --sync-config <path>   Sync settings cache (default: <home>/sync.json)
  --help                 Show this help message

Sync tools run the git CLI and need git 2.28 or newer on PATH.
`;

/** Parse CLI arguments. Unknown arguments are ignored. */
export function parseOptions(args: readonly string[], env: NodeJS.ProcessEnv = process.env): ServerOptions {
  let home: string | undefined;
  let dataDir: string | undefined;
  let syncConfigPath: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--home' && next) {
      home = next;
      i++;
    } else if (args[i] === '--data-dir' && next) {
      dataDir = next;
      i++;
    } else if (args[i] === '--sync-config' && next) {
      syncConfigPath = next;
      i++;
    } else if (args[i] === '--help') {
      help = true;
    }
  }

  const root = resolve(home ?? env[HOME_ENV_VAR] ?? resolve(homedir(), '.problem-ledger'));
  return {
    home: root,
    dataDir: resolve(dataDir ?? resolve(root, 'data')),
    syncConfigPath: resolve(syncConfigPath ?? resolve(root, 'sync.json')),
    help,
  };
}
