import { resolve } from 'node:path';
import { ProblemStore, ContestStore, SolutionStore } from './store/index.js';
import { SyncConfigCache, SyncOrchestrator, type GitRunner } from './sync/index.js';

export interface LedgerOptions {
  /** Directory holding the containers and side-files; also the git work tree. */
  dataDir: string;
  /** Sync config cache file. Keep it outside `dataDir` so it is never committed. */
  syncConfigPath: string;
  git?: GitRunner;
}

/**
 * Every long-lived handle the server needs. Built once at startup and
 * passed to the tool registrations.
 */
export interface Ledger {
  dataDir: string;
  problems: ProblemStore;
  contests: ContestStore;
  sync: SyncOrchestrator;
  syncConfig: SyncConfigCache;
}

export function openLedger(options: LedgerOptions): Ledger {
  const dataDir = resolve(options.dataDir);
  const solutions = new SolutionStore(resolve(dataDir, 'solutions'));
  const syncConfig = new SyncConfigCache(resolve(options.syncConfigPath));

  return {
    dataDir,
    problems: new ProblemStore(resolve(dataDir, 'problems.json'), solutions),
    contests: new ContestStore(resolve(dataDir, 'contests.json')),
    sync: new SyncOrchestrator({ repoPath: dataDir, config: syncConfig, git: options.git }),
    syncConfig,
  };
}
