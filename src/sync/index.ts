/**
 * Sync layer: git-based sharing of the data directory.
 *
 * The data directory (containers plus solution side-files) is its own git
 * repository. The orchestrator commits, pushes and pulls it; git's merge
 * handles multi-machine consistency.
 */

export { SyncConfigCache, DEFAULT_BRANCH } from './config.js';
export type { SyncSettings } from './config.js';
export { runGit, formatCommand } from './git.js';
export type { GitResult, GitRunner } from './git.js';
export { Transcript } from './transcript.js';
export { SyncOrchestrator, defaultCommitMessage } from './orchestrator.js';
export type {
  SyncOperation,
  SyncOutcome,
  SyncResult,
  StatusResult,
  RepoStatus,
  SyncTarget,
  PushOptions,
  SyncOrchestratorOptions,
} from './orchestrator.js';
