/**
 * Sync orchestrator. Drives git through the fixed init / push / pull /
 * status sequences for the data directory.
 *
 * Each operation runs its steps in order, records every git call in a
 * transcript, and stops at the first failing step. There is no rollback:
 * after a failure the repository is left exactly as git left it. The only
 * retries are the two documented fallbacks:
 *
 *   push  →  push -u <remote> <branch>
 *   pull  →  pull ... --allow-unrelated-histories
 *
 * The orchestrator holds no lock of its own; callers must not run two
 * operations against the same directory at once.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { runGit, type GitResult, type GitRunner } from './git.js';
import { Transcript } from './transcript.js';
import type { SyncConfigCache, SyncSettings } from './config.js';

export type SyncOperation = 'init' | 'push' | 'pull' | 'status';

export type SyncOutcome =
  | 'initialized'
  | 'pushed'
  | 'pushed_upstream'
  | 'no_changes'
  | 'pulled'
  | 'pulled_unrelated_histories'
  | 'reported'
  | 'remote_not_configured'
  | 'invalid_settings'
  | 'tool_failure';

export interface SyncResult {
  operation: SyncOperation;
  ok: boolean;
  outcome: SyncOutcome;
  /** Name of the step that failed, when `ok` is false. */
  failedStep?: string;
  transcript: string;
}

export interface RepoStatus {
  initialized: boolean;
  branch: string | null;
  remote: string | null;
  /** null when the repository is not initialized. */
  clean: boolean | null;
  /** `git status --short` output, verbatim. */
  changes: string;
}

export interface StatusResult extends SyncResult {
  status: RepoStatus;
}

export interface SyncTarget {
  /** Remote URL. Falls back to the cached one when omitted. */
  remote?: string;
  /** Branch name. Falls back to the cached one when omitted. */
  branch?: string;
}

export interface PushOptions extends SyncTarget {
  message?: string;
}

export interface SyncOrchestratorOptions {
  repoPath: string;
  config: SyncConfigCache;
  git?: GitRunner;
  remoteName?: string;
}

interface Failure {
  outcome: SyncOutcome;
  step: string;
}

const SAFE_BRANCH_RE = /^[^\s\-~^:?*[\\][^\s~^:?*[\\]*$/;

/** Default commit message, e.g. `update data (2026-10-18 09:30:00)` (UTC). */
export function defaultCommitMessage(date: Date): string {
  return `update data (${date.toISOString().slice(0, 19).replace('T', ' ')})`;
}

export class SyncOrchestrator {
  readonly repoPath: string;
  readonly remoteName: string;
  private readonly config: SyncConfigCache;
  private readonly git: GitRunner;

  constructor(options: SyncOrchestratorOptions) {
    this.repoPath = options.repoPath;
    this.config = options.config;
    this.git = options.git ?? runGit;
    this.remoteName = options.remoteName ?? 'origin';
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  /** Make the data directory a git repo and point the remote at `remote`, if given. */
  async init(target: SyncTarget = {}): Promise<SyncResult> {
    const transcript = new Transcript();
    const settings = this.resolveSettings(target);

    const failure = this.validate(transcript, settings) ?? (await this.initSteps(transcript, settings));
    if (failure) return this.fail('init', transcript, failure);

    return this.done('init', transcript, 'initialized');
  }

  /**
   * Stage, commit and push everything in the data directory.
   * Returns `no_changes` without committing when nothing is staged.
   */
  async push(options: PushOptions = {}): Promise<SyncResult> {
    const transcript = new Transcript();
    const settings = this.resolveSettings(options);

    const failure = this.validate(transcript, settings) ?? (await this.prepare(transcript, settings));
    if (failure) return this.fail('push', transcript, failure);

    const message =
      options.message && options.message.trim() ? options.message : defaultCommitMessage(new Date());

    if ((await this.step(transcript, ['add', '-A'])).code !== 0) {
      transcript.failure('git add failed');
      return this.fail('push', transcript, { outcome: 'tool_failure', step: 'add' });
    }

    const diff = await this.step(transcript, ['diff', '--cached', '--name-only']);
    if (diff.code !== 0) {
      transcript.failure('git diff failed');
      return this.fail('push', transcript, { outcome: 'tool_failure', step: 'diff' });
    }
    if (!diff.stdout.trim()) {
      transcript.note('No changes to commit.');
      return this.done('push', transcript, 'no_changes');
    }

    // Passed as its own argument: quotes in the message need no escaping.
    if ((await this.step(transcript, ['commit', '-m', message])).code !== 0) {
      transcript.failure('git commit failed');
      return this.fail('push', transcript, { outcome: 'tool_failure', step: 'commit' });
    }

    const { branch } = settings;
    if ((await this.step(transcript, ['push', this.remoteName, branch])).code === 0) {
      transcript.success(`Pushed to ${this.remoteName}/${branch}`);
      return this.done('push', transcript, 'pushed');
    }

    transcript.note('Push failed, retrying with upstream tracking...');
    if ((await this.step(transcript, ['push', '-u', this.remoteName, branch])).code === 0) {
      transcript.success(`Pushed to ${this.remoteName}/${branch} (upstream set)`);
      return this.done('push', transcript, 'pushed_upstream');
    }

    transcript.failure('Push failed');
    return this.fail('push', transcript, { outcome: 'tool_failure', step: 'push' });
  }

  /** Pull the remote branch, falling back once to `--allow-unrelated-histories`. */
  async pull(target: SyncTarget = {}): Promise<SyncResult> {
    const transcript = new Transcript();
    const settings = this.resolveSettings(target);

    const failure = this.validate(transcript, settings) ?? (await this.prepare(transcript, settings));
    if (failure) return this.fail('pull', transcript, failure);

    const { branch } = settings;
    const args = ['pull', '--no-rebase', this.remoteName, branch];

    if ((await this.step(transcript, args)).code === 0) {
      transcript.success(`Pulled ${this.remoteName}/${branch}`);
      return this.done('pull', transcript, 'pulled');
    }

    transcript.note('Pull failed. First pull into an independent history? Retrying with --allow-unrelated-histories...');
    if ((await this.step(transcript, [...args, '--allow-unrelated-histories'])).code === 0) {
      transcript.success(`Pulled ${this.remoteName}/${branch} (unrelated histories merged)`);
      return this.done('pull', transcript, 'pulled_unrelated_histories');
    }

    transcript.failure('Pull failed');
    return this.fail('pull', transcript, { outcome: 'tool_failure', step: 'pull' });
  }

  /** Read-only summary: branch, remote and working-tree cleanliness. */
  async status(): Promise<StatusResult> {
    const transcript = new Transcript();

    if (!(await this.isRepo())) {
      transcript.note(`${this.repoPath} is not a git repository yet.`);
      return {
        ...this.done('status', transcript, 'reported'),
        status: { initialized: false, branch: null, remote: null, clean: null, changes: '' },
      };
    }

    const head = await this.git(['rev-parse', '--abbrev-ref', 'HEAD'], this.repoPath);
    const branch = head.code === 0 ? head.stdout.trim() || null : null;
    const remote = await this.remoteUrl();

    const short = await this.git(['status', '--short'], this.repoPath);
    if (short.code !== 0) {
      transcript.command(short);
      transcript.failure('git status failed');
      return {
        ...this.fail('status', transcript, { outcome: 'tool_failure', step: 'status' }),
        status: { initialized: true, branch, remote, clean: null, changes: '' },
      };
    }

    const changes = short.stdout.trimEnd();
    const clean = changes.trim() === '';

    transcript.note(`Branch: ${branch ?? 'unknown'}`);
    transcript.note(`Remote: ${remote ?? 'not configured'}`);
    transcript.note(clean ? 'Working tree clean' : `Uncommitted changes:\n${changes}`);

    return {
      ...this.done('status', transcript, 'reported'),
      status: { initialized: true, branch, remote, clean, changes },
    };
  }

  /** Whether the data directory is inside a git work tree. */
  async isRepo(): Promise<boolean> {
    if (!existsSync(this.repoPath)) return false;
    const result = await this.git(['rev-parse', '--is-inside-work-tree'], this.repoPath);
    return result.code === 0 && result.stdout.trim() === 'true';
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  private async step(transcript: Transcript, args: string[]): Promise<GitResult> {
    const result = await this.git(args, this.repoPath);
    transcript.command(result);
    return result;
  }

  private async remoteUrl(): Promise<string | null> {
    const result = await this.git(['remote', 'get-url', this.remoteName], this.repoPath);
    return result.code === 0 ? result.stdout.trim() || null : null;
  }

  private resolveSettings(target: SyncTarget): SyncSettings {
    const cached = this.config.load();
    return {
      remote: target.remote?.trim() || cached.remote,
      branch: target.branch?.trim() || cached.branch,
    };
  }

  /** Reject values git would read as options. */
  private validate(transcript: Transcript, settings: SyncSettings): Failure | null {
    if (!SAFE_BRANCH_RE.test(settings.branch)) {
      transcript.failure(`Invalid branch name: "${settings.branch}"`);
      return { outcome: 'invalid_settings', step: 'validate' };
    }
    if (settings.remote.startsWith('-')) {
      transcript.failure(`Invalid remote URL: "${settings.remote}"`);
      return { outcome: 'invalid_settings', step: 'validate' };
    }
    return null;
  }

  private async initSteps(transcript: Transcript, settings: SyncSettings): Promise<Failure | null> {
    if (!existsSync(this.repoPath)) {
      mkdirSync(this.repoPath, { recursive: true });
    }

    if (await this.isRepo()) {
      transcript.note(`${this.repoPath} is already a git repository.`);
    } else {
      if ((await this.step(transcript, ['init', `--initial-branch=${settings.branch}`])).code !== 0) {
        transcript.failure('git init failed');
        return { outcome: 'tool_failure', step: 'init' };
      }
      transcript.success('Git repository initialized');
    }

    if (!settings.remote) {
      transcript.note('No remote URL supplied, skipping remote configuration.');
      return null;
    }
    return this.configureRemote(transcript, settings);
  }

  /** Point the remote at `settings.remote`, adding it if missing, then cache the settings. */
  private async configureRemote(transcript: Transcript, settings: SyncSettings): Promise<Failure | null> {
    const current = await this.remoteUrl();
    const args =
      current === null
        ? ['remote', 'add', this.remoteName, settings.remote]
        : ['remote', 'set-url', this.remoteName, settings.remote];

    if ((await this.step(transcript, args)).code !== 0) {
      transcript.failure('Remote configuration failed');
      return { outcome: 'tool_failure', step: 'remote' };
    }

    this.config.save(settings.remote, settings.branch);
    transcript.success(`Remote ${this.remoteName} set to ${settings.remote}`);
    transcript.success('Sync settings saved');
    return null;
  }

  /** Shared push/pull preamble: initialized, remote current, remote present. */
  private async prepare(transcript: Transcript, settings: SyncSettings): Promise<Failure | null> {
    if (!(await this.isRepo())) {
      const failure = await this.initSteps(transcript, settings);
      if (failure) return failure;
    } else if (settings.remote) {
      const failure = await this.configureRemote(transcript, settings);
      if (failure) return failure;
    }

    if ((await this.remoteUrl()) === null) {
      transcript.failure(
        `Remote "${this.remoteName}" is not configured. ` +
          'Initialize the data repository with the URL of an empty remote repository first ' +
          '(e.g. https://github.com/<team>/<repo>.git or git@github.com:<team>/<repo>.git).',
      );
      return { outcome: 'remote_not_configured', step: 'remote' };
    }
    return null;
  }

  private done(operation: SyncOperation, transcript: Transcript, outcome: SyncOutcome): SyncResult {
    return { operation, ok: true, outcome, transcript: transcript.toString() };
  }

  private fail(operation: SyncOperation, transcript: Transcript, failure: Failure): SyncResult {
    return {
      operation,
      ok: false,
      outcome: failure.outcome,
      failedStep: failure.step,
      transcript: transcript.toString(),
    };
  }
}
