import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { GitResult, GitRunner } from '../sync/git.js';

/** Create a fresh temp directory. Pair with removeTempDir() in afterEach(). */
export function makeTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `problem-ledger-${label}-`));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

type Reply = Partial<Omit<GitResult, 'args'>>;

/**
 * In-process stand-in for the git CLI.
 *
 * Models just enough repository state (initialized, remote, dirty/staged
 * files, commits) for the orchestrator's sequences. `reply()` queues a
 * canned result for an exact command line, consumed before the model runs.
 */
export class FakeGit {
  readonly calls: string[][] = [];
  readonly commits: string[] = [];
  isRepo = false;
  remote: string | null = null;
  branch = 'main';
  dirty = false;
  statusOutput = '';
  private staged = false;
  private readonly replies = new Map<string, Reply[]>();
  private gate: Promise<void> | null = null;

  reply(commandLine: string, result: Reply): this {
    const queue = this.replies.get(commandLine) ?? [];
    queue.push(result);
    this.replies.set(commandLine, queue);
    return this;
  }

  /** Hold every later call until the returned function is invoked. */
  pause(): () => void {
    let release: () => void = () => {};
    this.gate = new Promise((resolve) => {
      release = () => {
        this.gate = null;
        resolve();
      };
    });
    return release;
  }

  /** Command lines received, e.g. `remote add origin <url>`. */
  commandLines(): string[] {
    return this.calls.map((args) => args.join(' '));
  }

  readonly run: GitRunner = async (args) => {
    this.calls.push([...args]);
    if (this.gate) await this.gate;
    const canned = this.replies.get(args.join(' '))?.shift();
    if (canned) {
      return { args, code: canned.code ?? 0, stdout: canned.stdout ?? '', stderr: canned.stderr ?? '' };
    }
    return { args, code: 0, stdout: '', stderr: '', ...this.simulate(args) };
  };

  private simulate(args: string[]): Reply {
    const [command, ...rest] = args;
    switch (command) {
      case 'rev-parse':
        if (rest[0] === '--is-inside-work-tree') {
          return this.isRepo
            ? { stdout: 'true\n' }
            : { code: 128, stderr: 'fatal: not a git repository (or any of the parent directories): .git\n' };
        }
        return { stdout: `${this.branch}\n` };
      case 'init':
        this.isRepo = true;
        return { stdout: 'Initialized empty Git repository\n' };
      case 'remote':
        if (rest[0] === 'get-url') {
          return this.remote === null
            ? { code: 2, stderr: "error: No such remote 'origin'\n" }
            : { stdout: `${this.remote}\n` };
        }
        this.remote = rest[2];
        return {};
      case 'add':
        if (this.dirty) {
          this.staged = true;
          this.dirty = false;
        }
        return {};
      case 'diff':
        return { stdout: this.staged ? 'problems.json\n' : '' };
      case 'commit': {
        const message = rest[1];
        this.commits.push(message);
        this.staged = false;
        return { stdout: `[${this.branch} 1a2b3c4] ${message}\n 1 file changed, 1 insertion(+)\n` };
      }
      case 'status':
        return { stdout: this.statusOutput };
      default:
        return {};
    }
  }
}
