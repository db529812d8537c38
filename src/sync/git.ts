/**
 * Git CLI invocation for the data repository.
 *
 * SECURITY: commands run through execFile with an argument array, never a
 * shell string, so commit messages, remote URLs and branch names are passed
 * to git verbatim and cannot terminate the command or inject another one.
 */

import { execFile } from 'node:child_process';

/** Outcome of one git invocation. A non-zero exit is data, not an exception. */
export interface GitResult {
  args: string[];
  code: number;
  stdout: string;
  stderr: string;
}

/** Runs `git <args>` in `cwd`. Implementations must resolve, never reject. */
export type GitRunner = (args: string[], cwd: string) => Promise<GitResult>;

/** Upper bound on captured output per stream. */
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/** Default runner backed by the `git` executable on PATH. */
export const runGit: GitRunner = (args, cwd) =>
  new Promise((resolve) => {
    execFile(
      'git',
      args,
      { cwd, encoding: 'utf-8', maxBuffer: MAX_OUTPUT_BYTES },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ args, code: 0, stdout, stderr });
          return;
        }
        // Spawn failures (git missing, bad cwd) carry a string code like ENOENT.
        const code = typeof error.code === 'number' ? error.code : 1;
        resolve({ args, code, stdout, stderr: stderr || error.message });
      },
    );
  });

/** Render a command line for transcripts. */
export function formatCommand(args: readonly string[]): string {
  return ['git', ...args.map((arg) => (/[\s"'\\]/.test(arg) ? JSON.stringify(arg) : arg))].join(' ');
}
