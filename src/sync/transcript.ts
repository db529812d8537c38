/**
 * Human-readable log of a sync operation.
 *
 * Each git step is recorded with its command line, exit code and the raw
 * stdout/stderr, untouched, so an operator can diagnose failures from the
 * transcript alone.
 */

import { formatCommand, type GitResult } from './git.js';

export class Transcript {
  private readonly blocks: string[] = [];

  /** Record a git step verbatim. */
  command(result: GitResult): void {
    const lines = [`=== ${formatCommand(result.args)} ===`, `exit code: ${result.code}`];
    if (result.stdout.trim()) {
      lines.push('stdout:', result.stdout.trimEnd());
    }
    if (result.stderr.trim()) {
      lines.push('stderr:', result.stderr.trimEnd());
    }
    this.blocks.push(lines.join('\n'));
  }

  note(text: string): void {
    this.blocks.push(text);
  }

  success(text: string): void {
    this.blocks.push(`✓ ${text}`);
  }

  failure(text: string): void {
    this.blocks.push(`✗ ${text}`);
  }

  toString(): string {
    return this.blocks.join('\n\n');
  }
}
