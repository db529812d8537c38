/**
 * Solution side-files: one Markdown file per problem, `<dir>/<id>.md`.
 *
 * A missing file means "no solution yet". Whitespace-only text is never
 * stored; writing it removes the file instead.
 *
 * SECURITY: ids become file names, so every path is checked to stay within
 * the solutions directory.
 */

import { readFileSync, writeFileSync, unlinkSync, existsSync, mkdirSync, readdirSync } from 'node:fs';
import { resolve } from 'node:path';
import { isValidRecordId } from '../types.js';

/**
 * Verify that a resolved file path stays within the expected root directory.
 * Throws if the path escapes the root (path traversal attempt).
 */
function assertWithinRoot(filePath: string, rootPath: string): void {
  const resolvedRoot = resolve(rootPath);
  const resolvedFile = resolve(filePath);
  if (!resolvedFile.startsWith(resolvedRoot + '/') && resolvedFile !== resolvedRoot) {
    throw new Error(`Path traversal detected: "${filePath}" escapes root "${rootPath}"`);
  }
}

export class SolutionStore {
  constructor(readonly dir: string) {}

  /** Deterministic side-file path for a problem id. */
  pathFor(id: string): string {
    if (!isValidRecordId(id)) {
      throw new Error(`Invalid problem id for solution file: "${id}"`);
    }
    const filePath = resolve(this.dir, `${id}.md`);
    assertWithinRoot(filePath, this.dir);
    return filePath;
  }

  /** Ids of every stored solution. Files that are not `<id>.md` are ignored. */
  ids(): string[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((name) => name.endsWith('.md'))
      .map((name) => name.slice(0, -'.md'.length))
      .filter(isValidRecordId);
  }

  exists(id: string): boolean {
    return existsSync(this.pathFor(id));
  }

  read(id: string): string | null {
    const filePath = this.pathFor(id);
    if (!existsSync(filePath)) return null;
    return readFileSync(filePath, 'utf-8');
  }

  /**
   * Create or overwrite the solution. Blank text deletes it instead.
   * Returns whether a solution is present afterwards.
   */
  write(id: string, text: string): boolean {
    if (!text.trim()) {
      this.delete(id);
      return false;
    }
    const filePath = this.pathFor(id);
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true });
    }
    writeFileSync(filePath, text, 'utf-8');
    return true;
  }

  /** Remove the solution. No-op if absent. */
  delete(id: string): void {
    const filePath = this.pathFor(id);
    if (existsSync(filePath)) {
      unlinkSync(filePath);
    }
  }
}
