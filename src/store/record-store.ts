/**
 * Record store: one JSON container file holding a whole collection.
 *
 * Each load runs every record through the collection's migration and, if
 * anything changed shape, writes the container straight back (self-healing
 * persistence). A container that fails to decode is copied aside to
 * `<name>.backup.json` and reset to an empty collection.
 *
 * Every read-migrate-rewrite and every save runs inside the store's lock.
 * Writes go to a temp file that is renamed over the container, so a reader
 * never sees a half-written file.
 */

import {
  readFileSync,
  writeFileSync,
  renameSync,
  copyFileSync,
  existsSync,
  mkdirSync,
} from 'node:fs';
import { dirname, basename, join } from 'node:path';
import type { RawRecord } from '../types.js';
import { decodeContainer, encodeContainer, CorruptContainerError, EMPTY_CONTAINER } from './codec.js';
import { Lock } from './lock.js';

/** Raised when no record has the requested id. */
export class NotFoundError extends Error {
  constructor(
    readonly kind: string,
    readonly id: string,
  ) {
    super(`${kind} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export interface Migrated<T> {
  record: T;
  changed: boolean;
}

/** Sibling path of `filePath` with `.json` replaced by `suffix`. */
function siblingPath(filePath: string, suffix: string): string {
  const name = basename(filePath).replace(/\.json$/, '');
  return join(dirname(filePath), `${name}${suffix}`);
}

export abstract class RecordStore<TStored extends { id: string }, TView extends TStored = TStored> {
  protected readonly lock = new Lock();

  /** Written when the container fails to decode. */
  readonly backupPath: string;
  /** Written before a bulk replace. */
  readonly importBackupPath: string;

  constructor(
    readonly kind: string,
    readonly filePath: string,
  ) {
    this.backupPath = siblingPath(filePath, '.backup.json');
    this.importBackupPath = siblingPath(filePath, '.bak.json');
  }

  /** Bring one raw record to the current schema. Runs under the lock. */
  protected abstract migrate(raw: RawRecord): Migrated<TStored>;

  /** Attach derived fields. Runs outside the lock. */
  protected abstract toView(record: TStored): TView;

  /** Drop derived fields before encoding. */
  protected toStored(record: TStored): TStored {
    return record;
  }

  /** Runs under the lock once an import has been written. */
  protected afterReplace(_records: readonly TStored[]): void {}

  // -------------------------------------------------------------------------
  // Public contract
  // -------------------------------------------------------------------------

  async loadAll(): Promise<TView[]> {
    const records = await this.lock.runExclusive(() => this.readLocked());
    return records.map((record) => this.toView(record));
  }

  /** Replace the whole collection with `records`. */
  async saveAll(records: readonly TStored[]): Promise<void> {
    await this.lock.runExclusive(() => this.writeLocked(records));
  }

  async findById(id: string): Promise<TView> {
    const records = await this.loadAll();
    const found = records.find((record) => record.id === id);
    if (!found) throw new NotFoundError(this.kind, id);
    return found;
  }

  /**
   * Load, let `fn` edit the collection in place, and save, as one critical
   * section. If `fn` throws nothing is written.
   */
  async mutate<R>(fn: (records: TStored[]) => R): Promise<R> {
    return this.lock.runExclusive(() => {
      const records = this.readLocked();
      const result = fn(records);
      this.writeLocked(records);
      return result;
    });
  }

  /**
   * Replace the collection with imported raw records. The current container
   * is copied to `<name>.bak.json` first. Returns the number of records.
   */
  async replaceAll(raws: readonly RawRecord[]): Promise<number> {
    return this.lock.runExclusive(() => {
      if (existsSync(this.filePath)) {
        copyFileSync(this.filePath, this.importBackupPath);
      }
      const records = raws.map((raw) => this.migrate(raw).record);
      this.writeLocked(records);
      this.afterReplace(records);
      return records.length;
    });
  }

  // -------------------------------------------------------------------------
  // Critical sections (caller holds the lock)
  // -------------------------------------------------------------------------

  private readLocked(): TStored[] {
    let raws: RawRecord[] = [];

    if (!existsSync(this.filePath)) {
      this.writeText(EMPTY_CONTAINER);
    } else {
      const bytes = readFileSync(this.filePath);
      try {
        raws = decodeContainer(bytes);
      } catch (error) {
        if (!(error instanceof CorruptContainerError)) throw error;
        writeFileSync(this.backupPath, bytes);
        this.writeText(EMPTY_CONTAINER);
        console.error(
          `Warning: ${error.message} in ${this.filePath}. Original saved to ${this.backupPath}, starting empty.`,
        );
      }
    }

    let changed = false;
    const records = raws.map((raw) => {
      const migrated = this.migrate(raw);
      if (migrated.changed) changed = true;
      return migrated.record;
    });

    if (changed) {
      this.writeLocked(records);
      console.error(`Migrated ${this.filePath} to the current ${this.kind.toLowerCase()} schema`);
    }

    return records;
  }

  private writeLocked(records: readonly TStored[]): void {
    this.writeText(encodeContainer(records.map((record) => this.toStored(record))));
  }

  private writeText(text: string): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmpPath = `${this.filePath}.tmp`;
    writeFileSync(tmpPath, text, 'utf-8');
    renameSync(tmpPath, this.filePath);
  }
}
