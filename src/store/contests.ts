import { randomUUID } from 'node:crypto';
import type { Contest, ContestStatus, RawRecord } from '../types.js';
import { migrateContest, extraContestFields } from './migrate.js';
import { RecordStore, NotFoundError, type Migrated } from './record-store.js';

export interface ContestProblemInput {
  pass_count?: number;
  attempt_count?: number;
  status?: ContestStatus;
}

/** Caller-editable contest fields. Letters are always assigned by position. */
export interface ContestInput {
  name: string;
  total_problems: number;
  problems?: ContestProblemInput[];
  rank?: string | null;
  summary?: string | null;
}

function assertName(input: ContestInput): void {
  if (!input.name.trim()) {
    throw new Error('Contest name must not be empty');
  }
}

export class ContestStore extends RecordStore<Contest> {
  constructor(filePath: string) {
    super('Contest', filePath);
  }

  protected migrate(raw: RawRecord): Migrated<Contest> {
    return migrateContest(raw);
  }

  protected toView(record: Contest): Contest {
    return record;
  }

  list(): Promise<Contest[]> {
    return this.loadAll();
  }

  get(id: string): Promise<Contest> {
    return this.findById(id);
  }

  async create(input: ContestInput): Promise<Contest> {
    assertName(input);
    const now = new Date().toISOString();
    return this.mutate((records) => {
      const { record } = migrateContest({ ...input, id: randomUUID(), created_at: now, updated_at: now });
      records.push(record);
      return record;
    });
  }

  /** Replace every editable field; the problem list is resized to `total_problems`. */
  async update(id: string, input: ContestInput): Promise<Contest> {
    assertName(input);
    return this.mutate((records) => {
      const index = records.findIndex((r) => r.id === id);
      if (index === -1) throw new NotFoundError(this.kind, id);
      const existing = records[index];
      const { record } = migrateContest({
        ...extraContestFields(existing),
        ...input,
        id: existing.id,
        created_at: existing.created_at,
        updated_at: new Date().toISOString(),
      });
      records[index] = record;
      return record;
    });
  }

  async remove(id: string): Promise<void> {
    await this.mutate((records) => {
      const index = records.findIndex((r) => r.id === id);
      if (index === -1) throw new NotFoundError(this.kind, id);
      records.splice(index, 1);
    });
  }
}
