import { randomUUID } from 'node:crypto';
import type { Problem, ProblemView, RawRecord, UnsolvedStage } from '../types.js';
import { migrateProblem, extraProblemFields } from './migrate.js';
import { RecordStore, NotFoundError, type Migrated } from './record-store.js';
import type { SolutionStore } from './solutions.js';

/** Caller-editable problem fields. Omitted fields take their defaults. */
export interface ProblemInput {
  title: string;
  link?: string | null;
  source?: string | null;
  tags?: string[];
  assignee?: string | null;
  solved?: boolean;
  unsolved_stage?: UnsolvedStage | null;
  unsolved_custom_label?: string | null;
  pass_count?: number | null;
  notes?: string | null;
}

export interface SolutionInfo {
  id: string;
  markdown: string;
  has_solution: boolean;
  updated_at: string;
}

export interface SolutionUpdate {
  has_solution: boolean;
  updated_at: string;
}

/** Export shape: the solution travels inline so an import can restore it. */
export type ProblemExport = Problem & { solution_markdown?: string };

function assertTitle(input: ProblemInput): void {
  if (!input.title.trim()) {
    throw new Error('Problem title must not be empty');
  }
}

/**
 * Problems container plus their solution side-files.
 *
 * Side-files are only written while the container lock is held, except for
 * the `has_solution` check after a load, which may briefly lag a concurrent
 * write.
 */
export class ProblemStore extends RecordStore<Problem, ProblemView> {
  constructor(
    filePath: string,
    readonly solutions: SolutionStore,
  ) {
    super('Problem', filePath);
  }

  protected migrate(raw: RawRecord): Migrated<Problem> {
    const { record, solution, changed } = migrateProblem(raw);
    if (solution !== null) {
      this.solutions.write(record.id, solution);
    }
    return { record, changed };
  }

  protected toView(record: Problem): ProblemView {
    return { ...record, has_solution: this.solutions.exists(record.id) };
  }

  /** Views carry `has_solution`; the container never does. Unknown keys stay. */
  protected toStored(record: Problem): Problem {
    const stored = { ...record };
    Reflect.deleteProperty(stored, 'has_solution');
    return stored;
  }

  /** Side-files of problems the import left out are deleted. */
  protected afterReplace(records: readonly Problem[]): void {
    const kept = new Set(records.map((record) => record.id));
    for (const id of this.solutions.ids()) {
      if (!kept.has(id)) this.solutions.delete(id);
    }
  }

  list(): Promise<ProblemView[]> {
    return this.loadAll();
  }

  get(id: string): Promise<ProblemView> {
    return this.findById(id);
  }

  async create(input: ProblemInput): Promise<ProblemView> {
    assertTitle(input);
    const now = new Date().toISOString();
    const record = await this.mutate((records) => {
      const { record } = migrateProblem({ ...input, id: randomUUID(), created_at: now, updated_at: now });
      records.push(record);
      return record;
    });
    return this.toView(record);
  }

  /** Replace every editable field of a problem; identity and creation time are kept. */
  async update(id: string, input: ProblemInput): Promise<ProblemView> {
    assertTitle(input);
    const record = await this.mutate((records) => {
      const index = records.findIndex((r) => r.id === id);
      if (index === -1) throw new NotFoundError(this.kind, id);
      const existing = records[index];
      const { record } = migrateProblem({
        ...extraProblemFields(existing),
        ...input,
        id: existing.id,
        created_at: existing.created_at,
        updated_at: new Date().toISOString(),
      });
      records[index] = record;
      return record;
    });
    return this.toView(record);
  }

  /** Delete a problem together with its solution side-file. */
  async remove(id: string): Promise<void> {
    await this.mutate((records) => {
      const index = records.findIndex((r) => r.id === id);
      if (index === -1) throw new NotFoundError(this.kind, id);
      records.splice(index, 1);
      this.solutions.delete(id);
    });
  }

  async getSolution(id: string): Promise<SolutionInfo> {
    const problem = await this.findById(id);
    const markdown = this.solutions.read(id) ?? '';
    return {
      id,
      markdown,
      has_solution: markdown.length > 0,
      updated_at: problem.updated_at,
    };
  }

  /** Store a solution. Blank text removes it. Line endings are normalized to LF. */
  putSolution(id: string, markdown: string): Promise<SolutionUpdate> {
    return this.mutate((records) => {
      const record = records.find((r) => r.id === id);
      if (!record) throw new NotFoundError(this.kind, id);
      const has_solution = this.solutions.write(id, markdown.replace(/\r\n/g, '\n'));
      record.updated_at = new Date().toISOString();
      return { has_solution, updated_at: record.updated_at };
    });
  }

  deleteSolution(id: string): Promise<SolutionUpdate> {
    return this.mutate((records) => {
      const record = records.find((r) => r.id === id);
      if (!record) throw new NotFoundError(this.kind, id);
      this.solutions.delete(id);
      record.updated_at = new Date().toISOString();
      return { has_solution: false, updated_at: record.updated_at };
    });
  }

  async exportAll(): Promise<ProblemExport[]> {
    const records = await this.loadAll();
    return records.map((view) => {
      const exported: ProblemExport = this.toStored(view);
      const solution = this.solutions.read(view.id);
      if (solution) {
        exported.solution_markdown = solution;
      }
      return exported;
    });
  }

  /**
   * Replace every problem with an imported set. Inline solutions become
   * side-files; side-files of problems not in the set are removed.
   */
  importAll(raws: readonly RawRecord[]): Promise<number> {
    return this.replaceAll(raws);
  }
}
