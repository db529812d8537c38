// === Unsolved Stages ===

export const UNSOLVED_STAGES = [
  'unseen',
  'seen_no_idea',
  'knows_approach_not_implemented',
] as const;

export type UnsolvedStage = (typeof UNSOLVED_STAGES)[number];

// === Contest Problem Status ===

export const CONTEST_STATUSES = ['accepted', 'attempted', 'unsubmitted'] as const;

export type ContestStatus = (typeof CONTEST_STATUSES)[number];

// === Interfaces ===

/** A raw record as read from a container file, of unknown schema vintage. */
export type RawRecord = Record<string, unknown>;

export interface Problem {
  id: string;
  title: string;
  link: string | null;
  source: string | null;
  tags: string[];
  assignee: string | null;
  solved: boolean;
  unsolved_stage: UnsolvedStage | null;
  unsolved_custom_label: string | null;
  pass_count: number | null;
  notes: string | null;
  created_at: string;
  updated_at: string;
}

/** Problem as returned to callers: `has_solution` is derived, never stored. */
export interface ProblemView extends Problem {
  has_solution: boolean;
}

export interface ContestProblem {
  letter: string;
  pass_count: number;
  attempt_count: number;
  status: ContestStatus;
}

export interface Contest {
  id: string;
  name: string;
  total_problems: number;
  problems: ContestProblem[];
  rank: string | null;
  summary: string | null;
  created_at: string;
  updated_at: string;
}

// === Constants ===

export const MIN_CONTEST_PROBLEMS = 1;
export const MAX_CONTEST_PROBLEMS = 15;

export const PROBLEM_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/** Legacy keys that once held the solution inline, in lookup order. */
export const LEGACY_SOLUTION_KEYS = ['solution_markdown', 'solution_md', 'solution'] as const;

// === Helpers ===

/** Letter for the problem at `index` (0 → A). */
export function problemLetter(index: number): string {
  return PROBLEM_LETTERS[index];
}

export function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const RECORD_ID_RE = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

/** Record ids double as side-file names, so only a safe character set is accepted. */
export function isValidRecordId(id: string): boolean {
  return RECORD_ID_RE.test(id);
}
