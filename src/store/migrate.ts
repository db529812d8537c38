/**
 * Schema migration for container records.
 *
 * Every load runs each raw record through these functions, so they accept
 * anything a previous release (or a hand edit) may have written and return
 * a record in the current schema. Both functions are idempotent: migrating
 * a migrated record yields an equal record and `changed === false`.
 */

import { randomUUID } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import {
  UNSOLVED_STAGES,
  CONTEST_STATUSES,
  LEGACY_SOLUTION_KEYS,
  MIN_CONTEST_PROBLEMS,
  MAX_CONTEST_PROBLEMS,
  isRawRecord,
  isValidRecordId,
  problemLetter,
  type Contest,
  type ContestProblem,
  type ContestStatus,
  type Problem,
  type RawRecord,
  type UnsolvedStage,
} from '../types.js';

export interface ProblemMigration {
  record: Problem;
  /** Solution text lifted out of a legacy inline field, if any. */
  solution: string | null;
  changed: boolean;
}

export interface ContestMigration {
  record: Contest;
  changed: boolean;
}

// Spellings written by earlier releases.
const LEGACY_STAGE_ALIASES = new Map<string, UnsolvedStage>([
  ['未看题', 'unseen'],
  ['已看题无思路', 'seen_no_idea'],
  ['知道做法未实现', 'knows_approach_not_implemented'],
  ['seen-no-idea', 'seen_no_idea'],
  ['knows-approach-not-implemented', 'knows_approach_not_implemented'],
]);

const LEGACY_STATUS_ALIASES = new Map<string, ContestStatus>([['ac', 'accepted']]);

const INTEGER_STRING_RE = /^\s*[+-]?\d+\s*$/;

const PROBLEM_FIELDS: ReadonlySet<string> = new Set([
  'id',
  'title',
  'link',
  'source',
  'tags',
  'assignee',
  'solved',
  'unsolved_stage',
  'unsolved_custom_label',
  'pass_count',
  'notes',
  'created_at',
  'updated_at',
]);

// Deprecated keys that never survive a migration.
const DROPPED_PROBLEM_KEYS: ReadonlySet<string> = new Set(['has_solution', 'owner', ...LEGACY_SOLUTION_KEYS]);

const CONTEST_FIELDS: ReadonlySet<string> = new Set([
  'id',
  'name',
  'total_problems',
  'problems',
  'rank',
  'summary',
  'created_at',
  'updated_at',
]);

const DROPPED_CONTEST_KEYS: ReadonlySet<string> = new Set(['rank_str']);
const CONTEST_PROBLEM_FIELDS: ReadonlySet<string> = new Set(['letter', 'pass_count', 'attempt_count', 'status']);
const DROPPED_CONTEST_PROBLEM_KEYS: ReadonlySet<string> = new Set(['my_status']);

// ---------------------------------------------------------------------------
// Field coercion
// ---------------------------------------------------------------------------

/** Trimmed text, or null when blank or not text. */
function trimmedText(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  return String(value).trim() || null;
}

/** Text kept verbatim unless blank. */
function freeText(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  return value.trim() ? value : null;
}

/** Integer coercion. Returns null instead of throwing on anything unparsable. */
export function coerceInteger(value: unknown): number | null {
  let n: number;
  if (typeof value === 'number' && Number.isFinite(value)) {
    n = Math.trunc(value);
  } else if (typeof value === 'string' && INTEGER_STRING_RE.test(value)) {
    n = Number.parseInt(value, 10);
  } else {
    return null;
  }
  // -0 would not survive a JSON round trip.
  return n === 0 ? 0 : n;
}

function coerceBoolean(value: unknown): boolean {
  return value === true || value === 1 || (typeof value === 'string' && value.toLowerCase() === 'true');
}

function coerceStage(value: unknown): UnsolvedStage | null {
  if (typeof value !== 'string') return null;
  return UNSOLVED_STAGES.find((stage) => stage === value) ?? LEGACY_STAGE_ALIASES.get(value) ?? null;
}

function coerceStatus(value: unknown): ContestStatus {
  if (typeof value !== 'string') return 'unsubmitted';
  return (
    CONTEST_STATUSES.find((status) => status === value) ??
    LEGACY_STATUS_ALIASES.get(value.toLowerCase()) ??
    'unsubmitted'
  );
}

/** Ordered, duplicate-free tag list. A comma-separated string is split. */
function coerceTags(value: unknown): string[] {
  const items: unknown[] = Array.isArray(value)
    ? value
    : typeof value === 'string'
      ? value.split(',')
      : [];

  const tags: string[] = [];
  for (const item of items) {
    const tag = trimmedText(item);
    if (tag && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

function recordId(value: unknown): string {
  const id = trimmedText(value);
  if (id && isValidRecordId(id)) return id;

  const fresh = randomUUID();
  if (id) {
    console.error(`Warning: record id "${id}" is not a safe file name, replaced with ${fresh}`);
  }
  return fresh;
}

/**
 * Keys of `record` outside `known` and `dropped`, carried through untouched
 * so fields written by newer releases or by hand survive a rewrite.
 */
function passThrough(record: object, known: ReadonlySet<string>, dropped: ReadonlySet<string>): RawRecord {
  return Object.fromEntries(Object.entries(record).filter(([key]) => !known.has(key) && !dropped.has(key)));
}

/** Fields of a stored problem that the current schema does not define. */
export function extraProblemFields(record: object): RawRecord {
  return passThrough(record, PROBLEM_FIELDS, DROPPED_PROBLEM_KEYS);
}

/** Fields of a stored contest that the current schema does not define. */
export function extraContestFields(record: object): RawRecord {
  return passThrough(record, CONTEST_FIELDS, DROPPED_CONTEST_KEYS);
}

function timestamps(raw: RawRecord): { created_at: string; updated_at: string } {
  const created = trimmedText(raw.created_at);
  const updated = trimmedText(raw.updated_at);
  const now = new Date().toISOString();
  return {
    created_at: created ?? updated ?? now,
    updated_at: updated ?? created ?? now,
  };
}

// ---------------------------------------------------------------------------
// Problems
// ---------------------------------------------------------------------------

/**
 * Upgrade one raw problem record to the current schema.
 *
 * Order matters: the legacy solution is lifted out first, `solved` is
 * settled before the unsolved fields, and the solved-clears-unsolved rule
 * is applied last.
 */
export function migrateProblem(raw: RawRecord): ProblemMigration {
  let solution: string | null = null;
  for (const key of LEGACY_SOLUTION_KEYS) {
    const value = raw[key];
    if (typeof value === 'string' && value.trim()) {
      solution = value;
      break;
    }
  }

  const solved =
    raw.solved === undefined
      ? typeof raw.status === 'string' && raw.status.toLowerCase() === 'done'
      : coerceBoolean(raw.solved);

  const stage = coerceStage(raw.unsolved_stage);
  const customLabel = trimmedText(raw.unsolved_custom_label);

  const record: Problem = {
    ...extraProblemFields(raw),
    id: recordId(raw.id),
    title: typeof raw.title === 'string' ? raw.title : (trimmedText(raw.title) ?? ''),
    link: trimmedText(raw.link),
    source: trimmedText(raw.source),
    tags: coerceTags(raw.tags),
    assignee: trimmedText(raw.assignee ?? raw.owner),
    solved,
    unsolved_stage: solved ? null : stage,
    unsolved_custom_label: solved ? null : customLabel,
    pass_count: coerceInteger(raw.pass_count),
    notes: freeText(raw.notes),
    ...timestamps(raw),
  };

  return {
    record,
    solution,
    changed: solution !== null || !isDeepStrictEqual(raw, record),
  };
}

// ---------------------------------------------------------------------------
// Contests
// ---------------------------------------------------------------------------

function clampProblemCount(value: unknown): number {
  const n = coerceInteger(value);
  if (n === null) return MIN_CONTEST_PROBLEMS;
  return Math.max(MIN_CONTEST_PROBLEMS, Math.min(MAX_CONTEST_PROBLEMS, n));
}

function nonNegative(value: unknown): number {
  return Math.max(0, coerceInteger(value) ?? 0);
}

function contestProblem(entry: unknown, index: number): ContestProblem {
  if (!isRawRecord(entry)) {
    return { letter: problemLetter(index), pass_count: 0, attempt_count: 0, status: 'unsubmitted' };
  }
  return {
    ...passThrough(entry, CONTEST_PROBLEM_FIELDS, DROPPED_CONTEST_PROBLEM_KEYS),
    letter: problemLetter(index),
    pass_count: nonNegative(entry.pass_count),
    attempt_count: nonNegative(entry.attempt_count),
    status: coerceStatus(entry.status ?? entry.my_status),
  };
}

/**
 * Upgrade one raw contest record. The problem list always ends up with
 * exactly `total_problems` entries lettered A, B, C, ... by position.
 */
export function migrateContest(raw: RawRecord): ContestMigration {
  const total = clampProblemCount(raw.total_problems);
  const entries: unknown[] = Array.isArray(raw.problems) ? raw.problems : [];

  const problems: ContestProblem[] = [];
  for (let i = 0; i < total; i++) {
    problems.push(contestProblem(entries[i], i));
  }

  const record: Contest = {
    ...extraContestFields(raw),
    id: recordId(raw.id),
    name: typeof raw.name === 'string' ? raw.name : (trimmedText(raw.name) ?? ''),
    total_problems: total,
    problems,
    rank: trimmedText(raw.rank ?? raw.rank_str),
    summary: freeText(raw.summary),
    ...timestamps(raw),
  };

  return { record, changed: !isDeepStrictEqual(raw, record) };
}
