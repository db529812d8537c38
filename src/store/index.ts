/**
 * Record store: JSON container files for problems and contests, plus
 * per-problem solution side-files.
 */

export { decodeContainer, encodeContainer, CorruptContainerError, EMPTY_CONTAINER } from './codec.js';
export { migrateProblem, migrateContest, coerceInteger } from './migrate.js';
export type { ProblemMigration, ContestMigration } from './migrate.js';
export { SolutionStore } from './solutions.js';
export { Lock } from './lock.js';
export { RecordStore, NotFoundError } from './record-store.js';
export type { Migrated } from './record-store.js';
export { ProblemStore } from './problems.js';
export type { ProblemInput, ProblemExport, SolutionInfo, SolutionUpdate } from './problems.js';
export { ContestStore } from './contests.js';
export type { ContestInput, ContestProblemInput } from './contests.js';
