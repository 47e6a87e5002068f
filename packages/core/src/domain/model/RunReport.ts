import type { LoadResult, LoadStatus } from './LoadResult.js';
import type { ValidationResult } from './ValidationResult.js';

/** Record counts at each stage of a run. */
export interface RunCounts {
  readonly extracted: number;
  /** Rows that passed validation and moved on to transformation. */
  readonly validated: number;
  readonly transformed: number;
  /** Inserted plus updated. */
  readonly loaded: number;
  /** Rows rejected by validation or by the loader. */
  readonly rejected: number;
}

/** Outcome of one validate → transform → load invocation. */
export interface RunReport {
  readonly runId: string;
  readonly dataset: string;
  readonly destination: string;
  readonly status: LoadStatus;
  readonly counts: RunCounts;
  readonly validation?: ValidationResult;
  readonly load?: LoadResult;
  readonly error?: string;
  /** Epoch milliseconds. */
  readonly startedAt: number;
  readonly finishedAt: number;
}
