import type { LoadStatus } from '../model/LoadResult.js';
import type { RuleSeverity } from '../model/ValidationResult.js';

/** One row of the run log. */
export interface RunLogEntry {
  readonly runId: string;
  readonly dataset: string;
  readonly destination: string;
  readonly status: LoadStatus;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly recordsExtracted: number;
  readonly recordsValidated: number;
  readonly recordsTransformed: number;
  readonly recordsLoaded: number;
  readonly recordsRejected: number;
  readonly errorMessage: string | null;
}

/** One row of the data-quality log, one per evaluated rule. */
export interface QualityLogEntry {
  readonly runId: string;
  /** Rule kind, e.g. `completeness`. */
  readonly validationType: string;
  /** Rule id. */
  readonly validationRule: string;
  readonly passedRecords: number;
  readonly failedRecords: number;
  readonly details: {
    readonly check: string;
    readonly severity: RuleSeverity;
    readonly columns: readonly string[];
    readonly threshold: number;
    readonly exceeded: boolean;
    readonly sampleKeys: readonly string[];
    readonly message: string;
  };
}

/** Port for the external run-logging collaborator. */
export interface RunLogSink {
  recordRun(entry: RunLogEntry): Promise<void>;
  recordQuality(entries: readonly QualityLogEntry[]): Promise<void>;
}
