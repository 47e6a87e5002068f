import { RunStatus, canTransition, loadStatusOf } from '@ledgerline/core';
import type {
  DomainEvent,
  EventBus,
  LoadResult,
  RunCounts,
  RunOutcome,
  RunReport,
  ValidationResult,
} from '@ledgerline/core';

/**
 * Mutable state of a single run, shared by its stages.
 *
 * Status changes go through the run state machine; an invalid transition throws.
 */
export class RunContext {
  status: RunStatus = RunStatus.CREATED;
  validated = 0;
  transformed = 0;
  validationRejected = 0;
  validation?: ValidationResult;
  load?: LoadResult;
  readonly startedAt: number;

  constructor(
    readonly runId: string,
    readonly dataset: string,
    readonly destination: string,
    readonly extracted: number,
    private readonly eventBus: EventBus | null,
    private readonly clock: () => number = Date.now,
  ) {
    this.startedAt = clock();
  }

  now(): number {
    return this.clock();
  }

  transitionTo(next: RunStatus): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid run state transition: ${this.status} → ${next}`);
    }
    this.status = next;
  }

  emit(event: DomainEvent): void {
    this.eventBus?.emit(event);
  }

  counts(): RunCounts {
    const loaded = this.load ? this.load.recordsInserted + this.load.recordsUpdated : 0;
    return {
      extracted: this.extracted,
      validated: this.validated,
      transformed: this.transformed,
      loaded,
      rejected: this.validationRejected + (this.load?.recordsRejected ?? 0),
    };
  }

  /** Outcome of a run that reached the end of the load stage. */
  outcome(): RunOutcome {
    const counts = this.counts();
    if (this.load?.status === 'FAILED') return RunStatus.FAILED;
    return loadStatusOf(counts.loaded, counts.rejected);
  }

  report(status: RunOutcome, error?: string): RunReport {
    return {
      runId: this.runId,
      dataset: this.dataset,
      destination: this.destination,
      status,
      counts: this.counts(),
      ...(this.validation ? { validation: this.validation } : {}),
      ...(this.load ? { load: this.load } : {}),
      ...(error !== undefined ? { error } : {}),
      startedAt: this.startedAt,
      finishedAt: this.clock(),
    };
  }
}
