import type { LoadMode, LoadStatus } from '../model/LoadResult.js';

/** Emitted when a pipeline run starts. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly dataset: string;
  readonly destination: string;
  readonly totalRecords: number;
  readonly timestamp: number;
}

/** Emitted after the validator evaluated the batch. */
export interface ValidationCompletedEvent {
  readonly type: 'validation:completed';
  readonly runId: string;
  readonly dataset: string;
  readonly passed: boolean;
  readonly passedRecords: number;
  readonly failedRecords: number;
  readonly timestamp: number;
}

/** Emitted after the transformer chain produced its output. */
export interface TransformCompletedEvent {
  readonly type: 'transform:completed';
  readonly runId: string;
  readonly inputRecords: number;
  readonly outputRecords: number;
  readonly timestamp: number;
}

/** Emitted when a lease is granted. */
export interface LeaseAcquiredEvent {
  readonly type: 'lease:acquired';
  readonly resourceId: string;
  readonly holderToken: string;
  /** Attempt that succeeded (1-based). */
  readonly attempt: number;
  readonly expiresAt: number;
  readonly timestamp: number;
}

/** Emitted when a lease is released by its holder. */
export interface LeaseReleasedEvent {
  readonly type: 'lease:released';
  readonly resourceId: string;
  readonly holderToken: string;
  readonly timestamp: number;
}

/** Emitted when an acquire attempt found the resource held by someone else. */
export interface LeaseContendedEvent {
  readonly type: 'lease:contended';
  readonly resourceId: string;
  readonly attempt: number;
  readonly maxAttempts: number;
  /** Backoff before the next attempt, `0` after the last one. */
  readonly delayMs: number;
  readonly timestamp: number;
}

/** Emitted when a chunk transaction commits. */
export interface ChunkCommittedEvent {
  readonly type: 'chunk:committed';
  readonly destination: string;
  readonly chunkIndex: number;
  readonly insertedCount: number;
  readonly updatedCount: number;
  readonly rejectedCount: number;
  readonly timestamp: number;
}

/** Emitted when a chunk transaction rolls back. */
export interface ChunkFailedEvent {
  readonly type: 'chunk:failed';
  readonly destination: string;
  readonly chunkIndex: number;
  readonly recordCount: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a chunk write is about to be retried after a transient failure. */
export interface ChunkRetriedEvent {
  readonly type: 'chunk:retried';
  readonly destination: string;
  readonly chunkIndex: number;
  /** Retry number (1-based). */
  readonly attempt: number;
  readonly maxRetries: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a load finishes, whatever its status. */
export interface LoadCompletedEvent {
  readonly type: 'load:completed';
  readonly destination: string;
  readonly mode: LoadMode;
  readonly status: LoadStatus;
  readonly recordsInserted: number;
  readonly recordsUpdated: number;
  readonly recordsRejected: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when a run reaches `SUCCESS` or `PARTIAL`. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly status: LoadStatus;
  readonly timestamp: number;
}

/** Emitted when a run fails. */
export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly runId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | ValidationCompletedEvent
  | TransformCompletedEvent
  | LeaseAcquiredEvent
  | LeaseReleasedEvent
  | LeaseContendedEvent
  | ChunkCommittedEvent
  | ChunkFailedEvent
  | ChunkRetriedEvent
  | LoadCompletedEvent
  | RunCompletedEvent
  | RunFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

/** Narrow an event to the payload of the given type. */
export function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
