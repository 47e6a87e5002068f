import type { LoadResult } from '../model/LoadResult.js';
import { blockingFailures } from '../model/ValidationResult.js';
import type { ValidationResult } from '../model/ValidationResult.js';

/** Machine-readable error codes raised by the engine. */
export type EtlErrorCode =
  | 'SCHEMA_VIOLATION'
  | 'VALIDATION_FAILURE'
  | 'LOCK_CONTENTION'
  | 'LEASE_EXPIRED'
  | 'PARTIAL_CHUNK_FAILURE'
  | 'RESOURCE_UNAVAILABLE'
  | 'LOAD_CANCELLED'
  | 'CONFIG_ERROR'
  | 'UNKNOWN_DESTINATION';

/** Base class of every typed failure. `retryable` tells callers whether backing off and retrying may help. */
export class EtlError extends Error {
  readonly retryable: boolean;

  constructor(
    readonly code: EtlErrorCode,
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.retryable = options?.retryable ?? false;
  }
}

/** A required column is absent from the batch. Fatal to the whole batch. */
export class SchemaViolation extends EtlError {
  constructor(
    readonly missingColumns: readonly string[],
    readonly result: ValidationResult,
  ) {
    super('SCHEMA_VIOLATION', `Dataset "${result.dataset}" is missing required columns: ${missingColumns.join(', ')}`);
  }
}

function describeFailures(result: ValidationResult): string {
  return blockingFailures(result)
    .map((o) => `${o.ruleId} (${o.failedRecords} failed)`)
    .join(', ');
}

/** A blocking rule exceeded its threshold in strict mode. */
export class ValidationFailure extends EtlError {
  constructor(readonly result: ValidationResult) {
    super('VALIDATION_FAILURE', `Validation of "${result.dataset}" failed: ${describeFailures(result)}`);
  }
}

/** The lease on a resource could not be acquired within the configured attempts. */
export class LockContention extends EtlError {
  constructor(
    readonly resourceId: string,
    readonly attempts: number,
  ) {
    super('LOCK_CONTENTION', `Could not acquire lease on "${resourceId}" after ${attempts} attempts`, {
      retryable: true,
    });
  }
}

/** The holder's lease lapsed mid-operation. Writes after the lapse must be re-verified through upsert. */
export class LeaseExpired extends EtlError {
  constructor(readonly resourceId: string) {
    super('LEASE_EXPIRED', `Lease on "${resourceId}" expired before the operation finished`);
  }
}

/** One chunk's transaction was rolled back. Reported in the load result; later chunks continue. */
export class PartialChunkFailure extends EtlError {
  constructor(
    readonly destination: string,
    readonly chunkIndex: number,
    readonly recordCount: number,
    cause?: unknown,
  ) {
    super('PARTIAL_CHUNK_FAILURE', `Chunk ${chunkIndex} of "${destination}" rolled back (${recordCount} records)`, {
      cause,
    });
  }
}

/** A pool or backing store could not serve the request in time. */
export class ResourceUnavailable extends EtlError {
  constructor(message: string, cause?: unknown) {
    super('RESOURCE_UNAVAILABLE', message, { cause, retryable: true });
  }
}

/** The load was cancelled by its signal or timeout. Chunks committed before cancellation stay committed. */
export class LoadCancelled extends EtlError {
  constructor(readonly partial: LoadResult) {
    super(
      'LOAD_CANCELLED',
      `Load into "${partial.destination}" cancelled after ${partial.recordsInserted + partial.recordsUpdated} records`,
    );
  }
}

export class ConfigError extends EtlError {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super('CONFIG_ERROR', issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
  }
}

export class UnknownDestination extends EtlError {
  constructor(readonly destination: string) {
    super('UNKNOWN_DESTINATION', `Unknown destination "${destination}"`);
  }
}

/** Check whether an error is a typed failure worth retrying. */
export function isRetryable(error: unknown): boolean {
  return error instanceof EtlError && error.retryable;
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
