import type { ChunkOutcome } from './Chunk.js';

/** Write semantics of a load. */
export type LoadMode = 'append' | 'replace' | 'upsert';

/** Terminal status of a load, shared with run reports. */
export type LoadStatus = 'SUCCESS' | 'PARTIAL' | 'FAILED';

/** Machine-readable reason a record was not written. */
export type RejectionReason = 'MISSING_KEY' | 'DUPLICATE_IN_BATCH' | 'DUPLICATE_KEY' | 'CHUNK_FAILED';

/** A record the loader did not write. */
export interface Rejection {
  /** Position of the record in the loaded batch. */
  readonly rowIndex: number;
  readonly reason: RejectionReason;
  /** Normalized natural key, when the record carries one. */
  readonly key?: string;
  readonly message: string;
}

export interface LoadResult {
  readonly destination: string;
  readonly mode: LoadMode;
  readonly recordsAttempted: number;
  readonly recordsInserted: number;
  readonly recordsUpdated: number;
  readonly recordsRejected: number;
  readonly chunks: readonly ChunkOutcome[];
  readonly rejections: readonly Rejection[];
  readonly durationMs: number;
  readonly status: LoadStatus;
}

/** Derive the terminal status from write and rejection counts. */
export function loadStatusOf(written: number, rejected: number): LoadStatus {
  if (rejected === 0) return 'SUCCESS';
  return written > 0 ? 'PARTIAL' : 'FAILED';
}
