import type { ChunkStatus } from './ChunkStatus.js';

/** Outcome of writing one chunk of a load. */
export interface ChunkOutcome {
  /** Zero-based chunk index within the load, in batch order. */
  readonly index: number;
  /** Final status of the chunk transaction. */
  readonly status: ChunkStatus;
  /** Records handed to this chunk. */
  readonly recordCount: number;
  readonly insertedCount: number;
  readonly updatedCount: number;
  /** Records rejected before or during the write (key problems or a rolled-back transaction). */
  readonly rejectedCount: number;
  /** Write attempts made, including retries after `ResourceUnavailable`. */
  readonly attempts: number;
  /** Error message when the chunk was rolled back. */
  readonly error?: string;
}

/** Create a chunk outcome in `PENDING` status. */
export function createChunkOutcome(index: number, recordCount: number): ChunkOutcome {
  return {
    index,
    status: 'PENDING',
    recordCount,
    insertedCount: 0,
    updatedCount: 0,
    rejectedCount: 0,
    attempts: 0,
  };
}
