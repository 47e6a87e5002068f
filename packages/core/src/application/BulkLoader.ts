import type { Logger } from 'pino';
import {
  LeaseExpired,
  LoadCancelled,
  PartialChunkFailure,
  ResourceUnavailable,
  errorMessage,
} from '../domain/errors/EtlErrors.js';
import type { ChunkOutcome } from '../domain/model/Chunk.js';
import { createChunkOutcome } from '../domain/model/Chunk.js';
import type { DestinationDefinition } from '../domain/model/Destination.js';
import { destinationId, naturalKeyOf } from '../domain/model/Destination.js';
import type { Lease } from '../domain/model/Lease.js';
import type { LoadMode, LoadResult, Rejection } from '../domain/model/LoadResult.js';
import { loadStatusOf } from '../domain/model/LoadResult.js';
import type { RawRecord, RecordBatch } from '../domain/model/Record.js';
import type { Warehouse, WarehouseSession } from '../domain/ports/Warehouse.js';
import { ChunkSplitter } from '../domain/services/ChunkSplitter.js';
import { silentLogger } from '../infrastructure/logging/logger.js';
import type { ConnectionPool } from './ConnectionPool.js';
import type { EventBus } from './EventBus.js';
import type { LockManager } from './LockManager.js';

export interface BulkLoaderOptions {
  readonly warehouse: Warehouse;
  readonly lockManager: LockManager;
  /** Shared connection pool. Each chunk transaction holds one slot. */
  readonly pool?: ConnectionPool;
  /** TTL of the destination lease, renewed before every chunk. Default: `300000`. */
  readonly leaseTtlMs?: number;
  /** Retries of a chunk that failed with `ResourceUnavailable`. Default: `3`. */
  readonly maxChunkRetries?: number;
  /** Base delay for chunk retries, doubled per attempt. Default: `1000`. */
  readonly retryDelayMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly eventBus?: EventBus;
  readonly logger?: Logger;
}

export interface LoadOptions {
  /** Default: `'upsert'`. */
  readonly mode?: LoadMode;
  /** Records per chunk. Default: `10000`. */
  readonly batchSize?: number;
  readonly signal?: AbortSignal;
  /** Cancel the load after this many milliseconds. */
  readonly timeoutMs?: number;
}

interface KeyedRecord {
  readonly rowIndex: number;
  readonly key: string;
  readonly record: RawRecord;
}

interface ChunkWrite {
  readonly inserted: number;
  readonly updated: number;
  readonly rejections: readonly Rejection[];
}

/** Raised inside a chunk transaction to roll it back when the load is cancelled. */
class CancelledInFlight extends Error {}

/** Mutable tallies of one load call. */
class LoadTally {
  inserted = 0;
  updated = 0;
  readonly rejections: Rejection[] = [];
  readonly chunks: ChunkOutcome[] = [];

  constructor(
    readonly destination: string,
    readonly mode: LoadMode,
    readonly attempted: number,
    readonly startedAt: number,
  ) {}

  reject(rejection: Rejection): void {
    this.rejections.push(rejection);
  }

  toResult(): LoadResult {
    const rejected = this.rejections.length;
    return {
      destination: this.destination,
      mode: this.mode,
      recordsAttempted: this.attempted,
      recordsInserted: this.inserted,
      recordsUpdated: this.updated,
      recordsRejected: rejected,
      chunks: [...this.chunks],
      rejections: [...this.rejections].sort((a, b) => a.rowIndex - b.rowIndex),
      durationMs: Date.now() - this.startedAt,
      status: loadStatusOf(this.inserted + this.updated, rejected),
    };
  }
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Writes a transformed batch into a warehouse destination under a lease on the destination id.
 *
 * Chunks are written in batch order, each in its own transaction (`append`, `upsert`), or all
 * inside one transaction (`replace`). A failed chunk is rolled back and reported; later chunks continue.
 */
export class BulkLoader {
  private readonly warehouse: Warehouse;
  private readonly lockManager: LockManager;
  private readonly pool: ConnectionPool | null;
  private readonly leaseTtlMs: number;
  private readonly maxChunkRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly eventBus: EventBus | null;
  private readonly logger: Logger;

  constructor(options: BulkLoaderOptions) {
    this.warehouse = options.warehouse;
    this.lockManager = options.lockManager;
    this.pool = options.pool ?? null;
    this.leaseTtlMs = options.leaseTtlMs ?? 300_000;
    this.maxChunkRetries = options.maxChunkRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
    this.sleep = options.sleep ?? defaultSleep;
    this.eventBus = options.eventBus ?? null;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'bulk_loader' });
  }

  async load(batch: RecordBatch, destination: DestinationDefinition, options: LoadOptions = {}): Promise<LoadResult> {
    const mode = options.mode ?? 'upsert';
    const splitter = new ChunkSplitter(options.batchSize ?? 10_000);
    const target = destinationId(destination);
    const tally = new LoadTally(target, mode, batch.length, Date.now());

    const keyed = this.screenKeys(batch, destination, tally);
    const cancellation = new Cancellation(options.signal, options.timeoutMs);

    this.logger.info(
      { destination: target, mode, records: batch.length, chunks: splitter.countChunks(keyed.length) },
      'load_started',
    );

    try {
      if (cancellation.cancelled) {
        throw new LoadCancelled(tally.toResult());
      }

      const lease = await this.lockManager.acquire(target, this.leaseTtlMs);
      try {
        if (mode === 'replace') {
          await this.loadReplacing(keyed, destination, splitter, lease, tally, cancellation);
        } else {
          await this.loadChunked(keyed, destination, mode, splitter, lease, tally, cancellation);
        }
      } finally {
        await this.lockManager.releaseQuietly(lease);
      }
    } finally {
      cancellation.dispose();
    }

    const result = tally.toResult();
    this.logger.info(
      {
        destination: target,
        mode,
        status: result.status,
        inserted: result.recordsInserted,
        updated: result.recordsUpdated,
        rejected: result.recordsRejected,
        durationMs: result.durationMs,
      },
      'load_completed',
    );
    this.eventBus?.emit({
      type: 'load:completed',
      destination: target,
      mode,
      status: result.status,
      recordsInserted: result.recordsInserted,
      recordsUpdated: result.recordsUpdated,
      recordsRejected: result.recordsRejected,
      durationMs: result.durationMs,
      timestamp: Date.now(),
    });
    return result;
  }

  /** Reject records without a natural key and repeats of a key already seen in the batch. */
  private screenKeys(batch: RecordBatch, destination: DestinationDefinition, tally: LoadTally): KeyedRecord[] {
    const seen = new Set<string>();
    const keyed: KeyedRecord[] = [];

    batch.forEach((record, rowIndex) => {
      const key = naturalKeyOf(record, destination);
      if (key === null) {
        tally.reject({
          rowIndex,
          reason: 'MISSING_KEY',
          message: `Natural key (${destination.naturalKey.join(', ')}) is incomplete`,
        });
        return;
      }
      if (seen.has(key)) {
        tally.reject({ rowIndex, reason: 'DUPLICATE_IN_BATCH', key, message: `Key ${key} repeats in the batch` });
        return;
      }
      seen.add(key);
      keyed.push({ rowIndex, key, record });
    });

    return keyed;
  }

  private async loadChunked(
    keyed: readonly KeyedRecord[],
    destination: DestinationDefinition,
    mode: LoadMode,
    splitter: ChunkSplitter,
    initialLease: Lease,
    tally: LoadTally,
    cancellation: Cancellation,
  ): Promise<void> {
    let lease = initialLease;

    for (const { items, chunkIndex } of splitter.split(keyed)) {
      if (cancellation.cancelled) {
        throw new LoadCancelled(tally.toResult());
      }
      lease = await this.lockManager.renew(lease, this.leaseTtlMs);

      const outcome = await this.writeChunkWithRetry(chunkIndex, items, destination, tally, cancellation, (session) =>
        this.writeChunk(session, destination, mode, items, cancellation),
      );
      tally.chunks.push(outcome);
    }
  }

  private async loadReplacing(
    keyed: readonly KeyedRecord[],
    destination: DestinationDefinition,
    splitter: ChunkSplitter,
    initialLease: Lease,
    tally: LoadTally,
    cancellation: Cancellation,
  ): Promise<void> {
    const target = tally.destination;
    const chunks = [...splitter.split(keyed)];

    for (let attempt = 1; ; attempt++) {
      let lease = initialLease;
      try {
        const counts = await this.withConnection(() =>
          this.warehouse.transaction(async (session) => {
            const deleted = await session.deletePartitions(
              destination,
              keyed.map((k) => k.record),
            );
            this.logger.debug({ destination: target, deleted }, 'partitions_cleared');

            const written: number[] = [];
            for (const { items } of chunks) {
              if (cancellation.cancelled) throw new CancelledInFlight();
              lease = await this.lockManager.renew(lease, this.leaseTtlMs);
              await session.insertRows(
                destination,
                items.map((k) => k.record),
              );
              written.push(items.length);
            }
            if (cancellation.cancelled) throw new CancelledInFlight();
            return written;
          }),
        );

        chunks.forEach(({ items, chunkIndex }, position) => {
          const inserted = counts[position] ?? 0;
          tally.inserted += inserted;
          tally.chunks.push({
            ...createChunkOutcome(chunkIndex, items.length),
            status: 'COMMITTED',
            insertedCount: inserted,
            attempts: attempt,
          });
          this.emitCommitted(target, chunkIndex, inserted, 0, 0);
        });
        return;
      } catch (error) {
        if (error instanceof CancelledInFlight) {
          throw new LoadCancelled(tally.toResult());
        }
        if (error instanceof LeaseExpired) {
          throw error;
        }
        if (error instanceof ResourceUnavailable && attempt <= this.maxChunkRetries) {
          await this.backOff(target, 0, attempt, error);
          continue;
        }

        const failure = new PartialChunkFailure(target, 0, keyed.length, error);
        this.logger.error({ err: failure, destination: target }, 'replace_rolled_back');
        for (const { items, chunkIndex } of chunks) {
          tally.chunks.push({
            ...createChunkOutcome(chunkIndex, items.length),
            status: 'ROLLED_BACK',
            rejectedCount: items.length,
            attempts: attempt,
            error: errorMessage(error),
          });
          this.rejectChunk(items, tally, error);
          this.emitFailed(target, chunkIndex, items.length, error);
        }
        return;
      }
    }
  }

  /** Write one chunk, retrying transient pool or store failures. A permanent failure rolls the chunk back and rejects its records. */
  private async writeChunkWithRetry(
    chunkIndex: number,
    items: readonly KeyedRecord[],
    destination: DestinationDefinition,
    tally: LoadTally,
    cancellation: Cancellation,
    write: (session: WarehouseSession) => Promise<ChunkWrite>,
  ): Promise<ChunkOutcome> {
    const target = tally.destination;
    const pending = createChunkOutcome(chunkIndex, items.length);

    for (let attempt = 1; ; attempt++) {
      try {
        const written = await this.withConnection(() => this.warehouse.transaction(write));

        tally.inserted += written.inserted;
        tally.updated += written.updated;
        for (const rejection of written.rejections) {
          tally.reject(rejection);
        }
        this.logger.debug(
          { destination: target, chunkIndex, inserted: written.inserted, updated: written.updated },
          'chunk_committed',
        );
        this.emitCommitted(target, chunkIndex, written.inserted, written.updated, written.rejections.length);
        return {
          ...pending,
          status: 'COMMITTED',
          insertedCount: written.inserted,
          updatedCount: written.updated,
          rejectedCount: written.rejections.length,
          attempts: attempt,
        };
      } catch (error) {
        if (error instanceof CancelledInFlight) {
          tally.chunks.push({ ...pending, status: 'ROLLED_BACK', attempts: attempt, error: 'cancelled' });
          throw new LoadCancelled(tally.toResult());
        }
        if (error instanceof LeaseExpired) {
          throw error;
        }
        if (error instanceof ResourceUnavailable && attempt <= this.maxChunkRetries) {
          await this.backOff(target, chunkIndex, attempt, error);
          continue;
        }

        const failure = new PartialChunkFailure(target, chunkIndex, items.length, error);
        this.logger.warn({ err: failure, destination: target, chunkIndex }, 'chunk_failed');
        this.rejectChunk(items, tally, error);
        this.emitFailed(target, chunkIndex, items.length, error);
        return {
          ...pending,
          status: 'ROLLED_BACK',
          rejectedCount: items.length,
          attempts: attempt,
          error: errorMessage(error),
        };
      }
    }
  }

  private async writeChunk(
    session: WarehouseSession,
    destination: DestinationDefinition,
    mode: LoadMode,
    items: readonly KeyedRecord[],
    cancellation: Cancellation,
  ): Promise<ChunkWrite> {
    const records = items.map((k) => k.record);
    const existing = await session.findExistingKeys(destination, records);

    if (mode === 'append') {
      const fresh = items.filter((k) => !existing.has(k.key));
      const rejections = items
        .filter((k) => existing.has(k.key))
        .map((k): Rejection => ({
          rowIndex: k.rowIndex,
          reason: 'DUPLICATE_KEY',
          key: k.key,
          message: `Key ${k.key} already exists in ${destinationId(destination)}`,
        }));
      if (fresh.length > 0) {
        await session.insertRows(
          destination,
          fresh.map((k) => k.record),
        );
      }
      if (cancellation.cancelled) throw new CancelledInFlight();
      return { inserted: fresh.length, updated: 0, rejections };
    }

    await session.upsertRows(destination, records);
    if (cancellation.cancelled) throw new CancelledInFlight();
    const updated = items.filter((k) => existing.has(k.key)).length;
    return { inserted: items.length - updated, updated, rejections: [] };
  }

  private withConnection<T>(work: () => Promise<T>): Promise<T> {
    return this.pool ? this.pool.withConnection(work) : work();
  }

  private async backOff(target: string, chunkIndex: number, attempt: number, error: unknown): Promise<void> {
    const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
    this.logger.warn({ destination: target, chunkIndex, attempt, delayMs: delay, err: error }, 'chunk_retry');
    this.eventBus?.emit({
      type: 'chunk:retried',
      destination: target,
      chunkIndex,
      attempt,
      maxRetries: this.maxChunkRetries,
      error: errorMessage(error),
      timestamp: Date.now(),
    });
    if (delay > 0) {
      await this.sleep(delay);
    }
  }

  private rejectChunk(items: readonly KeyedRecord[], tally: LoadTally, error: unknown): void {
    for (const k of items) {
      tally.reject({ rowIndex: k.rowIndex, reason: 'CHUNK_FAILED', key: k.key, message: errorMessage(error) });
    }
  }

  private emitCommitted(target: string, chunkIndex: number, inserted: number, updated: number, rejected: number): void {
    this.eventBus?.emit({
      type: 'chunk:committed',
      destination: target,
      chunkIndex,
      insertedCount: inserted,
      updatedCount: updated,
      rejectedCount: rejected,
      timestamp: Date.now(),
    });
  }

  private emitFailed(target: string, chunkIndex: number, recordCount: number, error: unknown): void {
    this.eventBus?.emit({
      type: 'chunk:failed',
      destination: target,
      chunkIndex,
      recordCount,
      error: errorMessage(error),
      timestamp: Date.now(),
    });
  }
}

/** Merges the caller's signal and timeout into one cancellation flag. */
class Cancellation {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout> | null;
  private readonly onAbort = (): void => this.controller.abort();

  constructor(
    private readonly signal: AbortSignal | undefined,
    timeoutMs: number | undefined,
  ) {
    if (signal?.aborted) {
      this.controller.abort();
    }
    signal?.addEventListener('abort', this.onAbort, { once: true });
    this.timer = timeoutMs !== undefined ? setTimeout(this.onAbort, timeoutMs) : null;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  dispose(): void {
    if (this.timer !== null) clearTimeout(this.timer);
    this.signal?.removeEventListener('abort', this.onAbort);
  }
}
