/**
 * Domain service that groups items into fixed-size chunks.
 *
 * Pure logic, no I/O. The final chunk may contain fewer items than `chunkSize`.
 */
export class ChunkSplitter {
  constructor(private readonly chunkSize: number) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new Error('Batch size must be at least 1');
    }
  }

  /** Yield `{ items, chunkIndex }` for each chunk, in input order. */
  *split<T>(items: readonly T[], startIndex = 0): Generator<{ readonly items: readonly T[]; readonly chunkIndex: number }> {
    let chunkIndex = startIndex;
    for (let offset = 0; offset < items.length; offset += this.chunkSize) {
      yield { items: items.slice(offset, offset + this.chunkSize), chunkIndex };
      chunkIndex++;
    }
  }

  /** Number of chunks `split()` yields for `count` items. */
  countChunks(count: number): number {
    return Math.ceil(count / this.chunkSize);
  }
}
