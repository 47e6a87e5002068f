import type { QualityLogEntry, RunLogEntry, RunLogSink } from '../../domain/ports/RunLogSink.js';

/** Keeps run-log rows in memory. */
export class InMemoryRunLogSink implements RunLogSink {
  readonly runs: RunLogEntry[] = [];
  readonly quality: QualityLogEntry[] = [];

  recordRun(entry: RunLogEntry): Promise<void> {
    this.runs.push(entry);
    return Promise.resolve();
  }

  recordQuality(entries: readonly QualityLogEntry[]): Promise<void> {
    this.quality.push(...entries);
    return Promise.resolve();
  }

  qualityFor(runId: string): readonly QualityLogEntry[] {
    return this.quality.filter((q) => q.runId === runId);
  }
}
