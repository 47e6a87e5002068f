import type { Logger } from 'pino';
import type { RunReport } from '../domain/model/RunReport.js';
import type { QualityLogEntry, RunLogEntry, RunLogSink } from '../domain/ports/RunLogSink.js';
import { silentLogger } from '../infrastructure/logging/logger.js';

/** Records every validate → transform → load run in the run-log sink and the structured log. */
export class RunLogger {
  private readonly logger: Logger;

  constructor(
    private readonly sink: RunLogSink,
    logger?: Logger,
  ) {
    this.logger = (logger ?? silentLogger()).child({ component: 'run_logger' });
  }

  started(runId: string, dataset: string, destination: string, totalRecords: number): void {
    this.logger.info({ runId, dataset, destination, records: totalRecords }, 'run_started');
  }

  /** Persist the run row and one quality row per evaluated rule. */
  async completed(report: RunReport): Promise<void> {
    await this.sink.recordRun(toRunLogEntry(report));
    const quality = toQualityLogEntries(report);
    if (quality.length > 0) {
      await this.sink.recordQuality(quality);
    }

    const fields = {
      runId: report.runId,
      dataset: report.dataset,
      destination: report.destination,
      status: report.status,
      ...report.counts,
      durationMs: report.finishedAt - report.startedAt,
    };
    if (report.status === 'FAILED') {
      this.logger.error({ ...fields, error: report.error }, 'run_failed');
    } else {
      this.logger.info(fields, 'run_completed');
    }
  }
}

export function toRunLogEntry(report: RunReport): RunLogEntry {
  return {
    runId: report.runId,
    dataset: report.dataset,
    destination: report.destination,
    status: report.status,
    startedAt: new Date(report.startedAt),
    finishedAt: new Date(report.finishedAt),
    recordsExtracted: report.counts.extracted,
    recordsValidated: report.counts.validated,
    recordsTransformed: report.counts.transformed,
    recordsLoaded: report.counts.loaded,
    recordsRejected: report.counts.rejected,
    errorMessage: report.error ?? null,
  };
}

export function toQualityLogEntries(report: RunReport): QualityLogEntry[] {
  if (!report.validation) return [];
  return report.validation.outcomes.map((outcome) => ({
    runId: report.runId,
    validationType: outcome.kind,
    validationRule: outcome.ruleId,
    passedRecords: outcome.passedRecords,
    failedRecords: outcome.failedRecords,
    details: {
      check: outcome.check,
      severity: outcome.severity,
      columns: outcome.columns,
      threshold: outcome.threshold,
      exceeded: outcome.exceeded,
      sampleKeys: outcome.sampleKeys,
      message: outcome.message,
    },
  }));
}
