import { RunStatus, SchemaViolation, ValidationFailure } from '@ledgerline/core';
import type { RawRecord, RecordBatch } from '@ledgerline/core';
import { Validator, passingRecords } from '@ledgerline/quality';
import type { Stage } from '../../domain/Stage.js';
import type { RunContext } from '../RunContext.js';

/**
 * Runs the validator and hands on the rows that survive it.
 *
 * Strict mode raises on any blocking failure. Otherwise failing rows are filtered out,
 * and a batch-level rejection still stops the run with the matching error.
 */
export class ValidateBatch implements Stage<RecordBatch, RawRecord[]> {
  readonly name = 'validate';

  constructor(
    private readonly validator: Validator,
    private readonly strict: boolean,
  ) {}

  async run(batch: RecordBatch, ctx: RunContext): Promise<RawRecord[]> {
    ctx.transitionTo(RunStatus.VALIDATING);
    try {
      const result = this.validator.validate(batch, { strict: this.strict });
      this.record(ctx, result.passed, result.passedRecords, result.failedRecords);
      ctx.validation = result;

      if (result.batchRejected) {
        throw result.missingColumns.length > 0
          ? new SchemaViolation(result.missingColumns, result)
          : new ValidationFailure(result);
      }
      return passingRecords(batch, result);
    } catch (error) {
      if (error instanceof SchemaViolation || error instanceof ValidationFailure) {
        if (!ctx.validation) {
          ctx.validation = error.result;
          this.record(ctx, false, error.result.passedRecords, error.result.failedRecords);
        }
      }
      throw error;
    }
  }

  private record(ctx: RunContext, passed: boolean, passedRecords: number, failedRecords: number): void {
    ctx.validated = passedRecords;
    ctx.validationRejected = failedRecords;
    ctx.emit({
      type: 'validation:completed',
      runId: ctx.runId,
      dataset: ctx.dataset,
      passed,
      passedRecords,
      failedRecords,
      timestamp: ctx.now(),
    });
  }
}
