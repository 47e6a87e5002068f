import {
  ConfigError,
  SchemaViolation,
  ValidationFailure,
  blockingFailures,
  errorMessage,
  silentLogger,
} from '@ledgerline/core';
import type { Logger, RawRecord, RecordBatch, RuleOutcome, ValidationResult } from '@ledgerline/core';
import { BATCH_LEVEL_CHECKS, ruleColumns, ruleIdOf, severityOf, thresholdOf } from '../model/Rule.js';
import type { Rule } from '../model/Rule.js';
import type { RuleSet } from '../model/RuleSet.js';
import { checkAllowedValues, checkPattern, checkRange } from './checks/accuracy.js';
import type { CheckResult } from './checks/CheckResult.js';
import { checkExpectedCount, checkMinRows, checkNotNullRate, nullRate } from './checks/completeness.js';
import { checkCrossField, checkDateFormat, checkType, checkUnique } from './checks/consistency.js';
import { compileDateFormat } from './checks/dateFormat.js';
import type { CompiledDateFormat } from './checks/dateFormat.js';
import { checkNotNull, checkRequiredColumns } from './checks/schema.js';

const DEFAULT_SAMPLE_SIZE = 5;

export interface ValidateOptions {
  /** Raise instead of returning a failed result. Default: `false`. */
  readonly strict?: boolean;
}

export interface ValidatorOptions {
  readonly logger?: Logger;
}

/**
 * Evaluates a rule set against record batches.
 *
 * Patterns and date formats are compiled once at construction; an invalid one raises
 * `ConfigError` there rather than during a run.
 */
export class Validator {
  private readonly patterns = new Map<Rule, RegExp>();
  private readonly dateFormats = new Map<Rule, CompiledDateFormat>();
  private readonly logger: Logger;

  constructor(
    readonly ruleSet: RuleSet,
    options: ValidatorOptions = {},
  ) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'validator' });
    const issues: string[] = [];
    for (const rule of ruleSet.rules) {
      if (rule.check === 'pattern') {
        try {
          this.patterns.set(rule, new RegExp(rule.pattern));
        } catch (error) {
          issues.push(`${ruleIdOf(rule)}: invalid pattern (${errorMessage(error)})`);
        }
      } else if (rule.check === 'date_format') {
        this.dateFormats.set(rule, compileDateFormat(rule.format));
      }
    }
    if (issues.length > 0) {
      throw new ConfigError(`Invalid rule set "${ruleSet.dataset}"`, issues);
    }
  }

  /**
   * Evaluate every rule against the batch.
   *
   * In strict mode a missing required column raises `SchemaViolation` and any other
   * exceeded blocking rule raises `ValidationFailure`.
   */
  validate(batch: RecordBatch, options: ValidateOptions = {}): ValidationResult {
    const total = batch.length;
    const outcomes: RuleOutcome[] = [];
    const rejected = new Set<number>();
    const missingColumns = new Set<string>();
    const blockingMissing = new Set<string>();
    let batchRejected = false;

    for (const rule of this.ruleSet.rules) {
      const finding = this.runCheck(batch, rule);
      const outcome = this.toOutcome(batch, rule, finding);
      outcomes.push(outcome);

      const blocking = outcome.severity === 'blocking' && outcome.exceeded;
      if (finding.scope === 'batch') {
        for (const column of finding.missingColumns ?? []) {
          missingColumns.add(column);
          if (blocking) blockingMissing.add(column);
        }
        if (blocking) batchRejected = true;
      } else if (blocking) {
        for (const index of finding.failedRows) rejected.add(index);
      }

      this.logger.debug(
        { ruleId: outcome.ruleId, failed: outcome.failedRecords, exceeded: outcome.exceeded },
        'rule_evaluated',
      );
    }

    const passedRecords = batchRejected ? 0 : total - rejected.size;
    const passed = !outcomes.some((o) => o.severity === 'blocking' && o.exceeded);
    const result: ValidationResult = {
      dataset: this.ruleSet.dataset,
      totalRecords: total,
      passedRecords,
      failedRecords: total - passedRecords,
      outcomes,
      passed,
      batchRejected,
      missingColumns: [...missingColumns],
      rejectedRowIndices: [...rejected].sort((a, b) => a - b),
      successRate: total === 0 ? 100 : (passedRecords / total) * 100,
    };

    this.logResult(result);

    if (options.strict && !result.passed) {
      if (blockingMissing.size > 0) throw new SchemaViolation([...blockingMissing], result);
      throw new ValidationFailure(result);
    }
    return result;
  }

  private runCheck(batch: RecordBatch, rule: Rule): CheckResult {
    switch (rule.check) {
      case 'not_null_rate':
        return checkNotNullRate(batch, rule);
      case 'min_rows':
        return checkMinRows(batch, rule);
      case 'expected_count':
        return checkExpectedCount(batch, rule);
      case 'range':
        return checkRange(batch, rule);
      case 'allowed_values':
        return checkAllowedValues(batch, rule);
      case 'pattern':
        return checkPattern(batch, rule.column, this.patterns.get(rule) ?? new RegExp(rule.pattern));
      case 'type':
        return checkType(batch, rule);
      case 'unique':
        return checkUnique(batch, rule);
      case 'date_format':
        return checkDateFormat(batch, rule.column, this.dateFormats.get(rule) ?? compileDateFormat(rule.format));
      case 'cross_field':
        return checkCrossField(batch, rule);
      case 'required_columns':
        return checkRequiredColumns(batch, rule);
      case 'not_null':
        return checkNotNull(batch, rule);
    }
  }

  private toOutcome(batch: RecordBatch, rule: Rule, finding: CheckResult): RuleOutcome {
    const total = batch.length;
    const threshold = thresholdOf(rule);
    let failedRecords: number;
    let exceeded: boolean;
    let sampleKeys: string[];

    if (finding.scope === 'batch') {
      // Batch-level findings have no per-row tolerance and no offending record.
      exceeded = finding.failed;
      failedRecords = finding.failed ? total : 0;
      sampleKeys = [];
    } else {
      failedRecords = finding.failedRows.length;
      exceeded =
        rule.check === 'not_null_rate'
          ? nullRate(failedRecords, total) > (rule.nullThresholdPct ?? 0)
          : failedRecords > threshold;
      sampleKeys = finding.failedRows.slice(0, this.sampleSize).map((index) => this.keyOf(batch, index));
    }

    return {
      ruleId: ruleIdOf(rule),
      kind: rule.kind,
      check: rule.check,
      severity: severityOf(rule),
      columns: ruleColumns(rule),
      totalRecords: total,
      passedRecords: total - failedRecords,
      failedRecords,
      threshold,
      exceeded,
      sampleKeys,
      message: finding.message,
    };
  }

  private get sampleSize(): number {
    return this.ruleSet.sampleSize ?? DEFAULT_SAMPLE_SIZE;
  }

  private keyOf(batch: RecordBatch, index: number): string {
    const record = batch[index];
    const keyColumns = this.ruleSet.keyColumns ?? [];
    if (!record || keyColumns.length === 0) return `#${index}`;
    return keyColumns.map((column) => formatKeyPart(record, column)).join('|');
  }

  private logResult(result: ValidationResult): void {
    const summary = {
      dataset: result.dataset,
      total: result.totalRecords,
      passed: result.passedRecords,
      failed: result.failedRecords,
      successRate: result.successRate.toFixed(2),
    };
    if (result.passed) {
      this.logger.info(summary, 'validation_passed');
    } else {
      const rules = blockingFailures(result).map((o) => o.ruleId);
      this.logger.warn({ ...summary, rules }, 'validation_failed');
    }
  }
}

function formatKeyPart(record: RawRecord, column: string): string {
  const value = record[column];
  if (value instanceof Date) return value.toISOString();
  return value === undefined || value === null ? '' : String(value);
}

/** Evaluate a rule set once. */
export function validate(
  batch: RecordBatch,
  ruleSet: RuleSet,
  options: ValidateOptions & ValidatorOptions = {},
): ValidationResult {
  const validatorOptions: ValidatorOptions = options.logger ? { logger: options.logger } : {};
  return new Validator(ruleSet, validatorOptions).validate(batch, options);
}

/** Rows that survive validation, in their original order. None when the batch was rejected. */
export function passingRecords<T extends RawRecord>(batch: readonly T[], result: ValidationResult): T[] {
  if (result.batchRejected) return [];
  const rejected = new Set(result.rejectedRowIndices);
  return batch.filter((_, index) => !rejected.has(index));
}

/** Whether a check is evaluated once for the whole batch. */
export function isBatchLevel(rule: Rule): boolean {
  return BATCH_LEVEL_CHECKS.has(rule.check);
}
