import { describe, it, expect } from 'vitest';
import { advisoryWarnings, blockingFailures } from '../../../src/domain/model/ValidationResult.js';
import type { RuleOutcome, ValidationResult } from '../../../src/domain/model/ValidationResult.js';
import { ValidationFailure } from '../../../src/domain/errors/EtlErrors.js';

function outcome(ruleId: string, severity: RuleOutcome['severity'], failedRecords: number): RuleOutcome {
  return {
    ruleId,
    kind: 'accuracy',
    check: 'range',
    severity,
    columns: ['close_price'],
    totalRecords: 10,
    passedRecords: 10 - failedRecords,
    failedRecords,
    threshold: 0,
    exceeded: failedRecords > 0,
    sampleKeys: [],
    message: `${failedRecords} values out of range`,
  };
}

const result: ValidationResult = {
  dataset: 'daily_stock_prices',
  totalRecords: 10,
  passedRecords: 7,
  failedRecords: 3,
  outcomes: [
    outcome('range:close_price', 'blocking', 2),
    outcome('range:volume', 'blocking', 0),
    outcome('range:open_price', 'advisory', 4),
    outcome('pattern:symbol', 'blocking', 1),
  ],
  passed: false,
  batchRejected: false,
  missingColumns: [],
  rejectedRowIndices: [1, 4, 7],
  successRate: 70,
};

describe('ValidationResult', () => {
  it('should pick the exceeded blocking outcomes in rule order', () => {
    expect(blockingFailures(result).map((o) => o.ruleId)).toEqual(['range:close_price', 'pattern:symbol']);
  });

  it('should pick the exceeded advisory outcomes', () => {
    expect(advisoryWarnings(result).map((o) => o.ruleId)).toEqual(['range:open_price']);
  });

  it('should name only the blocking failures in a validation failure', () => {
    expect(new ValidationFailure(result).message).toBe(
      'Validation of "daily_stock_prices" failed: range:close_price (2 failed), pattern:symbol (1 failed)',
    );
  });
});
