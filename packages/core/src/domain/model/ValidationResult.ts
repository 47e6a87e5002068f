/** Rule family a check belongs to. */
export type RuleKind = 'completeness' | 'accuracy' | 'consistency' | 'schema';

/** Blocking rules gate the run; advisory rules are only reported. */
export type RuleSeverity = 'blocking' | 'advisory';

/** Evaluation of a single rule against a batch. */
export interface RuleOutcome {
  readonly ruleId: string;
  readonly kind: RuleKind;
  /** Check tag of the rule, e.g. `'not_null_rate'` or `'range'`. */
  readonly check: string;
  readonly severity: RuleSeverity;
  readonly columns: readonly string[];
  readonly totalRecords: number;
  readonly passedRecords: number;
  readonly failedRecords: number;
  /** Failed-record count tolerated before the rule counts as exceeded. */
  readonly threshold: number;
  readonly exceeded: boolean;
  /** Bounded sample of keys of offending records. */
  readonly sampleKeys: readonly string[];
  readonly message: string;
}

/** Result of evaluating a rule set against a batch. */
export interface ValidationResult {
  readonly dataset: string;
  readonly totalRecords: number;
  /** Records not rejected by any exceeded blocking rule. */
  readonly passedRecords: number;
  readonly failedRecords: number;
  readonly outcomes: readonly RuleOutcome[];
  /** `false` iff at least one blocking rule exceeded its threshold. */
  readonly passed: boolean;
  /** `true` when a blocking batch-level rule failed and no row may proceed. */
  readonly batchRejected: boolean;
  readonly missingColumns: readonly string[];
  /** Ascending indices of rows violating an exceeded blocking row-level rule. */
  readonly rejectedRowIndices: readonly number[];
  /** Passed records as a percentage of the total, `100` for an empty batch. */
  readonly successRate: number;
}

/** Outcomes of blocking rules that exceeded their threshold. */
export function blockingFailures(result: ValidationResult): readonly RuleOutcome[] {
  return result.outcomes.filter((o) => o.severity === 'blocking' && o.exceeded);
}

/** Outcomes of advisory rules that exceeded their threshold. */
export function advisoryWarnings(result: ValidationResult): readonly RuleOutcome[] {
  return result.outcomes.filter((o) => o.severity === 'advisory' && o.exceeded);
}
