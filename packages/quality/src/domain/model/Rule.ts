import type { ColumnType, RuleSeverity } from '@ledgerline/core';

interface RuleBase {
  /** Defaults to `<check>:<columns>`. */
  readonly id?: string;
  /** Default: `'blocking'`. */
  readonly severity?: RuleSeverity;
  /** Failed-record count tolerated by row-level rules. Default: `0`. */
  readonly threshold?: number;
}

/** Percentage of null or missing values in a column must not exceed `nullThresholdPct`. */
export interface NotNullRateRule extends RuleBase {
  readonly kind: 'completeness';
  readonly check: 'not_null_rate';
  readonly column: string;
  /** 0–100. Default: `0`. */
  readonly nullThresholdPct?: number;
}

export interface MinRowsRule extends RuleBase {
  readonly kind: 'completeness';
  readonly check: 'min_rows';
  readonly minRows: number;
}

/** Row count must lie within `tolerancePct` of `expected`. */
export interface ExpectedCountRule extends RuleBase {
  readonly kind: 'completeness';
  readonly check: 'expected_count';
  readonly expected: number;
  /** Default: `10`. */
  readonly tolerancePct?: number;
}

/** Inclusive numeric bounds. */
export interface RangeRule extends RuleBase {
  readonly kind: 'accuracy';
  readonly check: 'range';
  readonly column: string;
  readonly min?: number;
  readonly max?: number;
}

export interface AllowedValuesRule extends RuleBase {
  readonly kind: 'accuracy';
  readonly check: 'allowed_values';
  readonly column: string;
  readonly values: readonly (string | number | boolean)[];
}

export interface PatternRule extends RuleBase {
  readonly kind: 'accuracy';
  readonly check: 'pattern';
  readonly column: string;
  /** Regular expression source, tested against the value's string form. */
  readonly pattern: string;
}

/** Every non-null value coerces to `dtype` without loss. */
export interface TypeRule extends RuleBase {
  readonly kind: 'consistency';
  readonly check: 'type';
  readonly column: string;
  readonly dtype: ColumnType;
  /** Maximum fractional digits for `decimal`. */
  readonly scale?: number;
}

/** The tuple of `columns` is unique; repeats after the first occurrence fail. */
export interface UniqueRule extends RuleBase {
  readonly kind: 'consistency';
  readonly check: 'unique';
  readonly columns: readonly string[];
}

/** String values parse under `format`, built from the tokens `YYYY`, `MM`, `DD`, `HH`, `mm`, `ss`. */
export interface DateFormatRule extends RuleBase {
  readonly kind: 'consistency';
  readonly check: 'date_format';
  readonly column: string;
  readonly format: string;
}

export type ComparisonOperator = '<' | '<=' | '>' | '>=' | '==' | '!=';

/** `left <operator> right` holds for every row where both sides are present. */
export interface CrossFieldRule extends RuleBase {
  readonly kind: 'consistency';
  readonly check: 'cross_field';
  readonly columns: readonly [string, string];
  readonly operator: ComparisonOperator;
}

/** Every column is present in the batch. Evaluated once for the whole batch. */
export interface RequiredColumnsRule extends RuleBase {
  readonly kind: 'schema';
  readonly check: 'required_columns';
  readonly columns: readonly string[];
}

export interface NotNullRule extends RuleBase {
  readonly kind: 'schema';
  readonly check: 'not_null';
  readonly column: string;
}

/** Tagged union of every rule, discriminated by `check`. */
export type Rule =
  | NotNullRateRule
  | MinRowsRule
  | ExpectedCountRule
  | RangeRule
  | AllowedValuesRule
  | PatternRule
  | TypeRule
  | UniqueRule
  | DateFormatRule
  | CrossFieldRule
  | RequiredColumnsRule
  | NotNullRule;

export type RuleCheck = Rule['check'];

/** Kind each check belongs to. */
export const CHECK_KINDS: { readonly [C in RuleCheck]: Extract<Rule, { check: C }>['kind'] } = {
  not_null_rate: 'completeness',
  min_rows: 'completeness',
  expected_count: 'completeness',
  range: 'accuracy',
  allowed_values: 'accuracy',
  pattern: 'accuracy',
  type: 'consistency',
  unique: 'consistency',
  date_format: 'consistency',
  cross_field: 'consistency',
  required_columns: 'schema',
  not_null: 'schema',
};

/** Checks evaluated once per batch rather than per row. */
export const BATCH_LEVEL_CHECKS: ReadonlySet<RuleCheck> = new Set<RuleCheck>([
  'required_columns',
  'min_rows',
  'expected_count',
]);

/** Columns a rule inspects. */
export function ruleColumns(rule: Rule): readonly string[] {
  switch (rule.check) {
    case 'min_rows':
    case 'expected_count':
      return [];
    case 'unique':
    case 'cross_field':
    case 'required_columns':
      return rule.columns;
    default:
      return [rule.column];
  }
}

export function ruleIdOf(rule: Rule): string {
  if (rule.id) return rule.id;
  const columns = ruleColumns(rule);
  return columns.length > 0 ? `${rule.check}:${columns.join(',')}` : rule.check;
}

export function severityOf(rule: Rule): RuleSeverity {
  return rule.severity ?? 'blocking';
}

export function thresholdOf(rule: Rule): number {
  return rule.threshold ?? 0;
}
