import type { Rule } from './Rule.js';

/** Rules for one logical dataset. */
export interface RuleSet {
  readonly dataset: string;
  /** Columns identifying a record in sample keys. Row positions (`#12`) are used when omitted. */
  readonly keyColumns?: readonly string[];
  /** Offending keys kept per rule. Default: `5`. */
  readonly sampleSize?: number;
  readonly rules: readonly Rule[];
}

/** Columns the batch must contain, declared by `required_columns` rules. */
export function requiredColumnsOf(ruleSet: RuleSet, blockingOnly = false): string[] {
  const columns = new Set<string>();
  for (const rule of ruleSet.rules) {
    if (rule.check !== 'required_columns') continue;
    if (blockingOnly && (rule.severity ?? 'blocking') !== 'blocking') continue;
    for (const column of rule.columns) columns.add(column);
  }
  return [...columns];
}
