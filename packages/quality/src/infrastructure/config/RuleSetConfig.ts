import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '@ledgerline/core';
import type { Rule } from '../../domain/model/Rule.js';
import type { RuleSet } from '../../domain/model/RuleSet.js';

const COLUMN_TYPES = ['string', 'integer', 'decimal', 'date', 'timestamp', 'boolean'] as const;
const OPERATORS = ['<', '<=', '>', '>=', '==', '!='] as const;

const common = {
  id: z.string().min(1).optional(),
  severity: z.enum(['blocking', 'advisory']).optional(),
  threshold: z.number().int().min(0).optional(),
};
const column = z.string().min(1);
const columnList = z.array(column).min(1);

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const descriptorSchema = z.discriminatedUnion('check', [
  z.object({
    ...common,
    kind: z.literal('completeness'),
    check: z.literal('not_null_rate'),
    column,
    params: z.object({ nullThresholdPct: z.number().min(0).max(100).optional() }).default({}),
  }),
  z.object({
    ...common,
    kind: z.literal('completeness'),
    check: z.literal('min_rows'),
    params: z.object({ minRows: z.number().int().min(0) }),
  }),
  z.object({
    ...common,
    kind: z.literal('completeness'),
    check: z.literal('expected_count'),
    params: z.object({ expected: z.number().int().min(0), tolerancePct: z.number().min(0).optional() }),
  }),
  z.object({
    ...common,
    kind: z.literal('accuracy'),
    check: z.literal('range'),
    column,
    params: z
      .object({ min: z.number().optional(), max: z.number().optional() })
      .refine((p) => p.min !== undefined || p.max !== undefined, 'Expected at least one of min, max')
      .refine((p) => p.min === undefined || p.max === undefined || p.min <= p.max, 'min must not exceed max'),
  }),
  z.object({
    ...common,
    kind: z.literal('accuracy'),
    check: z.literal('allowed_values'),
    column,
    params: z.object({ values: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1) }),
  }),
  z.object({
    ...common,
    kind: z.literal('accuracy'),
    check: z.literal('pattern'),
    column,
    params: z.object({ pattern: z.string().min(1).refine(isValidPattern, 'Invalid regular expression') }),
  }),
  z.object({
    ...common,
    kind: z.literal('consistency'),
    check: z.literal('type'),
    column,
    params: z.object({ dtype: z.enum(COLUMN_TYPES), scale: z.number().int().min(0).optional() }),
  }),
  z.object({
    ...common,
    kind: z.literal('consistency'),
    check: z.literal('unique'),
    columns: columnList,
  }),
  z.object({
    ...common,
    kind: z.literal('consistency'),
    check: z.literal('date_format'),
    column,
    params: z.object({ format: z.string().min(1) }),
  }),
  z.object({
    ...common,
    kind: z.literal('consistency'),
    check: z.literal('cross_field'),
    columns: z.tuple([column, column]),
    params: z.object({ operator: z.enum(OPERATORS) }),
  }),
  z.object({
    ...common,
    kind: z.literal('schema'),
    check: z.literal('required_columns'),
    columns: columnList,
  }),
  z.object({
    ...common,
    kind: z.literal('schema'),
    check: z.literal('not_null'),
    column,
  }),
]);

type RuleDescriptor = z.infer<typeof descriptorSchema>;

function toRule(d: RuleDescriptor): Rule {
  const base = { id: d.id, severity: d.severity, threshold: d.threshold };
  switch (d.check) {
    case 'not_null_rate':
      return { ...base, kind: d.kind, check: d.check, column: d.column, nullThresholdPct: d.params.nullThresholdPct };
    case 'min_rows':
      return { ...base, kind: d.kind, check: d.check, minRows: d.params.minRows };
    case 'expected_count':
      return {
        ...base,
        kind: d.kind,
        check: d.check,
        expected: d.params.expected,
        tolerancePct: d.params.tolerancePct,
      };
    case 'range':
      return { ...base, kind: d.kind, check: d.check, column: d.column, min: d.params.min, max: d.params.max };
    case 'allowed_values':
      return { ...base, kind: d.kind, check: d.check, column: d.column, values: d.params.values };
    case 'pattern':
      return { ...base, kind: d.kind, check: d.check, column: d.column, pattern: d.params.pattern };
    case 'type':
      return { ...base, kind: d.kind, check: d.check, column: d.column, dtype: d.params.dtype, scale: d.params.scale };
    case 'unique':
      return { ...base, kind: d.kind, check: d.check, columns: d.columns };
    case 'date_format':
      return { ...base, kind: d.kind, check: d.check, column: d.column, format: d.params.format };
    case 'cross_field':
      return { ...base, kind: d.kind, check: d.check, columns: d.columns, operator: d.params.operator };
    case 'required_columns':
      return { ...base, kind: d.kind, check: d.check, columns: d.columns };
    case 'not_null':
      return { ...base, kind: d.kind, check: d.check, column: d.column };
  }
}

const ruleSetSchema = z.object({
  keyColumns: z.array(column).optional(),
  sampleSize: z.number().int().min(0).optional(),
  rules: z.array(descriptorSchema),
});

const configSchema = z.record(z.string().min(1), ruleSetSchema);

/** Rule sets keyed by dataset name. */
export type RuleSetConfig = Readonly<Record<string, RuleSet>>;

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Parse a mapping of dataset name to rule set.
 *
 * @throws ConfigError listing every issue by path.
 */
export function parseRuleSetConfig(input: unknown): RuleSetConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid rule set configuration', parsed.error.issues.map(formatIssue));
  }

  const config: Record<string, RuleSet> = {};
  for (const [dataset, entry] of Object.entries(parsed.data)) {
    config[dataset] = {
      dataset,
      keyColumns: entry.keyColumns,
      sampleSize: entry.sampleSize,
      rules: entry.rules.map(toRule),
    };
  }
  return config;
}

/** Read and parse a JSON rule set file. */
export async function loadRuleSetConfigFile(path: string): Promise<RuleSetConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read rule set file ${path}`, [error instanceof Error ? error.message : String(error)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Rule set file ${path} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseRuleSetConfig(json);
}

/** Rule set for a dataset, or `ConfigError` when the configuration has none. */
export function ruleSetFor(config: RuleSetConfig, dataset: string): RuleSet {
  const ruleSet = config[dataset];
  if (!ruleSet) {
    throw new ConfigError(`No rule set configured for dataset "${dataset}"`, [
      `known datasets: ${Object.keys(config).join(', ') || '(none)'}`,
    ]);
  }
  return ruleSet;
}
