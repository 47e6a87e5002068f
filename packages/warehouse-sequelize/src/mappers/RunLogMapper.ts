import { z } from 'zod';
import type { Model } from 'sequelize';
import type { QualityLogEntry, RunLogEntry } from '@ledgerline/core';
import { parseJson } from '../utils/parseJson.js';

const count = z.coerce.number().int().nonnegative();

const runRowSchema = z.object({
  runId: z.string(),
  dataset: z.string(),
  destination: z.string(),
  status: z.enum(['SUCCESS', 'PARTIAL', 'FAILED']),
  startedAt: z.coerce.date(),
  finishedAt: z.coerce.date(),
  recordsExtracted: count,
  recordsValidated: count,
  recordsTransformed: count,
  recordsLoaded: count,
  recordsRejected: count,
  errorMessage: z.string().nullable(),
});

const qualityRowSchema = z.object({
  runId: z.string(),
  validationType: z.string(),
  validationRule: z.string(),
  passedRecords: count,
  failedRecords: count,
  details: z.preprocess(
    parseJson,
    z.object({
      check: z.string(),
      severity: z.enum(['blocking', 'advisory']),
      columns: z.array(z.string()),
      threshold: z.number(),
      exceeded: z.boolean(),
      sampleKeys: z.array(z.string()),
      message: z.string(),
    }),
  ),
});

export function toRunRow(entry: RunLogEntry): Record<string, unknown> {
  return { ...entry };
}

export function toQualityRow(entry: QualityLogEntry): Record<string, unknown> {
  return { ...entry, details: { ...entry.details } };
}

export function toRunEntry(instance: Model): RunLogEntry {
  return runRowSchema.parse(instance.get({ plain: true }));
}

export function toQualityEntry(instance: Model): QualityLogEntry {
  return qualityRowSchema.parse(instance.get({ plain: true }));
}
