import { z } from 'zod';
import { ConfigError } from '../../domain/errors/EtlErrors.js';

export type EnvSource = Record<string, string | undefined>;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function integerVar(defaultValue: number, min: number) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return defaultValue;
      const parsed = Number(value.trim());
      if (!Number.isInteger(parsed) || parsed < min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected an integer >= ${min}, received "${value}"`,
        });
        return z.NEVER;
      }
      return parsed;
    });
}

function booleanVar(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return defaultValue;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}, received "${value}"`,
      });
      return z.NEVER;
    });
}

const envSchema = z.object({
  ETL_BATCH_SIZE: integerVar(10_000, 1),
  ETL_MAX_WORKERS: integerVar(4, 1),
  ETL_RETRY_COUNT: integerVar(3, 0),
  ETL_RETRY_DELAY_MS: integerVar(1_000, 0),
  VALIDATION_STRICT_MODE: booleanVar(true),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? 'info' : value.trim().toLowerCase()))
    .pipe(z.enum(LOG_LEVELS)),
  ETL_POOL_SIZE: integerVar(10, 1),
  ETL_POOL_MAX_OVERFLOW: integerVar(20, 0),
  ETL_POOL_ACQUIRE_TIMEOUT_MS: integerVar(30_000, 1),
  ETL_LOCK_TTL_MS: integerVar(300_000, 1),
  ETL_LOCK_MAX_ATTEMPTS: integerVar(10, 1),
  ETL_LOCK_RETRY_BASE_MS: integerVar(100, 0),
  ETL_LOCK_RETRY_MAX_MS: integerVar(5_000, 0),
  DATABASE_URL: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim())),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface EtlConfig {
  readonly batchSize: number;
  readonly maxWorkers: number;
  /** Retries of a chunk write after a transient failure. */
  readonly retryCount: number;
  readonly retryDelayMs: number;
  readonly strictMode: boolean;
  readonly logLevel: LogLevel;
  readonly pool: {
    readonly size: number;
    readonly maxOverflow: number;
    readonly acquireTimeoutMs: number;
  };
  readonly lock: {
    readonly ttlMs: number;
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
  };
  readonly databaseUrl?: string;
}

/**
 * Read engine settings from environment variables.
 *
 * Throws `ConfigError` listing every invalid variable.
 */
export function loadEtlConfig(env: EnvSource = process.env): EtlConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${location}: ${issue.message}`;
    });
    throw new ConfigError('Invalid environment configuration', issues);
  }

  const vars = result.data;
  return {
    batchSize: vars.ETL_BATCH_SIZE,
    maxWorkers: vars.ETL_MAX_WORKERS,
    retryCount: vars.ETL_RETRY_COUNT,
    retryDelayMs: vars.ETL_RETRY_DELAY_MS,
    strictMode: vars.VALIDATION_STRICT_MODE,
    logLevel: vars.LOG_LEVEL,
    pool: {
      size: vars.ETL_POOL_SIZE,
      maxOverflow: vars.ETL_POOL_MAX_OVERFLOW,
      acquireTimeoutMs: vars.ETL_POOL_ACQUIRE_TIMEOUT_MS,
    },
    lock: {
      ttlMs: vars.ETL_LOCK_TTL_MS,
      maxAttempts: vars.ETL_LOCK_MAX_ATTEMPTS,
      baseDelayMs: vars.ETL_LOCK_RETRY_BASE_MS,
      maxDelayMs: vars.ETL_LOCK_RETRY_MAX_MS,
    },
    ...(vars.DATABASE_URL !== undefined ? { databaseUrl: vars.DATABASE_URL } : {}),
  };
}
