import { z } from 'zod';
import { integerVar, loadEnvConfig, stringVar, type EnvSource } from '@tideline/shared/envConfig';
import { parseDayPrefix } from './measurement';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type MarineResearchConfig = {
  documentStoreUrl: string;
  database: string;
  days: number;
  samplesPerDay: number;
  uploadIntervalMs: number;
  retryAttempts: number;
  startDate: Date;
  fetchTimeoutMs: number | null;
  operationTimeoutMs: number;
  operationPollIntervalMs: number;
  logLevel: LogLevel;
};

const DAY_KEY_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const startDateVar = stringVar({ defaultValue: '2019-01-01' }).transform((value, ctx) => {
  const date = value !== undefined && DAY_KEY_ONLY.test(value) ? parseDayPrefix(value) : null;
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be a calendar day (YYYY-MM-DD), got "${value ?? ''}"` });
    return z.NEVER;
  }
  return date;
});

const logLevelVar = stringVar({ defaultValue: 'info', lowercase: true }).pipe(
  z.enum(LOG_LEVELS, { errorMap: () => ({ message: `must be one of ${LOG_LEVELS.join(', ')}` }) })
);

const marineResearchEnvSchema = z
  .object({
    TIDELINE_DOCUMENT_STORE_URL: stringVar({ defaultValue: 'http://127.0.0.1:8080' }),
    TIDELINE_DATABASE: stringVar({ defaultValue: 'MarineResearch' }),
    TIDELINE_DAYS: integerVar({ defaultValue: 120, min: 1 }),
    TIDELINE_SAMPLES_PER_DAY: integerVar({ defaultValue: 4, min: 1 }),
    TIDELINE_UPLOAD_INTERVAL_MS: integerVar({ defaultValue: 60_000, min: 0 }),
    TIDELINE_RETRY_ATTEMPTS: integerVar({ defaultValue: 5, min: 1 }),
    TIDELINE_START_DATE: startDateVar,
    TIDELINE_FETCH_TIMEOUT_MS: integerVar({ min: 0 }),
    TIDELINE_OPERATION_TIMEOUT_MS: integerVar({ defaultValue: 300_000, min: 1 }),
    TIDELINE_OPERATION_POLL_INTERVAL_MS: integerVar({ defaultValue: 1_000, min: 0 }),
    LOG_LEVEL: logLevelVar
  })
  .passthrough();

export function loadMarineResearchConfig(env?: EnvSource): MarineResearchConfig {
  const parsed = loadEnvConfig(marineResearchEnvSchema, { env, context: 'marine-research' });
  return {
    documentStoreUrl: parsed.TIDELINE_DOCUMENT_STORE_URL ?? 'http://127.0.0.1:8080',
    database: parsed.TIDELINE_DATABASE ?? 'MarineResearch',
    days: parsed.TIDELINE_DAYS ?? 120,
    samplesPerDay: parsed.TIDELINE_SAMPLES_PER_DAY ?? 4,
    uploadIntervalMs: parsed.TIDELINE_UPLOAD_INTERVAL_MS ?? 60_000,
    retryAttempts: parsed.TIDELINE_RETRY_ATTEMPTS ?? 5,
    startDate: parsed.TIDELINE_START_DATE,
    fetchTimeoutMs: parsed.TIDELINE_FETCH_TIMEOUT_MS ?? null,
    operationTimeoutMs: parsed.TIDELINE_OPERATION_TIMEOUT_MS ?? 300_000,
    operationPollIntervalMs: parsed.TIDELINE_OPERATION_POLL_INTERVAL_MS ?? 1_000,
    logLevel: parsed.LOG_LEVEL
  };
}
