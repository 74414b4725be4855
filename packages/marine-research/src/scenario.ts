import { randomUUID } from 'node:crypto';
import type { DocumentStoreClient, WaitForOperationOptions } from '@tideline/document-store-client';
import { retry, type BackoffOptions, type RetryablePredicate } from '@tideline/shared/retries';
import { sleep as defaultSleep, type Sleeper } from '@tideline/shared/time';
import { groupByDay } from './aggregation';
import { parseDailyReportCsv, writeMeasurementsCsv } from './csv';
import {
  buildDailyReportIndex,
  buildDailyReportQuery,
  buildScenarioNames,
  type ScenarioNames
} from './dailyReportIndex';
import { addDays, toDayKey, type Measurement } from './measurement';
import { reconcile, type Findings } from './reconciliation';
import type { ScenarioReporter } from './reporter';
import { generateDailySamples, type RandomSource } from './samples';

export const SUCCESS_MESSAGE = 'Results were received as expected';
export const FAILURE_MESSAGE = 'Results were _not_ received as expected';

export type DocumentStoreApi = Pick<
  DocumentStoreClient,
  'putIndexes' | 'getNextOperationId' | 'importCsv' | 'waitForOperationCompletion' | 'streamQueryCsv'
>;

export type MarineResearchSettings = {
  days: number;
  samplesPerDay: number;
  startDate: Date;
  uploadIntervalMs: number;
  retryAttempts: number;
  operationTimeoutMs?: number;
  operationPollIntervalMs?: number;
  /** Allowed difference when comparing averages. Exact by default. */
  tolerance?: number;
};

export type MarineResearchDependencies = {
  store: DocumentStoreApi;
  reporter: ScenarioReporter;
  sleep?: Sleeper;
  random?: RandomSource;
  runId?: string;
  isRetryable?: RetryablePredicate;
  retryBackoff?: BackoffOptions;
};

export type MarineResearchOutcome = {
  status: 'passed' | 'failed';
  names: ScenarioNames;
  expected: Measurement[];
  actual: Measurement[];
  findings: Findings;
};

/**
 * Uploads a day of synthetic readings at a time, lets the map/reduce index
 * roll them up into daily reports, then exports the reports as CSV and
 * compares them with averages computed locally.
 */
export async function runMarineResearchScenario(
  settings: MarineResearchSettings,
  deps: MarineResearchDependencies
): Promise<MarineResearchOutcome> {
  const { store, reporter } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const runId = deps.runId ?? randomUUID().replace(/-/g, '');
  const names = buildScenarioNames(runId);
  const retryWith = { reporter, isRetryable: deps.isRetryable, backoff: deps.retryBackoff, sleep };
  const operationOptions: WaitForOperationOptions = {
    timeoutMs: settings.operationTimeoutMs,
    pollIntervalMs: settings.operationPollIntervalMs,
    sleep
  };

  reporter.info('Starting marine research scenario', { ...names, days: settings.days });

  await retry(() => store.putIndexes([buildDailyReportIndex(names)]), {
    ...retryWith,
    attempts: settings.retryAttempts,
    description: 'add index'
  });

  const samples: Measurement[] = [];
  let day = settings.startDate;
  for (let i = 0; i < settings.days; i += 1) {
    day = addDays(day, 1);
    const daily = generateDailySamples(day, settings.samplesPerDay, deps.random);
    samples.push(...daily);
    const csv = writeMeasurementsCsv(daily);

    const operationId = await store.getNextOperationId();
    await retry(
      async () => {
        await store.importCsv({ collection: names.collection, operationId, csv });
        await store.waitForOperationCompletion(operationId, operationOptions);
      },
      { ...retryWith, attempts: settings.retryAttempts, description: 'import csv' }
    );
    reporter.info('Uploaded daily measurements', { day: toDayKey(day), samples: daily.length, operationId });

    await sleep(settings.uploadIntervalMs);
  }

  const exported = await retry(() => store.streamQueryCsv(buildDailyReportQuery(names)), {
    ...retryWith,
    attempts: settings.retryAttempts,
    description: 'export daily result to csv'
  });

  const actual = parseDailyReportCsv(exported);
  const expected = groupByDay(samples);
  const result = reconcile(actual, expected, { tolerance: settings.tolerance });

  if (result.passed) {
    reporter.success(SUCCESS_MESSAGE);
  } else {
    reporter.failure(FAILURE_MESSAGE, undefined, result.findings);
  }

  return {
    status: result.passed ? 'passed' : 'failed',
    names,
    expected,
    actual,
    findings: result.findings
  };
}
