import assert from 'node:assert/strict';
import { test } from 'node:test';
import { DocumentStoreClientError } from '@tideline/document-store-client';
import { createRecordingSleeper } from '@tideline/shared/time';

import { buildDailyReportIndex, buildDailyReportQuery } from '../src/dailyReportIndex';
import { formatMeasurement, toDayKey } from '../src/measurement';
import { MISSING_EXPECTED_CHECK, UNEXPECTED_ACTUAL_CHECK } from '../src/reconciliation';
import { createMemoryReporter, type MemoryReporter, type ReporterEntry } from '../src/reporter';
import {
  FAILURE_MESSAGE,
  SUCCESS_MESSAGE,
  runMarineResearchScenario,
  type MarineResearchDependencies,
  type MarineResearchSettings
} from '../src/scenario';
import { FakeDocumentStore } from './support/fakeDocumentStore';

const settings: MarineResearchSettings = {
  days: 3,
  samplesPerDay: 2,
  startDate: new Date('2019-01-01T00:00:00.000Z'),
  uploadIntervalMs: 60_000,
  retryAttempts: 3
};

function sequence(values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length];
}

function infoMessages(reporter: MemoryReporter): string[] {
  return reporter.entries.flatMap((entry) => (entry.kind === 'info' ? [entry.message] : []));
}

function events(reporter: MemoryReporter) {
  return reporter.entries.flatMap((entry) => (entry.kind === 'event' ? [entry.event] : []));
}

function outcomes(reporter: MemoryReporter): ReporterEntry[] {
  return reporter.entries.filter((entry) => entry.kind === 'success' || entry.kind === 'failure');
}

async function run(store: FakeDocumentStore, overrides: Partial<MarineResearchDependencies> = {}) {
  const reporter = createMemoryReporter();
  const sleeper = createRecordingSleeper();
  const outcome = await runMarineResearchScenario(settings, {
    store,
    reporter,
    sleep: sleeper,
    random: sequence([0.1, 0.7, 0.35, 0.9, 0.55]),
    runId: 'abc',
    ...overrides
  });
  return { outcome, reporter, sleeper };
}

test('uploads each day, exports the report and passes when the averages match', async () => {
  const store = new FakeDocumentStore();
  const { outcome, reporter, sleeper } = await run(store);

  assert.equal(outcome.status, 'passed');
  assert.deepEqual(outcome.findings, {});
  assert.deepEqual(outcome.names, {
    collection: 'Cabc',
    outputCollection: 'DailyReportabc',
    indexName: 'Indexabc'
  });
  assert.deepEqual(
    outcome.expected.map((bucket) => toDayKey(bucket.time)),
    ['2019-01-02', '2019-01-03', '2019-01-04']
  );
  assert.equal(outcome.actual.length, 3);

  assert.deepEqual(store.indexes, [buildDailyReportIndex(outcome.names)]);
  assert.deepEqual(
    store.imports.map((entry) => [entry.collection, entry.operationId]),
    [
      ['Cabc', 1],
      ['Cabc', 2],
      ['Cabc', 3]
    ]
  );
  assert.deepEqual(store.queries, [buildDailyReportQuery(outcome.names)]);
  assert.deepEqual(sleeper.calls, [60_000, 60_000, 60_000]);

  const perDay = ['Try to import csv (1 of 3)', 'Succeed to import csv', 'Uploaded daily measurements'];
  assert.deepEqual(infoMessages(reporter), [
    'Starting marine research scenario',
    'Try to add index (1 of 3)',
    'Succeed to add index',
    ...perDay,
    ...perDay,
    ...perDay,
    'Try to export daily result to csv (1 of 3)',
    'Succeed to export daily result to csv'
  ]);
  assert.deepEqual(outcomes(reporter), [{ kind: 'success', message: SUCCESS_MESSAGE }]);
});

test('retries a failed import with the same operation id', async () => {
  const store = new FakeDocumentStore({ failingImports: 1 });
  const { outcome, reporter } = await run(store);

  assert.equal(outcome.status, 'passed');
  assert.deepEqual(
    events(reporter).map((event) => [event.type, event.message, event.attempt]),
    [['error', 'Fail to import csv (1 of 3)', 1]]
  );
  assert.deepEqual(
    store.imports.map((entry) => entry.operationId),
    [1, 2, 3]
  );
});

test('reports a missing day as a missing-expected finding only', async () => {
  const store = new FakeDocumentStore({
    transformReport: (rows) => rows.filter((row) => !row.Time.startsWith('2019-01-03'))
  });
  const { outcome, reporter } = await run(store);

  assert.equal(outcome.status, 'failed');
  assert.deepEqual(outcome.findings, { [MISSING_EXPECTED_CHECK]: '1,' });
  assert.deepEqual(outcomes(reporter), [
    { kind: 'failure', message: FAILURE_MESSAGE, error: undefined, findings: { [MISSING_EXPECTED_CHECK]: '1,' } }
  ]);
});

test('reports a wrong average on both sides of the comparison', async () => {
  const store = new FakeDocumentStore({
    transformReport: (rows) =>
      rows.map((row, index) => (index === 0 ? { ...row, Temperature: row.Temperature + 0.5 } : row))
  });
  const { outcome } = await run(store);

  const shifted = outcome.actual[0];
  assert.ok(shifted);
  assert.equal(outcome.status, 'failed');
  assert.deepEqual(outcome.findings, {
    [MISSING_EXPECTED_CHECK]: '0,',
    [UNEXPECTED_ACTUAL_CHECK]: `[{index:0, measurement:${formatMeasurement(shifted)}}]`
  });
});

test('propagates the export failure once the attempt budget is spent', async () => {
  const store = new FakeDocumentStore({ failingExports: Number.POSITIVE_INFINITY });
  const reporter = createMemoryReporter();

  await assert.rejects(
    runMarineResearchScenario(settings, {
      store,
      reporter,
      sleep: createRecordingSleeper(),
      runId: 'abc'
    }),
    (error: unknown) => error instanceof DocumentStoreClientError && error.statusCode === 503
  );

  assert.equal(store.queries.length, 3);
  assert.deepEqual(
    events(reporter).map((event) => [event.type, event.message]),
    [
      ['error', 'Fail to export daily result to csv (1 of 3)'],
      ['error', 'Fail to export daily result to csv (2 of 3)'],
      ['fatal', 'Fail to export daily result to csv (3 of 3)']
    ]
  );
  assert.deepEqual(outcomes(reporter), []);
});

test('waits the configured backoff between retries', async () => {
  const store = new FakeDocumentStore({ failingImports: 2 });
  const { outcome, sleeper } = await run(store, { retryBackoff: { baseMs: 10, factor: 2 } });

  assert.equal(outcome.status, 'passed');
  assert.deepEqual(sleeper.calls, [10, 20, 60_000, 60_000, 60_000]);
});

test('stops retrying when the failure is classified as not retryable', async () => {
  const store = new FakeDocumentStore({ failingImports: 1 });
  const reporter = createMemoryReporter();

  await assert.rejects(
    runMarineResearchScenario(settings, {
      store,
      reporter,
      sleep: createRecordingSleeper(),
      runId: 'abc',
      isRetryable: (error) => !(error instanceof DocumentStoreClientError && error.statusCode === 503)
    }),
    DocumentStoreClientError
  );

  assert.deepEqual(
    events(reporter).map((event) => [event.type, event.message]),
    [['fatal', 'Fail to import csv (1 of 3)']]
  );
  assert.deepEqual(store.imports, []);
});
