import assert from 'node:assert/strict';
import { test } from 'node:test';

import { DailyReportParseError, formatStoreDate, parseDailyReportCsv, writeMeasurementsCsv } from '../src/csv';
import { createMeasurement, dayKeyToDate } from '../src/measurement';

test('formatStoreDate writes seven fractional digits in UTC', () => {
  assert.equal(formatStoreDate(new Date('2019-01-02T00:00:00.000Z')), '2019-01-02T00:00:00.0000000Z');
  assert.equal(formatStoreDate(new Date('2019-01-02T13:04:05.678Z')), '2019-01-02T13:04:05.6780000Z');
});

test('ingestion csv has a Time,Temperature,Salinity header and one row per sample', () => {
  const day = dayKeyToDate('2019-01-02');
  const csv = writeMeasurementsCsv([createMeasurement(day, 15, 3.6), createMeasurement(day, 21.3, 3.8)]);

  assert.equal(
    csv,
    'Time,Temperature,Salinity\n' +
      '2019-01-02T00:00:00.0000000Z,15,3.6\n' +
      '2019-01-02T00:00:00.0000000Z,21.3,3.8\n'
  );
});

test('daily report export is read from the Day, Temperature and Salinity columns', () => {
  const csv =
    '@id,Day,Temperature,Salinity\r\n' +
    'DailyReportabc/1,2019-01-02T00:00:00.0000000Z,18.15,3.65\r\n' +
    'DailyReportabc/2,2019-01-03T00:00:00.0000000,20,3.7\r\n';

  const measurements = parseDailyReportCsv(csv);

  assert.deepEqual(
    measurements.map((m) => [m.time.toISOString(), m.temperature, m.salinity]),
    [
      ['2019-01-02T00:00:00.000Z', 18.15, 3.65],
      ['2019-01-03T00:00:00.000Z', 20, 3.7]
    ]
  );
});

test('a header-only export yields no measurements', () => {
  assert.deepEqual(parseDailyReportCsv('@id,Day,Temperature,Salinity\n'), []);
  assert.deepEqual(parseDailyReportCsv(''), []);
});

test('rows with missing or malformed fields are rejected with their row number', () => {
  const missingSalinity =
    '@id,Day,Temperature,Salinity\n' +
    'r/1,2019-01-02T00:00:00.0000000Z,15,3.6\n' +
    'r/2,2019-01-03T00:00:00.0000000Z,16\n';
  assert.throws(
    () => parseDailyReportCsv(missingSalinity),
    (error: unknown) => {
      assert.ok(error instanceof DailyReportParseError);
      assert.equal(error.row, 2);
      assert.equal(error.message, 'Row 2: Salinity "" is not a number');
      return true;
    }
  );

  assert.throws(
    () => parseDailyReportCsv('@id,Day,Temperature,Salinity\nr/1,not a day,15,3.6\n'),
    (error: unknown) => error instanceof DailyReportParseError && error.message === 'Row 1: Day "not a day" is not a date'
  );
});
