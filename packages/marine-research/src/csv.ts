import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { createMeasurement, parseDayPrefix, type Measurement } from './measurement';

export const INGESTION_COLUMNS = ['Time', 'Temperature', 'Salinity'] as const;

const csvRecordsSchema = z.array(z.array(z.string()));

export class DailyReportParseError extends Error {
  readonly row: number;

  constructor(message: string, row: number) {
    super(message);
    this.name = 'DailyReportParseError';
    this.row = row;
  }
}

/** `YYYY-MM-DDTHH:mm:ss.fffffffZ`, the date layout the document store writes. */
export function formatStoreDate(time: Date): string {
  const iso = time.toISOString();
  return `${iso.slice(0, 19)}.${iso.slice(20, 23)}0000Z`;
}

export function writeMeasurementsCsv(measurements: readonly Measurement[]): string {
  return stringify(
    measurements.map((measurement) => ({
      Time: formatStoreDate(measurement.time),
      Temperature: measurement.temperature,
      Salinity: measurement.salinity
    })),
    { header: true, columns: [...INGESTION_COLUMNS] }
  );
}

function parseNumberField(value: string | undefined, column: string, row: number): number {
  const trimmed = value?.trim() ?? '';
  const parsed = trimmed.length > 0 ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new DailyReportParseError(`Row ${row}: ${column} "${value ?? ''}" is not a number`, row);
  }
  return parsed;
}

/**
 * Reads the daily report export. The first row is a header; the columns are
 * `(document id), Day, Temperature, Salinity`.
 */
export function parseDailyReportCsv(csv: string): Measurement[] {
  const records = csvRecordsSchema.parse(
    parse(csv, {
      from_line: 2,
      skip_empty_lines: true,
      relax_column_count: true
    })
  );

  return records.map((record, index) => {
    const row = index + 1;
    const day: string | undefined = record[1];
    const temperature: string | undefined = record[2];
    const salinity: string | undefined = record[3];
    const time = day === undefined ? null : parseDayPrefix(day);
    if (!time) {
      throw new DailyReportParseError(`Row ${row}: Day "${day ?? ''}" is not a date`, row);
    }
    return createMeasurement(
      time,
      parseNumberField(temperature, 'Temperature', row),
      parseNumberField(salinity, 'Salinity', row)
    );
  });
}
