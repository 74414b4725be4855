/**
 * A single sensor reading. Instances are frozen; two measurements are the
 * same reading when time, temperature and salinity all match.
 */
export interface Measurement {
  readonly time: Date;
  readonly temperature: number;
  readonly salinity: number;
}

const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

export function createMeasurement(time: Date, temperature: number, salinity: number): Measurement {
  return Object.freeze({ time: new Date(time.getTime()), temperature, salinity });
}

/** UTC calendar day of the timestamp, as `YYYY-MM-DD`. */
export function toDayKey(time: Date): string {
  return time.toISOString().slice(0, 10);
}

export function dayKeyToDate(dayKey: string): Date {
  const date = parseDayPrefix(dayKey);
  if (!date) {
    throw new RangeError(`Invalid day key "${dayKey}"`);
  }
  return date;
}

/**
 * Reads the leading `YYYY-MM-DD` of a date string and returns UTC midnight of
 * that day, or null when the prefix is missing or names a day that does not exist.
 */
export function parseDayPrefix(value: string): Date | null {
  const match = DAY_KEY_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (toDayKey(date) !== `${year}-${month}-${day}`) {
    return null;
  }
  return date;
}

export function addDays(time: Date, days: number): Date {
  return new Date(time.getTime() + days * 24 * 60 * 60 * 1000);
}

export function measurementsEqual(left: Measurement, right: Measurement, tolerance = 0): boolean {
  if (left.time.getTime() !== right.time.getTime()) {
    return false;
  }
  if (tolerance <= 0) {
    return left.temperature === right.temperature && left.salinity === right.salinity;
  }
  return (
    Math.abs(left.temperature - right.temperature) <= tolerance &&
    Math.abs(left.salinity - right.salinity) <= tolerance
  );
}

export function formatMeasurement(measurement: Measurement): string {
  return `{time:${toDayKey(measurement.time)}, temperature:${measurement.temperature}, salinity:${measurement.salinity}}`;
}
