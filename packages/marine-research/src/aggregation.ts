import { createMeasurement, dayKeyToDate, toDayKey, type Measurement } from './measurement';

type Accumulator = {
  temperature: number;
  salinity: number;
  count: number;
};

/**
 * Collapses samples into one bucket per UTC day, averaging temperature and
 * salinity. Buckets come out in the order their day first appears.
 */
export function groupByDay(measurements: Iterable<Measurement>): Measurement[] {
  const buckets = new Map<string, Accumulator>();

  for (const measurement of measurements) {
    const key = toDayKey(measurement.time);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.temperature += measurement.temperature;
      bucket.salinity += measurement.salinity;
      bucket.count += 1;
    } else {
      buckets.set(key, {
        temperature: measurement.temperature,
        salinity: measurement.salinity,
        count: 1
      });
    }
  }

  return Array.from(buckets, ([key, bucket]) =>
    createMeasurement(dayKeyToDate(key), bucket.temperature / bucket.count, bucket.salinity / bucket.count)
  );
}
