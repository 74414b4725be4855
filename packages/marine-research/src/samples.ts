import { createMeasurement, type Measurement } from './measurement';

export type RandomSource = () => number;

/** Integer in `[min, max)`. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min));
}

/**
 * Synthetic readings for one day: temperature 10.0-29.9 and salinity 3.5-3.8,
 * both in tenths.
 */
export function generateDailySamples(day: Date, count: number, random: RandomSource = Math.random): Measurement[] {
  return Array.from({ length: count }, () =>
    createMeasurement(day, randomInt(random, 100, 300) / 10, randomInt(random, 35, 39) / 10)
  );
}
