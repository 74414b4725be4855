import { formatMeasurement, measurementsEqual, type Measurement } from './measurement';

export const MISSING_EXPECTED_CHECK = 'Missing expected results';
export const UNEXPECTED_ACTUAL_CHECK = 'Unexpected actual results';

export const EMPTY_UNEXPECTED_FINDING = '[]';

export type Findings = Record<string, string>;

export interface ReconciliationResult {
  passed: boolean;
  findings: Findings;
}

export type ReconcileOptions = {
  /** Allowed absolute difference on temperature and salinity. Defaults to exact equality. */
  tolerance?: number;
};

function contains(haystack: readonly Measurement[], needle: Measurement, tolerance: number): boolean {
  return haystack.some((candidate) => measurementsEqual(candidate, needle, tolerance));
}

/** Indexes of expected buckets with no equal actual bucket, each followed by a comma. */
export function findMissingExpected(
  actual: readonly Measurement[],
  expected: readonly Measurement[],
  options: ReconcileOptions = {}
): string {
  const tolerance = options.tolerance ?? 0;
  let finding = '';
  expected.forEach((measurement, index) => {
    if (!contains(actual, measurement, tolerance)) {
      finding += `${index},`;
    }
  });
  return finding;
}

/** Actual buckets with no equal expected bucket, as a bracketed list; `[]` when none. */
export function findUnexpectedActual(
  actual: readonly Measurement[],
  expected: readonly Measurement[],
  options: ReconcileOptions = {}
): string {
  const tolerance = options.tolerance ?? 0;
  const descriptors: string[] = [];
  actual.forEach((measurement, index) => {
    if (!contains(expected, measurement, tolerance)) {
      descriptors.push(`{index:${index}, measurement:${formatMeasurement(measurement)}}`);
    }
  });
  return `[${descriptors.join(',')}]`;
}

export function reconcile(
  actual: readonly Measurement[],
  expected: readonly Measurement[],
  options: ReconcileOptions = {}
): ReconciliationResult {
  const findings: Findings = {};

  const missing = findMissingExpected(actual, expected, options);
  if (missing.length > 0) {
    findings[MISSING_EXPECTED_CHECK] = missing;
  }

  const unexpected = findUnexpectedActual(actual, expected, options);
  if (unexpected !== EMPTY_UNEXPECTED_FINDING) {
    findings[UNEXPECTED_ACTUAL_CHECK] = unexpected;
  }

  return { passed: Object.keys(findings).length === 0, findings };
}
