export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseMs: 1_000,
  factor: 2,
  maxMs: 30_000,
  jitterRatio: 0
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/**
 * Delay to wait after the given failed attempt (1-based) before trying again.
 * Jitter is off unless `jitterRatio` is set.
 */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const failedAttempt = Math.max(1, Math.floor(attempt));
  const baseMs = options.baseMs ?? DEFAULT_BACKOFF.baseMs;
  const factor = options.factor ?? DEFAULT_BACKOFF.factor;
  const maxMs = Math.max(baseMs, options.maxMs ?? DEFAULT_BACKOFF.maxMs);
  const jitterRatio = options.jitterRatio ?? DEFAULT_BACKOFF.jitterRatio;

  const delay = clamp(baseMs * Math.pow(factor, failedAttempt - 1), baseMs, maxMs);
  if (jitterRatio <= 0) {
    return Math.round(delay);
  }

  const random = options.random ?? Math.random;
  const jitter = (random() * 2 - 1) * delay * jitterRatio;
  return Math.round(clamp(delay + jitter, baseMs, maxMs));
}
