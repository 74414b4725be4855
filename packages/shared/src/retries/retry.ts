import { computeExponentialBackoff, type BackoffOptions } from './backoff';
import { sleep as defaultSleep, type Sleeper } from '../time';

export type RetryEventType = 'error' | 'fatal';

export interface RetryEvent {
  type: RetryEventType;
  message: string;
  error: unknown;
  attempt: number;
  attempts: number;
}

export interface RetryReporter {
  info(message: string): void;
  event(event: RetryEvent): void;
}

export type RetryablePredicate = (error: unknown, attempt: number) => boolean;

export type RetryOptions = {
  /** Attempt budget, counting the first try. */
  attempts: number;
  /** Used only in reported messages, e.g. "import csv". */
  description: string;
  reporter: RetryReporter;
  isRetryable?: RetryablePredicate;
  /** Delay between attempts. Omitted means retry immediately. */
  backoff?: BackoffOptions;
  sleep?: Sleeper;
};

const retryAll: RetryablePredicate = () => true;

/**
 * Runs `action` until it resolves or the attempt budget is spent.
 * The last failure is rethrown as-is once no attempts remain, or as soon as
 * `isRetryable` rejects it.
 */
export async function retry<T>(action: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, description, reporter } = options;
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new RangeError(`Retry attempts must be a positive integer (received ${attempts})`);
  }
  const isRetryable = options.isRetryable ?? retryAll;
  const wait = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    reporter.info(`Try to ${description} (${attempt} of ${attempts})`);
    try {
      const result = await action();
      reporter.info(`Succeed to ${description}`);
      return result;
    } catch (error) {
      const message = `Fail to ${description} (${attempt} of ${attempts})`;
      if (attempt >= attempts || !isRetryable(error, attempt)) {
        reporter.event({ type: 'fatal', message, error, attempt, attempts });
        throw error;
      }
      reporter.event({ type: 'error', message, error, attempt, attempts });
      if (options.backoff) {
        await wait(computeExponentialBackoff(attempt, options.backoff));
      }
    }
  }
}
