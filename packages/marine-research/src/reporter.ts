import type { Logger } from '@tideline/shared/logger';
import type { RetryEvent, RetryReporter } from '@tideline/shared/retries';
import type { Findings } from './reconciliation';

/**
 * Sink for scenario progress. Retry attempts flow through `info` and
 * `event`; the run ends with exactly one `success` or `failure`.
 */
export interface ScenarioReporter extends RetryReporter {
  info(message: string, data?: Record<string, unknown>): void;
  success(message: string): void;
  failure(message: string, error?: unknown, findings?: Findings): void;
}

export type ReporterEntry =
  | { kind: 'info'; message: string; data?: Record<string, unknown> }
  | { kind: 'event'; event: RetryEvent }
  | { kind: 'success'; message: string }
  | { kind: 'failure'; message: string; error?: unknown; findings?: Findings };

export type MemoryReporter = ScenarioReporter & {
  readonly entries: readonly ReporterEntry[];
};

export function createLoggingReporter(logger: Logger): ScenarioReporter {
  return {
    info(message, data) {
      if (data) {
        logger.info(data, message);
      } else {
        logger.info(message);
      }
    },
    event(event) {
      const fields = { err: event.error, attempt: event.attempt, attempts: event.attempts };
      if (event.type === 'fatal') {
        logger.fatal(fields, event.message);
      } else {
        logger.error(fields, event.message);
      }
    },
    success(message) {
      logger.info({ outcome: 'passed' }, message);
    },
    failure(message, error, findings) {
      logger.error({ outcome: 'failed', err: error, findings }, message);
    }
  };
}

export function createMemoryReporter(): MemoryReporter {
  const entries: ReporterEntry[] = [];
  return {
    entries,
    info(message, data) {
      entries.push(data ? { kind: 'info', message, data } : { kind: 'info', message });
    },
    event(event) {
      entries.push({ kind: 'event', event });
    },
    success(message) {
      entries.push({ kind: 'success', message });
    },
    failure(message, error, findings) {
      entries.push({ kind: 'failure', message, error, findings });
    }
  };
}
