export { computeExponentialBackoff, type BackoffOptions } from './backoff';
export {
  retry,
  type RetryEvent,
  type RetryEventType,
  type RetryOptions,
  type RetryReporter,
  type RetryablePredicate
} from './retry';
