import { errorMessage, logWarn } from './logger';
import type { Result } from './result';
import { wait } from './wait';

export interface RetryOptions<E> {
  maxRetries?: number; // undefined = infinite retries
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  isRetryable?: (error: E) => boolean;
  onRetry?: (error: E, attempt: number, delayMs: number) => void;
  /** Renders an error for the default retry log line. */
  describe?: (error: E) => string;
}

const DEFAULT_OPTIONS = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Retries a Result-returning call with exponential backoff.
 *
 * Resolves with the first successful result, or with the last failed one once the error is not
 * retryable or `maxRetries` attempts have been made. Exceptions thrown by `fn` are not caught.
 */
export const retryWithBackoff = async <T, E>(
  fn: () => Promise<Result<T, E>>,
  options: RetryOptions<E> = {}
): Promise<Result<T, E>> => {
  const {
    maxRetries,
    initialDelayMs = DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs = DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier = DEFAULT_OPTIONS.backoffMultiplier,
    isRetryable = () => true,
    onRetry,
    describe = errorMessage,
  } = options;

  let attempt = 0;
  let delayMs = initialDelayMs;

  for (;;) {
    const result = await fn();
    if (result.ok) return result;

    attempt++;
    if (!isRetryable(result.error)) return result;
    if (maxRetries !== undefined && attempt >= maxRetries) return result;

    const currentDelay = Math.min(delayMs, maxDelayMs);

    if (onRetry) {
      onRetry(result.error, attempt, currentDelay);
    } else {
      // NOTE: pino doesn't reliably print extra args unless you use format specifiers.
      logWarn(`[Retry] Attempt ${attempt} failed, retrying in ${currentDelay / 1000}s: ${describe(result.error)}`);
    }

    await wait(currentDelay);

    delayMs = Math.min(delayMs * backoffMultiplier, maxDelayMs);
  }
};
