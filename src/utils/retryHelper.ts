import { logger } from './logger';

export interface RetryOptions {
  /** Only errors accepted by this predicate are retried */
  shouldRetry?: (error: unknown) => boolean;
  /** 'linear' waits baseDelay * retry, 'exponential' baseDelay * 2^(retry-1) */
  backoff?: 'linear' | 'exponential';
  signal?: AbortSignal;
  onRetry?: (error: unknown, retry: number, delay: number) => void;
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry helper for network operations with backoff.
 * Makes at most maxRetries + 1 calls; the last error is rethrown.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 1000,
  operationName: string = 'operation',
  options: RetryOptions = {},
): Promise<T> {
  const { shouldRetry = () => true, backoff = 'exponential', signal } = options;
  let lastError: unknown;

  for (let i = 0; i <= maxRetries; i++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (i === maxRetries || !shouldRetry(error) || signal?.aborted) {
        break;
      }
      const retryCount = i + 1;
      const delay =
        backoff === 'linear'
          ? baseDelay * retryCount
          : baseDelay * Math.pow(2, i);
      logger.warn(
        `${operationName} failed, retrying in ${delay}ms (retry ${retryCount}/${maxRetries})`,
        {
          error: error instanceof Error ? error.message : String(error),
        },
      );
      options.onRetry?.(error, retryCount, delay);
      await wait(delay, signal);
    }
  }

  logger.debug(`${operationName} gave up`, {
    error: lastError instanceof Error ? lastError.message : String(lastError),
  });
  throw lastError;
}
