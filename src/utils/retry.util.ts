// Retry utility with exponential backoff and jitter

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;      // milliseconds
  maxDelay: number;       // milliseconds
  jitterFactor: number;   // 0-1 (e.g., 0.1 = 10% jitter)
}

export interface RetryHooks {
  isRetryable: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelay);

  // Add jitter: randomize ±jitterFactor
  const jitterRange = cappedDelay * options.jitterFactor;
  const jitter = (Math.random() - 0.5) * 2 * jitterRange;

  return Math.max(0, cappedDelay + jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs `operation` until it succeeds, throws a non-retryable error, or
 * `maxRetries` retries have failed (RetryExhaustedError).
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  hooks: RetryHooks
): Promise<T> {
  const attempts = options.maxRetries + 1;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const lastError = toError(error);

      if (!hooks.isRetryable(lastError)) {
        throw lastError;
      }

      if (attempt + 1 >= attempts) {
        throw new RetryExhaustedError(
          `Operation failed after ${attempts} attempts`,
          attempts,
          lastError
        );
      }

      const delay = calculateDelay(attempt, options);
      hooks.onRetry?.(lastError, attempt + 1, delay);
      await sleep(delay);
    }
  }
}

export function isHttpRetryable(statusCode?: number): boolean {
  if (!statusCode) return false;
  return (
    statusCode === 429 ||  // Too Many Requests
    statusCode >= 500      // Server errors
  );
}
