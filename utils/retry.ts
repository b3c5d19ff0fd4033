export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  /** Decides whether a failure is worth another attempt. Defaults to always. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = 'RetryExhaustedError';
  }
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` until it resolves, doubling the delay after each failure.
 * Resolves with the value and the attempt count it took.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<{ value: T; attempts: number }> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (error) {
      lastError = error;
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt === options.maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delay = options.initialDelayMs * Math.pow(2, attempt - 1);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }

  throw new RetryExhaustedError(options.maxAttempts, lastError);
}
