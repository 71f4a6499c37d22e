import { TimeoutError } from '../errors';

export interface RetryOptions {
  maxRetries: number;
  retryDelay: number;
  backoffMultiplier: number;
  maxRetryDelay: number;
  shouldRetry: (error: Error) => boolean;
}

const RETRYABLE_CODES = ['ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'ENETUNREACH', 'ECONNRESET'];

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  retryDelay: 1000,
  backoffMultiplier: 2,
  maxRetryDelay: 30000,
  shouldRetry: isNetworkError,
};

/**
 * Whether the error, or any error in its `cause` chain, is a transient
 * network failure
 */
export function isNetworkError(error: Error): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    const { message } = current;
    if ('code' in current && typeof current.code === 'string' && RETRYABLE_CODES.includes(current.code)) {
      return true;
    }
    if (RETRYABLE_CODES.some((code) => message.includes(code))) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let delay = opts.retryDelay;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= opts.maxRetries || !opts.shouldRetry(lastError)) {
        throw lastError;
      }

      await sleep(delay);

      if (opts.backoffMultiplier > 1) {
        delay = Math.min(delay * opts.backoffMultiplier, opts.maxRetryDelay);
      }
    }
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message?: string,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(message ?? `Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
