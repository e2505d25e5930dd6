export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an operation with exponential backoff (delay, 2x delay, 4x delay, ...)
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, delayMs = 1000, shouldRetry = () => true, signal } = options;
  const attempts = Math.max(1, maxRetries);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt === attempts || signal?.aborted || !shouldRetry(error)) {
        break;
      }
      await sleep(delayMs * Math.pow(2, attempt - 1));
    }
  }

  throw lastError;
}
