export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  factor?: number;
  /** Return false to rethrow immediately; errors are retried by default */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
}

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `fn` until it resolves, waiting `delayMs * factor^n` between attempts.
 *
 * The last error is rethrown once `retries` extra attempts are spent.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    retries = 3,
    delayMs = 500,
    factor = 2,
    shouldRetry = () => true,
    onRetry
  } = options;

  let attempt = 0;
  let lastError: unknown;
  let delay = delayMs;

  while (attempt <= retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === retries || !shouldRetry(error)) {
        break;
      }
      onRetry?.(attempt + 1, error);
      await sleep(delay);
      delay *= factor;
      attempt += 1;
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
