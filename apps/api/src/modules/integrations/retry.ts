import { isTransientError } from "../errors/trading-errors";

export type RetryOptions = {
  attempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Retries only TransientGatewayError, with exponential backoff. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransientError(err)) throw err;
      lastError = err;
      if (attempt + 1 < attempts) {
        await sleep(options.baseDelayMs * 2 ** attempt);
      }
    }
  }
  throw lastError;
}
