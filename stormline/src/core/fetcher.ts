/**
 * HTTP download with exponential-backoff retry.
 */
import { FetchError } from './errors.js';
import { defaultLogger, type Logger } from './logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function fetchTextWithRetry(
  url: string,
  retry: Partial<RetryOptions> = {},
  logger: Logger = defaultLogger
): Promise<string> {
  const options = { ...DEFAULT_RETRY, ...retry };
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      const res = await fetch(url);
      if (!res.ok) {
        throw new FetchError(url, res.status, await res.text());
      }
      return await res.text();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt < options.maxRetries) {
        const delay = Math.min(
          options.baseDelayMs * Math.pow(2, attempt),
          options.maxDelayMs
        );
        logger.warn(
          `Fetch failed (attempt ${attempt + 1}/${options.maxRetries + 1}): ${lastError.message}. Retrying in ${delay}ms...`
        );
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error(`Fetch failed: ${url}`);
}
