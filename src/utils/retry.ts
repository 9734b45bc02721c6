import { logger as defaultLogger, type Logger } from "../config/logger";

export interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  // Returning false rethrows immediately
  shouldRetry?: (err: unknown) => boolean;
  // Server-provided wait, e.g. from Retry-After
  delayHintMs?: (err: unknown) => number | undefined;
  context?: Record<string, unknown>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Retry with exponential backoff
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, initialDelayMs, shouldRetry = () => true, delayHintMs, context, logger = defaultLogger } = options;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !shouldRetry(err)) throw err;

      const delayMs = delayHintMs?.(err) ?? initialDelayMs * Math.pow(2, attempt);
      logger.debug("retry:backoff", { attempt: attempt + 1, maxRetries, delayMs, ...context });
      await sleep(delayMs);
    }
  }
}
