import { logger } from './logger.js';
import { sleep } from './helpers.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
  /** Return false to give up immediately, e.g. on a 4xx that will never succeed. */
  retryIf: (err: Error) => boolean;
  /** Server-mandated wait (Retry-After); overrides the backoff when it returns a number. */
  delayHint: (err: Error) => number | undefined;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitter: true,
  retryIf: () => true,
  delayHint: () => undefined,
};

/** Exponential backoff capped at maxDelayMs; jitter keeps 50-100% of it. */
export function backoffDelay(
  attempt: number,
  opts: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random,
): number {
  const delay = Math.min(opts.baseDelayMs * 2 ** attempt, opts.maxDelayMs);
  return opts.jitter ? delay * (0.5 + random() * 0.5) : delay;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  opts: Partial<RetryOptions> = {},
): Promise<T> {
  const options = { ...DEFAULT_OPTIONS, ...opts };
  let lastError = new Error(`${label} was not attempted`);

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt === options.maxRetries || !options.retryIf(lastError)) break;

      const hinted = options.delayHint(lastError);
      const delay = hinted !== undefined
        ? Math.min(hinted, options.maxDelayMs)
        : backoffDelay(attempt, options);

      logger.warn(`[retry] ${label} attempt ${attempt + 1}/${options.maxRetries + 1} failed, retrying in ${Math.round(delay)}ms`, {
        error: lastError.message,
      });
      await sleep(delay);
    }
  }

  throw lastError;
}
