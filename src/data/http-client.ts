import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { errorMessage } from '../utils/helpers.js';
import { UpstreamError } from '../errors.js';

export type QueryValue = string | number | boolean | undefined;

export interface HttpClientOptions {
  timeoutMs: number;
  maxRetries: number;
  limiter: RateLimiter;
}

/** Retry-After in seconds or as an HTTP date; undefined when absent or unparseable. */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

export function buildUrl(base: string, path: string, params: Record<string, QueryValue> = {}): string {
  const url = new URL(path.replace(/^\//, ''), base.endsWith('/') ? base : `${base}/`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Rate-limited JSON GET with per-request timeout and retry on 429/5xx.
 * 404 → null. Any other failure surfaces as UpstreamError.
 */
export class HttpJsonClient {
  constructor(
    private readonly source: string,
    private readonly options: HttpClientOptions,
  ) {}

  async get(url: string, headers: Record<string, string>): Promise<unknown> {
    return withRetry(
      () => this.once(url, headers),
      `${this.source} GET`,
      {
        maxRetries: this.options.maxRetries,
        retryIf: (err) => err instanceof UpstreamError && err.retryable,
        delayHint: (err) => (err instanceof UpstreamError ? err.retryAfterMs : undefined),
      },
    );
  }

  private async once(url: string, headers: Record<string, string>): Promise<unknown> {
    await this.options.limiter.acquire();

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json', ...headers },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamError(`${this.source} request failed: ${errorMessage(err)}`, this.source);
    }

    if (response.status === 404) return null;
    if (!response.ok) {
      const body = await response.text().catch((err: unknown) => `<unreadable body: ${errorMessage(err)}>`);
      logger.debug(`[${this.source}] HTTP ${response.status}: ${body.slice(0, 200)}`);
      throw new UpstreamError(
        `${this.source} API error: ${response.status}`,
        this.source,
        response.status,
        parseRetryAfter(response.headers.get('retry-after')),
      );
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (err) {
      throw new UpstreamError(`${this.source} returned invalid JSON: ${errorMessage(err)}`, this.source, response.status);
    }
  }
}
