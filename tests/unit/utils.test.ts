import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from '../../src/utils/retry.js';
import { withTimeout } from '../../src/utils/timeout.js';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import { detectChain, isValidSolanaAddress, round, shortenAddress } from '../../src/utils/helpers.js';
import { UpstreamError } from '../../src/errors.js';
import { parseRetryAfter } from '../../src/data/http-client.js';
import { TOKEN } from '../helpers/factories.js';

describe('withRetry', () => {
  it('should retry until the call succeeds', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, 'test', { maxRetries: 3, baseDelayMs: 1, jitter: false })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should give up immediately when retryIf declines', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new UpstreamError('bad request', 'test', 400));

    await expect(withRetry(fn, 'test', {
      maxRetries: 3,
      baseDelayMs: 1,
      retryIf: (err) => err instanceof UpstreamError && err.retryable,
    })).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should throw the last error after exhausting retries', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(withRetry(fn, 'test', { maxRetries: 2, baseDelayMs: 1, jitter: false })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should wait the hinted delay instead of the backoff', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new UpstreamError('slow down', 'test', 429, 5))
      .mockResolvedValue('ok');

    // A one-minute backoff would time the test out if the hint were ignored
    await expect(withRetry(fn, 'test', {
      maxRetries: 1,
      baseDelayMs: 60_000,
      maxDelayMs: 60_000,
      jitter: false,
      delayHint: (err) => (err instanceof UpstreamError ? err.retryAfterMs : undefined),
    })).resolves.toBe('ok');
  });
});

describe('backoffDelay', () => {
  const opts = { baseDelayMs: 100, maxDelayMs: 10_000, jitter: false };

  it('should double per attempt up to the cap', () => {
    expect(backoffDelay(0, opts)).toBe(100);
    expect(backoffDelay(3, opts)).toBe(800);
    expect(backoffDelay(10, opts)).toBe(10_000);
  });

  it('should keep at least half the delay under jitter', () => {
    expect(backoffDelay(3, { ...opts, jitter: true }, () => 0)).toBe(400);
  });
});

describe('parseRetryAfter', () => {
  it('should read seconds and HTTP dates', () => {
    expect(parseRetryAfter('2')).toBe(2_000);
    expect(parseRetryAfter('Thu, 01 Jan 1970 00:00:10 GMT', 4_000)).toBe(6_000);
  });

  it('should ignore missing or unparseable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('UpstreamError.retryable', () => {
  it('should retry rate limits, server errors and network failures only', () => {
    expect(new UpstreamError('x', 's', 429).retryable).toBe(true);
    expect(new UpstreamError('x', 's', 503).retryable).toBe(true);
    expect(new UpstreamError('x', 's').retryable).toBe(true);
    expect(new UpstreamError('x', 's', 404).retryable).toBe(false);
  });
});

describe('withTimeout', () => {
  it('should return the value when it arrives in time', async () => {
    await expect(withTimeout(Promise.resolve('fast'), 100, () => 'fallback')).resolves.toBe('fast');
  });

  it('should return the fallback on timeout', async () => {
    const slow = new Promise<string>((r) => setTimeout(() => r('late'), 200));
    await expect(withTimeout(slow, 5, () => 'fallback')).resolves.toBe('fallback');
  });

  it('should propagate rejections', async () => {
    await expect(withTimeout(Promise.reject(new Error('nope')), 100, () => 'fallback')).rejects.toThrow('nope');
  });
});

describe('RateLimiter', () => {
  it('should hand out the initial burst without waiting', async () => {
    const limiter = new RateLimiter('test', 2, 2);
    await limiter.acquire();
    await limiter.acquire();
    expect(limiter.available).toBe(0);
  });

  it('should reject a non-positive rate', () => {
    expect(() => new RateLimiter('test', 0, 5)).toThrow(RangeError);
  });
});

describe('helpers', () => {
  it('should shorten long addresses only', () => {
    expect(shortenAddress('abcdefghij')).toBe('abcd...ghij');
    expect(shortenAddress('short')).toBe('short');
  });

  it('should detect EVM addresses as base and everything else as solana', () => {
    expect(detectChain(`0x${'a'.repeat(40)}`)).toBe('base');
    expect(detectChain(TOKEN)).toBe('solana');
    expect(detectChain('0x123')).toBe('solana');
  });

  it('should validate Solana addresses', () => {
    expect(isValidSolanaAddress(TOKEN)).toBe(true);
    expect(isValidSolanaAddress('not-an-address')).toBe(false);
  });

  it('should round to the given decimals', () => {
    expect(round(1.2345, 2)).toBe(1.23);
    expect(round(9.8333, 1)).toBe(9.8);
  });
});
