import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  retryWithBackoff,
  retry,
  calculateBackoffDelay,
  sleep,
  isRetryableError,
  DEFAULT_RETRY_CONFIG,
  RETRY_PROFILES,
} from './retry';
import { AuthError, ExchangeError, NetworkError, ValidationError } from './errors';

const noJitter = { initialDelayMs: 100, maxDelayMs: 10000, backoffMultiplier: 2, jitterFactor: 0 };

describe('backoff', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('calculateBackoffDelay', () => {
    it('doubles from the initial delay', () => {
      expect([0, 1, 2, 3].map((attempt) => calculateBackoffDelay(attempt, noJitter))).toEqual([100, 200, 400, 800]);
    });

    it('never exceeds the cap', () => {
      const capped = { ...noJitter, maxDelayMs: 500 };
      expect(calculateBackoffDelay(3, capped)).toBe(500);
      expect(calculateBackoffDelay(10, capped)).toBe(500);
    });

    it('keeps jitter inside the configured fraction', () => {
      const jittered = { ...noJitter, jitterFactor: 0.5 };
      const delays = Array.from({ length: 100 }, () => calculateBackoffDelay(0, jittered));

      expect(Math.min(...delays)).toBeGreaterThanOrEqual(50);
      expect(Math.max(...delays)).toBeLessThanOrEqual(150);
    });
  });

  it('sleep resolves only once the delay has passed', async () => {
    const done = vi.fn();
    const pending = sleep(100).then(done);

    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledOnce();
  });

  describe('isRetryableError', () => {
    it.each([
      ['a network failure', new NetworkError('socket hang up')],
      ['a request-weight breach', new ExchangeError(-1003, 'Too many requests')],
      ['a gateway outage', new ExchangeError(503, 'HTTP 503: Service Unavailable', 503)],
      ['a library rate limit', new ExchangeError('RateLimitExceeded', 'slow down')],
    ])('retries %s', (_label, error) => {
      expect(isRetryableError(error)).toBe(true);
    });

    it.each([
      ['an insufficient balance rejection', new ExchangeError(-2010, 'Account has insufficient balance')],
      ['a bad API key', new AuthError('Invalid API-key', -2015, 401)],
      ['a rejected argument', new ValidationError('quantity', 'must be greater than 0')],
      ['a plain Error', new Error('ECONNREFUSED')],
      ['a string', 'string error'],
      ['null', null],
    ])('does not retry %s', (_label, error) => {
      expect(isRetryableError(error)).toBe(false);
    });
  });

  describe('retryWithBackoff', () => {
    it('returns on the first success', async () => {
      const call = vi.fn().mockResolvedValue({ serverTime: 1 });

      await expect(retryWithBackoff(call)).resolves.toMatchObject({
        success: true,
        data: { serverTime: 1 },
        attempts: 1,
      });
      expect(call).toHaveBeenCalledTimes(1);
    });

    it('waits the full delay before the next attempt', async () => {
      const call = vi.fn().mockRejectedValueOnce(new NetworkError('ECONNRESET')).mockResolvedValue('pong');

      const pending = retryWithBackoff(call, { initialDelayMs: 200, jitterFactor: 0 });

      await vi.advanceTimersByTimeAsync(199);
      expect(call).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toMatchObject({ success: true, data: 'pong', attempts: 2 });
    });

    it('gives up after maxRetries retries', async () => {
      const failure = new NetworkError('ECONNREFUSED');
      const call = vi.fn().mockRejectedValue(failure);

      const pending = retryWithBackoff(call, { maxRetries: 2, initialDelayMs: 10, jitterFactor: 0 });
      await vi.advanceTimersByTimeAsync(30);

      await expect(pending).resolves.toMatchObject({ success: false, error: failure, attempts: 3 });
      expect(call).toHaveBeenCalledTimes(3);
    });

    it('fails at once on an auth error', async () => {
      const call = vi.fn().mockRejectedValue(new AuthError('Signature for this request is not valid.', -1022));

      await expect(retryWithBackoff(call, { initialDelayMs: 10 })).resolves.toMatchObject({
        success: false,
        attempts: 1,
      });
      expect(call).toHaveBeenCalledTimes(1);
    });

    it('stops when the next delay would overrun maxElapsedMs', async () => {
      const call = vi.fn().mockRejectedValue(new NetworkError('timeout'));

      // delays of 100 and 200 bring the clock to 300; another 400 would end at 700
      const pending = retryWithBackoff(call, {
        maxRetries: 10,
        initialDelayMs: 100,
        jitterFactor: 0,
        maxElapsedMs: 500,
      });
      await vi.advanceTimersByTimeAsync(300);

      await expect(pending).resolves.toMatchObject({ success: false, attempts: 3 });
      expect(call).toHaveBeenCalledTimes(3);
    });

    it('lets shouldRetry override the default policy', async () => {
      const call = vi.fn().mockRejectedValueOnce(new Error('stale nonce')).mockResolvedValue('ok');
      const shouldRetry = vi.fn().mockReturnValue(true);

      const pending = retryWithBackoff(call, { initialDelayMs: 10, jitterFactor: 0, shouldRetry });
      await vi.advanceTimersByTimeAsync(10);

      await expect(pending).resolves.toMatchObject({ success: true, data: 'ok' });
      expect(shouldRetry).toHaveBeenCalledWith(expect.any(Error), 0);
    });

    it('reports each scheduled retry to onRetry', async () => {
      const call = vi
        .fn()
        .mockRejectedValueOnce(new NetworkError('ECONNREFUSED'))
        .mockRejectedValueOnce(new NetworkError('ETIMEDOUT'))
        .mockResolvedValue('ok');
      const onRetry = vi.fn();

      const pending = retryWithBackoff(call, { initialDelayMs: 10, jitterFactor: 0, onRetry });
      await vi.advanceTimersByTimeAsync(30);
      await pending;

      expect(onRetry.mock.calls).toEqual([
        [expect.any(NetworkError), 1, 10],
        [expect.any(NetworkError), 2, 20],
      ]);
    });
  });

  describe('retry', () => {
    it('resolves to the data', async () => {
      await expect(retry(() => Promise.resolve(42))).resolves.toBe(42);
    });

    it('rethrows the last error as is', async () => {
      const failure = new ExchangeError(-1003, 'Too many requests', 429);

      const pending = retry(() => Promise.reject(failure), { maxRetries: 1, initialDelayMs: 10, jitterFactor: 0 });
      const assertion = expect(pending).rejects.toBe(failure);
      await vi.advanceTimersByTimeAsync(10);
      await assertion;
    });
  });

  it('ships bounded defaults and exchange profiles', () => {
    expect(DEFAULT_RETRY_CONFIG).toEqual({
      maxRetries: 3,
      initialDelayMs: 100,
      maxDelayMs: 10000,
      backoffMultiplier: 2,
      jitterFactor: 0.1,
      maxElapsedMs: 60000,
    });
    expect(RETRY_PROFILES.EXCHANGE_API.maxElapsedMs).toBe(30000);
    expect(RETRY_PROFILES.EXCHANGE_LIBRARY.maxElapsedMs).toBe(20000);
  });
});
