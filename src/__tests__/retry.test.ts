import { describe, it, expect, vi, afterEach } from 'vitest';
import { computeBackoffDelay, retryWithBackoff, sleep } from '../utils/retry.js';
import { CancelledError, TransportError } from '../utils/errors.js';
import { transient } from './helpers/fake-transport.js';

const NO_JITTER = { initialDelay: 1000, maxDelay: 30000, jitter: false };

describe('computeBackoffDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles from the initial delay', () => {
    expect(computeBackoffDelay(1, NO_JITTER)).toBe(1000);
    expect(computeBackoffDelay(2, NO_JITTER)).toBe(2000);
    expect(computeBackoffDelay(3, NO_JITTER)).toBe(4000);
  });

  it('caps at maxDelay', () => {
    expect(computeBackoffDelay(10, NO_JITTER)).toBe(30000);
  });

  it('keeps jittered delays between half and the full delay', () => {
    const random = vi.spyOn(Math, 'random');

    random.mockReturnValue(0);
    expect(computeBackoffDelay(2, { ...NO_JITTER, jitter: true })).toBe(1000);

    random.mockReturnValue(1);
    expect(computeBackoffDelay(2, { ...NO_JITTER, jitter: true })).toBe(2000);
  });
});

describe('retryWithBackoff', () => {
  const fast = { initialDelay: 0, maxDelay: 0, jitter: false };

  it('retries transient failures until one succeeds', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce('done');

    await expect(retryWithBackoff(fn, { ...fast, maxRetries: 3 })).resolves.toBe('done');
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
  });

  it('gives up after maxRetries retries', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(transient('still down'));

    await expect(retryWithBackoff(fn, { ...fast, maxRetries: 2 })).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors that are not retryable', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new TransportError('Forbidden', 'permanent', { statusCode: 403 }));

    await expect(retryWithBackoff(fn, { ...fast, maxRetries: 5 })).rejects.toThrow('Forbidden');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('prefers the server Retry-After, capped at maxDelay', async () => {
    const delays: number[] = [];
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransportError('Slow down', 'rate_limited', { retryAfterMs: 2500 }))
      .mockRejectedValueOnce(new TransportError('Slow down', 'rate_limited', { retryAfterMs: 3 }))
      .mockResolvedValueOnce('ok');

    await retryWithBackoff(fn, {
      initialDelay: 1,
      maxDelay: 5,
      jitter: false,
      maxRetries: 3,
      onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
    });

    expect(delays).toEqual([5, 3]);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockResolvedValue('never');

    await expect(retryWithBackoff(fn, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('rejects with CancelledError when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
