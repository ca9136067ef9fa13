import { withRetry, RetryExhaustedError, sleep } from '../../utils/retry';

describe('withRetry', () => {
  const options = { maxAttempts: 3, baseDelayMs: 0, backoff: 2, shouldRetry: () => true };

  it('should return the value and attempt count on first success', async () => {
    const fn = jest.fn().mockResolvedValue('ok');

    const outcome = await withRetry(fn, options);

    expect(outcome).toEqual({ value: 'ok', attempts: 1 });
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('should retry until an attempt succeeds', async () => {
    const fn = jest.fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');
    const onRetry = jest.fn();

    const outcome = await withRetry(fn, { ...options, onRetry });

    expect(outcome.attempts).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should compute exponential delays', async () => {
    const fn = jest.fn()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue('ok');
    const delays: number[] = [];

    await withRetry(fn, {
      ...options,
      baseDelayMs: 1,
      backoff: 3,
      onRetry: (_error, _attempt, delayMs) => delays.push(delayMs)
    });

    expect(delays).toEqual([1, 3]);
  });

  it('should give up after maxAttempts with the last error', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('down'));

    const error = await withRetry(fn, options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, message: 'down' });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop immediately when the error is not retryable', async () => {
    const permanent = new Error('bad request');
    const fn = jest.fn().mockRejectedValue(permanent);

    const error = await withRetry(fn, { ...options, shouldRetry: () => false }).catch((e: unknown) => e);

    expect(error).toMatchObject({ attempts: 1, lastError: permanent });
  });

  it('should not retry once the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = jest.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error('cancelled');
    });

    const error = await withRetry(fn, { ...options, signal: controller.signal }).catch((e: unknown) => e);

    expect(error).toMatchObject({ attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('should resolve early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1000);
  });
});
