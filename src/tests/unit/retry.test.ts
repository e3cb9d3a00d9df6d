import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from '../../utils/retry.js';

describe('backoffDelay', () => {
  it('should double from the base delay', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt))).toEqual([500, 1000, 2000, 4000]);
  });

  it('should cap at the maximum', () => {
    expect(backoffDelay(20, 1000, 30_000)).toBe(30_000);
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const wait = vi.fn(async () => undefined);
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { maxAttempts: 3, shouldRetry: () => true, wait })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledWith(500);
  });

  it('should stop after maxAttempts', async () => {
    const wait = vi.fn(async () => undefined);
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(withRetry(fn, { maxAttempts: 3, shouldRetry: () => true, wait })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[500], [1000]]);
  });

  it('should not retry when shouldRetry refuses', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('bad request'));

    await expect(withRetry(fn, { maxAttempts: 5, shouldRetry: () => false })).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should prefer the delay the error asks for', async () => {
    const wait = vi.fn(async () => undefined);
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(new Error('slow down')).mockResolvedValueOnce('ok');

    await withRetry(fn, { maxAttempts: 2, shouldRetry: () => true, delayFor: () => 3000, onRetry, wait });

    expect(wait).toHaveBeenCalledWith(3000);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 3000);
  });
});
