import { describe, expect, test, vi } from 'vitest';
import { TransientIOError } from '../errors.js';
import { httpStatusOf, isTransientError, withRetry } from '../retry.js';

function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status ${status}`), { response: { status } });
}

describe('isTransientError', () => {
  test('treats rate limits and server errors as transient', () => {
    expect(isTransientError(httpError(429))).toBe(true);
    expect(isTransientError(httpError(503))).toBe(true);
    expect(isTransientError(httpError(404))).toBe(false);
    expect(isTransientError(httpError(403))).toBe(false);
  });

  test('treats socket errors as transient', () => {
    expect(isTransientError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isTransientError(new Error('invalid_grant'))).toBe(false);
  });

  test('reads the status from the response or the error itself', () => {
    expect(httpStatusOf(httpError(502))).toBe(502);
    expect(httpStatusOf(Object.assign(new Error('gone'), { status: 410 }))).toBe(410);
    expect(httpStatusOf('nope')).toBeUndefined();
  });
});

describe('withRetry', () => {
  test('retries transient failures with exponential backoff', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, 'messages.get', { sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  test('gives up after the last attempt with a TransientIOError', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(500));

    const error = await withRetry(operation, 'history.list', { sleep }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientIOError);
    expect(error).toMatchObject({ operation: 'history.list', retryable: true, code: 'TRANSIENT_IO' });
    expect(operation).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
  });

  test('caps the delay at maxDelayMs', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(500));

    await withRetry(operation, 'files.create', { sleep, attempts: 6, maxDelayMs: 5000 }).catch(() => undefined);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000, 5000, 5000]);
  });

  test('rethrows permanent errors immediately', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const failure = httpError(400);
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(operation, 'labels.create', { sleep })).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
