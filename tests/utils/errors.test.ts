/**
 * Tests for escalation errors and the retry / timeout helpers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DeliveryFailureError,
  InconsistentStateError,
  InvalidObservationError,
  NotFoundError,
  StateUnavailableError,
  deliver,
  formatUserError,
  toStateError,
  withRetry,
  withTimeout,
} from '../../src/utils/errors.js';

describe('escalation errors', () => {
  it('should carry code, status and retryability', () => {
    const invalid = new InvalidObservationError('bad', ['pet_id: Required']);
    expect(invalid).toMatchObject({ code: 'INVALID_OBSERVATION', statusCode: 400, retryable: false });
    expect(invalid.issues).toEqual(['pet_id: Required']);
    expect(invalid.name).toBe('InvalidObservationError');

    expect(new StateUnavailableError('down')).toMatchObject({ statusCode: 503, retryable: true });
    expect(new InconsistentStateError('pet-1', 'count 2 without alert').message).toBe(
      'Inconsistent alert state for pet pet-1: count 2 without alert'
    );
    expect(new NotFoundError('Alert', 'a-1').message).toBe('Alert not found: a-1');
  });

  it('should wrap foreign errors as state errors', () => {
    const wrapped = toStateError(new Error('connection reset'), 'Loading pet');
    expect(wrapped).toBeInstanceOf(StateUnavailableError);
    expect(wrapped.message).toBe('Loading pet: connection reset');

    const notFound = new NotFoundError('Pet');
    expect(toStateError(notFound, 'ignored')).toBe(notFound);
  });

  it('should hide internal details from API callers', () => {
    expect(formatUserError(new NotFoundError('Alert', 'a-1'))).toEqual({
      error: 'Alert not found: a-1',
      code: 'NOT_FOUND',
    });
    expect(formatUserError(new Error('password=hunter2'))).toEqual({
      error: 'An unexpected error occurred',
      code: 'INTERNAL_ERROR',
    });
  });
});

describe('withRetry', () => {
  it('should return the first success', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { initialDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it('should give up after the last attempt with the last error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('still down'));

    await expect(withRetry(fn, { maxAttempts: 4, initialDelayMs: 0 })).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(4);
  });

  it('should stop early when shouldRetry declines', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(withRetry(fn, { initialDelayMs: 0, shouldRetry: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 100, 'fast')).resolves.toBe(7);
  });

  it('should reject once the time is up', async () => {
    vi.useFakeTimers();
    const never = new Promise<void>(() => undefined);
    const raced = withTimeout(never, 500, 'playback');
    const assertion = expect(raced).rejects.toThrow('playback timed out after 500ms');

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });
});

describe('deliver', () => {
  const options = { maxAttempts: 3, retryDelayMs: 0, timeoutMs: 100 };

  it('should succeed on a later attempt', async () => {
    const fn = vi.fn<() => Promise<void>>().mockRejectedValueOnce(new Error('busy')).mockResolvedValueOnce(undefined);

    await expect(deliver(fn, 'sms', options)).resolves.toBeUndefined();
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should raise DeliveryFailureError once the budget is spent', async () => {
    const cause = new Error('gateway down');
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(cause);

    const failure = deliver(fn, 'sms', options);
    await expect(failure).rejects.toBeInstanceOf(DeliveryFailureError);
    await expect(failure).rejects.toMatchObject({
      channel: 'sms',
      attempts: 3,
      message: 'Delivery to sms failed after 3 attempt(s)',
      cause,
    });
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
