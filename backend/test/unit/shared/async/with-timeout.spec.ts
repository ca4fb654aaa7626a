import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, withTimeout } from '../../../../src/shared/async/with-timeout';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the work result when it finishes in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50, 'cache.get')).resolves.toBe('done');
  });

  it('passes through the work rejection', async () => {
    const failure = new Error('boom');

    await expect(withTimeout(Promise.reject(failure), 50, 'cache.get')).rejects.toBe(failure);
  });

  it('rejects with TimeoutError when the deadline passes first', async () => {
    vi.useFakeTimers();
    const never = new Promise<string>(() => undefined);

    const pending = withTimeout(never, 500, 'cache.get');
    const assertion = expect(pending).rejects.toMatchObject({
      name: 'TimeoutError',
      label: 'cache.get',
      timeoutMs: 500,
      message: 'cache.get timed out after 500ms',
    });

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
  });
});
