import { jest } from '@jest/globals';

import { AuthError, NetworkError } from '../../common/errors.js';
import { Retrier } from '../retrier.js';

describe('Retrier', () => {
  const policy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 1000 };
  let delays: number[];
  let retrier: Retrier;

  beforeEach(() => {
    delays = [];
    retrier = new Retrier(policy, async (ms) => {
      delays.push(ms);
    });
  });

  it('retries network errors with exponential backoff', async () => {
    let calls = 0;
    const result = await retrier.run('flaky', async (attempt) => {
      calls += 1;
      if (attempt < 3) throw new NetworkError('connection reset');
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it('does not retry non-retryable errors', async () => {
    const attempt = jest.fn(async () => {
      throw new AuthError('bad credentials');
    });
    await expect(retrier.run('auth', attempt)).rejects.toThrow(AuthError);
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    let calls = 0;
    await expect(
      retrier.run('down', async () => {
        calls += 1;
        throw new NetworkError(`attempt ${calls}`);
      }),
    ).rejects.toThrow('attempt 4');
    expect(calls).toBe(4);
    expect(delays).toEqual([100, 200, 400]);
  });

  it('honours retry-after hints up to the cap', () => {
    expect(retrier.delayFor(1, new NetworkError('limited', { retryAfterMs: 500 }))).toBe(500);
    expect(retrier.delayFor(1, new NetworkError('limited', { retryAfterMs: 60_000 }))).toBe(1000);
    expect(retrier.delayFor(6, new NetworkError('slow'))).toBe(1000);
  });

  it('runs the cleanup hook between attempts', async () => {
    const events: string[] = [];
    await retrier.run(
      'cleanup',
      async (attempt) => {
        events.push(`attempt ${attempt}`);
        if (attempt === 1) throw new NetworkError('early eof');
      },
      async () => {
        events.push('cleanup');
      },
    );
    expect(events).toEqual(['attempt 1', 'cleanup', 'attempt 2']);
  });
});
