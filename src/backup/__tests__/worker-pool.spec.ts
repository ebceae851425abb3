import { runWithConcurrency } from '../worker-pool.js';

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('runWithConcurrency', () => {
  it('keeps input order and never exceeds the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const outcomes = await runWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await tick(ms);
      inFlight -= 1;
      return index * 10;
    });

    expect(peak).toBe(2);
    expect(outcomes).toEqual([0, 10, 20, 30, 40].map((value) => ({ status: 'fulfilled', value })));
  });

  it('isolates rejections', async () => {
    const outcomes = await runWithConcurrency(['a', 'b', 'c'], 3, async (item) => {
      if (item === 'b') throw new Error('b failed');
      return item.toUpperCase();
    });

    expect(outcomes[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(outcomes[1].status).toBe('rejected');
    expect(outcomes[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });

  it('skips items not yet started once the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const outcomes = await runWithConcurrency(
      [0, 1, 2, 3],
      1,
      async (item) => {
        started.push(item);
        if (item === 1) controller.abort();
        return item;
      },
      controller.signal,
    );

    expect(started).toEqual([0, 1]);
    expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'fulfilled', 'skipped', 'skipped']);
  });

  it('handles an empty list', async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
