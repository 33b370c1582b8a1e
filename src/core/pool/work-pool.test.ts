import { describe, expect, it } from 'vitest';
import { processPool } from './work-pool';

describe('processPool', () => {
  it('should process all items and return results in input order', async () => {
    const results = await processPool(
      [30, 10, 20],
      async (delay) => {
        await new Promise((resolve) => setTimeout(resolve, delay));
        return delay * 2;
      },
      3,
    );
    expect(results.map((result) => result.success && result.value)).toEqual([
      60, 20, 40,
    ]);
  });

  it('should handle empty items', async () => {
    expect(await processPool([], async (item: number) => item, 3)).toEqual([]);
  });

  it('should respect max concurrency', async () => {
    let active = 0;
    let maxActive = 0;

    await processPool(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 10));
        active--;
      },
      2,
    );

    expect(maxActive).toBe(2);
  });

  it('should record failures and keep processing', async () => {
    const results = await processPool(
      [1, 2, 3],
      async (item) => {
        if (item === 2) {
          throw new Error('test error');
        }
        return item;
      },
      2,
    );

    expect(results.map((result) => result.success)).toEqual([true, false, true]);
    const failure = results[1];
    expect(failure.success ? null : failure.error.message).toBe('test error');
    expect(failure.item).toBe(2);
  });

  it('should wrap non-Error rejections', async () => {
    const [result] = await processPool(
      ['x'],
      async () => {
        throw 'plain string';
      },
      1,
    );
    expect(result.success ? null : result.error.message).toBe('plain string');
  });

  it('should run with one worker when the concurrency is not usable', async () => {
    const results = await processPool([1, 2], async (item) => item, Number.NaN);
    expect(results).toHaveLength(2);
  });
});
