import { describe, it, expect } from 'vitest';
import { TaskPool } from '../../../src/worker-pool/task-pool';
import type { SettledTask } from '../../../src/worker-pool/interfaces/pool-stats.interface';
import { tick } from '../helpers/mock-factories';

describe('TaskPool', () => {
  it('should reject sizes that are not positive integers', () => {
    expect(() => new TaskPool(0)).toThrow(RangeError);
    expect(() => new TaskPool(-1)).toThrow(RangeError);
    expect(() => new TaskPool(1.5)).toThrow('Pool size must be a positive integer, got 1.5');
  });

  it('should never run more than size handlers at once', async () => {
    const pool = new TaskPool<number, number>(3);
    let active = 0;
    let peak = 0;

    const stats = await pool.run(
      [1, 2, 3, 4, 5, 6, 7, 8],
      async (item) => {
        active++;
        peak = Math.max(peak, active);
        await tick(2);
        active--;
        return item * 2;
      },
      () => undefined,
    );

    expect(peak).toBe(3);
    expect(stats.peakActiveTasks).toBe(3);
    expect(stats.poolSize).toBe(3);
    expect(stats.submittedTasks).toBe(8);
    expect(stats.completedTasks).toBe(8);
    expect(stats.failedTasks).toBe(0);
  });

  it('should start items in submission order', async () => {
    const pool = new TaskPool<string, string>(2);
    const started: string[] = [];

    await pool.run(
      ['a', 'b', 'c', 'd'],
      async (item) => {
        started.push(item);
        await tick(1);
        return item;
      },
      () => undefined,
    );

    expect(started).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should report results in completion order', async () => {
    const pool = new TaskPool<number, number>(2);
    const settledItems: number[] = [];

    // Item 0 is slow, so item 1 settles first
    await pool.run(
      [30, 1],
      async (ms) => {
        await tick(ms);
        return ms;
      },
      (settled) => settledItems.push(settled.item),
    );

    expect(settledItems).toEqual([1, 30]);
  });

  it('should report a rejected handler and keep going', async () => {
    const pool = new TaskPool<string, string>(1);
    const settled: Array<SettledTask<string, string>> = [];

    const stats = await pool.run(
      ['ok-1', 'boom', 'ok-2'],
      async (item) => {
        if (item === 'boom') {
          throw new Error('handler failed');
        }
        return item.toUpperCase();
      },
      (result) => settled.push(result),
    );

    expect(settled.map((result) => result.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    const rejected = settled[1];
    expect(rejected.status === 'rejected' && rejected.reason).toEqual(new Error('handler failed'));
    expect(rejected.index).toBe(1);
    expect(stats.completedTasks).toBe(2);
    expect(stats.failedTasks).toBe(1);
  });

  it('should finish every item when the listener throws, then reject with its error', async () => {
    const pool = new TaskPool<string, string>(2);
    const handled: string[] = [];

    await expect(
      pool.run(
        ['a', 'b', 'c', 'd'],
        async (item) => {
          handled.push(item);
          await tick(1);
          return item;
        },
        (settled) => {
          if (settled.item === 'a') {
            throw new Error('listener failed');
          }
        },
      ),
    ).rejects.toThrow('listener failed');
    expect(handled).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should handle an empty list without starting workers', async () => {
    const pool = new TaskPool<string, string>(4);
    let calls = 0;

    const stats = await pool.run(
      [],
      async (item) => {
        calls++;
        return item;
      },
      () => undefined,
    );

    expect(calls).toBe(0);
    expect(stats.submittedTasks).toBe(0);
    expect(stats.peakActiveTasks).toBe(0);
  });

  it('should reset its statistics between runs', async () => {
    const pool = new TaskPool<number, number>(2);
    const handler = async (item: number) => item;

    await pool.run([1, 2, 3], handler, () => undefined);
    const stats = await pool.run([4], handler, () => undefined);

    expect(stats.submittedTasks).toBe(1);
    expect(stats.completedTasks).toBe(1);
    expect(stats.peakActiveTasks).toBe(1);
  });
});
