import { PoolStats, SettledTask } from './interfaces/pool-stats.interface';

export type TaskHandler<TItem, TResult> = (item: TItem, index: number) => Promise<TResult>;
export type SettledListener<TItem, TResult> = (settled: SettledTask<TItem, TResult>) => void;

/**
 * Bounded pool of async workers.
 *
 * `size` workers pull items from a shared FIFO cursor, so items start in
 * submission order and at most `size` handlers are ever in flight. Each
 * worker awaits its handler to completion before taking the next item.
 * Results are reported through `onSettled` in completion order; a rejected
 * handler is reported and never stops the other workers. A throwing
 * `onSettled` does not stop them either: the first listener error rejects
 * `run` once every item has settled.
 */
export class TaskPool<TItem, TResult> {
  private activeTasks = 0;
  private peakActiveTasks = 0;
  private completedTasks = 0;
  private failedTasks = 0;
  private totalProcessingTimeMs = 0;

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${size}`);
    }
  }

  async run(
    items: readonly TItem[],
    handler: TaskHandler<TItem, TResult>,
    onSettled: SettledListener<TItem, TResult>,
  ): Promise<PoolStats> {
    let cursor = 0;
    const listenerErrors: unknown[] = [];
    this.resetStats();

    const worker = async (): Promise<void> => {
      while (cursor < items.length) {
        const index = cursor++;
        const item = items[index];
        const startedAt = Date.now();

        this.activeTasks++;
        this.peakActiveTasks = Math.max(this.peakActiveTasks, this.activeTasks);

        let settled: SettledTask<TItem, TResult>;
        try {
          const value = await handler(item, index);
          this.completedTasks++;
          settled = { status: 'fulfilled', item, index, value, processingTimeMs: Date.now() - startedAt };
        } catch (reason) {
          this.failedTasks++;
          settled = { status: 'rejected', item, index, reason, processingTimeMs: Date.now() - startedAt };
        } finally {
          this.activeTasks--;
        }

        this.totalProcessingTimeMs += settled.processingTimeMs;
        try {
          onSettled(settled);
        } catch (error) {
          listenerErrors.push(error);
        }
      }
    };

    const workerCount = Math.min(this.size, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (listenerErrors.length > 0) {
      throw listenerErrors[0];
    }

    return this.getStats(items.length);
  }

  private resetStats(): void {
    this.activeTasks = 0;
    this.peakActiveTasks = 0;
    this.completedTasks = 0;
    this.failedTasks = 0;
    this.totalProcessingTimeMs = 0;
  }

  private getStats(submittedTasks: number): PoolStats {
    return {
      poolSize: this.size,
      submittedTasks,
      completedTasks: this.completedTasks,
      failedTasks: this.failedTasks,
      peakActiveTasks: this.peakActiveTasks,
      totalProcessingTimeMs: this.totalProcessingTimeMs,
    };
  }
}
