export interface PoolStats {
  poolSize: number;
  submittedTasks: number;
  completedTasks: number;
  failedTasks: number;
  /** Highest number of tasks that were in flight at the same time. */
  peakActiveTasks: number;
  totalProcessingTimeMs: number;
}

export type SettledTask<TItem, TResult> =
  | { status: 'fulfilled'; item: TItem; index: number; value: TResult; processingTimeMs: number }
  | { status: 'rejected'; item: TItem; index: number; reason: unknown; processingTimeMs: number };
