/**
 * Groups tasks into batches whose combined entry requirements fit one
 * implementation context, then runs each batch inside an allocation.
 */

import { performance } from 'node:perf_hooks';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_MAX_ENTRIES, type ContextBudgetAllocator } from './budget-allocator.js';
import type { ImplementationContext } from './types.js';

export interface TaskSpec {
  id: string;
  description: string;
  required_entry_ids: string[];
  /** Higher runs first when batching by priority */
  priority?: number;
}

export interface TaskBatch {
  batch_id: string;
  tasks: TaskSpec[];
  unique_entry_ids: string[];
  /** A single task that on its own needs maxEntries or more entries */
  exceeds_limit: boolean;
}

export interface BatchResult {
  batch_id: string;
  task_results: Record<string, unknown>;
  success: boolean;
  error?: Error;
  duration_ms: number;
  entry_count: number;
  total_tokens: number;
}

export type BatchHandler = (
  context: ImplementationContext,
  tasks: TaskSpec[],
) => Record<string, unknown> | Promise<Record<string, unknown>>;

export class TaskBatcher {
  private batchSeq = 0;

  constructor(private readonly maxEntriesPerBatch = DEFAULT_MAX_ENTRIES) {}

  /**
   * Greedy packing in input order (or priority order). A batch's unique
   * entry count stays strictly below the limit.
   */
  createBatches(tasks: readonly TaskSpec[], options: { sortByPriority?: boolean } = {}): TaskBatch[] {
    const ordered = options.sortByPriority
      ? [...tasks].sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0))
      : [...tasks];

    const batches: TaskBatch[] = [];
    let current: TaskSpec[] = [];
    let currentEntries = new Set<string>();

    const flush = () => {
      if (current.length === 0) return;
      batches.push(this.makeBatch(current, currentEntries, false));
      current = [];
      currentEntries = new Set();
    };

    for (const task of ordered) {
      const taskEntries = new Set(task.required_entry_ids);

      if (taskEntries.size >= this.maxEntriesPerBatch) {
        flush();
        batches.push(this.makeBatch([task], taskEntries, true));
        continue;
      }

      const combined = new Set([...currentEntries, ...taskEntries]);
      if (combined.size < this.maxEntriesPerBatch) {
        current.push(task);
        currentEntries = combined;
      } else {
        flush();
        current = [task];
        currentEntries = taskEntries;
      }
    }
    flush();

    return batches;
  }

  private makeBatch(tasks: TaskSpec[], entries: Set<string>, exceedsLimit: boolean): TaskBatch {
    return {
      batch_id: `batch_${String(++this.batchSeq).padStart(4, '0')}`,
      tasks,
      unique_entry_ids: [...entries],
      exceeds_limit: exceedsLimit,
    };
  }
}

export class BatchExecutor {
  private readonly logger: Logger;

  constructor(private readonly allocator: ContextBudgetAllocator, options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Acquire the batch's context, hand it to `handler`, release it. Failures
   * (including bounds errors) are captured in the result, not thrown.
   */
  async executeBatch(batch: TaskBatch, handler: BatchHandler): Promise<BatchResult> {
    const start = performance.now();
    const result: BatchResult = {
      batch_id: batch.batch_id,
      task_results: {},
      success: true,
      duration_ms: 0,
      entry_count: batch.unique_entry_ids.length,
      total_tokens: 0,
    };

    try {
      await this.allocator.withContext(batch.unique_entry_ids, async context => {
        result.entry_count = context.entry_count;
        result.total_tokens = context.total_tokens;
        result.task_results = await handler(context, batch.tasks);
      });
    } catch (error) {
      result.success = false;
      result.error = error instanceof Error ? error : new Error(String(error));
      this.logger.warn('Batch execution failed', { batch_id: batch.batch_id, error: result.error.message });
    }

    result.duration_ms = performance.now() - start;
    return result;
  }

  async executeAll(
    batches: readonly TaskBatch[],
    handler: BatchHandler,
    options: { continueOnError?: boolean } = {},
  ): Promise<BatchResult[]> {
    const continueOnError = options.continueOnError ?? true;
    const results: BatchResult[] = [];
    for (const batch of batches) {
      const result = await this.executeBatch(batch, handler);
      results.push(result);
      if (!result.success && !continueOnError) break;
    }
    return results;
  }

  /** Merge per-task results across batches. */
  collectTaskResults(results: readonly BatchResult[]): Record<string, unknown> {
    const merged: Record<string, unknown> = {};
    for (const result of results) {
      Object.assign(merged, result.task_results);
    }
    return merged;
  }
}
