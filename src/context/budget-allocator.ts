/**
 * Bounded context allocation for implementation LLM calls.
 *
 * A request names entry ids; the allocator expands them with every
 * transitive parent and derivation source, and refuses the whole request
 * when that closure reaches the entry limit. Nothing is materialized or
 * recorded for a refused request.
 *
 * Allocations are tracked until released so that unreleased handles can be
 * reported. Releasing retires the handle only; entries are never touched.
 */

import type { ContextStore } from '../storage/context-store.js';
import { EntryBoundsError, ValidationError } from '../storage/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { estimateImplementationEntryTokens } from './token-budget.js';
import { buildWorkingContext, toImplementationView } from './working-context.js';
import type {
  AllocationRecord,
  AllocationStats,
  ImplementationContext,
  ImplementationEntryView,
  WorkingContext,
  WorkingContextOptions,
} from './types.js';

export const DEFAULT_MAX_ENTRIES = 200;

export interface BudgetAllocatorOptions {
  /** Closures must stay strictly below this size. Default: 200 */
  maxEntries?: number;
  logger?: Logger;
}

export class ContextBudgetAllocator {
  private readonly maxEntries: number;
  private readonly logger: Logger;
  private outstanding = new Map<string, AllocationRecord>();
  private allocationSeq = 0;
  private totalRequests = 0;
  private totalReleases = 0;

  constructor(private readonly store: ContextStore, options: BudgetAllocatorOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries < 2) {
      throw new ValidationError([{ field: 'maxEntries', message: 'must be an integer of at least 2' }], 'allocator options');
    }
    this.maxEntries = maxEntries;
    this.logger = options.logger ?? defaultLogger;
  }

  getBoundsInfo(): { max_entries: number; is_default: boolean } {
    return { max_entries: this.maxEntries, is_default: this.maxEntries === DEFAULT_MAX_ENTRIES };
  }

  /** Summary-only view of the whole store. Unbounded. */
  getWorkingContext(options: WorkingContextOptions = {}): WorkingContext {
    return buildWorkingContext(this.store, options);
  }

  /**
   * Requested ids followed by their transitive parents and sources,
   * restricted to live entries. Unknown or expired ids are skipped.
   */
  resolveClosure(entryIds: readonly string[]): string[] {
    const live = entryIds.filter(id => this.store.get(id) !== undefined);
    return this.store.getDependencyClosure(live).filter(id => this.store.get(id) !== undefined);
  }

  validateBounds(entryIds: readonly string[]): boolean {
    return this.resolveClosure(entryIds).length < this.maxEntries;
  }

  /**
   * Materialize full-content views for the closure of `entryIds` and record
   * the allocation as outstanding.
   *
   * @throws EntryBoundsError when the closure has maxEntries or more entries
   */
  requestContext(entryIds: readonly string[]): ImplementationContext {
    const requested = new Set(entryIds);
    const closure = this.resolveClosure([...requested]);

    if (closure.length >= this.maxEntries) {
      this.logger.warn('Context request exceeds entry bounds', {
        requested: requested.size,
        count: closure.length,
        limit: this.maxEntries,
      });
      throw new EntryBoundsError(closure.length, this.maxEntries);
    }

    const entries: ImplementationEntryView[] = [];
    for (const id of closure) {
      const entry = this.store.get(id);
      if (entry) entries.push(toImplementationView(entry, requested.has(id)));
    }
    const missing_ids = [...requested].filter(id => !closure.includes(id));

    const context_id = `alloc_${String(++this.allocationSeq).padStart(4, '0')}`;
    const entry_ids = entries.map(e => e.id);
    this.outstanding.set(context_id, { context_id, entry_ids, created_at: new Date().toISOString() });
    this.totalRequests += 1;

    this.logger.debug('Context allocated', { context_id, entries: entry_ids.length, missing: missing_ids.length });

    return {
      context_id,
      entries,
      entry_ids: [...entry_ids],
      entry_count: entries.length,
      total_tokens: entries.reduce((sum, view) => sum + estimateImplementationEntryTokens(view), 0),
      missing_ids,
    };
  }

  /**
   * Retire an allocation handle.
   * @returns false for unknown or already released handles
   */
  releaseContext(contextId: string): boolean {
    if (!this.outstanding.delete(contextId)) return false;
    this.totalReleases += 1;
    this.logger.debug('Context released', { context_id: contextId });
    return true;
  }

  /**
   * Request, run `fn`, and release, even when `fn` throws.
   */
  async withContext<T>(
    entryIds: readonly string[],
    fn: (context: ImplementationContext) => T | Promise<T>,
  ): Promise<T> {
    const context = this.requestContext(entryIds);
    try {
      return await fn(context);
    } finally {
      this.releaseContext(context.context_id);
    }
  }

  /** Whether any outstanding allocation includes the entry. */
  isInUse(entryId: string): boolean {
    for (const record of this.outstanding.values()) {
      if (record.entry_ids.includes(entryId)) return true;
    }
    return false;
  }

  getOutstanding(): AllocationRecord[] {
    return [...this.outstanding.values()].map(r => ({ ...r, entry_ids: [...r.entry_ids] }));
  }

  /**
   * Outstanding allocations older than `olderThanMs`. Each one is logged as
   * a warning.
   */
  findLeaks(olderThanMs: number, now: number = Date.now()): AllocationRecord[] {
    const leaks = this.getOutstanding().filter(r => now - Date.parse(r.created_at) > olderThanMs);
    for (const leak of leaks) {
      this.logger.warn('Context allocation not released', {
        context_id: leak.context_id,
        entries: leak.entry_ids.length,
        created_at: leak.created_at,
      });
    }
    return leaks;
  }

  getUsageStats(): AllocationStats {
    return {
      outstanding: this.outstanding.size,
      total_requests: this.totalRequests,
      total_releases: this.totalReleases,
    };
  }

  /** Chunk ids so every chunk on its own stays under the limit. */
  splitIntoBatches(entryIds: readonly string[]): string[][] {
    const size = this.maxEntries - 1;
    const batches: string[][] = [];
    for (let i = 0; i < entryIds.length; i += size) {
      batches.push(entryIds.slice(i, i + size));
    }
    return batches;
  }
}
