import { describe, it, expect, beforeEach } from 'vitest';
import { ContextBudgetAllocator, DEFAULT_MAX_ENTRIES } from '../context/budget-allocator.js';
import { ContextStore } from '../storage/context-store.js';
import { EntryBoundsError, ValidationError } from '../storage/errors.js';
import { createTestLogger, ctxId, makeInput } from './helpers/fixtures.js';

const A = ctxId(1);
const B = ctxId(2);
const C = ctxId(3);
const MISSING = ctxId(99);

describe('ContextBudgetAllocator', () => {
  let store: ContextStore;
  let logger: ReturnType<typeof createTestLogger>;
  let allocator: ContextBudgetAllocator;

  beforeEach(() => {
    logger = createTestLogger();
    store = new ContextStore({ logger });
    allocator = new ContextBudgetAllocator(store, { logger });
  });

  describe('bounds', () => {
    function addChain(length: number): string[] {
      const ids: string[] = [];
      for (let i = 1; i <= length; i++) {
        const id = ctxId(i);
        store.add(makeInput({ id, parent_id: ids[ids.length - 1] }));
        ids.push(id);
      }
      return ids;
    }

    it('defaults to 200 entries', () => {
      expect(DEFAULT_MAX_ENTRIES).toBe(200);
      expect(allocator.getBoundsInfo()).toEqual({ max_entries: 200, is_default: true });
    });

    it('allows a closure of 199 entries', () => {
      const ids = addChain(199);
      const context = allocator.requestContext(ids);

      expect(context.entry_count).toBe(199);
      expect(allocator.validateBounds(ids)).toBe(true);
    });

    it('refuses a closure of 200 entries before materializing anything', () => {
      const ids = addChain(200);

      let error: unknown;
      try {
        allocator.requestContext(ids);
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(EntryBoundsError);
      if (error instanceof EntryBoundsError) {
        expect(error.count).toBe(200);
        expect(error.limit).toBe(200);
        expect(error.message).toBe('Context requires 200 entries; must be fewer than 200');
      }
      expect(allocator.getUsageStats()).toEqual({ outstanding: 0, total_requests: 0, total_releases: 0 });
      expect(logger.warn).toHaveBeenCalledWith('Context request exceeds entry bounds', {
        requested: 200,
        count: 200,
        limit: 200,
      });
    });

    it('counts transitive parents toward the bound', () => {
      const ids = addChain(200);

      expect(allocator.resolveClosure([ctxId(199)])).toHaveLength(199);
      expect(allocator.validateBounds([ctxId(200)])).toBe(false);
      expect(() => allocator.requestContext([ctxId(200)])).toThrow(EntryBoundsError);
      expect(allocator.requestContext([ctxId(199)]).entry_ids[0]).toBe(ids[198]);
    });

    it('rejects a limit below 2', () => {
      expect(() => new ContextBudgetAllocator(store, { maxEntries: 1 })).toThrow(ValidationError);
    });

    it('splits ids into chunks under the limit', () => {
      const small = new ContextBudgetAllocator(store, { maxEntries: 3, logger });
      expect(small.splitIntoBatches(['a', 'b', 'c', 'd', 'e'])).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
      expect(small.getBoundsInfo()).toEqual({ max_entries: 3, is_default: false });
    });
  });

  describe('requestContext', () => {
    beforeEach(() => {
      store.add(makeInput({ id: A, content: 'abcdefgh', summary: 'root' }));
      store.add(makeInput({ id: B, parent_id: A, content: 'abcd', summary: 'child' }));
    });

    it('materializes the closure with full content', () => {
      const context = allocator.requestContext([B, MISSING]);

      expect(context.context_id).toBe('alloc_0001');
      expect(context.entry_ids).toEqual([B, A]);
      expect(context.entry_count).toBe(2);
      expect(context.total_tokens).toBe(3);
      expect(context.missing_ids).toEqual([MISSING]);
      expect(context.entries.map(e => [e.id, e.requested, e.content])).toEqual([
        [B, true, 'abcd'],
        [A, false, 'abcdefgh'],
      ]);
    });

    it('estimates compressed entries from their summary', () => {
      store.compress(A);
      const context = allocator.requestContext([A]);

      expect(context.entries[0]?.content).toBeUndefined();
      expect(context.total_tokens).toBe(1);
    });

    it('reports expired entries as missing', () => {
      store.add(makeInput({ id: C, created_at: new Date(Date.now() - 10_000), ttl: 1_000 }));
      const context = allocator.requestContext([A, C]);

      expect(context.entry_ids).toEqual([A]);
      expect(context.missing_ids).toEqual([C]);
    });

    it('hands out independent sequential handles', () => {
      const first = allocator.requestContext([A]);
      const second = allocator.requestContext([A]);

      expect([first.context_id, second.context_id]).toEqual(['alloc_0001', 'alloc_0002']);
      expect(allocator.getUsageStats()).toEqual({ outstanding: 2, total_requests: 2, total_releases: 0 });
    });
  });

  describe('release', () => {
    beforeEach(() => {
      store.add(makeInput({ id: A }));
      store.add(makeInput({ id: B, parent_id: A }));
    });

    it('releases a handle exactly once', () => {
      const context = allocator.requestContext([B]);
      expect(allocator.isInUse(A)).toBe(true);

      expect(allocator.releaseContext(context.context_id)).toBe(true);
      expect(allocator.releaseContext(context.context_id)).toBe(false);
      expect(allocator.releaseContext('alloc_9999')).toBe(false);

      expect(allocator.isInUse(A)).toBe(false);
      expect(store.contains(A)).toBe(true);
      expect(allocator.getUsageStats()).toEqual({ outstanding: 0, total_requests: 1, total_releases: 1 });
    });

    it('withContext releases after success', async () => {
      const count = await allocator.withContext([B], context => context.entry_count);

      expect(count).toBe(2);
      expect(allocator.getOutstanding()).toEqual([]);
    });

    it('withContext releases after a failure', async () => {
      await expect(
        allocator.withContext([B], async () => {
          throw new Error('worker crashed');
        }),
      ).rejects.toThrow('worker crashed');

      expect(allocator.getUsageStats()).toEqual({ outstanding: 0, total_requests: 1, total_releases: 1 });
    });

    it('reports unreleased allocations older than a threshold', () => {
      const context = allocator.requestContext([A]);

      expect(allocator.findLeaks(60_000)).toEqual([]);

      const leaks = allocator.findLeaks(1_000, Date.now() + 5_000);
      expect(leaks.map(l => l.context_id)).toEqual([context.context_id]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Context allocation not released',
        expect.objectContaining({ context_id: context.context_id, entries: 1 }),
      );
    });
  });

  describe('getWorkingContext', () => {
    it('is unbounded and summary-only', () => {
      for (let i = 1; i <= 250; i++) {
        store.add(makeInput({ id: ctxId(i), summary: 'abcd', created_at: new Date(i) }));
      }

      const working = allocator.getWorkingContext();

      expect(working.total_count).toBe(250);
      expect(working.summary_tokens).toBe(250);
      expect(working.entries.every(e => !('content' in e))).toBe(true);
    });
  });
});
