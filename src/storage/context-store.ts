import { RelationshipGraph } from '../graph/relationship-graph.js';
import { VectorSearchIndex } from '../search/vector-search-index.js';
import type { SearchIndex, StoreSearchOptions, StoreSearchResult } from '../search/types.js';
import type { ContextEventType, EventBus } from '../events/event-bus.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { NotFoundError, RelationshipError, ValidationError } from './errors.js';
import {
  cloneEntry,
  compressEntry,
  createEntry,
  indexableText,
  isExpired,
  type ContextEntry,
  type ContextEntryInput,
  type EntryType,
} from './schema.js';
import { exportToDict, restoreEntries, type SerializedStore } from './serialization.js';

export interface ContextStoreOptions {
  /** Receives entry_added / entry_updated / entry_removed / entry_compressed */
  events?: EventBus;
  logger?: Logger;
  /** Defaults to a fresh TF-IDF VectorSearchIndex */
  index?: SearchIndex;
}

export interface StoreStats {
  total: number;
  byType: Record<EntryType, number>;
}

/**
 * Composes the entry map, the search index and the relationship graph.
 * Every mutation validates first and only then touches state, so a rejected
 * add leaves the store exactly as it was. Callers only ever receive copies;
 * stored records are replaced, never edited in place.
 *
 * One instance per owner: construct it where the pipeline is assembled and
 * pass it to collaborators.
 */
export class ContextStore {
  private entries = new Map<string, ContextEntry>();
  private index: SearchIndex;
  private graph = new RelationshipGraph();
  private events?: EventBus;
  private logger: Logger;

  constructor(options: ContextStoreOptions = {}) {
    this.index = options.index ?? new VectorSearchIndex();
    this.events = options.events;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Physical entry count, expired rows included. */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Validate and insert an entry. An existing id is updated: payload fields
   * (source, content, summary, references, searchable, ttl) are replaced,
   * while created_at, entry_type, parent_id and derived_from stay fixed and
   * compression stays one-way.
   *
   * @throws ValidationError for a malformed entry, or an update that changes
   *   entry_type or created_at or restores content on a compressed entry
   * @throws RelationshipError for a dangling reference, a cycle, or an update
   *   that changes parent_id or derived_from
   */
  add(input: ContextEntryInput): ContextEntry {
    const existing = input.id !== undefined ? this.entries.get(input.id) : undefined;
    const entry = existing ? mergeUpdate(existing, input) : createEntry(input, id => this.entries.has(id));

    if (!existing) this.checkRelationships(entry);

    this.entries.set(entry.id, entry);
    if (!existing) {
      if (entry.parent_id !== undefined) this.graph.linkParent(entry.id, entry.parent_id);
      if (entry.derived_from.length > 0) this.graph.linkDerivation(entry.id, entry.derived_from);
    }
    this.syncIndex(entry);

    this.emit(existing ? 'entry_updated' : 'entry_added', entry);
    this.logger.debug(existing ? 'Context entry updated' : 'Context entry added', {
      id: entry.id,
      entry_type: entry.entry_type,
    });
    return cloneEntry(entry);
  }

  /** Returns undefined for missing and for expired entries. */
  get(id: string): ContextEntry | undefined {
    const entry = this.entries.get(id);
    if (!entry || isExpired(entry)) return undefined;
    return cloneEntry(entry);
  }

  getAll(includeExpired = false): ContextEntry[] {
    const now = Date.now();
    return [...this.entries.values()].filter(e => includeExpired || !isExpired(e, now)).map(cloneEntry);
  }

  getByType(type: EntryType, includeExpired = false): ContextEntry[] {
    return this.getAll(includeExpired).filter(e => e.entry_type === type);
  }

  /** Physical presence, regardless of expiry. */
  contains(id: string): boolean {
    return this.entries.has(id);
  }

  isExpired(id: string, now: number = Date.now()): boolean {
    const entry = this.entries.get(id);
    return entry !== undefined && isExpired(entry, now);
  }

  /** Snapshot of ids whose TTL has elapsed. */
  getExpiredIds(now: number = Date.now()): string[] {
    const ids: string[] = [];
    for (const entry of this.entries.values()) {
      if (isExpired(entry, now)) ids.push(entry.id);
    }
    return ids;
  }

  /**
   * Delete an entry, its index document and its graph edges. Children and
   * derived entries are orphaned, not deleted.
   *
   * @returns false when the id was not present
   */
  remove(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;

    this.entries.delete(id);
    this.index.remove(id);
    const orphaned = this.graph.unlink(id);

    this.emit('entry_removed', entry);
    this.logger.debug('Context entry removed', { id, orphaned: orphaned.length });
    return true;
  }

  /**
   * Drop an entry's content and keep its summary. The entry stays searchable
   * under the summary. Compressing twice is a no-op.
   *
   * @throws NotFoundError when the id is not present
   */
  compress(id: string): ContextEntry {
    const entry = this.entries.get(id);
    if (!entry) throw new NotFoundError(id);
    if (entry.compressed) return cloneEntry(entry);

    const compressed = compressEntry(entry);
    this.entries.set(id, compressed);
    this.syncIndex(compressed);

    this.emit('entry_compressed', compressed);
    this.logger.debug('Context entry compressed', { id });
    return cloneEntry(compressed);
  }

  /**
   * Ranked search over live, searchable entries. Expired, non-searchable and
   * type-filtered entries are removed before `limit` is applied. Never
   * throws; a failure is logged and yields no results.
   */
  search(query: string, limit = 10, options: StoreSearchOptions = {}): StoreSearchResult[] {
    try {
      const now = Date.now();
      const types = options.entryTypes?.length ? new Set<EntryType>(options.entryTypes) : undefined;
      const hits = this.index.search(query, limit, {
        minScore: options.minScore,
        filter: id => {
          const entry = this.entries.get(id);
          if (!entry || !entry.searchable || isExpired(entry, now)) return false;
          return types === undefined || types.has(entry.entry_type);
        },
      });

      const results: StoreSearchResult[] = [];
      for (const hit of hits) {
        const entry = this.entries.get(hit.id);
        if (entry) results.push(toSearchResult(entry, hit.score, options.includeContent ?? false));
      }
      return results;
    } catch (error) {
      this.logger.error('Context search failed', {
        query,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  getStats(): StoreStats {
    const byType = emptyTypeCounts();
    let total = 0;
    for (const entry of this.getAll()) {
      byType[entry.entry_type] += 1;
      total += 1;
    }
    return { total, byType };
  }

  // ── Relationship queries ───────────────────────────────────────────

  getParent(id: string): string | undefined {
    return this.graph.getParent(id);
  }

  getChildren(id: string): string[] {
    return this.graph.getChildren(id);
  }

  getAncestors(id: string): string[] {
    return this.graph.getAncestors(id);
  }

  /** Children and derived entries, transitively. */
  getDescendants(id: string): string[] {
    return this.graph.getLineageDescendants(id);
  }

  getSourceEntries(id: string): string[] {
    return this.graph.getSourceEntries(id);
  }

  getDerivedEntries(id: string): string[] {
    return this.graph.getDerivedEntries(id);
  }

  getDerivationChain(id: string): string[] {
    return this.graph.getDerivationChain(id);
  }

  getImpactScope(id: string): string[] {
    return this.graph.getImpactScope(id);
  }

  getDependencyClosure(ids: readonly string[]): string[] {
    return this.graph.getDependencyClosure(ids);
  }

  // ── Serialization ──────────────────────────────────────────────────

  /** Every physical entry, expired included, keyed by id. */
  exportToDict(): SerializedStore {
    return exportToDict(this.entries.values());
  }

  /**
   * Rebuild a store from exportToDict() output. References to entries absent
   * from the data (orphans) are kept on the entry but not linked.
   *
   * @throws ValidationError for malformed records
   * @throws RelationshipError when the data contains a cycle
   */
  static deserialize(data: unknown, options: ContextStoreOptions = {}): ContextStore {
    const store = new ContextStore(options);
    store.restore(restoreEntries(data));
    return store;
  }

  // ── Internals ──────────────────────────────────────────────────────

  private restore(entries: ContextEntry[]): void {
    for (const entry of entries) {
      this.entries.set(entry.id, entry);
    }
    for (const entry of entries) {
      if (entry.parent_id !== undefined && this.entries.has(entry.parent_id)) {
        this.graph.linkParent(entry.id, entry.parent_id);
      }
      const sources = entry.derived_from.filter(id => this.entries.has(id));
      if (sources.length > 0) this.graph.linkDerivation(entry.id, sources);
    }
    for (const entry of entries) {
      this.syncIndex(entry);
    }
    this.logger.info('Context store restored', { entries: entries.length });
  }

  private checkRelationships(entry: ContextEntry): void {
    const { id, parent_id, derived_from } = entry;

    if (parent_id !== undefined) {
      if (!this.entries.has(parent_id)) {
        throw new RelationshipError('missing_reference', id, parent_id, `Parent '${parent_id}' of '${id}' does not exist`);
      }
      if (!this.graph.canLinkParent(id, parent_id)) {
        throw new RelationshipError('cycle', id, parent_id, `Linking '${id}' under parent '${parent_id}' would create a cycle`);
      }
    }

    for (const sourceId of derived_from) {
      if (!this.entries.has(sourceId)) {
        throw new RelationshipError('missing_reference', id, sourceId, `Source '${sourceId}' of '${id}' does not exist`);
      }
      if (!this.graph.canLinkDerivation(id, [sourceId])) {
        throw new RelationshipError('cycle', id, sourceId, `Deriving '${id}' from '${sourceId}' would create a cycle`);
      }
    }
  }

  private syncIndex(entry: ContextEntry): void {
    if (entry.searchable) {
      this.index.add(entry.id, indexableText(entry));
    } else {
      this.index.remove(entry.id);
    }
  }

  private emit(type: ContextEventType, entry: ContextEntry): void {
    this.events?.emit({ type, id: entry.id, entry_type: entry.entry_type, ts: new Date().toISOString() });
  }
}

function toSearchResult(entry: ContextEntry, score: number, includeContent: boolean): StoreSearchResult {
  const result: StoreSearchResult = {
    entry_id: entry.id,
    entry_type: entry.entry_type,
    source: entry.source,
    summary: entry.summary,
    score,
    references: [...entry.references],
    compressed: entry.compressed,
  };
  if (entry.parent_id !== undefined) result.parent_id = entry.parent_id;
  if (includeContent && entry.content !== undefined) result.content = entry.content;
  return result;
}

/**
 * Build the replacement record for an update of `existing`. Omitted
 * parent_id, derived_from and created_at keep their stored values; supplied
 * ones must match them.
 */
function mergeUpdate(existing: ContextEntry, input: ContextEntryInput): ContextEntry {
  const { id } = existing;
  if (existing.compressed && input.content !== undefined && input.content !== null) {
    throw new ValidationError([{ field: 'content', message: 'cannot be restored on a compressed entry' }]);
  }

  const entry = createEntry({
    ...input,
    created_at: input.created_at ?? existing.created_at,
    parent_id: input.parent_id === undefined ? existing.parent_id : input.parent_id,
    derived_from: input.derived_from ?? existing.derived_from,
    compressed: existing.compressed || (input.compressed ?? false),
  });

  if (entry.entry_type !== existing.entry_type) {
    throw new ValidationError([{ field: 'entry_type', message: `cannot change from '${existing.entry_type}' on update` }]);
  }
  if (entry.created_at.getTime() !== existing.created_at.getTime()) {
    throw new ValidationError([{ field: 'created_at', message: 'is immutable' }]);
  }
  if (entry.parent_id !== existing.parent_id) {
    throw new RelationshipError(
      'immutable',
      id,
      entry.parent_id ?? existing.parent_id ?? '',
      `Parent of '${id}' cannot change after insertion`,
    );
  }
  const before = new Set(existing.derived_from);
  const changed =
    entry.derived_from.find(source => !before.has(source)) ??
    existing.derived_from.find(source => !entry.derived_from.includes(source));
  if (changed !== undefined) {
    throw new RelationshipError('immutable', id, changed, `Sources of '${id}' cannot change after insertion`);
  }
  return entry;
}

function emptyTypeCounts(): Record<EntryType, number> {
  return {
    file: 0,
    command: 0,
    command_result: 0,
    task: 0,
    task_result: 0,
    search_result: 0,
    summary: 0,
    context_request: 0,
  };
}
