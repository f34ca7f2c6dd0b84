/**
 * Store change notifications.
 *
 * The store depends only on `EventBus`, so the in-process LocalEventBus can
 * be replaced by a broker-backed implementation without touching it.
 */

import type { EntryType } from '../storage/schema.js';

export type ContextEventType = 'entry_added' | 'entry_updated' | 'entry_removed' | 'entry_compressed';

export interface ContextEvent {
  /** Per-bus sequence number, starting at 1 */
  seq: number;
  type: ContextEventType;
  id: string;
  entry_type: EntryType;
  ts: string;
}

/** Narrows delivery and replay. Omitted fields match everything. */
export interface ContextEventFilter {
  ids?: readonly string[];
  types?: readonly ContextEventType[];
}

export type ContextEventCallback = (event: ContextEvent) => void;

export interface EventBus {
  emit(event: Omit<ContextEvent, 'seq'>): void;
  /** @returns a function that removes this subscription */
  subscribe(callback: ContextEventCallback, filter?: ContextEventFilter): () => void;
  unsubscribe(callback: ContextEventCallback): void;
  /** Buffered events with seq greater than `seq`, oldest first */
  replaySince(seq: number, filter?: ContextEventFilter): ContextEvent[];
}

export function matchesFilter(event: ContextEvent, filter: ContextEventFilter | undefined): boolean {
  if (!filter) return true;
  if (filter.ids && !filter.ids.includes(event.id)) return false;
  if (filter.types && !filter.types.includes(event.type)) return false;
  return true;
}
