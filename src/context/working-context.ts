/**
 * Summary-only view for the working LLM. Never carries content, so it is
 * legal at any store size.
 */

import type { ContextStore } from '../storage/context-store.js';
import type { ContextEntry } from '../storage/schema.js';
import type { ImplementationEntryView, WorkingContext, WorkingContextOptions, WorkingEntryView } from './types.js';
import { estimateWorkingEntryTokens } from './token-budget.js';

export function toWorkingView(entry: ContextEntry): WorkingEntryView {
  const view: WorkingEntryView = {
    id: entry.id,
    entry_type: entry.entry_type,
    source: entry.source,
    summary: entry.summary,
    created_at: entry.created_at.toISOString(),
    references: [...entry.references],
    compressed: entry.compressed,
  };
  if (entry.parent_id !== undefined) view.parent_id = entry.parent_id;
  return view;
}

export function toImplementationView(entry: ContextEntry, requested: boolean): ImplementationEntryView {
  const view: ImplementationEntryView = {
    ...toWorkingView(entry),
    derived_from: [...entry.derived_from],
    requested,
  };
  if (entry.content !== undefined) view.content = entry.content;
  return view;
}

function byCreation(a: ContextEntry, b: ContextEntry): number {
  const diff = a.created_at.getTime() - b.created_at.getTime();
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Build the working LLM's view: every live entry, oldest first.
 */
export function buildWorkingContext(store: ContextStore, options: WorkingContextOptions = {}): WorkingContext {
  const types = options.entryTypes?.length ? new Set(options.entryTypes) : undefined;
  const includeNonSearchable = options.includeNonSearchable ?? false;

  const entries = store
    .getAll()
    .filter(e => types === undefined || types.has(e.entry_type))
    .filter(e => includeNonSearchable || e.searchable)
    .sort(byCreation)
    .map(toWorkingView);

  return {
    entries,
    total_count: entries.length,
    summary_tokens: entries.reduce((sum, v) => sum + estimateWorkingEntryTokens(v), 0),
  };
}
