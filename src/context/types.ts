/**
 * Views of the store handed to the two LLM roles.
 *
 * The working (orchestrator) LLM sees every live entry as a summary-only
 * view; the implementation LLM sees full content for a bounded closure of
 * requested entries.
 */

import type { EntryType } from '../storage/schema.js';

// ── Working context ─────────────────────────────────────────────────

export interface WorkingEntryView {
  id: string;
  entry_type: EntryType;
  source: string;
  summary: string;
  created_at: string;
  references: string[];
  parent_id?: string;
  compressed: boolean;
}

export interface WorkingContextOptions {
  /** Restrict to these entry types */
  entryTypes?: EntryType[];
  /** Include entries marked searchable: false. Default: false */
  includeNonSearchable?: boolean;
}

export interface WorkingContext {
  entries: WorkingEntryView[];
  total_count: number;
  /** Estimated tokens across all summaries */
  summary_tokens: number;
}

// ── Implementation context ──────────────────────────────────────────

export interface ImplementationEntryView extends WorkingEntryView {
  /** Full content; absent for compressed entries */
  content?: string;
  derived_from: string[];
  /** False for entries pulled in as parent/source dependencies */
  requested: boolean;
}

export interface ImplementationContext {
  /** Opaque allocation handle for releaseContext() */
  context_id: string;
  entries: ImplementationEntryView[];
  entry_ids: string[];
  entry_count: number;
  total_tokens: number;
  /** Requested ids that were missing or expired */
  missing_ids: string[];
}

export interface AllocationRecord {
  context_id: string;
  entry_ids: string[];
  created_at: string;
}

export interface AllocationStats {
  outstanding: number;
  total_requests: number;
  total_releases: number;
}
