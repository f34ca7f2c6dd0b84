import type { EntryType } from '../storage/schema.js';

/**
 * A single ranked hit from the vector index
 */
export interface SearchHit {
  id: string;
  /** Cosine similarity in [0, 1] */
  score: number;
}

/**
 * Index-level search options
 */
export interface IndexSearchOptions {
  /** Drop hits scoring below this value */
  minScore?: number;
  /** Applied before `limit`; return false to exclude a document */
  filter?: (id: string) => boolean;
}

/**
 * Store-level search options
 */
export interface StoreSearchOptions {
  minScore?: number;
  /** Restrict results to these entry types */
  entryTypes?: EntryType[];
  /** Attach full content to each result (summary view otherwise) */
  includeContent?: boolean;
}

/**
 * Search result with entry metadata, as returned by ContextStore.search().
 */
export interface StoreSearchResult {
  entry_id: string;
  entry_type: EntryType;
  source: string;
  summary: string;
  /** Present only when includeContent was requested and the entry is uncompressed */
  content?: string;
  score: number;
  references: string[];
  parent_id?: string;
  compressed: boolean;
}

/**
 * Abstract index interface.
 * The store only depends on this, so the TF-IDF index can be swapped.
 */
export interface SearchIndex {
  add(id: string, text: string): void;
  remove(id: string): boolean;
  has(id: string): boolean;
  search(query: string, limit?: number, options?: IndexSearchOptions): SearchHit[];
  readonly size: number;
}
