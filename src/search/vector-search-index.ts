/**
 * TF-IDF vector index with cosine-similarity ranking.
 *
 * Architecture:
 *   text → tokenize → term counts ┐
 *                                  ├→ tf × idf sparse vector → cosine vs. query vector → ranked hits
 *   document frequencies → idf ────┘
 *
 * idf = log(N / df). Every add or remove changes N, so weights are refreshed
 * lazily on the next search rather than on every mutation.
 */

import { tokenize, countTerms } from './tokenizer.js';
import type { IndexSearchOptions, SearchHit, SearchIndex } from './types.js';

export type SparseVector = Map<string, number>;

interface IndexedDocument {
  termCounts: Map<string, number>;
  vector: SparseVector;
  magnitude: number;
}

export function vectorMagnitude(vector: SparseVector): number {
  let sum = 0;
  for (const weight of vector.values()) sum += weight * weight;
  return Math.sqrt(sum);
}

/**
 * Sparse dot product. Iterates the smaller vector, so cost is bounded by the
 * overlap candidates rather than the vocabulary.
 */
export function sparseDot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, weight] of small) {
    const other = large.get(term);
    if (other !== undefined) dot += weight * other;
  }
  return dot;
}

/**
 * Cosine similarity with precomputed magnitudes.
 * Zero-magnitude vectors (empty, or only zero-idf terms) score 0.
 */
export function cosineSimilarity(a: SparseVector, aMagnitude: number, b: SparseVector, bMagnitude: number): number {
  if (aMagnitude === 0 || bMagnitude === 0) return 0;
  return sparseDot(a, b) / (aMagnitude * bMagnitude);
}

function compareHits(a: SearchHit, b: SearchHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class VectorSearchIndex implements SearchIndex {
  private documents = new Map<string, IndexedDocument>();
  private documentFrequency = new Map<string, number>();
  private idf = new Map<string, number>();
  private stale = false;

  get size(): number {
    return this.documents.size;
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  /** Vocabulary size (distinct terms across all documents). */
  get termCount(): number {
    return this.documentFrequency.size;
  }

  /**
   * Index `text` under `id`, replacing any previous document with that id.
   */
  add(id: string, text: string): void {
    if (this.documents.has(id)) this.remove(id);

    const termCounts = countTerms(tokenize(text));
    for (const term of termCounts.keys()) {
      this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
    }
    this.documents.set(id, { termCounts, vector: new Map(), magnitude: 0 });
    this.stale = true;
  }

  remove(id: string): boolean {
    const doc = this.documents.get(id);
    if (!doc) return false;

    for (const term of doc.termCounts.keys()) {
      const df = (this.documentFrequency.get(term) ?? 1) - 1;
      if (df <= 0) {
        this.documentFrequency.delete(term);
      } else {
        this.documentFrequency.set(term, df);
      }
    }
    this.documents.delete(id);
    this.stale = true;
    return true;
  }

  clear(): void {
    this.documents.clear();
    this.documentFrequency.clear();
    this.idf.clear();
    this.stale = false;
  }

  /** Current idf weight of a term; 0 for terms outside the vocabulary. */
  getIdf(term: string): number {
    this.refresh();
    return this.idf.get(term) ?? 0;
  }

  /** Stored tf-idf vector for a document, if indexed. */
  getVector(id: string): SparseVector | undefined {
    this.refresh();
    const doc = this.documents.get(id);
    return doc ? new Map(doc.vector) : undefined;
  }

  /**
   * Rank indexed documents against `query`.
   *
   * Results are sorted by score descending, ties broken by ascending id.
   * Malformed or empty input yields an empty list.
   */
  search(query: string, limit = 10, options: IndexSearchOptions = {}): SearchHit[] {
    if (typeof query !== 'string' || this.documents.size === 0 || !(limit > 0)) return [];

    const terms = tokenize(query);
    if (terms.length === 0) return [];

    this.refresh();
    const queryVector = this.weigh(countTerms(terms));
    const queryMagnitude = vectorMagnitude(queryVector);
    if (queryMagnitude === 0) return [];

    const { minScore, filter } = options;
    const hits: SearchHit[] = [];
    for (const [id, doc] of this.documents) {
      if (filter && !filter(id)) continue;
      const score = cosineSimilarity(queryVector, queryMagnitude, doc.vector, doc.magnitude);
      if (minScore !== undefined && score < minScore) continue;
      hits.push({ id, score });
    }

    return hits.sort(compareHits).slice(0, limit);
  }

  private weigh(termCounts: Map<string, number>): SparseVector {
    const vector: SparseVector = new Map();
    for (const [term, tf] of termCounts) {
      const idf = this.idf.get(term);
      if (idf !== undefined) vector.set(term, tf * idf);
    }
    return vector;
  }

  private refresh(): void {
    if (!this.stale) return;

    const total = this.documents.size;
    this.idf.clear();
    for (const [term, df] of this.documentFrequency) {
      this.idf.set(term, Math.log(total / df));
    }
    for (const doc of this.documents.values()) {
      doc.vector = this.weigh(doc.termCounts);
      doc.magnitude = vectorMagnitude(doc.vector);
    }
    this.stale = false;
  }
}
