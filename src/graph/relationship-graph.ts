/**
 * Two independent DAGs over entry ids:
 *   - parentage:  child → parent (at most one), parent → children
 *   - derivation: derived → sources, source → derived
 *
 * Nodes are ids only; the ContextStore map owns the entries themselves.
 * Cycle checks walk the ancestry of the prospective target before an edge is
 * committed, so a rejected link leaves the graph untouched.
 */

import { RelationshipError } from '../storage/errors.js';

type Adjacency = Map<string, Set<string>>;

function addEdge(adjacency: Adjacency, from: string, to: string): void {
  let set = adjacency.get(from);
  if (!set) {
    set = new Set();
    adjacency.set(from, set);
  }
  set.add(to);
}

function removeEdge(adjacency: Adjacency, from: string, to: string): void {
  const set = adjacency.get(from);
  if (!set) return;
  set.delete(to);
  if (set.size === 0) adjacency.delete(from);
}

/**
 * Depth-first pre-order walk from `start` (exclusive) following `next`.
 * The visited set makes it terminate even on malformed input.
 */
function walk(start: string, next: (id: string) => Iterable<string>): string[] {
  const visited = new Set<string>([start]);
  const order: string[] = [];
  const stack = [...next(start)].reverse();
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    order.push(id);
    const neighbours = [...next(id)];
    for (let i = neighbours.length - 1; i >= 0; i--) {
      const n = neighbours[i];
      if (n !== undefined && !visited.has(n)) stack.push(n);
    }
  }
  return order;
}

export class RelationshipGraph {
  private parentOf = new Map<string, string>();
  private childrenOf: Adjacency = new Map();
  private sourcesOf: Adjacency = new Map();
  private derivedOf: Adjacency = new Map();

  // ── Parentage ──────────────────────────────────────────────────────

  canLinkParent(childId: string, parentId: string): boolean {
    if (childId === parentId) return false;
    return !this.getAncestors(parentId).includes(childId);
  }

  /**
   * Record `childId → parentId`, replacing any previous parent of the child.
   * @throws RelationshipError when the edge would make the child its own ancestor
   */
  linkParent(childId: string, parentId: string): void {
    if (!this.canLinkParent(childId, parentId)) {
      throw new RelationshipError(
        'cycle',
        childId,
        parentId,
        `Linking '${childId}' under parent '${parentId}' would create a cycle`,
      );
    }
    this.unlinkParent(childId);
    this.parentOf.set(childId, parentId);
    addEdge(this.childrenOf, parentId, childId);
  }

  getParent(id: string): string | undefined {
    return this.parentOf.get(id);
  }

  getChildren(id: string): string[] {
    return [...(this.childrenOf.get(id) ?? [])];
  }

  /** Parent chain, nearest first. */
  getAncestors(id: string): string[] {
    const ancestors: string[] = [];
    const seen = new Set<string>([id]);
    let current = this.parentOf.get(id);
    while (current !== undefined && !seen.has(current)) {
      ancestors.push(current);
      seen.add(current);
      current = this.parentOf.get(current);
    }
    return ancestors;
  }

  /** Full child subtree, depth-first pre-order. */
  getDescendants(id: string): string[] {
    return walk(id, n => this.childrenOf.get(n) ?? []);
  }

  // ── Derivation ─────────────────────────────────────────────────────

  canLinkDerivation(derivedId: string, sourceIds: readonly string[]): boolean {
    for (const sourceId of sourceIds) {
      if (sourceId === derivedId) return false;
      if (this.getDerivationChain(sourceId).includes(derivedId)) return false;
    }
    return true;
  }

  /**
   * Record `derivedId` as derived from every id in `sourceIds`. All edges are
   * checked before any is written.
   * @throws RelationshipError when any edge would make the entry derived from itself
   */
  linkDerivation(derivedId: string, sourceIds: readonly string[]): void {
    for (const sourceId of sourceIds) {
      if (!this.canLinkDerivation(derivedId, [sourceId])) {
        throw new RelationshipError(
          'cycle',
          derivedId,
          sourceId,
          `Deriving '${derivedId}' from '${sourceId}' would create a cycle`,
        );
      }
    }
    for (const sourceId of sourceIds) {
      addEdge(this.sourcesOf, derivedId, sourceId);
      addEdge(this.derivedOf, sourceId, derivedId);
    }
  }

  getSourceEntries(id: string): string[] {
    return [...(this.sourcesOf.get(id) ?? [])];
  }

  getDerivedEntries(id: string): string[] {
    return [...(this.derivedOf.get(id) ?? [])];
  }

  /** Every entry `id` was transitively derived from. */
  getDerivationChain(id: string): string[] {
    return walk(id, n => this.sourcesOf.get(n) ?? []);
  }

  /** Every entry transitively derived from `id`. */
  getImpactScope(id: string): string[] {
    return walk(id, n => this.derivedOf.get(n) ?? []);
  }

  /**
   * Everything downstream of `id` in either graph: children, derived
   * entries, and theirs, depth-first pre-order.
   */
  getLineageDescendants(id: string): string[] {
    return walk(id, n => [...(this.childrenOf.get(n) ?? []), ...(this.derivedOf.get(n) ?? [])]);
  }

  // ── Closure ────────────────────────────────────────────────────────

  /**
   * Requested ids first (deduplicated, in order), followed by every
   * transitive parent and source they depend on.
   */
  getDependencyClosure(ids: readonly string[]): string[] {
    const closure = new Set<string>(ids);
    const stack = [...closure].reverse();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) continue;
      const deps: string[] = [];
      const parent = this.parentOf.get(id);
      if (parent !== undefined) deps.push(parent);
      deps.push(...(this.sourcesOf.get(id) ?? []));
      for (let i = deps.length - 1; i >= 0; i--) {
        const dep = deps[i];
        if (dep !== undefined && !closure.has(dep)) {
          closure.add(dep);
          stack.push(dep);
        }
      }
    }
    return [...closure];
  }

  // ── Removal ────────────────────────────────────────────────────────

  /**
   * Drop the edges `id` itself declared (its parent edge and source edges).
   * Entries pointing at `id` keep their edges.
   */
  detach(id: string): void {
    this.unlinkParent(id);
    for (const sourceId of this.sourcesOf.get(id) ?? []) {
      removeEdge(this.derivedOf, sourceId, id);
    }
    this.sourcesOf.delete(id);
  }

  /**
   * Remove `id` from both graphs. Children and derived entries are orphaned,
   * not deleted: they lose the edge to `id` and nothing else.
   *
   * @returns ids of the orphaned dependents
   */
  unlink(id: string): string[] {
    this.detach(id);

    const orphaned = new Set<string>();
    for (const childId of this.childrenOf.get(id) ?? []) {
      this.parentOf.delete(childId);
      orphaned.add(childId);
    }
    this.childrenOf.delete(id);

    for (const derivedId of this.derivedOf.get(id) ?? []) {
      removeEdge(this.sourcesOf, derivedId, id);
      orphaned.add(derivedId);
    }
    this.derivedOf.delete(id);

    return [...orphaned];
  }

  clear(): void {
    this.parentOf.clear();
    this.childrenOf.clear();
    this.sourcesOf.clear();
    this.derivedOf.clear();
  }

  private unlinkParent(childId: string): void {
    const previous = this.parentOf.get(childId);
    if (previous === undefined) return;
    removeEdge(this.childrenOf, previous, childId);
    this.parentOf.delete(childId);
  }
}
