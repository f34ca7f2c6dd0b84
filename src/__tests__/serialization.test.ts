import { describe, it, expect } from 'vitest';
import { ContextStore } from '../storage/context-store.js';
import { RelationshipError, ValidationError } from '../storage/errors.js';
import { createEntry } from '../storage/schema.js';
import { deserializeEntry, restoreEntries, serializeEntry } from '../storage/serialization.js';
import { createTestLogger, ctxId, makeInput } from './helpers/fixtures.js';

const A = ctxId(1);
const B = ctxId(2);
const C = ctxId(3);

function serialized(overrides: Record<string, unknown> = {}) {
  return {
    id: A,
    entry_type: 'file',
    source: 'src/app.ts',
    summary: 'Exports the answer constant',
    created_at: '2026-02-03T04:05:06.789Z',
    ...overrides,
  };
}

describe('serializeEntry / deserializeEntry', () => {
  it('round-trips every field at millisecond precision', () => {
    const entry = createEntry(
      makeInput({
        id: C,
        entry_type: 'task_result',
        created_at: new Date('2026-02-03T04:05:06.789Z'),
        references: ['src/a.ts', 'src/b.ts'],
        searchable: false,
        ttl: 5_000,
        parent_id: A,
        derived_from: [A, B],
      }),
    );

    const restored = deserializeEntry(serializeEntry(entry));

    expect(restored).toEqual(entry);
    expect(restored.created_at.getTime()).toBe(entry.created_at.getTime());
  });

  it('writes created_at as ISO-8601 and omits absent fields', () => {
    const entry = createEntry(makeInput({ id: A, compressed: true, content: undefined, created_at: new Date(0) }));
    const data = serializeEntry(entry);

    expect(data.created_at).toBe('1970-01-01T00:00:00.000Z');
    expect(Object.keys(data).sort()).toEqual([
      'compressed',
      'created_at',
      'derived_from',
      'entry_type',
      'id',
      'references',
      'searchable',
      'source',
      'summary',
    ]);
  });

  it('accepts explicit nulls and fills defaults', () => {
    const entry = deserializeEntry(serialized({ content: null, ttl: null, parent_id: null }));

    expect('content' in entry).toBe(false);
    expect('ttl' in entry).toBe(false);
    expect('parent_id' in entry).toBe(false);
    expect(entry.references).toEqual([]);
    expect(entry.derived_from).toEqual([]);
    expect(entry.searchable).toBe(true);
    expect(entry.compressed).toBe(false);
  });

  it('rejects an unparseable timestamp', () => {
    expect(() => deserializeEntry(serialized({ created_at: 'yesterday' }))).toThrow(
      'Invalid serialized entry: created_at: must be a valid ISO-8601 timestamp',
    );
  });
});

describe('restoreEntries', () => {
  it('requires keys to match record ids', () => {
    expect(() => restoreEntries({ [B]: serialized() })).toThrow(ValidationError);
    expect(() => restoreEntries({ [B]: serialized() })).toThrow(`${B}.id: does not match its key`);
  });

  it('prefixes issue fields with the record key', () => {
    let error: unknown;
    try {
      restoreEntries({ [A]: serialized({ entry_type: 'note' }) });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.issues.map(i => i.field)).toEqual([`${A}.entry_type`]);
    }
  });

  it('rejects data that is not an object', () => {
    expect(() => restoreEntries(42)).toThrow(ValidationError);
  });
});

describe('ContextStore export / deserialize', () => {
  it('rebuilds entries, relationships and the search index', () => {
    const store = new ContextStore({ logger: createTestLogger() });
    store.add(makeInput({ id: A, content: 'parse the config file' }));
    store.add(makeInput({ id: B, parent_id: A, content: 'render the html template' }));
    store.add(makeInput({ id: C, derived_from: [A, B], content: 'summary of both' }));

    const restored = ContextStore.deserialize(store.exportToDict(), { logger: createTestLogger() });

    expect(restored.exportToDict()).toEqual(store.exportToDict());
    expect(restored.getAncestors(B)).toEqual([A]);
    expect(new Set(restored.getDerivationChain(C))).toEqual(new Set([A, B]));
    expect(restored.search('config')[0]?.entry_id).toBe(A);
  });

  it('keeps orphaned references without linking them', () => {
    const store = new ContextStore({ logger: createTestLogger() });
    store.add(makeInput({ id: A }));
    store.add(makeInput({ id: B, parent_id: A, derived_from: [A] }));
    store.remove(A);

    const restored = ContextStore.deserialize(store.exportToDict(), { logger: createTestLogger() });

    expect(restored.get(B)?.parent_id).toBe(A);
    expect(restored.get(B)?.derived_from).toEqual([A]);
    expect(restored.getParent(B)).toBeUndefined();
    expect(restored.getSourceEntries(B)).toEqual([]);
  });

  it('exports expired entries too', () => {
    const store = new ContextStore({ logger: createTestLogger() });
    store.add(makeInput({ id: A, created_at: new Date(Date.now() - 10_000), ttl: 1_000 }));

    expect(Object.keys(store.exportToDict())).toEqual([A]);
  });

  it('rejects data containing a parent cycle', () => {
    const data = {
      [A]: serialized({ id: A, parent_id: B }),
      [B]: serialized({ id: B, parent_id: A }),
    };
    expect(() => ContextStore.deserialize(data, { logger: createTestLogger() })).toThrow(RelationshipError);
  });
});
