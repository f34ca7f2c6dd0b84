/**
 * Plain-object form of the store, used for checkpoint handoff.
 *
 * created_at travels as an ISO-8601 string (millisecond precision); absent
 * optional fields are omitted rather than written as null. Records written
 * with explicit nulls are still accepted on the way back in.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { createEntry, ENTRY_ID_PATTERN, ENTRY_TYPES, toValidationIssues, type ContextEntry, type EntryType } from './schema.js';

export interface SerializedEntry {
  id: string;
  entry_type: EntryType;
  source: string;
  content?: string;
  summary: string;
  created_at: string;
  references: string[];
  searchable: boolean;
  compressed: boolean;
  ttl?: number;
  parent_id?: string;
  derived_from: string[];
}

export type SerializedStore = Record<string, SerializedEntry>;

const serializedEntrySchema = z.object({
  id: z.string().regex(ENTRY_ID_PATTERN, 'must match ctx_ followed by 8 alphanumeric characters'),
  entry_type: z.enum(ENTRY_TYPES),
  source: z.string(),
  content: z.string().nullish(),
  summary: z.string(),
  created_at: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'must be a valid ISO-8601 timestamp'),
  references: z.array(z.string()).default([]),
  searchable: z.boolean().default(true),
  compressed: z.boolean().default(false),
  ttl: z.number().nullish(),
  parent_id: z.string().nullish(),
  derived_from: z.array(z.string()).default([]),
});

const serializedStoreSchema = z.record(z.string(), z.unknown());

export function serializeEntry(entry: ContextEntry): SerializedEntry {
  const data: SerializedEntry = {
    id: entry.id,
    entry_type: entry.entry_type,
    source: entry.source,
    summary: entry.summary,
    created_at: entry.created_at.toISOString(),
    references: [...entry.references],
    searchable: entry.searchable,
    compressed: entry.compressed,
    derived_from: [...entry.derived_from],
  };
  if (entry.content !== undefined) data.content = entry.content;
  if (entry.ttl !== undefined) data.ttl = entry.ttl;
  if (entry.parent_id !== undefined) data.parent_id = entry.parent_id;
  return data;
}

/**
 * Rebuild an entry from its serialized form.
 * @throws ValidationError with field paths for malformed records
 */
export function deserializeEntry(data: unknown): ContextEntry {
  const parsed = serializedEntrySchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error), 'serialized entry');
  }
  const { created_at, ...rest } = parsed.data;
  return createEntry({ ...rest, created_at: new Date(created_at) });
}

export function exportToDict(entries: Iterable<ContextEntry>): SerializedStore {
  const out: SerializedStore = {};
  for (const entry of entries) {
    out[entry.id] = serializeEntry(entry);
  }
  return out;
}

/**
 * Decode every record of a serialized store. Keys must match record ids.
 * @throws ValidationError naming the first offending key
 */
export function restoreEntries(data: unknown): ContextEntry[] {
  const parsed = serializedStoreSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error), 'serialized store');
  }

  const entries: ContextEntry[] = [];
  for (const [key, record] of Object.entries(parsed.data)) {
    let entry: ContextEntry;
    try {
      entry = deserializeEntry(record);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError(
          error.issues.map(issue => ({ field: `${key}.${issue.field}`, message: issue.message })),
          'serialized store',
        );
      }
      throw error;
    }
    if (entry.id !== key) {
      throw new ValidationError([{ field: `${key}.id`, message: `does not match its key (got '${entry.id}')` }], 'serialized store');
    }
    entries.push(entry);
  }
  return entries;
}
