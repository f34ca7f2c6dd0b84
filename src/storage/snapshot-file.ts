/**
 * JSON snapshot of a store on disk, for handing a checkpoint from one
 * process to the next.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ContextStore, type ContextStoreOptions } from './context-store.js';
import { ValidationError } from './errors.js';
import { toValidationIssues } from './schema.js';
import type { SerializedStore } from './serialization.js';

export const SNAPSHOT_VERSION = 1;

export interface SnapshotFile {
  version: typeof SNAPSHOT_VERSION;
  saved_at: string;
  entries: SerializedStore;
}

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION, {
    errorMap: () => ({ message: `unsupported snapshot version (expected ${SNAPSHOT_VERSION})` }),
  }),
  saved_at: z.string(),
  entries: z.record(z.string(), z.unknown()),
});

export function saveSnapshot(store: ContextStore, filePath: string): SnapshotFile {
  const snapshot: SnapshotFile = {
    version: SNAPSHOT_VERSION,
    saved_at: new Date().toISOString(),
    entries: store.exportToDict(),
  };
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(snapshot, null, 2) + '\n', 'utf-8');
  return snapshot;
}

/**
 * Rebuild a store from a snapshot file.
 *
 * @returns null when the file does not exist
 * @throws ValidationError for unreadable JSON, an unknown version or malformed entries
 */
export function loadSnapshot(filePath: string, options: ContextStoreOptions = {}): ContextStore | null {
  if (!existsSync(filePath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError([{ field: 'file', message: `not valid JSON (${message})` }], 'snapshot');
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error), 'snapshot');
  }
  return ContextStore.deserialize(parsed.data.entries, options);
}
