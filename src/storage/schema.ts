import { randomInt } from 'node:crypto';
import { z } from 'zod';
import { ValidationError, type ValidationIssue } from './errors.js';

// ============================================================================
// Entry Type
// ============================================================================

/**
 * - file: file content from the codebase
 * - command / command_result: a command invocation and what it produced
 * - task / task_result: work handed to an implementation LLM and its outcome
 * - search_result: output of a search or grep
 * - summary: compressed digest of other entries
 * - context_request: a worker asking for more context
 */
export const ENTRY_TYPES = [
  'file',
  'command',
  'command_result',
  'task',
  'task_result',
  'search_result',
  'summary',
  'context_request',
] as const;
export type EntryType = (typeof ENTRY_TYPES)[number];

export function isEntryType(value: unknown): value is EntryType {
  return typeof value === 'string' && ENTRY_TYPES.some(t => t === value);
}

// ============================================================================
// Entry ID
// ============================================================================

export const ENTRY_ID_PREFIX = 'ctx_';
const ENTRY_ID_LENGTH = 8;
const ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export const ENTRY_ID_PATTERN = /^ctx_[A-Za-z0-9]{8}$/;

export function isValidEntryId(id: unknown): id is string {
  return typeof id === 'string' && ENTRY_ID_PATTERN.test(id);
}

/**
 * Generate a fresh `ctx_XXXXXXXX` id, retrying while `exists` reports a collision.
 */
export function generateEntryId(exists: (id: string) => boolean = () => false): string {
  let id: string;
  do {
    let suffix = '';
    for (let i = 0; i < ENTRY_ID_LENGTH; i++) {
      suffix += ID_ALPHABET.charAt(randomInt(ID_ALPHABET.length));
    }
    id = ENTRY_ID_PREFIX + suffix;
  } while (exists(id));
  return id;
}

// ============================================================================
// Context Entry
// ============================================================================

/**
 * Entries are values. The store hands out copies and changes its own record
 * only through add() and compress().
 */
export interface ContextEntry {
  readonly id: string;
  readonly entry_type: EntryType;
  readonly source: string;
  /** Full payload. Absent once the entry is compressed. */
  readonly content?: string;
  readonly summary: string;
  readonly created_at: Date;
  readonly references: readonly string[];
  readonly searchable: boolean;
  readonly compressed: boolean;
  /** Lifetime in milliseconds from created_at. */
  readonly ttl?: number;
  readonly parent_id?: string;
  readonly derived_from: readonly string[];
}

export interface ContextEntryInput {
  id?: string;
  entry_type: EntryType;
  source: string;
  content?: string | null;
  summary: string;
  created_at?: Date;
  references?: readonly string[];
  searchable?: boolean;
  compressed?: boolean;
  ttl?: number | null;
  parent_id?: string | null;
  derived_from?: readonly string[];
}

// ============================================================================
// Validation
// ============================================================================

export type ValidationResult =
  | { valid: true }
  | { valid: false; errors: ValidationIssue[] };

const nonEmpty = (s: string) => s.trim().length > 0;

export const entryInputSchema = z
  .object({
    id: z.string().regex(ENTRY_ID_PATTERN, 'must match ctx_ followed by 8 alphanumeric characters').optional(),
    entry_type: z.enum(ENTRY_TYPES),
    source: z.string().refine(nonEmpty, 'must be a non-empty string'),
    content: z.string().nullish(),
    summary: z.string().refine(nonEmpty, 'must be a non-empty string'),
    created_at: z.date().optional(),
    references: z.array(z.string()).optional(),
    searchable: z.boolean().optional(),
    compressed: z.boolean().optional(),
    ttl: z.number().int().positive().max(Number.MAX_SAFE_INTEGER).nullish(),
    parent_id: z.string().min(1, 'must be a non-empty string').nullish(),
    derived_from: z.array(z.string().min(1, 'must be a non-empty string')).optional(),
  })
  .superRefine((entry, ctx) => {
    if (entry.compressed && entry.content !== undefined && entry.content !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['content'], message: 'must be absent when compressed' });
    }
  });

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'entry',
    message: issue.message,
  }));
}

export function validateEntryInput(input: unknown): ValidationResult {
  const result = entryInputSchema.safeParse(input);
  return result.success ? { valid: true } : { valid: false, errors: toValidationIssues(result.error) };
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Validate an input and build a complete entry, assigning an id and
 * created_at when the input carries none.
 *
 * @param exists - collision check used when generating an id
 * @throws ValidationError
 */
export function createEntry(input: ContextEntryInput, exists?: (id: string) => boolean): ContextEntry {
  const parsed = entryInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error));
  }
  const data = parsed.data;

  return {
    id: data.id ?? generateEntryId(exists),
    entry_type: data.entry_type,
    source: data.source,
    ...(data.content != null ? { content: data.content } : {}),
    summary: data.summary,
    created_at: data.created_at ? new Date(data.created_at.getTime()) : new Date(),
    references: [...(data.references ?? [])],
    searchable: data.searchable ?? true,
    compressed: data.compressed ?? false,
    ...(data.ttl != null ? { ttl: data.ttl } : {}),
    ...(data.parent_id != null ? { parent_id: data.parent_id } : {}),
    derived_from: [...new Set(data.derived_from ?? [])],
  };
}

/** Deep copy: fresh arrays and a fresh Date. */
export function cloneEntry(entry: ContextEntry): ContextEntry {
  return {
    ...entry,
    created_at: new Date(entry.created_at.getTime()),
    references: [...entry.references],
    derived_from: [...entry.derived_from],
  };
}

/** The compressed form of an entry: content dropped, everything else kept. */
export function compressEntry(entry: ContextEntry): ContextEntry {
  const { content: _dropped, ...rest } = cloneEntry(entry);
  return { ...rest, compressed: true };
}

// ============================================================================
// Expiry
// ============================================================================

export function isExpired(entry: Pick<ContextEntry, 'created_at' | 'ttl'>, now: number = Date.now()): boolean {
  return entry.ttl !== undefined && now > entry.created_at.getTime() + entry.ttl;
}

/** Text an entry is indexed under: content while uncompressed, summary otherwise. */
export function indexableText(entry: Pick<ContextEntry, 'content' | 'summary' | 'compressed'>): string {
  if (!entry.compressed && entry.content) return entry.content;
  return entry.summary;
}
