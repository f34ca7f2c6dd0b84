/**
 * Typed errors raised by the context engine.
 *
 * Lookups (`get`, `contains`, `remove`) report a missing id through their
 * return value; these errors are reserved for caller mistakes.
 */

export interface ValidationIssue {
  field: string;
  message: string;
}

export type ContextEngineErrorCode = 'VALIDATION' | 'RELATIONSHIP' | 'ENTRY_BOUNDS' | 'NOT_FOUND';

export class ContextEngineError extends Error {
  readonly code: ContextEngineErrorCode;

  constructor(code: ContextEngineErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Malformed entry, config or persisted record. */
export class ValidationError extends ContextEngineError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], subject = 'entry') {
    const detail = issues.map(i => `${i.field}: ${i.message}`).join('; ');
    super('VALIDATION', `Invalid ${subject}: ${detail}`);
    this.issues = issues;
  }
}

export type RelationshipErrorKind = 'missing_reference' | 'cycle' | 'immutable';

/**
 * Dangling parent/derivation reference, a link that would close a cycle, or
 * an update that tries to change an existing entry's links.
 */
export class RelationshipError extends ContextEngineError {
  readonly kind: RelationshipErrorKind;
  readonly entryId: string;
  readonly relatedId: string;

  constructor(kind: RelationshipErrorKind, entryId: string, relatedId: string, message: string) {
    super('RELATIONSHIP', message);
    this.kind = kind;
    this.entryId = entryId;
    this.relatedId = relatedId;
  }
}

/** A resolved implementation context reached the entry limit. */
export class EntryBoundsError extends ContextEngineError {
  readonly count: number;
  readonly limit: number;

  constructor(count: number, limit: number) {
    super('ENTRY_BOUNDS', `Context requires ${count} entries; must be fewer than ${limit}`);
    this.count = count;
    this.limit = limit;
  }
}

export class NotFoundError extends ContextEngineError {
  readonly entryId: string;

  constructor(entryId: string) {
    super('NOT_FOUND', `Entry '${entryId}' not found`);
    this.entryId = entryId;
  }
}
