import { vi } from 'vitest';
import type { ContextEntryInput } from '../../storage/schema.js';
import type { Logger } from '../../utils/logger.js';

/** Deterministic entry id: ctxId(1) → 'ctx_00000001' */
export function ctxId(n: number): string {
  return `ctx_${String(n).padStart(8, '0')}`;
}

export function makeInput(overrides: Partial<ContextEntryInput> = {}): ContextEntryInput {
  return {
    entry_type: 'file',
    source: 'src/app.ts',
    content: 'export const answer = 42;',
    summary: 'Exports the answer constant',
    ...overrides,
  };
}

/** Logger whose calls can be asserted on; writes nothing. */
export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}
