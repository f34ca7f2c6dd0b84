/**
 * Token estimation for context views.
 *
 * KNOWN HACK: character-based approximation (1 token ≈ 4 chars), within
 * ±20% for English prose. Good enough for budgeting decisions.
 */

import type { ImplementationEntryView, WorkingEntryView } from './types.js';

/**
 * Estimate token count for a string.
 */
export function estimateTokens(text: string | undefined): number {
  if (!text) return 0;
  return Math.ceil(text.length / 4);
}

export function estimateWorkingEntryTokens(view: WorkingEntryView): number {
  return estimateTokens(view.summary);
}

/**
 * Content when present, summary for compressed entries.
 */
export function estimateImplementationEntryTokens(view: ImplementationEntryView): number {
  return estimateTokens(view.content ?? view.summary);
}
