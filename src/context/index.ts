export {
  ContextBudgetAllocator,
  DEFAULT_MAX_ENTRIES,
  type BudgetAllocatorOptions,
} from './budget-allocator.js';
export {
  TaskBatcher,
  BatchExecutor,
  type TaskSpec,
  type TaskBatch,
  type BatchResult,
  type BatchHandler,
} from './batching.js';
export { buildWorkingContext, toWorkingView, toImplementationView } from './working-context.js';
export { estimateTokens, estimateWorkingEntryTokens, estimateImplementationEntryTokens } from './token-budget.js';
export type {
  WorkingEntryView,
  WorkingContext,
  WorkingContextOptions,
  ImplementationEntryView,
  ImplementationContext,
  AllocationRecord,
  AllocationStats,
} from './types.js';
