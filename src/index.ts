// Engine
export { createContextEngine, type ContextEngine, type ContextEngineOptions } from './engine.js';

// Entries
export {
  ENTRY_TYPES,
  ENTRY_ID_PREFIX,
  ENTRY_ID_PATTERN,
  isEntryType,
  isValidEntryId,
  generateEntryId,
  validateEntryInput,
  createEntry,
  isExpired,
  indexableText,
  type EntryType,
  type ContextEntry,
  type ContextEntryInput,
  type ValidationResult,
} from './storage/schema.js';

// Errors
export {
  ContextEngineError,
  ValidationError,
  RelationshipError,
  EntryBoundsError,
  NotFoundError,
  type ContextEngineErrorCode,
  type RelationshipErrorKind,
  type ValidationIssue,
} from './storage/errors.js';

// Store
export { ContextStore, type ContextStoreOptions, type StoreStats } from './storage/context-store.js';
export {
  serializeEntry,
  deserializeEntry,
  exportToDict,
  restoreEntries,
  type SerializedEntry,
  type SerializedStore,
} from './storage/serialization.js';
export { saveSnapshot, loadSnapshot, SNAPSHOT_VERSION, type SnapshotFile } from './storage/snapshot-file.js';

// Search
export { tokenize, countTerms } from './search/tokenizer.js';
export { VectorSearchIndex, cosineSimilarity } from './search/vector-search-index.js';
export type {
  SearchHit,
  SearchIndex,
  IndexSearchOptions,
  StoreSearchOptions,
  StoreSearchResult,
} from './search/types.js';

// Relationships
export { RelationshipGraph } from './graph/relationship-graph.js';

// Expiration
export {
  ExpirationSweeper,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_SWEEP_BATCH_SIZE,
  type ExpirationSweeperOptions,
  type SweeperState,
  type SweepResult,
} from './expiration/expiration-sweeper.js';

// Context allocation
export * from './context/index.js';

// Events
export * from './events/index.js';

// Config & logging
export { loadConfig, type EngineConfig } from './utils/config.js';
export { logger, setLogLevel, getLogLevel, LOG_LEVELS, type Logger, type LogLevel } from './utils/logger.js';
export { paths } from './utils/paths.js';
