import { join } from 'node:path';
import { ContextBudgetAllocator } from './context/budget-allocator.js';
import { LocalEventBus } from './events/local-event-bus.js';
import { ExpirationSweeper } from './expiration/expiration-sweeper.js';
import { ContextStore } from './storage/context-store.js';
import { loadSnapshot, saveSnapshot, type SnapshotFile } from './storage/snapshot-file.js';
import { loadConfig, type EngineConfig } from './utils/config.js';
import { logger as defaultLogger, setLogLevel, type Logger } from './utils/logger.js';
import { paths } from './utils/paths.js';

export interface ContextEngineOptions {
  /** Rebuild the store from the snapshot under the data directory, when one exists */
  restore?: boolean;
  /** Start the expiration sweeper immediately */
  autoStart?: boolean;
  logger?: Logger;
}

export interface ContextEngine {
  store: ContextStore;
  sweeper: ExpirationSweeper;
  allocator: ContextBudgetAllocator;
  events: LocalEventBus;
  config: EngineConfig;
  /** `<dataDir>/snapshots/context.json` */
  snapshotPath: string;
  /** Write the store to snapshotPath */
  checkpoint(): SnapshotFile;
  /** Stop the sweeper and, when `checkpoint` is set, write a snapshot */
  shutdown(options?: { checkpoint?: boolean }): void;
}

/**
 * Assemble one store with its sweeper, allocator and event bus.
 * Settings come from the environment, with `overrides` taking precedence.
 *
 * @throws ValidationError for invalid settings or an unreadable snapshot
 */
export function createContextEngine(
  overrides: Partial<EngineConfig> = {},
  options: ContextEngineOptions = {},
): ContextEngine {
  const config: EngineConfig = { ...loadConfig(), ...overrides };
  const logger = options.logger ?? defaultLogger;

  paths.setDataDir(config.dataDir);
  setLogLevel(config.logLevel);

  const events = new LocalEventBus();
  const snapshotPath = join(paths.dataDir, 'snapshots', 'context.json');

  const restored = options.restore ? loadSnapshot(snapshotPath, { events, logger }) : null;
  const store = restored ?? new ContextStore({ events, logger });

  const sweeper = new ExpirationSweeper(store, {
    intervalMs: config.sweepIntervalMs,
    batchSize: config.sweepBatchSize,
    logger,
  });
  const allocator = new ContextBudgetAllocator(store, { maxEntries: config.maxEntries, logger });

  if (options.autoStart) sweeper.start();

  const checkpoint = (): SnapshotFile => {
    const snapshot = saveSnapshot(store, snapshotPath);
    logger.info('Context snapshot written', { path: snapshotPath, entries: store.size });
    return snapshot;
  };

  return {
    store,
    sweeper,
    allocator,
    events,
    config,
    snapshotPath,
    checkpoint,
    shutdown(shutdownOptions = {}) {
      sweeper.stop();
      if (shutdownOptions.checkpoint) checkpoint();
      const outstanding = allocator.getUsageStats().outstanding;
      if (outstanding > 0) {
        logger.warn('Engine shut down with outstanding context allocations', { outstanding });
      }
    },
  };
}
