/**
 * Background reclamation of TTL-expired entries.
 *
 * Expired entries are already invisible to readers; the sweeper only frees
 * the space. Each sweep snapshots the expired ids up front and removes them
 * in batches through ContextStore.remove(), yielding to the event loop
 * between batches. Entries added after the snapshot are never touched, and
 * an id whose ttl was extended since the snapshot is skipped because it is
 * re-checked before removal.
 *
 * State machine:
 *   stopped ──start()──▶ running ──pause()──▶ paused ──resume()──▶ running
 *      ▲                    │
 *      └──────stop()────────┘
 */

import { performance } from 'node:perf_hooks';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { ContextStore } from '../storage/context-store.js';
import { ValidationError } from '../storage/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;
export const DEFAULT_SWEEP_BATCH_SIZE = 100;

export type SweeperState = 'stopped' | 'running' | 'paused';

export type SweepResult =
  | { skipped: true; reason: 'paused' | 'in_progress' }
  | {
      skipped: false;
      /** Ids in the snapshot taken at sweep start */
      scanned: number;
      removed: number;
      failed: number;
      batches: number;
      /** True when a pause() cut the sweep short between batches */
      interrupted: boolean;
      durationMs: number;
    };

export interface ExpirationSweeperOptions {
  intervalMs?: number;
  batchSize?: number;
  logger?: Logger;
}

function requirePositiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError([{ field, message: 'must be a positive integer' }], 'sweeper options');
  }
  return value;
}

export class ExpirationSweeper {
  readonly intervalMs: number;
  readonly batchSize: number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | undefined;
  private currentState: SweeperState = 'stopped';
  private sweeping = false;
  private last: SweepResult | undefined;

  constructor(private readonly store: ContextStore, options: ExpirationSweeperOptions = {}) {
    this.intervalMs = requirePositiveInteger('intervalMs', options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    this.batchSize = requirePositiveInteger('batchSize', options.batchSize ?? DEFAULT_SWEEP_BATCH_SIZE);
    this.logger = options.logger ?? defaultLogger;
  }

  get state(): SweeperState {
    return this.currentState;
  }

  get isSweeping(): boolean {
    return this.sweeping;
  }

  get lastResult(): SweepResult | undefined {
    return this.last;
  }

  /** Begin sweeping every intervalMs. No-op when already started. */
  start(): void {
    if (this.timer !== undefined) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref?.();
    if (this.currentState === 'stopped') this.currentState = 'running';
    this.logger.info('Expiration sweeper started', { intervalMs: this.intervalMs, batchSize: this.batchSize });
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.currentState = 'stopped';
  }

  pause(): void {
    this.currentState = 'paused';
  }

  resume(): void {
    if (this.currentState !== 'paused') return;
    this.currentState = this.timer !== undefined ? 'running' : 'stopped';
  }

  /**
   * Sweep now. A sweep already in flight, or a paused sweeper, turns this
   * into a no-op. Never rejects.
   */
  async runCleanup(): Promise<SweepResult> {
    if (this.currentState === 'paused') return { skipped: true, reason: 'paused' };
    if (this.sweeping) return { skipped: true, reason: 'in_progress' };

    this.sweeping = true;
    const start = performance.now();
    let scanned = 0;
    let removed = 0;
    let failed = 0;
    let batches = 0;
    let interrupted = false;

    try {
      const snapshot = this.store.getExpiredIds();
      scanned = snapshot.length;

      for (let offset = 0; offset < snapshot.length; offset += this.batchSize) {
        if (batches > 0) {
          await yieldToEventLoop();
          if (this.state === 'paused') {
            interrupted = true;
            break;
          }
        }
        batches += 1;
        for (const id of snapshot.slice(offset, offset + this.batchSize)) {
          try {
            if (this.store.isExpired(id) && this.store.remove(id)) removed += 1;
          } catch (error) {
            failed += 1;
            this.logger.warn('Failed to remove expired entry', {
              id,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        }
      }
    } catch (error) {
      this.logger.error('Expiration sweep failed', { error: error instanceof Error ? error.message : String(error) });
    } finally {
      this.sweeping = false;
    }

    const result: SweepResult = {
      skipped: false,
      scanned,
      removed,
      failed,
      batches,
      interrupted,
      durationMs: performance.now() - start,
    };
    this.last = result;
    if (removed > 0 || failed > 0) {
      this.logger.info('Expired entries swept', { scanned, removed, failed, batches, interrupted });
    }
    return result;
  }

  private tick(): void {
    this.runCleanup().catch((error: unknown) => {
      this.logger.error('Expiration sweep tick failed', { error: String(error) });
    });
  }
}
