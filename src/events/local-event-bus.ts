import { EventEmitter } from 'node:events';
import {
  matchesFilter,
  type ContextEvent,
  type ContextEventCallback,
  type ContextEventFilter,
  type EventBus,
} from './event-bus.js';

const DEFAULT_HISTORY = 1000;
const CHANNEL = 'context';

/**
 * EventEmitter-backed bus with a fixed-size history, so a consumer that
 * attaches late (or reconnects) can catch up from the last seq it saw.
 */
export class LocalEventBus implements EventBus {
  private readonly emitter = new EventEmitter();
  private readonly listeners = new Map<ContextEventCallback, (event: ContextEvent) => void>();
  private readonly history: ContextEvent[] = [];
  private readonly capacity: number;
  private next = 0;
  private seq = 0;

  constructor(capacity = DEFAULT_HISTORY) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.emitter.setMaxListeners(0);
  }

  /** Sequence number of the most recent event; 0 before the first. */
  get lastSeq(): number {
    return this.seq;
  }

  emit(event: Omit<ContextEvent, 'seq'>): void {
    const full: ContextEvent = { ...event, seq: ++this.seq };
    if (this.history.length < this.capacity) {
      this.history.push(full);
    } else {
      this.history[this.next] = full;
    }
    this.next = (this.next + 1) % this.capacity;
    this.emitter.emit(CHANNEL, full);
  }

  subscribe(callback: ContextEventCallback, filter?: ContextEventFilter): () => void {
    this.unsubscribe(callback);
    const listener = (event: ContextEvent) => {
      if (matchesFilter(event, filter)) callback(event);
    };
    this.listeners.set(callback, listener);
    this.emitter.on(CHANNEL, listener);
    return () => this.unsubscribe(callback);
  }

  unsubscribe(callback: ContextEventCallback): void {
    const listener = this.listeners.get(callback);
    if (!listener) return;
    this.emitter.off(CHANNEL, listener);
    this.listeners.delete(callback);
  }

  replaySince(seq: number, filter?: ContextEventFilter): ContextEvent[] {
    const ordered =
      this.history.length < this.capacity
        ? this.history
        : [...this.history.slice(this.next), ...this.history.slice(0, this.next)];
    return ordered.filter(e => e.seq > seq && matchesFilter(e, filter));
  }
}
