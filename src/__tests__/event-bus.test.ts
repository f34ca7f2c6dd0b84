import { describe, it, expect, vi } from 'vitest';
import { LocalEventBus } from '../events/local-event-bus.js';
import { matchesFilter, type ContextEvent, type ContextEventType } from '../events/event-bus.js';
import { ctxId } from './helpers/fixtures.js';

function event(n: number, type: ContextEventType = 'entry_added'): Omit<ContextEvent, 'seq'> {
  return { type, id: ctxId(n), entry_type: 'file', ts: '2026-01-01T00:00:00.000Z' };
}

describe('LocalEventBus', () => {
  it('delivers events with increasing sequence numbers', () => {
    const bus = new LocalEventBus();
    const received: ContextEvent[] = [];
    bus.subscribe(e => received.push(e));

    bus.emit(event(1));
    bus.emit(event(2));

    expect(received.map(e => [e.seq, e.id])).toEqual([
      [1, ctxId(1)],
      [2, ctxId(2)],
    ]);
    expect(bus.lastSeq).toBe(2);
  });

  it('stops delivering after unsubscribe', () => {
    const bus = new LocalEventBus();
    const callback = vi.fn();
    bus.subscribe(callback);
    bus.emit(event(1));
    bus.unsubscribe(callback);
    bus.emit(event(2));

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('returns a disposer from subscribe', () => {
    const bus = new LocalEventBus();
    const callback = vi.fn();
    const dispose = bus.subscribe(callback);

    dispose();
    bus.emit(event(1));

    expect(callback).not.toHaveBeenCalled();
  });

  it('delivers only events matching the subscription filter', () => {
    const bus = new LocalEventBus();
    const callback = vi.fn();
    bus.subscribe(callback, { ids: [ctxId(2)], types: ['entry_removed'] });

    bus.emit(event(1, 'entry_removed'));
    bus.emit(event(2, 'entry_added'));
    bus.emit(event(2, 'entry_removed'));

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith(expect.objectContaining({ seq: 3, id: ctxId(2), type: 'entry_removed' }));
  });

  it('replays from a sequence number out of a bounded history', () => {
    const bus = new LocalEventBus(2);
    bus.emit(event(1));
    bus.emit(event(2));
    bus.emit(event(3));
    bus.emit(event(4));
    bus.emit(event(5));

    expect(bus.replaySince(0).map(e => e.seq)).toEqual([4, 5]);
    expect(bus.replaySince(4).map(e => e.seq)).toEqual([5]);
  });

  it('replays the history of one entry', () => {
    const bus = new LocalEventBus();
    bus.emit(event(1, 'entry_added'));
    bus.emit(event(2, 'entry_added'));
    bus.emit(event(1, 'entry_compressed'));

    expect(bus.replaySince(0, { ids: [ctxId(1)] }).map(e => [e.seq, e.type])).toEqual([
      [1, 'entry_added'],
      [3, 'entry_compressed'],
    ]);
  });
});

describe('matchesFilter', () => {
  const sample: ContextEvent = { seq: 1, ...event(1, 'entry_updated') };

  it('matches everything without a filter', () => {
    expect(matchesFilter(sample, undefined)).toBe(true);
    expect(matchesFilter(sample, {})).toBe(true);
  });

  it('requires every given field to match', () => {
    expect(matchesFilter(sample, { types: ['entry_updated'] })).toBe(true);
    expect(matchesFilter(sample, { types: ['entry_added'] })).toBe(false);
    expect(matchesFilter(sample, { ids: [ctxId(1)], types: ['entry_added'] })).toBe(false);
  });
});
