import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BoundedHistory, RingBuffer } from '../../src/utils/ringBuffer';

describe('RingBuffer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('keeps items inside the window in insertion order', () => {
    const buffer = new RingBuffer<{ timestamp: number; id: string }>(10_000);
    buffer.add({ timestamp: Date.now(), id: 'a' });
    vi.advanceTimersByTime(5_000);
    buffer.add({ timestamp: Date.now(), id: 'b' });

    expect(buffer.getAll().map(item => item.id)).toEqual(['a', 'b']);
    expect(buffer.getLast()?.id).toBe('b');
  });

  it('evicts items older than the window', () => {
    const buffer = new RingBuffer<{ timestamp: number; id: string }>(10_000);
    buffer.add({ timestamp: Date.now(), id: 'a' });
    vi.advanceTimersByTime(6_000);
    buffer.add({ timestamp: Date.now(), id: 'b' });
    vi.advanceTimersByTime(4_001);

    expect(buffer.evictOld()).toBe(1);
    expect(buffer.count()).toBe(1);
    expect(buffer.getAll()[0].id).toBe('b');
  });
});

describe('BoundedHistory', () => {
  it('drops the oldest entries past capacity', () => {
    const history = new BoundedHistory<number>(3);
    [1, 2, 3, 4, 5].forEach(n => history.push(n));

    expect(history.getAll()).toEqual([3, 4, 5]);
    expect(history.length).toBe(3);
  });

  it('recent returns newest first', () => {
    const history = new BoundedHistory<string>(10);
    ['a', 'b', 'c'].forEach(s => history.push(s));

    expect(history.recent(2)).toEqual(['c', 'b']);
    expect(history.recent(10)).toEqual(['c', 'b', 'a']);
  });
});
