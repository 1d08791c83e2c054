import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_PENDING_TTL_MS, PendingBuffer } from './pending-buffer.js';

describe('PendingBuffer', () => {
  let buffer: PendingBuffer;
  let onDropped: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    onDropped = vi.fn();
    buffer = new PendingBuffer({ onDropped }, { maxPerUser: 3, autoStart: false });
  });

  afterEach(() => {
    buffer.stop();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('should drain frames oldest first and clear the queue', () => {
    buffer.enqueue('zoe', 'f1');
    buffer.enqueue('zoe', 'f2');

    expect(buffer.drain('zoe').map((entry) => entry.frame)).toEqual(['f1', 'f2']);
    expect(buffer.drain('zoe')).toEqual([]);
    expect(buffer.pendingFor('zoe')).toBe(0);
  });

  it('should keep queues per user', () => {
    buffer.enqueue('zoe', 'for-zoe');
    buffer.enqueue('yara', 'for-yara');

    expect(buffer.size).toBe(2);
    expect(buffer.drain('yara').map((entry) => entry.frame)).toEqual(['for-yara']);
    expect(buffer.pendingFor('zoe')).toBe(1);
  });

  it('should drop the oldest frame on overflow', () => {
    for (const frame of ['f1', 'f2', 'f3', 'f4']) {
      buffer.enqueue('zoe', frame);
    }

    expect(buffer.drain('zoe').map((entry) => entry.frame)).toEqual(['f2', 'f3', 'f4']);
    expect(onDropped).toHaveBeenCalledTimes(1);
    expect(onDropped).toHaveBeenCalledWith('zoe', 'overflow');
  });

  it('should not hand out frames past the TTL', () => {
    buffer.enqueue('zoe', 'old');
    vi.advanceTimersByTime(DEFAULT_PENDING_TTL_MS - 1000);
    buffer.enqueue('zoe', 'fresh');
    vi.advanceTimersByTime(1000);

    expect(buffer.drain('zoe').map((entry) => entry.frame)).toEqual(['fresh']);
    expect(onDropped).toHaveBeenCalledWith('zoe', 'expired');
  });

  it('should drop expired frames during cleanup', () => {
    const short = new PendingBuffer({ onDropped }, { ttlMs: 5000, autoStart: false });
    short.enqueue('zoe', 'a');
    short.enqueue('zoe', 'b');
    short.enqueue('yara', 'c');
    vi.advanceTimersByTime(3000);
    short.enqueue('yara', 'd');
    vi.advanceTimersByTime(2000);

    expect(short.cleanupExpired()).toBe(3);
    expect(short.pendingFor('zoe')).toBe(0);
    expect(short.pendingFor('yara')).toBe(1);
    expect(onDropped).toHaveBeenCalledTimes(3);
  });

  it('should run cleanup on a timer when started', () => {
    const timed = new PendingBuffer({ onDropped }, { ttlMs: 1000 });
    timed.enqueue('zoe', 'a');

    vi.advanceTimersByTime(60 * 1000);

    expect(timed.pendingFor('zoe')).toBe(0);
    expect(onDropped).toHaveBeenCalledWith('zoe', 'expired');
    timed.stop();
  });

  it('should requeue drained entries ahead of newer ones', () => {
    buffer.enqueue('zoe', 'f1');
    buffer.enqueue('zoe', 'f2');
    const drained = buffer.drain('zoe');
    buffer.enqueue('zoe', 'f3');

    buffer.requeue('zoe', drained);

    expect(buffer.drain('zoe').map((entry) => entry.frame)).toEqual(['f1', 'f2', 'f3']);
  });

  it('should report frames trimmed by a requeue past the limit', () => {
    buffer.enqueue('zoe', 'f1');
    buffer.enqueue('zoe', 'f2');
    const drained = buffer.drain('zoe');
    buffer.enqueue('zoe', 'f3');
    buffer.enqueue('zoe', 'f4');

    buffer.requeue('zoe', drained);

    expect(buffer.drain('zoe').map((entry) => entry.frame)).toEqual(['f2', 'f3', 'f4']);
    expect(onDropped).toHaveBeenCalledTimes(1);
    expect(onDropped).toHaveBeenCalledWith('zoe', 'overflow');
  });
});
