import { shortId } from '../ids/secure-id.js';
import type { UserId } from '../types/index.js';

/** Default max queued frames per offline user */
export const DEFAULT_PENDING_QUEUE_LIMIT = 100;

/** Default lifetime of a queued frame (24 hours) */
export const DEFAULT_PENDING_TTL_MS = 24 * 60 * 60 * 1000;

/** Cleanup interval (1 minute) */
const CLEANUP_INTERVAL_MS = 60 * 1000;

export interface PendingEntry {
  recipientId: UserId;
  /** Serialized server frame, delivered as-is */
  frame: string;
  enqueuedAt: number;
}

export type PendingDropReason = 'overflow' | 'expired';

export interface PendingBufferEvents {
  onDropped?: (recipientId: UserId, reason: PendingDropReason) => void;
}

export interface PendingBufferOptions {
  maxPerUser?: number;
  ttlMs?: number;
  /** If true, starts the cleanup timer immediately. Default: true */
  autoStart?: boolean;
}

/**
 * PendingBuffer - short-lived holding area for frames addressed to users
 * with no open connection.
 *
 * Each user's queue is FIFO and bounded; on overflow the oldest frame is
 * dropped. Frames older than the TTL are never delivered.
 *
 * IMPORTANT: Call stop() when done if autoStart is on.
 */
export class PendingBuffer {
  private queues = new Map<UserId, PendingEntry[]>();
  private events: PendingBufferEvents;
  private maxPerUser: number;
  private ttlMs: number;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(events: PendingBufferEvents = {}, options: PendingBufferOptions = {}) {
    this.events = events;
    this.maxPerUser = options.maxPerUser ?? DEFAULT_PENDING_QUEUE_LIMIT;
    this.ttlMs = options.ttlMs ?? DEFAULT_PENDING_TTL_MS;

    const { autoStart = true } = options;
    if (autoStart) {
      this.start();
    }
  }

  start(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => {
      this.cleanupExpired();
    }, CLEANUP_INTERVAL_MS);
  }

  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  enqueue(recipientId: UserId, frame: string): void {
    let queue = this.queues.get(recipientId);
    if (!queue) {
      queue = [];
      this.queues.set(recipientId, queue);
    }

    queue.push({ recipientId, frame, enqueuedAt: Date.now() });
    while (queue.length > this.maxPerUser) {
      queue.shift();
      console.warn(`[PendingBuffer] Queue for ${shortId(recipientId)} full, dropped oldest frame`);
      this.events.onDropped?.(recipientId, 'overflow');
    }
  }

  /**
   * Remove and return the user's live entries, oldest first.
   * Expired entries are dropped on the way out.
   */
  drain(recipientId: UserId): PendingEntry[] {
    const queue = this.queues.get(recipientId);
    if (!queue) return [];
    this.queues.delete(recipientId);

    const now = Date.now();
    const live: PendingEntry[] = [];
    for (const entry of queue) {
      if (this.isExpired(entry, now)) {
        this.events.onDropped?.(recipientId, 'expired');
      } else {
        live.push(entry);
      }
    }
    return live;
  }

  /**
   * Put drained entries back at the head of the queue, keeping their
   * original timestamps. Used when a drain could not be delivered.
   */
  requeue(recipientId: UserId, entries: PendingEntry[]): void {
    if (entries.length === 0) return;
    const queue = [...entries, ...(this.queues.get(recipientId) ?? [])];
    const overflow = Math.max(0, queue.length - this.maxPerUser);
    if (overflow > 0) {
      queue.splice(0, overflow);
      console.warn(`[PendingBuffer] Queue for ${shortId(recipientId)} full, dropped ${overflow} oldest frame(s)`);
      for (let i = 0; i < overflow; i++) {
        this.events.onDropped?.(recipientId, 'overflow');
      }
    }
    this.queues.set(recipientId, queue);
  }

  /** @returns number of frames dropped */
  cleanupExpired(): number {
    const now = Date.now();
    let dropped = 0;

    for (const [recipientId, queue] of Array.from(this.queues)) {
      const live = queue.filter((entry) => !this.isExpired(entry, now));
      const expired = queue.length - live.length;
      if (expired === 0) continue;

      if (live.length === 0) {
        this.queues.delete(recipientId);
      } else {
        this.queues.set(recipientId, live);
      }
      for (let i = 0; i < expired; i++) {
        this.events.onDropped?.(recipientId, 'expired');
      }
      console.log(`[PendingBuffer] ${expired} frame(s) for ${shortId(recipientId)} expired (TTL exceeded)`);
      dropped += expired;
    }
    return dropped;
  }

  pendingFor(recipientId: UserId): number {
    return this.queues.get(recipientId)?.length ?? 0;
  }

  /** Total queued frames across all users */
  get size(): number {
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.length;
    }
    return total;
  }

  clear(): void {
    this.queues.clear();
  }

  private isExpired(entry: PendingEntry, now: number): boolean {
    return now - entry.enqueuedAt >= this.ttlMs;
  }
}
