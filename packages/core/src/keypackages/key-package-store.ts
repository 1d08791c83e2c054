import type { UserId } from '../types/index.js';

/** Opaque credential bundle produced by the client's crypto engine (base64 on the wire) */
export type KeyPackageBlob = string;

export interface KeyPackageRecord {
  readonly id: string;
  readonly ownerId: UserId;
  readonly blob: KeyPackageBlob;
  readonly uploadedAt: number;
  /** Monotonic upload counter; breaks ties between uploads in the same millisecond */
  readonly uploadSeq: number;
  /** Credential lifetime end (ms since epoch); never handed out afterwards */
  readonly notAfter?: number;
  readonly consumed: boolean;
  readonly consumedAt?: number;
  readonly consumedBy?: UserId;
}

/**
 * Storage for uploaded key packages.
 *
 * Async so a persistent backend can sit behind it. Implementations do no
 * locking of their own: ReservationManager serializes every access to one
 * owner's pool.
 */
export interface KeyPackageStore {
  insert(record: KeyPackageRecord): Promise<void>;
  get(id: string): Promise<KeyPackageRecord | null>;
  /** Owner's packages ordered oldest upload first */
  listByOwner(ownerId: UserId): Promise<KeyPackageRecord[]>;
  listAll(): Promise<KeyPackageRecord[]>;
  markConsumed(id: string, consumedBy: UserId, consumedAt: number): Promise<KeyPackageRecord | null>;
  delete(id: string): Promise<boolean>;
}

export function compareUploadOrder(a: KeyPackageRecord, b: KeyPackageRecord): number {
  return a.uploadedAt - b.uploadedAt || a.uploadSeq - b.uploadSeq;
}

export class MemoryKeyPackageStore implements KeyPackageStore {
  private records = new Map<string, KeyPackageRecord>();
  private byOwner = new Map<UserId, Set<string>>();

  async insert(record: KeyPackageRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new Error(`duplicate key package id ${record.id}`);
    }
    this.records.set(record.id, Object.freeze({ ...record }));

    let ids = this.byOwner.get(record.ownerId);
    if (!ids) {
      ids = new Set();
      this.byOwner.set(record.ownerId, ids);
    }
    ids.add(record.id);
  }

  async get(id: string): Promise<KeyPackageRecord | null> {
    return this.records.get(id) ?? null;
  }

  async listByOwner(ownerId: UserId): Promise<KeyPackageRecord[]> {
    const ids = this.byOwner.get(ownerId);
    if (!ids) return [];

    const result: KeyPackageRecord[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) result.push(record);
    }
    return result.sort(compareUploadOrder);
  }

  async listAll(): Promise<KeyPackageRecord[]> {
    return Array.from(this.records.values()).sort(compareUploadOrder);
  }

  async markConsumed(id: string, consumedBy: UserId, consumedAt: number): Promise<KeyPackageRecord | null> {
    const record = this.records.get(id);
    if (!record) return null;

    const consumed: KeyPackageRecord = Object.freeze({ ...record, consumed: true, consumedAt, consumedBy });
    this.records.set(id, consumed);
    return consumed;
  }

  async delete(id: string): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) return false;

    this.records.delete(id);
    const ids = this.byOwner.get(record.ownerId);
    if (ids) {
      ids.delete(id);
      if (ids.size === 0) {
        this.byOwner.delete(record.ownerId);
      }
    }
    return true;
  }

  /** Number of stored records, consumed ones included */
  get size(): number {
    return this.records.size;
  }
}
