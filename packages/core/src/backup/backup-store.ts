import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { RelayError, isRelayError, toRelayError } from '../errors/relay-error.js';
import { shortId } from '../ids/secure-id.js';
import type { UserId } from '../types/index.js';

/** A user's encrypted state snapshot. The blob is opaque to the server. */
export interface Backup {
  version: number;
  blob: string;
  storedAt: number;
}

/**
 * Storage behind BackupStore. Implementations do no locking of their own;
 * BackupStore serializes access per user.
 */
export interface BackupStorage {
  get(userId: UserId): Promise<Backup | null>;
  put(userId: UserId, backup: Backup): Promise<void>;
  delete(userId: UserId): Promise<boolean>;
}

export class MemoryBackupStorage implements BackupStorage {
  private backups = new Map<UserId, Backup>();

  async get(userId: UserId): Promise<Backup | null> {
    return this.backups.get(userId) ?? null;
  }

  async put(userId: UserId, backup: Backup): Promise<void> {
    this.backups.set(userId, Object.freeze({ ...backup }));
  }

  async delete(userId: UserId): Promise<boolean> {
    return this.backups.delete(userId);
  }

  get size(): number {
    return this.backups.size;
  }
}

export interface BackupStoreEvents {
  onBackupStored?: (userId: UserId, version: number) => void;
  onStaleVersion?: (userId: UserId, attempted: number, current: number) => void;
}

/**
 * BackupStore - latest-wins encrypted state backups with optimistic
 * versioning. A write lands only if its version is strictly greater than
 * the stored one, so two devices racing to back up cannot roll each
 * other back.
 */
export class BackupStore {
  private storage: BackupStorage;
  private events: BackupStoreEvents;
  private locks = new KeyedMutex();

  constructor(storage: BackupStorage = new MemoryBackupStorage(), events: BackupStoreEvents = {}) {
    this.storage = storage;
    this.events = events;
  }

  /**
   * @throws RelayError STALE_VERSION if `version` is not above the stored one
   */
  async storeBackup(userId: UserId, version: number, blob: string): Promise<Backup> {
    if (typeof userId !== 'string' || userId.length === 0) {
      throw new RelayError('INVALID_PAYLOAD', 'user id must be a non-empty string');
    }
    if (!Number.isSafeInteger(version) || version < 0) {
      throw new RelayError('INVALID_PAYLOAD', 'version must be a non-negative integer', { version });
    }
    if (typeof blob !== 'string' || blob.length === 0) {
      throw new RelayError('INVALID_PAYLOAD', 'backup blob must be a non-empty string');
    }

    return this.withUserLock(userId, 'store backup', async () => {
      const current = await this.storage.get(userId);
      if (current && version <= current.version) {
        this.events.onStaleVersion?.(userId, version, current.version);
        throw new RelayError('STALE_VERSION', `backup version ${version} is not newer than ${current.version}`, {
          userId,
          attempted: version,
          current: current.version,
        });
      }

      const backup: Backup = { version, blob, storedAt: Date.now() };
      await this.storage.put(userId, backup);

      // Log without blob content
      console.log(`[BackupStore] Stored backup v${version} for ${shortId(userId)} (${blob.length} chars)`);
      this.events.onBackupStored?.(userId, version);
      return { ...backup };
    });
  }

  /**
   * @throws RelayError NOT_FOUND if the user has no backup
   */
  async getBackup(userId: UserId): Promise<Backup> {
    const backup = await this.withUserLock(userId, 'get backup', () => this.storage.get(userId));
    if (!backup) {
      throw new RelayError('NOT_FOUND', `no backup for user ${userId}`, { userId });
    }
    return { ...backup };
  }

  async deleteBackup(userId: UserId): Promise<boolean> {
    return this.withUserLock(userId, 'delete backup', () => this.storage.delete(userId));
  }

  private async withUserLock<T>(userId: UserId, operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await this.locks.runExclusive(userId, task);
    } catch (err) {
      if (isRelayError(err)) throw err;
      console.error(`[BackupStore] ${operation} failed for ${shortId(userId)}:`, err);
      throw toRelayError(err, `${operation} failed`);
    }
  }
}
