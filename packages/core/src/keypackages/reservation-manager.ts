import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { RelayError, isRelayError, toRelayError } from '../errors/relay-error.js';
import { secureId, shortId } from '../ids/secure-id.js';
import type { GroupId, UserId } from '../types/index.js';
import type { KeyPackageBlob, KeyPackageRecord, KeyPackageStore } from './key-package-store.js';

/** Default reservation window (60 seconds) */
export const DEFAULT_RESERVATION_TIMEOUT_MS = 60 * 1000;

/** Default interval of the background reclamation pass (30 seconds) */
export const DEFAULT_SWEEP_INTERVAL_MS = 30 * 1000;

/** Max resolved reservation ids remembered for deterministic errors */
const OUTCOME_CACHE_MAX_SIZE = 5000;

export interface Reservation {
  id: string;
  keyPackageId: string;
  ownerId: UserId;
  claimantId: UserId;
  groupId?: GroupId;
  createdAt: number;
  expiresAt: number;
}

/** What the claimant gets back from reserve() */
export interface ReservedKeyPackage {
  reservationId: string;
  keyPackageId: string;
  blob: KeyPackageBlob;
  expiresAt: number;
}

export interface ReserveOptions {
  /** User who will add the owner to a group */
  claimantId: UserId;
  groupId?: GroupId;
}

export interface UploadOptions {
  /** Credential lifetime end (ms since epoch) */
  notAfter?: number;
}

export interface KeyPackagePoolStatus {
  available: number;
  reserved: number;
  consumed: number;
  /** Past their lifetime but not yet purged */
  expired: number;
}

export interface SweepResult {
  reservationsExpired: number;
  keyPackagesPurged: number;
}

export type ReservationOutcome = 'consumed' | 'released' | 'expired';

export interface ReservationManagerEvents {
  onReserved?: (reservation: Reservation) => void;
  onConsumed?: (reservation: Reservation, keyPackage: KeyPackageRecord) => void;
  onReleased?: (reservation: Reservation) => void;
  /** Fires exactly once per reservation that times out */
  onExpired?: (reservation: Reservation) => void;
}

export interface ReservationManagerOptions {
  timeoutMs?: number;
  sweepIntervalMs?: number;
  /** If true, starts the periodic sweep immediately. Default: true */
  autoStart?: boolean;
}

/**
 * ReservationManager - exclusive, time-bounded claims on key packages.
 *
 * Every operation that reads or changes one owner's pool runs under that
 * owner's lock, so reserve/consume/release against the same key package
 * are linearizable even when the store is asynchronous. Deadlines are
 * stored and checked on access; the periodic sweep only reclaims storage
 * and is never needed for correctness.
 *
 * IMPORTANT: Call stop() when done if autoStart is on.
 */
export class ReservationManager {
  private store: KeyPackageStore;
  private events: ReservationManagerEvents;
  private timeoutMs: number;
  private sweepIntervalMs: number;
  private locks = new KeyedMutex();
  /** Active reservations: reservationId -> Reservation */
  private reservations = new Map<string, Reservation>();
  /** keyPackageId -> reservationId (at most one per key package) */
  private byKeyPackage = new Map<string, string>();
  /** ownerId -> active reservation ids */
  private byOwner = new Map<UserId, Set<string>>();
  /** Resolved reservation ids, oldest first */
  private outcomes = new Map<string, ReservationOutcome>();
  private uploadSeq = 0;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(store: KeyPackageStore, events: ReservationManagerEvents = {}, options: ReservationManagerOptions = {}) {
    this.store = store;
    this.events = events;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RESERVATION_TIMEOUT_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;

    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new RelayError('INVALID_PAYLOAD', 'reservation timeout must be a positive number', {
        timeoutMs: this.timeoutMs,
      });
    }

    const { autoStart = true } = options;
    if (autoStart) {
      this.start();
    }
  }

  /** Start the periodic sweep */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        console.error('[ReservationManager] Sweep failed:', err);
      });
    }, this.sweepIntervalMs);
  }

  /** Stop the periodic sweep */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  get reservationTimeoutMs(): number {
    return this.timeoutMs;
  }

  // ============================================
  // Upload
  // ============================================

  async upload(ownerId: UserId, blob: KeyPackageBlob, options: UploadOptions = {}): Promise<string> {
    const [id] = await this.uploadMany(ownerId, [blob], options);
    return id;
  }

  /**
   * Upload a batch into the owner's pool. Ids are returned in input order.
   * Either every package is stored or none is.
   */
  async uploadMany(ownerId: UserId, blobs: KeyPackageBlob[], options: UploadOptions = {}): Promise<string[]> {
    assertNonEmpty(ownerId, 'owner id');
    if (blobs.length === 0) {
      throw new RelayError('INVALID_PAYLOAD', 'at least one key package is required');
    }
    for (const blob of blobs) {
      assertNonEmpty(blob, 'key package');
    }
    if (options.notAfter !== undefined && !Number.isFinite(options.notAfter)) {
      throw new RelayError('INVALID_PAYLOAD', 'notAfter must be a finite timestamp');
    }

    return this.withOwnerLock(ownerId, 'upload', async () => {
      const uploadedAt = Date.now();
      const records: KeyPackageRecord[] = blobs.map((blob) => ({
        id: secureId('kp'),
        ownerId,
        blob,
        uploadedAt,
        uploadSeq: ++this.uploadSeq,
        notAfter: options.notAfter,
        consumed: false,
      }));

      const inserted: string[] = [];
      try {
        for (const record of records) {
          await this.store.insert(record);
          inserted.push(record.id);
        }
      } catch (err) {
        for (const id of inserted) {
          await this.store.delete(id);
        }
        throw err;
      }

      console.log(`[ReservationManager] Uploaded ${records.length} key package(s) for ${shortId(ownerId)}`);
      return inserted;
    });
  }

  // ============================================
  // Reserve / consume / release
  // ============================================

  /**
   * Claim the owner's oldest available key package.
   * @throws RelayError NOT_FOUND when every package is reserved, consumed or past its lifetime
   */
  async reserve(ownerId: UserId, options: ReserveOptions): Promise<ReservedKeyPackage> {
    assertNonEmpty(ownerId, 'owner id');
    assertNonEmpty(options.claimantId, 'claimant id');

    return this.withOwnerLock(ownerId, 'reserve', async () => {
      const now = Date.now();
      this.expireDueForOwner(ownerId, now);

      const pool = await this.store.listByOwner(ownerId);
      const candidate = pool.find((record) => this.isAvailable(record, now));
      if (!candidate) {
        throw new RelayError('NOT_FOUND', `no available key package for user ${ownerId}`, { ownerId });
      }

      const reservation: Reservation = {
        id: secureId('rsv'),
        keyPackageId: candidate.id,
        ownerId,
        claimantId: options.claimantId,
        groupId: options.groupId,
        createdAt: now,
        expiresAt: now + this.timeoutMs,
      };
      this.addReservation(reservation);

      console.log(
        `[ReservationManager] Reserved ${shortId(candidate.id)} of ${shortId(ownerId)} for ${shortId(options.claimantId)} (expires in ${this.timeoutMs}ms)`,
      );
      this.events.onReserved?.({ ...reservation });

      return {
        reservationId: reservation.id,
        keyPackageId: candidate.id,
        blob: candidate.blob,
        expiresAt: reservation.expiresAt,
      };
    });
  }

  /**
   * Spend the reserved key package for good.
   * @throws RelayError EXPIRED past the deadline, NOT_FOUND if unknown or already resolved
   */
  async consume(reservationId: string): Promise<KeyPackageRecord> {
    const known = this.reservations.get(reservationId);
    if (!known) {
      throw this.resolvedError(reservationId, 'consume');
    }

    return this.withOwnerLock(known.ownerId, 'consume', async () => {
      const reservation = this.reservations.get(reservationId);
      if (!reservation) {
        throw this.resolvedError(reservationId, 'consume');
      }

      const now = Date.now();
      if (now >= reservation.expiresAt) {
        this.expire(reservation);
        throw new RelayError('EXPIRED', `reservation ${reservationId} expired`, {
          reservationId,
          expiresAt: reservation.expiresAt,
        });
      }

      const consumed = await this.store.markConsumed(reservation.keyPackageId, reservation.claimantId, now);
      this.removeReservation(reservation, 'consumed');
      if (!consumed) {
        throw new RelayError('NOT_FOUND', `key package ${reservation.keyPackageId} no longer exists`, {
          reservationId,
        });
      }

      console.log(
        `[ReservationManager] Consumed ${shortId(reservation.keyPackageId)} of ${shortId(reservation.ownerId)} (reservation ${shortId(reservationId)})`,
      );
      this.events.onConsumed?.({ ...reservation }, consumed);
      return consumed;
    });
  }

  /**
   * Abort a claim early and return the key package to the pool.
   * @throws RelayError NOT_FOUND if unknown or already resolved (timeouts included)
   */
  async release(reservationId: string): Promise<void> {
    const known = this.reservations.get(reservationId);
    if (!known) {
      throw this.resolvedError(reservationId, 'release');
    }

    await this.withOwnerLock(known.ownerId, 'release', async () => {
      const reservation = this.reservations.get(reservationId);
      if (!reservation) {
        throw this.resolvedError(reservationId, 'release');
      }

      if (Date.now() >= reservation.expiresAt) {
        this.expire(reservation);
        throw this.resolvedError(reservationId, 'release');
      }

      this.removeReservation(reservation, 'released');
      console.log(`[ReservationManager] Released ${shortId(reservation.keyPackageId)} of ${shortId(reservation.ownerId)}`);
      this.events.onReleased?.({ ...reservation });
    });
  }

  // ============================================
  // Queries and housekeeping
  // ============================================

  /** Active (non-resolved, not yet due) reservation */
  getReservation(reservationId: string): Reservation | undefined {
    const reservation = this.reservations.get(reservationId);
    if (!reservation || Date.now() >= reservation.expiresAt) return undefined;
    return { ...reservation };
  }

  /** How a reservation was resolved, while it is still remembered */
  getOutcome(reservationId: string): ReservationOutcome | undefined {
    return this.outcomes.get(reservationId);
  }

  async status(ownerId: UserId): Promise<KeyPackagePoolStatus> {
    return this.withOwnerLock(ownerId, 'status', async () => {
      const now = Date.now();
      this.expireDueForOwner(ownerId, now);

      const status: KeyPackagePoolStatus = { available: 0, reserved: 0, consumed: 0, expired: 0 };
      for (const record of await this.store.listByOwner(ownerId)) {
        if (record.consumed) status.consumed++;
        else if (this.byKeyPackage.has(record.id)) status.reserved++;
        else if (isPastLifetime(record, now)) status.expired++;
        else status.available++;
      }
      return status;
    });
  }

  /**
   * Reclaim abandoned reservations and purge key packages past their
   * lifetime. Each owner is processed under its own lock.
   */
  async sweep(): Promise<SweepResult> {
    const now = Date.now();
    const owners = new Set<UserId>(this.byOwner.keys());
    for (const record of await this.store.listAll()) {
      if (!record.consumed && isPastLifetime(record, now)) {
        owners.add(record.ownerId);
      }
    }

    const result: SweepResult = { reservationsExpired: 0, keyPackagesPurged: 0 };
    for (const ownerId of owners) {
      await this.withOwnerLock(ownerId, 'sweep', async () => {
        const sweptAt = Date.now();
        result.reservationsExpired += this.expireDueForOwner(ownerId, sweptAt);

        for (const record of await this.store.listByOwner(ownerId)) {
          if (record.consumed || this.byKeyPackage.has(record.id) || !isPastLifetime(record, sweptAt)) continue;
          if (await this.store.delete(record.id)) {
            result.keyPackagesPurged++;
          }
        }
      });
    }

    if (result.reservationsExpired > 0 || result.keyPackagesPurged > 0) {
      console.log(
        `[ReservationManager] Sweep expired ${result.reservationsExpired} reservation(s), purged ${result.keyPackagesPurged} key package(s)`,
      );
    }
    return result;
  }

  /** Number of active reservations, due ones included until touched */
  get activeReservations(): number {
    return this.reservations.size;
  }

  // ============================================
  // Internals
  // ============================================

  private async withOwnerLock<T>(ownerId: UserId, operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await this.locks.runExclusive(ownerId, task);
    } catch (err) {
      if (isRelayError(err)) throw err;
      console.error(`[ReservationManager] ${operation} failed for ${shortId(ownerId)}:`, err);
      throw toRelayError(err, `${operation} failed`);
    }
  }

  private isAvailable(record: KeyPackageRecord, now: number): boolean {
    return !record.consumed && !this.byKeyPackage.has(record.id) && !isPastLifetime(record, now);
  }

  /** Expire the owner's due reservations; caller holds the owner lock */
  private expireDueForOwner(ownerId: UserId, now: number): number {
    const ids = this.byOwner.get(ownerId);
    if (!ids) return 0;

    let expired = 0;
    for (const id of Array.from(ids)) {
      const reservation = this.reservations.get(id);
      if (reservation && now >= reservation.expiresAt) {
        this.expire(reservation);
        expired++;
      }
    }
    return expired;
  }

  private expire(reservation: Reservation): void {
    // removeReservation is the only exit from the active table, so this runs once per reservation
    this.removeReservation(reservation, 'expired');
    console.log(
      `[ReservationManager] Reservation ${shortId(reservation.id)} on ${shortId(reservation.keyPackageId)} expired, key package returned to pool`,
    );
    this.events.onExpired?.({ ...reservation });
  }

  private addReservation(reservation: Reservation): void {
    this.reservations.set(reservation.id, reservation);
    this.byKeyPackage.set(reservation.keyPackageId, reservation.id);

    let ids = this.byOwner.get(reservation.ownerId);
    if (!ids) {
      ids = new Set();
      this.byOwner.set(reservation.ownerId, ids);
    }
    ids.add(reservation.id);
  }

  private removeReservation(reservation: Reservation, outcome: ReservationOutcome): void {
    this.reservations.delete(reservation.id);
    if (this.byKeyPackage.get(reservation.keyPackageId) === reservation.id) {
      this.byKeyPackage.delete(reservation.keyPackageId);
    }

    const ids = this.byOwner.get(reservation.ownerId);
    if (ids) {
      ids.delete(reservation.id);
      if (ids.size === 0) {
        this.byOwner.delete(reservation.ownerId);
      }
    }

    this.recordOutcome(reservation.id, outcome);
  }

  private recordOutcome(reservationId: string, outcome: ReservationOutcome): void {
    if (this.outcomes.size >= OUTCOME_CACHE_MAX_SIZE) {
      const oldest = this.outcomes.keys().next().value;
      if (oldest !== undefined) this.outcomes.delete(oldest);
    }
    this.outcomes.set(reservationId, outcome);
  }

  private resolvedError(reservationId: string, operation: 'consume' | 'release'): RelayError {
    const outcome = this.outcomes.get(reservationId);
    if (outcome === 'expired' && operation === 'consume') {
      return new RelayError('EXPIRED', `reservation ${reservationId} expired`, { reservationId });
    }
    if (outcome) {
      return new RelayError('NOT_FOUND', `reservation ${reservationId} already ${outcome}`, {
        reservationId,
        outcome,
      });
    }
    return new RelayError('NOT_FOUND', `unknown reservation ${reservationId}`, { reservationId });
  }
}

function isPastLifetime(record: KeyPackageRecord, now: number): boolean {
  return record.notAfter !== undefined && record.notAfter <= now;
}

function assertNonEmpty(value: string, label: string): void {
  if (typeof value !== 'string' || value.length === 0) {
    throw new RelayError('INVALID_PAYLOAD', `${label} must be a non-empty string`);
  }
}
