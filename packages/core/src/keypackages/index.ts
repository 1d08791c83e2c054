export { MemoryKeyPackageStore, compareUploadOrder } from './key-package-store.js';
export type { KeyPackageBlob, KeyPackageRecord, KeyPackageStore } from './key-package-store.js';
export { ReservationManager, DEFAULT_RESERVATION_TIMEOUT_MS, DEFAULT_SWEEP_INTERVAL_MS } from './reservation-manager.js';
export type {
  KeyPackagePoolStatus,
  Reservation,
  ReservationManagerEvents,
  ReservationManagerOptions,
  ReservationOutcome,
  ReserveOptions,
  ReservedKeyPackage,
  SweepResult,
  UploadOptions,
} from './reservation-manager.js';
