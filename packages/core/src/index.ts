export const KEYRELAY_PROTOCOL_VERSION = '0.1.0';

export type { UserId, GroupId, ConnectionId } from './types/index.js';

export { RelayError, RELAY_ERROR_CODES, isRelayError, isRelayErrorCode, toRelayError } from './errors/index.js';
export type { RelayErrorCode } from './errors/index.js';

export { KeyedMutex } from './concurrency/index.js';

export { secureRandomHex, secureId, shortId } from './ids/index.js';

// Key packages and reservations
export {
  MemoryKeyPackageStore,
  compareUploadOrder,
  ReservationManager,
  DEFAULT_RESERVATION_TIMEOUT_MS,
  DEFAULT_SWEEP_INTERVAL_MS,
} from './keypackages/index.js';
export type {
  KeyPackageBlob,
  KeyPackageRecord,
  KeyPackageStore,
  KeyPackagePoolStatus,
  Reservation,
  ReservationManagerEvents,
  ReservationManagerOptions,
  ReservationOutcome,
  ReserveOptions,
  ReservedKeyPackage,
  SweepResult,
  UploadOptions,
} from './keypackages/index.js';

// Connections
export { Connection, ConnectionRegistry, DEFAULT_HIGH_WATERMARK_BYTES } from './connections/index.js';
export type {
  CloseReason,
  ConnectionState,
  ConnectionTransport,
  ConnectOptions,
  ConnectionClosedHandler,
  ConnectionOpenedHandler,
  ConnectionRegistryOptions,
} from './connections/index.js';

// Relay
export {
  RelayRouter,
  PendingBuffer,
  DEFAULT_PENDING_QUEUE_LIMIT,
  DEFAULT_PENDING_TTL_MS,
  CLIENT_FRAME_TYPES,
  DEFAULT_MAX_PAYLOAD_BYTES,
  PAYLOAD_KINDS,
  encodeFrame,
  errorFrame,
  isJoinFrame,
  isLeaveFrame,
  isPayloadKind,
  isRelayFrame,
  isServerFrame,
  isWelcomeFrame,
  parseClientFrame,
} from './relay/index.js';
export type {
  RelayPayload,
  RelayResult,
  RelayRouterOptions,
  WelcomePayload,
  WelcomeResult,
  PendingBufferEvents,
  PendingBufferOptions,
  PendingDropReason,
  PendingEntry,
  ClientFrame,
  ErrorFrame,
  JoinFrame,
  JoinedFrame,
  LeaveFrame,
  LeftFrame,
  PayloadFrame,
  PayloadKind,
  ReadyFrame,
  RelayFrame,
  RelayedFrame,
  ServerFrame,
  WelcomeDeliveryFrame,
  WelcomeFrame,
} from './relay/index.js';

// Encrypted state backups
export { BackupStore, MemoryBackupStorage } from './backup/index.js';
export type { Backup, BackupStorage, BackupStoreEvents } from './backup/index.js';
