export { RelayRouter } from './relay-router.js';
export type { RelayPayload, RelayResult, RelayRouterOptions, WelcomePayload, WelcomeResult } from './relay-router.js';
export { PendingBuffer, DEFAULT_PENDING_QUEUE_LIMIT, DEFAULT_PENDING_TTL_MS } from './pending-buffer.js';
export type { PendingBufferEvents, PendingBufferOptions, PendingDropReason, PendingEntry } from './pending-buffer.js';
export {
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
} from './relay-frames.js';
export type {
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
} from './relay-frames.js';
