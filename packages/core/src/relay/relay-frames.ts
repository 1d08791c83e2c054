/**
 * Wire frames exchanged over the relay WebSocket.
 *
 * Ciphertexts, welcomes and ratchet trees are opaque base64 strings
 * produced by the clients' crypto engine; the relay only checks that they
 * are present and within the size limit.
 */

import { RelayError, type RelayErrorCode } from '../errors/relay-error.js';
import type { ConnectionId, GroupId, UserId } from '../types/index.js';

/** Default max size of one opaque blob in a client frame (256 KiB) */
export const DEFAULT_MAX_PAYLOAD_BYTES = 256 * 1024;

export const PAYLOAD_KINDS = ['application', 'commit'] as const;
export type PayloadKind = (typeof PAYLOAD_KINDS)[number];

// ============================================
// Client -> server
// ============================================

export interface JoinFrame {
  type: 'join';
  groupId: GroupId;
}

export interface LeaveFrame {
  type: 'leave';
  groupId: GroupId;
}

export interface RelayFrame {
  type: 'relay';
  groupId: GroupId;
  kind: PayloadKind;
  ciphertext: string;
}

export interface WelcomeFrame {
  type: 'welcome';
  invitee: UserId;
  welcome: string;
  ratchetTree?: string;
}

export type ClientFrame = JoinFrame | LeaveFrame | RelayFrame | WelcomeFrame;

export const CLIENT_FRAME_TYPES = ['join', 'leave', 'relay', 'welcome'] as const;

// ============================================
// Server -> client
// ============================================

export interface ReadyFrame {
  type: 'ready';
  connectionId: ConnectionId;
  userId: UserId;
  groups: GroupId[];
}

export interface JoinedFrame {
  type: 'joined';
  groupId: GroupId;
}

export interface LeftFrame {
  type: 'left';
  groupId: GroupId;
}

export interface PayloadFrame {
  type: 'payload';
  groupId: GroupId;
  sender: UserId;
  kind: PayloadKind;
  ciphertext: string;
  /** Per-group arrival sequence, strictly increasing */
  sequence: number;
  sentAt: number;
}

export interface WelcomeDeliveryFrame {
  type: 'welcome';
  sender: UserId;
  welcome: string;
  ratchetTree?: string;
  sentAt: number;
}

export interface RelayedFrame {
  type: 'relayed';
  groupId: GroupId;
  sequence: number;
  delivered: number;
  queued: number;
}

export interface ErrorFrame {
  type: 'error';
  code: RelayErrorCode;
  error: string;
}

export type ServerFrame =
  | ReadyFrame
  | JoinedFrame
  | LeftFrame
  | PayloadFrame
  | WelcomeDeliveryFrame
  | RelayedFrame
  | ErrorFrame;

// ============================================
// Type guards
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

export function isPayloadKind(value: unknown): value is PayloadKind {
  return PAYLOAD_KINDS.some((kind) => kind === value);
}

export function isJoinFrame(frame: unknown): frame is JoinFrame {
  return isRecord(frame) && frame.type === 'join' && isNonEmptyString(frame.groupId);
}

export function isLeaveFrame(frame: unknown): frame is LeaveFrame {
  return isRecord(frame) && frame.type === 'leave' && isNonEmptyString(frame.groupId);
}

export function isRelayFrame(frame: unknown): frame is RelayFrame {
  return (
    isRecord(frame) &&
    frame.type === 'relay' &&
    isNonEmptyString(frame.groupId) &&
    isPayloadKind(frame.kind) &&
    isNonEmptyString(frame.ciphertext)
  );
}

export function isWelcomeFrame(frame: unknown): frame is WelcomeFrame {
  return (
    isRecord(frame) &&
    frame.type === 'welcome' &&
    isNonEmptyString(frame.invitee) &&
    isNonEmptyString(frame.welcome) &&
    (frame.ratchetTree === undefined || isNonEmptyString(frame.ratchetTree))
  );
}

export function isServerFrame(frame: unknown): frame is ServerFrame {
  if (!isRecord(frame) || typeof frame.type !== 'string') return false;
  return ['ready', 'joined', 'left', 'payload', 'welcome', 'relayed', 'error'].includes(frame.type);
}

// ============================================
// Parsing
// ============================================

/**
 * Parse and validate one raw client frame.
 * @throws RelayError INVALID_PAYLOAD describing the first problem found
 */
export function parseClientFrame(raw: string, maxPayloadBytes = DEFAULT_MAX_PAYLOAD_BYTES): ClientFrame {
  let frame: unknown;
  try {
    frame = JSON.parse(raw);
  } catch {
    throw new RelayError('INVALID_PAYLOAD', 'frame is not valid JSON');
  }

  if (!isRecord(frame) || typeof frame.type !== 'string') {
    throw new RelayError('INVALID_PAYLOAD', 'frame must be an object with a type');
  }

  if (isJoinFrame(frame)) return { type: 'join', groupId: frame.groupId };
  if (isLeaveFrame(frame)) return { type: 'leave', groupId: frame.groupId };

  if (isRelayFrame(frame)) {
    assertWithinLimit('ciphertext', frame.ciphertext, maxPayloadBytes);
    return { type: 'relay', groupId: frame.groupId, kind: frame.kind, ciphertext: frame.ciphertext };
  }

  if (isWelcomeFrame(frame)) {
    assertWithinLimit('welcome', frame.welcome, maxPayloadBytes);
    if (frame.ratchetTree !== undefined) {
      assertWithinLimit('ratchetTree', frame.ratchetTree, maxPayloadBytes);
    }
    return { type: 'welcome', invitee: frame.invitee, welcome: frame.welcome, ratchetTree: frame.ratchetTree };
  }

  if (!CLIENT_FRAME_TYPES.some((type) => type === frame.type)) {
    throw new RelayError('INVALID_PAYLOAD', `unknown frame type: ${frame.type}`);
  }
  throw new RelayError('INVALID_PAYLOAD', `malformed ${frame.type} frame`);
}

function assertWithinLimit(field: string, value: string, maxBytes: number): void {
  const size = Buffer.byteLength(value);
  if (size > maxBytes) {
    throw new RelayError('INVALID_PAYLOAD', `${field} exceeds ${maxBytes} bytes`, { size, maxBytes });
  }
}

export function encodeFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}

export function errorFrame(error: RelayError): ErrorFrame {
  return { type: 'error', code: error.code, error: error.message };
}
