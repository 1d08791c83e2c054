import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { Connection } from '../connections/connection.js';
import type { ConnectionRegistry } from '../connections/connection-registry.js';
import { RelayError } from '../errors/relay-error.js';
import { shortId } from '../ids/secure-id.js';
import type { ConnectionId, GroupId, UserId } from '../types/index.js';
import type { PendingBuffer } from './pending-buffer.js';
import { DEFAULT_MAX_PAYLOAD_BYTES, type PayloadKind, encodeFrame, isPayloadKind } from './relay-frames.js';

export interface RelayPayload {
  kind: PayloadKind;
  ciphertext: string;
}

export interface WelcomePayload {
  welcome: string;
  ratchetTree?: string;
}

export interface RelayResult {
  /** Live deliveries only */
  delivered: number;
  /** Member users with no open connection who got the frame buffered */
  queued: number;
  sequence: number;
}

export interface WelcomeResult {
  delivered: number;
  queued: number;
}

export interface RelayRouterOptions {
  /** Skip the sending connection during fan-out. Default: true */
  excludeSender?: boolean;
  maxPayloadBytes?: number;
}

/**
 * RelayRouter - fans opaque group payloads out to live subscribers.
 *
 * Relays to one group run one at a time in arrival order, each stamped
 * with the next per-group sequence. Members with no open connection get
 * the frame in their pending buffer; it is flushed into their next
 * connection as soon as it opens.
 */
export class RelayRouter {
  private registry: ConnectionRegistry;
  private pending: PendingBuffer;
  private excludeSender: boolean;
  private maxPayloadBytes: number;
  private groupLocks = new KeyedMutex();
  private inviteeLocks = new KeyedMutex();
  private sequences = new Map<GroupId, number>();

  constructor(registry: ConnectionRegistry, pending: PendingBuffer, options: RelayRouterOptions = {}) {
    this.registry = registry;
    this.pending = pending;
    this.excludeSender = options.excludeSender ?? true;
    this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;

    this.registry.onConnectionOpened((connection) => {
      this.flushPending(connection);
    });
  }

  /**
   * Fan a payload out to the group.
   * @throws RelayError INVALID_PAYLOAD, NOT_FOUND (unknown sender) or CONNECTION_CLOSED
   */
  async relay(senderConnectionId: ConnectionId, groupId: GroupId, payload: RelayPayload): Promise<RelayResult> {
    if (typeof groupId !== 'string' || groupId.length === 0) {
      throw new RelayError('INVALID_PAYLOAD', 'group id must be a non-empty string');
    }
    if (!isPayloadKind(payload.kind)) {
      throw new RelayError('INVALID_PAYLOAD', `unknown payload kind: ${String(payload.kind)}`);
    }
    this.assertBlob('ciphertext', payload.ciphertext);
    this.requireOpenSender(senderConnectionId);

    return this.groupLocks.runExclusive(groupId, () => {
      // The sender may have gone away while waiting for the lock
      const sender = this.requireOpenSender(senderConnectionId);
      const sequence = (this.sequences.get(groupId) ?? 0) + 1;
      this.sequences.set(groupId, sequence);

      const frame = encodeFrame({
        type: 'payload',
        groupId,
        sender: sender.userId,
        kind: payload.kind,
        ciphertext: payload.ciphertext,
        sequence,
        sentAt: Date.now(),
      });

      let delivered = 0;
      for (const connection of this.registry.subscribersOf(groupId)) {
        if (this.excludeSender && connection.id === sender.id) continue;
        if (this.registry.send(connection.id, frame)) {
          delivered++;
        }
      }

      // Checked after fan-out so a subscriber force-closed above is buffered too
      let queued = 0;
      for (const userId of this.registry.membersOf(groupId)) {
        if (this.registry.openConnectionsOf(userId).length > 0) continue;
        this.pending.enqueue(userId, frame);
        queued++;
      }

      console.log(
        `[RelayRouter] ${payload.kind} #${sequence} in ${shortId(groupId)} from ${shortId(sender.userId)}: ${delivered} delivered, ${queued} queued`,
      );
      return { delivered, queued, sequence };
    });
  }

  /**
   * Deliver a Welcome to every open connection of the invitee, or buffer
   * it until they connect.
   */
  async sendWelcome(senderConnectionId: ConnectionId, invitee: UserId, payload: WelcomePayload): Promise<WelcomeResult> {
    if (typeof invitee !== 'string' || invitee.length === 0) {
      throw new RelayError('INVALID_PAYLOAD', 'invitee must be a non-empty string');
    }
    this.assertBlob('welcome', payload.welcome);
    if (payload.ratchetTree !== undefined) {
      this.assertBlob('ratchetTree', payload.ratchetTree);
    }
    this.requireOpenSender(senderConnectionId);

    return this.inviteeLocks.runExclusive(invitee, () => {
      const sender = this.requireOpenSender(senderConnectionId);
      const frame = encodeFrame({
        type: 'welcome',
        sender: sender.userId,
        welcome: payload.welcome,
        ratchetTree: payload.ratchetTree,
        sentAt: Date.now(),
      });

      let delivered = 0;
      for (const connection of this.registry.openConnectionsOf(invitee)) {
        if (this.registry.send(connection.id, frame)) {
          delivered++;
        }
      }

      let queued = 0;
      if (this.registry.openConnectionsOf(invitee).length === 0) {
        this.pending.enqueue(invitee, frame);
        queued = 1;
      }

      console.log(
        `[RelayRouter] Welcome from ${shortId(sender.userId)} to ${shortId(invitee)}: ${delivered} delivered, ${queued} queued`,
      );
      return { delivered, queued };
    });
  }

  /** Last sequence assigned in the group, 0 if none */
  sequenceOf(groupId: GroupId): number {
    return this.sequences.get(groupId) ?? 0;
  }

  /** Deliver the user's buffered frames to a freshly opened connection, once */
  private flushPending(connection: Connection): void {
    const entries = this.pending.drain(connection.userId);
    if (entries.length === 0) return;

    let sent = 0;
    for (const entry of entries) {
      if (!this.registry.send(connection.id, entry.frame)) break;
      sent++;
    }

    if (sent < entries.length) {
      this.pending.requeue(connection.userId, entries.slice(sent));
      console.warn(
        `[RelayRouter] Flush to ${shortId(connection.id)} interrupted, ${entries.length - sent} frame(s) kept for ${shortId(connection.userId)}`,
      );
      return;
    }
    console.log(`[RelayRouter] Flushed ${sent} pending frame(s) to ${shortId(connection.userId)}`);
  }

  private requireOpenSender(connectionId: ConnectionId): Connection {
    const sender = this.registry.get(connectionId);
    if (!sender) {
      throw new RelayError('NOT_FOUND', `unknown connection ${connectionId}`, { connectionId });
    }
    if (!sender.isOpen) {
      throw new RelayError('CONNECTION_CLOSED', `connection ${connectionId} is ${sender.state}`, { connectionId });
    }
    return sender;
  }

  private assertBlob(field: string, value: unknown): void {
    if (typeof value !== 'string' || value.length === 0) {
      throw new RelayError('INVALID_PAYLOAD', `${field} must be a non-empty string`);
    }
    const size = Buffer.byteLength(value);
    if (size > this.maxPayloadBytes) {
      throw new RelayError('INVALID_PAYLOAD', `${field} exceeds ${this.maxPayloadBytes} bytes`, {
        size,
        maxBytes: this.maxPayloadBytes,
      });
    }
  }
}
