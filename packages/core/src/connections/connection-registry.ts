import { RelayError } from '../errors/relay-error.js';
import { secureId, shortId } from '../ids/secure-id.js';
import type { ConnectionId, GroupId, UserId } from '../types/index.js';
import { type CloseReason, Connection, type ConnectionTransport } from './connection.js';

/** Default per-connection outbound buffer limit (1 MiB) */
export const DEFAULT_HIGH_WATERMARK_BYTES = 1024 * 1024;

export type ConnectionOpenedHandler = (connection: Connection) => void;
export type ConnectionClosedHandler = (connection: Connection, reason: CloseReason) => void;

export interface ConnectionRegistryOptions {
  /** Force-close a connection whose queued bytes would exceed this */
  highWatermarkBytes?: number;
}

export interface ConnectOptions {
  /** Groups to subscribe to as part of the handshake */
  groups?: GroupId[];
  /** Runs once the connection is open, before any opened listener (e.g. to send a greeting) */
  onOpen?: (connection: Connection) => void;
}

/**
 * ConnectionRegistry - the single owner of every live connection.
 *
 * Tracks per-connection subscriptions (who receives fan-out right now)
 * and identity-level membership (who should get buffered frames while
 * offline). All methods are synchronous, so once disconnect() returns the
 * connection is gone from every index and no fan-out can reach it.
 */
export class ConnectionRegistry {
  private connections = new Map<ConnectionId, Connection>();
  private byUser = new Map<UserId, Set<ConnectionId>>();
  private subscribers = new Map<GroupId, Set<ConnectionId>>();
  private members = new Map<GroupId, Set<UserId>>();
  private openedHandlers: ConnectionOpenedHandler[] = [];
  private closedHandlers: ConnectionClosedHandler[] = [];
  private highWatermarkBytes: number;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.highWatermarkBytes = options.highWatermarkBytes ?? DEFAULT_HIGH_WATERMARK_BYTES;
  }

  onConnectionOpened(handler: ConnectionOpenedHandler): void {
    this.openedHandlers.push(handler);
  }

  onConnectionClosed(handler: ConnectionClosedHandler): void {
    this.closedHandlers.push(handler);
  }

  // ============================================
  // Lifecycle
  // ============================================

  connect(userId: UserId, transport: ConnectionTransport, options: ConnectOptions = {}): Connection {
    if (userId.length === 0) {
      throw new RelayError('INVALID_PAYLOAD', 'user id must be a non-empty string');
    }

    const groups = options.groups ?? [];
    if (groups.some((groupId) => groupId.length === 0)) {
      throw new RelayError('INVALID_PAYLOAD', 'group id must be a non-empty string');
    }

    const connection = new Connection(secureId('conn'), userId, transport);
    this.connections.set(connection.id, connection);
    let ids = this.byUser.get(userId);
    if (!ids) {
      ids = new Set();
      this.byUser.set(userId, ids);
    }
    ids.add(connection.id);

    const newMemberships: GroupId[] = [];
    try {
      connection.transition('open');
      for (const groupId of groups) {
        if (!this.isMember(groupId, userId)) newMemberships.push(groupId);
        this.subscribe(connection, groupId);
      }
      options.onOpen?.(connection);
    } catch (err) {
      // Nobody holds the connection yet, so it must not outlive the failed handshake
      this.disconnect(connection.id, 'error');
      for (const groupId of newMemberships) {
        this.removeMember(groupId, userId);
      }
      throw err;
    }

    console.log(
      `[ConnectionRegistry] ${shortId(userId)} connected (${shortId(connection.id)}, ${this.connections.size} open)`,
    );
    for (const handler of this.openedHandlers) {
      this.invoke('opened', () => handler(connection));
    }
    return connection;
  }

  /** open -> closing; a no-op on a connection that is already closing */
  beginClose(connectionId: ConnectionId): void {
    const connection = this.require(connectionId);
    if (connection.state === 'closing') return;
    connection.transition('closing');
  }

  /**
   * Close and purge a connection. Idempotent.
   * @returns true if this call removed the connection
   */
  disconnect(connectionId: ConnectionId, reason: CloseReason): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) return false;

    connection.transition('closed', reason);
    this.connections.delete(connectionId);

    const ids = this.byUser.get(connection.userId);
    if (ids) {
      ids.delete(connectionId);
      if (ids.size === 0) {
        this.byUser.delete(connection.userId);
      }
    }
    for (const groupId of connection.clearSubscriptions()) {
      this.removeSubscriber(groupId, connectionId);
    }

    try {
      connection.transport.close(reason === 'backpressure' ? 1008 : 1000, reason);
    } catch (err) {
      console.warn(`[ConnectionRegistry] Closing transport of ${shortId(connectionId)} failed:`, err);
    }

    console.log(`[ConnectionRegistry] ${shortId(connection.userId)} disconnected (${shortId(connectionId)}, ${reason})`);
    for (const handler of this.closedHandlers) {
      this.invoke('closed', () => handler(connection, reason));
    }
    return true;
  }

  /** Disconnect every connection, e.g. on shutdown */
  closeAll(reason: CloseReason = 'shutdown'): void {
    const connectionIds = Array.from(this.connections.keys());
    // Mark everything closing first so no fan-out reaches a connection about to go
    for (const connectionId of connectionIds) {
      this.beginClose(connectionId);
    }
    for (const connectionId of connectionIds) {
      this.disconnect(connectionId, reason);
    }
  }

  // ============================================
  // Subscriptions and membership
  // ============================================

  /**
   * Subscribe an open connection to a group and record the user as member.
   * @returns true if the subscription is new
   */
  joinGroup(connectionId: ConnectionId, groupId: GroupId): boolean {
    const connection = this.requireOpen(connectionId);
    return this.subscribe(connection, groupId);
  }

  /**
   * Drop a connection's subscription. The user stops being a member once
   * none of their open connections subscribes to the group.
   * @returns true if the connection was subscribed
   */
  leaveGroup(connectionId: ConnectionId, groupId: GroupId): boolean {
    const connection = this.requireOpen(connectionId);
    const wasSubscribed = connection.unsubscribe(groupId);
    this.removeSubscriber(groupId, connectionId);

    const stillSubscribed = this.openConnectionsOf(connection.userId).some((c) => c.isSubscribed(groupId));
    if (!stillSubscribed) {
      this.removeMember(groupId, connection.userId);
    }
    return wasSubscribed;
  }

  /** Record membership for a user who may be offline */
  addMember(groupId: GroupId, userId: UserId): void {
    let users = this.members.get(groupId);
    if (!users) {
      users = new Set();
      this.members.set(groupId, users);
    }
    users.add(userId);
  }

  removeMember(groupId: GroupId, userId: UserId): void {
    const users = this.members.get(groupId);
    if (!users) return;
    users.delete(userId);
    if (users.size === 0) {
      this.members.delete(groupId);
    }
  }

  // ============================================
  // Writes
  // ============================================

  /**
   * Write one serialized frame. Force-closes the connection when the write
   * would cross the high-watermark or the transport fails.
   * @returns true if the frame was handed to the transport
   */
  send(connectionId: ConnectionId, data: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection || !connection.isOpen) return false;

    const queued = connection.transport.bufferedAmount + Buffer.byteLength(data);
    if (queued > this.highWatermarkBytes) {
      console.warn(
        `[ConnectionRegistry] ${shortId(connectionId)} over high-watermark (${queued} > ${this.highWatermarkBytes} bytes), closing`,
      );
      this.disconnect(connectionId, 'backpressure');
      return false;
    }

    try {
      connection.transport.send(data);
      return true;
    } catch (err) {
      this.reportWriteFailure(connectionId, err);
      return false;
    }
  }

  /** Asynchronous write error reported by the transport */
  reportWriteFailure(connectionId: ConnectionId, error: unknown): void {
    if (!this.connections.has(connectionId)) return;
    console.warn(`[ConnectionRegistry] Write to ${shortId(connectionId)} failed, closing:`, error);
    this.disconnect(connectionId, 'write_failed');
  }

  // ============================================
  // Queries
  // ============================================

  get(connectionId: ConnectionId): Connection | undefined {
    return this.connections.get(connectionId);
  }

  /** Open connections subscribed to the group, in subscription order */
  subscribersOf(groupId: GroupId): Connection[] {
    const ids = this.subscribers.get(groupId);
    if (!ids) return [];
    return this.collectOpen(ids);
  }

  membersOf(groupId: GroupId): UserId[] {
    return Array.from(this.members.get(groupId) ?? []);
  }

  isMember(groupId: GroupId, userId: UserId): boolean {
    return this.members.get(groupId)?.has(userId) ?? false;
  }

  openConnectionsOf(userId: UserId): Connection[] {
    const ids = this.byUser.get(userId);
    if (!ids) return [];
    return this.collectOpen(ids);
  }

  get size(): number {
    return this.connections.size;
  }

  // ============================================
  // Internals
  // ============================================

  private subscribe(connection: Connection, groupId: GroupId): boolean {
    if (groupId.length === 0) {
      throw new RelayError('INVALID_PAYLOAD', 'group id must be a non-empty string');
    }

    const added = connection.subscribe(groupId);
    let ids = this.subscribers.get(groupId);
    if (!ids) {
      ids = new Set();
      this.subscribers.set(groupId, ids);
    }
    ids.add(connection.id);
    this.addMember(groupId, connection.userId);
    return added;
  }

  private removeSubscriber(groupId: GroupId, connectionId: ConnectionId): void {
    const ids = this.subscribers.get(groupId);
    if (!ids) return;
    ids.delete(connectionId);
    if (ids.size === 0) {
      this.subscribers.delete(groupId);
    }
  }

  private collectOpen(ids: Set<ConnectionId>): Connection[] {
    const result: Connection[] = [];
    for (const id of ids) {
      const connection = this.connections.get(id);
      if (connection?.isOpen) result.push(connection);
    }
    return result;
  }

  private require(connectionId: ConnectionId): Connection {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      throw new RelayError('NOT_FOUND', `unknown connection ${connectionId}`, { connectionId });
    }
    return connection;
  }

  private requireOpen(connectionId: ConnectionId): Connection {
    const connection = this.require(connectionId);
    if (!connection.isOpen) {
      throw new RelayError('CONNECTION_CLOSED', `connection ${connectionId} is ${connection.state}`, {
        connectionId,
      });
    }
    return connection;
  }

  private invoke(event: 'opened' | 'closed', fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.error(`[ConnectionRegistry] Connection ${event} handler failed:`, err);
    }
  }
}
