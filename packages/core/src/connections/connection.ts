import { RelayError } from '../errors/relay-error.js';
import type { ConnectionId, GroupId, UserId } from '../types/index.js';

export type ConnectionState = 'connecting' | 'open' | 'closing' | 'closed';

/** Why a connection was closed */
export type CloseReason = 'client' | 'server' | 'error' | 'backpressure' | 'write_failed' | 'shutdown';

/**
 * Underlying socket as seen by the registry. A `ws` WebSocket satisfies
 * this structurally; tests use in-process stand-ins.
 */
export interface ConnectionTransport {
  /** May throw if the socket is already broken */
  send(data: string): void;
  close(code?: number, reason?: string): void;
  /** Bytes queued by the socket but not yet flushed to the network */
  readonly bufferedAmount: number;
}

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  connecting: ['open', 'closed'],
  open: ['closing', 'closed'],
  closing: ['closed'],
  closed: [],
};

/**
 * One live socket of one user.
 *
 * Only ConnectionRegistry mutates state and subscriptions; everything else
 * holds the id and goes through the registry.
 */
export class Connection {
  readonly id: ConnectionId;
  readonly userId: UserId;
  readonly transport: ConnectionTransport;
  readonly createdAt: number;
  private _state: ConnectionState = 'connecting';
  private _openedAt: number | null = null;
  private _closeReason: CloseReason | null = null;
  private subscriptions = new Set<GroupId>();

  constructor(id: ConnectionId, userId: UserId, transport: ConnectionTransport) {
    this.id = id;
    this.userId = userId;
    this.transport = transport;
    this.createdAt = Date.now();
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === 'open';
  }

  get openedAt(): number | null {
    return this._openedAt;
  }

  get closeReason(): CloseReason | null {
    return this._closeReason;
  }

  /**
   * Move to the next state.
   * @throws RelayError CONNECTION_CLOSED from `closed`, INTERNAL for any other illegal move
   */
  transition(next: ConnectionState, reason?: CloseReason): void {
    if (this._state === 'closed') {
      throw new RelayError('CONNECTION_CLOSED', `connection ${this.id} is closed`, { connectionId: this.id });
    }
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new RelayError('INTERNAL', `illegal connection transition ${this._state} -> ${next}`, {
        connectionId: this.id,
      });
    }

    this._state = next;
    if (next === 'open') {
      this._openedAt = Date.now();
    } else if (next === 'closed') {
      this._closeReason = reason ?? 'server';
    }
  }

  isSubscribed(groupId: GroupId): boolean {
    return this.subscriptions.has(groupId);
  }

  get groups(): GroupId[] {
    return Array.from(this.subscriptions);
  }

  /** @returns true if the subscription is new */
  subscribe(groupId: GroupId): boolean {
    if (this.subscriptions.has(groupId)) return false;
    this.subscriptions.add(groupId);
    return true;
  }

  /** @returns true if the connection was subscribed */
  unsubscribe(groupId: GroupId): boolean {
    return this.subscriptions.delete(groupId);
  }

  clearSubscriptions(): GroupId[] {
    const groups = Array.from(this.subscriptions);
    this.subscriptions.clear();
    return groups;
  }
}
