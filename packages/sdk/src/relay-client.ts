import {
  type Backup,
  type ClientFrame,
  type ErrorFrame,
  type GroupId,
  type KeyPackagePoolStatus,
  type PayloadFrame,
  type PayloadKind,
  type ReadyFrame,
  RelayError,
  type RelayedFrame,
  type ServerFrame,
  type UserId,
  type WelcomeDeliveryFrame,
  isRelayErrorCode,
  isServerFrame,
} from 'keyrelay-core';
import WebSocket from 'ws';

export interface RelayClientOptions {
  /** HTTP base URL of the relay server, e.g. http://localhost:4000 */
  baseUrl: string;
  userId: UserId;
}

/** Reserve response as sent over HTTP */
export interface ReservedKeyPackageResponse {
  reservationId: string;
  keyPackageId: string;
  keyPackage: string;
  expiresAt: number;
}

export type PayloadHandler = (frame: PayloadFrame) => void;
export type WelcomeHandler = (frame: WelcomeDeliveryFrame) => void;
export type RelayedHandler = (frame: RelayedFrame) => void;
export type ServerErrorHandler = (frame: ErrorFrame) => void;
export type StatusHandler = (status: string, detail?: string) => void;

/**
 * RelayClient - thin client for the relay server: key package and backup
 * calls over HTTP, group traffic over one WebSocket.
 */
export class RelayClient {
  private baseUrl: string;
  private userId: UserId;
  private ws: WebSocket | null = null;
  private _connectionId: string | null = null;
  private pendingReady: { resolve: (frame: ReadyFrame) => void; reject: (err: Error) => void } | null = null;

  private payloadHandlers: PayloadHandler[] = [];
  private welcomeHandlers: WelcomeHandler[] = [];
  private relayedHandlers: RelayedHandler[] = [];
  private errorHandlers: ServerErrorHandler[] = [];
  private statusHandlers: StatusHandler[] = [];

  constructor(options: RelayClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.userId = options.userId;
  }

  get connectionId(): string | null {
    return this._connectionId;
  }

  get isConnected(): boolean {
    return this.ws !== null && this._connectionId !== null;
  }

  // ============================================
  // Key packages
  // ============================================

  async uploadKeyPackages(keyPackages: string[], notAfter?: number): Promise<string[]> {
    const body = await this.request('POST', `/users/${encodeURIComponent(this.userId)}/key-packages`, {
      keyPackages,
      notAfter,
    });
    const ids = isRecord(body) ? body.ids : undefined;
    if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
      throw malformed('ids');
    }
    return ids;
  }

  async keyPackageStatus(ownerId: UserId = this.userId): Promise<KeyPackagePoolStatus> {
    const body = await this.request('GET', `/users/${encodeURIComponent(ownerId)}/key-packages/status`);
    return {
      available: requireNumber(body, 'available'),
      reserved: requireNumber(body, 'reserved'),
      consumed: requireNumber(body, 'consumed'),
      expired: requireNumber(body, 'expired'),
    };
  }

  /** Claim one of the owner's key packages on behalf of this user */
  async reserveKeyPackage(ownerId: UserId, groupId?: GroupId): Promise<ReservedKeyPackageResponse> {
    const body = await this.request('POST', `/users/${encodeURIComponent(ownerId)}/key-packages/reserve`, {
      claimantId: this.userId,
      groupId,
    });
    return {
      reservationId: requireString(body, 'reservationId'),
      keyPackageId: requireString(body, 'keyPackageId'),
      keyPackage: requireString(body, 'keyPackage'),
      expiresAt: requireNumber(body, 'expiresAt'),
    };
  }

  async consumeReservation(reservationId: string): Promise<void> {
    await this.request('POST', `/reservations/${encodeURIComponent(reservationId)}/consume`);
  }

  async releaseReservation(reservationId: string): Promise<void> {
    await this.request('POST', `/reservations/${encodeURIComponent(reservationId)}/release`);
  }

  // ============================================
  // Backups
  // ============================================

  async storeBackup(version: number, blob: string): Promise<number> {
    const body = await this.request('PUT', `/backups/${encodeURIComponent(this.userId)}`, { version, blob });
    return requireNumber(body, 'version');
  }

  async fetchBackup(): Promise<Backup> {
    const body = await this.request('GET', `/backups/${encodeURIComponent(this.userId)}`);
    return {
      version: requireNumber(body, 'version'),
      blob: requireString(body, 'blob'),
      storedAt: requireNumber(body, 'storedAt'),
    };
  }

  // ============================================
  // WebSocket
  // ============================================

  /** Open the socket; resolves once the server confirms with a ready frame */
  async connect(groups: GroupId[] = []): Promise<ReadyFrame> {
    if (this.ws) {
      throw new RelayError('INVALID_PAYLOAD', 'already connected');
    }

    const url = new URL(`${this.baseUrl}/ws/${encodeURIComponent(this.userId)}`);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
    if (groups.length > 0) {
      url.searchParams.set('groups', groups.join(','));
    }

    const ws = new WebSocket(url);
    this.ws = ws;

    const ready = new Promise<ReadyFrame>((resolve, reject) => {
      this.pendingReady = { resolve, reject };
    });

    ws.on('message', (data) => {
      this.handleFrame(data.toString());
    });
    ws.on('error', (err) => {
      if (this.pendingReady) {
        this.pendingReady.reject(new Error(`Failed to connect to relay server: ${err.message}`));
        this.pendingReady = null;
        return;
      }
      this.emitStatus('error', err.message);
    });
    ws.on('close', (code, reason) => {
      if (this.ws === ws) {
        this.ws = null;
        this._connectionId = null;
      }
      if (this.pendingReady) {
        this.pendingReady.reject(new Error(`Connection closed before ready (${code})`));
        this.pendingReady = null;
      }
      this.emitStatus('disconnected', reason.toString() || String(code));
    });

    return ready;
  }

  join(groupId: GroupId): void {
    this.sendFrame({ type: 'join', groupId });
  }

  leave(groupId: GroupId): void {
    this.sendFrame({ type: 'leave', groupId });
  }

  relay(groupId: GroupId, kind: PayloadKind, ciphertext: string): void {
    this.sendFrame({ type: 'relay', groupId, kind, ciphertext });
  }

  sendWelcome(invitee: UserId, welcome: string, ratchetTree?: string): void {
    this.sendFrame({ type: 'welcome', invitee, welcome, ratchetTree });
  }

  /** Close the socket; resolves once it is closed */
  async disconnect(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;

    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      ws.close(1000, 'client');
    });
  }

  onPayload(handler: PayloadHandler): void {
    this.payloadHandlers.push(handler);
  }

  onWelcome(handler: WelcomeHandler): void {
    this.welcomeHandlers.push(handler);
  }

  onRelayed(handler: RelayedHandler): void {
    this.relayedHandlers.push(handler);
  }

  onServerError(handler: ServerErrorHandler): void {
    this.errorHandlers.push(handler);
  }

  onStatus(handler: StatusHandler): void {
    this.statusHandlers.push(handler);
  }

  // ============================================
  // Internals
  // ============================================

  private sendFrame(frame: ClientFrame): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new RelayError('CONNECTION_CLOSED', 'not connected');
    }
    this.ws.send(JSON.stringify(frame));
  }

  private handleFrame(raw: string): void {
    let frame: unknown;
    try {
      frame = JSON.parse(raw);
    } catch {
      this.emitStatus('error', 'received invalid JSON');
      return;
    }
    if (!isServerFrame(frame)) {
      this.emitStatus('error', 'received unknown frame');
      return;
    }
    this.dispatch(frame);
  }

  private dispatch(frame: ServerFrame): void {
    switch (frame.type) {
      case 'ready':
        this._connectionId = frame.connectionId;
        this.pendingReady?.resolve(frame);
        this.pendingReady = null;
        this.emitStatus('connected', frame.connectionId);
        break;
      case 'joined':
        this.emitStatus('group:joined', frame.groupId);
        break;
      case 'left':
        this.emitStatus('group:left', frame.groupId);
        break;
      case 'payload':
        for (const handler of this.payloadHandlers) handler(frame);
        break;
      case 'welcome':
        for (const handler of this.welcomeHandlers) handler(frame);
        break;
      case 'relayed':
        for (const handler of this.relayedHandlers) handler(frame);
        break;
      case 'error':
        for (const handler of this.errorHandlers) handler(frame);
        break;
    }
  }

  private emitStatus(status: string, detail?: string): void {
    for (const handler of this.statusHandlers) handler(status, detail);
  }

  private async request(method: string, path: string, payload?: unknown): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: payload === undefined ? undefined : { 'content-type': 'application/json' },
      body: payload === undefined ? undefined : JSON.stringify(payload),
    });

    const text = await response.text();
    let body: unknown = null;
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        if (!response.ok) {
          throw new RelayError('INTERNAL', `HTTP ${response.status}`, { status: response.status });
        }
        throw new RelayError('INTERNAL', 'malformed response: body is not JSON', { status: response.status });
      }
    }

    if (!response.ok) {
      const code = isRecord(body) && isRelayErrorCode(body.code) ? body.code : 'INTERNAL';
      const message = isRecord(body) && typeof body.error === 'string' ? body.error : `HTTP ${response.status}`;
      throw new RelayError(code, message, { status: response.status });
    }
    return body;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(field: string): RelayError {
  return new RelayError('INTERNAL', `malformed response: missing ${field}`);
}

function requireString(body: unknown, field: string): string {
  const value = isRecord(body) ? body[field] : undefined;
  if (typeof value !== 'string') throw malformed(field);
  return value;
}

function requireNumber(body: unknown, field: string): number {
  const value = isRecord(body) ? body[field] : undefined;
  if (typeof value !== 'number') throw malformed(field);
  return value;
}
