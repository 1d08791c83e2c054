import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import {
  type Connection,
  type ConnectionId,
  type ConnectionRegistry,
  type ConnectionTransport,
  type GroupId,
  RelayError,
  type RelayRouter,
  type ServerFrame,
  type UserId,
  encodeFrame,
  errorFrame,
  parseClientFrame,
  shortId,
  toRelayError,
} from 'keyrelay-core';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';

export interface RelayGatewayOptions {
  registry: ConnectionRegistry;
  router: RelayRouter;
  maxPayloadBytes: number;
}

type UpgradeTarget = { ok: true; userId: UserId; groups: GroupId[] } | { ok: false; status: number; reason: string };

const WS_PATH = /^\/ws\/([^/]+)$/;

/**
 * Accept WebSocket upgrades on /ws/:userId?groups=a,b and bridge each
 * socket into the connection registry.
 */
export function attachRelayGateway(httpServer: HttpServer, options: RelayGatewayOptions): WebSocketServer {
  // Room for JSON framing and escaping around one maximal blob
  const wss = new WebSocketServer({ noServer: true, maxPayload: options.maxPayloadBytes * 2 + 4096 });

  httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const target = parseUpgradeTarget(req.url);
    if (!target.ok) {
      rejectUpgrade(socket, target.status, target.reason);
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      bindSocket(ws, target.userId, target.groups, options);
    });
  });

  return wss;
}

export function parseUpgradeTarget(rawUrl: string | undefined): UpgradeTarget {
  const url = new URL(rawUrl ?? '/', 'http://localhost');
  const match = WS_PATH.exec(url.pathname);
  if (!match) {
    return { ok: false, status: 404, reason: 'Not Found' };
  }

  let userId: string;
  try {
    userId = decodeURIComponent(match[1]);
  } catch (err) {
    if (err instanceof URIError) return { ok: false, status: 400, reason: 'Bad Request' };
    throw err;
  }

  const groups = (url.searchParams.get('groups') ?? '')
    .split(',')
    .map((group) => group.trim())
    .filter((group) => group.length > 0);
  return { ok: true, userId, groups: Array.from(new Set(groups)) };
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

function bindSocket(ws: WebSocket, userId: UserId, groups: GroupId[], options: RelayGatewayOptions): void {
  const { registry } = options;
  let connectionId: ConnectionId | null = null;

  const transport: ConnectionTransport = {
    send: (data) => {
      ws.send(data, (err) => {
        if (err && connectionId !== null) {
          registry.reportWriteFailure(connectionId, err);
        }
      });
    },
    close: (code, reason) => ws.close(code, reason),
    get bufferedAmount() {
      return ws.bufferedAmount;
    },
  };

  let connection: Connection;
  try {
    connection = registry.connect(userId, transport, {
      groups,
      onOpen: (opened) => {
        connectionId = opened.id;
        opened.transport.send(
          encodeFrame({ type: 'ready', connectionId: opened.id, userId: opened.userId, groups: opened.groups }),
        );
      },
    });
  } catch (err) {
    const error = toRelayError(err);
    console.warn(`[RelayGateway] Rejected connection for ${shortId(userId)}: ${error.message}`);
    ws.close(1008, error.message);
    return;
  }

  const id = connection.id;
  ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
    handleMessage(id, data, isBinary, options).catch((err: unknown) => {
      console.error(`[RelayGateway] Message handling failed for ${shortId(id)}:`, err);
    });
  });
  ws.on('close', () => {
    registry.disconnect(id, 'client');
  });
  ws.on('error', (err) => {
    console.warn(`[RelayGateway] Socket error on ${shortId(id)}:`, err.message);
    registry.disconnect(id, 'error');
  });
}

async function handleMessage(
  connectionId: ConnectionId,
  data: WebSocket.RawData,
  isBinary: boolean,
  options: RelayGatewayOptions,
): Promise<void> {
  const { registry, router } = options;
  const reply = (frame: ServerFrame): void => {
    registry.send(connectionId, encodeFrame(frame));
  };

  try {
    if (isBinary) {
      throw new RelayError('INVALID_PAYLOAD', 'binary frames are not supported');
    }
    const frame = parseClientFrame(rawDataToString(data), options.maxPayloadBytes);

    switch (frame.type) {
      case 'join':
        registry.joinGroup(connectionId, frame.groupId);
        reply({ type: 'joined', groupId: frame.groupId });
        break;
      case 'leave':
        registry.leaveGroup(connectionId, frame.groupId);
        reply({ type: 'left', groupId: frame.groupId });
        break;
      case 'relay': {
        const result = await router.relay(connectionId, frame.groupId, {
          kind: frame.kind,
          ciphertext: frame.ciphertext,
        });
        reply({ type: 'relayed', groupId: frame.groupId, ...result });
        break;
      }
      case 'welcome':
        await router.sendWelcome(connectionId, frame.invitee, {
          welcome: frame.welcome,
          ratchetTree: frame.ratchetTree,
        });
        break;
    }
  } catch (err) {
    const error = toRelayError(err);
    if (error.code === 'INTERNAL') {
      console.error(`[RelayGateway] Frame from ${shortId(connectionId)} failed:`, err);
      reply(errorFrame(new RelayError('INTERNAL', 'internal server error')));
      return;
    }
    reply(errorFrame(error));
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
