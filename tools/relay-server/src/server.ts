import { type Server as HttpServer, createServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Express } from 'express';
import {
  type BackupStorage,
  BackupStore,
  ConnectionRegistry,
  type KeyPackageStore,
  MemoryBackupStorage,
  MemoryKeyPackageStore,
  PendingBuffer,
  RelayRouter,
  ReservationManager,
  shortId,
} from 'keyrelay-core';
import type { WebSocketServer } from 'ws';
import { DEFAULT_CONFIG, type RelayServerConfig } from './config.js';
import { createApp } from './http/app.js';
import { attachRelayGateway } from './ws/relay-gateway.js';

/** Storage backends; both default to in-memory */
export interface RelayServerDependencies {
  keyPackageStore?: KeyPackageStore;
  backupStorage?: BackupStorage;
}

export interface RelayServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  reservations: ReservationManager;
  registry: ConnectionRegistry;
  pending: PendingBuffer;
  router: RelayRouter;
  backups: BackupStore;
  /** Resolves with the bound address once the server accepts connections */
  listening: Promise<AddressInfo>;
  close: () => Promise<void>;
}

export function createRelayServer(
  config: RelayServerConfig = DEFAULT_CONFIG,
  deps: RelayServerDependencies = {},
): RelayServer {
  const reservations = new ReservationManager(
    deps.keyPackageStore ?? new MemoryKeyPackageStore(),
    {},
    { timeoutMs: config.reservationTimeoutMs, sweepIntervalMs: config.sweepIntervalMs },
  );
  const pending = new PendingBuffer(
    {
      onDropped: (recipientId, reason) => {
        console.warn(`[RelayServer] Dropped pending frame for ${shortId(recipientId)} (${reason})`);
      },
    },
    { maxPerUser: config.pendingQueueLimit, ttlMs: config.pendingTtlMs },
  );
  const registry = new ConnectionRegistry({ highWatermarkBytes: config.highWatermarkBytes });
  const router = new RelayRouter(registry, pending, {
    excludeSender: config.excludeSender,
    maxPayloadBytes: config.maxPayloadBytes,
  });
  const backups = new BackupStore(deps.backupStorage ?? new MemoryBackupStorage());

  const app = createApp({
    reservations,
    backups,
    maxPayloadBytes: config.maxPayloadBytes,
    maxRequestBytes: config.maxRequestBytes,
  });
  const httpServer = createServer(app);
  const wss = attachRelayGateway(httpServer, { registry, router, maxPayloadBytes: config.maxPayloadBytes });

  const listening = new Promise<AddressInfo>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off('error', reject);
      const address = httpServer.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('relay server is not bound to a TCP port'));
        return;
      }
      resolve(address);
    });
  });

  async function close(): Promise<void> {
    reservations.stop();
    pending.stop();
    registry.closeAll('shutdown');
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });

    if (!httpServer.listening) return;
    httpServer.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });
  }

  return { app, httpServer, wss, reservations, registry, pending, router, backups, listening, close };
}
