import type { ErrorFrame, PayloadFrame, RelayedFrame, WelcomeDeliveryFrame } from 'keyrelay-core';
import { RelayClient } from 'keyrelay-sdk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG } from './config.js';
import { type RelayServer, createRelayServer } from './server.js';

async function waitUntil(condition: () => boolean): Promise<void> {
  while (!condition()) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('end to end through the SDK', () => {
  let server: RelayServer;
  let baseUrl: string;
  const clients: RelayClient[] = [];

  function client(userId: string): RelayClient {
    const created = new RelayClient({ baseUrl, userId });
    clients.push(created);
    return created;
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    server = createRelayServer({ ...DEFAULT_CONFIG, host: '127.0.0.1', port: 0, maxPayloadBytes: 64 });
    const address = await server.listening;
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const c of clients) {
      await c.disconnect();
    }
    clients.length = 0;
    await server.close();
    vi.restoreAllMocks();
  });

  it('should let two claimants split a pool without sharing a key package', async () => {
    const alice = client('alice');
    const bob = client('bob');
    const carol = client('carol');

    await alice.uploadKeyPackages(['kp-blob-1', 'kp-blob-2']);

    const [forBob, forCarol] = await Promise.all([
      bob.reserveKeyPackage('alice', 'team'),
      carol.reserveKeyPackage('alice', 'team'),
    ]);
    expect(new Set([forBob.keyPackage, forCarol.keyPackage])).toEqual(new Set(['kp-blob-1', 'kp-blob-2']));

    await expect(bob.reserveKeyPackage('alice')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      context: { status: 404 },
    });

    await bob.consumeReservation(forBob.reservationId);
    await carol.releaseReservation(forCarol.reservationId);

    expect(await alice.keyPackageStatus()).toEqual({ available: 1, reserved: 0, consumed: 1, expired: 0 });
    await expect(bob.consumeReservation(forBob.reservationId)).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('should relay group messages between connected clients', async () => {
    const alice = client('alice');
    const bob = client('bob');
    const received: PayloadFrame[] = [];
    const acks: RelayedFrame[] = [];
    bob.onPayload((frame) => received.push(frame));
    alice.onRelayed((frame) => acks.push(frame));

    await alice.connect(['team']);
    const ready = await bob.connect(['team']);
    expect(ready.groups).toEqual(['team']);

    alice.relay('team', 'application', 'ciphertext-1');
    alice.relay('team', 'application', 'ciphertext-2');
    await waitUntil(() => received.length === 2 && acks.length === 2);

    expect(received.map((frame) => [frame.sequence, frame.ciphertext])).toEqual([
      [1, 'ciphertext-1'],
      [2, 'ciphertext-2'],
    ]);
    expect(acks.map((ack) => ack.delivered)).toEqual([1, 1]);
  });

  it('should deliver a welcome to an invitee who connects later', async () => {
    const alice = client('alice');
    const bob = client('bob');
    const welcomes: WelcomeDeliveryFrame[] = [];
    bob.onWelcome((frame) => welcomes.push(frame));

    await alice.connect();
    alice.sendWelcome('bob', 'welcome-blob');
    await waitUntil(() => server.pending.pendingFor('bob') === 1);

    await bob.connect();
    await waitUntil(() => welcomes.length === 1);
    expect(welcomes[0]).toMatchObject({ sender: 'alice', welcome: 'welcome-blob' });
  });

  it('should surface server errors for oversized payloads', async () => {
    const alice = client('alice');
    const errors: ErrorFrame[] = [];
    alice.onServerError((frame) => errors.push(frame));
    await alice.connect(['team']);

    alice.relay('team', 'application', 'x'.repeat(65));
    await waitUntil(() => errors.length === 1);

    expect(errors[0]).toEqual({ type: 'error', code: 'INVALID_PAYLOAD', error: 'ciphertext exceeds 64 bytes' });
  });

  it('should store backups with monotonic versions', async () => {
    const alice = client('alice');

    expect(await alice.storeBackup(1, 'state-v1')).toBe(1);
    expect(await alice.storeBackup(4, 'state-v4')).toBe(4);
    await expect(alice.storeBackup(4, 'state-other')).rejects.toMatchObject({
      code: 'STALE_VERSION',
      context: { status: 409 },
    });

    expect(await alice.fetchBackup()).toMatchObject({ version: 4, blob: 'state-v4' });
  });
});
