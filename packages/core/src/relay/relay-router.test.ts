import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ConnectionTransport } from '../connections/connection.js';
import { ConnectionRegistry } from '../connections/connection-registry.js';
import { PendingBuffer } from './pending-buffer.js';
import { RelayRouter } from './relay-router.js';

class FakeTransport implements ConnectionTransport {
  sent: string[] = [];
  bufferedAmount = 0;
  failWrites = false;

  send(data: string): void {
    if (this.failWrites) throw new Error('socket hang up');
    this.sent.push(data);
  }

  close(): void {}

  frames(): Array<Record<string, unknown>> {
    return this.sent.map((raw) => JSON.parse(raw));
  }

  ciphertexts(): unknown[] {
    return this.frames()
      .filter((frame) => frame.type === 'payload')
      .map((frame) => frame.ciphertext);
  }
}

describe('RelayRouter', () => {
  let registry: ConnectionRegistry;
  let pending: PendingBuffer;
  let router: RelayRouter;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    registry = new ConnectionRegistry();
    pending = new PendingBuffer({}, { autoStart: false });
    router = new RelayRouter(registry, pending);
  });

  afterEach(() => {
    pending.stop();
    vi.restoreAllMocks();
  });

  function open(userId: string, groups: string[] = ['G']) {
    const transport = new FakeTransport();
    const connection = registry.connect(userId, transport, { groups });
    return { transport, connection };
  }

  describe('fan-out', () => {
    it('delivers in arrival order and skips the sending connection', async () => {
      const x = open('xavier');
      const y = open('yara');
      const z = open('zoe');

      await Promise.all([
        router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'c1' }),
        router.relay(y.connection.id, 'G', { kind: 'application', ciphertext: 'c2' }),
      ]);

      expect(y.transport.ciphertexts()).toEqual(['c1', 'c2']);
      expect(z.transport.ciphertexts()).toEqual(['c1', 'c2']);
      expect(x.transport.ciphertexts()).toEqual(['c2']);
    });

    it('stamps a strictly increasing sequence per group', async () => {
      const x = open('xavier', ['G', 'H']);
      const y = open('yara', ['G', 'H']);

      const first = await router.relay(x.connection.id, 'G', { kind: 'commit', ciphertext: 'a' });
      const second = await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'b' });
      const other = await router.relay(x.connection.id, 'H', { kind: 'application', ciphertext: 'c' });

      expect([first.sequence, second.sequence, other.sequence]).toEqual([1, 2, 1]);
      expect(router.sequenceOf('G')).toBe(2);
      expect(y.transport.frames()[0]).toMatchObject({
        type: 'payload',
        groupId: 'G',
        sender: 'xavier',
        kind: 'commit',
        ciphertext: 'a',
        sequence: 1,
      });
    });

    it('keeps per-group order under many concurrent relays', async () => {
      const x = open('xavier');
      const y = open('yara');
      const ciphertexts = Array.from({ length: 25 }, (_, i) => `c${i}`);

      await Promise.all(
        ciphertexts.map((ciphertext) => router.relay(x.connection.id, 'G', { kind: 'application', ciphertext })),
      );

      expect(y.transport.ciphertexts()).toEqual(ciphertexts);
      const sequences = y.transport.frames().map((frame) => frame.sequence);
      expect(sequences).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));
    });

    it('reports live deliveries only', async () => {
      const x = open('xavier');
      open('yara');
      open('zoe');

      const result = await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'hi' });

      expect(result).toEqual({ delivered: 2, queued: 0, sequence: 1 });
    });

    it('echoes to the sender when exclusion is off', async () => {
      const echoing = new RelayRouter(registry, pending, { excludeSender: false });
      const x = open('xavier');

      await echoing.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'me' });

      expect(x.transport.ciphertexts()).toEqual(['me']);
    });

    it('still delivers to the sender user other connections', async () => {
      const laptop = open('xavier');
      const phone = open('xavier');

      await router.relay(laptop.connection.id, 'G', { kind: 'application', ciphertext: 'sync' });

      expect(laptop.transport.ciphertexts()).toEqual([]);
      expect(phone.transport.ciphertexts()).toEqual(['sync']);
    });

    it('does not deliver to connections of other groups', async () => {
      const x = open('xavier');
      const outsider = open('olga', ['other']);

      await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'secret' });

      expect(outsider.transport.sent).toEqual([]);
    });
  });

  describe('failures', () => {
    it('purges a throwing subscriber and keeps delivering to the rest', async () => {
      const x = open('xavier');
      const y = open('yara');
      const z = open('zoe');
      y.transport.failWrites = true;

      const result = await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'c1' });

      expect(z.transport.ciphertexts()).toEqual(['c1']);
      expect(y.connection.state).toBe('closed');
      expect(registry.subscribersOf('G').map((c) => c.userId)).toEqual(['xavier', 'zoe']);
      // Yara is now offline, so the frame waits for her next connection
      expect(result).toEqual({ delivered: 1, queued: 1, sequence: 1 });
      expect(pending.pendingFor('yara')).toBe(1);
    });

    it('never delivers to a connection after disconnect returns', async () => {
      const x = open('xavier');
      const z = open('zoe');

      await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'before' });
      registry.disconnect(z.connection.id, 'client');
      await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'after' });

      expect(z.transport.ciphertexts()).toEqual(['before']);
    });

    it('rejects an empty or oversized ciphertext and leaves the sender open', async () => {
      const strict = new RelayRouter(registry, pending, { maxPayloadBytes: 8 });
      const x = open('xavier');

      await expect(strict.relay(x.connection.id, 'G', { kind: 'application', ciphertext: '' })).rejects.toMatchObject({
        code: 'INVALID_PAYLOAD',
      });
      await expect(
        strict.relay(x.connection.id, 'G', { kind: 'application', ciphertext: '123456789' }),
      ).rejects.toMatchObject({ code: 'INVALID_PAYLOAD' });
      expect(x.connection.isOpen).toBe(true);
    });

    it('rejects an empty group id', async () => {
      const x = open('xavier');
      await expect(router.relay(x.connection.id, '', { kind: 'application', ciphertext: 'c' })).rejects.toMatchObject({
        code: 'INVALID_PAYLOAD',
      });
    });

    it('rejects unknown and closing senders', async () => {
      const x = open('xavier');
      registry.beginClose(x.connection.id);

      await expect(router.relay('conn-missing', 'G', { kind: 'application', ciphertext: 'c' })).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
      await expect(router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'c' })).rejects.toMatchObject({
        code: 'CONNECTION_CLOSED',
      });
    });
  });

  describe('offline members', () => {
    it('buffers for a member with no open connection and flushes once on connect', async () => {
      const x = open('xavier');
      registry.addMember('G', 'zoe');

      const result = await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'c3' });
      expect(result.queued).toBe(1);
      expect(pending.pendingFor('zoe')).toBe(1);

      const z = open('zoe');
      expect(z.transport.ciphertexts()).toEqual(['c3']);
      expect(pending.pendingFor('zoe')).toBe(0);

      const again = open('zoe');
      expect(again.transport.ciphertexts()).toEqual([]);
    });

    it('buffers for a member who disconnected', async () => {
      const x = open('xavier');
      const z = open('zoe');
      registry.disconnect(z.connection.id, 'client');

      await router.relay(x.connection.id, 'G', { kind: 'commit', ciphertext: 'while-away' });

      expect(pending.pendingFor('zoe')).toBe(1);
    });

    it('keeps buffering for a member whose reconnect handshake was rejected', async () => {
      const x = open('xavier');
      const z = open('zoe');
      registry.disconnect(z.connection.id, 'client');
      const rejected = new FakeTransport();
      expect(() => registry.connect('zoe', rejected, { groups: ['G', ''] })).toThrow();

      const result = await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'c3' });

      expect(result).toEqual({ delivered: 0, queued: 1, sequence: 1 });
      expect(rejected.sent).toEqual([]);
      expect(pending.pendingFor('zoe')).toBe(1);
    });

    it('neither delivers nor buffers for a member online without a subscription', async () => {
      const x = open('xavier');
      registry.addMember('G', 'zoe');
      const z = open('zoe', []);

      const result = await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'c' });

      expect(result).toEqual({ delivered: 0, queued: 0, sequence: 1 });
      expect(z.transport.sent).toEqual([]);
    });

    it('keeps undelivered frames when the flush hits a broken socket', async () => {
      const x = open('xavier');
      registry.addMember('G', 'zoe');
      await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'one' });
      await router.relay(x.connection.id, 'G', { kind: 'application', ciphertext: 'two' });

      const broken = new FakeTransport();
      broken.failWrites = true;
      const connection = registry.connect('zoe', broken, { groups: ['G'] });

      expect(connection.state).toBe('closed');
      expect(pending.pendingFor('zoe')).toBe(2);

      const z = open('zoe');
      expect(z.transport.ciphertexts()).toEqual(['one', 'two']);
    });
  });

  describe('welcome', () => {
    it('delivers to every open connection of the invitee', async () => {
      const x = open('xavier');
      const laptop = open('ines', []);
      const phone = open('ines', []);

      const result = await router.sendWelcome(x.connection.id, 'ines', { welcome: 'w1', ratchetTree: 'tree' });

      expect(result).toEqual({ delivered: 2, queued: 0 });
      for (const transport of [laptop.transport, phone.transport]) {
        expect(transport.frames()).toEqual([
          expect.objectContaining({ type: 'welcome', sender: 'xavier', welcome: 'w1', ratchetTree: 'tree' }),
        ]);
      }
    });

    it('buffers for an offline invitee until they connect', async () => {
      const x = open('xavier');

      const result = await router.sendWelcome(x.connection.id, 'ines', { welcome: 'w1' });
      expect(result).toEqual({ delivered: 0, queued: 1 });

      const ines = open('ines', []);
      expect(ines.transport.frames()).toEqual([expect.objectContaining({ type: 'welcome', welcome: 'w1' })]);
    });

    it('rejects an empty welcome or invitee', async () => {
      const x = open('xavier');

      await expect(router.sendWelcome(x.connection.id, 'ines', { welcome: '' })).rejects.toMatchObject({
        code: 'INVALID_PAYLOAD',
      });
      await expect(router.sendWelcome(x.connection.id, '', { welcome: 'w' })).rejects.toMatchObject({
        code: 'INVALID_PAYLOAD',
      });
    });
  });
});
