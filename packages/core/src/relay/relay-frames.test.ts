import { describe, expect, it } from 'vitest';
import { RelayError } from '../errors/relay-error.js';
import {
  encodeFrame,
  errorFrame,
  isJoinFrame,
  isRelayFrame,
  isServerFrame,
  isWelcomeFrame,
  parseClientFrame,
} from './relay-frames.js';

function expectInvalid(raw: string, message: string, maxPayloadBytes?: number): void {
  expect(() => parseClientFrame(raw, maxPayloadBytes)).toThrow(RelayError);
  expect(() => parseClientFrame(raw, maxPayloadBytes)).toThrow(message);
}

describe('relay frames', () => {
  describe('type guards', () => {
    it('accepts well-formed frames', () => {
      expect(isJoinFrame({ type: 'join', groupId: 'g1' })).toBe(true);
      expect(isRelayFrame({ type: 'relay', groupId: 'g1', kind: 'commit', ciphertext: 'AAAA' })).toBe(true);
      expect(isWelcomeFrame({ type: 'welcome', invitee: 'bob', welcome: 'w' })).toBe(true);
      expect(isWelcomeFrame({ type: 'welcome', invitee: 'bob', welcome: 'w', ratchetTree: 't' })).toBe(true);
    });

    it('rejects malformed frames', () => {
      expect(isJoinFrame(null)).toBe(false);
      expect(isJoinFrame({ type: 'join', groupId: '' })).toBe(false);
      expect(isRelayFrame({ type: 'relay', groupId: 'g1', kind: 'proposal', ciphertext: 'AAAA' })).toBe(false);
      expect(isRelayFrame({ type: 'relay', groupId: 'g1', kind: 'application', ciphertext: '' })).toBe(false);
      expect(isWelcomeFrame({ type: 'welcome', invitee: 'bob', welcome: 'w', ratchetTree: 42 })).toBe(false);
      expect(isJoinFrame(['join', 'g1'])).toBe(false);
    });

    it('recognizes server frames', () => {
      expect(isServerFrame({ type: 'relayed', groupId: 'g', sequence: 1, delivered: 0, queued: 0 })).toBe(true);
      expect(isServerFrame({ type: 'relay' })).toBe(false);
    });
  });

  describe('parseClientFrame', () => {
    it('parses each client frame type', () => {
      expect(parseClientFrame('{"type":"join","groupId":"g1"}')).toEqual({ type: 'join', groupId: 'g1' });
      expect(parseClientFrame('{"type":"leave","groupId":"g1"}')).toEqual({ type: 'leave', groupId: 'g1' });
      expect(parseClientFrame('{"type":"relay","groupId":"g1","kind":"application","ciphertext":"AQID"}')).toEqual({
        type: 'relay',
        groupId: 'g1',
        kind: 'application',
        ciphertext: 'AQID',
      });
      expect(parseClientFrame('{"type":"welcome","invitee":"bob","welcome":"d2Vs"}')).toEqual({
        type: 'welcome',
        invitee: 'bob',
        welcome: 'd2Vs',
        ratchetTree: undefined,
      });
    });

    it('drops unknown fields', () => {
      expect(parseClientFrame('{"type":"join","groupId":"g1","extra":true}')).toEqual({ type: 'join', groupId: 'g1' });
    });

    it('rejects invalid JSON', () => {
      expectInvalid('{not json', 'frame is not valid JSON');
    });

    it('rejects non-object frames', () => {
      expectInvalid('"join"', 'frame must be an object with a type');
      expectInvalid('{"groupId":"g1"}', 'frame must be an object with a type');
    });

    it('rejects unknown frame types', () => {
      expectInvalid('{"type":"subscribe","groupId":"g1"}', 'unknown frame type: subscribe');
    });

    it('rejects known types with missing fields', () => {
      expectInvalid('{"type":"join"}', 'malformed join frame');
      expectInvalid('{"type":"relay","groupId":"g1","kind":"application","ciphertext":""}', 'malformed relay frame');
    });

    it('rejects payloads above the size limit', () => {
      expectInvalid('{"type":"relay","groupId":"g1","kind":"commit","ciphertext":"123456789"}', 'ciphertext exceeds 8 bytes', 8);
      expectInvalid('{"type":"welcome","invitee":"bob","welcome":"w","ratchetTree":"123456789"}', 'ratchetTree exceeds 8 bytes', 8);
    });
  });

  it('encodes server frames as JSON', () => {
    const frame = errorFrame(new RelayError('INVALID_PAYLOAD', 'bad frame'));
    expect(encodeFrame(frame)).toBe('{"type":"error","code":"INVALID_PAYLOAD","error":"bad frame"}');
  });
});
