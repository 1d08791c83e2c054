import { randomBytes } from 'node:crypto';

/**
 * Random hex string of the given length, drawn from the OS CSPRNG.
 */
export function secureRandomHex(length: number): string {
  return randomBytes(Math.ceil(length / 2))
    .toString('hex')
    .slice(0, length);
}

/**
 * Prefixed id in the form `{prefix}-{timestamp}-{randomHex}`.
 *
 * The timestamp part keeps ids roughly sortable in logs; the random
 * suffix makes them unguessable, which matters for reservation ids since
 * holding one is enough to consume a key package.
 */
export function secureId(prefix: string, randomLength = 16): string {
  return `${prefix}-${Date.now()}-${secureRandomHex(randomLength)}`;
}

/** First eight characters of an id, for log lines */
export function shortId(id: string): string {
  return id.slice(0, 8);
}
