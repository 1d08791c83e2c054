export const RELAY_ERROR_CODES = [
  'NOT_FOUND',
  'STALE_VERSION',
  'EXPIRED',
  'INVALID_PAYLOAD',
  'CONNECTION_CLOSED',
  'INTERNAL',
] as const;

export type RelayErrorCode = (typeof RELAY_ERROR_CODES)[number];

export function isRelayErrorCode(value: unknown): value is RelayErrorCode {
  return RELAY_ERROR_CODES.some((code) => code === value);
}

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: RelayErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.context = context;
  }
}

export function isRelayError(value: unknown): value is RelayError {
  return value instanceof RelayError;
}

/**
 * Wrap anything thrown by a storage backend or transport as INTERNAL,
 * leaving RelayErrors untouched.
 */
export function toRelayError(value: unknown, message = 'internal failure'): RelayError {
  if (isRelayError(value)) return value;
  const cause = value instanceof Error ? value.message : String(value);
  return new RelayError('INTERNAL', message, { cause });
}
