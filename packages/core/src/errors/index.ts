export { RelayError, RELAY_ERROR_CODES, isRelayError, isRelayErrorCode, toRelayError } from './relay-error.js';
export type { RelayErrorCode } from './relay-error.js';
