export { KEYRELAY_PROTOCOL_VERSION } from 'keyrelay-core';
export { RelayClient } from './relay-client.js';
export type {
  RelayClientOptions,
  ReservedKeyPackageResponse,
  PayloadHandler,
  WelcomeHandler,
  RelayedHandler,
  ServerErrorHandler,
  StatusHandler,
} from './relay-client.js';
