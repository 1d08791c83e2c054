export { Connection } from './connection.js';
export type { CloseReason, ConnectionState, ConnectionTransport } from './connection.js';
export { ConnectionRegistry, DEFAULT_HIGH_WATERMARK_BYTES } from './connection-registry.js';
export type {
  ConnectOptions,
  ConnectionClosedHandler,
  ConnectionOpenedHandler,
  ConnectionRegistryOptions,
} from './connection-registry.js';
