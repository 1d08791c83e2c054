export const RELAY_SERVER_VERSION = '0.1.0';

export { createRelayServer } from './server.js';
export type { RelayServer, RelayServerDependencies } from './server.js';
export { DEFAULT_CONFIG, USAGE, loadConfig } from './config.js';
export type { RelayServerConfig } from './config.js';
export { createApp, errorHandler, notFoundHandler, statusFor } from './http/index.js';
export type { AppDependencies } from './http/index.js';
export { attachRelayGateway, parseUpgradeTarget } from './ws/relay-gateway.js';
export type { RelayGatewayOptions } from './ws/relay-gateway.js';
