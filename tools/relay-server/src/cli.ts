import { isRelayError } from 'keyrelay-core';
import { type RelayServerConfig, USAGE, loadConfig } from './config.js';
import { createRelayServer } from './server.js';

const argv = process.argv.slice(2);
if (argv.includes('--help') || argv.includes('-h')) {
  console.log(USAGE);
  process.exit(0);
}

function readConfig(): RelayServerConfig {
  try {
    return loadConfig(process.env, argv);
  } catch (err) {
    console.error(isRelayError(err) ? err.message : err);
    console.error(USAGE);
    process.exit(2);
  }
}

const server = createRelayServer(readConfig());

server.listening
  .then((address) => {
    console.log(`[RelayServer] Listening on http://${address.address}:${address.port} (WebSocket path /ws/:userId)`);
  })
  .catch((err: unknown) => {
    console.error('[RelayServer] Failed to start:', err);
    process.exit(1);
  });

function shutdown(signal: string): void {
  console.log(`[RelayServer] ${signal} received, shutting down`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      console.error('[RelayServer] Shutdown failed:', err);
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
