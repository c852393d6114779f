// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { loadConfig } from './config/app-config.js';
import { createServer } from './server.js';
import { errorForLog } from './utils/logger.js';

const config = loadConfig();
const { app, store } = createServer(config);

// This helper closes HTTP first so no request touches SQLite after the handle is released.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');

  try {
    await app.close();
  } finally {
    store.close();
  }

  app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info({ event: 'server_started', host: config.host, port: config.port, dbPath: config.dbPath }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });
