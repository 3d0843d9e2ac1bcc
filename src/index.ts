// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { loadServerConfig } from './config/env.js';
import { createServer } from './server.js';
import { registerBuiltinTools } from './tools/index.js';
import { errorForLog } from './utils/logger.js';

const config = loadServerConfig();
const { app, registry } = createServer({ config, registerTools: registerBuiltinTools });

// This helper closes the transport, which closes every open session, before exiting.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');
  await app.close();
  app.log.info({ signal }, 'shutdown_completed');
  process.exit(0);
}

function handleSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    app.log.error({ signal, error: errorForLog(error) }, 'shutdown_failed');
    process.exit(1);
  });
}

process.on('SIGTERM', () => handleSignal('SIGTERM'));
process.on('SIGINT', () => handleSignal('SIGINT'));

app
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info({ host: config.host, port: config.port, tools: registry.size }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });
