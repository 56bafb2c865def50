/**
 * Node entry point
 */

import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { createApp } from './index.js';
import { createServices } from './services.js';

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Card gateway listening on port ${info.port} (store: ${services.store.kind})`);
});

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;

  console.log(`Received ${signal}, shutting down`);
  server.close();
  services
    .shutdown()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
