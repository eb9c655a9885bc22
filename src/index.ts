/**
 * Minutes Server Entry Point
 *
 * Loads the config, initializes the services and starts the HTTP server
 * and the recordings poller.
 */

import { serve } from '@hono/node-server';
import { getConfig } from '@/config/config';
import { createApp, createServices } from '@/server';
import { displayBanner } from '@/utils/banner';
import { buildStartupInfo, displayStartup } from '@/utils/startup';

const config = getConfig();

// Display banner immediately
displayBanner();

const services = await createServices(config);
const app = createApp(services);

const server = serve({ fetch: app.fetch, port: config.server.port }, () => {
  void displayStartup(config, buildStartupInfo(config)).then(() => {
    services.startPolling();
  });
});

async function shutdown(signal: string): Promise<void> {
  console.log(`\n  Received ${signal}, shutting down...`);
  server.close();
  await services.shutdown();
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
