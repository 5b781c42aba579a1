/**
 * API server entry point
 *
 * Run with: `tsx backend/src/server.ts`
 */

import { serve } from '@hono/node-server';
import { createApp } from './app';
import { config } from './config';
import { createEconomy } from './economy';
import { closeQueues } from './jobs/queues';
import { GracefulShutdown } from './lib/shutdown';
import { logger as pinoLogger } from './logger';
import { HttpContentMetricsProvider } from './services';

async function startServer(): Promise<void> {
  const economy = await createEconomy({
    content: new HttpContentMetricsProvider(config.external.contentServiceUrl),
  });
  const app = createApp(economy);

  const server = serve({ fetch: app.fetch, port: config.app.port }, (info) => {
    pinoLogger.info(
      { port: info.port, ledger: economy.store.driver, environment: config.app.env },
      `XP economy server listening on http://localhost:${info.port}`
    );
  });

  const shutdown = new GracefulShutdown();
  shutdown.registerHttpServer(server);
  shutdown.register('queues', 10, closeQueues);
  shutdown.register('economy', 20, () => economy.close());
  shutdown.setup();
}

process.on('unhandledRejection', (reason) => {
  pinoLogger.error({ reason }, 'Unhandled promise rejection');
});

startServer().catch((err) => {
  pinoLogger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
