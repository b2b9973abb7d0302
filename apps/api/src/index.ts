import { createServer } from 'http';

import { createApp } from './app.js';
import { parseEnvironment } from './config/env.js';
import { logger } from './core/logger/index.js';
import { FirewallSyncScheduler } from './core/scheduler/firewall-sync-scheduler.js';

const env = parseEnvironment();
const { app, firewallSyncModule } = createApp(env);

let scheduler: FirewallSyncScheduler | null = null;
if (env.SYNC_CRON) {
  scheduler = new FirewallSyncScheduler(firewallSyncModule.handler);
  scheduler.start(env.SYNC_CRON);
}

const server = createServer(app);

server.listen(env.PORT, () => {
  logger.info({ port: env.PORT, scheduled: Boolean(scheduler) }, 'Firewall sync API started');
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Received shutdown signal');
  scheduler?.stop();

  server.close((closeErr?: Error) => {
    if (closeErr) {
      logger.error({ err: closeErr }, 'Error during server shutdown');
      process.exit(1);
    }
    logger.info('Server closed');
    process.exit();
  });
};

(['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
  process.on(signal, () => shutdown(signal));
});
