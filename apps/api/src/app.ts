import express from 'express';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';

import type { Environment } from './config/env.js';
import { errorHandler } from './core/middleware/error-handler.js';
import { notFoundHandler } from './core/middleware/not-found.js';
import { requestId } from './core/middleware/request-id.js';
import { logger } from './core/logger/index.js';
import {
  createFirewallSyncModule,
  type FirewallSyncModuleOverrides,
} from './modules/firewall-sync/firewall-sync.module.js';
import { createApiRouter } from './routes/index.js';

export const createApp = (env: Environment, overrides: FirewallSyncModuleOverrides = {}) => {
  const app = express();

  app.set('trust proxy', 1);

  app.use(helmet());
  app.use(requestId);
  app.use(
    pinoHttp({
      logger,
      quietReqLogger: env.NODE_ENV === 'test',
      customProps: (req) => ({ requestId: req.id }),
    }),
  );

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  const firewallSyncModule = createFirewallSyncModule(env, overrides);
  app.use('/api', createApiRouter(firewallSyncModule));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, firewallSyncModule };
};
