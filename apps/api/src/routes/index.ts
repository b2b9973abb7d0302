import { Router } from 'express';

import type { FirewallSyncModule } from '../modules/firewall-sync/firewall-sync.module.js';
import { createHealthRouter } from './health.js';

export function createApiRouter(firewallSyncModule: FirewallSyncModule): Router {
  const router = Router();

  router.use('/health', createHealthRouter(firewallSyncModule.target));
  router.use('/firewall-sync', firewallSyncModule.router);

  return router;
}
