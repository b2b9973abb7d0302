import { Router } from 'express';

import { requireFunctionKey } from '../../core/middleware/function-key.js';
import { createFirewallSyncController } from './firewall-sync.controller.js';
import type { FirewallSyncHandler } from './firewall-sync.handler.js';

export const createFirewallSyncRouter = (handler: FirewallSyncHandler, functionKey: string) => {
  const router = Router();
  const controller = createFirewallSyncController(handler);

  router.post('/', requireFunctionKey(functionKey), controller.runSync);

  return router;
};
