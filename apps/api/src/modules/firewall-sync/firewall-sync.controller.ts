import type { Request, Response } from 'express';
import type { FirewallSyncOutcome } from '@ipsync/common';

import { asyncHandler } from '../../shared/http/async-handler.js';
import type { FirewallSyncHandler } from './firewall-sync.handler.js';

export const describeOutcome = (outcome: FirewallSyncOutcome) =>
  outcome.status === 'updated'
    ? `Process completed. Added ${outcome.latestIp} to the firewall allow-list.`
    : 'Process completed. No changes detected.';

export const createFirewallSyncController = (handler: FirewallSyncHandler) => ({
  runSync: asyncHandler(async (_req: Request, res: Response) => {
    const result = await handler.handle();

    if (!result.ok) {
      res.status(400).type('text/plain').send(`Error: ${result.error.message}`);
      return;
    }

    res.status(200).type('text/plain').send(describeOutcome(result.value));
  }),
});
