import { err, ok, toError, type FirewallSyncOutcome, type Result } from '@ipsync/common';

import { logger } from '../../core/logger/index.js';
import type { FirewallRuleReader } from './firewall-rules.reader.js';
import type { FirewallRuleWriter } from './firewall-rules.writer.js';
import type { LatestIpProvider } from './latest-ip.provider.js';

export class FirewallSyncHandler {
  constructor(
    private readonly latestIpProvider: Pick<LatestIpProvider, 'getLatestIp'>,
    private readonly reader: FirewallRuleReader,
    private readonly writer: FirewallRuleWriter,
  ) {}

  /**
   * Adds the latest recorded IP to the allow-list when it is missing.
   * Existing entries are kept in order; nothing is removed.
   */
  async sync(): Promise<FirewallSyncOutcome> {
    logger.info('Starting firewall allow-list sync.');

    const latestIp = await this.latestIpProvider.getLatestIp();
    logger.info({ latestIp }, 'Latest recorded IP resolved.');

    const existing = await this.reader.readAllowList();

    if (existing.includes(latestIp)) {
      logger.info({ latestIp }, 'No IP changes detected.');
      return { status: 'unchanged', latestIp, allowList: existing };
    }

    const allowList = [...existing, latestIp];
    await this.writer.replaceAllowList(allowList);
    logger.info({ latestIp, ruleCount: allowList.length }, 'Firewall allow-list updated.');

    return { status: 'updated', latestIp, allowList };
  }

  /**
   * Single catch point for a sync run. Every failure, whichever step raised
   * it, comes back as the same `Failure`.
   */
  async handle(): Promise<Result<FirewallSyncOutcome, Error>> {
    try {
      return ok(await this.sync());
    } catch (error) {
      const failure = toError(error);
      logger.error({ err: failure }, `Firewall update failed: ${failure.message}`);
      return err(failure);
    }
  }
}
