import * as cron from 'node-cron';
import type { FirewallSyncOutcome, Result } from '@ipsync/common';

import { logger } from '../logger/index.js';

export interface SyncRunner {
  handle(): Promise<Result<FirewallSyncOutcome, Error>>;
}

export class FirewallSyncScheduler {
  private task: ReturnType<typeof cron.schedule> | null = null;

  constructor(private readonly runner: SyncRunner) {}

  /**
   * Runs the sync on the given cron expression. Failures are already logged
   * by the runner; a run never stops the schedule.
   */
  start(cronExpression: string): void {
    if (this.task) {
      logger.warn('Firewall sync scheduler is already running');
      return;
    }

    if (!cron.validate(cronExpression)) {
      throw new Error(`Invalid cron expression for firewall sync: ${cronExpression}`);
    }

    logger.info({ cronExpression }, 'Starting firewall sync scheduler');

    this.task = cron.schedule(cronExpression, async () => {
      await this.runOnce();
    });
  }

  async runOnce(): Promise<Result<FirewallSyncOutcome, Error>> {
    const result = await this.runner.handle();
    if (result.ok) {
      logger.info({ status: result.value.status, latestIp: result.value.latestIp }, 'Scheduled firewall sync finished');
    }
    return result;
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('Firewall sync scheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.task !== null;
  }
}
