import { TableClient } from '@azure/data-tables';
import { DefaultAzureCredential } from '@azure/identity';
import type { ResourceCoordinates } from '@ipsync/common';

import type { Environment } from '../../config/env.js';
import { logger } from '../../core/logger/index.js';
import type { HealthTarget } from '../../routes/health.js';
import { ManagementFirewallRuleReader } from './firewall-rules.reader.js';
import { ManagementFirewallRuleWriter } from './firewall-rules.writer.js';
import { FirewallSyncHandler } from './firewall-sync.handler.js';
import { createFirewallSyncRouter } from './firewall-sync.router.js';
import type { IpRecordRepository } from './ip-record.repository.js';
import { TableIpRecordRepository } from './ip-record.table-repository.js';
import { LatestIpProvider } from './latest-ip.provider.js';
import { createManagementHttpClient } from './management-api.client.js';
import { ManagementTokenIssuer, type TokenIssuer } from './token-issuer.js';

export interface FirewallSyncModuleOverrides {
  repository?: IpRecordRepository;
  tokenIssuer?: TokenIssuer;
}

const createTableRepository = (env: Environment): IpRecordRepository => {
  const tableClient = new TableClient(env.AZURE_TABLE_ENDPOINT, env.IP_TABLE_NAME, new DefaultAzureCredential());
  return new TableIpRecordRepository({
    // pins the client's generic entity type to the shape read here
    listEntities: (options) => tableClient.listEntities<Record<string, unknown>>(options),
  });
};

export function createFirewallSyncModule(env: Environment, overrides: FirewallSyncModuleOverrides = {}) {
  const coordinates: ResourceCoordinates = {
    subscriptionId: env.AZURE_SUBSCRIPTION_ID,
    resourceGroup: env.AZURE_RESOURCE_GROUP,
    resourceProvider: env.FIREWALL_RESOURCE_PROVIDER,
    resourceName: env.KEY_VAULT_NAME,
  };
  const apiOptions = { apiVersion: env.MANAGEMENT_API_VERSION };

  const repository = overrides.repository ?? createTableRepository(env);
  const tokenIssuer =
    overrides.tokenIssuer ??
    ManagementTokenIssuer.fromServicePrincipal(
      {
        tenantId: env.AZURE_TENANT_ID,
        clientId: env.AZURE_CLIENT_ID,
        clientSecret: env.AZURE_CLIENT_SECRET,
      },
      env.MANAGEMENT_API_BASE_URL,
    );
  const http = createManagementHttpClient(env.MANAGEMENT_API_BASE_URL);

  const handler = new FirewallSyncHandler(
    new LatestIpProvider(repository, env.IP_RECORD_PARTITION),
    new ManagementFirewallRuleReader(http, tokenIssuer, coordinates, apiOptions),
    new ManagementFirewallRuleWriter(http, tokenIssuer, coordinates, apiOptions),
  );

  const target: HealthTarget = {
    resource: `${coordinates.resourceProvider}/${coordinates.resourceName}`,
    table: env.IP_TABLE_NAME,
    partition: env.IP_RECORD_PARTITION,
    scheduled: env.SYNC_CRON !== undefined,
  };

  logger.info(target, 'Firewall sync module initialised.');

  return {
    router: createFirewallSyncRouter(handler, env.FUNCTION_KEY),
    handler,
    target,
  };
}

export type FirewallSyncModule = ReturnType<typeof createFirewallSyncModule>;
