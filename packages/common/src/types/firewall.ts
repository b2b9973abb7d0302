export type FirewallSyncStatus = 'updated' | 'unchanged';

/**
 * Ordered IP allow-list of one protected resource. Always written back in full.
 */
export type FirewallRuleSet = string[];

export interface IpRecord {
  partitionKey: string;
  rowKey: string;
  ip: string;
  timestamp: string | null;
}

export interface ResourceCoordinates {
  subscriptionId: string;
  resourceGroup: string;
  /** Provider path segment, e.g. `Microsoft.KeyVault/vaults`. */
  resourceProvider: string;
  resourceName: string;
}

export interface FirewallSyncOutcome {
  status: FirewallSyncStatus;
  latestIp: string;
  /** Allow-list as it stands after the run. */
  allowList: FirewallRuleSet;
}
