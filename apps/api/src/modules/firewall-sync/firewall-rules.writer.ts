import type { AxiosInstance } from 'axios';
import { toReplaceFirewallRulesBody, type ResourceCoordinates } from '@ipsync/common';

import { RemoteApiError } from '../../shared/errors.js';
import {
  firewallRulesPath,
  isSuccessStatus,
  reasonPhrase,
  type ManagementApiOptions,
} from './management-api.client.js';
import type { TokenIssuer } from './token-issuer.js';

const DEFAULT_RULE_SET = 'default';

export interface FirewallRuleWriter {
  /**
   * Replaces the whole allow-list. Any address missing from `ips` is dropped
   * by the remote service.
   */
  replaceAllowList(ips: readonly string[]): Promise<void>;
}

export class ManagementFirewallRuleWriter implements FirewallRuleWriter {
  constructor(
    private readonly http: AxiosInstance,
    private readonly tokenIssuer: TokenIssuer,
    private readonly coordinates: ResourceCoordinates,
    private readonly options: ManagementApiOptions,
  ) {}

  async replaceAllowList(ips: readonly string[]): Promise<void> {
    const token = await this.tokenIssuer.issueToken();

    const response = await this.http.put(
      firewallRulesPath(this.coordinates, DEFAULT_RULE_SET),
      toReplaceFirewallRulesBody(ips),
      {
        params: { 'api-version': this.options.apiVersion },
        headers: { Authorization: `Bearer ${token}` },
      },
    );

    if (!isSuccessStatus(response)) {
      const reason = reasonPhrase(response);
      throw new RemoteApiError(`Failed to update firewall rules: ${reason}`, response.status, reason);
    }
  }
}
