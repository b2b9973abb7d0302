import type { AxiosInstance } from 'axios';
import { firewallRulesResponseSchema, type FirewallRuleSet, type ResourceCoordinates } from '@ipsync/common';

import { logger } from '../../core/logger/index.js';
import { RemoteApiError } from '../../shared/errors.js';
import {
  firewallRulesPath,
  isSuccessStatus,
  reasonPhrase,
  type ManagementApiOptions,
} from './management-api.client.js';
import type { TokenIssuer } from './token-issuer.js';

export interface FirewallRuleReader {
  readAllowList(): Promise<FirewallRuleSet>;
}

export class ManagementFirewallRuleReader implements FirewallRuleReader {
  constructor(
    private readonly http: AxiosInstance,
    private readonly tokenIssuer: TokenIssuer,
    private readonly coordinates: ResourceCoordinates,
    private readonly options: ManagementApiOptions,
  ) {}

  async readAllowList(): Promise<FirewallRuleSet> {
    const token = await this.tokenIssuer.issueToken();

    const response = await this.http.get<unknown>(firewallRulesPath(this.coordinates), {
      params: { 'api-version': this.options.apiVersion },
      headers: { Authorization: `Bearer ${token}` },
    });

    if (!isSuccessStatus(response)) {
      const reason = reasonPhrase(response);
      throw new RemoteApiError(`Failed to read firewall rules: ${reason}`, response.status, reason);
    }

    const parsed = firewallRulesResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Firewall rules response did not match the expected shape.');
      throw new RemoteApiError(
        'Failed to read firewall rules: unexpected response body',
        response.status,
        reasonPhrase(response),
        parsed.error.issues,
      );
    }

    return parsed.data;
  }
}
