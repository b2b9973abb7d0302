import { ClientSecretCredential, type AccessToken, type TokenCredential } from '@azure/identity';

import { logger } from '../../core/logger/index.js';
import { AuthenticationError } from '../../shared/errors.js';

export interface ServicePrincipalCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface TokenIssuer {
  issueToken(): Promise<string>;
}

/**
 * Client-credentials exchange against the management API audience. A token is
 * requested on every call; nothing is cached between calls.
 */
export class ManagementTokenIssuer implements TokenIssuer {
  private readonly scope: string;

  constructor(
    private readonly credential: TokenCredential,
    managementBaseUrl: string,
  ) {
    this.scope = `${managementBaseUrl.replace(/\/+$/, '')}/.default`;
  }

  static fromServicePrincipal(credentials: ServicePrincipalCredentials, managementBaseUrl: string) {
    const credential = new ClientSecretCredential(credentials.tenantId, credentials.clientId, credentials.clientSecret);
    return new ManagementTokenIssuer(credential, managementBaseUrl);
  }

  async issueToken(): Promise<string> {
    let token: AccessToken | null;
    try {
      token = await this.credential.getToken(this.scope);
    } catch (error) {
      logger.error({ err: error, scope: this.scope }, 'Management token request failed.');
      throw new AuthenticationError(
        `Failed to acquire management API token: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!token?.token) {
      throw new AuthenticationError('Failed to acquire management API token: no token returned');
    }

    return token.token;
  }
}
