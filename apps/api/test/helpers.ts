import { createServer, type IncomingHttpHeaders, type RequestListener, type Server } from 'http';

import type { IpRecord } from '@ipsync/common';

import { parseEnvironment, type Environment } from '../src/config/env.js';
import type { TokenIssuer } from '../src/modules/firewall-sync/token-issuer.js';

export const TEST_FUNCTION_KEY = 'test-function-key';

export const testEnvSource = {
  FUNCTION_KEY: TEST_FUNCTION_KEY,
  AZURE_STORAGE_ACCOUNT: 'teststorage',
  IP_TABLE_NAME: 'IpHistory',
  KEY_VAULT_NAME: 'kv-test',
  AZURE_SUBSCRIPTION_ID: 'sub-test',
  AZURE_RESOURCE_GROUP: 'rg-test',
  AZURE_CLIENT_ID: 'test-client',
  AZURE_CLIENT_SECRET: 'test-secret',
  AZURE_TENANT_ID: 'test-tenant',
};

export const testEnv = (overrides: Record<string, string> = {}): Environment =>
  parseEnvironment({ ...testEnvSource, NODE_ENV: 'test', ...overrides });

export const RULES_PATH =
  '/subscriptions/sub-test/resourceGroups/rg-test/providers/Microsoft.KeyVault/vaults/kv-test/firewallRules';

export const ipRecord = (ip: string, rowKey = 'row-1'): IpRecord => ({
  partitionKey: 'FirewallUpdate',
  rowKey,
  ip,
  timestamp: null,
});

export class FakeTokenIssuer implements TokenIssuer {
  calls = 0;

  constructor(private readonly token = 'test-token') {}

  async issueToken(): Promise<string> {
    this.calls += 1;
    return this.token;
  }
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
}

export interface StubResponse {
  status: number;
  body?: unknown;
}

export type StubResponder = (request: RecordedRequest) => StubResponse;

const listen = async (server: Server) => {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
};

const close = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.closeAllConnections();
    server.close((error) => (error ? reject(error) : resolve()));
  });

/**
 * In-process stand-in for the management API. Records every request and
 * answers with whatever the responder returns.
 */
export const startManagementApiStub = async (respond: StubResponder) => {
  const requests: RecordedRequest[] = [];

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const recorded: RecordedRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      };
      requests.push(recorded);

      const response = respond(recorded);
      res.statusCode = response.status;
      if (response.body === undefined) {
        res.end();
        return;
      }
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify(response.body));
    });
  });

  const baseUrl = await listen(server);

  return {
    baseUrl,
    requests,
    close: () => close(server),
  };
};

export const startApp = async (app: RequestListener) => {
  const server = createServer(app);
  const baseUrl = await listen(server);
  return {
    baseUrl,
    close: () => close(server),
  };
};
