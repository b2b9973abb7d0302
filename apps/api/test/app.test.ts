import { afterEach, describe, expect, it } from 'vitest';

import { createApp } from '../src/app.js';
import { InMemoryIpRecordRepository } from '../src/modules/firewall-sync/ip-record.repository.memory.js';
import {
  FakeTokenIssuer,
  RULES_PATH,
  TEST_FUNCTION_KEY,
  ipRecord,
  startApp,
  startManagementApiStub,
  testEnv,
  type RecordedRequest,
} from './helpers.js';

const cleanups: (() => Promise<void>)[] = [];

afterEach(async () => {
  while (cleanups.length > 0) {
    await cleanups.pop()?.();
  }
});

const setup = async (storedIps: string[], allowList: string[]) => {
  const stub = await startManagementApiStub((request: RecordedRequest) =>
    request.method === 'GET' ? { status: 200, body: { value: allowList } } : { status: 200 },
  );
  cleanups.push(stub.close);

  const tokenIssuer = new FakeTokenIssuer();
  const { app } = createApp(testEnv({ MANAGEMENT_API_BASE_URL: stub.baseUrl }), {
    repository: new InMemoryIpRecordRepository(storedIps.map((ip) => ipRecord(ip))),
    tokenIssuer,
  });
  const server = await startApp(app);
  cleanups.push(server.close);

  return { baseUrl: server.baseUrl, requests: stub.requests, tokenIssuer };
};

describe('POST /api/firewall-sync', () => {
  it('rejects a call without the function key', async () => {
    const { baseUrl, requests } = await setup(['203.0.113.7'], []);

    const response = await fetch(`${baseUrl}/api/firewall-sync`, { method: 'POST' });

    expect(response.status).toBe(401);
    expect(await response.json()).toMatchObject({ message: 'Unauthorized' });
    expect(requests).toEqual([]);
  });

  it('rejects a wrong function key', async () => {
    const { baseUrl } = await setup(['203.0.113.7'], []);

    const response = await fetch(`${baseUrl}/api/firewall-sync`, {
      method: 'POST',
      headers: { 'x-functions-key': 'wrong-key' },
    });

    expect(response.status).toBe(401);
  });

  it('adds a new IP to the allow-list', async () => {
    const { baseUrl, requests, tokenIssuer } = await setup(['203.0.113.7'], ['198.51.100.1']);

    const response = await fetch(`${baseUrl}/api/firewall-sync`, {
      method: 'POST',
      headers: { 'x-functions-key': TEST_FUNCTION_KEY },
    });

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(await response.text()).toBe('Process completed. Added 203.0.113.7 to the firewall allow-list.');
    expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
      `GET ${RULES_PATH}?api-version=2022-07-01`,
      `PUT ${RULES_PATH}/default?api-version=2022-07-01`,
    ]);
    expect(tokenIssuer.calls).toBe(2);
  });

  it('ignores whatever body the caller sends', async () => {
    const { baseUrl, requests } = await setup(['203.0.113.7'], ['198.51.100.1']);

    const response = await fetch(`${baseUrl}/api/firewall-sync`, {
      method: 'POST',
      headers: { 'x-functions-key': TEST_FUNCTION_KEY, 'content-type': 'application/json' },
      body: 'ping',
    });

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('Process completed. Added 203.0.113.7 to the firewall allow-list.');
    expect(requests.map((request) => request.method)).toEqual(['GET', 'PUT']);
  });

  it('checks the function key before looking at a malformed body', async () => {
    const { baseUrl, requests } = await setup(['203.0.113.7'], []);

    const response = await fetch(`${baseUrl}/api/firewall-sync`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: 'ping',
    });

    expect(response.status).toBe(401);
    expect(requests).toEqual([]);
  });

  it('accepts the key as the code query parameter and reports no changes', async () => {
    const { baseUrl, requests, tokenIssuer } = await setup(['203.0.113.7'], ['203.0.113.7']);

    const response = await fetch(`${baseUrl}/api/firewall-sync?code=${TEST_FUNCTION_KEY}`, { method: 'POST' });

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('Process completed. No changes detected.');
    expect(requests.map((request) => request.method)).toEqual(['GET']);
    expect(tokenIssuer.calls).toBe(1);
  });

  it('answers 400 with the error message when the store is empty', async () => {
    const { baseUrl, requests } = await setup([], ['198.51.100.1']);

    const response = await fetch(`${baseUrl}/api/firewall-sync`, {
      method: 'POST',
      headers: { 'x-functions-key': TEST_FUNCTION_KEY },
    });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe('Error: No IP records found in the table.');
    expect(requests).toEqual([]);
  });
});

describe('ambient routes', () => {
  it('serves the liveness probe', async () => {
    const { baseUrl } = await setup([], []);

    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('echoes the caller request id', async () => {
    const { baseUrl } = await setup([], []);

    const response = await fetch(`${baseUrl}/healthz`, { headers: { 'x-request-id': 'req-123' } });

    expect(response.headers.get('x-request-id')).toBe('req-123');
  });

  it('serves the API health route', async () => {
    const { baseUrl } = await setup([], []);

    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'ok',
      target: {
        resource: 'Microsoft.KeyVault/vaults/kv-test',
        table: 'IpHistory',
        partition: 'FirewallUpdate',
        scheduled: false,
      },
    });
  });

  it('answers unknown routes with 404', async () => {
    const { baseUrl } = await setup([], []);

    const response = await fetch(`${baseUrl}/api/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Route not found', method: 'GET', path: '/api/unknown' });
  });
});
