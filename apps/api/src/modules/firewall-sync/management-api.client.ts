import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { ResourceCoordinates } from '@ipsync/common';

export interface ManagementApiOptions {
  /** Value of the `api-version` query parameter. */
  apiVersion: string;
}

/**
 * One client per process, shared by the reader and the writer. Every status is
 * resolved so callers decide what counts as a failure.
 */
export const createManagementHttpClient = (baseUrl: string): AxiosInstance =>
  axios.create({
    baseURL: baseUrl,
    headers: { 'Content-Type': 'application/json' },
    validateStatus: () => true,
  });

export const firewallRulesPath = (coordinates: ResourceCoordinates, ruleSet?: string) => {
  const provider = coordinates.resourceProvider
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');

  const path = [
    'subscriptions',
    encodeURIComponent(coordinates.subscriptionId),
    'resourceGroups',
    encodeURIComponent(coordinates.resourceGroup),
    'providers',
    provider,
    encodeURIComponent(coordinates.resourceName),
    'firewallRules',
  ].join('/');

  return ruleSet ? `/${path}/${encodeURIComponent(ruleSet)}` : `/${path}`;
};

export const isSuccessStatus = (response: AxiosResponse) => response.status >= 200 && response.status < 300;

export const reasonPhrase = (response: AxiosResponse) => response.statusText || `HTTP ${response.status}`;
