import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

import { IP_RECORD_PARTITION } from '@ipsync/common';

// Get the directory of the current file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env file from the api directory
loadDotenv({ path: resolve(__dirname, '../../.env') });

export const loggingEnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).or(z.literal('local')).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const required = z.string().trim().min(1);

const environmentSchema = loggingEnvironmentSchema
  .extend({
    PORT: z.coerce.number().int().positive().default(7071),
    FUNCTION_KEY: required,
    AZURE_STORAGE_ACCOUNT: required,
    AZURE_TABLE_ENDPOINT: z.string().url().optional(),
    IP_TABLE_NAME: required,
    IP_RECORD_PARTITION: required.default(IP_RECORD_PARTITION),
    KEY_VAULT_NAME: required,
    FIREWALL_RESOURCE_PROVIDER: required.default('Microsoft.KeyVault/vaults'),
    AZURE_SUBSCRIPTION_ID: required,
    AZURE_RESOURCE_GROUP: required,
    AZURE_CLIENT_ID: required,
    AZURE_CLIENT_SECRET: required,
    AZURE_TENANT_ID: required,
    MANAGEMENT_API_BASE_URL: z
      .string()
      .url()
      .default('https://management.azure.com')
      .transform((value) => value.replace(/\/+$/, '')),
    MANAGEMENT_API_VERSION: required.default('2022-07-01'),
    SYNC_CRON: z
      .string()
      .trim()
      .optional()
      .transform((value) => (value ? value : undefined)),
  })
  .transform((value) => ({
    ...value,
    AZURE_TABLE_ENDPOINT: value.AZURE_TABLE_ENDPOINT ?? `https://${value.AZURE_STORAGE_ACCOUNT}.table.core.windows.net`,
  }));

export type Environment = z.output<typeof environmentSchema>;

/**
 * Parses the process environment once at startup; the result is handed to
 * the modules explicitly instead of being read from `process.env` later.
 */
export const parseEnvironment = (source: NodeJS.ProcessEnv = process.env): Environment => {
  const parsed = environmentSchema.safeParse(source);

  if (!parsed.success) {
    console.error('❌ Invalid environment configuration', parsed.error.format());
    throw new Error('Invalid environment configuration');
  }

  return parsed.data;
};

export const loggingEnv = loggingEnvironmentSchema.parse(process.env);
