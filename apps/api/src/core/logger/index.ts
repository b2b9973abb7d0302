import { createRequire } from 'module';

import { pino, type TransportSingleOptions } from 'pino';

import { loggingEnv } from '../../config/env.js';

let transport: TransportSingleOptions | undefined;

if (loggingEnv.NODE_ENV === 'development') {
  try {
    const require = createRequire(import.meta.url);
    require.resolve('pino-pretty');
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
      },
    };
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn('pino-pretty is not installed; falling back to JSON logs.', error);
  }
}

// Trigger keys and bearer tokens must never reach the logs.
const REDACTED_PATHS = [
  'req.headers["x-functions-key"]',
  'req.headers.authorization',
  'req.query.code',
  'config.headers.Authorization',
];

export const logger = pino({
  name: 'keyvault-ip-sync-api',
  level: loggingEnv.LOG_LEVEL,
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  transport,
});
