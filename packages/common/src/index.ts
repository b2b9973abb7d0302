export * from './types/firewall.js';
export * from './schemas/firewall.js';
export * from './utils/result.js';
