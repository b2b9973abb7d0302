import { z } from 'zod';

import type { IpRecord } from '../types/firewall.js';

export const IP_RECORD_PARTITION = 'FirewallUpdate';

/**
 * Table entity as returned by the record store. Only `IP` is read; the
 * service metadata comes along with every entity.
 */
export const ipRecordEntitySchema = z
  .object({
    partitionKey: z.string(),
    rowKey: z.string(),
    timestamp: z.string().optional(),
    IP: z.string().min(1),
  })
  .transform(
    (entity): IpRecord => ({
      partitionKey: entity.partitionKey,
      rowKey: entity.rowKey,
      ip: entity.IP,
      timestamp: entity.timestamp ?? null,
    }),
  );

const ipRuleSchema = z.object({
  value: z.string().min(1),
});

// The rules endpoint has been seen returning bare strings as well as rule objects.
export const firewallRulesResponseSchema = z
  .object({
    value: z.array(z.union([z.string().min(1), ipRuleSchema])),
  })
  .transform((body) => body.value.map((rule) => (typeof rule === 'string' ? rule : rule.value)));

export const replaceFirewallRulesBodySchema = z.object({
  properties: z.object({
    ipRules: z.array(ipRuleSchema),
  }),
});

export type ReplaceFirewallRulesBody = z.infer<typeof replaceFirewallRulesBodySchema>;

export const toReplaceFirewallRulesBody = (ips: readonly string[]): ReplaceFirewallRulesBody =>
  replaceFirewallRulesBodySchema.parse({
    properties: {
      ipRules: ips.map((ip) => ({ value: ip })),
    },
  });
