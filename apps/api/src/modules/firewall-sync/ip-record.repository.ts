import type { IpRecord } from '@ipsync/common';

export interface IpRecordRepository {
  /**
   * First record of the partition in the store's default order, or null when
   * the partition is empty.
   */
  findLatest(partitionKey: string): Promise<IpRecord | null>;
}
