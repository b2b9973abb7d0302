import type { IpRecord } from '@ipsync/common';

import type { IpRecordRepository } from './ip-record.repository.js';

export class InMemoryIpRecordRepository implements IpRecordRepository {
  private readonly records: IpRecord[] = [];

  constructor(seed: IpRecord[] = []) {
    seed.forEach((record) => this.records.push(record));
  }

  async findLatest(partitionKey: string): Promise<IpRecord | null> {
    return this.records.find((record) => record.partitionKey === partitionKey) ?? null;
  }

  /** Newest records go first, matching the order the table store is expected to return. */
  add(record: IpRecord): void {
    this.records.unshift(record);
  }
}
