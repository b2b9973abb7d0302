import { NotFoundError } from '../../shared/errors.js';
import type { IpRecordRepository } from './ip-record.repository.js';

export class LatestIpProvider {
  constructor(
    private readonly repository: IpRecordRepository,
    private readonly partitionKey: string,
  ) {}

  async getLatestIp(): Promise<string> {
    const record = await this.repository.findLatest(this.partitionKey);
    if (!record) {
      throw new NotFoundError('No IP records found in the table.', { partitionKey: this.partitionKey });
    }
    return record.ip;
  }
}
