import { odata, type ListTableEntitiesOptions, type TableEntityResult } from '@azure/data-tables';
import { ipRecordEntitySchema, type IpRecord } from '@ipsync/common';

import { logger } from '../../core/logger/index.js';
import type { IpRecordRepository } from './ip-record.repository.js';

/**
 * The slice of `TableClient` this repository needs.
 */
export interface IpRecordTableClient {
  listEntities(options?: ListTableEntitiesOptions): {
    byPage(settings: { maxPageSize: number }): AsyncIterable<TableEntityResult<Record<string, unknown>>[]>;
  };
}

/**
 * Reads IP records from Azure Table Storage.
 *
 * Table storage returns a partition in ascending row-key order, so writers must
 * use row keys that sort newest first (an inverted timestamp works). Nothing
 * here re-sorts the result.
 */
export class TableIpRecordRepository implements IpRecordRepository {
  constructor(private readonly client: IpRecordTableClient) {}

  async findLatest(partitionKey: string): Promise<IpRecord | null> {
    const pages = this.client
      .listEntities({
        queryOptions: {
          filter: odata`PartitionKey eq ${partitionKey}`,
          select: ['PartitionKey', 'RowKey', 'Timestamp', 'IP'],
        },
      })
      .byPage({ maxPageSize: 1 });

    for await (const page of pages) {
      const [entity] = page;
      if (entity) {
        logger.debug({ partitionKey, rowKey: entity.rowKey }, 'Read latest IP record.');
        return ipRecordEntitySchema.parse(entity);
      }
    }

    return null;
  }
}
