/**
 * DynamoDB-backed lock ledger
 *
 * Table layout: partition key `lockId` (string). Each row carries `owner`,
 * `acquiredAt`, `ttlMs` and a `fence` column regenerated on every insert, which
 * serves as the row version.
 */

import { randomUUID } from 'crypto';
import {
  DynamoDBClient,
  PutItemCommand,
  DeleteItemCommand,
  GetItemCommand,
  ScanCommand,
  type AttributeValue,
} from '@aws-sdk/client-dynamodb';
import { hasAwsError } from '../lib/aws-errors.js';
import {
  RowExistsError,
  RowNotFoundError,
  VersionMismatchError,
  type LedgerFields,
  type LedgerRow,
  type LedgerStore,
} from './ledger-store.js';

export interface DynamoLedgerStoreOptions {
  table: string;
  region?: string;
  client?: DynamoDBClient;
}

type Item = Record<string, AttributeValue>;

function isConditionFailure(error: unknown): boolean {
  return hasAwsError(error, { names: ['ConditionalCheckFailedException'] });
}

/**
 * Whether a failed condition came back with the old item (ReturnValuesOnConditionCheckFailure)
 */
function hasOldItem(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('Item' in error)) {
    return false;
  }
  const item = error.Item;
  return typeof item === 'object' && item !== null && Object.keys(item).length > 0;
}

function toItem(rowKey: string, fields: LedgerFields, version: string): Item {
  return {
    lockId: { S: rowKey },
    owner: { S: fields.owner },
    acquiredAt: { S: fields.acquiredAt },
    ttlMs: fields.ttlMs === null ? { NULL: true } : { N: String(fields.ttlMs) },
    fence: { S: version },
  };
}

function fromItem(item: Item): LedgerRow | null {
  const rowKey = item.lockId?.S;
  const version = item.fence?.S;
  if (rowKey === undefined || version === undefined) {
    return null;
  }

  const ttl = item.ttlMs?.N;
  return {
    rowKey,
    version,
    fields: {
      owner: item.owner?.S ?? 'unknown',
      acquiredAt: item.acquiredAt?.S ?? '',
      ttlMs: ttl === undefined ? null : Number(ttl),
    },
  };
}

export class DynamoLedgerStore implements LedgerStore {
  private readonly client: DynamoDBClient;
  private readonly table: string;

  constructor(options: DynamoLedgerStoreOptions) {
    this.table = options.table;
    this.client = options.client ?? new DynamoDBClient({ region: options.region });
  }

  async insertIfAbsent(rowKey: string, fields: LedgerFields): Promise<string> {
    const version = randomUUID();
    try {
      await this.client.send(
        new PutItemCommand({
          TableName: this.table,
          Item: toItem(rowKey, fields, version),
          ConditionExpression: 'attribute_not_exists(lockId)',
        })
      );
      return version;
    } catch (error) {
      if (isConditionFailure(error)) {
        throw new RowExistsError(rowKey);
      }
      throw error;
    }
  }

  async deleteIfVersion(rowKey: string, version: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteItemCommand({
          TableName: this.table,
          Key: { lockId: { S: rowKey } },
          ConditionExpression: 'fence = :fence',
          ExpressionAttributeValues: { ':fence': { S: version } },
          ReturnValuesOnConditionCheckFailure: 'ALL_OLD',
        })
      );
    } catch (error) {
      if (isConditionFailure(error)) {
        throw hasOldItem(error)
          ? new VersionMismatchError(rowKey, version)
          : new RowNotFoundError(rowKey);
      }
      throw error;
    }
  }

  async get(rowKey: string): Promise<LedgerRow | null> {
    const output = await this.client.send(
      new GetItemCommand({
        TableName: this.table,
        Key: { lockId: { S: rowKey } },
        ConsistentRead: true,
      })
    );
    return output.Item ? fromItem(output.Item) : null;
  }

  async list(): Promise<LedgerRow[]> {
    const rows: LedgerRow[] = [];
    let startKey: Item | undefined;

    do {
      const output = await this.client.send(
        new ScanCommand({
          TableName: this.table,
          ConsistentRead: true,
          ExclusiveStartKey: startKey,
        })
      );
      for (const item of output.Items ?? []) {
        const row = fromItem(item);
        if (row) rows.push(row);
      }
      startKey = output.LastEvaluatedKey;
    } while (startKey);

    return rows;
  }
}
