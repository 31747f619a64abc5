import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { AttributeValue, DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  PutCommand,
  QueryCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import { marshall } from '@aws-sdk/util-dynamodb';
import type { marshallOptions } from '@aws-sdk/util-dynamodb';
import { z } from 'zod';
import { InvalidCursorError, PermanentStorageFailure, TransientStorageFailure } from '../errors';
import type { LogPage, LogQuery, LogRecord, LogStore, WriteResult } from '../types';

export type DocumentSender = Pick<DynamoDBDocumentClient, 'send'>;

export const EVENT_TYPE_INDEX = 'event_type-received_at-index';

const THROTTLING_ERRORS = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
  'InternalServerError',
  'ServiceUnavailable',
  'TimeoutError',
]);

/** DynamoDB's item size limit */
export const MAX_ITEM_BYTES = 400 * 1024;

const MARSHALL_OPTIONS: marshallOptions = { removeUndefinedValues: true };

const cursorSchema = z.record(z.union([z.string(), z.number()]));

export function createDocumentClient(
  region: string,
  config: Omit<DynamoDBClientConfig, 'region'> = {}
): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient({ ...config, region }), {
    marshallOptions: MARSHALL_OPTIONS,
  });
}

export function encodeCursor(key: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(key), 'utf8').toString('base64url');
}

export function decodeCursor(cursor: string): Record<string, string | number> {
  try {
    return cursorSchema.parse(JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8')));
  } catch (error) {
    throw new InvalidCursorError(error);
  }
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : '';
}

/**
 * Throttling, server-side and network failures are worth redelivering;
 * anything the service rejected outright is not.
 */
export function isRetryable(error: unknown): boolean {
  if (THROTTLING_ERRORS.has(errorName(error))) {
    return true;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('$retryable' in error && error.$retryable !== undefined) {
    return true;
  }
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    const status: unknown = Reflect.get(error.$metadata, 'httpStatusCode');
    return typeof status !== 'number' || status >= 500;
  }
  return true;
}

/**
 * Null attributes are left out so the event_type index stays sparse
 */
export function toItem(record: LogRecord): Record<string, unknown> {
  const item: Record<string, unknown> = {
    log_id: record.log_id,
    received_at: record.received_at,
  };
  if (record.event_type !== null) item.event_type = record.event_type;
  if (record.payload !== null) item.payload_json = record.payload;
  if (record.signature !== null) item.signature = record.signature;
  if (record.processed_at !== null) item.processed_at = record.processed_at;
  return item;
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function fromItem(item: Record<string, unknown>): LogRecord {
  return {
    log_id: String(item.log_id),
    received_at: String(item.received_at),
    event_type: optionalString(item.event_type),
    payload: optionalString(item.payload_json),
    signature: optionalString(item.signature),
    processed_at: optionalString(item.processed_at),
  };
}

function attributeBytes(value: AttributeValue): number {
  if (value.S !== undefined) return Buffer.byteLength(value.S, 'utf8');
  if (value.N !== undefined) return Buffer.byteLength(value.N, 'utf8');
  return Buffer.byteLength(JSON.stringify(value), 'utf8');
}

/**
 * Marshals the item the way the document client will and checks it against
 * the item size limit. Failures here happen before any request is sent and
 * would repeat on every delivery.
 */
export function checkItem(item: Record<string, unknown>): void {
  let marshalled: Record<string, AttributeValue>;
  try {
    marshalled = marshall(item, { ...MARSHALL_OPTIONS, convertTopLevelContainer: false });
  } catch (error) {
    throw new PermanentStorageFailure(`Item for ${String(item.log_id)} cannot be marshalled`, error);
  }

  let size = 0;
  for (const [name, value] of Object.entries(marshalled)) {
    size += Buffer.byteLength(name, 'utf8') + attributeBytes(value);
  }
  if (size > MAX_ITEM_BYTES) {
    throw new PermanentStorageFailure(
      `Item for ${String(item.log_id)} is ${size} bytes, above the ${MAX_ITEM_BYTES} byte limit`
    );
  }
}

export class DynamoLogStore implements LogStore {
  constructor(
    private readonly client: DocumentSender,
    private readonly tableName: string
  ) {}

  async upsertIfAbsent(record: LogRecord): Promise<WriteResult> {
    const item = toItem(record);
    checkItem(item);

    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
          ConditionExpression: 'attribute_not_exists(log_id)',
        })
      );
      return 'created';
    } catch (error) {
      if (errorName(error) === 'ConditionalCheckFailedException') {
        return 'already_existed';
      }
      throw new TransientStorageFailure(
        `Failed to write ${record.log_id}`,
        isRetryable(error),
        error
      );
    }
  }

  async queryByFilter(query: LogQuery): Promise<LogPage> {
    const exclusiveStartKey = query.cursor !== undefined ? decodeCursor(query.cursor) : undefined;

    const output =
      query.eventType !== undefined
        ? await this.client.send(
            new QueryCommand({
              TableName: this.tableName,
              IndexName: EVENT_TYPE_INDEX,
              KeyConditionExpression: '#event_type = :event_type',
              ExpressionAttributeNames: { '#event_type': 'event_type' },
              ExpressionAttributeValues: { ':event_type': query.eventType },
              ScanIndexForward: false,
              Limit: query.limit,
              ExclusiveStartKey: exclusiveStartKey,
            })
          )
        : await this.client.send(
            new ScanCommand({
              TableName: this.tableName,
              Limit: query.limit,
              ExclusiveStartKey: exclusiveStartKey,
            })
          );

    return {
      records: (output.Items ?? []).map(fromItem),
      nextCursor: output.LastEvaluatedKey ? encodeCursor(output.LastEvaluatedKey) : null,
    };
  }
}
