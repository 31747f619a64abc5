import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { loadLogsApiConfig } from '../config';
import { InvalidCursorError, toError } from '../errors';
import { jsonResponse, rawJsonResponse } from '../http';
import { isJsonText } from '../json';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { DynamoLogStore, createDocumentClient } from '../store/dynamo';
import type { LogPage, LogRecord, LogStore } from '../types';

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 100;

const CORS = { 'Access-Control-Allow-Origin': '*' };

export function parseLimit(value: string | undefined): number {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) {
    return DEFAULT_LIMIT;
  }
  return Math.max(1, Math.min(Number.parseInt(value, 10), MAX_LIMIT));
}

export type LogsHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

/**
 * Writes the stored payload text into the record verbatim. Payloads that are
 * not JSON text come out as null.
 */
export function serializeRecord(record: LogRecord): string {
  const { payload, ...rest } = record;
  const fields = JSON.stringify(rest);
  const payloadText = payload !== null && isJsonText(payload) ? payload.trim() : 'null';
  return `${fields.slice(0, -1)},"payload":${payloadText}}`;
}

export function serializePage(page: LogPage): string {
  const logs = page.records.map(serializeRecord).join(',');
  return `{"logs":[${logs}],"total":${page.records.length},"next_cursor":${JSON.stringify(page.nextCursor)}}`;
}

export function createLogsHandler(store: LogStore, logger: Logger): LogsHandler {
  return async event => {
    const params = event.queryStringParameters ?? {};
    const limit = parseLimit(params.limit);
    const eventType = params.event_type || undefined;
    const cursor = params.cursor || undefined;

    logger.info('Logs query request', { limit, event_type: eventType });

    try {
      const page = await store.queryByFilter({ eventType, limit, cursor });
      return rawJsonResponse(200, serializePage(page), CORS);
    } catch (error) {
      if (error instanceof InvalidCursorError) {
        return jsonResponse(400, { error: 'invalid_cursor' }, CORS);
      }
      logger.error('Logs query failed', { error: toError(error) });
      return jsonResponse(500, { error: 'internal_error' }, CORS);
    }
  };
}

const logger = createLogger('logs-api');

let logsHandler: LogsHandler | undefined;

export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  if (!logsHandler) {
    try {
      const config = loadLogsApiConfig();
      const store = new DynamoLogStore(createDocumentClient(config.AWS_REGION), config.TABLE_NAME);
      logsHandler = createLogsHandler(store, logger);
    } catch (error) {
      logger.error('Configuration error', { error: toError(error) });
      return jsonResponse(500, { error: 'configuration_error' }, CORS);
    }
  }
  return logsHandler(event);
};
