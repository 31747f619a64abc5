import { describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { InvalidCursorError } from '../../src/errors';
import { createLogsHandler, parseLimit, serializeRecord } from '../../src/logs/handler';
import type { LogPage, LogRecord, LogStore } from '../../src/types';
import { buildEvent, createTestLogger } from '../support/fakes';

const record: LogRecord = {
  log_id: 'log-1',
  received_at: '2024-05-01T10:00:00.000Z',
  event_type: 'payment.success',
  payload: '{"data":{"order_id":"12345"}}',
  signature: 'sha256=abc',
  processed_at: '2024-05-01T10:00:05.000Z',
};

function storeReturning(page: LogPage): LogStore & { queryByFilter: Mock } {
  return {
    upsertIfAbsent: vi.fn(),
    queryByFilter: vi.fn().mockResolvedValue(page),
  };
}

function getLogs(query: Record<string, string> | null) {
  return buildEvent({
    httpMethod: 'GET',
    path: '/logs',
    resource: '/logs',
    queryStringParameters: query,
  });
}

describe('parseLimit', () => {
  it('should default and clamp the limit', () => {
    expect(parseLimit(undefined)).toBe(50);
    expect(parseLimit('abc')).toBe(50);
    expect(parseLimit('2.5')).toBe(50);
    expect(parseLimit('0')).toBe(1);
    expect(parseLimit('-3')).toBe(1);
    expect(parseLimit('20')).toBe(20);
    expect(parseLimit('1000')).toBe(100);
  });
});

describe('logs handler', () => {
  it('should return logs, total and next cursor', async () => {
    const store = storeReturning({ records: [record], nextCursor: 'next-page' });
    const handle = createLogsHandler(store, createTestLogger());

    const result = await handle(getLogs({ limit: '10', event_type: 'payment.success' }));

    expect(result.statusCode).toBe(200);
    expect(result.headers).toEqual({
      'Content-Type': 'application/json',
      'Access-Control-Allow-Origin': '*',
    });
    expect(JSON.parse(result.body)).toEqual({
      logs: [{ ...record, payload: { data: { order_id: '12345' } } }],
      total: 1,
      next_cursor: 'next-page',
    });
    expect(store.queryByFilter).toHaveBeenCalledWith({
      eventType: 'payment.success',
      limit: 10,
      cursor: undefined,
    });
  });

  it('should write stored payload text into the body without reparsing it', async () => {
    const stored: LogRecord = {
      ...record,
      payload: '{"event_type":"payment.success","order_id":12345678901234567890}',
    };
    const handle = createLogsHandler(
      storeReturning({ records: [stored], nextCursor: null }),
      createTestLogger()
    );

    const result = await handle(getLogs({}));

    expect(result.body).toBe(
      '{"logs":[{"log_id":"log-1","received_at":"2024-05-01T10:00:00.000Z",' +
        '"event_type":"payment.success","signature":"sha256=abc",' +
        '"processed_at":"2024-05-01T10:00:05.000Z",' +
        '"payload":{"event_type":"payment.success","order_id":12345678901234567890}}],' +
        '"total":1,"next_cursor":null}'
    );
  });

  it('should query everything with the default limit when no parameters are given', async () => {
    const store = storeReturning({ records: [], nextCursor: null });
    const handle = createLogsHandler(store, createTestLogger());

    const result = await handle(getLogs(null));

    expect(JSON.parse(result.body)).toEqual({ logs: [], total: 0, next_cursor: null });
    expect(store.queryByFilter).toHaveBeenCalledWith({
      eventType: undefined,
      limit: 50,
      cursor: undefined,
    });
  });

  it('should answer 400 for an invalid cursor', async () => {
    const store = storeReturning({ records: [], nextCursor: null });
    store.queryByFilter.mockRejectedValueOnce(new InvalidCursorError());
    const handle = createLogsHandler(store, createTestLogger());

    const result = await handle(getLogs({ cursor: 'garbage' }));

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.body)).toEqual({ error: 'invalid_cursor' });
  });

  it('should answer 500 when the store fails', async () => {
    const store = storeReturning({ records: [], nextCursor: null });
    store.queryByFilter.mockRejectedValueOnce(new Error('ResourceNotFoundException'));
    const logger = createTestLogger();
    const handle = createLogsHandler(store, logger);

    const result = await handle(getLogs({}));

    expect(result.statusCode).toBe(500);
    expect(JSON.parse(result.body)).toEqual({ error: 'internal_error' });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe('serializeRecord', () => {
  it('should write a missing or unreadable payload as null', () => {
    expect(JSON.parse(serializeRecord({ ...record, payload: null })).payload).toBeNull();
    expect(JSON.parse(serializeRecord({ ...record, payload: '{broken' })).payload).toBeNull();
  });
});
