import { beforeEach, describe, expect, it } from 'vitest';
import { EnqueueFailure } from '../../src/errors';
import { createIngestHandler } from '../../src/ingest/handler';
import type { IngestHandler } from '../../src/ingest/handler';
import { sign } from '../../src/signature';
import type { QueuedMessage } from '../../src/types';
import {
  InMemoryQueue,
  TEST_SECRET,
  buildEvent,
  createTestLogger,
} from '../support/fakes';
import type { TestLogger } from '../support/fakes';

const RECEIVED_AT = new Date('2024-05-01T10:00:00.000Z');
const PAYMENT = '{"event_type":"payment.success","data":{"order_id":"12345"}}';

function signedEvent(body: string, headerName = 'X-Webhook-Signature') {
  return buildEvent({
    body,
    headers: { [headerName]: sign(Buffer.from(body, 'utf8'), TEST_SECRET) },
  });
}

describe('ingest handler', () => {
  let queue: InMemoryQueue;
  let logger: TestLogger;
  let handle: IngestHandler;
  let ids: number;

  beforeEach(() => {
    queue = new InMemoryQueue();
    logger = createTestLogger();
    ids = 0;
    handle = createIngestHandler({
      secret: TEST_SECRET,
      queue,
      logger,
      now: () => RECEIVED_AT,
      generateId: () => `log-${++ids}`,
    });
  });

  it('should enqueue a correctly signed webhook and return its log_id', async () => {
    const result = await handle(signedEvent(PAYMENT));

    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.body)).toEqual({ status: 'received', log_id: 'log-1' });
    expect(result.headers).toEqual({ 'Content-Type': 'application/json' });

    expect(queue.bodies).toHaveLength(1);
    const message: QueuedMessage = JSON.parse(queue.bodies[0]);
    expect(message).toEqual({
      log_id: 'log-1',
      received_at: '2024-05-01T10:00:00.000Z',
      event_type: 'payment.success',
      payload: PAYMENT,
      signature: sign(Buffer.from(PAYMENT, 'utf8'), TEST_SECRET),
    });
  });

  it('should queue the payload as the received text so large integers keep every digit', async () => {
    const body = '{"event_type":"payment.success","order_id":12345678901234567890}';

    await handle(signedEvent(body));

    const message: QueuedMessage = JSON.parse(queue.bodies[0]);
    expect(message.payload).toBe(body);
    expect(message.event_type).toBe('payment.success');
  });

  it('should find the signature header regardless of case', async () => {
    const result = await handle(signedEvent(PAYMENT, 'x-webhook-signature'));

    expect(result.statusCode).toBe(200);
  });

  it('should verify base64-encoded bodies over the decoded bytes', async () => {
    const event = buildEvent({
      body: Buffer.from(PAYMENT, 'utf8').toString('base64'),
      isBase64Encoded: true,
      headers: { 'X-Webhook-Signature': sign(Buffer.from(PAYMENT, 'utf8'), TEST_SECRET) },
    });

    const result = await handle(event);

    expect(result.statusCode).toBe(200);
    expect(queue.bodies).toHaveLength(1);
  });

  it('should sign over the exact bytes, not a re-serialised form', async () => {
    const spaced = '{ "event_type": "payment.success" }';
    const event = buildEvent({
      body: spaced,
      headers: {
        'X-Webhook-Signature': sign(Buffer.from('{"event_type":"payment.success"}'), TEST_SECRET),
      },
    });

    const result = await handle(event);

    expect(result.statusCode).toBe(401);
    expect(queue.bodies).toHaveLength(0);
  });

  it('should answer 401 without touching the queue when the header is missing', async () => {
    const result = await handle(buildEvent({ body: PAYMENT }));

    expect(result.statusCode).toBe(401);
    expect(JSON.parse(result.body)).toEqual({ error: 'invalid_signature' });
    expect(queue.bodies).toHaveLength(0);
    expect(ids).toBe(0);
  });

  it('should answer 401 for a wrong signature', async () => {
    const event = buildEvent({
      body: PAYMENT,
      headers: { 'X-Webhook-Signature': 'sha256=invalid_signature_here' },
    });

    const result = await handle(event);

    expect(result.statusCode).toBe(401);
    expect(JSON.parse(result.body)).toEqual({ error: 'invalid_signature' });
    expect(queue.bodies).toHaveLength(0);
    expect(ids).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Invalid signature', {
      signature: 'sha256=invalid_signature_here',
    });
  });

  it('should answer 400 for a signed body that is not JSON', async () => {
    const result = await handle(signedEvent('not json'));

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.body)).toEqual({ error: 'invalid_json' });
    expect(queue.bodies).toHaveLength(0);
  });

  it('should leave event_type null when the payload has none', async () => {
    await handle(signedEvent('{"data":1}'));
    await handle(signedEvent('[1,2]'));
    await handle(signedEvent('{"event_type":42}'));

    const eventTypes = queue.bodies.map(body => JSON.parse(body).event_type);
    expect(eventTypes).toEqual([null, null, null]);
  });

  it('should answer 500 and not claim success when enqueue fails', async () => {
    queue.failWith = new EnqueueFailure('Failed to enqueue log-1', new Error('ThrottlingException'));

    const result = await handle(signedEvent(PAYMENT));

    expect(result.statusCode).toBe(500);
    expect(JSON.parse(result.body)).toEqual({ error: 'enqueue_failed' });
    expect(logger.error).toHaveBeenCalledWith(
      'Enqueue failed',
      expect.objectContaining({ log_id: 'log-1' })
    );
  });

  it('should hand out a distinct log_id per admitted request', async () => {
    const first = await handle(signedEvent(PAYMENT));
    const second = await handle(signedEvent(PAYMENT));

    expect(JSON.parse(first.body).log_id).toBe('log-1');
    expect(JSON.parse(second.body).log_id).toBe('log-2');
  });
});

describe('ingest handler with default id generator', () => {
  it('should generate UUID v4 log ids', async () => {
    const queue = new InMemoryQueue();
    const handle = createIngestHandler({ secret: TEST_SECRET, queue, logger: createTestLogger() });

    const results = await Promise.all([
      handle(signedEvent(PAYMENT)),
      handle(signedEvent(PAYMENT)),
      handle(signedEvent(PAYMENT)),
    ]);
    const logIds: string[] = results.map(result => JSON.parse(result.body).log_id);

    for (const logId of logIds) {
      expect(logId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    }
    expect(new Set(logIds).size).toBe(3);
  });
});
